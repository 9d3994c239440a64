/**
 * Core Portal Types
 *
 * Shared data model for the authentication state machine and the role router.
 * Files in src/core/ MUST NOT import from src/http/ or src/router/.
 */

// ============================================================================
// Identity
// ============================================================================

/**
 * Identity produced by a successful directory bind. Immutable once created;
 * `groups` is the authoritative membership set used for authorization.
 */
export interface Identity {
  readonly username: string;
  readonly fullName: string;
  readonly email: string;
  readonly groups: readonly string[];
}

// ============================================================================
// Authentication States
// ============================================================================

/**
 * Directory credentials verified, second factor not yet verified.
 *
 * Single-use: consumed exactly once, either by promotion into an
 * AuthenticatedSession or by being discarded.
 */
export interface PendingAuthentication {
  /** Nonce identifying this record; promotion only succeeds against the same nonce */
  readonly id: string;
  readonly identity: Identity;
  readonly department: string;
  readonly createdAt: Date;
  readonly expiresAt: Date;
}

/**
 * Fully authenticated session. Lifetime is a fixed absolute expiry from
 * `issuedAt`, independent of activity.
 */
export interface AuthenticatedSession {
  readonly id: string;
  readonly identity: Identity;
  readonly department: string;
  readonly permanent: true;
  readonly issuedAt: Date;
  readonly expiresAt: Date;
}

/**
 * What the portal keeps per session cookie.
 */
export type PortalSessionState =
  | { readonly stage: 'pending'; readonly pending: PendingAuthentication }
  | { readonly stage: 'authenticated'; readonly session: AuthenticatedSession };

/**
 * Externally observable authentication state for a session id.
 */
export type AuthState = 'Anonymous' | 'PendingSecondFactor' | 'Authenticated';

// ============================================================================
// Department / Role Mapping
// ============================================================================

export interface BackendTarget {
  /** Base URL of the dashboard service, e.g. http://hr-dashboard:8501 */
  readonly url: string;
  /** Path probed by the readiness check */
  readonly healthPath: string;
}

/**
 * One row of the department table: department ↔ required group ↔ dashboard.
 */
export interface DepartmentRoute {
  readonly name: string;
  /** Directory group required to log into this department */
  readonly group: string;
  /** Role name used by the router's precedence table */
  readonly role: string;
  /** Portal path the user lands on after login */
  readonly dashboardPath: string;
  readonly backend?: BackendTarget;
}

// ============================================================================
// Audit Types
// ============================================================================

export type AuditSeverity = 'info' | 'warning' | 'critical';

/**
 * AuditEntry represents a single audit log entry.
 *
 * All entries carry a `source` naming the decision point that produced them.
 */
export interface AuditEntry {
  timestamp: Date;

  /** Origin of the entry, e.g. 'auth:primary', 'router:forward' */
  source: string;

  userId?: string;

  action: string;

  success: boolean;

  /** Error code or outcome label */
  reason?: string;

  error?: string;

  severity?: AuditSeverity;

  metadata?: Record<string, unknown>;
}
