/**
 * Authentication Service - two-factor login state machine
 *
 *   Anonymous ──primary──▶ PendingSecondFactor ──second factor──▶ Authenticated
 *       ▲                        │        ▲                             │
 *       └──── denied / logout ───┘        └── wrong code (retry) ───────┘
 *
 * No path reaches Authenticated without passing through PendingSecondFactor.
 * Every decision point records an audit entry and a metric before it returns
 * or throws; nothing is retried here.
 */

import { randomUUID } from 'node:crypto';
import { performance } from 'node:perf_hooks';
import type {
  AuthenticatedSession,
  AuthState,
  AuditEntry,
  Identity,
  PendingAuthentication,
  PortalSessionState,
} from './types.js';
import type { DepartmentMap } from './department-map.js';
import type { SessionStore } from './session-store.js';
import { AuditService } from './audit-service.js';
import { isValidCodeFormat, normalizeCode, type TotpVerifier, TOTP_STEP_SECONDS } from './totp.js';
import {
  escapeDnValue,
  escapeFilterValue,
  readProfile,
  toIdentity,
  type DirectoryClientFactory,
} from '../directory/directory-client.js';
import type { SecondFactorSecretStore } from '../directory/secret-store.js';
import {
  NullPortalMetrics,
  type LoginOutcome,
  type PortalMetrics,
  type SecondFactorOutcome,
} from '../metrics/portal-metrics.js';
import { PortalError, PortalErrors, errorMessage } from '../utils/errors.js';

// ============================================================================
// Configuration Types
// ============================================================================

export interface AuthenticationServiceConfig {
  /** Base DN holding user entries, e.g. cn=users,cn=accounts,dc=example,dc=internal */
  userBaseDn: string;
  /** RDN attribute of user entries (default: uid) */
  userIdAttribute: string;
  /** Domain used when a directory entry has no mail attribute */
  defaultEmailDomain: string;
  /** How long a PendingAuthentication stays usable */
  pendingTtlMs: number;
  /** Absolute lifetime of an AuthenticatedSession */
  sessionLifetimeMs: number;
  /** TOTP drift tolerance in 30s steps on either side of now */
  totpWindow: number;
}

export interface AuthenticationServiceDeps {
  directory: DirectoryClientFactory;
  /** Absent when the second-factor subsystem is not configured */
  secrets?: SecondFactorSecretStore;
  verifier: TotpVerifier;
  store: SessionStore<PortalSessionState>;
  departments: DepartmentMap;
  audit?: AuditService;
  metrics?: PortalMetrics;
  now?: () => number;
}

export interface PendingLogin {
  sessionId: string;
  pending: PendingAuthentication;
}

export interface CompletedLogin {
  /** Fresh session id; the pending session id is no longer valid */
  sessionId: string;
  session: AuthenticatedSession;
}

const DIRECTORY_ATTRIBUTES = ['uid', 'cn', 'mail', 'memberOf'];

interface UsedCode {
  pendingId: string;
  expiresAt: number;
}

// ============================================================================
// Authentication Service Class
// ============================================================================

export class AuthenticationService {
  private readonly audit: AuditService;
  private readonly metrics: PortalMetrics;
  private readonly now: () => number;

  /** `${username}:${code}` → id of the pending record that consumed it, and expiry */
  private readonly usedCodes: Map<string, UsedCode> = new Map();

  constructor(
    private readonly config: AuthenticationServiceConfig,
    private readonly deps: AuthenticationServiceDeps
  ) {
    this.audit = deps.audit ?? new AuditService();
    this.metrics = deps.metrics ?? new NullPortalMetrics();
    this.now = deps.now ?? Date.now;
  }

  // ==========================================================================
  // Primary authentication
  // ==========================================================================

  /**
   * Verify credentials against the directory and the department's required group.
   *
   * Returns a PendingAuthentication; grants no session access by itself.
   *
   * @throws PortalError MISSING_FIELDS | INVALID_DEPARTMENT | INVALID_CREDENTIALS |
   *   DIRECTORY_ERROR | UNAUTHORIZED
   */
  async authenticatePrimary(
    username: string,
    password: string,
    department: string
  ): Promise<PendingAuthentication> {
    const user = username.trim();

    const missing = [
      user ? undefined : 'username',
      password ? undefined : 'password',
      department ? undefined : 'department',
    ].filter((field): field is string => field !== undefined);

    if (missing.length > 0) {
      throw await this.denyPrimary(PortalErrors.MISSING_FIELDS(missing), 'missing_fields', user, department);
    }

    // Checked before any directory traffic
    const requiredGroup = this.deps.departments.requiredGroup(department);
    if (requiredGroup === undefined) {
      console.warn(`[AuthenticationService] ${user}: invalid department ${department}`);
      throw await this.denyPrimary(PortalErrors.INVALID_DEPARTMENT(department), 'invalid_department', user, department);
    }

    const identity = await this.lookupIdentity(user, password, department);

    if (!identity.groups.includes(requiredGroup)) {
      console.warn(
        `[AuthenticationService] DENIED ${user} -> ${department}: unauthorized access attempt, groups: ${identity.groups.join(', ') || 'none'}`
      );
      this.metrics.unauthorizedAccess(user, department, identity.groups);
      throw await this.denyPrimary(
        PortalErrors.UNAUTHORIZED(user, department, [...identity.groups]),
        'unauthorized',
        user,
        department,
        { requiredGroup, actualGroups: [...identity.groups] },
        'critical'
      );
    }

    const createdAt = this.now();
    const pending: PendingAuthentication = Object.freeze({
      id: randomUUID(),
      identity,
      department,
      createdAt: new Date(createdAt),
      expiresAt: new Date(createdAt + this.config.pendingTtlMs),
    });

    console.log(`[AuthenticationService] ${user} -> ${department}: credentials and department verified`);
    this.metrics.loginAttempt('pending_second_factor', department, user);
    await this.record({
      source: 'auth:primary',
      userId: user,
      action: 'authenticate_primary',
      success: true,
      metadata: { department, groups: [...identity.groups] },
    });

    return pending;
  }

  /**
   * Start a login for a browser session: discards any pending record held
   * under `previousSessionId`, runs primary authentication and stores the
   * result under a fresh session id.
   */
  async login(
    username: string,
    password: string,
    department: string,
    previousSessionId?: string
  ): Promise<PendingLogin> {
    await this.discardPending(previousSessionId);

    const pending = await this.authenticatePrimary(username, password, department);
    const sessionId = randomUUID();
    await this.deps.store.put(sessionId, { stage: 'pending', pending }, this.config.pendingTtlMs);

    return { sessionId, pending };
  }

  private async lookupIdentity(username: string, password: string, department: string): Promise<Identity> {
    const { userBaseDn, userIdAttribute, defaultEmailDomain } = this.config;
    const client = this.deps.directory();
    const started = performance.now();
    const elapsed = () => (performance.now() - started) / 1000;

    try {
      const dn = `${userIdAttribute}=${escapeDnValue(username)},${userBaseDn}`;
      const bound = await client.bind(dn, password);

      if (!bound) {
        console.warn(`[AuthenticationService] FAILED ${username} -> ${department}: invalid credentials`);
        this.metrics.directoryAuth('failure', username, elapsed());
        this.metrics.invalidCredentials(username);
        throw await this.denyPrimary(PortalErrors.INVALID_CREDENTIALS(username), 'invalid_credentials', username, department);
      }

      const entries = await client.search(
        userBaseDn,
        `(${userIdAttribute}=${escapeFilterValue(username)})`,
        DIRECTORY_ATTRIBUTES
      );
      this.metrics.directoryAuth('success', username, elapsed());

      const entry = entries[0];
      if (!entry) {
        throw await this.denyPrimary(
          PortalErrors.DIRECTORY_ERROR(username, 'bound but no directory entry found'),
          'directory_error',
          username,
          department
        );
      }

      const identity = toIdentity(username, readProfile(entry), defaultEmailDomain);
      console.log(`[AuthenticationService] ${username}: groups ${identity.groups.join(', ') || 'none'}`);
      return identity;
    } catch (error) {
      if (error instanceof PortalError) {
        throw error;
      }
      console.error(`[AuthenticationService] Directory error for ${username}: ${errorMessage(error)}`);
      this.metrics.directoryAuth('error', username, elapsed());
      throw await this.denyPrimary(
        PortalErrors.DIRECTORY_ERROR(username, errorMessage(error)),
        'directory_error',
        username,
        department
      );
    } finally {
      await client.unbind();
    }
  }

  private async denyPrimary(
    error: PortalError,
    outcome: LoginOutcome,
    username: string,
    department: string,
    metadata: Record<string, unknown> = {},
    severity: AuditEntry['severity'] = 'warning'
  ): Promise<PortalError> {
    this.metrics.loginAttempt(outcome, department || 'none', username || 'unknown');
    await this.record({
      source: 'auth:primary',
      userId: username || undefined,
      action: 'authenticate_primary',
      success: false,
      reason: error.code,
      error: error.message,
      severity,
      metadata: { department, ...metadata },
    });
    return error;
  }

  // ==========================================================================
  // Second factor
  // ==========================================================================

  /**
   * Verify the authenticator code for the pending record held under `sessionId`
   * and promote it to an AuthenticatedSession.
   *
   * On success the pending record is gone and the session lives under a new id.
   * On any failure other than SESSION_EXPIRED the pending record is kept.
   *
   * @throws PortalError SESSION_EXPIRED | MISSING_FIELDS | INVALID_CODE_FORMAT |
   *   CONFIGURATION_ERROR | NOT_ENROLLED | INVALID_CODE
   */
  async authenticateSecondFactor(sessionId: string | undefined, code: string): Promise<CompletedLogin> {
    const started = performance.now();
    const elapsed = () => (performance.now() - started) / 1000;

    const pending = await this.getPending(sessionId);
    if (!sessionId || !pending) {
      throw await this.denySecondFactor(PortalErrors.SESSION_EXPIRED(), 'session_expired', undefined, elapsed());
    }

    const username = pending.identity.username;

    if (code.trim().length === 0) {
      throw await this.denySecondFactor(PortalErrors.MISSING_FIELDS(['code']), 'missing_fields', pending, elapsed());
    }

    const normalized = normalizeCode(code);
    if (!isValidCodeFormat(normalized)) {
      throw await this.denySecondFactor(PortalErrors.INVALID_CODE_FORMAT(username), 'invalid_format', pending, elapsed());
    }

    const secret = await this.lookupSecret(pending, elapsed);

    let valid: boolean;
    try {
      valid = this.deps.verifier.verify(secret, normalized, this.config.totpWindow);
    } catch (error) {
      throw await this.denySecondFactor(
        PortalErrors.CONFIGURATION_ERROR(`TOTP verification failed for ${username}: ${errorMessage(error)}`),
        'configuration_error',
        pending,
        elapsed()
      );
    }

    if (!valid) {
      throw await this.denySecondFactor(PortalErrors.INVALID_CODE(username), 'invalid_code', pending, elapsed());
    }

    const replay = this.usedCode(username, normalized);
    if (replay && replay !== pending.id) {
      console.warn(`[AuthenticationService] ${username}: authenticator code replayed`);
      throw await this.denySecondFactor(PortalErrors.INVALID_CODE(username), 'invalid_code', pending, elapsed());
    }
    // Claimed before the first await so a concurrent login of the same user sees it
    const claim = this.markCodeUsed(username, normalized, pending.id);

    // Atomic check-and-promote: only one caller gets the record
    const taken = await this.deps.store.take(
      sessionId,
      (state) => state.stage === 'pending' && state.pending.id === pending.id
    );
    if (!taken) {
      this.releaseCode(username, normalized, claim);
      throw await this.denySecondFactor(PortalErrors.SESSION_EXPIRED(), 'session_expired', pending, elapsed());
    }
    this.markCodeUsed(username, normalized, pending.id);

    const issuedAt = this.now();
    const session: AuthenticatedSession = Object.freeze({
      id: randomUUID(),
      identity: pending.identity,
      department: pending.department,
      permanent: true,
      issuedAt: new Date(issuedAt),
      expiresAt: new Date(issuedAt + this.config.sessionLifetimeMs),
    });
    await this.deps.store.put(session.id, { stage: 'authenticated', session }, this.config.sessionLifetimeMs);

    console.log(`[AuthenticationService] ${username} -> ${pending.department}: second factor verified, session issued`);
    this.metrics.secondFactor('success', username, elapsed());
    this.metrics.loginAttempt('success', pending.department, username);
    this.metrics.authenticated(username, pending.department, (issuedAt - pending.createdAt.getTime()) / 1000);
    await this.record({
      source: 'auth:second-factor',
      userId: username,
      action: 'authenticate_second_factor',
      success: true,
      metadata: { department: pending.department },
    });

    return { sessionId: session.id, session };
  }

  private async lookupSecret(pending: PendingAuthentication, elapsed: () => number): Promise<string> {
    const username = pending.identity.username;
    const store = this.deps.secrets;

    if (!store) {
      throw await this.denySecondFactor(
        PortalErrors.CONFIGURATION_ERROR('no TOTP secret store configured'),
        'configuration_error',
        pending,
        elapsed()
      );
    }

    let secret: string | undefined;
    try {
      secret = await store.lookup(username);
    } catch (error) {
      throw await this.denySecondFactor(
        PortalErrors.CONFIGURATION_ERROR(errorMessage(error)),
        'configuration_error',
        pending,
        elapsed()
      );
    }

    if (!secret) {
      throw await this.denySecondFactor(PortalErrors.NOT_ENROLLED(username), 'not_enrolled', pending, elapsed());
    }
    return secret;
  }

  private async denySecondFactor(
    error: PortalError,
    outcome: SecondFactorOutcome,
    pending: PendingAuthentication | undefined,
    seconds: number
  ): Promise<PortalError> {
    const username = pending?.identity.username;
    const level = error.code === 'CONFIGURATION_ERROR' ? 'error' : 'warn';
    console[level](`[AuthenticationService] TOTP ${outcome} for ${username ?? 'unknown session'}`);

    this.metrics.secondFactor(outcome, username ?? 'unknown', seconds);
    await this.record({
      source: 'auth:second-factor',
      userId: username,
      action: 'authenticate_second_factor',
      success: false,
      reason: error.code,
      error: error.message,
      metadata: { department: pending?.department },
    });
    return error;
  }

  private usedCode(username: string, code: string): string | undefined {
    const key = `${username}:${code}`;
    const used = this.usedCodes.get(key);
    if (used && used.expiresAt <= this.now()) {
      this.usedCodes.delete(key);
      return undefined;
    }
    return used?.pendingId;
  }

  private markCodeUsed(username: string, code: string, pendingId: string): UsedCode {
    const now = this.now();
    for (const [key, used] of this.usedCodes) {
      if (used.expiresAt <= now) {
        this.usedCodes.delete(key);
      }
    }
    // A code stays acceptable for the whole drift window
    const lifetimeMs = (2 * this.config.totpWindow + 1) * TOTP_STEP_SECONDS * 1000;
    const used: UsedCode = { pendingId, expiresAt: now + lifetimeMs };
    this.usedCodes.set(`${username}:${code}`, used);
    return used;
  }

  /** Drop a claim whose promotion failed, unless a later claim replaced it. */
  private releaseCode(username: string, code: string, claim: UsedCode): void {
    const key = `${username}:${code}`;
    if (this.usedCodes.get(key) === claim) {
      this.usedCodes.delete(key);
    }
  }

  // ==========================================================================
  // Session lifecycle
  // ==========================================================================

  /**
   * End whatever the session id holds. Idempotent: absent or already-ended
   * sessions are not an error.
   */
  async logout(sessionId: string | undefined): Promise<void> {
    if (!sessionId) {
      return;
    }

    const state = await this.deps.store.get(sessionId);
    await this.deps.store.delete(sessionId);

    if (state?.stage === 'authenticated') {
      const username = state.session.identity.username;
      console.log(`[AuthenticationService] LOGOUT ${username}`);
      this.metrics.logout(username);
      await this.record({
        source: 'auth:session',
        userId: username,
        action: 'logout',
        success: true,
        metadata: { department: state.session.department },
      });
    } else {
      await this.record({
        source: 'auth:session',
        action: 'logout',
        success: true,
        reason: state ? 'pending_discarded' : 'no_session',
      });
    }
  }

  /** Drop a pending record; authenticated sessions are left alone. */
  async discardPending(sessionId: string | undefined): Promise<void> {
    if (!sessionId) {
      return;
    }
    const discarded = await this.deps.store.take(sessionId, (state) => state.stage === 'pending');
    if (discarded?.stage === 'pending') {
      console.log(`[AuthenticationService] Discarded pending login for ${discarded.pending.identity.username}`);
    }
  }

  async getState(sessionId: string | undefined): Promise<AuthState> {
    const state = sessionId ? await this.deps.store.get(sessionId) : undefined;
    if (!state) {
      return 'Anonymous';
    }
    return state.stage === 'pending' ? 'PendingSecondFactor' : 'Authenticated';
  }

  async getPending(sessionId: string | undefined): Promise<PendingAuthentication | undefined> {
    const state = sessionId ? await this.deps.store.get(sessionId) : undefined;
    if (state?.stage !== 'pending' || state.pending.expiresAt.getTime() <= this.now()) {
      return undefined;
    }
    return state.pending;
  }

  async getSession(sessionId: string | undefined): Promise<AuthenticatedSession | undefined> {
    const state = sessionId ? await this.deps.store.get(sessionId) : undefined;
    if (state?.stage !== 'authenticated' || state.session.expiresAt.getTime() <= this.now()) {
      return undefined;
    }
    return state.session;
  }

  private async record(entry: Omit<AuditEntry, 'timestamp'>): Promise<void> {
    await this.audit.log({ timestamp: new Date(this.now()), ...entry });
  }
}
