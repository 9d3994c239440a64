/**
 * Core Module - Public API
 *
 * Data model, department table, role precedence, session store, audit and
 * the two-factor authentication service.
 */

export type {
  Identity,
  PendingAuthentication,
  AuthenticatedSession,
  PortalSessionState,
  AuthState,
  BackendTarget,
  DepartmentRoute,
  AuditSeverity,
  AuditEntry,
} from './types.js';

export {
  AuditService,
  ConsoleAuditStorage,
  InMemoryAuditStorage,
  type AuditQuery,
  type AuditServiceConfig,
  type AuditStorage,
} from './audit-service.js';
export { DepartmentMap } from './department-map.js';
export { DEFAULT_ROLE_PRECEDENCE, RolePrecedence, extractRoles, selectPrimaryRole } from './role-precedence.js';
export { InMemorySessionStore, type SessionStore, type InMemorySessionStoreOptions } from './session-store.js';
export {
  TOTP_STEP_SECONDS,
  DEFAULT_TOTP_WINDOW,
  SpeakeasyTotpVerifier,
  isValidCodeFormat,
  normalizeCode,
  type TotpVerifier,
} from './totp.js';
export {
  AuthenticationService,
  type AuthenticationServiceConfig,
  type AuthenticationServiceDeps,
  type PendingLogin,
  type CompletedLogin,
} from './authentication-service.js';
