/**
 * Portal metrics collaborator.
 *
 * The authentication service and router depend on the `PortalMetrics`
 * interface; the Prometheus implementation owns its own Registry so tests and
 * multiple app instances never share process-global counters.
 */

import { Counter, Gauge, Histogram, Registry } from 'prom-client';

export type LoginOutcome =
  | 'success'
  | 'pending_second_factor'
  | 'missing_fields'
  | 'invalid_credentials'
  | 'invalid_department'
  | 'unauthorized'
  | 'directory_error';

export type SecondFactorOutcome =
  | 'success'
  | 'session_expired'
  | 'missing_fields'
  | 'invalid_format'
  | 'not_enrolled'
  | 'configuration_error'
  | 'invalid_code';

export type RouteOutcome =
  | 'forwarded'
  | 'invalid_evidence'
  | 'no_roles'
  | 'unrecognized_role'
  | 'misconfigured'
  | 'backend_unavailable'
  | 'backend_timeout'
  | 'proxy_error';

/** Point-in-time session counts, read at scrape time. */
export interface SessionCounts {
  pending: number;
  activeByDepartment: Record<string, number>;
}

export interface PortalMetrics {
  loginAttempt(outcome: LoginOutcome, department: string, username: string): void;
  directoryAuth(status: 'success' | 'failure' | 'error', username: string, seconds: number): void;
  invalidCredentials(username: string): void;
  unauthorizedAccess(username: string, requestedDepartment: string, actualGroups: readonly string[]): void;
  secondFactor(outcome: SecondFactorOutcome, username: string, seconds: number): void;
  authenticated(username: string, department: string, totalSeconds: number): void;
  logout(username: string): void;
  routed(outcome: RouteOutcome, role: string): void;
}

export class NullPortalMetrics implements PortalMetrics {
  loginAttempt(): void {}
  directoryAuth(): void {}
  invalidCredentials(): void {}
  unauthorizedAccess(): void {}
  secondFactor(): void {}
  authenticated(): void {}
  logout(): void {}
  routed(): void {}
}

export class PrometheusPortalMetrics implements PortalMetrics {
  readonly registry: Registry;

  private readonly loginAttempts: Counter<'status' | 'department' | 'username'>;
  private readonly ldapAuth: Counter<'status' | 'username'>;
  private readonly totpVerifications: Counter<'status' | 'username'>;
  private readonly unauthorizedAttempts: Counter<'username' | 'requested_department' | 'actual_groups'>;
  private readonly invalidCredentialAttempts: Counter<'username'>;
  private readonly successfulAuth: Counter<'username' | 'department'>;
  private readonly logouts: Counter<'username'>;
  private readonly routerRequests: Counter<'outcome' | 'role'>;
  private readonly ldapResponseTime: Histogram<'username'>;
  private readonly totpValidationTime: Histogram<'username'>;
  private readonly authDuration: Histogram<'status'>;
  private readonly activeSessions: Gauge<'department'>;
  private readonly pendingVerifications: Gauge;
  private sessionSource?: () => SessionCounts;

  constructor(registry: Registry = new Registry()) {
    this.registry = registry;
    const registers = [registry];

    this.loginAttempts = new Counter({
      name: 'portal_login_attempts_total',
      help: 'Total number of login attempts',
      labelNames: ['status', 'department', 'username'],
      registers,
    });
    this.ldapAuth = new Counter({
      name: 'portal_ldap_auth_total',
      help: 'Total directory authentication attempts',
      labelNames: ['status', 'username'],
      registers,
    });
    this.totpVerifications = new Counter({
      name: 'portal_totp_verification_total',
      help: 'Total TOTP verification attempts',
      labelNames: ['status', 'username'],
      registers,
    });
    this.unauthorizedAttempts = new Counter({
      name: 'portal_unauthorized_access_total',
      help: 'Unauthorized department access attempts',
      labelNames: ['username', 'requested_department', 'actual_groups'],
      registers,
    });
    this.invalidCredentialAttempts = new Counter({
      name: 'portal_invalid_credentials_total',
      help: 'Failed login attempts with invalid credentials',
      labelNames: ['username'],
      registers,
    });
    this.successfulAuth = new Counter({
      name: 'portal_successful_auth_total',
      help: 'Successful complete authentications',
      labelNames: ['username', 'department'],
      registers,
    });
    this.logouts = new Counter({
      name: 'portal_logout_total',
      help: 'User logout events',
      labelNames: ['username'],
      registers,
    });
    this.routerRequests = new Counter({
      name: 'portal_router_requests_total',
      help: 'Requests handled by the role router',
      labelNames: ['outcome', 'role'],
      registers,
    });
    this.ldapResponseTime = new Histogram({
      name: 'portal_ldap_response_seconds',
      help: 'Directory authentication response time in seconds',
      labelNames: ['username'],
      buckets: [0.01, 0.05, 0.1, 0.25, 0.5, 1, 2.5, 5],
      registers,
    });
    this.totpValidationTime = new Histogram({
      name: 'portal_totp_validation_seconds',
      help: 'TOTP validation response time in seconds',
      labelNames: ['username'],
      buckets: [0.001, 0.005, 0.01, 0.05, 0.1, 0.5],
      registers,
    });
    this.authDuration = new Histogram({
      name: 'portal_auth_duration_seconds',
      help: 'Complete authentication duration in seconds',
      labelNames: ['status'],
      buckets: [1, 5, 15, 30, 60, 120, 300],
      registers,
    });
    this.activeSessions = new Gauge({
      name: 'portal_active_sessions',
      help: 'Number of active user sessions',
      labelNames: ['department'],
      registers,
      collect: () => {
        if (!this.sessionSource) {
          return;
        }
        this.activeSessions.reset();
        for (const [department, count] of Object.entries(this.sessionSource().activeByDepartment)) {
          this.activeSessions.set({ department }, count);
        }
      },
    });
    this.pendingVerifications = new Gauge({
      name: 'portal_pending_totp_verifications',
      help: 'Number of users waiting for TOTP verification',
      registers,
      collect: () => {
        if (this.sessionSource) {
          this.pendingVerifications.set(this.sessionSource().pending);
        }
      },
    });
  }

  loginAttempt(outcome: LoginOutcome, department: string, username: string): void {
    this.loginAttempts.inc({ status: outcome, department, username });
  }

  directoryAuth(status: 'success' | 'failure' | 'error', username: string, seconds: number): void {
    this.ldapAuth.inc({ status, username });
    this.ldapResponseTime.observe({ username }, seconds);
  }

  invalidCredentials(username: string): void {
    this.invalidCredentialAttempts.inc({ username });
  }

  unauthorizedAccess(username: string, requestedDepartment: string, actualGroups: readonly string[]): void {
    this.unauthorizedAttempts.inc({
      username,
      requested_department: requestedDepartment,
      actual_groups: actualGroups.join(','),
    });
  }

  secondFactor(outcome: SecondFactorOutcome, username: string, seconds: number): void {
    this.totpVerifications.inc({ status: outcome, username });
    this.totpValidationTime.observe({ username }, seconds);
  }

  authenticated(username: string, department: string, totalSeconds: number): void {
    this.successfulAuth.inc({ username, department });
    this.authDuration.observe({ status: 'success' }, totalSeconds);
  }

  logout(username: string): void {
    this.logouts.inc({ username });
  }

  /**
   * Source for the session gauges; sessions expire inside the store, so the
   * gauges are read from it rather than incremented.
   */
  trackSessions(source: () => SessionCounts): void {
    this.sessionSource = source;
  }

  async scrape(): Promise<string> {
    return this.registry.metrics();
  }

  routed(outcome: RouteOutcome, role: string): void {
    this.routerRequests.inc({ outcome, role });
  }
}
