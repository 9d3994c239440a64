/**
 * Role Router - resolves evidence to exactly one backend
 *
 *   Unauthenticated ─(evidence?)─▶ no role | unrecognized role | routable
 *
 * Every terminal state is either a RoutingDecision or a distinct PortalError.
 */

import type { AuditEntry, BackendTarget } from '../core/types.js';
import { AuditService } from '../core/audit-service.js';
import type { DepartmentMap } from '../core/department-map.js';
import { extractRoles, type RolePrecedence } from '../core/role-precedence.js';
import type { AuthEvidenceSource, EvidenceRequest, SubjectClaims } from './evidence.js';
import { NullPortalMetrics, type PortalMetrics, type RouteOutcome } from '../metrics/portal-metrics.js';
import { PortalError, PortalErrors, type PortalErrorCode } from '../utils/errors.js';

export interface RoutingDecision {
  target: BackendTarget;
  primaryRole: string;
  /** Normalized role set, in the order presented */
  roles: string[];
  email: string;
  username: string;
}

export interface RoleRouterDeps {
  evidence: AuthEvidenceSource;
  departments: DepartmentMap;
  precedence: RolePrecedence;
  audit?: AuditService;
  metrics?: PortalMetrics;
}

const OUTCOME_BY_CODE: Partial<Record<PortalErrorCode, RouteOutcome>> = {
  INVALID_AUTH_EVIDENCE: 'invalid_evidence',
  NO_ROLES_ASSIGNED: 'no_roles',
  UNRECOGNIZED_ROLE: 'unrecognized_role',
  ROUTING_MISCONFIGURATION: 'misconfigured',
};

export class RoleRouter {
  private readonly audit: AuditService;
  private readonly metrics: PortalMetrics;

  constructor(private readonly deps: RoleRouterDeps) {
    this.audit = deps.audit ?? new AuditService();
    this.metrics = deps.metrics ?? new NullPortalMetrics();
  }

  get evidenceKind(): AuthEvidenceSource['kind'] {
    return this.deps.evidence.kind;
  }

  /**
   * Resolve the request's evidence and pick its backend.
   *
   * @throws PortalError INVALID_AUTH_EVIDENCE | NO_ROLES_ASSIGNED |
   *   UNRECOGNIZED_ROLE | ROUTING_MISCONFIGURATION
   */
  async authorizeAndSelectTarget(request: EvidenceRequest): Promise<RoutingDecision> {
    let claims: SubjectClaims | undefined;
    try {
      claims = await this.deps.evidence.resolve(request);
      const decision = this.decide(claims);

      console.log(
        `[RoleRouter] ${decision.email} roles=[${decision.roles.join(', ')}] → ${decision.primaryRole} (${decision.target.url})`
      );
      await this.record({
        source: 'router:authorize',
        userId: decision.username,
        action: 'route_selected',
        success: true,
        metadata: {
          email: decision.email,
          roles: decision.roles,
          primaryRole: decision.primaryRole,
          target: decision.target.url,
          evidence: claims.source,
        },
      });
      return decision;
    } catch (error) {
      if (error instanceof PortalError) {
        const outcome = OUTCOME_BY_CODE[error.code];
        if (outcome) {
          this.metrics.routed(outcome, 'none');
        }
        const level = error.code === 'ROUTING_MISCONFIGURATION' ? 'error' : 'warn';
        console[level](`[RoleRouter] ${error.code}: ${error.message}`);
        await this.record({
          source: 'router:authorize',
          userId: claims?.username,
          action: 'route_denied',
          success: false,
          reason: error.code,
          error: error.message,
          metadata: { email: claims?.email, evidence: this.deps.evidence.kind },
        });
      }
      throw error;
    }
  }

  /**
   * Pure routing decision over already-resolved claims.
   */
  decide(claims: SubjectClaims): RoutingDecision {
    const email = claims.email?.trim() ?? '';
    const username = claims.username?.trim() ?? '';

    if (!email.includes('@')) {
      throw PortalErrors.INVALID_AUTH_EVIDENCE(
        email ? `Malformed email ${email}` : 'Email missing from evidence'
      );
    }
    if (!username) {
      throw PortalErrors.INVALID_AUTH_EVIDENCE('Username missing from evidence');
    }

    const roles = extractRoles(claims.roles);
    if (roles.length === 0) {
      throw PortalErrors.NO_ROLES_ASSIGNED(email);
    }

    const primaryRole = this.deps.precedence.primaryRole(roles);
    if (primaryRole === undefined) {
      throw PortalErrors.UNRECOGNIZED_ROLE(email, roles);
    }

    const target = this.deps.departments.backendForRole(primaryRole);
    if (!target) {
      throw PortalErrors.ROUTING_MISCONFIGURATION(primaryRole);
    }

    return { target, primaryRole, roles, email, username };
  }

  private async record(entry: Omit<AuditEntry, 'timestamp'>): Promise<void> {
    await this.audit.log({ timestamp: new Date(), ...entry });
  }
}
