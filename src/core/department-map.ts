/**
 * Department Map - the fixed department ↔ group ↔ dashboard table
 *
 * A role or department absent from this table can never authorize access and
 * can never be routed. The table is read-only after construction.
 */

import type { BackendTarget, DepartmentRoute } from './types.js';

export class DepartmentMap {
  private readonly byName: ReadonlyMap<string, DepartmentRoute>;
  private readonly byRole: ReadonlyMap<string, DepartmentRoute>;

  constructor(routes: readonly DepartmentRoute[]) {
    const byName = new Map<string, DepartmentRoute>();
    const byRole = new Map<string, DepartmentRoute>();
    const groups = new Set<string>();

    for (const route of routes) {
      const role = route.role.toLowerCase();
      if (byName.has(route.name)) {
        throw new Error(`Duplicate department: ${route.name}`);
      }
      if (byRole.has(role)) {
        throw new Error(`Duplicate department role: ${role}`);
      }
      if (groups.has(route.group)) {
        throw new Error(`Duplicate department group: ${route.group}`);
      }
      const frozen = Object.freeze({ ...route, role });
      byName.set(route.name, frozen);
      byRole.set(role, frozen);
      groups.add(route.group);
    }

    this.byName = byName;
    this.byRole = byRole;
  }

  /** Department names in configuration order (for the login form). */
  departmentNames(): string[] {
    return [...this.byName.keys()];
  }

  getDepartment(name: string): DepartmentRoute | undefined {
    return this.byName.get(name);
  }

  requiredGroup(department: string): string | undefined {
    return this.byName.get(department)?.group;
  }

  dashboardPath(department: string): string | undefined {
    return this.byName.get(department)?.dashboardPath;
  }

  /** Backend for a (normalized) routing role, if one is configured. */
  backendForRole(role: string): BackendTarget | undefined {
    return this.byRole.get(role)?.backend;
  }

  /** All configured backends, for readiness probing. */
  backends(): Array<{ role: string; backend: BackendTarget }> {
    const result: Array<{ role: string; backend: BackendTarget }> = [];
    for (const [role, route] of this.byRole) {
      if (route.backend) {
        result.push({ role, backend: route.backend });
      }
    }
    return result;
  }

  /**
   * Whether a group list authorizes access to a department.
   */
  isAuthorized(department: string, groups: readonly string[]): boolean {
    const group = this.requiredGroup(department);
    return group !== undefined && groups.includes(group);
  }
}
