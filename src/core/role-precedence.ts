/**
 * Role Precedence - role extraction and primary-role selection
 *
 * A subject holding several roles is routed to exactly one destination: the
 * first entry of the precedence list that the subject holds. Ties are broken
 * by precedence order and nothing else.
 */

export const DEFAULT_ROLE_PRECEDENCE = ['admin', 'hr', 'it_support', 'sales'] as const;

/**
 * Normalize a role claim into a lower-cased, trimmed, de-duplicated list.
 *
 * Accepts:
 * - a comma-separated string: `"Admin, Sales"`
 * - a JSON array string: `'["Admin","Sales"]'`
 * - an array (e.g. a token claim): `['Admin', 'Sales']`
 *
 * A string that starts with `[` but is not valid JSON yields no roles.
 * Non-string array members and blank entries are dropped.
 */
export function extractRoles(value: unknown): string[] {
  if (Array.isArray(value)) {
    return normalize(value);
  }

  if (typeof value !== 'string') {
    return [];
  }

  const raw = value.trim();
  if (raw.length === 0) {
    return [];
  }

  if (raw.startsWith('[')) {
    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch {
      console.warn(`[RolePrecedence] Failed to parse roles as JSON: ${raw}`);
      return [];
    }
    return Array.isArray(parsed) ? normalize(parsed) : [];
  }

  return normalize(raw.split(','));
}

function normalize(values: readonly unknown[]): string[] {
  const roles: string[] = [];
  for (const value of values) {
    if (typeof value !== 'string') {
      continue;
    }
    const role = value.trim().toLowerCase();
    if (role.length > 0 && !roles.includes(role)) {
      roles.push(role);
    }
  }
  return roles;
}

/**
 * Select the primary role: the first precedence entry present in `roles`.
 *
 * Total function over (role set, precedence); returns undefined when no
 * precedence entry is held.
 */
export function selectPrimaryRole(
  roles: Iterable<string>,
  precedence: readonly string[]
): string | undefined {
  const held = new Set(roles);
  return precedence.find((role) => held.has(role));
}

/**
 * Immutable precedence table.
 */
export class RolePrecedence {
  readonly order: readonly string[];

  constructor(order: readonly string[] = DEFAULT_ROLE_PRECEDENCE) {
    this.order = Object.freeze(order.map((role) => role.trim().toLowerCase()));
  }

  primaryRole(roles: Iterable<string>): string | undefined {
    return selectPrimaryRole(roles, this.order);
  }
}
