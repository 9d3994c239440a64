/**
 * Portal Gateway Configuration Schema
 *
 * One JSON document configures both the portal and the router. Secret values
 * may be written as `{"$secret": "NAME"}`; they are resolved before this
 * schema runs.
 */

import { z } from 'zod';
import { DEFAULT_ROLE_PRECEDENCE } from '../core/role-precedence.js';

// ============================================================================
// Directory / Second Factor
// ============================================================================

export const DirectoryConfigSchema = z.object({
  url: z
    .string()
    .url()
    .refine((url) => /^ldaps?:\/\//.test(url), { message: 'Directory URL must use ldap:// or ldaps://' }),
  userBaseDn: z.string().min(1).describe('Base DN of user entries'),
  userIdAttribute: z.string().min(1).default('uid'),
  defaultEmailDomain: z.string().min(1).describe('Used when an entry has no mail attribute'),
  timeoutMs: z.number().int().positive().default(5000),
  connectTimeoutMs: z.number().int().positive().default(5000),
});

export const SecondFactorConfigSchema = z.object({
  secretsFile: z.string().min(1).optional().describe('JSON map of username to base32 TOTP secret'),
  window: z.number().int().min(0).max(2).default(1).describe('Accepted 30s steps either side of now'),
  issuer: z.string().default('Employee Portal'),
});

// ============================================================================
// Departments
// ============================================================================

export const BackendTargetSchema = z.object({
  url: z.string().url(),
  healthPath: z.string().startsWith('/').default('/health'),
});

export const DepartmentSchema = z.object({
  name: z.string().min(1),
  group: z.string().min(1).describe('Directory group required for this department'),
  role: z.string().min(1).describe('Identity-provider role routed to this department'),
  dashboardPath: z.string().startsWith('/'),
  backend: BackendTargetSchema.optional(),
});

function unique(values: string[]): boolean {
  return new Set(values).size === values.length;
}

export const DepartmentsSchema = z
  .array(DepartmentSchema)
  .min(1)
  .refine((departments) => unique(departments.map((d) => d.name)), {
    message: 'Department names must be unique',
  })
  .refine((departments) => unique(departments.map((d) => d.group)), {
    message: 'Department groups must be unique',
  })
  .refine((departments) => unique(departments.map((d) => d.role.toLowerCase())), {
    message: 'Department roles must be unique',
  });

// ============================================================================
// Router / OIDC
// ============================================================================

export const RouterConfigSchema = z.object({
  rolePrecedence: z.array(z.string().min(1)).min(1).default([...DEFAULT_ROLE_PRECEDENCE]),
  evidence: z.enum(['trusted-headers', 'identity-token']).default('trusted-headers'),
  headers: z
    .object({
      email: z.string().default('X-Auth-Request-Email'),
      user: z.string().default('X-Auth-Request-User'),
      groups: z.string().default('X-Auth-Request-Groups'),
    })
    .default({}),
  backendTimeoutMs: z.number().int().positive().default(30000),
  readinessTimeoutMs: z.number().int().positive().default(2000),
  signOutPath: z.string().default('/oauth2/sign_out'),
});

export const OidcConfigSchema = z.object({
  issuer: z.string().url(),
  jwksUri: z.string().url(),
  authorizationEndpoint: z.string().url().optional(),
  tokenEndpoint: z.string().url().optional(),
  endSessionEndpoint: z.string().url().optional(),
  clientId: z.string().min(1),
  clientSecret: z.string().min(1).optional(),
  redirectUri: z.string().url(),
  postLogoutRedirectUri: z.string().url().optional(),
  scopes: z.array(z.string()).default(['openid', 'profile', 'email']),
  audience: z.string().min(1),
  rolesClaim: z.string().default('realm_access.roles'),
  emailClaim: z.string().default('email'),
  usernameClaim: z.string().default('preferred_username'),
  algorithms: z.array(z.string()).min(1).default(['RS256', 'ES256']),
  clockTolerance: z.number().min(0).max(300).default(60),
  verification: z.enum(['verified', 'unverified-development-only']).default('verified'),
});

// ============================================================================
// Session / Audit / Server
// ============================================================================

export const SessionConfigSchema = z.object({
  cookieSecret: z.string().min(16, 'Cookie secret must be at least 16 characters'),
  pendingTtlSeconds: z.number().int().positive().default(300),
  lifetimeSeconds: z.number().int().positive().default(28800),
  secureCookies: z.boolean().default(true),
});

export const AuditConfigSchema = z.object({
  enabled: z.boolean().default(true),
});

export const ServerConfigSchema = z.object({
  portalPort: z.number().int().min(0).max(65535).default(5000),
  routerPort: z.number().int().min(0).max(65535).default(8500),
  landingPath: z.string().default('/'),
});

// ============================================================================
// Root
// ============================================================================

export const PortalConfigSchema = z
  .object({
    directory: DirectoryConfigSchema,
    secondFactor: SecondFactorConfigSchema.default({}),
    departments: DepartmentsSchema,
    router: RouterConfigSchema.default({}),
    oidc: OidcConfigSchema.optional(),
    session: SessionConfigSchema,
    audit: AuditConfigSchema.default({}),
    server: ServerConfigSchema.default({}),
  })
  .refine((config) => config.router.evidence !== 'identity-token' || config.oidc !== undefined, {
    message: 'oidc section is required when router.evidence is "identity-token"',
    path: ['oidc'],
  });

export type DirectoryConfig = z.infer<typeof DirectoryConfigSchema>;
export type SecondFactorConfig = z.infer<typeof SecondFactorConfigSchema>;
export type DepartmentConfig = z.infer<typeof DepartmentSchema>;
export type RouterConfig = z.infer<typeof RouterConfigSchema>;
export type OidcConfig = z.infer<typeof OidcConfigSchema>;
export type SessionConfig = z.infer<typeof SessionConfigSchema>;
export type ServerConfig = z.infer<typeof ServerConfigSchema>;
export type PortalConfig = z.infer<typeof PortalConfigSchema>;
