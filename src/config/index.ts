/**
 * Configuration Module - Public API
 */

export { ConfigManager, DEFAULT_CONFIG_PATH, type ConfigManagerOptions } from './manager.js';

export {
  PortalConfigSchema,
  DirectoryConfigSchema,
  SecondFactorConfigSchema,
  DepartmentSchema,
  DepartmentsSchema,
  BackendTargetSchema,
  RouterConfigSchema,
  OidcConfigSchema,
  SessionConfigSchema,
  AuditConfigSchema,
  ServerConfigSchema,
  type PortalConfig,
  type DirectoryConfig,
  type SecondFactorConfig,
  type DepartmentConfig,
  type RouterConfig,
  type OidcConfig,
  type SessionConfig,
  type ServerConfig,
} from './schema.js';

export { SecretResolver, isSecretDescriptor, type SecretDescriptor } from './secrets/secret-resolver.js';
export { FileSecretProvider, EnvSecretProvider, type SecretProvider } from './secrets/providers.js';
