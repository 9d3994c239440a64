/**
 * Configuration Manager
 *
 * Loads the gateway configuration file in three steps:
 *
 * 1. Parse JSON
 * 2. Resolve `{"$secret": "NAME"}` descriptors (file provider, then env)
 * 3. Validate with PortalConfigSchema and apply deployment checks
 */

import { readFile } from 'node:fs/promises';
import { PortalConfigSchema, type PortalConfig } from './schema.js';
import { EnvSecretProvider, FileSecretProvider } from './secrets/providers.js';
import { SecretResolver } from './secrets/secret-resolver.js';
import { errorMessage } from '../utils/errors.js';

export const DEFAULT_CONFIG_PATH = './config/portal.json';

export interface ConfigManagerOptions {
  /** Directory searched by the file secret provider (default: /run/secrets) */
  secretsDir?: string;
  env?: NodeJS.ProcessEnv;
}

export class ConfigManager {
  private config: PortalConfig | null = null;
  private readonly env: NodeJS.ProcessEnv;
  private readonly secretResolver: SecretResolver;

  constructor(options: ConfigManagerOptions = {}) {
    this.env = options.env ?? process.env;
    this.secretResolver = new SecretResolver()
      .addProvider(new FileSecretProvider(options.secretsDir ?? '/run/secrets'))
      .addProvider(new EnvSecretProvider(this.env));
  }

  async loadConfig(configPath?: string): Promise<PortalConfig> {
    if (this.config) {
      return this.config;
    }

    const path = configPath ?? this.env.CONFIG_PATH ?? DEFAULT_CONFIG_PATH;

    try {
      const raw: unknown = JSON.parse(await readFile(path, 'utf-8'));

      console.log('[ConfigManager] Resolving secrets...');
      const resolved = await this.secretResolver.resolveSecrets(raw);

      const config = PortalConfigSchema.parse(resolved);
      this.validateDeployment(config);

      this.config = config;
      console.log(`[ConfigManager] Configuration loaded from ${path}`);
      return config;
    } catch (error) {
      throw new Error(`Failed to load configuration: ${errorMessage(error)}`, { cause: error });
    }
  }

  getConfig(): PortalConfig {
    if (!this.config) {
      throw new Error('Configuration not loaded. Call loadConfig() first.');
    }
    return this.config;
  }

  async reloadConfig(configPath?: string): Promise<PortalConfig> {
    this.config = null;
    console.log('[ConfigManager] Reloading configuration...');
    return this.loadConfig(configPath);
  }

  isProduction(): boolean {
    return this.env.NODE_ENV === 'production';
  }

  private validateDeployment(config: PortalConfig): void {
    if (config.oidc?.verification === 'unverified-development-only') {
      if (this.isProduction()) {
        throw new Error('oidc.verification "unverified-development-only" is not allowed when NODE_ENV=production');
      }
      console.warn('[ConfigManager] Identity token signatures will NOT be verified (development only)');
    }

    const routedRoles = new Set(
      config.departments.filter((d) => d.backend !== undefined).map((d) => d.role.toLowerCase())
    );
    for (const role of config.router.rolePrecedence) {
      if (!routedRoles.has(role.trim().toLowerCase())) {
        console.warn(`[ConfigManager] Role precedence entry "${role}" has no backend; requests for it will fail`);
      }
    }

    if (!config.secondFactor.secretsFile) {
      console.warn('[ConfigManager] No secondFactor.secretsFile configured; second-factor verification will fail');
    }

    if (this.isProduction() && !config.session.secureCookies) {
      console.warn('[ConfigManager] session.secureCookies is disabled in production');
    }
  }
}
