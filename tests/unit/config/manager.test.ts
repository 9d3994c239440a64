/**
 * ConfigManager Tests
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { promises as fs } from 'fs';
import * as path from 'path';
import * as os from 'os';
import { ConfigManager } from '../../../src/config/manager.js';

describe('ConfigManager', () => {
  let tempDir: string;
  let configPath: string;
  let secretsDir: string;

  function fileConfig(overrides: Record<string, unknown> = {}): Record<string, unknown> {
    return {
      directory: {
        url: 'ldap://127.0.0.1:389',
        userBaseDn: 'cn=users,cn=accounts,dc=corp,dc=example',
        defaultEmailDomain: 'corp.example',
      },
      secondFactor: { secretsFile: './config/totp-secrets.json' },
      departments: [
        { name: 'HR', group: 'hr', role: 'hr', dashboardPath: '/hr/dashboard', backend: { url: 'http://hr:8501' } },
        { name: 'IT', group: 'it_support', role: 'it_support', dashboardPath: '/it/dashboard', backend: { url: 'http://it:8502' } },
        { name: 'Sales', group: 'sales', role: 'sales', dashboardPath: '/sales/dashboard', backend: { url: 'http://sales:8503' } },
        { name: 'Admin', group: 'admins', role: 'admin', dashboardPath: '/admin/dashboard', backend: { url: 'http://admin:8504' } },
      ],
      session: { cookieSecret: { $secret: 'PORTAL_COOKIE_SECRET' } },
      ...overrides,
    };
  }

  async function writeConfig(config: Record<string, unknown>): Promise<void> {
    await fs.writeFile(configPath, JSON.stringify(config));
  }

  beforeEach(async () => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});

    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'portal-config-'));
    configPath = path.join(tempDir, 'portal.json');
    secretsDir = path.join(tempDir, 'secrets');
    await fs.mkdir(secretsDir);
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it('should load, resolve secrets from the environment and validate', async () => {
    await writeConfig(fileConfig());
    const manager = new ConfigManager({ secretsDir, env: { PORTAL_COOKIE_SECRET: 'test-secret-from-env' } });

    const config = await manager.loadConfig(configPath);

    expect(config.session.cookieSecret).toBe('test-secret-from-env');
    expect(config.departments.map((d) => d.name)).toEqual(['HR', 'IT', 'Sales', 'Admin']);
    expect(manager.getConfig()).toBe(config);
    expect(console.warn).not.toHaveBeenCalled();
  });

  it('should prefer mounted secret files over the environment', async () => {
    await writeConfig(fileConfig());
    await fs.writeFile(path.join(secretsDir, 'PORTAL_COOKIE_SECRET'), 'test-secret-from-file\n');
    const manager = new ConfigManager({ secretsDir, env: { PORTAL_COOKIE_SECRET: 'test-secret-from-env' } });

    const config = await manager.loadConfig(configPath);
    expect(config.session.cookieSecret).toBe('test-secret-from-file');
  });

  it('should take the path from CONFIG_PATH', async () => {
    await writeConfig(fileConfig());
    const manager = new ConfigManager({
      secretsDir,
      env: { CONFIG_PATH: configPath, PORTAL_COOKIE_SECRET: 'test-secret-from-env' },
    });

    await expect(manager.loadConfig()).resolves.toMatchObject({ server: { portalPort: 5000 } });
  });

  it('should cache the loaded configuration until reloaded', async () => {
    await writeConfig(fileConfig());
    const manager = new ConfigManager({ secretsDir, env: { PORTAL_COOKIE_SECRET: 'test-secret-from-env' } });
    const first = await manager.loadConfig(configPath);

    await writeConfig(fileConfig({ server: { portalPort: 6000 } }));
    expect(await manager.loadConfig(configPath)).toBe(first);

    const reloaded = await manager.reloadConfig(configPath);
    expect(reloaded.server.portalPort).toBe(6000);
  });

  it('should refuse getConfig before loading', () => {
    expect(() => new ConfigManager({ env: {} }).getConfig()).toThrow(
      'Configuration not loaded. Call loadConfig() first.'
    );
  });

  it('should fail when a secret cannot be resolved', async () => {
    await writeConfig(fileConfig());

    await expect(new ConfigManager({ secretsDir, env: {} }).loadConfig(configPath)).rejects.toThrow(
      'Failed to load configuration: Secret "PORTAL_COOKIE_SECRET" at "config.session.cookieSecret" could not be resolved by any provider'
    );
  });

  it('should fail on invalid JSON and on schema violations', async () => {
    await fs.writeFile(configPath, '{ "directory": ');
    const manager = new ConfigManager({ secretsDir, env: { PORTAL_COOKIE_SECRET: 'test-secret-from-env' } });
    await expect(manager.loadConfig(configPath)).rejects.toThrow(/^Failed to load configuration: /);

    await writeConfig(fileConfig({ departments: [] }));
    await expect(manager.loadConfig(configPath)).rejects.toThrow(/^Failed to load configuration: /);
  });

  it('should refuse unverified identity tokens in production', async () => {
    await writeConfig(
      fileConfig({
        router: { evidence: 'identity-token' },
        oidc: {
          issuer: 'https://idp.corp.example/realms/employees',
          jwksUri: 'https://idp.corp.example/realms/employees/protocol/openid-connect/certs',
          clientId: 'portal-router',
          redirectUri: 'https://portal.corp.example/oidc/callback',
          audience: 'portal-router',
          verification: 'unverified-development-only',
        },
      })
    );

    const production = new ConfigManager({
      secretsDir,
      env: { NODE_ENV: 'production', PORTAL_COOKIE_SECRET: 'test-secret-from-env' },
    });
    await expect(production.loadConfig(configPath)).rejects.toThrow(
      'Failed to load configuration: oidc.verification "unverified-development-only" is not allowed when NODE_ENV=production'
    );

    const development = new ConfigManager({
      secretsDir,
      env: { NODE_ENV: 'development', PORTAL_COOKIE_SECRET: 'test-secret-from-env' },
    });
    await expect(development.loadConfig(configPath)).resolves.toMatchObject({
      oidc: { verification: 'unverified-development-only' },
    });
  });

  it('should warn about precedence roles without a backend', async () => {
    await writeConfig(fileConfig({ router: { rolePrecedence: ['admin', 'hr', 'it_support', 'sales', 'finance'] } }));

    await new ConfigManager({ secretsDir, env: { PORTAL_COOKIE_SECRET: 'test-secret-from-env' } }).loadConfig(configPath);

    expect(console.warn).toHaveBeenCalledWith(
      '[ConfigManager] Role precedence entry "finance" has no backend; requests for it will fail'
    );
  });

  it('should report production mode from NODE_ENV', () => {
    expect(new ConfigManager({ env: { NODE_ENV: 'production' } }).isProduction()).toBe(true);
    expect(new ConfigManager({ env: {} }).isProduction()).toBe(false);
  });
});
