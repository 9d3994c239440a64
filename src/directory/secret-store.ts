/**
 * Second-factor secret store.
 *
 * `lookup()` resolves to undefined when the user is not enrolled and rejects
 * with SecretStoreUnavailableError when the store itself cannot be read.
 */

import { readFile } from 'fs/promises';
import { z } from 'zod';
import { errorMessage } from '../utils/errors.js';

export interface SecondFactorSecretStore {
  lookup(username: string): Promise<string | undefined>;
}

export class SecretStoreUnavailableError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = 'SecretStoreUnavailableError';
  }
}

const BASE32_SECRET = /^[A-Z2-7]+=*$/;

const SecretFileSchema = z.record(
  z
    .string()
    .transform((secret) => secret.replace(/\s/g, '').toUpperCase())
    .refine((secret) => secret.length >= 16 && BASE32_SECRET.test(secret), {
      message: 'TOTP secret must be base32 with at least 16 characters',
    })
);

export class InMemorySecretStore implements SecondFactorSecretStore {
  private readonly secrets: Map<string, string>;

  constructor(secrets: Record<string, string> = {}) {
    this.secrets = new Map(Object.entries(secrets));
  }

  async lookup(username: string): Promise<string | undefined> {
    return this.secrets.get(username);
  }
}

/**
 * Reads a JSON map of username → base32 secret.
 *
 * The file is read on first lookup and cached; a missing or malformed file
 * makes every lookup fail with SecretStoreUnavailableError.
 */
export class FileSecretStore implements SecondFactorSecretStore {
  private loaded?: Promise<Map<string, string>>;

  constructor(private readonly path: string) {}

  async lookup(username: string): Promise<string | undefined> {
    if (!this.loaded) {
      this.loaded = this.load();
      // Retry on next lookup instead of caching the failure
      this.loaded.catch(() => {
        this.loaded = undefined;
      });
    }
    const secrets = await this.loaded;
    return secrets.get(username);
  }

  private async load(): Promise<Map<string, string>> {
    let raw: string;
    try {
      raw = await readFile(this.path, 'utf-8');
    } catch (error) {
      throw new SecretStoreUnavailableError(
        `TOTP secrets file ${this.path} could not be read: ${errorMessage(error)}`,
        error
      );
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error) {
      throw new SecretStoreUnavailableError(`TOTP secrets file ${this.path} is not valid JSON`, error);
    }

    const result = SecretFileSchema.safeParse(parsed);
    if (!result.success) {
      throw new SecretStoreUnavailableError(
        `TOTP secrets file ${this.path} is invalid: ${result.error.issues.map((i) => i.message).join('; ')}`
      );
    }

    console.log(`[FileSecretStore] Loaded ${Object.keys(result.data).length} TOTP secrets`);
    return new Map(Object.entries(result.data));
  }
}
