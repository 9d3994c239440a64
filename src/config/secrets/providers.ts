/**
 * Secret providers, tried in the order they were added to the resolver.
 * A provider resolves to undefined when it does not hold the secret.
 */

import { readFile } from 'node:fs/promises';
import * as path from 'node:path';
import { errorMessage } from '../../utils/errors.js';

export interface SecretProvider {
  readonly name: string;
  resolve(logicalName: string): Promise<string | undefined>;
}

/**
 * Reads `{secretDir}/{NAME}` (Docker/Kubernetes secret mounts).
 */
export class FileSecretProvider implements SecretProvider {
  readonly name = 'file';

  constructor(private readonly secretDir: string = '/run/secrets') {}

  async resolve(logicalName: string): Promise<string | undefined> {
    const root = path.resolve(this.secretDir);
    const filePath = path.resolve(root, logicalName);
    // Names must stay inside the secret directory
    if (!filePath.startsWith(root + path.sep)) {
      return undefined;
    }

    try {
      return (await readFile(filePath, 'utf-8')).trim();
    } catch (error) {
      const code = error instanceof Error && 'code' in error ? error.code : undefined;
      if (code !== 'ENOENT' && code !== 'EACCES') {
        console.warn(`[FileSecretProvider] Unexpected error reading ${filePath}: ${errorMessage(error)}`);
      }
      return undefined;
    }
  }
}

export class EnvSecretProvider implements SecretProvider {
  readonly name = 'env';

  constructor(private readonly env: NodeJS.ProcessEnv = process.env) {}

  async resolve(logicalName: string): Promise<string | undefined> {
    const value = this.env[logicalName]?.trim();
    return value ? value : undefined;
  }
}
