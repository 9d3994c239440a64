/**
 * Replaces `{"$secret": "NAME"}` descriptors anywhere in a parsed JSON tree
 * with the value from the first provider that holds NAME.
 */

import type { SecretProvider } from './providers.js';
import { errorMessage } from '../../utils/errors.js';

export interface SecretDescriptor {
  $secret: string;
}

export function isSecretDescriptor(value: unknown): value is SecretDescriptor {
  return (
    value !== null &&
    typeof value === 'object' &&
    !Array.isArray(value) &&
    Object.keys(value).length === 1 &&
    '$secret' in value &&
    typeof value.$secret === 'string' &&
    value.$secret.length > 0
  );
}

export class SecretResolver {
  private readonly providers: SecretProvider[] = [];

  addProvider(provider: SecretProvider): this {
    this.providers.push(provider);
    return this;
  }

  /**
   * Returns a copy of `node` with every descriptor resolved.
   *
   * @throws Error naming the secret and its config path when no provider holds it
   */
  async resolveSecrets(node: unknown, at = 'config'): Promise<unknown> {
    if (isSecretDescriptor(node)) {
      return this.resolveSecret(node.$secret, at);
    }

    if (Array.isArray(node)) {
      const items: unknown[] = [];
      for (const [index, item] of node.entries()) {
        items.push(await this.resolveSecrets(item, `${at}[${index}]`));
      }
      return items;
    }

    if (node !== null && typeof node === 'object') {
      const resolved: Record<string, unknown> = {};
      for (const [key, child] of Object.entries(node)) {
        resolved[key] = await this.resolveSecrets(child, `${at}.${key}`);
      }
      return resolved;
    }

    return node;
  }

  private async resolveSecret(logicalName: string, at: string): Promise<string> {
    for (const provider of this.providers) {
      let value: string | undefined;
      try {
        value = await provider.resolve(logicalName);
      } catch (error) {
        console.warn(`[SecretResolver] Provider ${provider.name} failed for ${logicalName}: ${errorMessage(error)}`);
        continue;
      }
      if (value !== undefined) {
        console.log(`[SecretResolver] Resolved ${logicalName} at ${at} from ${provider.name}`);
        return value;
      }
    }
    throw new Error(`Secret "${logicalName}" at "${at}" could not be resolved by any provider`);
  }
}
