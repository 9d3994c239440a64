/**
 * LDAP implementation of DirectoryClient (ldapts).
 *
 * One client per login attempt: bind as the user, read the user's own entry,
 * unbind.
 */

import { Client, ResultCodeError } from 'ldapts';
import {
  DirectoryUnavailableError,
  type DirectoryClient,
  type DirectoryClientFactory,
  type DirectoryEntry,
} from './directory-client.js';
import { errorMessage } from '../utils/errors.js';

export interface LdapDirectoryConfig {
  /** e.g. ldap://localhost:389 */
  url: string;
  timeoutMs: number;
  connectTimeoutMs: number;
}

export class LdapDirectoryClient implements DirectoryClient {
  private readonly client: Client;

  constructor(private readonly config: LdapDirectoryConfig) {
    this.client = new Client({
      url: config.url,
      timeout: config.timeoutMs,
      connectTimeout: config.connectTimeoutMs,
    });
  }

  async bind(dn: string, password: string): Promise<boolean> {
    // An empty password would be an unauthenticated bind, which most servers accept
    if (password.length === 0) {
      return false;
    }

    try {
      await this.client.bind(dn, password);
      return true;
    } catch (error) {
      // The server answered: wrong password, locked account, unknown DN
      if (error instanceof ResultCodeError) {
        console.log(`[LdapDirectoryClient] Bind rejected for ${dn} (result code ${error.code})`);
        return false;
      }
      throw new DirectoryUnavailableError(
        `LDAP bind to ${this.config.url} failed: ${errorMessage(error)}`,
        error
      );
    }
  }

  async search(base: string, filter: string, attributes: string[]): Promise<DirectoryEntry[]> {
    try {
      const { searchEntries } = await this.client.search(base, {
        scope: 'sub',
        filter,
        attributes,
      });

      return searchEntries.map((entry) => {
        const result: DirectoryEntry = { dn: entry.dn, attributes: {} };
        for (const [name, value] of Object.entries(entry)) {
          if (name === 'dn') {
            continue;
          }
          const values: Array<string | Buffer> = Array.isArray(value) ? value : [value];
          result.attributes[name.toLowerCase()] = values.map((v) => v.toString());
        }
        return result;
      });
    } catch (error) {
      throw new DirectoryUnavailableError(
        `LDAP search under ${base} failed: ${errorMessage(error)}`,
        error
      );
    }
  }

  async unbind(): Promise<void> {
    try {
      await this.client.unbind();
    } catch (error) {
      console.warn(`[LdapDirectoryClient] Unbind failed: ${errorMessage(error)}`);
    }
  }
}

export function createLdapDirectoryClientFactory(config: LdapDirectoryConfig): DirectoryClientFactory {
  return () => new LdapDirectoryClient(config);
}
