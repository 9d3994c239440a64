/**
 * LdapDirectoryClient Tests (ldapts mocked)
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';

const ldap = vi.hoisted(() => {
  class ResultCodeError extends Error {
    constructor(
      readonly code: number,
      message: string
    ) {
      super(message);
    }
  }
  const options: unknown[] = [];
  return {
    bind: vi.fn(),
    search: vi.fn(),
    unbind: vi.fn(),
    options,
    ResultCodeError,
  };
});

vi.mock('ldapts', () => ({
  Client: class {
    bind = ldap.bind;
    search = ldap.search;
    unbind = ldap.unbind;
    constructor(options: unknown) {
      ldap.options.push(options);
    }
  },
  ResultCodeError: ldap.ResultCodeError,
}));

import {
  LdapDirectoryClient,
  createLdapDirectoryClientFactory,
} from '../../../src/directory/ldap-directory-client.js';
import { DirectoryUnavailableError } from '../../../src/directory/directory-client.js';

const CONFIG = { url: 'ldap://127.0.0.1:389', timeoutMs: 10000, connectTimeoutMs: 5000 };
const DN = 'uid=alice,cn=users,dc=corp';

describe('LdapDirectoryClient', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    ldap.bind.mockReset();
    ldap.search.mockReset();
    ldap.unbind.mockReset();
    ldap.options.length = 0;
  });

  it('should pass the url and timeouts to the client', () => {
    createLdapDirectoryClientFactory(CONFIG)();
    expect(ldap.options).toEqual([{ url: 'ldap://127.0.0.1:389', timeout: 10000, connectTimeout: 5000 }]);
  });

  describe('bind', () => {
    it('should resolve true when the directory accepts the credentials', async () => {
      ldap.bind.mockResolvedValue(undefined);
      expect(await new LdapDirectoryClient(CONFIG).bind(DN, 'alice-pw')).toBe(true);
      expect(ldap.bind).toHaveBeenCalledWith(DN, 'alice-pw');
    });

    it('should resolve false when the directory rejects the credentials', async () => {
      ldap.bind.mockRejectedValue(new ldap.ResultCodeError(49, 'Invalid Credentials'));
      expect(await new LdapDirectoryClient(CONFIG).bind(DN, 'wrong')).toBe(false);
    });

    it('should never attempt an unauthenticated bind', async () => {
      expect(await new LdapDirectoryClient(CONFIG).bind(DN, '')).toBe(false);
      expect(ldap.bind).not.toHaveBeenCalled();
    });

    it('should report an unreachable server as unavailable', async () => {
      ldap.bind.mockRejectedValue(new Error('connect ECONNREFUSED 127.0.0.1:389'));

      await expect(new LdapDirectoryClient(CONFIG).bind(DN, 'alice-pw')).rejects.toThrow(
        new DirectoryUnavailableError('LDAP bind to ldap://127.0.0.1:389 failed: connect ECONNREFUSED 127.0.0.1:389')
      );
    });
  });

  describe('search', () => {
    it('should lower-case attribute names and turn every value into a string list', async () => {
      ldap.search.mockResolvedValue({
        searchEntries: [
          {
            dn: DN,
            cn: 'Alice Example',
            mail: Buffer.from('alice@corp.example'),
            memberOf: ['cn=hr,cn=groups,dc=corp', 'cn=staff,cn=groups,dc=corp'],
          },
        ],
        searchReferences: [],
      });

      const entries = await new LdapDirectoryClient(CONFIG).search('cn=users,dc=corp', '(uid=alice)', ['cn']);

      expect(ldap.search).toHaveBeenCalledWith('cn=users,dc=corp', {
        scope: 'sub',
        filter: '(uid=alice)',
        attributes: ['cn'],
      });
      expect(entries).toEqual([
        {
          dn: DN,
          attributes: {
            cn: ['Alice Example'],
            mail: ['alice@corp.example'],
            memberof: ['cn=hr,cn=groups,dc=corp', 'cn=staff,cn=groups,dc=corp'],
          },
        },
      ]);
    });

    it('should report a failed search as unavailable', async () => {
      ldap.search.mockRejectedValue(new Error('socket hang up'));

      await expect(
        new LdapDirectoryClient(CONFIG).search('cn=users,dc=corp', '(uid=alice)', [])
      ).rejects.toBeInstanceOf(DirectoryUnavailableError);
    });
  });

  describe('unbind', () => {
    it('should not throw when the connection is already gone', async () => {
      ldap.unbind.mockRejectedValue(new Error('connection closed'));
      await expect(new LdapDirectoryClient(CONFIG).unbind()).resolves.toBeUndefined();
      expect(console.warn).toHaveBeenCalledWith('[LdapDirectoryClient] Unbind failed: connection closed');
    });
  });
});
