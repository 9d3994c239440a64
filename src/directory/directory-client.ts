/**
 * Directory client contract and entry interpretation.
 *
 * The directory (an LDAP-compatible service) is the system of record for
 * credentials and group membership. The authentication service only talks
 * to it through `DirectoryClient`.
 */

import type { Identity } from '../core/types.js';

/**
 * Raw search entry: attribute names lower-cased, every value a string list.
 */
export interface DirectoryEntry {
  dn: string;
  attributes: Record<string, string[]>;
}

/**
 * Thrown when the directory cannot be reached or answers with a protocol
 * fault. A rejected bind is not an error: `bind()` resolves to false.
 */
export class DirectoryUnavailableError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = 'DirectoryUnavailableError';
  }
}

/**
 * One directory connection, used for a single login attempt.
 */
export interface DirectoryClient {
  /** Resolves false when the directory rejects the credentials. */
  bind(dn: string, password: string): Promise<boolean>;

  search(base: string, filter: string, attributes: string[]): Promise<DirectoryEntry[]>;

  unbind(): Promise<void>;
}

export type DirectoryClientFactory = () => DirectoryClient;

/**
 * Profile read from an entry; absent attributes stay absent.
 */
export interface DirectoryProfile {
  displayName?: string;
  email?: string;
  groups: string[];
}

// ============================================================================
// Escaping (RFC 4514 / RFC 4515)
// ============================================================================

export function escapeDnValue(value: string): string {
  return value
    .replace(/\\/g, '\\\\')
    .replace(/([,+"<>;=])/g, '\\$1')
    .replace(/^([ #])/, '\\$1')
    .replace(/ $/, '\\ ');
}

export function escapeFilterValue(value: string): string {
  return value.replace(/[\\*()\0]/g, (ch) => `\\${ch.charCodeAt(0).toString(16).padStart(2, '0')}`);
}

// ============================================================================
// Entry interpretation
// ============================================================================

/**
 * Leaf group name of a group DN: the value of its first RDN.
 *
 * `cn=hr,cn=groups,cn=accounts,dc=example,dc=internal` → `hr`
 */
export function leafGroupName(groupDn: string): string | undefined {
  let firstRdn = groupDn;
  for (let i = 0; i < groupDn.length; i++) {
    if (groupDn[i] === '\\') {
      i++;
    } else if (groupDn[i] === ',') {
      firstRdn = groupDn.slice(0, i);
      break;
    }
  }
  const eq = firstRdn.indexOf('=');
  if (eq < 0) {
    return undefined;
  }
  const value = firstRdn
    .slice(eq + 1)
    .trim()
    .replace(/\\(.)/g, '$1');
  return value.length > 0 ? value : undefined;
}

export function readProfile(entry: DirectoryEntry): DirectoryProfile {
  const first = (name: string): string | undefined => {
    const value = entry.attributes[name]?.find((v) => v.trim().length > 0);
    return value?.trim();
  };

  const groups: string[] = [];
  for (const dn of entry.attributes['memberof'] ?? []) {
    const group = leafGroupName(dn);
    if (group && !groups.includes(group)) {
      groups.push(group);
    }
  }

  return {
    displayName: first('cn'),
    email: first('mail'),
    groups,
  };
}

/**
 * Build the identity from a profile.
 *
 * Fallback policy: display name defaults to the username; email defaults to
 * `<username>@<defaultEmailDomain>`.
 */
export function toIdentity(
  username: string,
  profile: DirectoryProfile,
  defaultEmailDomain: string
): Identity {
  return Object.freeze({
    username,
    fullName: profile.displayName ?? username,
    email: profile.email ?? `${username}@${defaultEmailDomain}`,
    groups: Object.freeze([...profile.groups]),
  });
}
