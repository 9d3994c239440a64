/**
 * Authentication evidence sources for the role router.
 *
 * Two variants answer the same question ("who is this and which roles do
 * they hold?"):
 *
 * - TrustedHeaderEvidence reads identity headers injected by an upstream
 *   authenticating proxy. Deployment precondition: the router must only be
 *   reachable through that proxy, which strips client-supplied copies of these
 *   headers. The router cannot verify its own network position.
 * - IdentityTokenEvidence reads an identity token (Bearer header or the
 *   router's own login session) and verifies it.
 */

import type { IncomingHttpHeaders } from 'node:http';
import { getNestedClaim, type IdentityTokenVerifier } from './token-verifier.js';
import { PortalErrors } from '../utils/errors.js';

export type EvidenceKind = 'trusted-headers' | 'identity-token';

/**
 * Claims as presented; `roles` is raw and still needs extraction.
 */
export interface SubjectClaims {
  email?: string;
  username?: string;
  roles: unknown;
  source: EvidenceKind;
}

export interface EvidenceRequest {
  headers: IncomingHttpHeaders;
  /** Id token held by the router's own login session, if any */
  sessionToken?: string;
}

export interface AuthEvidenceSource {
  readonly kind: EvidenceKind;

  /** @throws PortalError INVALID_AUTH_EVIDENCE when no usable evidence is present */
  resolve(request: EvidenceRequest): Promise<SubjectClaims>;
}

export interface TrustedHeaderNames {
  email: string;
  user: string;
  groups: string;
}

function headerValue(headers: IncomingHttpHeaders, name: string): string | undefined {
  const value = headers[name.toLowerCase()];
  const first = Array.isArray(value) ? value[0] : value;
  const trimmed = first?.trim();
  return trimmed ? trimmed : undefined;
}

export class TrustedHeaderEvidence implements AuthEvidenceSource {
  readonly kind = 'trusted-headers' as const;

  constructor(private readonly names: TrustedHeaderNames) {}

  async resolve(request: EvidenceRequest): Promise<SubjectClaims> {
    const email = headerValue(request.headers, this.names.email);
    const username = headerValue(request.headers, this.names.user);

    if (!email && !username) {
      throw PortalErrors.INVALID_AUTH_EVIDENCE(
        `Missing ${this.names.email} and ${this.names.user} headers`
      );
    }

    return {
      email,
      username,
      roles: headerValue(request.headers, this.names.groups) ?? '',
      source: this.kind,
    };
  }
}

export interface TokenClaimPaths {
  roles: string;
  email: string;
  username: string;
}

export class IdentityTokenEvidence implements AuthEvidenceSource {
  readonly kind = 'identity-token' as const;

  constructor(
    private readonly verifier: IdentityTokenVerifier,
    private readonly claims: TokenClaimPaths
  ) {}

  async resolve(request: EvidenceRequest): Promise<SubjectClaims> {
    const token = bearerToken(request.headers) ?? request.sessionToken;
    if (!token) {
      throw PortalErrors.INVALID_AUTH_EVIDENCE('No identity token presented');
    }

    const payload = await this.verifier.verify(token);
    const email = getNestedClaim(payload, this.claims.email);
    const username = getNestedClaim(payload, this.claims.username);

    return {
      email: typeof email === 'string' ? email : undefined,
      username: typeof username === 'string' ? username : undefined,
      roles: getNestedClaim(payload, this.claims.roles) ?? [],
      source: this.kind,
    };
  }
}

export function bearerToken(headers: IncomingHttpHeaders): string | undefined {
  const match = /^Bearer\s+(\S+)$/i.exec(headers.authorization?.trim() ?? '');
  return match?.[1];
}
