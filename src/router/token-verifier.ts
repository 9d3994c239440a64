/**
 * Identity token verification (jose).
 *
 * Verified mode checks signature, issuer, audience and expiry against the
 * provider's JWKS. The unverified mode only decodes the payload and exists for
 * local development against a throwaway provider; configuration refuses it in
 * production.
 */

import { createRemoteJWKSet, decodeJwt, errors, jwtVerify, type JWTPayload, type JWTVerifyGetKey } from 'jose';
import { PortalError, PortalErrors, errorMessage } from '../utils/errors.js';

export type TokenVerificationMode = 'verified' | 'unverified-development-only';

export interface TokenVerifierConfig {
  issuer: string;
  jwksUri: string;
  audience: string;
  algorithms: string[];
  /** Seconds of tolerated clock skew */
  clockTolerance: number;
  verification: TokenVerificationMode;
}

export interface IdentityTokenVerifier {
  readonly mode: TokenVerificationMode;

  /** @throws PortalError INVALID_AUTH_EVIDENCE */
  verify(token: string): Promise<JWTPayload>;
}

const JWT_SHAPE = /^[A-Za-z0-9_-]+\.[A-Za-z0-9_-]+\.[A-Za-z0-9_-]*$/;

function assertTokenFormat(token: string): void {
  if (!JWT_SHAPE.test(token)) {
    throw PortalErrors.INVALID_AUTH_EVIDENCE('Identity token is not a compact JWT');
  }
}

export class JoseTokenVerifier implements IdentityTokenVerifier {
  readonly mode = 'verified' as const;
  private readonly keys: JWTVerifyGetKey;

  /**
   * @param keys - Key resolver; defaults to the remote JWKS at `config.jwksUri`
   */
  constructor(
    private readonly config: TokenVerifierConfig,
    keys?: JWTVerifyGetKey
  ) {
    this.keys =
      keys ??
      createRemoteJWKSet(new URL(config.jwksUri), {
        cacheMaxAge: 3600000, // 1 hour
        cooldownDuration: 30000,
      });
  }

  async verify(token: string): Promise<JWTPayload> {
    assertTokenFormat(token);

    try {
      const { payload } = await jwtVerify(token, this.keys, {
        issuer: this.config.issuer,
        audience: this.config.audience,
        algorithms: this.config.algorithms,
        clockTolerance: this.config.clockTolerance,
      });
      return payload;
    } catch (error) {
      throw PortalErrors.INVALID_AUTH_EVIDENCE(describeJoseFailure(error));
    }
  }
}

/**
 * Decodes without checking the signature. Expiry is still enforced.
 */
export class UnverifiedTokenDecoder implements IdentityTokenVerifier {
  readonly mode = 'unverified-development-only' as const;

  constructor(private readonly now: () => number = Date.now) {}

  async verify(token: string): Promise<JWTPayload> {
    assertTokenFormat(token);

    let payload: JWTPayload;
    try {
      payload = decodeJwt(token);
    } catch (error) {
      throw PortalErrors.INVALID_AUTH_EVIDENCE(`Identity token could not be decoded: ${errorMessage(error)}`);
    }

    if (typeof payload.exp === 'number' && payload.exp * 1000 <= this.now()) {
      throw PortalErrors.INVALID_AUTH_EVIDENCE('Identity token has expired');
    }
    return payload;
  }
}

export function createTokenVerifier(config: TokenVerifierConfig): IdentityTokenVerifier {
  if (config.verification === 'unverified-development-only') {
    console.warn(
      '[TokenVerifier] Identity token signatures are NOT verified (unverified-development-only). Never use this mode in production.'
    );
    return new UnverifiedTokenDecoder();
  }
  return new JoseTokenVerifier(config);
}

function describeJoseFailure(error: unknown): string {
  if (error instanceof PortalError) {
    return error.message;
  }
  if (error instanceof errors.JWTExpired) {
    return 'Identity token has expired';
  }
  if (error instanceof errors.JWTClaimValidationFailed) {
    return `Identity token claim "${error.claim}" failed validation`;
  }
  if (error instanceof errors.JWSSignatureVerificationFailed) {
    return 'Identity token signature verification failed';
  }
  if (error instanceof errors.JOSEError) {
    return `Identity token rejected (${error.code})`;
  }
  return `Identity token validation failed: ${errorMessage(error)}`;
}

/**
 * Read a claim by dot path, e.g. `realm_access.roles`.
 */
export function getNestedClaim(payload: JWTPayload, path: string): unknown {
  let value: unknown = payload;
  for (const part of path.split('.')) {
    if (value === null || typeof value !== 'object' || Array.isArray(value)) {
      return undefined;
    }
    value = Reflect.get(value, part);
  }
  return value;
}
