/**
 * OIDC Authorization Code Flow with PKCE for the router's own login.
 *
 * 1. /login → provider authorize endpoint (state + S256 challenge)
 * 2. provider → /oidc/callback?code&state
 * 3. code + verifier exchanged at the token endpoint for an id token
 *
 * Flow records are keyed by `state` and consumed on first use.
 */

import crypto from 'node:crypto';
import { z } from 'zod';
import type { SessionStore } from '../core/session-store.js';
import { PortalErrors, errorMessage } from '../utils/errors.js';

export interface OidcFlowConfig {
  authorizationEndpoint: string;
  tokenEndpoint: string;
  endSessionEndpoint: string;
  clientId: string;
  clientSecret?: string;
  redirectUri: string;
  /** Where the provider sends the browser after sign-out */
  postLogoutRedirectUri?: string;
  scopes: string[];
  /** Lifetime of an unfinished login (default: 300000ms) */
  flowTtlMs?: number;
}

export interface OidcFlowState {
  codeVerifier: string;
  createdAt: number;
}

export interface LoginRedirect {
  authorizeUrl: string;
  state: string;
}

export interface TokenSet {
  idToken: string;
  accessToken?: string;
  expiresIn: number;
}

const TokenResponseSchema = z.object({
  id_token: z.string().min(1),
  access_token: z.string().optional(),
  expires_in: z.number().int().positive().optional(),
  token_type: z.string().optional(),
});

/**
 * Keycloak-style endpoint layout under a realm issuer.
 */
export function providerEndpoints(issuer: string): Pick<
  OidcFlowConfig,
  'authorizationEndpoint' | 'tokenEndpoint' | 'endSessionEndpoint'
> {
  const base = issuer.replace(/\/+$/, '');
  return {
    authorizationEndpoint: `${base}/protocol/openid-connect/auth`,
    tokenEndpoint: `${base}/protocol/openid-connect/token`,
    endSessionEndpoint: `${base}/protocol/openid-connect/logout`,
  };
}

export class OidcLoginFlow {
  private readonly flowTtlMs: number;

  constructor(
    private readonly config: OidcFlowConfig,
    private readonly store: SessionStore<OidcFlowState>,
    private readonly fetchImpl: typeof fetch = fetch
  ) {
    this.flowTtlMs = config.flowTtlMs ?? 300000;
  }

  async begin(): Promise<LoginRedirect> {
    const state = crypto.randomBytes(16).toString('hex');
    const codeVerifier = crypto.randomBytes(32).toString('base64url');
    const codeChallenge = crypto.createHash('sha256').update(codeVerifier).digest('base64url');

    await this.store.put(state, { codeVerifier, createdAt: Date.now() }, this.flowTtlMs);

    const params = new URLSearchParams({
      response_type: 'code',
      client_id: this.config.clientId,
      redirect_uri: this.config.redirectUri,
      scope: this.config.scopes.join(' '),
      state,
      code_challenge: codeChallenge,
      code_challenge_method: 'S256',
    });

    return { authorizeUrl: `${this.config.authorizationEndpoint}?${params.toString()}`, state };
  }

  /**
   * @throws PortalError INVALID_AUTH_EVIDENCE for unknown state or a failed exchange
   */
  async complete(code: string | undefined, state: string | undefined): Promise<TokenSet> {
    if (!code || !state) {
      throw PortalErrors.INVALID_AUTH_EVIDENCE('Callback is missing code or state');
    }

    const flow = await this.store.take(state, () => true);
    if (!flow) {
      throw PortalErrors.INVALID_AUTH_EVIDENCE('Unknown or expired login state');
    }

    const body = new URLSearchParams({
      grant_type: 'authorization_code',
      code,
      redirect_uri: this.config.redirectUri,
      client_id: this.config.clientId,
      code_verifier: flow.codeVerifier,
    });
    if (this.config.clientSecret) {
      body.append('client_secret', this.config.clientSecret);
    }

    let response: Response;
    try {
      response = await this.fetchImpl(this.config.tokenEndpoint, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/x-www-form-urlencoded',
          Accept: 'application/json',
        },
        body: body.toString(),
      });
    } catch (error) {
      throw PortalErrors.INVALID_AUTH_EVIDENCE(`Token endpoint unreachable: ${errorMessage(error)}`);
    }

    if (!response.ok) {
      const detail = await response.text();
      throw PortalErrors.INVALID_AUTH_EVIDENCE(`Token exchange failed: ${response.status} ${detail}`);
    }

    const parsed = TokenResponseSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw PortalErrors.INVALID_AUTH_EVIDENCE('Token response carries no id_token');
    }

    return {
      idToken: parsed.data.id_token,
      accessToken: parsed.data.access_token,
      expiresIn: parsed.data.expires_in ?? 3600,
    };
  }

  logoutUrl(idToken?: string): string {
    const params = new URLSearchParams({ client_id: this.config.clientId });
    if (this.config.postLogoutRedirectUri) {
      params.set('post_logout_redirect_uri', this.config.postLogoutRedirectUri);
    }
    if (idToken) {
      params.set('id_token_hint', idToken);
    }
    return `${this.config.endSessionEndpoint}?${params.toString()}`;
  }
}
