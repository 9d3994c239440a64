/**
 * Router HTTP tests (supertest + loopback dashboard backends)
 */

import { describe, it, expect, beforeAll, afterAll, beforeEach, afterEach, vi } from 'vitest';
import request from 'supertest';
import { SignJWT, generateKeyPair, type KeyLike } from 'jose';
import { createGateway, type Gateway } from '../../../src/gateway.js';
import { JoseTokenVerifier } from '../../../src/router/token-verifier.js';
import { createTestConfig, startTestBackend, type TestBackend } from '../../../src/testing/index.js';

const ISSUER = 'https://idp.corp.example/realms/employees';

interface Backends {
  hr: TestBackend;
  sales: TestBackend;
  it: TestBackend;
  /** Never listening */
  adminUrl: string;
}

async function startBackends(): Promise<Backends> {
  const echo = (name: string) =>
    startTestBackend(async (req, res) => {
      const chunks: Buffer[] = [];
      for await (const chunk of req) {
        chunks.push(Buffer.from(chunk));
      }
      res.setHeader('X-Seen-Role', req.headers['x-primary-role'] ?? '');
      res.setHeader('X-Seen-Email', req.headers['x-user-email'] ?? '');
      res.end(`${name}:${req.method} ${req.url} ${Buffer.concat(chunks).toString('utf-8')}`.trim());
    });

  const admin = await startTestBackend((req, res) => res.end());
  await admin.close();

  return { hr: await echo('hr'), sales: await echo('sales'), it: await echo('it'), adminUrl: admin.url };
}

function departments(backends: Backends) {
  return [
    { name: 'HR', group: 'hr', role: 'hr', dashboardPath: '/hr/dashboard', backend: { url: backends.hr.url } },
    { name: 'IT', group: 'it_support', role: 'it_support', dashboardPath: '/it/dashboard', backend: { url: backends.it.url } },
    { name: 'Sales', group: 'sales', role: 'sales', dashboardPath: '/sales/dashboard', backend: { url: backends.sales.url } },
    { name: 'Admin', group: 'admins', role: 'admin', dashboardPath: '/admin/dashboard', backend: { url: backends.adminUrl } },
  ];
}

describe('Router app', () => {
  let backends: Backends;

  beforeAll(async () => {
    backends = await startBackends();
  });

  afterAll(async () => {
    await Promise.all([backends.hr.close(), backends.sales.close(), backends.it.close()]);
  });

  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  // ==========================================================================
  // Trusted headers
  // ==========================================================================

  describe('with trusted headers', () => {
    let gateway: Gateway;

    beforeEach(() => {
      gateway = createGateway(createTestConfig({ departments: departments(backends) }));
    });

    afterEach(() => {
      gateway.destroy();
    });

    function asUser(email: string, user: string, groups: string) {
      return {
        'X-Auth-Request-Email': email,
        'X-Auth-Request-User': user,
        'X-Auth-Request-Groups': groups,
      };
    }

    it('should forward a sales user to the sales dashboard', async () => {
      const response = await request(gateway.routerApp)
        .get('/reports?year=2024')
        .set(asUser('x@y.com', 'x', 'sales'))
        .expect(200);

      expect(response.text).toBe('sales:GET /reports?year=2024');
      expect(response.headers['x-seen-role']).toBe('sales');
      expect(response.headers['x-seen-email']).toBe('x@y.com');
    });

    it('should forward a user holding hr and sales to the hr dashboard', async () => {
      const response = await request(gateway.routerApp).get('/').set(asUser('x@y.com', 'x', 'hr,sales')).expect(200);

      expect(response.text).toBe('hr:GET /');
      expect(response.headers['x-seen-role']).toBe('hr');
    });

    it('should forward request bodies', async () => {
      const response = await request(gateway.routerApp)
        .post('/submit')
        .set(asUser('x@y.com', 'x', 'it_support'))
        .type('form')
        .send('a=1')
        .expect(200);

      expect(response.text).toBe('it:POST /submit a=1');
    });

    it('should answer 401 with a sign-out link when evidence is missing', async () => {
      const response = await request(gateway.routerApp).get('/').expect(401);

      expect(response.text).toContain('<p>Invalid authentication headers. Please log in again.</p>');
      expect(response.text).toContain('<a href="/oauth2/sign_out">Sign out and log in again</a>');
    });

    it('should answer 403 for a user without roles', async () => {
      const response = await request(gateway.routerApp).get('/').set(asUser('x@y.com', 'x', '')).expect(403);
      expect(response.text).toContain('No roles assigned to your account. Please contact your administrator.');
    });

    it('should answer 403 for unrecognized roles', async () => {
      const response = await request(gateway.routerApp)
        .get('/')
        .set(asUser('c@y.com', 'c', 'contractor'))
        .expect(403);
      expect(response.text).toContain('Invalid role assignment. Please contact your administrator.');
      expect(response.text).not.toContain('Sign out and log in again');
    });

    it('should answer 503 when the selected backend is down', async () => {
      const response = await request(gateway.routerApp).get('/').set(asUser('a@y.com', 'a', 'admin,sales')).expect(503);
      expect(response.text).toContain('The admin dashboard is currently unavailable. Please try again later.');
    });

    it('should report health without evidence', async () => {
      await request(gateway.routerApp).get('/health').expect(200, { status: 'healthy', service: 'portal-router' });
      await request(gateway.routerApp).get('/healthz').expect(200, { status: 'healthy', service: 'portal-router' });
    });

    it('should serve a status page without evidence', async () => {
      const response = await request(gateway.routerApp).get('/status').expect(200);
      expect(response.headers['content-type']).toBe('text/html; charset=utf-8');
      expect(response.text).toContain('<h2>Portal Router (trusted headers) is running.</h2>');
    });

    it('should be ready while any backend is healthy', async () => {
      const response = await request(gateway.routerApp).get('/ready').expect(200);
      expect(response.body).toEqual({ status: 'ready', service: 'portal-router' });
    });

    it('should count routed requests', async () => {
      await request(gateway.routerApp).get('/').set(asUser('x@y.com', 'x', 'sales')).expect(200);
      await request(gateway.routerApp).get('/').set(asUser('x@y.com', 'x', 'contractor')).expect(403);

      const response = await request(gateway.routerApp).get('/metrics').expect(200);
      expect(response.text).toContain('portal_router_requests_total{outcome="forwarded",role="sales"} 1');
      expect(response.text).toContain('portal_router_requests_total{outcome="unrecognized_role",role="none"} 1');
    });
  });

  // ==========================================================================
  // Identity token + OIDC login
  // ==========================================================================

  describe('with identity tokens', () => {
    let publicKey: KeyLike;
    let privateKey: KeyLike;
    let gateway: Gateway;
    let idToken: string;

    beforeAll(async () => {
      ({ publicKey, privateKey } = await generateKeyPair('RS256'));
    });

    function signToken(roles: string[]): Promise<string> {
      return new SignJWT({ email: 'x@y.com', preferred_username: 'x', realm_access: { roles } })
        .setProtectedHeader({ alg: 'RS256' })
        .setIssuer(ISSUER)
        .setAudience('portal-router')
        .setIssuedAt()
        .setExpirationTime('5m')
        .sign(privateKey);
    }

    beforeEach(async () => {
      idToken = await signToken(['sales']);
      const config = createTestConfig({
        departments: departments(backends),
        router: { evidence: 'identity-token' },
        oidc: {
          issuer: ISSUER,
          jwksUri: `${ISSUER}/protocol/openid-connect/certs`,
          clientId: 'portal-router',
          redirectUri: 'http://localhost:8500/oidc/callback',
          audience: 'portal-router',
          algorithms: ['RS256'],
        },
      });
      const oidc = config.oidc;
      if (!oidc) {
        throw new Error('oidc section missing from test configuration');
      }

      gateway = createGateway(config, {
        tokenVerifier: new JoseTokenVerifier(oidc, async () => publicKey),
        fetch: vi.fn<typeof fetch>(
          async () =>
            new Response(JSON.stringify({ id_token: idToken, token_type: 'Bearer' }), {
              status: 200,
              headers: { 'Content-Type': 'application/json' },
            })
        ),
      });
    });

    afterEach(() => {
      gateway.destroy();
    });

    it('should send a browser without a token to the login', async () => {
      await request(gateway.routerApp).get('/reports').expect(302).expect('Location', '/login');
    });

    it('should answer 401 to a non-GET request without a token', async () => {
      const response = await request(gateway.routerApp).post('/reports').expect(401);
      expect(response.text).toContain('<a href="/logout">Sign out and log in again</a>');
    });

    it('should forward a request carrying a bearer token', async () => {
      const response = await request(gateway.routerApp)
        .get('/reports')
        .set('Authorization', `Bearer ${idToken}`)
        .expect(200);
      expect(response.text).toBe('sales:GET /reports');
    });

    it('should reject a bearer token that fails verification', async () => {
      const { privateKey: otherKey } = await generateKeyPair('RS256');
      const forged = await new SignJWT({ email: 'x@y.com', preferred_username: 'x', realm_access: { roles: ['admin'] } })
        .setProtectedHeader({ alg: 'RS256' })
        .setIssuer(ISSUER)
        .setAudience('portal-router')
        .setExpirationTime('5m')
        .sign(otherKey);

      await request(gateway.routerApp).get('/reports').set('Authorization', `Bearer ${forged}`).expect(401);
    });

    it('should log in through the provider and route with the session token', async () => {
      const agent = request.agent(gateway.routerApp);

      const login = await agent.get('/login').expect(302);
      const authorizeUrl = new URL(login.headers.location);
      expect(`${authorizeUrl.origin}${authorizeUrl.pathname}`).toBe(`${ISSUER}/protocol/openid-connect/auth`);
      const state = authorizeUrl.searchParams.get('state');

      await agent.get(`/oidc/callback?code=auth-code&state=${state}`).expect(302).expect('Location', '/');

      const response = await agent.get('/reports').expect(200);
      expect(response.text).toBe('sales:GET /reports');

      const logout = await agent.get('/logout').expect(302);
      const logoutUrl = new URL(logout.headers.location);
      expect(`${logoutUrl.origin}${logoutUrl.pathname}`).toBe(`${ISSUER}/protocol/openid-connect/logout`);
      expect(logoutUrl.searchParams.get('id_token_hint')).toBe(idToken);

      await agent.get('/reports').expect(302).expect('Location', '/login');
    });

    it('should reject a callback whose state was not issued to this browser', async () => {
      const login = await request(gateway.routerApp).get('/login').expect(302);
      const state = new URL(login.headers.location).searchParams.get('state');

      await request(gateway.routerApp).get(`/oidc/callback?code=auth-code&state=${state}`).expect(401);
    });

    it('should not start a session for a token without a routable role', async () => {
      idToken = await signToken(['contractor']);
      const agent = request.agent(gateway.routerApp);
      const login = await agent.get('/login').expect(302);
      const state = new URL(login.headers.location).searchParams.get('state');

      await agent.get(`/oidc/callback?code=auth-code&state=${state}`).expect(403);
      await agent.get('/reports').expect(302).expect('Location', '/login');
    });
  });
});
