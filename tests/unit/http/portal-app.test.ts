/**
 * Portal HTTP flow tests (supertest)
 *
 * The whole gateway runs in process: the directory is a FakeDirectory and
 * TOTP codes are generated for a fixed clock.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import request from 'supertest';
import speakeasy from 'speakeasy';
import { createGateway, type Gateway } from '../../../src/gateway.js';
import { SpeakeasyTotpVerifier } from '../../../src/core/totp.js';
import { InMemorySecretStore } from '../../../src/directory/secret-store.js';
import { FakeDirectory, createTestConfig } from '../../../src/testing/index.js';

const SECRET = 'JBSWY3DPEHPK3PXPJBSWY3DP';
const CLOCK = 1_700_000_010_000;
const CODE = speakeasy.totp({ secret: SECRET, encoding: 'base32', step: 30, time: CLOCK / 1000 });

describe('Portal app', () => {
  let directory: FakeDirectory;
  let gateway: Gateway;

  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});

    directory = new FakeDirectory({
      alice: { password: 'alice-pw', cn: 'Alice Example', mail: 'alice@corp.example', groups: ['staff', 'hr'] },
      bob: { password: 'bob-pw', groups: ['sales'] },
    });
    gateway = createGateway(createTestConfig(), {
      directory: directory.factory,
      secrets: new InMemorySecretStore({ alice: SECRET, bob: SECRET }),
      verifier: new SpeakeasyTotpVerifier(() => CLOCK),
    });
  });

  afterEach(() => {
    gateway.destroy();
  });

  async function signInAsAlice() {
    const agent = request.agent(gateway.portalApp);
    await agent
      .post('/employee/login')
      .type('form')
      .send({ username: 'alice', password: 'alice-pw', department: 'HR' })
      .expect(302)
      .expect('Location', '/employee/totp');
    await agent.post('/employee/totp').type('form').send({ totp_code: CODE }).expect(302).expect('Location', '/hr/dashboard');
    return agent;
  }

  describe('pages', () => {
    it('should serve the landing page', async () => {
      const response = await request(gateway.portalApp).get('/').expect(200);
      expect(response.text).toContain('<a href="/employee/login">Employee sign in</a>');
    });

    it('should list every department on the login form', async () => {
      const response = await request(gateway.portalApp).get('/employee/login').expect(200);
      for (const name of ['HR', 'IT', 'Sales', 'Admin']) {
        expect(response.text).toContain(`<option value="${name}">${name}</option>`);
      }
    });

    it('should report health', async () => {
      const response = await request(gateway.portalApp).get('/health').expect(200);
      expect(response.body).toEqual({ status: 'healthy', service: 'employee-portal' });
    });
  });

  describe('login', () => {
    it('should take alice through both factors to the HR dashboard', async () => {
      const agent = request.agent(gateway.portalApp);

      const login = await agent
        .post('/employee/login')
        .type('form')
        .send({ username: 'alice', password: 'alice-pw', department: 'HR' })
        .expect(302);
      expect(login.headers.location).toBe('/employee/totp');
      const cookie = String(login.headers['set-cookie']);
      expect(cookie).toMatch(/^portal_sid=s%3A/);
      expect(cookie).toContain('Max-Age=300');
      expect(cookie).toContain('HttpOnly');
      expect(cookie).toContain('SameSite=Lax');

      const totp = await agent.get('/employee/totp').expect(200);
      expect(totp.text).toContain('<p>Alice Example (HR)</p>');

      await agent.post('/employee/totp').type('form').send({ totp_code: CODE }).expect(302).expect('Location', '/hr/dashboard');

      const dashboard = await agent.get('/hr/dashboard').expect(200);
      expect(dashboard.text).toContain('<h1>HR Dashboard</h1>');
      expect(dashboard.text).toContain('<p>Signed in as Alice Example (alice@corp.example)</p>');
    });

    it('should accept a code typed with a space', async () => {
      const agent = request.agent(gateway.portalApp);
      await agent.post('/employee/login').type('form').send({ username: 'alice', password: 'alice-pw', department: 'HR' });

      await agent
        .post('/employee/totp')
        .type('form')
        .send({ totp_code: `${CODE.slice(0, 3)} ${CODE.slice(3)}` })
        .expect(302)
        .expect('Location', '/hr/dashboard');
    });

    it('should re-render the form with a generic message on a wrong password', async () => {
      const response = await request(gateway.portalApp)
        .post('/employee/login')
        .type('form')
        .send({ username: 'alice', password: 'wrong', department: 'HR' })
        .expect(401);

      expect(response.text).toContain('<p class="error" role="alert">Invalid username or password</p>');
      expect(response.text).toContain('<input name="username" value="alice"');
      expect(response.text).toContain('<option value="HR" selected>HR</option>');
      expect(response.headers['set-cookie']).toBeUndefined();
    });

    it('should deny a user outside the department group', async () => {
      const response = await request(gateway.portalApp)
        .post('/employee/login')
        .type('form')
        .send({ username: 'bob', password: 'bob-pw', department: 'Admin' })
        .expect(403);

      expect(response.text).toContain('Access denied: You are not authorized for the Admin department');
    });

    it('should reject an unknown department without contacting the directory', async () => {
      await request(gateway.portalApp)
        .post('/employee/login')
        .type('form')
        .send({ username: 'alice', password: 'alice-pw', department: 'Marketing' })
        .expect(400);
      expect(directory.binds).toBe(0);
    });

    it('should report an unreachable directory as unavailable', async () => {
      directory.unavailable = true;
      const response = await request(gateway.portalApp)
        .post('/employee/login')
        .type('form')
        .send({ username: 'alice', password: 'alice-pw', department: 'HR' })
        .expect(503);
      expect(response.text).toContain('Authentication service unavailable. Please try again later.');
    });
  });

  describe('second factor', () => {
    it('should send a browser without a pending login back to the login form', async () => {
      await request(gateway.portalApp).get('/employee/totp').expect(302).expect('Location', '/employee/login');
      await request(gateway.portalApp)
        .post('/employee/totp')
        .type('form')
        .send({ totp_code: CODE })
        .expect(302)
        .expect('Location', '/employee/login');
    });

    it('should keep the pending login after a wrong code', async () => {
      const agent = request.agent(gateway.portalApp);
      await agent.post('/employee/login').type('form').send({ username: 'alice', password: 'alice-pw', department: 'HR' });
      const wrong = CODE === '000000' ? '111111' : '000000';

      const response = await agent.post('/employee/totp').type('form').send({ totp_code: wrong }).expect(401);
      expect(response.text).toContain(
        '<p class="error" role="alert">Invalid authenticator code. Please check your authenticator app and try again.</p>'
      );

      await agent.post('/employee/totp').type('form').send({ totp_code: CODE }).expect(302).expect('Location', '/hr/dashboard');
    });

    it('should reject a malformed code with 400', async () => {
      const agent = request.agent(gateway.portalApp);
      await agent.post('/employee/login').type('form').send({ username: 'alice', password: 'alice-pw', department: 'HR' });

      const response = await agent.post('/employee/totp').type('form').send({ totp_code: '12ab56' }).expect(400);
      expect(response.text).toContain('Authenticator code must be 6 digits');
    });

    it('should not accept a forged session cookie', async () => {
      await request(gateway.portalApp)
        .post('/employee/totp')
        .set('Cookie', 'portal_sid=s%3Aforged.signature')
        .type('form')
        .send({ totp_code: CODE })
        .expect(302)
        .expect('Location', '/employee/login');
    });
  });

  describe('dashboards', () => {
    it('should redirect anonymous visitors to the login form', async () => {
      await request(gateway.portalApp).get('/hr/dashboard').expect(302).expect('Location', '/employee/login');
    });

    it('should not open a dashboard with only a pending login', async () => {
      const agent = request.agent(gateway.portalApp);
      await agent.post('/employee/login').type('form').send({ username: 'alice', password: 'alice-pw', department: 'HR' });
      await agent.get('/hr/dashboard').expect(302).expect('Location', '/employee/login');
    });

    it('should deny dashboards of departments the user is not in', async () => {
      const agent = await signInAsAlice();

      const response = await agent.get('/sales/dashboard').expect(403);
      expect(response.text).toContain('<h1>403 Access Denied</h1>');
      expect(response.text).toContain('<p>Access denied: You are not authorized for the Sales department</p>');
    });

    it('should send a signed-in user from the login form to their dashboard', async () => {
      const agent = await signInAsAlice();
      await agent.get('/employee/login').expect(302).expect('Location', '/hr/dashboard');
    });
  });

  describe('logout', () => {
    it('should end the session', async () => {
      const agent = await signInAsAlice();

      await agent.get('/logout').expect(302).expect('Location', '/');
      await agent.get('/hr/dashboard').expect(302).expect('Location', '/employee/login');
    });

    it('should succeed without a session', async () => {
      await request(gateway.portalApp).get('/logout').expect(302).expect('Location', '/');
    });
  });

  it('should expose login metrics', async () => {
    await signInAsAlice();

    const response = await request(gateway.portalApp).get('/metrics').expect(200);
    expect(response.text).toContain('portal_login_attempts_total{status="success",department="HR",username="alice"} 1');
    expect(response.text).toContain('portal_active_sessions{department="HR"} 1');
  });
});
