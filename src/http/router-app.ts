/**
 * Router HTTP application.
 *
 * Fixed endpoints (health, readiness, metrics and, with identity-token
 * evidence, the OIDC login) come first; every other method and path is
 * authorized and forwarded to exactly one dashboard backend.
 */

import express from 'express';
import cookieParser from 'cookie-parser';
import { pipeline } from 'node:stream/promises';
import { randomUUID } from 'node:crypto';
import type { DepartmentMap } from '../core/department-map.js';
import type { SessionStore } from '../core/session-store.js';
import type { RoleRouter } from '../router/role-router.js';
import type { BackendForwarder } from '../router/backend-forwarder.js';
import type { OidcLoginFlow } from '../router/oidc-flow.js';
import { bearerToken } from '../router/evidence.js';
import { isReady } from '../router/readiness.js';
import type { PrometheusPortalMetrics } from '../metrics/portal-metrics.js';
import { asyncHandler, errorHandler, signedCookie } from './middleware.js';
import { routerStatusPage } from './pages.js';
import { errorMessage } from '../utils/errors.js';

export const ROUTER_SESSION_COOKIE = 'router_sid';
export const ROUTER_STATE_COOKIE = 'router_oidc_state';

export interface RouterSession {
  idToken: string;
}

export interface RouterOidcOptions {
  flow: OidcLoginFlow;
  sessions: SessionStore<RouterSession>;
  sessionLifetimeMs: number;
}

export interface RouterAppOptions {
  router: RoleRouter;
  forwarder: BackendForwarder;
  departments: DepartmentMap;
  readinessTimeoutMs: number;
  /** Linked from the 401 page */
  signOutPath: string;
  cookieSecret: string;
  secureCookies: boolean;
  /** Enables /login, /oidc/callback and /logout */
  oidc?: RouterOidcOptions;
  metrics?: PrometheusPortalMetrics;
  /** Largest request body forwarded (default: 10mb) */
  bodyLimit?: string;
}

const SERVICE = 'portal-router';

export function createRouterApp(options: RouterAppOptions): express.Application {
  const { router, forwarder, departments, oidc } = options;
  const app = express();

  app.disable('x-powered-by');
  app.use(cookieParser(options.cookieSecret));

  const healthy: express.RequestHandler = (req, res) => {
    res.json({ status: 'healthy', service: SERVICE });
  };
  app.get('/health', healthy);
  app.get('/healthz', healthy);
  app.get('/status', (req, res) => {
    res.type('html').send(routerStatusPage(oidc ? 'OIDC' : 'trusted headers'));
  });

  app.get(
    '/ready',
    asyncHandler(async (req, res) => {
      if (await isReady(departments, options.readinessTimeoutMs)) {
        res.json({ status: 'ready', service: SERVICE });
      } else {
        res.status(503).json({ status: 'not ready', service: SERVICE });
      }
    })
  );

  const metrics = options.metrics;
  if (metrics) {
    app.get(
      '/metrics',
      asyncHandler(async (req, res) => {
        res.type(metrics.registry.contentType).send(await metrics.scrape());
      })
    );
  }

  if (oidc) {
    const cookieOptions = {
      signed: true,
      httpOnly: true,
      sameSite: 'lax' as const,
      secure: options.secureCookies,
      path: '/',
    };

    app.get(
      '/login',
      asyncHandler(async (req, res) => {
        const { authorizeUrl, state } = await oidc.flow.begin();
        res.cookie(ROUTER_STATE_COOKIE, state, { ...cookieOptions, maxAge: 300000 });
        res.redirect(authorizeUrl);
      })
    );

    app.get(
      '/oidc/callback',
      asyncHandler(async (req, res) => {
        const code = typeof req.query.code === 'string' ? req.query.code : undefined;
        const state = typeof req.query.state === 'string' ? req.query.state : undefined;
        // The state must come back to the browser that started the login
        const expected = signedCookie(req, ROUTER_STATE_COOKIE);
        res.clearCookie(ROUTER_STATE_COOKIE, { path: '/' });

        const tokens = await oidc.flow.complete(code, state === expected ? state : undefined);
        // Reject tokens that would not pass as evidence before starting a session
        await router.authorizeAndSelectTarget({ headers: {}, sessionToken: tokens.idToken });

        const sid = randomUUID();
        await oidc.sessions.put(sid, { idToken: tokens.idToken }, oidc.sessionLifetimeMs);
        res.cookie(ROUTER_SESSION_COOKIE, sid, { ...cookieOptions, maxAge: oidc.sessionLifetimeMs });
        res.redirect('/');
      })
    );

    app.get(
      '/logout',
      asyncHandler(async (req, res) => {
        const sid = signedCookie(req, ROUTER_SESSION_COOKIE);
        const session = sid ? await oidc.sessions.get(sid) : undefined;
        if (sid) {
          await oidc.sessions.delete(sid);
        }
        res.clearCookie(ROUTER_SESSION_COOKIE, { path: '/' });
        res.redirect(oidc.flow.logoutUrl(session?.idToken));
      })
    );
  }

  app.use(express.raw({ type: () => true, limit: options.bodyLimit ?? '10mb' }));

  app.use(
    asyncHandler(async (req, res) => {
      const sid = oidc ? signedCookie(req, ROUTER_SESSION_COOKIE) : undefined;
      const session = oidc && sid ? await oidc.sessions.get(sid) : undefined;

      // Browsers without any token start the login instead of seeing a 401
      if (oidc && !session && !bearerToken(req.headers) && req.method === 'GET') {
        res.redirect('/login');
        return;
      }

      const decision = await router.authorizeAndSelectTarget({
        headers: req.headers,
        sessionToken: session?.idToken,
      });

      const upstream = await forwarder.forward(
        {
          method: req.method,
          url: req.originalUrl,
          headers: req.headers,
          body: Buffer.isBuffer(req.body) ? req.body : undefined,
          remoteAddress: req.socket.remoteAddress,
        },
        decision
      );

      res.status(upstream.status);
      for (const [name, value] of upstream.headers) {
        res.append(name, value);
      }
      if (!upstream.body) {
        res.end();
        return;
      }

      try {
        await pipeline(upstream.body, res);
      } catch (error) {
        // Status and headers are already sent; the connection is all that is left
        console.warn(`[RouterApp] Relaying ${req.method} ${req.originalUrl} aborted: ${errorMessage(error)}`);
        res.destroy();
      }
    })
  );

  app.use(errorHandler('RouterApp', options.signOutPath));

  return app;
}
