/**
 * Portal HTTP application: login, second factor, logout and the department
 * dashboards.
 *
 * The browser only ever holds a signed session id (`portal_sid`); everything
 * else lives in the session store behind AuthenticationService.
 */

import express, { type Request, type Response } from 'express';
import cookieParser from 'cookie-parser';
import { z } from 'zod';
import type { AuthenticationService } from '../core/authentication-service.js';
import type { DepartmentMap } from '../core/department-map.js';
import type { DepartmentRoute } from '../core/types.js';
import type { PrometheusPortalMetrics } from '../metrics/portal-metrics.js';
import { asyncHandler, errorHandler, signedCookie } from './middleware.js';
import { dashboardPage, landingPage, loginPage, totpPage } from './pages.js';
import { PortalError, PortalErrors } from '../utils/errors.js';

export const PORTAL_SESSION_COOKIE = 'portal_sid';

export interface PortalAppOptions {
  auth: AuthenticationService;
  departments: DepartmentMap;
  cookieSecret: string;
  secureCookies: boolean;
  pendingTtlMs: number;
  sessionLifetimeMs: number;
  /** Where logout lands (default: /) */
  landingPath?: string;
  /** Exposed at /metrics when present */
  metrics?: PrometheusPortalMetrics;
}

const LoginFormSchema = z.object({
  username: z.string().catch(''),
  password: z.string().catch(''),
  department: z.string().catch(''),
});

const TotpFormSchema = z.object({
  totp_code: z.string().optional().catch(undefined),
  code: z.string().optional().catch(undefined),
});

export function createPortalApp(options: PortalAppOptions): express.Application {
  const { auth, departments } = options;
  const landingPath = options.landingPath ?? '/';
  const app = express();

  app.disable('x-powered-by');
  app.use(cookieParser(options.cookieSecret));
  app.use(express.urlencoded({ extended: false }));

  const setSessionCookie = (res: Response, sessionId: string, maxAge: number): void => {
    res.cookie(PORTAL_SESSION_COOKIE, sessionId, {
      signed: true,
      httpOnly: true,
      sameSite: 'lax',
      secure: options.secureCookies,
      maxAge,
      path: '/',
    });
  };

  const clearSessionCookie = (res: Response): void => {
    res.clearCookie(PORTAL_SESSION_COOKIE, { path: '/' });
  };

  const sessionId = (req: Request): string | undefined => signedCookie(req, PORTAL_SESSION_COOKIE);

  const departmentNames = departments.departmentNames();

  app.get('/', (req, res) => {
    res.type('html').send(landingPage());
  });

  app.get(
    '/employee/login',
    asyncHandler(async (req, res) => {
      const sid = sessionId(req);
      const session = await auth.getSession(sid);
      if (session) {
        res.redirect(departments.dashboardPath(session.department) ?? landingPath);
        return;
      }
      // Revisiting the form abandons a half-finished login
      await auth.discardPending(sid);
      res.type('html').send(loginPage({ departments: departmentNames }));
    })
  );

  app.post(
    '/employee/login',
    asyncHandler(async (req, res) => {
      const parsed = LoginFormSchema.safeParse(req.body);
      const form = parsed.success ? parsed.data : { username: '', password: '', department: '' };

      try {
        const login = await auth.login(form.username, form.password, form.department, sessionId(req));
        setSessionCookie(res, login.sessionId, options.pendingTtlMs);
        res.redirect('/employee/totp');
      } catch (error) {
        if (!(error instanceof PortalError)) {
          throw error;
        }
        res
          .status(error.statusCode)
          .type('html')
          .send(
            loginPage({
              departments: departmentNames,
              error: error.userMessage,
              username: form.username,
              department: form.department,
            })
          );
      }
    })
  );

  app.get(
    '/employee/totp',
    asyncHandler(async (req, res) => {
      const pending = await auth.getPending(sessionId(req));
      if (!pending) {
        res.redirect('/employee/login');
        return;
      }
      res.type('html').send(totpPage({ fullName: pending.identity.fullName, department: pending.department }));
    })
  );

  app.post(
    '/employee/totp',
    asyncHandler(async (req, res) => {
      const parsed = TotpFormSchema.safeParse(req.body);
      const code = (parsed.success ? (parsed.data.totp_code ?? parsed.data.code) : undefined) ?? '';
      const sid = sessionId(req);

      try {
        const completed = await auth.authenticateSecondFactor(sid, code);
        setSessionCookie(res, completed.sessionId, options.sessionLifetimeMs);
        res.redirect(departments.dashboardPath(completed.session.department) ?? landingPath);
      } catch (error) {
        if (!(error instanceof PortalError)) {
          throw error;
        }
        const pending = await auth.getPending(sid);
        if (error.code === 'SESSION_EXPIRED' || !pending) {
          clearSessionCookie(res);
          res.redirect('/employee/login');
          return;
        }
        res
          .status(error.statusCode)
          .type('html')
          .send(
            totpPage({
              fullName: pending.identity.fullName,
              department: pending.department,
              error: error.userMessage,
            })
          );
      }
    })
  );

  app.get(
    '/logout',
    asyncHandler(async (req, res) => {
      await auth.logout(sessionId(req));
      clearSessionCookie(res);
      res.redirect(landingPath);
    })
  );

  const dashboard = (route: DepartmentRoute) =>
    asyncHandler(async (req, res) => {
      const session = await auth.getSession(sessionId(req));
      if (!session) {
        res.redirect('/employee/login');
        return;
      }
      // Group membership is checked on every request, not only at login
      if (!departments.isAuthorized(route.name, session.identity.groups)) {
        console.warn(
          `[PortalApp] ${session.identity.username} denied ${route.dashboardPath}: not in group ${route.group}`
        );
        throw PortalErrors.UNAUTHORIZED(session.identity.username, route.name, [...session.identity.groups]);
      }
      res.type('html').send(dashboardPage(route.name, session));
    });

  for (const name of departmentNames) {
    const route = departments.getDepartment(name);
    if (route) {
      app.get(route.dashboardPath, dashboard(route));
    }
  }

  app.get('/health', (req, res) => {
    res.json({ status: 'healthy', service: 'employee-portal' });
  });

  const metrics = options.metrics;
  if (metrics) {
    app.get(
      '/metrics',
      asyncHandler(async (req, res) => {
        res.type(metrics.registry.contentType).send(await metrics.scrape());
      })
    );
  }

  app.use(errorHandler('PortalApp'));

  return app;
}
