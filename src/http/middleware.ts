/**
 * Express plumbing shared by the portal and router apps.
 */

import type { ErrorRequestHandler, NextFunction, Request, RequestHandler, Response } from 'express';
import { errorPage } from './pages.js';
import { PortalError, sanitizeError } from '../utils/errors.js';

/**
 * Express 4 does not await handlers; rejected promises go to `next`.
 */
export function asyncHandler(
  handler: (req: Request, res: Response, next: NextFunction) => Promise<void>
): RequestHandler {
  return (req, res, next) => {
    handler(req, res, next).catch(next);
  };
}

/** Value of a signed cookie, or undefined when absent or tampered with. */
export function signedCookie(req: Request, name: string): string | undefined {
  const cookies: unknown = req.signedCookies;
  if (cookies === null || typeof cookies !== 'object') {
    return undefined;
  }
  const value: unknown = Reflect.get(cookies, name);
  return typeof value === 'string' && value.length > 0 ? value : undefined;
}

/**
 * Renders PortalErrors as HTML pages with their status; anything else is a
 * 500 that reveals nothing.
 */
export function errorHandler(component: string, signOutPath?: string): ErrorRequestHandler {
  return (err: unknown, req, res, next) => {
    if (res.headersSent) {
      next(err);
      return;
    }

    if (err instanceof PortalError) {
      res
        .status(err.statusCode)
        .type('html')
        .send(
          errorPage({
            statusCode: err.statusCode,
            message: err.userMessage,
            signOutPath: err.statusCode === 401 ? signOutPath : undefined,
          })
        );
      return;
    }

    console.error(`[${component}] Unhandled error on ${req.method} ${req.path}:`, sanitizeError(err));
    res
      .status(500)
      .type('html')
      .send(errorPage({ statusCode: 500, message: 'An unexpected error occurred. Please contact support.' }));
  };
}
