import type { NextFunction, Request, RequestHandler, Response } from 'express';

/**
 * Options for the identity middleware.
 */
export interface RequireIdentityOptions {
  /**
   * Send anonymous requests here instead of answering 401.
   * Typically the mounted login route, e.g. `/oauth/login`.
   */
  loginUrl?: string;
}

/**
 * Express middleware that only lets logged-in users through.
 * Reads the identity stored in the session by the callback route and exposes
 * it as `req.identity`.
 *
 * @example
 * ```typescript
 * app.get('/me', requireIdentity(), (req, res) => {
 *   res.json(req.identity);
 * });
 * ```
 */
export function requireIdentity(options: RequireIdentityOptions = {}): RequestHandler {
  return (req: Request, res: Response, next: NextFunction): void => {
    // Absent when no session middleware is installed
    const identity = req.session?.identity;

    if (!identity) {
      if (options.loginUrl) {
        res.redirect(options.loginUrl);
        return;
      }
      res.status(401).json({ error: 'unauthorized', message: 'Login required' });
      return;
    }

    req.identity = identity;
    next();
  };
}
