import { Router, type Request, type Response } from 'express';
import type { OAuth2Login } from '../core/login.js';
import type { CallbackParams, IdentityAssertion } from '../types/identity.js';
import { DEFAULT_ROUTES } from '../core/config.js';
import { createConsoleLogger, type Logger } from '../utils/logger.js';
import { toSessionIdentity } from './types.js';

/**
 * Options for the Express login routes.
 */
export interface ExpressLoginRoutesOptions {
  /** Path of the redirect step (default: /login) */
  loginPath?: string;
  /** Path of the callback step; must match the registered redirect URI (default: /callback) */
  callbackPath?: string;
  /** Where the browser goes after a successful login (default: /) */
  successRedirect?: string;
  /**
   * Custom handler for a successful login. When set, it replaces the default
   * behaviour (store the identity in the session and redirect) and must send
   * the response itself.
   */
  onAuthenticated?: (identity: IdentityAssertion, req: Request, res: Response) => void | Promise<void>;
  /** Logger instance */
  logger?: Logger;
}

/**
 * Create an Express router serving the two steps of the login flow.
 *
 * Routes:
 * - GET /login - Redirect to the identity provider
 * - GET /callback - Validate the callback, fetch the identity, open the session
 *
 * Failed logins answer 401 with a generic message; the failure reason is only logged.
 *
 * @example
 * ```typescript
 * const login = createOAuth2Login(config);
 * app.use(session({ ... }));
 * app.use('/oauth', createExpressLoginRoutes(login, { successRedirect: '/app' }));
 * ```
 */
export function createExpressLoginRoutes(
  login: OAuth2Login,
  options: ExpressLoginRoutesOptions = {}
): Router {
  const router = Router();
  const logger = options.logger ?? createConsoleLogger();
  const loginPath = options.loginPath ?? DEFAULT_ROUTES.login;
  const callbackPath = options.callbackPath ?? DEFAULT_ROUTES.callback;
  const successRedirect = options.successRedirect ?? '/';

  const handleLogin = async (_req: Request, res: Response): Promise<void> => {
    try {
      const { authorizationUrl } = await login.beginLogin();
      res.redirect(authorizationUrl);
    } catch (error) {
      logger.error('Login redirect error', error);
      sendServerError(res);
    }
  };

  const handleCallback = async (req: Request, res: Response): Promise<void> => {
    try {
      const result = await login.completeLogin(toCallbackParams(req.query));

      if (result.outcome === 'FAILED') {
        res.status(401).send('Authentication failed');
        return;
      }

      if (options.onAuthenticated) {
        await options.onAuthenticated(result.identity, req, res);
        return;
      }

      // Session middleware is optional when onAuthenticated is used
      if (!req.session) {
        logger.error('Session middleware is not installed; cannot store the identity');
        sendServerError(res);
        return;
      }

      // New session id after login (session fixation)
      await regenerateSession(req);
      req.session.identity = toSessionIdentity(result.identity);
      await saveSession(req);

      res.redirect(successRedirect);
    } catch (error) {
      logger.error('Login callback error', error);
      sendServerError(res);
    }
  };

  router.get(loginPath, (req, res) => {
    void handleLogin(req, res);
  });

  router.get(callbackPath, (req, res) => {
    void handleCallback(req, res);
  });

  return router;
}

/**
 * Keep the string-valued query parameters; nested objects are dropped.
 */
function toCallbackParams(query: Request['query']): CallbackParams {
  const params: CallbackParams = {};
  for (const [key, value] of Object.entries(query)) {
    if (typeof value === 'string') {
      params[key] = value;
    } else if (Array.isArray(value)) {
      const items: unknown[] = value;
      params[key] = items.filter((item): item is string => typeof item === 'string');
    }
  }
  return params;
}

function regenerateSession(req: Request): Promise<void> {
  return new Promise((resolve, reject) => {
    req.session.regenerate((err: unknown) => {
      if (err) {
        reject(err instanceof Error ? err : new Error(String(err)));
        return;
      }
      resolve();
    });
  });
}

function saveSession(req: Request): Promise<void> {
  return new Promise((resolve, reject) => {
    req.session.save((err: unknown) => {
      if (err) {
        reject(err instanceof Error ? err : new Error(String(err)));
        return;
      }
      resolve();
    });
  });
}

function sendServerError(res: Response): void {
  if (!res.headersSent) {
    res.status(500).send('Internal server error');
  }
}
