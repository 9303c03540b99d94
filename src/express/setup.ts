import express, { type Application, type Request, type RequestHandler, type Response } from 'express';
import session, { type Store } from 'express-session';
import type { OAuth2LoginConfig } from '../types/config.js';
import type { IOAuth2Client } from '../types/client.js';
import type { KeyvLike } from '../types/store.js';
import { createOAuth2Login, type OAuth2Login } from '../core/login.js';
import { DEFAULT_SESSION_MAX_AGE_MS } from '../core/config.js';
import { createConsoleLogger } from '../utils/logger.js';
import { createExpressLoginRoutes } from './adapter.js';
import { requireIdentity } from './middleware.js';
import { IdentitySessionStore } from './session-store.js';

/**
 * Options for setting up an Express app with OAuth2 login.
 */
export interface LoginExpressSetupOptions {
  /**
   * Login flow configuration.
   * `redirectUri` must point at `<basePath>/callback` on this server.
   */
  config: OAuth2LoginConfig;

  /**
   * Keyv instance for storage.
   * Used for Express sessions unless `sessionStore` is set, and for the
   * state-token registry unless `config.store` is set.
   *
   * @example
   * ```typescript
   * // In-memory (development only)
   * const store = new Keyv();
   *
   * // Redis (production)
   * const store = new Keyv({ store: new KeyvRedis('redis://localhost:6379') });
   * ```
   */
  store: KeyvLike;

  /**
   * Secret for signing the session cookie.
   */
  secret: string;

  /**
   * Any express-session store to keep sessions in.
   * Default: an {@link IdentitySessionStore} over `store`
   */
  sessionStore?: Store;

  /**
   * Whether running in production mode.
   * Affects cookie security settings (secure, sameSite).
   * Default: process.env.NODE_ENV === 'production'
   */
  isProduction?: boolean;

  /**
   * Session max age in milliseconds.
   * Default: 8 hours
   */
  sessionMaxAge?: number;

  /**
   * Mount path of the login routes.
   * Default: /oauth
   */
  basePath?: string;

  /**
   * Where the browser goes after a successful login.
   * Default: /
   */
  successRedirect?: string;

  /**
   * Client used instead of the built-in OAuth2Client.
   */
  client?: IOAuth2Client;
}

/**
 * Result of setting up the Express app.
 */
export interface LoginExpressSetupResult {
  /**
   * The configured Express app. Add your own routes and call listen().
   */
  app: Application;

  /** The login flow behind the routes */
  login: OAuth2Login;

  /**
   * Middleware guarding routes that need a logged-in user.
   * Sets `req.identity`.
   */
  requireIdentity: RequestHandler;
}

/**
 * Set up an Express app with OAuth2 authorization code login.
 *
 * This function creates and configures:
 * - Express app with trust proxy
 * - Health check endpoint at /health
 * - Session management backed by the Keyv store
 * - Login routes at `<basePath>/login` and `<basePath>/callback`
 *
 * @param options - Setup options
 * @returns Configured Express app, the login flow and the identity guard
 * @throws ConfigurationError when the login configuration is invalid
 *
 * @example
 * ```typescript
 * import { Keyv } from 'keyv';
 * import { loadLoginConfigFromEnv } from 'oauth2-code-login';
 * import { setupLoginExpress } from 'oauth2-code-login/express';
 *
 * const { app, requireIdentity } = setupLoginExpress({
 *   config: loadLoginConfigFromEnv(),
 *   store: new Keyv(),
 *   secret: process.env.SESSION_SECRET ?? '',
 * });
 *
 * app.get('/me', requireIdentity, (req, res) => {
 *   res.json(req.identity);
 * });
 *
 * app.listen(3000);
 * ```
 */
export function setupLoginExpress(options: LoginExpressSetupOptions): LoginExpressSetupResult {
  const {
    config,
    store,
    secret,
    isProduction = process.env['NODE_ENV'] === 'production',
    sessionMaxAge = DEFAULT_SESSION_MAX_AGE_MS,
    basePath = '/oauth',
    successRedirect,
    client,
    sessionStore,
  } = options;

  const logger = config.logger ?? createConsoleLogger();

  // Create the login flow; state tokens share the Keyv backend
  const login = createOAuth2Login({ ...config, store: config.store ?? store, logger }, { client });

  // Create Express app
  const app = express();
  app.set('trust proxy', 1);

  const sessionMiddleware = session({
    secret,
    resave: false,
    saveUninitialized: false,
    store: sessionStore ?? new IdentitySessionStore({ store, maxAgeMs: sessionMaxAge, logger }),
    cookie: {
      secure: isProduction,
      httpOnly: true,
      // The callback is a top-level navigation from the IdP
      sameSite: 'lax',
      maxAge: sessionMaxAge,
    },
  });

  // 1. Health check (before other middleware for fast response)
  app.get('/health', (_req: Request, res: Response) => {
    res.json({ status: 'ok', timestamp: new Date().toISOString() });
  });

  // 2. Session management
  app.use(sessionMiddleware);

  // 3. Login routes
  app.use(basePath, createExpressLoginRoutes(login, { successRedirect, logger }));

  return {
    app,
    login,
    requireIdentity: requireIdentity({ loginUrl: `${basePath}/login` }),
  };
}
