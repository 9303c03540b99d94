/**
 * oauth2-code-login
 *
 * Server-side OAuth2 authorization code login: CSRF state tokens, redirect
 * building, callback validation, token exchange and userinfo claim mapping.
 *
 * ## Package Exports
 *
 * - `oauth2-code-login` - createOAuth2Login, OAuth2Client, state tokens, errors, utilities
 * - `oauth2-code-login/express` - setupLoginExpress, login routes, requireIdentity
 *
 * @example Framework-agnostic flow
 * ```typescript
 * import { createOAuth2Login, loadLoginConfigFromEnv } from 'oauth2-code-login';
 *
 * const login = createOAuth2Login(loadLoginConfigFromEnv());
 *
 * // 1. Send the browser to the identity provider
 * const { authorizationUrl } = await login.beginLogin();
 *
 * // 2. On the callback
 * const result = await login.completeLogin({ state, code });
 * if (result.outcome === 'AUTHENTICATED') {
 *   console.log(result.identity.username);
 * } else {
 *   console.log(result.error.reason);
 * }
 * ```
 *
 * @example Express
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
 * app.get('/me', requireIdentity, (req, res) => res.json(req.identity));
 * app.listen(3000);
 * ```
 *
 * @packageDocumentation
 */

// Login flow, state tokens, errors
export * from './core/index.js';

// Token exchange and userinfo client
export {
  OAuth2Client,
  createClientConfiguration,
  withDeadlines,
  getClaimAsString,
  getClaimAsStringSet,
} from './oauth2/index.js';
export type { OAuth2ClientConfig } from './oauth2/index.js';

// Types
export type * from './types/index.js';

// Utilities
export { createConsoleLogger, noopLogger, redactMeta } from './utils/index.js';
export type { Logger, LogLevel, ConsoleLoggerOptions } from './utils/index.js';

// Constants
export {
  DEFAULT_SCOPE,
  DEFAULT_USERNAME_CLAIM,
  DEFAULT_GROUPS_CLAIM,
  DEFAULT_MAX_STATE_VALIDITY_MINUTES,
  HTTP_TIMEOUT_MS,
  ENV_VARIABLES,
  STORAGE_NAMESPACES,
} from './core/config.js';
