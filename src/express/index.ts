/**
 * Express binding of the OAuth2 login flow.
 *
 * @example
 * ```typescript
 * import { setupLoginExpress } from 'oauth2-code-login/express';
 * ```
 */

export { createExpressLoginRoutes, type ExpressLoginRoutesOptions } from './adapter.js';
export { requireIdentity, type RequireIdentityOptions } from './middleware.js';
export { IdentitySessionStore, type IdentitySessionStoreOptions } from './session-store.js';
export {
  setupLoginExpress,
  type LoginExpressSetupOptions,
  type LoginExpressSetupResult,
} from './setup.js';
export { toSessionIdentity, type SessionIdentity } from './types.js';
