/**
 * Core login flow: state tokens, redirect building, callback validation.
 */
export { createOAuth2Login } from './login.js';
export type { OAuth2Login, OAuth2LoginOverrides } from './login.js';
export { resolveLoginConfig, loadLoginConfigFromEnv, LoginConfigSchema } from './login-config.js';
export { StateTokenManager } from './state-token-manager.js';
export type { StateTokenManagerOptions } from './state-token-manager.js';
export { createMemoryStateTokenStore, createKeyvStateTokenStore } from './state-store.js';
export { buildAuthorizationUrl } from './authorization-url.js';
export { validateCallback } from './callback.js';
export { assembleIdentity } from './identity.js';
export {
  LoginError,
  ConfigurationError,
  CsrfError,
  MissingAuthorizationCodeError,
  AuthorizationDeniedError,
  TokenExchangeError,
  UserInfoError,
} from './errors.js';
export type {
  CsrfFailure,
  IdpCallFailure,
  TokenExchangeFailure,
  UserInfoFailure,
} from './errors.js';
