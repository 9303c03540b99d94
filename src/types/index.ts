// Configuration types
export type { OAuth2LoginConfig, ResolvedLoginConfig, FetchLike } from './config.js';

// IdP client types
export type { IOAuth2Client } from './client.js';

// State token types
export type {
  StateToken,
  StateTokenStore,
  StateRejectionReason,
  StateValidationResult,
} from './state.js';

// Identity types
export type {
  UserInfo,
  IdentityAssertion,
  CallbackParams,
  CallbackResult,
  LoginRedirect,
} from './identity.js';

// Store types
export type { KeyvLike } from './store.js';
