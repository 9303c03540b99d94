import type { LoginError } from '../core/errors.js';

/**
 * Identity claims resolved from the userinfo endpoint.
 */
export interface UserInfo {
  /** Value of the configured username claim (never empty) */
  readonly username: string;
  /** Values of the configured groups claim, without duplicates */
  readonly groups: ReadonlySet<string>;
}

/**
 * Identity handed to the host session framework after a successful login.
 */
export interface IdentityAssertion {
  readonly username: string;
  readonly groups: ReadonlySet<string>;
}

/**
 * Query parameters of the callback request.
 * Keys are parameter names; repeated parameters arrive as arrays.
 */
export type CallbackParams = Record<string, string | string[] | undefined>;

/**
 * Everything needed to send the browser to the identity provider.
 */
export interface LoginRedirect {
  /** The state value issued for this attempt */
  state: string;
  /** Fully built authorization URL */
  authorizationUrl: string;
}

/**
 * Terminal outcome of a callback. There is no partial or retry state.
 */
export type CallbackResult =
  | { outcome: 'AUTHENTICATED'; identity: IdentityAssertion }
  | { outcome: 'FAILED'; error: LoginError };
