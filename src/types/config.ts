import type { KeyvLike } from './store.js';
import type { Logger } from '../utils/logger.js';

/**
 * `fetch`-compatible function used for calls to the identity provider.
 */
export type FetchLike = (input: string | URL, init?: RequestInit) => Promise<Response>;

/**
 * Configuration for the OAuth2 authorization code login flow.
 *
 * @example
 * ```typescript
 * const login = createOAuth2Login({
 *   authorizationEndpoint: 'https://idp.example.com/oauth2/authorize',
 *   tokenEndpoint: 'https://idp.example.com/oauth2/token',
 *   userInfoEndpoint: 'https://idp.example.com/oauth2/userinfo',
 *   clientId: process.env.OAUTH2_CLIENT_ID ?? '',
 *   clientSecret: process.env.OAUTH2_CLIENT_SECRET ?? '',
 *   redirectUri: 'https://app.example.com/oauth/callback',
 *   usernameClaim: 'preferred_username',
 * });
 * ```
 */
export interface OAuth2LoginConfig {
  /** IdP authorization endpoint the browser is redirected to */
  authorizationEndpoint: string;

  /** IdP token endpoint used for the code exchange */
  tokenEndpoint: string;

  /** IdP userinfo endpoint queried with the access token */
  userInfoEndpoint: string;

  /** OAuth client ID */
  clientId: string;

  /** OAuth client secret. Only ever sent to the token endpoint. */
  clientSecret: string;

  /** Callback URL registered with the identity provider */
  redirectUri: string;

  /**
   * Issuer identifier of the identity provider. An `id_token` in the token
   * response is checked against it.
   * @default origin of `authorizationEndpoint`
   */
  issuer?: string;

  /**
   * Space-separated scopes to request.
   * @default 'email profile'
   */
  scope?: string;

  /**
   * Userinfo field holding the username.
   * @default 'username'
   */
  usernameClaim?: string;

  /**
   * Userinfo field holding the group list.
   * @default 'groups'
   */
  groupsClaim?: string;

  /**
   * How long an issued state token stays valid, in minutes.
   * @default 10
   */
  maxStateValidityMinutes?: number;

  /**
   * Keyv instance for a shared state-token registry.
   * Defaults to an in-memory registry owned by this process.
   */
  store?: KeyvLike;

  /** Logger instance (default: console logger) */
  logger?: Logger;

  /** Replacement for the global `fetch` (mainly for tests) */
  fetch?: FetchLike;
}

/**
 * Configuration after validation, with every default applied.
 */
export interface ResolvedLoginConfig {
  readonly authorizationEndpoint: string;
  readonly tokenEndpoint: string;
  readonly userInfoEndpoint: string;
  readonly clientId: string;
  readonly clientSecret: string;
  readonly redirectUri: string;
  readonly issuer: string;
  readonly scope: string;
  readonly usernameClaim: string;
  readonly groupsClaim: string;
  readonly maxStateValidityMinutes: number;
}
