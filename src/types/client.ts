import type { UserInfo } from './identity.js';

/**
 * Server-side client for the two calls made to the identity provider.
 *
 * Built-in implementation: OAuth2Client (from 'oauth2-code-login')
 *
 * @example
 * ```typescript
 * class MyClient implements IOAuth2Client {
 *   async exchangeCodeForToken(code: string): Promise<string> {
 *     // POST the code to the token endpoint
 *   }
 *   async getUserInfo(accessToken: string): Promise<UserInfo> {
 *     // GET the userinfo endpoint with the bearer token
 *   }
 * }
 * ```
 */
export interface IOAuth2Client {
  /**
   * Exchange an authorization code for an access token.
   *
   * @param code - The authorization code from the callback
   * @returns The access token. Callers must not log or persist it.
   */
  exchangeCodeForToken(code: string): Promise<string>;

  /**
   * Retrieve identity claims with an access token.
   *
   * @param accessToken - Token returned by exchangeCodeForToken
   * @returns Username and groups resolved from the configured claims
   */
  getUserInfo(accessToken: string): Promise<UserInfo>;
}
