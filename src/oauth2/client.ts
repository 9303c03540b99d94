import * as client from 'openid-client';
import type { FetchLike, ResolvedLoginConfig } from '../types/config.js';
import type { IOAuth2Client } from '../types/client.js';
import type { UserInfo } from '../types/identity.js';
import { TokenExchangeError, UserInfoError } from '../core/errors.js';
import { HTTP_TIMEOUT_MS } from '../core/config.js';
import { createConsoleLogger, type Logger } from '../utils/logger.js';
import { getClaimAsString, getClaimAsStringSet } from './claims.js';
import { withDeadlines } from './deadline-fetch.js';

/**
 * Configuration for the OAuth2 client.
 */
export type OAuth2ClientConfig = Pick<
  ResolvedLoginConfig,
  | 'issuer'
  | 'tokenEndpoint'
  | 'userInfoEndpoint'
  | 'clientId'
  | 'clientSecret'
  | 'redirectUri'
  | 'usernameClaim'
  | 'groupsClaim'
> & {
  /** Logger instance (default: console logger) */
  logger?: Logger;
  /** Replacement for the global `fetch` */
  fetch?: FetchLike;
};

type Claims = Record<string, unknown>;

function toClaims(value: unknown): Claims | undefined {
  if (value === null || typeof value !== 'object' || Array.isArray(value)) {
    return undefined;
  }
  return Object.fromEntries(Object.entries(value));
}

/**
 * The error followed by each of its causes.
 */
function causeChain(error: unknown): unknown[] {
  const chain: unknown[] = [];
  let current = error;
  while (current !== undefined && !chain.includes(current)) {
    chain.push(current);
    current = current instanceof Error ? current.cause : undefined;
  }
  return chain;
}

function isTimeout(error: unknown): boolean {
  return causeChain(error).some((link) => link instanceof Error && link.name === 'TimeoutError');
}

/**
 * HTTP status of the error response a request failed with, if any.
 */
function failedStatusOf(error: unknown): number | undefined {
  for (const link of causeChain(error)) {
    if (
      link instanceof client.ResponseBodyError ||
      link instanceof client.WWWAuthenticateChallengeError
    ) {
      return link.status;
    }
    if (link instanceof Response && !link.ok) {
      return link.status;
    }
  }
  return undefined;
}

/**
 * JSON body of a 200 response the library refused to accept.
 */
function rejectedBodyOf(error: unknown): Claims | undefined {
  for (const link of causeChain(error)) {
    const record = link instanceof Response ? undefined : toClaims(link);
    const body = record ? toClaims(record['body']) : undefined;
    if (body) {
      return body;
    }
  }
  return undefined;
}

/**
 * Whether the library rejected the response itself, as opposed to the
 * request never completing.
 */
function isResponseProcessingError(error: unknown): boolean {
  return causeChain(error).some(
    (link) =>
      link instanceof SyntaxError ||
      (link instanceof Error &&
        'code' in link &&
        typeof link.code === 'string' &&
        link.code.startsWith('OAUTH_'))
  );
}

/**
 * Build the openid-client configuration for a provider known by its endpoints.
 * Requests go through {@link withDeadlines}; the library's own timeout only
 * bounds the two deadlines together.
 */
export function createClientConfiguration(config: OAuth2ClientConfig): client.Configuration {
  const configuration = new client.Configuration(
    {
      issuer: config.issuer,
      token_endpoint: config.tokenEndpoint,
      userinfo_endpoint: config.userInfoEndpoint,
    },
    config.clientId,
    config.clientSecret,
    client.ClientSecretPost(config.clientSecret)
  );

  configuration.timeout = (2 * HTTP_TIMEOUT_MS) / 1000;
  configuration[client.customFetch] = withDeadlines(config.fetch ?? fetch, HTTP_TIMEOUT_MS);

  const endpoints = [config.tokenEndpoint, config.userInfoEndpoint];
  if (endpoints.some((endpoint) => new URL(endpoint).protocol === 'http:')) {
    client.allowInsecureRequests(configuration);
  }

  return configuration;
}

/**
 * OAuth2 client performing the token exchange and the userinfo lookup with
 * openid-client.
 *
 * Each call makes exactly one request and no retries. The response headers
 * and the body each get 10 seconds. The client secret and the access token
 * never reach the logger.
 *
 * @example
 * ```typescript
 * const client = new OAuth2Client({
 *   issuer: 'https://idp.example.com',
 *   tokenEndpoint: 'https://idp.example.com/oauth2/token',
 *   userInfoEndpoint: 'https://idp.example.com/oauth2/userinfo',
 *   clientId: 'my-app',
 *   clientSecret: process.env.OAUTH2_CLIENT_SECRET ?? '',
 *   redirectUri: 'https://app.example.com/oauth/callback',
 *   usernameClaim: 'preferred_username',
 *   groupsClaim: 'groups',
 * });
 *
 * const accessToken = await client.exchangeCodeForToken(code);
 * const { username, groups } = await client.getUserInfo(accessToken);
 * ```
 */
export class OAuth2Client implements IOAuth2Client {
  private readonly config: OAuth2ClientConfig;
  private readonly logger: Logger;
  private readonly configuration: client.Configuration;

  constructor(config: OAuth2ClientConfig) {
    this.config = config;
    this.logger = config.logger ?? createConsoleLogger();
    this.configuration = createClientConfiguration(config);
  }

  /**
   * Exchange an authorization code for an access token.
   *
   * The state of the callback is checked by the state-token registry before
   * this is called, so the library's own state check is skipped.
   *
   * @throws TokenExchangeError
   */
  async exchangeCodeForToken(code: string): Promise<string> {
    const callbackUrl = new URL(this.config.redirectUri);
    callbackUrl.searchParams.set('code', code);

    try {
      const tokens = await client.authorizationCodeGrant(this.configuration, callbackUrl, {
        expectedState: client.skipStateCheck,
      });
      return tokens.access_token;
    } catch (error) {
      throw this.toTokenExchangeError(error);
    }
  }

  private toTokenExchangeError(error: unknown): TokenExchangeError {
    if (isTimeout(error)) {
      this.logger.error('Token exchange timed out', { timeoutMs: HTTP_TIMEOUT_MS });
      return new TokenExchangeError('timeout', 'Token endpoint did not respond in time');
    }

    const status = failedStatusOf(error);
    if (status !== undefined) {
      const oauthError = causeChain(error).find(
        (link) => link instanceof client.ResponseBodyError
      );
      this.logger.error('Token exchange failed', {
        status,
        ...(oauthError instanceof client.ResponseBodyError
          ? {
              error: oauthError.error,
              ...(oauthError.error_description
                ? { errorDescription: oauthError.error_description }
                : {}),
            }
          : {}),
      });
      return new TokenExchangeError(
        'http_status',
        `Failed to exchange authorization code. HTTP ${status}`,
        { status }
      );
    }

    const body = rejectedBodyOf(error);
    if (body && typeof body['access_token'] !== 'string') {
      this.logger.error('Token response missing access_token field', {
        fields: Object.keys(body).length,
      });
      return new TokenExchangeError(
        'missing_access_token',
        'Access token not found in the response'
      );
    }

    if (body || isResponseProcessingError(error)) {
      this.logger.error('Token response could not be processed');
      return new TokenExchangeError('invalid_response', 'Token response could not be parsed');
    }

    this.logger.error('Token exchange request failed', error);
    return new TokenExchangeError('network', 'Token endpoint could not be reached');
  }

  /**
   * Retrieve the username and groups of the authenticated user.
   *
   * The userinfo endpoint is called as a bearer-protected resource, so
   * providers that omit `sub` are supported.
   *
   * @throws UserInfoError
   */
  async getUserInfo(accessToken: string): Promise<UserInfo> {
    let response: Response;
    try {
      response = await client.fetchProtectedResource(
        this.configuration,
        accessToken,
        new URL(this.config.userInfoEndpoint),
        'GET',
        undefined,
        new Headers({ Accept: 'application/json' })
      );
    } catch (error) {
      throw this.toUserInfoError(error);
    }

    if (response.status !== 200) {
      await response.body?.cancel();
      throw this.toUserInfoError(response);
    }

    let claims: Claims | undefined;
    try {
      claims = toClaims(await response.json());
    } catch (error) {
      if (isTimeout(error)) {
        throw this.toUserInfoError(error);
      }
      claims = undefined;
    }

    if (!claims) {
      this.logger.error('UserInfo response is not a JSON object');
      throw new UserInfoError('invalid_response', 'UserInfo response could not be parsed');
    }

    this.logger.debug('UserInfo response received', { fields: Object.keys(claims).length });

    const { usernameClaim, groupsClaim } = this.config;
    const username = getClaimAsString(claims, usernameClaim);
    if (!username) {
      throw new UserInfoError(
        'missing_claim',
        `Username claim '${usernameClaim}' not found in user info response`,
        { claim: usernameClaim }
      );
    }

    const groups = getClaimAsStringSet(claims, groupsClaim);
    this.logger.debug('Claims resolved', { usernameClaim, groupsClaim, groups: groups.size });

    return Object.freeze({ username, groups });
  }

  private toUserInfoError(error: unknown): UserInfoError {
    if (isTimeout(error)) {
      this.logger.error('UserInfo request timed out', { timeoutMs: HTTP_TIMEOUT_MS });
      return new UserInfoError('timeout', 'UserInfo endpoint did not respond in time');
    }

    const status = error instanceof Response ? error.status : failedStatusOf(error);
    if (status !== undefined) {
      this.logger.error('UserInfo endpoint returned an error', { status });
      return new UserInfoError('http_status', `Failed to retrieve user info. HTTP ${status}`, {
        status,
      });
    }

    this.logger.error('UserInfo request failed', error);
    return new UserInfoError('network', 'UserInfo endpoint could not be reached');
  }
}
