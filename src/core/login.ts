import type { OAuth2LoginConfig, ResolvedLoginConfig } from '../types/config.js';
import type { IOAuth2Client } from '../types/client.js';
import type { CallbackParams, CallbackResult, LoginRedirect } from '../types/identity.js';
import { OAuth2Client } from '../oauth2/client.js';
import { createConsoleLogger } from '../utils/logger.js';
import { buildAuthorizationUrl } from './authorization-url.js';
import { validateCallback } from './callback.js';
import { LoginError } from './errors.js';
import { assembleIdentity } from './identity.js';
import { resolveLoginConfig } from './login-config.js';
import { createKeyvStateTokenStore } from './state-store.js';
import { StateTokenManager } from './state-token-manager.js';

/**
 * Login flow instance returned by createOAuth2Login.
 */
export interface OAuth2Login {
  /** The validated configuration (contains the client secret; do not log) */
  readonly config: ResolvedLoginConfig;

  /** State token registry of this flow */
  readonly stateTokens: StateTokenManager;

  /**
   * Start a login attempt: issue a state token and build the redirect URL.
   */
  beginLogin(): Promise<LoginRedirect>;

  /**
   * Finish a login attempt from the callback's query parameters.
   * Resolves to AUTHENTICATED with the identity, or FAILED with the reason.
   * A failed attempt cannot be resumed; the user has to start over.
   */
  completeLogin(params: CallbackParams): Promise<CallbackResult>;

  /**
   * Shut the flow down: stop the state purge and drop owned state.
   */
  close(): Promise<void>;
}

/**
 * Extra collaborators for createOAuth2Login.
 */
export interface OAuth2LoginOverrides {
  /** Client used instead of the built-in OAuth2Client */
  client?: IOAuth2Client;
}

/**
 * Create an OAuth2 authorization code login flow.
 *
 * @param config - Login configuration
 * @param overrides - Optional replacement collaborators
 * @returns OAuth2Login instance, already started
 * @throws ConfigurationError when a required endpoint or credential is missing
 *
 * @example
 * ```typescript
 * import { Keyv } from 'keyv';
 * import { createOAuth2Login, loadLoginConfigFromEnv } from 'oauth2-code-login';
 *
 * const login = createOAuth2Login({ ...loadLoginConfigFromEnv(), store: new Keyv() });
 *
 * // Redirect step
 * const { authorizationUrl } = await login.beginLogin();
 *
 * // Callback step
 * const result = await login.completeLogin(req.query);
 * if (result.outcome === 'AUTHENTICATED') {
 *   console.log(result.identity.username, [...result.identity.groups]);
 * }
 * ```
 */
export function createOAuth2Login(
  config: OAuth2LoginConfig,
  overrides: OAuth2LoginOverrides = {}
): OAuth2Login {
  const logger = config.logger ?? createConsoleLogger();
  const resolved = resolveLoginConfig(config);

  const stateTokens = new StateTokenManager({
    maxValidityMinutes: resolved.maxStateValidityMinutes,
    store: config.store ? createKeyvStateTokenStore(config.store) : undefined,
    logger,
  });
  stateTokens.start();

  const client =
    overrides.client ??
    new OAuth2Client({
      issuer: resolved.issuer,
      tokenEndpoint: resolved.tokenEndpoint,
      userInfoEndpoint: resolved.userInfoEndpoint,
      clientId: resolved.clientId,
      clientSecret: resolved.clientSecret,
      redirectUri: resolved.redirectUri,
      usernameClaim: resolved.usernameClaim,
      groupsClaim: resolved.groupsClaim,
      logger,
      fetch: config.fetch,
    });

  logger.info('OAuth2 login flow initialized', {
    authorizationEndpoint: resolved.authorizationEndpoint,
    clientId: resolved.clientId,
    scope: resolved.scope,
  });

  return {
    config: resolved,
    stateTokens,

    async beginLogin(): Promise<LoginRedirect> {
      const token = await stateTokens.issue();
      return {
        state: token.value,
        authorizationUrl: buildAuthorizationUrl(resolved, token.value),
      };
    },

    async completeLogin(params: CallbackParams): Promise<CallbackResult> {
      try {
        const code = await validateCallback(params, stateTokens, logger);
        const accessToken = await client.exchangeCodeForToken(code);
        const userInfo = await client.getUserInfo(accessToken);
        const identity = assembleIdentity(userInfo);

        logger.info('User authenticated', {
          username: identity.username,
          groups: identity.groups.size,
        });
        return { outcome: 'AUTHENTICATED', identity };
      } catch (error) {
        if (error instanceof LoginError) {
          logger.warn('Login attempt failed', { reason: error.reason, message: error.message });
          return { outcome: 'FAILED', error };
        }
        throw error;
      }
    },

    async close(): Promise<void> {
      await stateTokens.close();
    },
  };
}
