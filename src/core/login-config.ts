import { z } from 'zod';
import type { OAuth2LoginConfig, ResolvedLoginConfig } from '../types/config.js';
import { ConfigurationError } from './errors.js';
import {
  DEFAULT_SCOPE,
  DEFAULT_USERNAME_CLAIM,
  DEFAULT_GROUPS_CLAIM,
  DEFAULT_MAX_STATE_VALIDITY_MINUTES,
  ENV_VARIABLES,
} from './config.js';

const httpUrl = z
  .string()
  .url()
  .refine((value) => /^https?:\/\//i.test(value), { message: 'must be an http(s) URL' });

const nonEmpty = z.string().trim().min(1);

/**
 * Schema of the login configuration. Optional fields fall back to defaults.
 */
export const LoginConfigSchema = z.object({
  authorizationEndpoint: httpUrl,
  tokenEndpoint: httpUrl,
  userInfoEndpoint: httpUrl,
  clientId: nonEmpty,
  clientSecret: nonEmpty,
  redirectUri: httpUrl,
  issuer: httpUrl.optional(),
  scope: nonEmpty.default(DEFAULT_SCOPE),
  usernameClaim: nonEmpty.default(DEFAULT_USERNAME_CLAIM),
  groupsClaim: nonEmpty.default(DEFAULT_GROUPS_CLAIM),
  maxStateValidityMinutes: z.coerce
    .number()
    .int()
    .positive()
    .default(DEFAULT_MAX_STATE_VALIDITY_MINUTES),
});

/**
 * Validate a login configuration and apply defaults.
 *
 * @throws ConfigurationError naming every missing or malformed field.
 * Field values are never included, since some of them are secrets.
 */
export function resolveLoginConfig(config: OAuth2LoginConfig): ResolvedLoginConfig {
  const parsed = LoginConfigSchema.safeParse({
    authorizationEndpoint: config.authorizationEndpoint,
    tokenEndpoint: config.tokenEndpoint,
    userInfoEndpoint: config.userInfoEndpoint,
    clientId: config.clientId,
    clientSecret: config.clientSecret,
    redirectUri: config.redirectUri,
    issuer: config.issuer,
    scope: config.scope,
    usernameClaim: config.usernameClaim,
    groupsClaim: config.groupsClaim,
    maxStateValidityMinutes: config.maxStateValidityMinutes,
  });

  if (!parsed.success) {
    const fields = new Set(parsed.error.issues.map((issue) => issue.path.join('.')));
    throw new ConfigurationError(Array.from(fields));
  }

  const { issuer, ...settings } = parsed.data;
  return Object.freeze({
    ...settings,
    issuer: issuer ?? new URL(settings.authorizationEndpoint).origin,
  });
}

/**
 * Read the login configuration from environment variables.
 *
 * Variables: `OAUTH2_AUTHORIZATION_ENDPOINT`, `OAUTH2_TOKEN_ENDPOINT`,
 * `OAUTH2_USERINFO_ENDPOINT`, `OAUTH2_CLIENT_ID`, `OAUTH2_CLIENT_SECRET`,
 * `OAUTH2_REDIRECT_URI`, and optionally `OAUTH2_ISSUER`, `OAUTH2_SCOPE`,
 * `OAUTH2_USERNAME_CLAIM_TYPE`, `OAUTH2_GROUPS_CLAIM_TYPE`,
 * `OAUTH2_MAX_STATE_VALIDITY` (minutes).
 *
 * Missing required variables surface as a ConfigurationError once the result
 * is passed to {@link resolveLoginConfig} or `createOAuth2Login`.
 *
 * @example
 * ```typescript
 * const login = createOAuth2Login({
 *   ...loadLoginConfigFromEnv(),
 *   store: new Keyv(),
 * });
 * ```
 */
export function loadLoginConfigFromEnv(
  env: Record<string, string | undefined> = process.env
): OAuth2LoginConfig {
  const optional = (name: string): string | undefined => {
    const value = env[name]?.trim();
    return value ? value : undefined;
  };

  const validity = optional(ENV_VARIABLES.maxStateValidityMinutes);

  return {
    authorizationEndpoint: env[ENV_VARIABLES.authorizationEndpoint] ?? '',
    tokenEndpoint: env[ENV_VARIABLES.tokenEndpoint] ?? '',
    userInfoEndpoint: env[ENV_VARIABLES.userInfoEndpoint] ?? '',
    clientId: env[ENV_VARIABLES.clientId] ?? '',
    clientSecret: env[ENV_VARIABLES.clientSecret] ?? '',
    redirectUri: env[ENV_VARIABLES.redirectUri] ?? '',
    issuer: optional(ENV_VARIABLES.issuer),
    scope: optional(ENV_VARIABLES.scope),
    usernameClaim: optional(ENV_VARIABLES.usernameClaim),
    groupsClaim: optional(ENV_VARIABLES.groupsClaim),
    maxStateValidityMinutes: validity === undefined ? undefined : Number(validity),
  };
}
