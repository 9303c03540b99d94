/**
 * Default configuration values
 */

/** Scope requested when none is configured */
export const DEFAULT_SCOPE = 'email profile';

/** Userinfo field read as the username */
export const DEFAULT_USERNAME_CLAIM = 'username';

/** Userinfo field read as the group list */
export const DEFAULT_GROUPS_CLAIM = 'groups';

/** State token validity: 10 minutes */
export const DEFAULT_MAX_STATE_VALIDITY_MINUTES = 10;

/** Timeout for each call to the identity provider: 10 seconds */
export const HTTP_TIMEOUT_MS = 10_000;

/** Random bytes per state token (256 bits) */
export const STATE_TOKEN_BYTES = 32;

/**
 * How long a state entry is kept after it expires, so late callbacks are
 * reported as expired or replayed rather than unknown: 10 minutes.
 */
export const DEFAULT_STATE_RETENTION_MS = 10 * 60 * 1000;

/** Interval of the background purge of expired state entries: 1 minute */
export const DEFAULT_STATE_PURGE_INTERVAL_MS = 60 * 1000;

/** Express session lifetime: 8 hours (in milliseconds) */
export const DEFAULT_SESSION_MAX_AGE_MS = 8 * 60 * 60 * 1000;

/**
 * Default routes of the Express binding (relative to its mount path)
 */
export const DEFAULT_ROUTES = {
  login: '/login',
  callback: '/callback',
};

/**
 * Storage namespace constants
 * These are used to namespace data in the Keyv store to prevent collisions.
 */
export const STORAGE_NAMESPACES = {
  /** Issued CSRF state tokens */
  STATE_TOKENS: 'state-tokens',
  /** Express session data */
  EXPRESS_SESSIONS: 'express-sessions',
} as const;

/**
 * Environment variables read by loadLoginConfigFromEnv
 */
export const ENV_VARIABLES = {
  authorizationEndpoint: 'OAUTH2_AUTHORIZATION_ENDPOINT',
  tokenEndpoint: 'OAUTH2_TOKEN_ENDPOINT',
  userInfoEndpoint: 'OAUTH2_USERINFO_ENDPOINT',
  clientId: 'OAUTH2_CLIENT_ID',
  clientSecret: 'OAUTH2_CLIENT_SECRET',
  redirectUri: 'OAUTH2_REDIRECT_URI',
  issuer: 'OAUTH2_ISSUER',
  scope: 'OAUTH2_SCOPE',
  usernameClaim: 'OAUTH2_USERNAME_CLAIM_TYPE',
  groupsClaim: 'OAUTH2_GROUPS_CLAIM_TYPE',
  maxStateValidityMinutes: 'OAUTH2_MAX_STATE_VALIDITY',
} as const;
