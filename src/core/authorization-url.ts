import type { ResolvedLoginConfig } from '../types/config.js';

/**
 * Build the IdP authorization URL for one login attempt.
 *
 * Query parameters already present on the configured endpoint are kept;
 * `response_type`, `client_id`, `redirect_uri`, `scope` and `state` are set
 * (and URL-encoded) on top of them.
 *
 * @param config - Resolved login configuration
 * @param state - Value of a freshly issued state token
 * @returns The URL to redirect the browser to
 */
export function buildAuthorizationUrl(
  config: Pick<ResolvedLoginConfig, 'authorizationEndpoint' | 'clientId' | 'redirectUri' | 'scope'>,
  state: string
): string {
  const url = new URL(config.authorizationEndpoint);
  url.searchParams.set('response_type', 'code');
  url.searchParams.set('client_id', config.clientId);
  url.searchParams.set('redirect_uri', config.redirectUri);
  url.searchParams.set('scope', config.scope);
  url.searchParams.set('state', state);
  return url.toString();
}
