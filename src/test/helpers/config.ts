import type { OAuth2LoginConfig } from '../../types/config.js';
import {
  TEST_AUTHORIZATION_ENDPOINT,
  TEST_TOKEN_ENDPOINT,
  TEST_USERINFO_ENDPOINT,
  TEST_CLIENT_ID,
  TEST_CLIENT_SECRET,
  TEST_REDIRECT_URI,
} from '../constants.js';

/**
 * Creates a valid login configuration for testing.
 */
export function createTestConfig(overrides?: Partial<OAuth2LoginConfig>): OAuth2LoginConfig {
  return {
    authorizationEndpoint: TEST_AUTHORIZATION_ENDPOINT,
    tokenEndpoint: TEST_TOKEN_ENDPOINT,
    userInfoEndpoint: TEST_USERINFO_ENDPOINT,
    clientId: TEST_CLIENT_ID,
    clientSecret: TEST_CLIENT_SECRET,
    redirectUri: TEST_REDIRECT_URI,
    ...overrides,
  };
}
