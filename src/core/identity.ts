import type { IdentityAssertion, UserInfo } from '../types/identity.js';

/**
 * Turn resolved userinfo into the identity handed to the host.
 */
export function assembleIdentity(userInfo: UserInfo): IdentityAssertion {
  return Object.freeze({
    username: userInfo.username,
    groups: new Set(userInfo.groups),
  });
}
