import { describe, it, expect } from 'vitest';
import {
  LoginError,
  ConfigurationError,
  CsrfError,
  MissingAuthorizationCodeError,
  AuthorizationDeniedError,
  TokenExchangeError,
  UserInfoError,
} from './errors.js';

describe('errors', () => {
  describe('ConfigurationError', () => {
    it('should list the offending fields', () => {
      const error = new ConfigurationError(['clientId', 'tokenEndpoint']);

      expect(error.message).toBe('Invalid OAuth2 configuration: clientId, tokenEndpoint');
      expect(error.fields).toEqual(['clientId', 'tokenEndpoint']);
      expect(error.reason).toBe('invalid_configuration');
    });
  });

  describe('CsrfError', () => {
    it.each([
      ['missing_state', 'Callback is missing the state parameter'],
      ['not_found', 'State token was never issued'],
      ['expired', 'State token has expired'],
      ['already_consumed', 'State token has already been used'],
    ] as const)('should describe %s', (reason, message) => {
      const error = new CsrfError(reason);

      expect(error.reason).toBe(reason);
      expect(error.message).toBe(message);
    });
  });

  describe('MissingAuthorizationCodeError', () => {
    it('should have a fixed reason', () => {
      expect(new MissingAuthorizationCodeError().reason).toBe('missing_authorization_code');
    });
  });

  describe('AuthorizationDeniedError', () => {
    it('should keep the identity provider error code', () => {
      const error = new AuthorizationDeniedError('access_denied');

      expect(error.errorCode).toBe('access_denied');
      expect(error.message).toBe('Identity provider returned error: access_denied');
    });
  });

  describe('TokenExchangeError', () => {
    it('should carry the HTTP status', () => {
      const error = new TokenExchangeError('http_status', 'Failed', { status: 400 });

      expect(error.reason).toBe('http_status');
      expect(error.status).toBe(400);
    });

    it('should take details the same way as UserInfoError', () => {
      const tokenError = new TokenExchangeError('http_status', 'Failed', { status: 502 });
      const userInfoError = new UserInfoError('http_status', 'Failed', { status: 502 });

      expect(tokenError.status).toBe(userInfoError.status);
      expect(new TokenExchangeError('timeout', 'Timed out').status).toBeUndefined();
    });
  });

  describe('UserInfoError', () => {
    it('should carry the missing claim name', () => {
      const error = new UserInfoError('missing_claim', 'Missing', { claim: 'username' });

      expect(error.claim).toBe('username');
      expect(error.status).toBeUndefined();
    });
  });

  it('should be LoginError and Error instances named after their class', () => {
    const errors = [
      new ConfigurationError([]),
      new CsrfError('expired'),
      new MissingAuthorizationCodeError(),
      new AuthorizationDeniedError('server_error'),
      new TokenExchangeError('timeout', 'Timed out'),
      new UserInfoError('network', 'Unreachable'),
    ];

    for (const error of errors) {
      expect(error).toBeInstanceOf(LoginError);
      expect(error).toBeInstanceOf(Error);
      expect(error.name).toBe(error.constructor.name);
    }
  });
});
