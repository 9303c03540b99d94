import type { StateRejectionReason } from '../types/state.js';

/**
 * Base class of every failure in the login flow.
 *
 * Messages carry diagnostic detail (status codes, claim names, the CSRF
 * condition) but never token values, the client secret or response bodies.
 */
export abstract class LoginError extends Error {
  /** Machine-readable failure reason */
  abstract readonly reason: string;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * A required endpoint or credential is missing or malformed.
 * Raised once, when the login flow is created.
 */
export class ConfigurationError extends LoginError {
  override readonly reason = 'invalid_configuration';

  /** Names of the offending configuration fields */
  readonly fields: string[];

  constructor(fields: string[]) {
    super(`Invalid OAuth2 configuration: ${fields.join(', ')}`);
    this.fields = fields;
  }
}

export type CsrfFailure = StateRejectionReason | 'missing_state';

const CSRF_MESSAGES: Record<CsrfFailure, string> = {
  missing_state: 'Callback is missing the state parameter',
  not_found: 'State token was never issued',
  expired: 'State token has expired',
  already_consumed: 'State token has already been used',
};

/**
 * The callback's state parameter did not match a live, unused state token.
 */
export class CsrfError extends LoginError {
  override readonly reason: CsrfFailure;

  constructor(reason: CsrfFailure) {
    super(CSRF_MESSAGES[reason]);
    this.reason = reason;
  }
}

/**
 * The callback carried a valid state but no authorization code.
 */
export class MissingAuthorizationCodeError extends LoginError {
  override readonly reason = 'missing_authorization_code';

  constructor() {
    super('Callback is missing the authorization code');
  }
}

/**
 * The identity provider redirected back with an `error` parameter.
 */
export class AuthorizationDeniedError extends LoginError {
  override readonly reason = 'authorization_denied';

  /** The `error` code sent by the identity provider */
  readonly errorCode: string;

  constructor(errorCode: string) {
    super(`Identity provider returned error: ${errorCode}`);
    this.errorCode = errorCode;
  }
}

/**
 * Failure reasons shared by the two calls to the identity provider.
 */
export type IdpCallFailure = 'timeout' | 'network' | 'http_status' | 'invalid_response';

export type TokenExchangeFailure = IdpCallFailure | 'missing_access_token';

/**
 * The authorization code could not be exchanged for an access token.
 */
export class TokenExchangeError extends LoginError {
  override readonly reason: TokenExchangeFailure;

  /** HTTP status of the token endpoint response, when one was received */
  readonly status?: number;

  constructor(reason: TokenExchangeFailure, message: string, details: { status?: number } = {}) {
    super(message);
    this.reason = reason;
    this.status = details.status;
  }
}

export type UserInfoFailure = IdpCallFailure | 'missing_claim';

/**
 * Identity claims could not be retrieved from the userinfo endpoint.
 */
export class UserInfoError extends LoginError {
  override readonly reason: UserInfoFailure;

  /** HTTP status of the userinfo response, when one was received */
  readonly status?: number;

  /** Name of the missing claim for `missing_claim` */
  readonly claim?: string;

  constructor(
    reason: UserInfoFailure,
    message: string,
    details: { status?: number; claim?: string } = {}
  ) {
    super(message);
    this.reason = reason;
    this.status = details.status;
    this.claim = details.claim;
  }
}
