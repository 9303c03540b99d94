import type { CallbackParams } from '../types/identity.js';
import type { Logger } from '../utils/logger.js';
import type { StateTokenManager } from './state-token-manager.js';
import { AuthorizationDeniedError, CsrfError, MissingAuthorizationCodeError } from './errors.js';

/**
 * Read a single-valued parameter. Empty or repeated parameters count as absent.
 */
function singleParam(params: CallbackParams, name: string): string | undefined {
  const value = params[name];
  return typeof value === 'string' && value.length > 0 ? value : undefined;
}

/**
 * Validate the query parameters of an IdP callback and extract the
 * authorization code.
 *
 * The state is checked (and consumed) before anything else is looked at, so
 * a callback without a live state never reaches the token exchange.
 *
 * @throws CsrfError when the state is missing, unknown, expired or replayed
 * @throws AuthorizationDeniedError when the IdP sent an `error` parameter
 * @throws MissingAuthorizationCodeError when no code is present
 */
export async function validateCallback(
  params: CallbackParams,
  stateTokens: Pick<StateTokenManager, 'validate'>,
  logger: Logger
): Promise<string> {
  const state = singleParam(params, 'state');
  if (!state) {
    throw new CsrfError('missing_state');
  }

  const validation = await stateTokens.validate(state);
  if (!validation.valid) {
    throw new CsrfError(validation.reason);
  }

  const idpError = singleParam(params, 'error');
  if (idpError) {
    logger.warn('Identity provider returned an error', {
      error: idpError,
      description: singleParam(params, 'error_description'),
    });
    throw new AuthorizationDeniedError(idpError);
  }

  const code = singleParam(params, 'code');
  if (!code) {
    throw new MissingAuthorizationCodeError();
  }

  return code;
}
