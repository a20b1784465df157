import * as errors from '../errors.js';

/**
 * Successful tool result carrying a JSON payload as text.
 */
export function jsonResult(payload: unknown) {
  return {
    content: [{ type: 'text' as const, text: JSON.stringify(payload) }],
  };
}

/**
 * Converts anything a handler caught into a domain error response.
 */
export function caughtError(e: unknown): errors.DomainErrorResponse {
  return errors.domainError(errors.messageOf(e));
}
