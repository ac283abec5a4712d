import { OpenProjectHttpError } from '../errors.js';
import { getEmbedded, isRecord } from '../hal.js';

type RemapRule = string | ((error: OpenProjectHttpError) => string);

/**
 * Give an HTTP error of one of the listed statuses a domain message. Status,
 * request and response bodies are kept; anything else comes back unchanged.
 *
 * @example
 * catch (error) { throw remapHttpError(error, { 404: 'Query not found.' }); }
 */
export function remapHttpError(error: unknown, rules: Partial<Record<number, RemapRule>>): unknown {
  if (!(error instanceof OpenProjectHttpError)) return error;

  const rule = rules[error.statusCode];
  if (rule === undefined) return error;

  return error.withMessage(typeof rule === 'string' ? rule : rule(error));
}

/** "Validation failed: a; b" from `_embedded.errors`, else the body message. */
export function validationFailureMessage(error: OpenProjectHttpError): string {
  const body = error.responseJson;
  if (!body) return 'Validation failed.';

  const errors = getEmbedded(body, 'errors');
  const messages = Array.isArray(errors)
    ? errors.filter(isRecord).flatMap((entry) => (typeof entry.message === 'string' && entry.message ? [entry.message] : []))
    : [];
  if (messages.length > 0) {
    return `Validation failed: ${messages.join('; ')}`;
  }

  return typeof body.message === 'string' && body.message ? body.message : 'Validation failed.';
}
