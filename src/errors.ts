/**
 * Error type raised by the fill-in engine and its collaborators.
 *
 * Only fatal conditions reach the caller. Malformed spans also use this
 * class internally, but the engine catches them, logs a warning and
 * substitutes an empty string.
 */

export type FillInErrorCode =
  | 'MALFORMED_SPAN'
  | 'UNREGISTERED_TAG'
  | 'INVALID_TAG'
  | 'BAD_FUNCTION_CALL'
  | 'UNKNOWN_FUNCTION'
  | 'TEMPLATE_NOT_FOUND'
  | 'TEMPLATE_UNREADABLE'
  | 'INVALID_CONFIG';

export class FillInError extends Error {
  constructor(
    message: string,
    public code: FillInErrorCode,
    public detail?: string,
  ) {
    super(message);
    this.name = 'FillInError';
  }
}

export function isFillInError(
  err: unknown,
  code?: FillInErrorCode,
): err is FillInError {
  return err instanceof FillInError && (code === undefined || err.code === code);
}
