/**
 * Shared error types.
 *
 * Password rejections are never errors; these cover the faults around the
 * core: word-list files and configuration.
 */

export enum GateErrorCode {
  WORDLIST_NOT_FOUND = 'GATE_WORDLIST_NOT_FOUND',
  WORDLIST_READ_ERROR = 'GATE_WORDLIST_READ_ERROR',
  INVALID_CONFIG = 'GATE_INVALID_CONFIG',
  INTERNAL_ERROR = 'GATE_INTERNAL_ERROR',
}

/** Base error class for password-gate faults. */
export class GateError extends Error {
  public readonly code: GateErrorCode;
  public readonly details: Record<string, unknown> | undefined;

  constructor(
    code: GateErrorCode,
    message: string,
    details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'GateError';
    this.code = code;
    this.details = details;
  }
}

/** Wraps an unknown thrown value, keeping GateErrors as they are. */
export function wrapError(error: unknown, context: string): GateError {
  if (error instanceof GateError) {
    return error;
  }
  const message = error instanceof Error ? error.message : 'Unknown error';
  return new GateError(
    GateErrorCode.INTERNAL_ERROR,
    `${context}: ${message}`,
    { originalError: message }
  );
}
