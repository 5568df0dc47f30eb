/**
 * Error Handling Utilities
 *
 * Type-safe helpers for `catch (e: unknown)` plus the converter's own
 * error taxonomy.
 */

export type ConvertErrorKind = 'input-io' | 'parse' | 'schema' | 'output-io';

/**
 * A conversion failure. None of these are retried: the same input and
 * environment always fail the same way.
 */
export class ConvertError extends Error {
  readonly kind: ConvertErrorKind;

  constructor(kind: ConvertErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ConvertError';
    this.kind = kind;
  }
}

export function isConvertError(e: unknown): e is ConvertError {
  return e instanceof ConvertError;
}

/**
 * Check if a value is a Node.js ErrnoException
 */
export function isNodeError(e: unknown): e is NodeJS.ErrnoException {
  return e instanceof Error && 'code' in e;
}

/**
 * Extract a human-readable error message from an unknown error.
 */
export function toErrorMessage(e: unknown): string {
  if (e instanceof Error) {
    return e.message;
  }
  if (typeof e === 'string') {
    return e;
  }
  if (e && typeof e === 'object' && 'message' in e && typeof e.message === 'string') {
    return e.message;
  }
  return String(e);
}

/**
 * Extract the error stack if available
 */
export function toErrorStack(e: unknown): string | undefined {
  if (e instanceof Error) {
    return e.stack;
  }
  return undefined;
}

/**
 * Check if an error has a specific code (common for Node.js errors)
 */
export function hasErrorCode(e: unknown, code: string): boolean {
  return isNodeError(e) && e.code === code;
}

export function isNotFoundError(e: unknown): boolean {
  return hasErrorCode(e, 'ENOENT');
}

export function isPermissionError(e: unknown): boolean {
  return hasErrorCode(e, 'EACCES') || hasErrorCode(e, 'EPERM');
}

export function isDirectoryError(e: unknown): boolean {
  return hasErrorCode(e, 'EISDIR');
}
