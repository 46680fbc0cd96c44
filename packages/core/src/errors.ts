/**
 * packages/core/src/errors.ts - Error codes and the validation result union.
 */

/** One code per kind of rejected input. */
export type CellsketchErrorCode =
  | "CSK_INVALID_ELEMENT"
  | "CSK_UNKNOWN_ELEMENT"
  | "CSK_INVALID_ANCHOR"
  | "CSK_INVALID_OPTIONS"
  | "CSK_INPUT_ERROR";

/** Thrown by the entry points that do not return a Result. */
export class CellsketchError extends Error {
  override readonly name = "CellsketchError";
  readonly code: CellsketchErrorCode;

  constructor(code: CellsketchErrorCode, message?: string) {
    super(message ?? code);
    this.code = code;
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, CellsketchError);
    }
  }
}

/** Structured failure carried by validation results. */
export type Fatal = Readonly<{ code: CellsketchErrorCode; detail: string }>;

/**
 * Validation result: success with value, or failure with fatal error.
 */
export type Result<T> = Readonly<{ ok: true; value: T }> | Readonly<{ ok: false; fatal: Fatal }>;

export function fatalToError(fatal: Fatal): CellsketchError {
  return new CellsketchError(fatal.code, fatal.detail);
}
