/**
 * packages/core/src/errors.ts - Error type for API boundaries.
 *
 * Inside the pipeline failures travel as `LayoutResult` values. `QuireError`
 * is what the throwing convenience API and the Node.js surface raise.
 */

import { type LayoutError, formatLayoutError } from "./layout/errors.js";

export type QuireErrorCode =
  | "QUIRE_INVALID_LAYOUT"
  | "QUIRE_INVALID_DOCUMENT"
  | "QUIRE_INVALID_ARGS"
  | "QUIRE_IO_ERROR";

export class QuireError extends Error {
  override readonly name = "QuireError";
  readonly code: QuireErrorCode;
  /** Structured cause when the error comes from layout transformation. */
  readonly layoutError: LayoutError | undefined;

  constructor(
    code: QuireErrorCode,
    message?: string,
    options: Readonly<{ layoutError?: LayoutError; cause?: unknown }> = {},
  ) {
    super(message ?? code, options.cause === undefined ? undefined : { cause: options.cause });
    this.code = code;
    this.layoutError = options.layoutError;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, QuireError);
    }
  }
}

export function quireErrorFromLayout(error: LayoutError): QuireError {
  const code = error.code === "invalid_document" ? "QUIRE_INVALID_DOCUMENT" : "QUIRE_INVALID_LAYOUT";
  return new QuireError(code, formatLayoutError(error), { layoutError: error });
}
