/**
 * Import failures. Both leave the spot store untouched.
 */

/** The caller abandoned the import (e.g. a newer import superseded it) */
export class ImportAbortedError extends Error {
  readonly status = 409;

  constructor(message = "Import was cancelled") {
    super(message);
    this.name = "ImportAbortedError";
  }
}

/** The geodata source could not be reached or returned an error */
export class ImportFailedError extends Error {
  readonly status = 502;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ImportFailedError";
  }
}
