export type ErrorDetails = Record<string, unknown>;

/**
 * Base class for every failure raised by the lexalign packages. `code` is a
 * stable identifier callers can switch on; `details` carries the values that
 * explain the failure.
 */
export class LexalignError extends Error {
  readonly code: string;
  readonly details: ErrorDetails;

  constructor(
    code: string,
    message: string,
    details: ErrorDetails = {},
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
    this.details = details;
  }
}

export const isLexalignError = (error: unknown): error is LexalignError =>
  error instanceof LexalignError;

export class EnvironmentError extends LexalignError {
  constructor(readonly issues: string[]) {
    super(
      "INVALID_ENVIRONMENT",
      `Missing or invalid environment variables: ${issues.join("; ")}`,
      { issues },
    );
  }
}
