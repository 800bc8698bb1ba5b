export type ValidatorErrorCode =
  | 'TEMPLATE_PARSE_ERROR'
  | 'CSV_PARSE_ERROR'
  | 'INVALID_REQUEST'
  | 'IO_ERROR'
  | 'UNKNOWN_ERROR';

export type ValidatorErrorDetails = Record<string, unknown>;

/**
 * Fault raised by the validator when a run cannot proceed.
 *
 * Data problems inside a well-formed submission are never raised: they are
 * reported as findings on the ValidationResult.
 */
export class ValidatorError extends Error {
  readonly code: ValidatorErrorCode;
  readonly details?: ValidatorErrorDetails;
  readonly cause?: unknown;

  constructor(args: {
    code: ValidatorErrorCode;
    message: string;
    details?: ValidatorErrorDetails;
    cause?: unknown;
  }) {
    super(args.message);
    this.name = 'ValidatorError';
    this.code = args.code;
    this.details = args.details;
    this.cause = args.cause;
  }
}

/** The template payload is not valid JSON or does not have the template shape. */
export class TemplateParseError extends ValidatorError {
  readonly issues: readonly string[];

  constructor(message: string, issues: readonly string[] = [], cause?: unknown) {
    super({
      code: 'TEMPLATE_PARSE_ERROR',
      message,
      details: issues.length > 0 ? { issues: [...issues] } : undefined,
      cause,
    });
    this.name = 'TemplateParseError';
    this.issues = issues;
  }
}

/** The input cannot be read as delimited text at all. */
export class CsvParseError extends ValidatorError {
  readonly line?: number;

  constructor(message: string, line?: number, cause?: unknown) {
    super({
      code: 'CSV_PARSE_ERROR',
      message,
      details: line === undefined ? undefined : { line },
      cause,
    });
    this.name = 'CsvParseError';
    this.line = line;
  }
}

export const isValidatorError = (err: unknown): err is ValidatorError =>
  err instanceof ValidatorError;

/** Parse failures end a single file's run; everything else is unexpected. */
export const isUnprocessableInput = (err: unknown): err is TemplateParseError | CsvParseError =>
  err instanceof TemplateParseError || err instanceof CsvParseError;

export const asValidatorError = (err: unknown): ValidatorError => {
  if (isValidatorError(err)) return err;
  const message = err instanceof Error ? err.message : 'Unexpected error.';
  return new ValidatorError({
    code: 'UNKNOWN_ERROR',
    message,
    cause: err,
  });
};
