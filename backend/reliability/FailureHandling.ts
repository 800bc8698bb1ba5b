import crypto from 'node:crypto';

import { telemetry } from '../telemetry/Telemetry';
import {
  asValidatorError,
  type ValidatorError,
  type ValidatorErrorCode,
} from './ValidatorError';

export type PublicApiError = {
  errorId: string;
  code: ValidatorErrorCode;
  message: string;
  details?: Record<string, unknown>;
};

export type ApiErrorResponse = {
  success: false;
  errorMessage: string;
  error: PublicApiError;
};

const httpStatusFor = (code: ValidatorErrorCode): number => {
  switch (code) {
    case 'INVALID_REQUEST':
      return 400;
    case 'TEMPLATE_PARSE_ERROR':
    case 'CSV_PARSE_ERROR':
      return 422;
    case 'IO_ERROR':
    case 'UNKNOWN_ERROR':
    default:
      return 500;
  }
};

const publicMessageFor = (err: ValidatorError): string => {
  // Parse failures describe the caller's own input; anything else stays generic.
  switch (err.code) {
    case 'TEMPLATE_PARSE_ERROR':
      return `Could not process template: ${err.message}`;
    case 'CSV_PARSE_ERROR':
      return `Could not process file: ${err.message}`;
    case 'INVALID_REQUEST':
      return err.message || 'Invalid request.';
    case 'IO_ERROR':
    case 'UNKNOWN_ERROR':
    default:
      return 'Unexpected error.';
  }
};

const publicDetailsFor = (err: ValidatorError): Record<string, unknown> | undefined => {
  if (err.code === 'TEMPLATE_PARSE_ERROR' || err.code === 'CSV_PARSE_ERROR') {
    return err.details;
  }
  return undefined;
};

export function mapErrorToApiResponse(
  err: unknown,
  context: { operation: string },
): {
  status: number;
  body: ApiErrorResponse;
} {
  const errorId = crypto.randomUUID();
  const failure = asValidatorError(err);

  telemetry.record({
    name: 'api.error',
    durationMs: 0,
    tags: {
      operation: context.operation,
      code: failure.code,
      errorId,
    },
    metrics: {},
  });

  // eslint-disable-next-line no-console
  console.error(
    JSON.stringify({
      type: 'validator.error',
      errorId,
      operation: context.operation,
      code: failure.code,
      message: failure.message,
      details: failure.details,
      stack: failure.stack,
    }),
  );

  const publicMessage = publicMessageFor(failure);
  const details = publicDetailsFor(failure);

  return {
    status: httpStatusFor(failure.code),
    body: {
      success: false,
      errorMessage: publicMessage,
      error: {
        errorId,
        code: failure.code,
        message: publicMessage,
        ...(details ? { details } : {}),
      },
    },
  };
}
