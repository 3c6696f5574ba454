/**
 * HTTP error mapping
 */

import type { NextFunction, Request, Response } from 'express';
import multer from 'multer';
import {
  getCorrelationId,
  isPipelineError,
  logger,
  type ErrorEnvelope,
  type PipelineErrorKind,
} from '@policy-extract/shared';

export const PIPELINE_ERROR_STATUS: Record<PipelineErrorKind, number> = {
  invalid_input: 400,
  no_extractable_text: 422,
  upstream_failure: 502,
  malformed_output: 502,
};

/**
 * Error raised by the HTTP layer itself (auth, missing upload, bad body).
 */
export class HttpError extends Error {
  readonly status: number;
  readonly code: string;

  constructor(status: number, code: string, message: string) {
    super(message);
    this.name = 'HttpError';
    this.status = status;
    this.code = code;
  }
}

export interface ErrorResponse {
  status: number;
  code: string;
  message: string;
}

/** body-parser's rejection of a malformed JSON body */
function isBodyParseError(error: unknown): boolean {
  return (
    typeof error === 'object' &&
    error !== null &&
    'type' in error &&
    error.type === 'entity.parse.failed'
  );
}

/**
 * Status, code and client-facing message for an error.
 */
export function toErrorResponse(error: unknown, maxDocumentBytes: number): ErrorResponse {
  if (isPipelineError(error)) {
    return { status: PIPELINE_ERROR_STATUS[error.kind], code: error.kind, message: error.detail };
  }

  if (error instanceof HttpError) {
    return { status: error.status, code: error.code, message: error.message };
  }

  if (error instanceof multer.MulterError) {
    if (error.code === 'LIMIT_FILE_SIZE') {
      return {
        status: 400,
        code: 'invalid_input',
        message: `File too large. Maximum allowed: ${maxDocumentBytes} bytes`,
      };
    }
    return { status: 400, code: 'invalid_input', message: `Invalid upload: ${error.message}` };
  }

  if (isBodyParseError(error)) {
    return { status: 400, code: 'invalid_input', message: 'Request body is not valid JSON' };
  }

  return { status: 500, code: 'internal_error', message: 'Internal server error' };
}

/**
 * Correlation ID of the request a response belongs to.
 */
export function correlationIdOf(res: Response): string {
  const header = res.getHeader('X-Correlation-Id');
  return typeof header === 'string' ? header : getCorrelationId();
}

export function sendError(res: Response, status: number, code: string, message: string): void {
  const body: ErrorEnvelope = {
    error: {
      code,
      message,
      correlation_id: correlationIdOf(res),
    },
  };
  res.status(status).json(body);
}

/**
 * Express error middleware rendering every failure as an ErrorEnvelope.
 */
export function createErrorHandler(maxDocumentBytes: number) {
  return (error: unknown, req: Request, res: Response, next: NextFunction): void => {
    if (res.headersSent) {
      next(error);
      return;
    }

    const response = toErrorResponse(error, maxDocumentBytes);

    if (response.status >= 500) {
      logger.error('Request failed', error, { path: req.path, code: response.code });
    } else {
      logger.warn('Request rejected', { path: req.path, code: response.code, reason: response.message });
    }

    sendError(res, response.status, response.code, response.message);
  };
}
