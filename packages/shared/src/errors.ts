/**
 * Error Taxonomy
 *
 * ExtractionError is raised by the text and field extraction adapters;
 * PipelineError is the only error the orchestrator lets out. Details are
 * redacted on construction so they are safe to log and return to callers.
 */

import { redactSecrets } from './redact';

export type ExtractionErrorKind =
  | 'no_content'
  | 'provider_failure'
  | 'malformed_output'
  | 'unsupported_format';

export type PipelineErrorKind =
  | 'invalid_input'
  | 'no_extractable_text'
  | 'upstream_failure'
  | 'malformed_output';

/**
 * Best-effort message of an unknown thrown value.
 */
export function describeError(error: unknown): string {
  // Errors from another realm (vm contexts, Node internals) fail instanceof
  if (typeof error === 'object' && error !== null && 'message' in error) {
    const { message } = error;
    if (typeof message === 'string' && message.length > 0) {
      return message;
    }
  }
  if (error instanceof Error) {
    return error.name;
  }
  return String(error);
}

export class ExtractionError extends Error {
  readonly kind: ExtractionErrorKind;
  readonly detail: string;

  constructor(kind: ExtractionErrorKind, detail: string, options?: { cause?: unknown }) {
    const safeDetail = redactSecrets(detail);
    super(safeDetail, options);
    this.name = 'ExtractionError';
    this.kind = kind;
    this.detail = safeDetail;
  }
}

export class PipelineError extends Error {
  readonly kind: PipelineErrorKind;
  readonly detail: string;

  constructor(kind: PipelineErrorKind, detail: string, options?: { cause?: unknown }) {
    const safeDetail = redactSecrets(detail);
    super(safeDetail, options);
    this.name = 'PipelineError';
    this.kind = kind;
    this.detail = safeDetail;
  }
}

export function isExtractionError(error: unknown): error is ExtractionError {
  return error instanceof ExtractionError;
}

export function isPipelineError(error: unknown): error is PipelineError {
  return error instanceof PipelineError;
}

/**
 * Whether an error came from an AbortSignal firing.
 */
export function isAbortError(error: unknown): boolean {
  if (typeof error !== 'object' || error === null || !('name' in error)) {
    return false;
  }
  return error.name === 'AbortError' || error.name === 'APIUserAbortError';
}
