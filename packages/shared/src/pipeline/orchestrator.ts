/**
 * Pipeline Orchestrator
 *
 * validate -> extract text -> extract fields. Each stage fails fast and every
 * failure leaves as a PipelineError; there are no retries and no partial
 * records.
 */

import { setContextFilename } from '../context';
import {
  describeError,
  isExtractionError,
  isPipelineError,
  PipelineError,
  type ExtractionErrorKind,
  type PipelineErrorKind,
} from '../errors';
import type { FieldExtractor } from '../field-extraction/llm-extraction';
import { logger } from '../logger';
import { documentsProcessedCounter, stageDurationHistogram } from '../metrics';
import type { TextExtractor } from '../text-extraction/types';
import type { DeploymentMode, DocumentPolicy, InsuranceRecord, UploadedDocument } from '../types';
import { validateDocument } from './validator';

export type PipelineStage = 'validation' | 'text_extraction' | 'field_extraction';

const EXTRACTION_ERROR_MAPPING: Record<ExtractionErrorKind, PipelineErrorKind> = {
  no_content: 'no_extractable_text',
  provider_failure: 'upstream_failure',
  unsupported_format: 'invalid_input',
  malformed_output: 'malformed_output',
};

export interface ExtractionPipelineOptions {
  textExtractor: TextExtractor;
  fieldExtractor: FieldExtractor;
  policy: DocumentPolicy;
}

export interface PipelineRunOptions {
  signal?: AbortSignal;
}

const CANCELLED = 'Request cancelled';

function checkCancelled(signal: AbortSignal | undefined): void {
  if (signal?.aborted) {
    throw new PipelineError('upstream_failure', CANCELLED, { cause: signal.reason });
  }
}

/**
 * Convert whatever a stage threw into a PipelineError.
 */
export function toPipelineError(error: unknown, stage: PipelineStage): PipelineError {
  if (isPipelineError(error)) {
    return error;
  }
  if (isExtractionError(error)) {
    return new PipelineError(EXTRACTION_ERROR_MAPPING[error.kind], error.detail, { cause: error });
  }
  return new PipelineError('upstream_failure', `${stage} failed: ${describeError(error)}`, {
    cause: error,
  });
}

export class ExtractionPipeline {
  private readonly textExtractor: TextExtractor;
  private readonly fieldExtractor: FieldExtractor;
  private readonly policy: DocumentPolicy;

  constructor(options: ExtractionPipelineOptions) {
    this.textExtractor = options.textExtractor;
    this.fieldExtractor = options.fieldExtractor;
    this.policy = options.policy;
  }

  get deploymentMode(): DeploymentMode {
    return this.textExtractor.strategy;
  }

  /**
   * Run a document through every stage.
   */
  async process(
    bytes: Buffer,
    filename: string,
    options: PipelineRunOptions = {}
  ): Promise<InsuranceRecord> {
    setContextFilename(filename);

    return this.track(async () => {
      const validation = await this.runStage('validation', async () =>
        validateDocument(filename, bytes.length, this.policy)
      );
      if (!validation.ok) {
        logger.warn('Document rejected', { reason: validation.reason, size_bytes: bytes.length });
        throw new PipelineError('invalid_input', validation.reason);
      }

      const document: UploadedDocument = { bytes, filename, extension: validation.extension };

      checkCancelled(options.signal);
      // An empty upload has no text to read
      const text =
        bytes.length === 0
          ? ''
          : await this.runStage('text_extraction', () =>
              this.textExtractor.extractText(document, { signal: options.signal })
            );

      if (text.trim().length === 0) {
        throw new PipelineError('no_extractable_text', 'Document contains no extractable text');
      }

      checkCancelled(options.signal);
      return this.runStage('field_extraction', () =>
        this.fieldExtractor.extractFields(text, { signal: options.signal })
      );
    }, options.signal);
  }

  /**
   * Extract fields from text that is already available.
   */
  async processText(text: string, options: PipelineRunOptions = {}): Promise<InsuranceRecord> {
    return this.track(async () => {
      if (text.trim().length === 0) {
        throw new PipelineError('invalid_input', 'Text is empty');
      }

      checkCancelled(options.signal);
      return this.runStage('field_extraction', () =>
        this.fieldExtractor.extractFields(text, { signal: options.signal })
      );
    }, options.signal);
  }

  private async runStage<T>(stage: PipelineStage, fn: () => Promise<T>): Promise<T> {
    const startTime = Date.now();

    try {
      const result = await fn();
      stageDurationHistogram.observe({ stage, status: 'success' }, (Date.now() - startTime) / 1000);
      logger.debug('Pipeline stage complete', { stage, duration_ms: Date.now() - startTime });
      return result;
    } catch (error) {
      stageDurationHistogram.observe({ stage, status: 'error' }, (Date.now() - startTime) / 1000);
      throw toPipelineError(error, stage);
    }
  }

  private async track(
    run: () => Promise<InsuranceRecord>,
    signal: AbortSignal | undefined
  ): Promise<InsuranceRecord> {
    const startTime = Date.now();

    try {
      const record = await run();
      documentsProcessedCounter.inc({ deployment_mode: this.deploymentMode, outcome: 'success' });
      logger.info('Document processed', {
        deployment_mode: this.deploymentMode,
        duration_ms: Date.now() - startTime,
      });
      return record;
    } catch (error) {
      let failure = isPipelineError(error)
        ? error
        : new PipelineError('upstream_failure', describeError(error), { cause: error });

      // A provider call cut short by the signal reports as a cancellation
      if (signal?.aborted && failure.kind === 'upstream_failure' && failure.detail !== CANCELLED) {
        failure = new PipelineError('upstream_failure', CANCELLED, { cause: error });
      }

      documentsProcessedCounter.inc({ deployment_mode: this.deploymentMode, outcome: failure.kind });
      logger.warn('Document processing failed', {
        kind: failure.kind,
        detail: failure.detail,
        duration_ms: Date.now() - startTime,
      });
      throw failure;
    }
  }
}
