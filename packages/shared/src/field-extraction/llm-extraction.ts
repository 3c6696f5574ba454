/**
 * LLM Field Extraction
 *
 * Sends document text to the LLM with the configured rulebook and turns the
 * JSON object it returns into a normalized, schema-checked InsuranceRecord.
 */

import { describeError, ExtractionError, isAbortError, isExtractionError } from '../errors';
import { logger } from '../logger';
import type { LlmProvider } from '../providers/types';
import { missingFields, normalizeRecord } from '../record';
import { validateInsuranceRecord } from '../schemas';
import { renderUserPrompt } from '../templates';
import type { ExtractionTemplate } from '../templates/types';
import type { InsuranceRecord } from '../types';
import { parseLlmJson } from './json';

export interface FieldExtractionOptions {
  signal?: AbortSignal;
}

/**
 * Turns document text into an InsuranceRecord.
 *
 * Throws ExtractionError: `provider_failure` when the provider call fails,
 * `malformed_output` when the reply is empty, not a JSON object, or holds
 * values that cannot be normalized.
 */
export interface FieldExtractor {
  extractFields(text: string, options?: FieldExtractionOptions): Promise<InsuranceRecord>;
}

export interface LlmFieldExtractorOptions {
  llm: LlmProvider;
  template: ExtractionTemplate;
  /** Completion token cap */
  maxTokens?: number;
}

export class LlmFieldExtractor implements FieldExtractor {
  private readonly llm: LlmProvider;
  private readonly template: ExtractionTemplate;
  private readonly maxTokens: number | undefined;

  constructor(options: LlmFieldExtractorOptions) {
    this.llm = options.llm;
    this.template = options.template;
    this.maxTokens = options.maxTokens;
  }

  async extractFields(text: string, options: FieldExtractionOptions = {}): Promise<InsuranceRecord> {
    const userPrompt = renderUserPrompt(this.template, text);

    logger.info('Extracting fields with LLM', {
      provider: this.llm.name,
      template_variant: this.template.variant,
      template_version: this.template.version,
      text_length: text.length,
    });

    const startTime = Date.now();
    let content: string;

    try {
      content = await this.llm.complete(
        {
          systemPrompt: this.template.systemPrompt,
          userPrompt,
          responseFormat: 'json_object',
          temperature: 0,
          maxTokens: this.maxTokens,
        },
        { signal: options.signal }
      );
    } catch (error) {
      logger.error('LLM field extraction failed', error, {
        provider: this.llm.name,
        duration_ms: Date.now() - startTime,
      });

      if (isExtractionError(error)) {
        throw error;
      }
      const reason = isAbortError(error) ? 'request aborted' : describeError(error);
      throw new ExtractionError('provider_failure', `LLM provider error: ${reason}`, {
        cause: error,
      });
    }

    if (content.trim().length === 0) {
      throw new ExtractionError('malformed_output', 'Empty response from LLM');
    }

    const raw = parseLlmJson(content);
    const absent = missingFields(raw);
    if (absent.length > 0) {
      logger.warn('LLM response omitted fields, defaulting to null', { fields: absent });
    }

    const record = normalizeRecord(raw);

    const validation = validateInsuranceRecord(record);
    if (!validation.valid) {
      throw new ExtractionError(
        'malformed_output',
        `Extracted record failed schema validation: ${(validation.errors ?? []).join('; ')}`
      );
    }

    logger.info('LLM field extraction complete', {
      provider: this.llm.name,
      duration_ms: Date.now() - startTime,
      fields_found: Object.values(record).filter((value) => value !== null).length,
    });

    return record;
  }
}
