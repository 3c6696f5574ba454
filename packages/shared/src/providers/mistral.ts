/**
 * Mistral OCR Provider
 *
 * Sends the whole document as a data URL to Mistral's OCR endpoint and
 * returns page markdown.
 */

import { Mistral } from '@mistralai/mistralai';
import { logger } from '../logger';
import { observeProviderCall } from '../metrics';
import type { OcrPage, OcrProvider, ProviderCallOptions } from './types';

interface MistralOcrResponse {
  pages: Array<{ index: number; markdown: string }>;
}

/**
 * The slice of the SDK this provider uses; `new Mistral().ocr` satisfies it.
 */
export interface MistralOcrClient {
  process(
    request: {
      model: string | null;
      document: { type: 'document_url'; documentUrl: string };
      includeImageBase64?: boolean | null;
    },
    options?: {
      timeoutMs?: number;
      retries?: { strategy: 'none' };
      fetchOptions?: { signal?: AbortSignal };
    }
  ): Promise<MistralOcrResponse>;
}

export interface MistralOcrProviderOptions {
  model: string;
  timeoutMs: number;
}

export function createMistralClient(apiKey: string): Mistral {
  return new Mistral({ apiKey });
}

export class MistralOcrProvider implements OcrProvider {
  readonly name = 'mistral-ocr';

  constructor(
    private readonly client: MistralOcrClient,
    private readonly options: MistralOcrProviderOptions
  ) {}

  async process(dataUrl: string, options: ProviderCallOptions = {}): Promise<OcrPage[]> {
    const { model, timeoutMs } = this.options;

    const response = await observeProviderCall(this.name, model, () =>
      this.client.process(
        {
          model,
          document: { type: 'document_url', documentUrl: dataUrl },
          includeImageBase64: false,
        },
        {
          timeoutMs,
          retries: { strategy: 'none' },
          fetchOptions: { signal: options.signal },
        }
      )
    );

    const pages = response.pages.map((page) => ({ index: page.index, text: page.markdown }));

    logger.info('Mistral OCR complete', {
      model,
      page_count: pages.length,
    });

    return pages;
  }
}
