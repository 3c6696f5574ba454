/**
 * OCR Text Extraction
 *
 * Submits the whole document to an OCR provider as a data URL and joins the
 * returned pages in page order.
 */

import { describeError, ExtractionError, isAbortError } from '../errors';
import { logger } from '../logger';
import type { OcrPage, OcrProvider } from '../providers/types';
import type { UploadedDocument } from '../types';
import { toDataUrl } from './formats';
import type { TextExtractionOptions, TextExtractor } from './types';

export const PAGE_SEPARATOR = '\n\n';

export class OcrTextExtractor implements TextExtractor {
  readonly strategy = 'ocr' as const;

  constructor(private readonly ocr: OcrProvider) {}

  async extractText(
    document: UploadedDocument,
    options: TextExtractionOptions = {}
  ): Promise<string> {
    const dataUrl = toDataUrl(document.bytes, document.extension);

    logger.info('Submitting document to OCR provider', {
      provider: this.ocr.name,
      extension: document.extension,
      size_bytes: document.bytes.length,
    });

    let pages: OcrPage[];
    try {
      pages = await this.ocr.process(dataUrl, { signal: options.signal });
    } catch (error) {
      const reason = isAbortError(error) ? 'request aborted' : describeError(error);
      throw new ExtractionError('provider_failure', `OCR provider error: ${reason}`, {
        cause: error,
      });
    }

    const texts = [...pages]
      .sort((a, b) => a.index - b.index)
      .map((page) => page.text)
      .filter((text) => text.trim().length > 0);

    if (texts.length === 0) {
      throw new ExtractionError('no_content', 'No text content found in OCR response');
    }

    const text = texts.join(PAGE_SEPARATOR);

    logger.info('OCR text extraction complete', {
      provider: this.ocr.name,
      pages_returned: pages.length,
      pages_with_text: texts.length,
      total_chars: text.length,
    });

    return text;
  }
}
