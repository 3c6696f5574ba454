/**
 * Native Text Extraction
 *
 * Reads each format with its own reader: mammoth for Word documents, a
 * strict UTF-8 decode for plain text, and the vision provider for PDF pages
 * and images.
 */

import mammoth from 'mammoth';
import { describeError, ExtractionError, isAbortError, isExtractionError } from '../errors';
import { logger } from '../logger';
import type { VisionProvider } from '../providers/types';
import type { UploadedDocument } from '../types';
import { IMAGE_EXTENSIONS, mimeTypeFor } from './formats';
import { rasterizePdf } from './pdf';
import type { PdfRasterizer, TextExtractionOptions, TextExtractor } from './types';

export const PDF_PAGE_SEPARATOR = '\n\n';

export function pageLabel(pageNumber: number): string {
  return `--- Page ${pageNumber} ---`;
}

export interface NativeTextExtractorOptions {
  rasterize?: PdfRasterizer;
}

export class NativeTextExtractor implements TextExtractor {
  readonly strategy = 'native' as const;

  private readonly rasterize: PdfRasterizer;

  constructor(
    private readonly vision: VisionProvider,
    options: NativeTextExtractorOptions = {}
  ) {
    this.rasterize = options.rasterize ?? rasterizePdf;
  }

  async extractText(
    document: UploadedDocument,
    options: TextExtractionOptions = {}
  ): Promise<string> {
    let text: string;
    try {
      text = await this.readDocument(document, options);
    } catch (error) {
      if (isExtractionError(error)) {
        throw error;
      }
      const reason = isAbortError(error) ? 'request aborted' : describeError(error);
      throw new ExtractionError(
        'provider_failure',
        `Failed to read ${document.extension} document: ${reason}`,
        { cause: error }
      );
    }

    if (text.trim().length === 0) {
      throw new ExtractionError('no_content', `No text content found in ${document.extension} document`);
    }

    logger.info('Native text extraction complete', {
      extension: document.extension,
      total_chars: text.length,
    });

    return text;
  }

  private async readDocument(
    document: UploadedDocument,
    options: TextExtractionOptions
  ): Promise<string> {
    switch (document.extension) {
      case '.docx':
      case '.doc':
        return readWordDocument(document.bytes);
      case '.txt':
        return decodeUtf8(document.bytes);
      case '.pdf':
        return this.transcribePdf(document.bytes, options);
      default:
        if (IMAGE_EXTENSIONS.includes(document.extension)) {
          return this.vision.transcribeImage(
            { data: document.bytes, mimeType: mimeTypeFor(document.extension) },
            { signal: options.signal }
          );
        }
        throw new ExtractionError(
          'unsupported_format',
          `Native extraction does not support ${document.extension || 'files without an extension'}`
        );
    }
  }

  /**
   * Transcribe a PDF page by page. Pages are sent one at a time, in order.
   */
  private async transcribePdf(bytes: Buffer, options: TextExtractionOptions): Promise<string> {
    const pages: string[] = [];
    let blankPages = 0;

    for await (const page of this.rasterize(bytes)) {
      options.signal?.throwIfAborted();

      const pageText = await this.vision.transcribeImage(
        { data: page.png, mimeType: 'image/png' },
        { signal: options.signal }
      );

      if (pageText.trim().length === 0) {
        blankPages++;
      }
      pages.push(`${pageLabel(page.pageNumber)}\n${pageText}`);

      logger.debug('Transcribed PDF page', {
        page_number: page.pageNumber,
        chars: pageText.length,
      });
    }

    // Labels alone are not document text
    if (blankPages === pages.length) {
      return '';
    }

    return pages.join(PDF_PAGE_SEPARATOR);
  }
}

async function readWordDocument(bytes: Buffer): Promise<string> {
  const result = await mammoth.extractRawText({ buffer: bytes });
  // mammoth ends every paragraph with a blank line
  return result.value.replace(/\n\n/g, '\n').replace(/\n$/, '');
}

function decodeUtf8(bytes: Buffer): string {
  // Strips a leading BOM; invalid sequences throw
  return new TextDecoder('utf-8', { fatal: true }).decode(bytes);
}
