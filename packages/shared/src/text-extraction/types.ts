/**
 * Text Extraction Types
 */

import type { DeploymentMode, UploadedDocument } from '../types';

export interface TextExtractionOptions {
  signal?: AbortSignal;
}

/**
 * Capability interface for turning an uploaded document into plain text.
 * The OCR and native strategies are interchangeable behind it.
 *
 * Implementations throw ExtractionError: `no_content` when nothing readable
 * came back, `provider_failure` for any provider or library error, and
 * `unsupported_format` for extensions the strategy cannot read.
 */
export interface TextExtractor {
  readonly strategy: DeploymentMode;
  extractText(document: UploadedDocument, options?: TextExtractionOptions): Promise<string>;
}

/** One rasterized PDF page. */
export interface RenderedPage {
  /** 1-based page number */
  pageNumber: number;
  png: Buffer;
}

/**
 * Yields PDF pages as PNG images, in page order.
 */
export type PdfRasterizer = (data: Uint8Array) => AsyncIterable<RenderedPage>;
