/**
 * Text Extraction
 */

import type { OcrProvider, VisionProvider } from '../providers/types';
import type { DeploymentMode } from '../types';
import { NativeTextExtractor } from './native-extractor';
import { OcrTextExtractor } from './ocr-extractor';
import type { PdfRasterizer, TextExtractor } from './types';

export * from './types';
export * from './formats';
export { OcrTextExtractor, PAGE_SEPARATOR } from './ocr-extractor';
export { NativeTextExtractor, PDF_PAGE_SEPARATOR, pageLabel } from './native-extractor';
export type { NativeTextExtractorOptions } from './native-extractor';
export { rasterizePdf } from './pdf';

export interface TextExtractorDeps {
  ocr?: OcrProvider;
  vision?: VisionProvider;
  rasterize?: PdfRasterizer;
}

/**
 * Build the text extraction strategy for a deployment mode.
 */
export function createTextExtractor(mode: DeploymentMode, deps: TextExtractorDeps): TextExtractor {
  switch (mode) {
    case 'ocr':
      if (!deps.ocr) {
        throw new Error('OCR deployment mode requires an OCR provider');
      }
      return new OcrTextExtractor(deps.ocr);
    case 'native':
      if (!deps.vision) {
        throw new Error('Native deployment mode requires a vision provider');
      }
      return new NativeTextExtractor(deps.vision, { rasterize: deps.rasterize });
  }
}
