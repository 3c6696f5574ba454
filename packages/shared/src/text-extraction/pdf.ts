/**
 * PDF Rasterization
 *
 * Renders PDF pages to PNG using pdfjs-dist and @napi-rs/canvas, one page at
 * a time so a long document never holds every page image in memory.
 * Both libraries are loaded on first use.
 */

import path from 'path';
import type { Canvas, SKRSContext2D } from '@napi-rs/canvas';
import { logger } from '../logger';
import type { RenderedPage } from './types';

/** 2x zoom keeps small print legible for the vision model. */
const RENDER_SCALE = 2;

interface CanvasAndContext {
  canvas: Canvas | null;
  context: SKRSContext2D | null;
}

/**
 * Canvas factory handed to pdfjs for the scratch canvases it creates while
 * rendering (masks, patterns, groups).
 */
class NapiCanvasFactory {
  constructor(private readonly createCanvas: (width: number, height: number) => Canvas) {}

  create(width: number, height: number): { canvas: Canvas; context: SKRSContext2D } {
    const canvas = this.createCanvas(width, height);
    return { canvas, context: canvas.getContext('2d') };
  }

  reset(target: CanvasAndContext, width: number, height: number): void {
    if (target.canvas) {
      target.canvas.width = width;
      target.canvas.height = height;
    }
  }

  destroy(target: CanvasAndContext): void {
    if (target.canvas) {
      target.canvas.width = 0;
      target.canvas.height = 0;
    }
    target.canvas = null;
    target.context = null;
  }
}

async function loadPdfjs() {
  const pdfjsLib = await import('pdfjs-dist');

  // Configure worker for Node.js environment
  pdfjsLib.GlobalWorkerOptions.workerSrc = require.resolve('pdfjs-dist/build/pdf.worker.js');

  return pdfjsLib;
}

function standardFontDataUrl(): string {
  return path.join(path.dirname(require.resolve('pdfjs-dist/package.json')), 'standard_fonts') + path.sep;
}

/**
 * Rasterize every page of a PDF, yielding pages in order.
 */
export async function* rasterizePdf(data: Uint8Array): AsyncGenerator<RenderedPage> {
  const [pdfjsLib, canvasLib] = await Promise.all([loadPdfjs(), import('@napi-rs/canvas')]);
  const canvasFactory = new NapiCanvasFactory(canvasLib.createCanvas);

  // pdfjs takes ownership of the buffer it is given
  const pdf = await pdfjsLib.getDocument({
    data: new Uint8Array(data),
    canvasFactory,
    disableFontFace: true,
    standardFontDataUrl: standardFontDataUrl(),
  }).promise;

  logger.info('Rasterizing PDF', { totalPages: pdf.numPages, scale: RENDER_SCALE });

  try {
    for (let pageNum = 1; pageNum <= pdf.numPages; pageNum++) {
      const page = await pdf.getPage(pageNum);
      const viewport = page.getViewport({ scale: RENDER_SCALE });
      const { canvas, context } = canvasFactory.create(
        Math.ceil(viewport.width),
        Math.ceil(viewport.height)
      );

      await page.render({ canvasContext: context, viewport }).promise;
      const png = await canvas.encode('png');
      page.cleanup();

      yield { pageNumber: pageNum, png };
    }
  } finally {
    await pdf.destroy();
  }
}
