/**
 * Test Helpers
 *
 * In-process fakes for the OCR, vision and LLM providers plus canned
 * insurance document content.
 */

import JSZip from 'jszip';
import type {
  ImageInput,
  InsuranceRecord,
  LlmCompletionRequest,
  LlmProvider,
  OcrPage,
  OcrProvider,
  ProviderCallOptions,
  RenderedPage,
  VisionProvider,
} from '@policy-extract/shared';

export const SAMPLE_PAGE_1 = [
  '# Policy Schedule',
  '',
  '| Field | Value |',
  '|---|---|',
  '| Insured Name | Asha Verma |',
  '| Policy No. | P/211221/01/2024/001234 |',
  '| Email ID | asha.verma@example.com |',
  '| Plan Name | Family Health Optima Insurance Plan SHAHLIP21211V042021 |',
].join('\n');

export const SAMPLE_PAGE_2 = [
  '## Coverage',
  '',
  '- Sum Insured: Rs. 5,00,000',
  '- Room Rent: Single AC room',
  '- Initial Waiting Period: 30 days',
].join('\n');

export const SAMPLE_RECORD: InsuranceRecord = {
  name: 'Asha Verma',
  policy_number: 'P/211221/01/2024/001234',
  email: 'asha.verma@example.com',
  policy_name: 'Family Health Optima Insurance Plan',
  plan_type: 'SHAHLIP21211V042021',
  sum_assured: 'Rs. 5,00,000',
  room_rent_limit: 'Single AC room',
  waiting_period: '30 days',
};

/**
 * Fake OCR provider returning fixed pages, or failing with an error.
 */
export function createFakeOcr(result: OcrPage[] | Error) {
  const process = jest.fn(
    async (_dataUrl: string, _options?: ProviderCallOptions): Promise<OcrPage[]> => {
      if (result instanceof Error) {
        throw result;
      }
      return result;
    }
  );
  const provider: OcrProvider = { name: 'fake-ocr', process };
  return { provider, process };
}

/**
 * Fake LLM provider returning one completion, or failing with an error.
 */
export function createFakeLlm(result: string | Error) {
  const complete = jest.fn(
    async (_request: LlmCompletionRequest, _options?: ProviderCallOptions): Promise<string> => {
      if (result instanceof Error) {
        throw result;
      }
      return result;
    }
  );
  const provider: LlmProvider = { name: 'fake-llm', complete };
  return { provider, complete };
}

/**
 * Fake vision provider answering successive calls with successive texts.
 */
export function createFakeVision(results: Array<string | Error>) {
  let call = 0;
  const transcribeImage = jest.fn(
    async (_image: ImageInput, _options?: ProviderCallOptions): Promise<string> => {
      const result = results[Math.min(call, results.length - 1)];
      call++;
      if (result instanceof Error) {
        throw result;
      }
      return result;
    }
  );
  const provider: VisionProvider = { name: 'fake-vision', transcribeImage };
  return { provider, transcribeImage };
}

/**
 * Rasterizer stand-in yielding one placeholder PNG per page.
 */
export function createFakeRasterizer(pageCount: number) {
  const rasterize = jest.fn(async function* (_data: Uint8Array): AsyncGenerator<RenderedPage> {
    for (let pageNumber = 1; pageNumber <= pageCount; pageNumber++) {
      yield { pageNumber, png: Buffer.from(`png-page-${pageNumber}`) };
    }
  });
  return rasterize;
}

/** Bytes with a PDF header; only fakes ever read them. */
export function fakePdfBytes(): Buffer {
  return Buffer.from('%PDF-1.7\n% test document\n');
}

export function recordJson(overrides: Partial<Record<keyof InsuranceRecord, unknown>> = {}): string {
  return JSON.stringify({ ...SAMPLE_RECORD, ...overrides });
}

const DOCX_CONTENT_TYPES = `<?xml version="1.0" encoding="UTF-8" standalone="yes"?>
<Types xmlns="http://schemas.openxmlformats.org/package/2006/content-types">
<Default Extension="rels" ContentType="application/vnd.openxmlformats-package.relationships+xml"/>
<Default Extension="xml" ContentType="application/xml"/>
<Override PartName="/word/document.xml" ContentType="application/vnd.openxmlformats-officedocument.wordprocessingml.document.main+xml"/>
</Types>`;

const DOCX_PACKAGE_RELS = `<?xml version="1.0" encoding="UTF-8" standalone="yes"?>
<Relationships xmlns="http://schemas.openxmlformats.org/package/2006/relationships">
<Relationship Id="rId1" Type="http://schemas.openxmlformats.org/officeDocument/2006/relationships/officeDocument" Target="word/document.xml"/>
</Relationships>`;

function escapeXml(text: string): string {
  return text.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;');
}

/**
 * Minimal Word document with one paragraph per entry; an empty entry is an
 * empty paragraph.
 */
export async function buildDocx(paragraphs: string[]): Promise<Buffer> {
  const body = paragraphs
    .map((text) => (text === '' ? '<w:p/>' : `<w:p><w:r><w:t xml:space="preserve">${escapeXml(text)}</w:t></w:r></w:p>`))
    .join('');

  const zip = new JSZip();
  zip.file('[Content_Types].xml', DOCX_CONTENT_TYPES);
  zip.file('_rels/.rels', DOCX_PACKAGE_RELS);
  zip.file(
    'word/document.xml',
    `<?xml version="1.0" encoding="UTF-8" standalone="yes"?>
<w:document xmlns:w="http://schemas.openxmlformats.org/wordprocessingml/2006/main"><w:body>${body}</w:body></w:document>`
  );
  return zip.generateAsync({ type: 'nodebuffer' });
}
