/**
 * Text extraction strategy tests
 */

import {
  createTextExtractor,
  ExtractionError,
  NativeTextExtractor,
  OcrTextExtractor,
  type ExtractionErrorKind,
  type UploadedDocument,
} from '@policy-extract/shared';
import {
  buildDocx,
  createFakeOcr,
  createFakeRasterizer,
  createFakeVision,
  fakePdfBytes,
  SAMPLE_PAGE_1,
  SAMPLE_PAGE_2,
} from './helpers';

function document(filename: string, bytes: Buffer, extension: string): UploadedDocument {
  return { bytes, filename, extension };
}

async function extractionErrorOf(promise: Promise<unknown>): Promise<ExtractionError> {
  const error = await promise.then(
    () => null,
    (err: unknown) => err
  );
  if (!(error instanceof ExtractionError)) {
    throw new Error(`expected an ExtractionError, got ${String(error)}`);
  }
  return error;
}

function expectKind(error: ExtractionError, kind: ExtractionErrorKind): void {
  expect(error.kind).toBe(kind);
}

describe('OcrTextExtractor', () => {
  const pdf = document('policy.pdf', fakePdfBytes(), '.pdf');

  it('should submit the whole document as a data URL', async () => {
    const ocr = createFakeOcr([{ index: 0, text: SAMPLE_PAGE_1 }]);
    const extractor = new OcrTextExtractor(ocr.provider);

    await extractor.extractText(pdf);

    expect(ocr.process).toHaveBeenCalledTimes(1);
    expect(ocr.process.mock.calls[0][0]).toBe(
      `data:application/pdf;base64,${fakePdfBytes().toString('base64')}`
    );
  });

  it('should fall back to application/octet-stream for unknown extensions', async () => {
    const ocr = createFakeOcr([{ index: 0, text: 'text' }]);
    const extractor = new OcrTextExtractor(ocr.provider);

    await extractor.extractText(document('scan.tiff', Buffer.from('II*'), '.tiff'));

    expect(ocr.process.mock.calls[0][0]).toBe(
      `data:application/octet-stream;base64,${Buffer.from('II*').toString('base64')}`
    );
  });

  it('should join pages in page order', async () => {
    const ocr = createFakeOcr([
      { index: 1, text: SAMPLE_PAGE_2 },
      { index: 0, text: SAMPLE_PAGE_1 },
    ]);
    const extractor = new OcrTextExtractor(ocr.provider);

    await expect(extractor.extractText(pdf)).resolves.toBe(`${SAMPLE_PAGE_1}\n\n${SAMPLE_PAGE_2}`);
  });

  it('should skip blank pages', async () => {
    const ocr = createFakeOcr([
      { index: 0, text: 'Policy No. P-1001' },
      { index: 1, text: '   \n' },
      { index: 2, text: 'Sum Insured: Rs. 3,00,000' },
    ]);
    const extractor = new OcrTextExtractor(ocr.provider);

    await expect(extractor.extractText(pdf)).resolves.toBe(
      'Policy No. P-1001\n\nSum Insured: Rs. 3,00,000'
    );
  });

  it('should fail with no_content when no page has text', async () => {
    for (const pages of [[], [{ index: 0, text: '' }, { index: 1, text: '\n\n' }]]) {
      const extractor = new OcrTextExtractor(createFakeOcr(pages).provider);
      const error = await extractionErrorOf(extractor.extractText(pdf));
      expectKind(error, 'no_content');
      expect(error.detail).toBe('No text content found in OCR response');
    }
  });

  it('should wrap provider errors', async () => {
    const extractor = new OcrTextExtractor(createFakeOcr(new Error('connect ECONNREFUSED')).provider);

    const error = await extractionErrorOf(extractor.extractText(pdf));

    expectKind(error, 'provider_failure');
    expect(error.detail).toBe('OCR provider error: connect ECONNREFUSED');
  });

  it('should forward the abort signal', async () => {
    const ocr = createFakeOcr([{ index: 0, text: 'text' }]);
    const controller = new AbortController();

    await new OcrTextExtractor(ocr.provider).extractText(pdf, { signal: controller.signal });

    expect(ocr.process.mock.calls[0][1]).toEqual({ signal: controller.signal });
  });
});

describe('NativeTextExtractor', () => {
  it('should decode plain text verbatim', async () => {
    const vision = createFakeVision(['unused']);
    const extractor = new NativeTextExtractor(vision.provider);
    const text = '  Insured Name: Asha Verma\n\nPolicy No.: P-1001  \n';

    await expect(
      extractor.extractText(document('policy.txt', Buffer.from(text, 'utf-8'), '.txt'))
    ).resolves.toBe(text);
    expect(vision.transcribeImage).not.toHaveBeenCalled();
  });

  it('should drop a leading byte order mark', async () => {
    const extractor = new NativeTextExtractor(createFakeVision(['unused']).provider);
    const bytes = Buffer.concat([Buffer.from([0xef, 0xbb, 0xbf]), Buffer.from('Policy No.: P-1001')]);

    await expect(extractor.extractText(document('policy.txt', bytes, '.txt'))).resolves.toBe(
      'Policy No.: P-1001'
    );
  });

  it('should reject text that is not UTF-8', async () => {
    const extractor = new NativeTextExtractor(createFakeVision(['unused']).provider);
    const bytes = Buffer.from([0x50, 0x6f, 0xff, 0x6c]);

    const error = await extractionErrorOf(extractor.extractText(document('policy.txt', bytes, '.txt')));

    expectKind(error, 'provider_failure');
  });

  it('should fail with no_content for whitespace-only text files', async () => {
    const extractor = new NativeTextExtractor(createFakeVision(['unused']).provider);

    const error = await extractionErrorOf(
      extractor.extractText(document('blank.txt', Buffer.from(' \n\t\n'), '.txt'))
    );

    expectKind(error, 'no_content');
    expect(error.detail).toBe('No text content found in .txt document');
  });

  it('should transcribe PDF pages in order with page labels', async () => {
    const vision = createFakeVision([SAMPLE_PAGE_1, SAMPLE_PAGE_2]);
    const rasterize = createFakeRasterizer(2);
    const extractor = new NativeTextExtractor(vision.provider, { rasterize });

    const text = await extractor.extractText(document('policy.pdf', fakePdfBytes(), '.pdf'));

    expect(text).toBe(`--- Page 1 ---\n${SAMPLE_PAGE_1}\n\n--- Page 2 ---\n${SAMPLE_PAGE_2}`);
    expect(rasterize).toHaveBeenCalledTimes(1);
    expect(vision.transcribeImage).toHaveBeenCalledTimes(2);
    expect(vision.transcribeImage.mock.calls[0][0]).toEqual({
      data: Buffer.from('png-page-1'),
      mimeType: 'image/png',
    });
    expect(vision.transcribeImage.mock.calls[1][0]).toEqual({
      data: Buffer.from('png-page-2'),
      mimeType: 'image/png',
    });
  });

  it('should fail with no_content when every PDF page transcribes blank', async () => {
    const extractor = new NativeTextExtractor(createFakeVision(['', '  ']).provider, {
      rasterize: createFakeRasterizer(2),
    });

    const error = await extractionErrorOf(
      extractor.extractText(document('scan.pdf', fakePdfBytes(), '.pdf'))
    );

    expectKind(error, 'no_content');
  });

  it('should stop at the first failing page', async () => {
    const vision = createFakeVision([SAMPLE_PAGE_1, new Error('rate limited'), SAMPLE_PAGE_2]);
    const extractor = new NativeTextExtractor(vision.provider, {
      rasterize: createFakeRasterizer(3),
    });

    const error = await extractionErrorOf(
      extractor.extractText(document('policy.pdf', fakePdfBytes(), '.pdf'))
    );

    expectKind(error, 'provider_failure');
    expect(error.detail).toBe('Failed to read .pdf document: rate limited');
    expect(vision.transcribeImage).toHaveBeenCalledTimes(2);
  });

  it('should not transcribe pages once the request is aborted', async () => {
    const vision = createFakeVision([SAMPLE_PAGE_1]);
    const extractor = new NativeTextExtractor(vision.provider, {
      rasterize: createFakeRasterizer(2),
    });
    const controller = new AbortController();
    controller.abort();

    const error = await extractionErrorOf(
      extractor.extractText(document('policy.pdf', fakePdfBytes(), '.pdf'), {
        signal: controller.signal,
      })
    );

    expectKind(error, 'provider_failure');
    expect(error.detail).toBe('Failed to read .pdf document: request aborted');
    expect(vision.transcribeImage).not.toHaveBeenCalled();
  });

  it('should send images to the vision provider as a single page', async () => {
    const vision = createFakeVision(['Policy No.: P-1001']);
    const extractor = new NativeTextExtractor(vision.provider);
    const bytes = Buffer.from('jpeg-bytes');

    await expect(extractor.extractText(document('card.jpg', bytes, '.jpg'))).resolves.toBe(
      'Policy No.: P-1001'
    );
    expect(vision.transcribeImage).toHaveBeenCalledTimes(1);
    expect(vision.transcribeImage.mock.calls[0][0]).toEqual({ data: bytes, mimeType: 'image/jpeg' });
  });

  it('should join Word paragraphs in document order, one per line', async () => {
    const vision = createFakeVision(['unused']);
    const extractor = new NativeTextExtractor(vision.provider);
    const bytes = await buildDocx([
      'Insured Name: Asha Verma',
      'Policy No.: P/1001',
      'Sum Insured: Rs. 5,00,000',
    ]);

    await expect(extractor.extractText(document('policy.docx', bytes, '.docx'))).resolves.toBe(
      'Insured Name: Asha Verma\nPolicy No.: P/1001\nSum Insured: Rs. 5,00,000'
    );
    expect(vision.transcribeImage).not.toHaveBeenCalled();
  });

  it('should keep an empty Word paragraph as a blank line', async () => {
    const extractor = new NativeTextExtractor(createFakeVision(['unused']).provider);
    const bytes = await buildDocx(['Insured Name: Asha', '', 'Policy No.: P/1']);

    await expect(extractor.extractText(document('policy.docx', bytes, '.docx'))).resolves.toBe(
      'Insured Name: Asha\n\nPolicy No.: P/1'
    );
  });

  it('should report unreadable Word documents as provider failures', async () => {
    const extractor = new NativeTextExtractor(createFakeVision(['unused']).provider);

    const error = await extractionErrorOf(
      extractor.extractText(document('policy.docx', Buffer.from('not a zip archive'), '.docx'))
    );

    expectKind(error, 'provider_failure');
    expect(error.detail.startsWith('Failed to read .docx document: ')).toBe(true);
  });

  it('should reject formats it has no reader for', async () => {
    const extractor = new NativeTextExtractor(createFakeVision(['unused']).provider);

    const error = await extractionErrorOf(
      extractor.extractText(document('rates.xls', Buffer.from('xls'), '.xls'))
    );

    expectKind(error, 'unsupported_format');
    expect(error.detail).toBe('Native extraction does not support .xls');
  });
});

describe('createTextExtractor', () => {
  it('should build the strategy for each deployment mode', () => {
    const ocr = createTextExtractor('ocr', { ocr: createFakeOcr([]).provider });
    const native = createTextExtractor('native', { vision: createFakeVision(['']).provider });

    expect(ocr).toBeInstanceOf(OcrTextExtractor);
    expect(ocr.strategy).toBe('ocr');
    expect(native).toBeInstanceOf(NativeTextExtractor);
    expect(native.strategy).toBe('native');
  });

  it('should require the provider the mode depends on', () => {
    expect(() => createTextExtractor('ocr', {})).toThrow(
      'OCR deployment mode requires an OCR provider'
    );
    expect(() => createTextExtractor('native', { ocr: createFakeOcr([]).provider })).toThrow(
      'Native deployment mode requires a vision provider'
    );
  });
});
