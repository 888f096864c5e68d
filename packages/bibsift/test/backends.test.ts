import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { parseConfig } from '../src/config.js';
import { Logger } from '../src/core/logger.js';
import { createBackends } from '../src/references/backends/index.js';
import { GrobidBackend, teiToPlainText } from '../src/references/backends/grobid-backend.js';
import { OcrSidecarBackend } from '../src/references/backends/ocr-sidecar-backend.js';
import { PlainTextBackend } from '../src/references/backends/plain-text-backend.js';
import { BackendFailureError } from '../src/references/errors.js';
import { fixture } from './helpers.js';

let workDir = '';

beforeEach(async () => {
  workDir = await mkdtemp(join(tmpdir(), 'bibsift-backends-'));
});

afterEach(async () => {
  vi.unstubAllGlobals();
  await rm(workDir, { recursive: true, force: true });
});

const writeDocument = async (name: string, content: string): Promise<string> => {
  const path = join(workDir, name);
  await writeFile(path, content);
  return path;
};

const stubFetch = (response: Response) => {
  const fetchMock = vi.fn(async (_input: string | URL | Request, _init?: RequestInit) => response);
  vi.stubGlobal('fetch', fetchMock);
  return fetchMock;
};

describe('teiToPlainText', () => {
  it('flattens title, abstract, body and bibliography', () => {
    expect(teiToPlainText(fixture('grobid-fulltext.tei.xml'))).toBe(
      [
        'Parsing & Scoring',
        'Abstract\nWe study references.',
        'Introduction',
        'Citations matter.',
        'References\n[1] Smith, J. (2020). A study. Journal, 1(2), 3-4.\n[2] Second work'
      ].join('\n\n')
    );
  });
});

describe('GrobidBackend', () => {
  it('posts PDFs to the fulltext endpoint', async () => {
    const fetchMock = stubFetch(new Response(fixture('grobid-fulltext.tei.xml'), { status: 200 }));
    const backend = new GrobidBackend('http://grobid.test:8070', 5000);
    const path = await writeDocument('paper.pdf', '%PDF-1.4 placeholder');

    const result = await backend.extract({ path });

    expect(String(fetchMock.mock.calls[0]?.[0])).toBe('http://grobid.test:8070/api/processFulltextDocument');
    expect(fetchMock.mock.calls[0]?.[1]?.method).toBe('POST');
    expect(result.success).toBe(true);
    expect(result.pages).toHaveLength(1);
    expect(result.text).toBe(teiToPlainText(fixture('grobid-fulltext.tei.xml')));
  });

  it('only accepts PDFs', () => {
    const backend = new GrobidBackend('http://grobid.test:8070', 5000);

    expect(backend.accepts({ path: '/docs/Paper.PDF' })).toBe(true);
    expect(backend.accepts({ path: '/docs/scan.png' })).toBe(false);
  });

  it('raises a backend failure on HTTP errors', async () => {
    stubFetch(new Response('busy', { status: 503 }));
    const backend = new GrobidBackend('http://grobid.test:8070', 5000);
    const path = await writeDocument('paper.pdf', '%PDF-1.4 placeholder');

    const failure = backend.extract({ path });

    await expect(failure).rejects.toBeInstanceOf(BackendFailureError);
    await expect(failure).rejects.toThrow('GROBID returned HTTP 503');
  });
});

describe('OcrSidecarBackend', () => {
  it('orders pages by their page number', async () => {
    const fetchMock = stubFetch(
      Response.json({
        pages: [
          { page: 2, text: 'second page' },
          { page: 1, text: 'first page' }
        ]
      })
    );
    const backend = new OcrSidecarBackend('http://ocr.test', 5000);
    const path = await writeDocument('scan.png', 'placeholder image bytes');

    const result = await backend.extract({ path });

    expect(String(fetchMock.mock.calls[0]?.[0])).toBe('http://ocr.test/ocr');
    expect(backend.ocr).toBe(true);
    expect(result.text).toBe('first page\nsecond page');
    expect(result.pages.map((page) => page.pageNumber)).toEqual([1, 2]);
  });

  it('rejects payloads without pages', async () => {
    stubFetch(Response.json({ text: 'flat' }));
    const backend = new OcrSidecarBackend('http://ocr.test', 5000);
    const path = await writeDocument('scan.png', 'placeholder image bytes');

    await expect(backend.extract({ path })).rejects.toThrow('OCR sidecar returned an unexpected payload.');
  });

  it('reports an empty transcription as a failed result', async () => {
    stubFetch(Response.json({ pages: [{ page: 1, text: '  ' }] }));
    const backend = new OcrSidecarBackend('http://ocr.test', 5000);
    const path = await writeDocument('scan.png', 'placeholder image bytes');

    await expect(backend.extract({ path })).resolves.toEqual({
      text: '',
      pages: [],
      success: false,
      error: 'OCR sidecar produced no text.'
    });
  });
});

describe('PlainTextBackend', () => {
  it('splits pages on form feeds', async () => {
    const backend = new PlainTextBackend();
    const path = await writeDocument('notes.txt', 'page one\fpage two');

    const result = await backend.extract({ path });

    expect(result.text).toBe('page one\npage two');
    expect(result.pages).toEqual([
      { pageNumber: 1, text: 'page one', charCount: 8 },
      { pageNumber: 2, text: 'page two', charCount: 8 }
    ]);
  });

  it('fails on empty files', async () => {
    const backend = new PlainTextBackend();
    const path = await writeDocument('empty.md', '\n');

    expect(backend.accepts({ path })).toBe(true);
    expect(await backend.extract({ path })).toMatchObject({ success: false, error: 'Text file is empty.' });
  });
});

describe('createBackends', () => {
  it('skips HTTP backends without a base URL', () => {
    const config = parseConfig({
      BIBSIFT_BACKENDS: 'pdf-parse,grobid,ocr-sidecar,plain-text',
      BIBSIFT_GROBID_URL: 'http://grobid.test:8070'
    });

    const names = createBackends({ ...config, ocrSidecarUrl: undefined }, new Logger('error')).map(
      (backend) => backend.name
    );

    expect(names).toEqual(['pdf-parse', 'grobid', 'plain-text']);
  });
});
