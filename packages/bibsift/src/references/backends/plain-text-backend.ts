import { promises as fs } from 'node:fs';
import { extname } from 'node:path';
import type { DocumentSource, TextExtractionResult } from '../types.js';
import { buildPages, failedResult, successfulResult, type TextExtractionBackend } from './types.js';

const TEXT_EXTENSIONS = new Set(['.txt', '.text', '.md']);

/** Reads already-extracted text; form feeds separate pages. */
export class PlainTextBackend implements TextExtractionBackend {
  readonly name = 'plain-text';
  readonly ocr = false;

  accepts(document: DocumentSource): boolean {
    return TEXT_EXTENSIONS.has(extname(document.path).toLowerCase());
  }

  async extract(document: DocumentSource): Promise<TextExtractionResult> {
    const content = await fs.readFile(document.path, 'utf8');
    const pages = buildPages(content.replace(/\r\n/g, '\n').split('\f'));
    if (pages.length === 0) {
      return failedResult('Text file is empty.');
    }

    return successfulResult(pages);
  }
}
