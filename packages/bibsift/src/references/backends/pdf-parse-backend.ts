import { promises as fs } from 'node:fs';
import { extname } from 'node:path';
import { PDFParse } from 'pdf-parse';
import type { DocumentSource, TextExtractionResult } from '../types.js';
import { buildPages, failedResult, successfulResult, type TextExtractionBackend } from './types.js';

export class PdfParseBackend implements TextExtractionBackend {
  readonly name = 'pdf-parse';
  readonly ocr = false;

  accepts(document: DocumentSource): boolean {
    return extname(document.path).toLowerCase() === '.pdf';
  }

  async extract(document: DocumentSource): Promise<TextExtractionResult> {
    const buffer = await fs.readFile(document.path);
    const parser = new PDFParse({ data: buffer });

    try {
      const parsed = await parser.getText();
      const pages = buildPages(parsed.pages.map((page) => page.text ?? ''));
      if (pages.length === 0) {
        return failedResult('PDF text layer is empty.');
      }

      return successfulResult(pages);
    } finally {
      await parser.destroy();
    }
  }
}
