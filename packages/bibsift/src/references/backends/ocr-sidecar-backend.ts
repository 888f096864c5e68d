import { promises as fs } from 'node:fs';
import { basename, extname } from 'node:path';
import { z } from 'zod';
import { BackendFailureError } from '../errors.js';
import type { DocumentSource, TextExtractionResult } from '../types.js';
import { buildPages, failedResult, successfulResult, type TextExtractionBackend } from './types.js';

const OCR_EXTENSIONS = new Set(['.pdf', '.png', '.jpg', '.jpeg', '.tif', '.tiff']);

const ocrResponseSchema = z.object({
  pages: z.array(
    z.object({
      page: z.number().int().positive().optional(),
      text: z.string()
    })
  )
});

/**
 * Sends the document to an OCR sidecar (`POST <base>/ocr`, multipart field `file`)
 * that answers with `{ pages: [{ page, text }] }`.
 */
export class OcrSidecarBackend implements TextExtractionBackend {
  readonly name = 'ocr-sidecar';
  readonly ocr = true;

  constructor(
    private readonly baseUrl: string,
    private readonly timeoutMs: number
  ) {}

  accepts(document: DocumentSource): boolean {
    return OCR_EXTENSIONS.has(extname(document.path).toLowerCase());
  }

  async extract(document: DocumentSource): Promise<TextExtractionResult> {
    const url = new URL('/ocr', this.baseUrl);
    const buffer = await fs.readFile(document.path);
    const formData = new FormData();
    formData.set('file', new Blob([new Uint8Array(buffer)]), basename(document.path));

    const response = await fetch(url, {
      method: 'POST',
      body: formData,
      signal: AbortSignal.timeout(this.timeoutMs)
    });

    if (!response.ok) {
      throw new BackendFailureError(`OCR sidecar returned HTTP ${response.status}`, this.name, {
        status: response.status
      });
    }

    const parsed = ocrResponseSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new BackendFailureError('OCR sidecar returned an unexpected payload.', this.name, {
        issues: parsed.error.issues.map((issue) => issue.message)
      });
    }

    const ordered = [...parsed.data.pages].sort((a, b) => (a.page ?? 0) - (b.page ?? 0));
    const pages = buildPages(ordered.map((page) => page.text));
    if (pages.length === 0) {
      return failedResult('OCR sidecar produced no text.');
    }

    return successfulResult(pages);
  }
}
