import type { DocumentSource, PageText, TextExtractionResult } from '../types.js';

export const BACKEND_NAMES = ['pdf-parse', 'grobid', 'ocr-sidecar', 'plain-text'] as const;

export type BackendName = (typeof BACKEND_NAMES)[number];

export interface TextExtractionBackend {
  readonly name: string;
  /** OCR-derived text is scored lower by the arbiter. */
  readonly ocr: boolean;
  accepts(document: DocumentSource): boolean;
  extract(document: DocumentSource): Promise<TextExtractionResult>;
}

export const buildPages = (pageTexts: string[]): PageText[] =>
  pageTexts
    .map((text, index) => ({ pageNumber: index + 1, text, charCount: text.length }))
    .filter((page) => page.text.trim().length > 0);

export const successfulResult = (pages: PageText[]): TextExtractionResult => ({
  text: pages.map((page) => page.text).join('\n'),
  pages,
  success: true
});

export const failedResult = (error: string): TextExtractionResult => ({
  text: '',
  pages: [],
  success: false,
  error
});
