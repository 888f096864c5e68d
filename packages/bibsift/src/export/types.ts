import type { ExtractedReference } from '../references/types.js';

export const EXPORT_FORMATS = ['json', 'csv', 'txt', 'md', 'bibtex'] as const;

export type ExportFormat = (typeof EXPORT_FORMATS)[number];

export const FORMAT_EXTENSIONS: Record<ExportFormat, string> = {
  json: 'json',
  csv: 'csv',
  txt: 'txt',
  md: 'md',
  bibtex: 'bib'
};

export interface RenderContext {
  generatedAt: string;
}

export type ReferenceRenderer = (references: ExtractedReference[], context: RenderContext) => string;

/** Maps each requested format to the written path, or to `Error: <message>` when it failed. */
export type ExportResult = Partial<Record<ExportFormat, string>>;
