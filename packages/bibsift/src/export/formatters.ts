import { toFlatRecord } from '../references/reference-pipeline.js';
import type { ExtractedReference, FlatReferenceRecord } from '../references/types.js';
import { renderBibtex } from './bibtex.js';
import type { ExportFormat, ReferenceRenderer, RenderContext } from './types.js';

export const CSV_COLUMNS: ReadonlyArray<keyof FlatReferenceRecord> = [
  'sequence_number',
  'full_text',
  'authors',
  'title',
  'year',
  'venue',
  'volume',
  'issue',
  'pages',
  'doi',
  'url',
  'isbn',
  'reference_type',
  'citation_style',
  'confidence_score',
  'notes'
];

const RULE = '='.repeat(50);

export const escapeCsv = (value: string): string =>
  /[",\r\n]/.test(value) ? `"${value.replace(/"/g, '""')}"` : value;

const formatConfidence = (value: number): string => value.toFixed(2);

const averageConfidence = (references: ExtractedReference[]): number =>
  references.length === 0
    ? 0
    : references.reduce((total, reference) => total + reference.confidenceScore, 0) / references.length;

const countBy = <T extends string>(values: T[]): Array<[T, number]> => {
  const counts = new Map<T, number>();
  for (const value of values) {
    counts.set(value, (counts.get(value) ?? 0) + 1);
  }
  return [...counts.entries()].sort((a, b) => a[0].localeCompare(b[0]));
};

const capitalize = (value: string): string => value.charAt(0).toUpperCase() + value.slice(1);

// Label/value pairs shared by the text and markdown reports; empty values are left out.
const detailRows = (reference: ExtractedReference): Array<[string, string]> => {
  const rows: Array<[string, string]> = [
    ['Authors', reference.authors.join('; ')],
    ['Title', reference.title],
    ['Year', reference.year === null ? '' : String(reference.year)],
    ['Venue', reference.venue],
    ['Volume', reference.volume],
    ['Issue', reference.issue],
    ['Pages', reference.pages],
    ['DOI', reference.doi],
    ['URL', reference.url],
    ['ISBN', reference.isbn],
    ['Type', reference.referenceType],
    ['Citation Style', reference.citationStyle],
    ['Confidence Score', formatConfidence(reference.confidenceScore)],
    ['Notes', reference.notes]
  ];

  return rows.filter(([, value]) => value.length > 0);
};

export const renderJson: ReferenceRenderer = (references, context) =>
  `${JSON.stringify(
    {
      extraction_metadata: {
        total_references: references.length,
        extraction_timestamp: context.generatedAt,
        format_version: '1.0'
      },
      references: references.map((reference) => ({ ...toFlatRecord(reference), authors: reference.authors }))
    },
    null,
    2
  )}\n`;

export const renderCsv: ReferenceRenderer = (references) => {
  const rows = references.map((reference) => {
    const record = toFlatRecord(reference);
    return CSV_COLUMNS.map((column) => {
      const value = record[column];
      return escapeCsv(value === null ? '' : String(value));
    }).join(',');
  });

  return `${[CSV_COLUMNS.join(','), ...rows].join('\n')}\n`;
};

export const renderText: ReferenceRenderer = (references, context) => {
  const lines: string[] = [
    'EXTRACTED REFERENCES REPORT',
    RULE,
    '',
    `Total References: ${references.length}`,
    `Extraction Date: ${context.generatedAt}`,
    ''
  ];

  references.forEach((reference, index) => {
    lines.push(`REFERENCE ${index + 1}`, '-'.repeat(20));
    if (reference.sequenceNumber !== null) {
      lines.push(`Number: ${reference.sequenceNumber}`);
    }
    lines.push(`Full Text: ${reference.fullText}`, '');
    for (const [label, value] of detailRows(reference)) {
      lines.push(`${label}: ${value}`);
    }
    lines.push('', RULE, '');
  });

  return `${lines.join('\n')}\n`;
};

const escapeTableCell = (value: string): string => value.replace(/\|/g, '\\|');

export const renderMarkdown: ReferenceRenderer = (references, context) => {
  const lines: string[] = [
    '# Extracted References Report',
    '',
    `**Total References:** ${references.length}  `,
    `**Extraction Date:** ${context.generatedAt}  `,
    ''
  ];

  if (references.length > 0) {
    lines.push(`**Average Confidence Score:** ${formatConfidence(averageConfidence(references))}  `, '');
    lines.push('## Reference Types Summary', '');
    for (const [type, count] of countBy(references.map((reference) => reference.referenceType))) {
      lines.push(`- **${capitalize(type)}:** ${count}`);
    }
    lines.push('');
  }

  lines.push('## Detailed References', '');

  references.forEach((reference, index) => {
    lines.push(`### Reference ${index + 1}`, '');
    if (reference.sequenceNumber !== null) {
      lines.push(`**Reference Number:** ${reference.sequenceNumber}  `);
    }
    lines.push(`**Full Text:** ${reference.fullText}  `, '', '| Field | Value |', '|-------|-------|');
    for (const [label, value] of detailRows(reference)) {
      lines.push(`| ${label} | ${escapeTableCell(value)} |`);
    }
    lines.push('', '---', '');
  });

  return `${lines.join('\n')}\n`;
};

export const RENDERERS: Record<ExportFormat, ReferenceRenderer> = {
  json: renderJson,
  csv: renderCsv,
  txt: renderText,
  md: renderMarkdown,
  bibtex: renderBibtex
};

export const renderReferences = (
  format: ExportFormat,
  references: ExtractedReference[],
  context: RenderContext
): string => RENDERERS[format](references, context);
