import { promises as fs } from 'node:fs';
import { basename, extname } from 'node:path';
import { BackendFailureError } from '../errors.js';
import type { DocumentSource, TextExtractionResult } from '../types.js';
import { normalizeWhitespace } from '../utils.js';
import { buildPages, failedResult, successfulResult, type TextExtractionBackend } from './types.js';

const ENTITIES: Record<string, string> = {
  amp: '&',
  lt: '<',
  gt: '>',
  quot: '"',
  apos: "'"
};

const decodeEntities = (value: string): string =>
  value.replace(/&(#x[0-9a-f]+|#\d+|[a-z]+);/gi, (match, entity: string) => {
    if (entity.startsWith('#x') || entity.startsWith('#X')) {
      return String.fromCodePoint(Number.parseInt(entity.slice(2), 16));
    }
    if (entity.startsWith('#')) {
      return String.fromCodePoint(Number.parseInt(entity.slice(1), 10));
    }
    return ENTITIES[entity.toLowerCase()] ?? match;
  });

const stripTags = (fragment: string): string => normalizeWhitespace(decodeEntities(fragment.replace(/<[^>]+>/g, ' ')));

const referenceLine = (biblStruct: string): string => {
  const raw = biblStruct.match(/<note[^>]*type="raw_reference"[^>]*>([\s\S]*?)<\/note>/i)?.[1];
  return stripTags(raw ?? biblStruct);
};

/**
 * Flattens a GROBID TEI document into line-oriented text: title, abstract, one
 * paragraph per block with section heads on their own lines, then a
 * "References" section with one numbered entry per biblStruct.
 */
export const teiToPlainText = (xml: string): string => {
  const blocks: string[] = [];

  const title = xml.match(/<title[^>]*type="main"[^>]*>([\s\S]*?)<\/title>/i)?.[1];
  if (title) {
    blocks.push(stripTags(title));
  }

  const abstract = xml.match(/<abstract[^>]*>([\s\S]*?)<\/abstract>/i)?.[1];
  if (abstract && stripTags(abstract)) {
    blocks.push(`Abstract\n${stripTags(abstract)}`);
  }

  const body = xml.match(/<body>([\s\S]*?)<\/body>/i)?.[1] ?? '';
  for (const division of body.matchAll(/<div[^>]*>([\s\S]*?)<\/div>/gi)) {
    const content = division[1] ?? '';
    const head = content.match(/<head[^>]*>([\s\S]*?)<\/head>/i)?.[1];
    const paragraphs = [...content.matchAll(/<p[^>]*>([\s\S]*?)<\/p>/gi)]
      .map((paragraph) => stripTags(paragraph[1] ?? ''))
      .filter((paragraph) => paragraph.length > 0);

    if (head) {
      blocks.push(stripTags(head));
    }
    blocks.push(...paragraphs);
  }

  const references = [...xml.matchAll(/<biblStruct[\s\S]*?<\/biblStruct>/gi)]
    .map((entry) => referenceLine(entry[0]))
    .filter((line) => line.length > 0);

  if (references.length > 0) {
    blocks.push(['References', ...references.map((line, index) => `[${index + 1}] ${line}`)].join('\n'));
  }

  return blocks.join('\n\n');
};

export class GrobidBackend implements TextExtractionBackend {
  readonly name = 'grobid';
  readonly ocr = false;

  constructor(
    private readonly baseUrl: string,
    private readonly timeoutMs: number
  ) {}

  accepts(document: DocumentSource): boolean {
    return extname(document.path).toLowerCase() === '.pdf';
  }

  async extract(document: DocumentSource): Promise<TextExtractionResult> {
    const url = new URL('/api/processFulltextDocument', this.baseUrl);
    const buffer = await fs.readFile(document.path);
    const formData = new FormData();
    formData.set('input', new Blob([new Uint8Array(buffer)], { type: 'application/pdf' }), basename(document.path));
    formData.set('includeRawCitations', '1');

    const response = await fetch(url, {
      method: 'POST',
      body: formData,
      signal: AbortSignal.timeout(this.timeoutMs)
    });

    if (!response.ok) {
      throw new BackendFailureError(`GROBID returned HTTP ${response.status}`, this.name, { status: response.status });
    }

    const text = teiToPlainText(await response.text());
    if (!text) {
      return failedResult('GROBID response did not include extractable text.');
    }

    return successfulResult(buildPages([text]));
  }
}
