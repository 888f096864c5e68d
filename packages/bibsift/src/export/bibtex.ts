import { Cite } from '@citation-js/core';
import '@citation-js/plugin-csl';
import '@citation-js/plugin-bibtex';
import type { ExtractedReference, ReferenceType } from '../references/types.js';
import type { ReferenceRenderer } from './types.js';

const CSL_TYPES: Record<ReferenceType, string> = {
  journal: 'article-journal',
  conference: 'paper-conference',
  book: 'book',
  website: 'webpage',
  thesis: 'thesis',
  unknown: 'document'
};

const FALLBACK_ENTRY_TYPES: Record<ReferenceType, string> = {
  journal: 'article',
  conference: 'inproceedings',
  book: 'book',
  website: 'misc',
  thesis: 'phdthesis',
  unknown: 'misc'
};

interface CslName {
  family: string;
  given: string;
}

// "Smith, J. A." keeps the family name first; "A. Kumar" puts it last.
export const toCslName = (author: string): CslName => {
  const commaIndex = author.indexOf(',');
  if (commaIndex > 0) {
    return {
      family: author.slice(0, commaIndex).trim(),
      given: author.slice(commaIndex + 1).trim()
    };
  }

  const parts = author.trim().split(/\s+/);
  return {
    family: parts[parts.length - 1] ?? author,
    given: parts.slice(0, -1).join(' ')
  };
};

export const citationKey = (reference: ExtractedReference, index: number): string => {
  const family = reference.authors[0] ? toCslName(reference.authors[0]).family : 'ref';
  const base = family.replace(/[^A-Za-z0-9]/g, '') || 'ref';
  return `${base}${reference.year ?? 'nd'}_${reference.sequenceNumber ?? index + 1}`;
};

export const toCsl = (reference: ExtractedReference, index: number): Record<string, unknown> => ({
  id: citationKey(reference, index),
  'citation-key': citationKey(reference, index),
  type: CSL_TYPES[reference.referenceType],
  title: reference.title || reference.fullText,
  author: reference.authors.map(toCslName),
  issued: reference.year !== null ? { 'date-parts': [[reference.year]] } : undefined,
  'container-title': reference.venue || undefined,
  volume: reference.volume || undefined,
  issue: reference.issue || undefined,
  page: reference.pages || undefined,
  DOI: reference.doi || undefined,
  URL: reference.url || undefined,
  ISBN: reference.isbn || undefined
});

const fallbackEntry = (reference: ExtractedReference, index: number): string => {
  const fields: Array<[string, string]> = [
    ['author', reference.authors.join(' and ')],
    ['title', reference.title || reference.fullText],
    ['year', reference.year === null ? '' : String(reference.year)],
    ['journal', reference.venue],
    ['doi', reference.doi]
  ];

  const body = fields
    .filter(([, value]) => value.length > 0)
    .map(([name, value]) => `  ${name}={${value}}`)
    .join(',\n');

  return `@${FALLBACK_ENTRY_TYPES[reference.referenceType]}{${citationKey(reference, index)},\n${body}\n}`;
};

export const renderBibtex: ReferenceRenderer = (references) => {
  const entries = references.map((reference, index) => {
    try {
      return new Cite([toCsl(reference, index)]).format('bibtex').trim();
    } catch {
      return fallbackEntry(reference, index);
    }
  });

  return entries.length > 0 ? `${entries.join('\n\n')}\n` : '';
};
