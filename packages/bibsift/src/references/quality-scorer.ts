import type { ExtractedReference } from './types.js';
import { appendNote, clamp, cleanReferenceText } from './utils.js';

export const MIN_VALID_YEAR = 1900;
export const MAX_VALID_YEAR = 2030;

const AUXILIARY_FIELDS = ['doi', 'url', 'volume', 'issue', 'pages'] as const;

export const isValidYear = (year: number): boolean => year >= MIN_VALID_YEAR && year <= MAX_VALID_YEAR;

export const completenessScore = (reference: ExtractedReference): number => {
  const filled = AUXILIARY_FIELDS.filter((field) => reference[field].length > 0).length;
  const score =
    (reference.authors.length > 0 ? 0.3 : 0) +
    (reference.title ? 0.3 : 0) +
    (reference.year !== null ? 0.2 : 0) +
    (reference.venue ? 0.2 : 0) +
    0.2 * (filled / AUXILIARY_FIELDS.length);

  return clamp(score, 0, 1);
};

/** Cleans text fields, drops out-of-range years and replaces the match-time confidence. */
export const scoreReference = (reference: ExtractedReference): ExtractedReference => {
  const cleaned: ExtractedReference = {
    ...reference,
    fullText: cleanReferenceText(reference.fullText),
    title: cleanReferenceText(reference.title),
    venue: cleanReferenceText(reference.venue)
  };

  if (cleaned.year !== null && !isValidYear(cleaned.year)) {
    cleaned.notes = appendNote(cleaned.notes, `Invalid year detected (${cleaned.year})`);
    cleaned.year = null;
  }

  return {
    ...cleaned,
    confidenceScore: completenessScore(cleaned)
  };
};

export const scoreReferences = (references: ExtractedReference[]): ExtractedReference[] =>
  references.map(scoreReference);
