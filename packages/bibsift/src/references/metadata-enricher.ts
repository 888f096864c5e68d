import type { ExtractedReference, ReferenceType } from './types.js';
import { stripTrailingPunctuation } from './utils.js';

const DOI_PATTERN = /(?:doi:\s*|https?:\/\/(?:dx\.)?doi\.org\/)(10\.\d+\/\S+)/i;
const URL_PATTERN = /https?:\/\/\S+/i;
const PREFIXED_ISBN_PATTERN = /\bISBN(?:-1[03])?:?\s*([\dX][\dX\s-]{8,16}[\dX])/i;
const HYPHENATED_ISBN_PATTERN = /\b((?:97[89]-)?\d{1,5}-\d{1,7}-\d{1,7}-[\dX])\b/i;
const VOLUME_PATTERN = /\b(?:vol\.?|volume)\s*(\d+)/i;
const ISSUE_PATTERN = /\b(?:no\.?|issue|number)\s*(\d+)/i;
const PAGES_PATTERN = /\b(?:pp?\.?|pages?)\s*(\d[\d–-]*)/i;

const TYPE_KEYWORDS: ReadonlyArray<[Exclude<ReferenceType, 'unknown'>, readonly string[]]> = [
  ['journal', ['journal', 'vol.', 'volume', 'issue']],
  ['conference', ['proceedings', 'conference', 'symposium', 'workshop']],
  ['book', ['book', 'publisher', 'press']],
  ['website', ['http://', 'https://', 'www.']],
  ['thesis', ['thesis', 'dissertation']]
];

export const findDoi = (text: string): string => {
  const match = DOI_PATTERN.exec(text);
  return match?.[1] ? stripTrailingPunctuation(match[1]) : '';
};

export const findUrl = (text: string): string => {
  const match = URL_PATTERN.exec(text);
  return match ? stripTrailingPunctuation(match[0]) : '';
};

const isbnDigits = (value: string): string => value.replace(/[^\dX]/gi, '');

const isValidIsbnLength = (value: string): boolean => {
  const digits = isbnDigits(value);
  return digits.length === 10 || digits.length === 13;
};

export const findIsbn = (text: string): string => {
  for (const pattern of [PREFIXED_ISBN_PATTERN, HYPHENATED_ISBN_PATTERN]) {
    const value = pattern.exec(text)?.[1]?.trim();
    if (value && isValidIsbnLength(value)) {
      return value;
    }
  }

  return '';
};

const firstGroup = (pattern: RegExp, text: string): string => pattern.exec(text)?.[1] ?? '';

export const classifyReferenceType = (text: string): ReferenceType => {
  const lowered = text.toLowerCase();
  for (const [type, keywords] of TYPE_KEYWORDS) {
    if (keywords.some((keyword) => lowered.includes(keyword))) {
      return type;
    }
  }

  return 'unknown';
};

/** Pulls identifiers from the full text; fields stay untouched when nothing is found. */
export const enrichReference = (reference: ExtractedReference): ExtractedReference => {
  const text = reference.fullText;
  const pick = (found: string, current: string): string => found || current;

  return {
    ...reference,
    doi: pick(findDoi(text), reference.doi),
    url: pick(findUrl(text), reference.url),
    isbn: pick(findIsbn(text), reference.isbn),
    volume: pick(firstGroup(VOLUME_PATTERN, text), reference.volume),
    issue: pick(firstGroup(ISSUE_PATTERN, text), reference.issue),
    pages: pick(firstGroup(PAGES_PATTERN, text), reference.pages),
    referenceType: classifyReferenceType(text)
  };
};
