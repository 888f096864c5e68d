import type { Candidate, CitationStyle } from './types.js';
import { normalizeWhitespace } from './utils.js';

export type MatchedStyle = Exclude<CitationStyle, 'unknown'>;

export type GrammarForm = 'journal' | 'book';

export interface StyleMatch {
  style: MatchedStyle;
  form: GrammarForm;
  authors: string[];
  title: string;
  year: number | null;
  venue: string;
  volume: string;
  issue: string;
  pages: string;
  bracketNumber: number | null;
}

type MatchGroups = Record<string, string | undefined>;

export interface CitationGrammar {
  style: MatchedStyle;
  form: GrammarForm;
  pattern: RegExp;
  splitAuthors: (value: string) => string[];
}

export const STYLE_MATCH_CONFIDENCE = 0.8;
export const UNMATCHED_CONFIDENCE = 0.3;

const NAME_CHARS = "A-Za-z'\\u00C0-\\u017F-";
// Names run to the end of their word.
const NAME = `[A-Z][${NAME_CHARS}]+(?![${NAME_CHARS}])`;
const INITIALS = '[A-Z]\\.(?:\\s*-?[A-Z]\\.)*';
const PAGE_RANGE = '\\d+(?:[-–]\\d+)?';
const MONTH = '(?:[A-Z][a-z]+\\.?\\s+)?';
// Numbered candidates reach the author-first grammars with their `[n]` or `n.` marker.
const LEADING_MARKER = '(?:(?:\\[\\d+\\]|\\d+\\.)\\s*)?';

const APA_AUTHOR = `${NAME}(?:,\\s*${INITIALS})?`;
const APA_AUTHORS = `${APA_AUTHOR}(?:(?:,\\s*|\\s+)(?:&\\s*)?${APA_AUTHOR})*`;

const MLA_AUTHORS = `${NAME},\\s*${NAME}(?:\\s+[A-Z]\\.)?(?:,?\\s+(?:and\\s+${NAME}(?:\\s+${NAME})+|et\\s+al))?`;

const CHICAGO_AUTHORS = `${NAME},\\s*${NAME}(?:\\s+(?:[A-Z]\\.|${NAME}))*(?:,?\\s+and\\s+${NAME}(?:\\s+${NAME})+)?`;

const IEEE_AUTHOR = `${INITIALS}\\s*${NAME}`;
const IEEE_AUTHORS = `${IEEE_AUTHOR}(?:(?:,\\s*(?:and\\s+)?|\\s+and\\s+)${IEEE_AUTHOR})*(?:,?\\s+et\\s+al\\.)?`;

const cleanAuthor = (value: string): string => normalizeWhitespace(value).replace(/^[\s,;&]+|[\s,;&]+$/g, '');

const splitOn =
  (separator: RegExp) =>
  (value: string): string[] =>
    value
      .split(separator)
      .map(cleanAuthor)
      .filter((author) => author.length > 0);

// "Smith, J. A., Jones, B., & Lee, C." splits after each initials block.
const splitApaAuthors = splitOn(/\s*(?:,\s*)?(?:&|\band\b)\s*|(?<=\.),\s*(?=[A-Z])/);
const splitListAuthors = splitOn(/,?\s+and\s+|,\s*(?=[A-Z]\.)/);
const singleAuthor = (value: string): string[] => {
  const author = cleanAuthor(value.replace(/,?\s+et\s+al\.?$/, ''));
  return author ? [author] : [];
};
const splitNamedAuthors = (value: string): string[] => {
  const [first, ...rest] = value.split(/,?\s+and\s+/);
  return [...singleAuthor(first ?? ''), ...rest.map(cleanAuthor).filter((author) => author.length > 0)];
};

const grammar = (
  style: MatchedStyle,
  form: GrammarForm,
  source: string,
  splitAuthors: (value: string) => string[]
): CitationGrammar => ({
  style,
  form,
  pattern: new RegExp(`^${source}`),
  splitAuthors
});

/** Evaluated in order; the first grammar that matches decides the style. */
export const CITATION_GRAMMARS: readonly CitationGrammar[] = [
  // Author, A. A. (Year). Title. Journal, Volume(Issue), pages.
  grammar(
    'apa',
    'journal',
    `${LEADING_MARKER}(?<authors>${APA_AUTHORS})\\s*\\((?<year>\\d{4})[a-z]?\\)\\.\\s*(?<title>[^.]+)\\.\\s*(?<venue>[^,]+),\\s*(?<volume>\\d+)(?:\\((?<issue>\\d+)\\))?(?:,\\s*(?<pages>${PAGE_RANGE}))?`,
    splitApaAuthors
  ),
  // Author, A. A., & Author, B. B. (Year). Book title. Publisher.
  grammar(
    'apa',
    'book',
    `${LEADING_MARKER}(?<authors>${APA_AUTHORS})\\s*\\((?<year>\\d{4})[a-z]?\\)\\.\\s*(?<title>[^.]+)\\.\\s*(?<venue>[^.]+)(?:\\.|$)`,
    splitApaAuthors
  ),
  // Last, First. "Title." Journal, vol. 1, no. 2, Year, pp. 3-4.
  grammar(
    'mla',
    'journal',
    `${LEADING_MARKER}(?<authors>${MLA_AUTHORS})\\.\\s*["“](?<title>[^"”]+?)[.,]?["”]\\s*(?<venue>[^,]+),\\s*vol\\.\\s*(?<volume>\\d+)(?:,\\s*no\\.\\s*(?<issue>\\d+))?,\\s*${MONTH}(?<year>\\d{4}),\\s*pp?\\.\\s*(?<pages>${PAGE_RANGE})`,
    splitNamedAuthors
  ),
  // Last, First. Book Title. Publisher, Year.
  grammar(
    'mla',
    'book',
    `${LEADING_MARKER}(?<authors>${MLA_AUTHORS})\\.\\s*(?<title>[^."“”]+)\\.\\s*(?<venue>[^,.:]+),\\s*(?<year>\\d{4})(?:\\.|$)`,
    splitNamedAuthors
  ),
  // Last, First Middle. "Title." Journal Volume, no. Issue (Year): pages.
  grammar(
    'chicago',
    'journal',
    `${LEADING_MARKER}(?<authors>${CHICAGO_AUTHORS})\\.\\s*["“](?<title>[^"”]+?)[.,]?["”]\\s*(?<venue>[^0-9"“”]+?)\\s+(?<volume>\\d+)(?:,\\s*no\\.\\s*(?<issue>\\d+))?\\s*\\(${MONTH}(?<year>\\d{4})\\):\\s*(?<pages>${PAGE_RANGE})`,
    splitNamedAuthors
  ),
  // Last, First Middle. Book Title. Place: Publisher, Year.
  grammar(
    'chicago',
    'book',
    `${LEADING_MARKER}(?<authors>${CHICAGO_AUTHORS})\\.\\s*(?<title>[^."“”]+)\\.\\s*[^:.]+:\\s*(?<venue>[^,]+),\\s*(?<year>\\d{4})(?:\\.|$)`,
    splitNamedAuthors
  ),
  // [1] A. Author, "Title," Journal, vol. 1, no. 2, pp. 3-4, Year.
  grammar(
    'ieee',
    'journal',
    `\\[(?<number>\\d+)\\]\\s*(?<authors>${IEEE_AUTHORS}),\\s*["“](?<title>[^"”]+?),?["”]\\s*(?<venue>[^,]+),\\s*vol\\.\\s*(?<volume>\\d+)(?:,\\s*no\\.\\s*(?<issue>\\d+))?,\\s*pp\\.\\s*(?<pages>${PAGE_RANGE}),\\s*${MONTH}(?<year>\\d{4})`,
    splitListAuthors
  ),
  // [1] A. Author, Book Title. Publisher, Year.
  grammar(
    'ieee',
    'book',
    `\\[(?<number>\\d+)\\]\\s*(?<authors>${IEEE_AUTHORS}),\\s*(?<title>[^.,"“”]+)\\.\\s*(?<venue>[^,]+),\\s*(?<year>\\d{4})(?:\\.|$)`,
    splitListAuthors
  )
];

const parseInteger = (value: string | undefined): number | null => {
  if (!value) {
    return null;
  }

  const parsed = Number.parseInt(value, 10);
  return Number.isFinite(parsed) ? parsed : null;
};

const toStyleMatch = (grammar: CitationGrammar, groups: MatchGroups): StyleMatch => ({
  style: grammar.style,
  form: grammar.form,
  authors: grammar.splitAuthors(groups.authors ?? ''),
  title: normalizeWhitespace(groups.title ?? ''),
  year: parseInteger(groups.year),
  venue: normalizeWhitespace(groups.venue ?? ''),
  volume: groups.volume ?? '',
  issue: groups.issue ?? '',
  pages: groups.pages ?? '',
  bracketNumber: parseInteger(groups.number)
});

export const matchCitationStyle = (
  text: string,
  grammars: readonly CitationGrammar[] = CITATION_GRAMMARS
): StyleMatch | null => {
  for (const grammar of grammars) {
    const match = grammar.pattern.exec(text);
    if (match?.groups) {
      return toStyleMatch(grammar, match.groups);
    }
  }

  return null;
};

/** IEEE grammars expect the bracket marker the segmenter split off. */
export const matchInput = (candidate: Candidate): string =>
  candidate.bracketNumber !== null ? `[${candidate.bracketNumber}] ${candidate.text}` : candidate.text;
