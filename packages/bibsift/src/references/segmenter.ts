import type { Candidate, SegmentationStrategy } from './types.js';
import { cleanReferenceText, normalizeWhitespace } from './utils.js';

export const DEFAULT_MIN_REFERENCE_LENGTH = 20;

const SECTION_HEADERS = ['references', 'bibliography', 'works\\s+cited', 'literature\\s+cited', 'citations'];

const headerPattern = (header: string): RegExp =>
  new RegExp(`^[ \\t]*(?:(?:\\d+|[IVXLC]+)\\.?[ \\t]+)?${header}[ \\t]*:?[ \\t]*$`, 'im');

const TRAILING_HEADER = /^[ \t]*(?:appendi(?:x|ces)|supplementary\s+materials?|acknowledge?ments?|author\s+information|about\s+the\s+authors?)\b/im;

const REFERENCE_START = [/^\[\d+\]/, /^\d+\./, /^[A-Z][a-z]+,\s*[A-Z]/];

const BRACKET_MARKER = /\[(\d+)\]/g;

const BLANK_LINE = /\n[ \t]*\n/g;

interface Marker {
  number: number;
  start: number;
  end: number;
}

interface RawSpan {
  text: string;
  bracketNumber: number | null;
}

export interface SegmentationResult {
  candidates: Candidate[];
  sectionFound: boolean;
  regionStrategy: Extract<SegmentationStrategy, 'bracket' | 'line'>;
}

const findMarkers = (text: string): Marker[] => {
  const markers: Marker[] = [];
  const pattern = new RegExp(BRACKET_MARKER.source, 'g');
  let match: RegExpExecArray | null;
  while ((match = pattern.exec(text)) !== null) {
    markers.push({
      number: Number.parseInt(match[1] ?? '0', 10),
      start: match.index,
      end: match.index + match[0].length
    });
  }
  return markers;
};

const normalizeNewlines = (text: string): string => text.replace(/\r\n?/g, '\n');

/**
 * Returns the text between the first bibliography header that stands on its own
 * line and the earliest trailing-section header after it, or null without a header.
 */
export const findReferenceSection = (text: string): string | null => {
  const normalized = normalizeNewlines(text);

  for (const header of SECTION_HEADERS) {
    const match = headerPattern(header).exec(normalized);
    if (!match) {
      continue;
    }

    const rest = normalized.slice(match.index + match[0].length);
    const end = TRAILING_HEADER.exec(rest);
    return rest.slice(0, end ? end.index : rest.length).trim();
  }

  return null;
};

export const isReferenceStart = (line: string): boolean => REFERENCE_START.some((pattern) => pattern.test(line));

export const splitBracketNumbered = (region: string): RawSpan[] => {
  const markers = findMarkers(region);

  return markers
    .map((marker, index) => ({
      text: region.slice(marker.end, markers[index + 1]?.start ?? region.length).trim(),
      bracketNumber: marker.number
    }))
    .filter((span) => span.text.length > 0);
};

export const splitLineBased = (region: string): RawSpan[] => {
  const spans: RawSpan[] = [];
  let current = '';

  const close = (): void => {
    if (current) {
      spans.push({ text: current, bracketNumber: null });
      current = '';
    }
  };

  for (const rawLine of normalizeNewlines(region).split('\n')) {
    const line = rawLine.trim();
    if (!line) {
      close();
      continue;
    }

    if (isReferenceStart(line)) {
      close();
      current = line;
      continue;
    }

    current = current ? `${current} ${line}` : line;
  }

  close();
  return spans;
};

/**
 * Scans the whole document for `[n]` markers; each entry runs to the next marker
 * or the first blank line, whichever comes first.
 */
export const scanNumberedReferences = (text: string): RawSpan[] => {
  const normalized = normalizeNewlines(text);
  const markers = findMarkers(normalized);
  const spans: RawSpan[] = [];

  markers.forEach((marker, index) => {
    const blankLine = new RegExp(BLANK_LINE.source, 'g');
    blankLine.lastIndex = marker.end;
    const boundary = blankLine.exec(normalized);
    const end = Math.min(markers[index + 1]?.start ?? normalized.length, boundary ? boundary.index : normalized.length);
    const span = normalized.slice(marker.end, end).trim();

    if (span) {
      spans.push({ text: span, bracketNumber: marker.number });
    }
  });

  return spans;
};

const toCandidates = (spans: RawSpan[], strategy: SegmentationStrategy, minLength: number): Candidate[] =>
  spans
    .map((span, index) => ({
      text: normalizeWhitespace(span.text),
      sequenceNumber: span.bracketNumber ?? index + 1,
      bracketNumber: span.bracketNumber,
      strategy
    }))
    .filter((candidate) => candidate.text.length >= minLength && cleanReferenceText(candidate.text).length > 0);

export const segmentReferences = (
  text: string,
  minLength: number = DEFAULT_MIN_REFERENCE_LENGTH
): SegmentationResult => {
  const section = findReferenceSection(text);
  const region = section ?? normalizeNewlines(text);
  const useBrackets = findMarkers(region).length > 0;

  const regionCandidates = useBrackets
    ? toCandidates(splitBracketNumbered(region), 'bracket', minLength)
    : toCandidates(splitLineBased(region), 'line', minLength);

  const scanned = toCandidates(scanNumberedReferences(text), 'numbered-scan', minLength);

  return {
    candidates: [...regionCandidates, ...scanned],
    sectionFound: section !== null,
    regionStrategy: useBrackets ? 'bracket' : 'line'
  };
};
