import type { Logger } from '../core/logger.js';
import { matchCitationStyle, matchInput, STYLE_MATCH_CONFIDENCE, UNMATCHED_CONFIDENCE } from './citation-styles.js';
import { deduplicateReferences } from './deduplicator.js';
import { MalformedInputError, NoReferencesFoundError } from './errors.js';
import { enrichReference } from './metadata-enricher.js';
import { scoreReferences } from './quality-scorer.js';
import { DEFAULT_MIN_REFERENCE_LENGTH, segmentReferences } from './segmenter.js';
import type { Candidate, ExtractedReference, FlatReferenceRecord } from './types.js';

export const DEFAULT_MIN_CONFIDENCE = 0.3;

export const UNMATCHED_NOTE = 'Pattern matching failed, basic extraction only';

export interface ExtractReferencesOptions {
  minLength?: number;
  logger?: Logger;
}

export const parseCandidate = (candidate: Candidate): ExtractedReference => {
  const base: ExtractedReference = {
    sequenceNumber: candidate.sequenceNumber,
    fullText: candidate.text,
    authors: [],
    title: '',
    year: null,
    venue: '',
    volume: '',
    issue: '',
    pages: '',
    doi: '',
    url: '',
    isbn: '',
    referenceType: 'unknown',
    citationStyle: 'unknown',
    confidenceScore: UNMATCHED_CONFIDENCE,
    styleConfidence: UNMATCHED_CONFIDENCE,
    segmentation: candidate.strategy,
    notes: UNMATCHED_NOTE
  };

  const match = matchCitationStyle(matchInput(candidate));
  if (!match) {
    return base;
  }

  return {
    ...base,
    sequenceNumber: match.style === 'ieee' && match.bracketNumber !== null ? match.bracketNumber : base.sequenceNumber,
    authors: match.authors,
    title: match.title,
    year: match.year,
    venue: match.venue,
    volume: match.volume,
    issue: match.issue,
    pages: match.pages,
    citationStyle: match.style,
    confidenceScore: STYLE_MATCH_CONFIDENCE,
    styleConfidence: STYLE_MATCH_CONFIDENCE,
    notes: ''
  };
};

/**
 * Runs segmentation, style matching, enrichment, deduplication and scoring over raw
 * document text. Confidence filtering is left to the caller.
 */
export const extractReferences = (rawText: string, options: ExtractReferencesOptions = {}): ExtractedReference[] => {
  if (!rawText || rawText.trim().length === 0) {
    throw new MalformedInputError();
  }

  const minLength = options.minLength ?? DEFAULT_MIN_REFERENCE_LENGTH;
  const segmentation = segmentReferences(rawText, minLength);

  if (!segmentation.sectionFound) {
    options.logger?.debug('No reference section header found, scanning the whole document');
  }

  if (segmentation.candidates.length === 0) {
    throw new NoReferencesFoundError({ sectionFound: segmentation.sectionFound, minLength });
  }

  const parsed = segmentation.candidates.map((candidate) => enrichReference(parseCandidate(candidate)));
  const unique = deduplicateReferences(parsed);
  const references = scoreReferences(unique);

  options.logger?.debug('Reference pipeline finished', {
    candidates: segmentation.candidates.length,
    strategy: segmentation.regionStrategy,
    matched: parsed.filter((reference) => reference.citationStyle !== 'unknown').length,
    unique: references.length
  });

  return references;
};

export const filterByConfidence = (
  references: ExtractedReference[],
  threshold: number = DEFAULT_MIN_CONFIDENCE
): ExtractedReference[] => references.filter((reference) => reference.confidenceScore >= threshold);

export const toFlatRecord = (reference: ExtractedReference): FlatReferenceRecord => ({
  sequence_number: reference.sequenceNumber,
  full_text: reference.fullText,
  authors: reference.authors.join('; '),
  title: reference.title,
  year: reference.year,
  venue: reference.venue,
  volume: reference.volume,
  issue: reference.issue,
  pages: reference.pages,
  doi: reference.doi,
  url: reference.url,
  isbn: reference.isbn,
  reference_type: reference.referenceType,
  citation_style: reference.citationStyle,
  confidence_score: reference.confidenceScore,
  style_confidence: reference.styleConfidence,
  segmentation: reference.segmentation,
  notes: reference.notes
});
