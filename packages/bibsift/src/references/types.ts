export type CitationStyle = 'apa' | 'mla' | 'chicago' | 'ieee' | 'unknown';

export type ReferenceType = 'journal' | 'conference' | 'book' | 'website' | 'thesis' | 'unknown';

export type SegmentationStrategy = 'bracket' | 'line' | 'numbered-scan';

export interface DocumentSource {
  path: string;
}

export interface PageText {
  pageNumber: number;
  text: string;
  charCount: number;
}

export interface TextExtractionResult {
  text: string;
  pages: PageText[];
  success: boolean;
  error?: string;
}

export interface BackendAttempt {
  backend: string;
  ocr: boolean;
  status: 'succeeded' | 'failed' | 'skipped';
  qualityScore: number | null;
  textLength: number;
  error: string | null;
}

export interface ArbitrationResult {
  backend: string;
  ocr: boolean;
  text: string;
  pages: PageText[];
  qualityScore: number;
  attempts: BackendAttempt[];
}

export interface Candidate {
  text: string;
  sequenceNumber: number;
  bracketNumber: number | null;
  strategy: SegmentationStrategy;
}

export interface ExtractedReference {
  sequenceNumber: number | null;
  fullText: string;
  authors: string[];
  title: string;
  year: number | null;
  venue: string;
  volume: string;
  issue: string;
  pages: string;
  doi: string;
  url: string;
  isbn: string;
  referenceType: ReferenceType;
  citationStyle: CitationStyle;
  confidenceScore: number;
  styleConfidence: number;
  segmentation: SegmentationStrategy;
  notes: string;
}

export interface FlatReferenceRecord {
  sequence_number: number | null;
  full_text: string;
  authors: string;
  title: string;
  year: number | null;
  venue: string;
  volume: string;
  issue: string;
  pages: string;
  doi: string;
  url: string;
  isbn: string;
  reference_type: ReferenceType;
  citation_style: CitationStyle;
  confidence_score: number;
  style_confidence: number;
  segmentation: SegmentationStrategy;
  notes: string;
}
