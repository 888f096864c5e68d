export { parseConfig, type AppConfig } from './config.js';
export { Logger, type LogLevel } from './core/logger.js';
export { ConcurrencyLimiter, mapWithConcurrency } from './core/concurrency.js';
export { renderReferences, escapeCsv } from './export/formatters.js';
export { renderBibtex } from './export/bibtex.js';
export { ReferenceStore } from './export/reference-store.js';
export { EXPORT_FORMATS, type ExportFormat, type ExportResult } from './export/types.js';
export { createBackends } from './references/backends/index.js';
export { BACKEND_NAMES, type BackendName, type TextExtractionBackend } from './references/backends/types.js';
export { CITATION_GRAMMARS, matchCitationStyle, type StyleMatch } from './references/citation-styles.js';
export { deduplicateReferences, isSameReference } from './references/deduplicator.js';
export * from './references/errors.js';
export { TextExtractionArbiter } from './references/extraction-arbiter.js';
export { enrichReference } from './references/metadata-enricher.js';
export { completenessScore, scoreReference } from './references/quality-scorer.js';
export { extractReferences, filterByConfidence, toFlatRecord } from './references/reference-pipeline.js';
export {
  ReferenceService,
  type BatchOutcome,
  type DocumentExtractionOutcome,
  type ProcessingStatistics,
  type TextExtractionOutcome
} from './references/reference-service.js';
export { findReferenceSection, segmentReferences } from './references/segmenter.js';
export { scoreExtractedText, DEFAULT_QUALITY_INDICATORS } from './references/text-quality.js';
export type * from './references/types.js';
