import type { Logger } from '../core/logger.js';
import type { TextExtractionBackend } from './backends/types.js';
import { errorMessage, NoTextExtractedError } from './errors.js';
import { DEFAULT_QUALITY_INDICATORS, OCR_QUALITY_FACTOR, scoreExtractedText } from './text-quality.js';
import type { ArbitrationResult, BackendAttempt, DocumentSource, TextExtractionResult } from './types.js';

interface ScoredExtraction {
  backend: TextExtractionBackend;
  result: TextExtractionResult;
  score: number;
}

// Equal scores keep the earlier backend unless only the newcomer is non-OCR.
const outranks = (challenger: ScoredExtraction, incumbent: ScoredExtraction): boolean =>
  challenger.score > incumbent.score ||
  (challenger.score === incumbent.score && !challenger.backend.ocr && incumbent.backend.ocr);

export class TextExtractionArbiter {
  constructor(
    private readonly backends: TextExtractionBackend[],
    private readonly logger: Logger,
    private readonly indicators: readonly string[] = DEFAULT_QUALITY_INDICATORS
  ) {}

  async extract(document: DocumentSource): Promise<ArbitrationResult> {
    const attempts: BackendAttempt[] = [];
    let best: ScoredExtraction | null = null;

    for (const backend of this.backends) {
      if (!backend.accepts(document)) {
        attempts.push({
          backend: backend.name,
          ocr: backend.ocr,
          status: 'skipped',
          qualityScore: null,
          textLength: 0,
          error: null
        });
        continue;
      }

      let result: TextExtractionResult;
      try {
        result = await backend.extract(document);
      } catch (error) {
        result = { text: '', pages: [], success: false, error: errorMessage(error) };
      }

      if (!result.success || result.text.trim().length === 0) {
        const reason = result.error ?? 'Backend returned no text.';
        this.logger.warn('Extraction backend failed, trying next backend', {
          backend: backend.name,
          document: document.path,
          error: reason
        });
        attempts.push({
          backend: backend.name,
          ocr: backend.ocr,
          status: 'failed',
          qualityScore: null,
          textLength: 0,
          error: reason
        });
        continue;
      }

      const baseScore = scoreExtractedText(result.text, this.indicators);
      const scored: ScoredExtraction = {
        backend,
        result,
        score: backend.ocr ? baseScore * OCR_QUALITY_FACTOR : baseScore
      };

      attempts.push({
        backend: backend.name,
        ocr: backend.ocr,
        status: 'succeeded',
        qualityScore: scored.score,
        textLength: result.text.length,
        error: null
      });

      if (!best || outranks(scored, best)) {
        best = scored;
      }
    }

    if (!best) {
      throw new NoTextExtractedError(document.path, attempts);
    }

    this.logger.info('Selected text extraction', {
      document: document.path,
      backend: best.backend.name,
      qualityScore: Number(best.score.toFixed(3)),
      textLength: best.result.text.length
    });

    return {
      backend: best.backend.name,
      ocr: best.backend.ocr,
      text: best.result.text,
      pages: best.result.pages,
      qualityScore: best.score,
      attempts
    };
  }
}
