import { promises as fs } from 'node:fs';
import { basename, extname, join, resolve } from 'node:path';
import type { AppConfig } from '../config.js';
import { mapWithConcurrency } from '../core/concurrency.js';
import type { Logger } from '../core/logger.js';
import { renderReferences as renderFormat } from '../export/formatters.js';
import { ReferenceStore } from '../export/reference-store.js';
import type { ExportFormat, ExportResult } from '../export/types.js';
import { createBackends } from './backends/index.js';
import { DocumentNotFoundError, DocumentTooLargeError, errorMessage } from './errors.js';
import { TextExtractionArbiter } from './extraction-arbiter.js';
import { extractReferences, filterByConfidence } from './reference-pipeline.js';
import type { BackendAttempt, ExtractedReference } from './types.js';
import { nowIso } from './utils.js';

export interface ExtractOptions {
  minConfidence?: number;
}

export interface DocumentExtractOptions extends ExtractOptions {
  outputPath?: string;
  formats?: ExportFormat[];
}

export interface TextExtractionOutcome {
  references: ExtractedReference[];
  totalFound: number;
  discarded: number;
}

export interface DocumentExtractionOutcome extends TextExtractionOutcome {
  documentPath: string;
  backend: string;
  ocr: boolean;
  textQuality: number;
  attempts: BackendAttempt[];
  outputFiles: ExportResult;
  processingTimeMs: number;
}

export interface BatchOptions extends ExtractOptions {
  outputDir?: string;
  formats?: ExportFormat[];
  concurrency?: number;
}

export interface BatchDocumentResult {
  path: string;
  status: 'success' | 'error';
  referenceCount: number;
  processingTimeMs: number;
  outputFiles: ExportResult;
  error: string | null;
}

export interface BatchOutcome {
  outputDir: string;
  summaryPath: string;
  totalDocuments: number;
  succeeded: number;
  failed: number;
  totalReferences: number;
  documents: BatchDocumentResult[];
}

export interface ProcessingError {
  path: string;
  error: string;
  timestamp: string;
}

export interface ProcessingStatistics {
  documentsProcessed: number;
  referencesExtracted: number;
  averageConfidence: number;
  errors: ProcessingError[];
}

const toAbsolutePath = (value: string): string => resolve(process.cwd(), value);

const isMissingFile = (error: unknown): boolean =>
  error instanceof Error && 'code' in error && (error.code === 'ENOENT' || error.code === 'ENOTDIR');

const elapsedSince = (startedAt: number): number => Math.round(performance.now() - startedAt);

// Two inputs with the same file name get distinct export names.
const uniqueStems = (paths: readonly string[]): string[] => {
  const seen = new Map<string, number>();
  return paths.map((path) => {
    const stem = basename(path, extname(path));
    const count = (seen.get(stem) ?? 0) + 1;
    seen.set(stem, count);
    return count === 1 ? stem : `${stem}_${count}`;
  });
};

export class ReferenceService {
  private documentsProcessed = 0;
  private referencesExtracted = 0;
  private confidenceTotal = 0;
  private errors: ProcessingError[] = [];

  constructor(
    private readonly config: AppConfig,
    private readonly arbiter: TextExtractionArbiter,
    private readonly store: ReferenceStore,
    private readonly logger: Logger
  ) {}

  static fromConfig(config: AppConfig, logger: Logger): ReferenceService {
    const arbiter = new TextExtractionArbiter(createBackends(config, logger), logger, config.qualityIndicators);
    return new ReferenceService(config, arbiter, new ReferenceStore(logger), logger);
  }

  extractFromText(text: string, options: ExtractOptions = {}): TextExtractionOutcome {
    const all = extractReferences(text, { minLength: this.config.minReferenceLength, logger: this.logger });
    const references = filterByConfidence(all, options.minConfidence ?? this.config.minConfidence);

    return {
      references,
      totalFound: all.length,
      discarded: all.length - references.length
    };
  }

  async extractFromDocument(path: string, options: DocumentExtractOptions = {}): Promise<DocumentExtractionOutcome> {
    const documentPath = toAbsolutePath(path);
    const startedAt = performance.now();
    const logger = this.logger.child({ document: documentPath });

    try {
      await this.assertReadable(documentPath);

      const extraction = await this.arbiter.extract({ path: documentPath });
      const all = extractReferences(extraction.text, { minLength: this.config.minReferenceLength, logger });
      const references = filterByConfidence(all, options.minConfidence ?? this.config.minConfidence);

      const outputFiles = options.outputPath
        ? await this.store.write(references, toAbsolutePath(options.outputPath), options.formats ?? this.config.outputFormats)
        : {};

      this.recordSuccess(references);
      logger.info('Extracted references from document', {
        backend: extraction.backend,
        found: all.length,
        kept: references.length
      });

      return {
        documentPath,
        backend: extraction.backend,
        ocr: extraction.ocr,
        textQuality: extraction.qualityScore,
        attempts: extraction.attempts,
        references,
        totalFound: all.length,
        discarded: all.length - references.length,
        outputFiles,
        processingTimeMs: elapsedSince(startedAt)
      };
    } catch (error) {
      this.errors.push({ path: documentPath, error: errorMessage(error), timestamp: nowIso() });
      throw error;
    }
  }

  async extractBatch(paths: readonly string[], options: BatchOptions = {}): Promise<BatchOutcome> {
    const outputDir = toAbsolutePath(options.outputDir ?? this.config.outputDir);
    const formats = options.formats ?? this.config.outputFormats;
    const stems = uniqueStems(paths);

    await fs.mkdir(outputDir, { recursive: true });

    const documents = await mapWithConcurrency(
      paths,
      options.concurrency ?? this.config.batchConcurrency,
      async (path, index): Promise<BatchDocumentResult> => {
        const startedAt = performance.now();
        try {
          const outcome = await this.extractFromDocument(path, {
            minConfidence: options.minConfidence,
            outputPath: join(outputDir, `references_${stems[index] ?? index}`),
            formats
          });

          return {
            path,
            status: 'success',
            referenceCount: outcome.references.length,
            processingTimeMs: outcome.processingTimeMs,
            outputFiles: outcome.outputFiles,
            error: null
          };
        } catch (error) {
          const message = errorMessage(error);
          this.logger.error('Batch document failed', { path, error: message });
          return {
            path,
            status: 'error',
            referenceCount: 0,
            processingTimeMs: elapsedSince(startedAt),
            outputFiles: {},
            error: message
          };
        }
      }
    );

    const succeeded = documents.filter((document) => document.status === 'success').length;
    const totalReferences = documents.reduce((total, document) => total + document.referenceCount, 0);
    const summaryPath = join(outputDir, 'batch_summary.json');

    const summary = {
      batch_timestamp: nowIso(),
      total_documents: documents.length,
      successful: succeeded,
      failed: documents.length - succeeded,
      total_references: totalReferences,
      documents: documents.map((document) => ({
        path: document.path,
        status: document.status,
        reference_count: document.referenceCount,
        processing_time_ms: document.processingTimeMs,
        output_files: document.outputFiles,
        error: document.error
      }))
    };

    await fs.writeFile(summaryPath, `${JSON.stringify(summary, null, 2)}\n`, 'utf8');
    this.logger.info('Batch finished', { outputDir, total: documents.length, succeeded });

    return {
      outputDir,
      summaryPath,
      totalDocuments: documents.length,
      succeeded,
      failed: documents.length - succeeded,
      totalReferences,
      documents
    };
  }

  renderReferences(references: ExtractedReference[], format: ExportFormat): string {
    return renderFormat(format, references, { generatedAt: nowIso() });
  }

  getStatistics(): ProcessingStatistics {
    return {
      documentsProcessed: this.documentsProcessed,
      referencesExtracted: this.referencesExtracted,
      averageConfidence: this.referencesExtracted > 0 ? this.confidenceTotal / this.referencesExtracted : 0,
      errors: this.errors.map((entry) => ({ ...entry }))
    };
  }

  resetStatistics(): void {
    this.documentsProcessed = 0;
    this.referencesExtracted = 0;
    this.confidenceTotal = 0;
    this.errors = [];
  }

  private recordSuccess(references: ExtractedReference[]): void {
    this.documentsProcessed += 1;
    this.referencesExtracted += references.length;
    this.confidenceTotal += references.reduce((total, reference) => total + reference.confidenceScore, 0);
  }

  private async assertReadable(documentPath: string): Promise<void> {
    const stats = await fs.stat(documentPath).catch((error: unknown) => {
      if (isMissingFile(error)) {
        throw new DocumentNotFoundError(documentPath);
      }
      throw error;
    });

    if (!stats.isFile()) {
      throw new DocumentNotFoundError(documentPath);
    }

    const sizeMb = stats.size / (1024 * 1024);
    if (sizeMb > this.config.maxFileSizeMb) {
      throw new DocumentTooLargeError(documentPath, sizeMb, this.config.maxFileSizeMb);
    }
  }
}
