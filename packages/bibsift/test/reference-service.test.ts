import { copyFile, mkdir, mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { parseConfig } from '../src/config.js';
import { Logger } from '../src/core/logger.js';
import { DocumentNotFoundError, DocumentTooLargeError, NoTextExtractedError } from '../src/references/errors.js';
import { ReferenceService } from '../src/references/reference-service.js';
import { EXAMPLE_APA_JOURNAL, fixturePath } from './helpers.js';

const createService = (overrides: Parameters<typeof parseConfig>[0] = {}): ReferenceService =>
  ReferenceService.fromConfig(parseConfig({ BIBSIFT_BACKENDS: 'plain-text', ...overrides }), new Logger('error'));

describe('ReferenceService', () => {
  let workDir = '';

  beforeEach(async () => {
    workDir = await mkdtemp(join(tmpdir(), 'bibsift-service-'));
  });

  afterEach(async () => {
    await rm(workDir, { recursive: true, force: true });
  });

  it('extracts and filters references from a text document', async () => {
    const service = createService();

    const outcome = await service.extractFromDocument(fixturePath('sample-paper.txt'));

    expect(outcome.documentPath).toBe(fixturePath('sample-paper.txt'));
    expect(outcome.backend).toBe('plain-text');
    expect(outcome.ocr).toBe(false);
    expect(outcome.attempts).toHaveLength(1);
    expect(outcome.totalFound).toBe(3);
    expect(outcome.discarded).toBe(1);
    expect(outcome.references.map((reference) => reference.title)).toEqual([
      'Machine learning in research',
      'Data Science Fundamentals'
    ]);
    expect(outcome.outputFiles).toEqual({});
  });

  it('applies a per-call confidence threshold', async () => {
    const service = createService();

    const outcome = await service.extractFromDocument(fixturePath('sample-paper.txt'), { minConfidence: 0 });

    expect(outcome.references).toHaveLength(3);
    expect(outcome.discarded).toBe(0);
  });

  it('writes export files when an output path is given', async () => {
    const service = createService();
    const outputPath = join(workDir, 'references_sample');

    const outcome = await service.extractFromDocument(fixturePath('sample-paper.txt'), {
      outputPath,
      formats: ['json']
    });

    expect(outcome.outputFiles).toEqual({ json: `${outputPath}.json` });
    const written: unknown = JSON.parse(await readFile(`${outputPath}.json`, 'utf8'));
    expect(written).toMatchObject({ extraction_metadata: { total_references: 2 } });
  });

  it('extracts from raw text', () => {
    const outcome = createService().extractFromText(EXAMPLE_APA_JOURNAL);

    expect(outcome.totalFound).toBe(1);
    expect(outcome.references[0]?.citationStyle).toBe('apa');
  });

  it('rejects missing paths and directories', async () => {
    const service = createService();
    const missing = join(workDir, 'absent.txt');

    await expect(service.extractFromDocument(missing)).rejects.toThrow(`Document not found: ${missing}`);
    await expect(service.extractFromDocument(workDir)).rejects.toBeInstanceOf(DocumentNotFoundError);
    expect(service.getStatistics().errors.map((entry) => entry.path)).toEqual([missing, workDir]);
  });

  it('rejects files over the size limit', async () => {
    const service = createService({ BIBSIFT_MAX_FILE_SIZE_MB: 1 });
    const path = join(workDir, 'large.txt');
    await writeFile(path, Buffer.alloc(1572864, 'a'));

    const failure = service.extractFromDocument(path);

    await expect(failure).rejects.toBeInstanceOf(DocumentTooLargeError);
    await expect(failure).rejects.toThrow('File too large: 1.5MB (max: 1MB)');
  });

  it('fails when no backend accepts the document', async () => {
    const service = createService();
    const path = join(workDir, 'paper.docx');
    await writeFile(path, 'placeholder');

    await expect(service.extractFromDocument(path)).rejects.toBeInstanceOf(NoTextExtractedError);
  });

  it('processes a batch and writes a summary', async () => {
    const service = createService();
    const copy = join(workDir, 'copy', 'sample-paper.txt');
    const missing = join(workDir, 'absent.txt');
    const outputDir = join(workDir, 'out');
    await mkdir(join(workDir, 'copy'));
    await copyFile(fixturePath('sample-paper.txt'), copy);

    const outcome = await service.extractBatch([fixturePath('sample-paper.txt'), missing, copy], {
      outputDir,
      formats: ['csv'],
      concurrency: 2
    });

    expect(outcome).toMatchObject({
      outputDir,
      summaryPath: join(outputDir, 'batch_summary.json'),
      totalDocuments: 3,
      succeeded: 2,
      failed: 1,
      totalReferences: 4
    });
    expect(outcome.documents.map((document) => document.status)).toEqual(['success', 'error', 'success']);
    expect(outcome.documents[1]?.error).toBe(`Document not found: ${missing}`);
    expect(outcome.documents[2]?.outputFiles).toEqual({ csv: join(outputDir, 'references_sample-paper_2.csv') });

    const summary: unknown = JSON.parse(await readFile(outcome.summaryPath, 'utf8'));
    expect(summary).toMatchObject({ total_documents: 3, successful: 2, failed: 1, total_references: 4 });
  });

  it('tracks and resets processing statistics', async () => {
    const service = createService();
    await service.extractFromDocument(fixturePath('sample-paper.txt'));
    await expect(service.extractFromDocument(join(workDir, 'absent.txt'))).rejects.toThrow(DocumentNotFoundError);

    const statistics = service.getStatistics();
    expect(statistics.documentsProcessed).toBe(1);
    expect(statistics.referencesExtracted).toBe(2);
    expect(statistics.averageConfidence).toBeCloseTo(1);
    expect(statistics.errors).toHaveLength(1);

    service.resetStatistics();

    expect(service.getStatistics()).toEqual({
      documentsProcessed: 0,
      referencesExtracted: 0,
      averageConfidence: 0,
      errors: []
    });
  });
});
