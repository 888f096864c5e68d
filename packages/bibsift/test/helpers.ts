import { readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import type { ExtractedReference } from '../src/references/types.js';

export const fixture = (name: string): string => readFileSync(resolve(process.cwd(), 'test', 'fixtures', name), 'utf8');

export const fixturePath = (name: string): string => resolve(process.cwd(), 'test', 'fixtures', name);

export const EXAMPLE_APA_JOURNAL = '[1] Smith, J. A. (2023). Machine learning in research. AI Journal, 15(3), 45-62.';

export const EXAMPLE_APA_BOOK = 'Johnson, M., & Brown, K. (2022). Data Science Fundamentals. Academic Press.';

export const makeReference = (overrides: Partial<ExtractedReference> = {}): ExtractedReference => ({
  sequenceNumber: 1,
  fullText: 'Smith, J. A. (2023). Machine learning in research. AI Journal, 15(3), 45-62',
  authors: ['Smith, J. A.'],
  title: 'Machine learning in research',
  year: 2023,
  venue: 'AI Journal',
  volume: '15',
  issue: '3',
  pages: '45-62',
  doi: '',
  url: '',
  isbn: '',
  referenceType: 'journal',
  citationStyle: 'apa',
  confidenceScore: 1,
  styleConfidence: 0.8,
  segmentation: 'bracket',
  notes: '',
  ...overrides
});
