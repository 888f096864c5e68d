import { describe, expect, it } from 'vitest';
import {
  classifyReferenceType,
  enrichReference,
  findDoi,
  findIsbn,
  findUrl
} from '../src/references/metadata-enricher.js';
import { makeReference } from './helpers.js';

describe('identifier extraction', () => {
  it('finds DOIs behind a prefix or a resolver URL', () => {
    expect(findDoi('See doi: 10.1000/xyz123.')).toBe('10.1000/xyz123');
    expect(findDoi('Online at https://doi.org/10.5555/abc-def),')).toBe('10.5555/abc-def');
    expect(findDoi('DOI:10.1234/ABC.5')).toBe('10.1234/ABC.5');
    expect(findDoi('10.1000/plain without prefix')).toBe('');
  });

  it('finds URLs and strips trailing punctuation', () => {
    expect(findUrl('Available at https://example.org/paper.pdf.')).toBe('https://example.org/paper.pdf');
    expect(findUrl('(see http://example.org/a);')).toBe('http://example.org/a');
    expect(findUrl('no link here')).toBe('');
  });

  it('accepts ISBNs with ten or thirteen digits only', () => {
    expect(findIsbn('ISBN 978-0-12-345678-9')).toBe('978-0-12-345678-9');
    expect(findIsbn('ISBN: 0-306-40615-2')).toBe('0-306-40615-2');
    expect(findIsbn('Published as 0-306-40615-2 in print')).toBe('0-306-40615-2');
    expect(findIsbn('ISBN 12345-6789')).toBe('');
  });
});

describe('classifyReferenceType', () => {
  it('applies keyword groups in priority order', () => {
    expect(classifyReferenceType('Journal of Things, proceedings issue')).toBe('journal');
    expect(classifyReferenceType('Proceedings of the Parsing Workshop')).toBe('conference');
    expect(classifyReferenceType('Harbor Press')).toBe('book');
    expect(classifyReferenceType('Available at www.example.org')).toBe('website');
    expect(classifyReferenceType('PhD thesis, Example University')).toBe('thesis');
    expect(classifyReferenceType('Untitled note')).toBe('unknown');
  });
});

describe('enrichReference', () => {
  it('fills volume, issue and pages from keyword patterns', () => {
    const enriched = enrichReference(
      makeReference({
        fullText: 'Some Title. Journal of Things, vol. 7, no. 3, pp. 11-19. doi: 10.4321/things.7',
        volume: '',
        issue: '',
        pages: '',
        referenceType: 'unknown'
      })
    );

    expect(enriched.volume).toBe('7');
    expect(enriched.issue).toBe('3');
    expect(enriched.pages).toBe('11-19');
    expect(enriched.doi).toBe('10.4321/things.7');
    expect(enriched.referenceType).toBe('journal');
  });

  it('keeps grammar-captured values when no pattern finds one', () => {
    const enriched = enrichReference(makeReference());

    expect(enriched.volume).toBe('15');
    expect(enriched.issue).toBe('3');
    expect(enriched.pages).toBe('45-62');
    expect(enriched.doi).toBe('');
    expect(enriched.url).toBe('');
  });
});
