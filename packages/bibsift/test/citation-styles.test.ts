import { describe, expect, it } from 'vitest';
import { CITATION_GRAMMARS, matchCitationStyle, matchInput } from '../src/references/citation-styles.js';
import { EXAMPLE_APA_BOOK, EXAMPLE_APA_JOURNAL } from './helpers.js';

describe('matchCitationStyle', () => {
  it('parses an APA journal article', () => {
    expect(matchCitationStyle(EXAMPLE_APA_JOURNAL)).toEqual({
      style: 'apa',
      form: 'journal',
      authors: ['Smith, J. A.'],
      title: 'Machine learning in research',
      year: 2023,
      venue: 'AI Journal',
      volume: '15',
      issue: '3',
      pages: '45-62',
      bracketNumber: null
    });
  });

  it('parses an APA book with several authors', () => {
    const match = matchCitationStyle(EXAMPLE_APA_BOOK);

    expect(match?.style).toBe('apa');
    expect(match?.form).toBe('book');
    expect(match?.authors).toEqual(['Johnson, M.', 'Brown, K.']);
    expect(match?.title).toBe('Data Science Fundamentals');
    expect(match?.venue).toBe('Academic Press');
    expect(match?.year).toBe(2022);
  });

  it('parses an MLA journal article', () => {
    const match = matchCitationStyle(
      'Smith, John. "Deep Parsing of Citations." Journal of Text Mining, vol. 12, no. 4, 2019, pp. 1-20.'
    );

    expect(match).toMatchObject({
      style: 'mla',
      form: 'journal',
      authors: ['Smith, John'],
      title: 'Deep Parsing of Citations',
      venue: 'Journal of Text Mining',
      volume: '12',
      issue: '4',
      year: 2019,
      pages: '1-20'
    });
  });

  it('parses an MLA book', () => {
    expect(matchCitationStyle('Doe, Jane. Reading the Archive. Harbor Books, 2018.')).toMatchObject({
      style: 'mla',
      form: 'book',
      authors: ['Doe, Jane'],
      title: 'Reading the Archive',
      venue: 'Harbor Books',
      year: 2018
    });
  });

  it('parses a Chicago journal article', () => {
    expect(
      matchCitationStyle('Brown, Anna Marie. "Indexing Scholarly Text." Library Quarterly 33, no. 2 (2015): 101-130.')
    ).toMatchObject({
      style: 'chicago',
      form: 'journal',
      authors: ['Brown, Anna Marie'],
      title: 'Indexing Scholarly Text',
      venue: 'Library Quarterly',
      volume: '33',
      issue: '2',
      year: 2015,
      pages: '101-130'
    });
  });

  it('parses a Chicago book', () => {
    expect(matchCitationStyle('Green, Paul. The Citation Machine. Chicago: Lakeside Press, 2010.')).toMatchObject({
      style: 'chicago',
      form: 'book',
      authors: ['Green, Paul'],
      title: 'The Citation Machine',
      venue: 'Lakeside Press',
      year: 2010
    });
  });

  it('parses an IEEE journal article and keeps its bracket number', () => {
    expect(
      matchCitationStyle(
        '[2] A. Kumar and B. Lee, "Neural reference parsing," IEEE Trans. Knowl. Data Eng., vol. 31, no. 5, pp. 880-893, 2019.'
      )
    ).toEqual({
      style: 'ieee',
      form: 'journal',
      authors: ['A. Kumar', 'B. Lee'],
      title: 'Neural reference parsing',
      year: 2019,
      venue: 'IEEE Trans. Knowl. Data Eng.',
      volume: '31',
      issue: '5',
      pages: '880-893',
      bracketNumber: 2
    });
  });

  it('parses an IEEE book', () => {
    expect(matchCitationStyle('[7] J. Doe, Text Mining Basics. Harbor Press, 2019.')).toMatchObject({
      style: 'ieee',
      form: 'book',
      authors: ['J. Doe'],
      title: 'Text Mining Basics',
      venue: 'Harbor Press',
      year: 2019,
      bracketNumber: 7
    });
  });

  it('takes the first grammar that matches', () => {
    expect(matchCitationStyle(EXAMPLE_APA_JOURNAL)?.form).toBe('journal');
    expect(matchCitationStyle(EXAMPLE_APA_JOURNAL, [...CITATION_GRAMMARS].reverse())?.form).toBe('book');
  });

  it('only matches from the start of the entry', () => {
    expect(matchCitationStyle('3. Doe, J. (2019). Text mining basics. Harbor Press.')?.style).toBe('apa');
    expect(matchCitationStyle('see also Doe, J. (2019). Text mining basics. Harbor Press.')).toBeNull();
  });

  it('returns null when no grammar matches', () => {
    expect(matchCitationStyle('lorem ipsum dolor sit amet consectetur')).toBeNull();
  });

  it('rejects long upper-case entries without stalling', () => {
    const entries = [
      `Smith, J. ${'TRANSACTIONS '.repeat(12)}unmatched reference text`,
      'LECUN, Y. GRADIENT BASED LEARNING APPLIED TO DOCUMENT RECOGNITION. PROCEEDINGS OF THE IEEE, 86, 2278.'
    ];
    const startedAt = performance.now();

    for (const entry of entries) {
      expect(matchCitationStyle(entry)).toBeNull();
      expect(matchCitationStyle(`[4] ${entry}`)).toBeNull();
    }

    expect(performance.now() - startedAt).toBeLessThan(250);
  }, 1000);

  it('evaluates grammars in style order', () => {
    expect(CITATION_GRAMMARS.map((grammar) => `${grammar.style}:${grammar.form}`)).toEqual([
      'apa:journal',
      'apa:book',
      'mla:journal',
      'mla:book',
      'chicago:journal',
      'chicago:book',
      'ieee:journal',
      'ieee:book'
    ]);
  });
});

describe('matchInput', () => {
  it('restores the bracket marker for numbered candidates', () => {
    expect(matchInput({ text: 'Entry', sequenceNumber: 3, bracketNumber: 3, strategy: 'bracket' })).toBe('[3] Entry');
    expect(matchInput({ text: 'Entry', sequenceNumber: 1, bracketNumber: null, strategy: 'line' })).toBe('Entry');
  });
});
