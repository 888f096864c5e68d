export const DEFAULT_QUALITY_INDICATORS: readonly string[] = [
  'abstract',
  'introduction',
  'methodology',
  'results',
  'conclusion',
  'references',
  'bibliography',
  'doi:',
  'http://',
  'https://',
  'journal',
  'conference',
  'proceedings',
  'volume',
  'issue'
];

export const OCR_QUALITY_FACTOR = 0.8;

export const countWords = (text: string): number => text.split(/\s+/).filter((token) => token.length > 0).length;

/**
 * Counts how many vocabulary entries appear at least once in the text, ignoring case.
 */
export const countIndicators = (text: string, indicators: readonly string[]): number => {
  const haystack = text.toLowerCase();
  return indicators.filter((indicator) => indicator.length > 0 && haystack.includes(indicator.toLowerCase())).length;
};

/**
 * Estimates how much a raw extraction looks like an academic document, in [0, 1].
 * Length, word count and indicator coverage weigh 0.3, 0.3 and 0.4.
 */
export const scoreExtractedText = (
  text: string,
  indicators: readonly string[] = DEFAULT_QUALITY_INDICATORS
): number => {
  if (!text) {
    return 0;
  }

  const lengthFactor = text.length / 10000;
  const wordFactor = countWords(text) / 2000;
  const indicatorFactor = indicators.length > 0 ? countIndicators(text, indicators) / indicators.length : 0;

  return Math.min(1, 0.3 * lengthFactor + 0.3 * wordFactor + 0.4 * indicatorFactor);
};
