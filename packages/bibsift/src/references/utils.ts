export const nowIso = (): string => new Date().toISOString();

export const normalizeWhitespace = (input: string): string => input.replace(/\s+/g, ' ').trim();

const EDGE_PUNCTUATION = /^[\s.,;:]+|[\s.,;:]+$/g;

export const cleanReferenceText = (input: string): string => {
  if (!input) {
    return '';
  }

  return input.replace(/\s+/g, ' ').replace(EDGE_PUNCTUATION, '');
};

export const stripTrailingPunctuation = (input: string): string => input.replace(/[.,;)\]]+$/, '');

export const clamp = (value: number, min: number, max: number): number => Math.min(max, Math.max(min, value));

export const wordSet = (input: string): Set<string> =>
  new Set(
    input
      .toLowerCase()
      .replace(/[^\p{L}\p{N}\s]+/gu, ' ')
      .split(/\s+/)
      .filter((token) => token.length > 0)
  );

export const setJaccard = (a: Set<string>, b: Set<string>): number => {
  if (a.size === 0 || b.size === 0) {
    return 0;
  }

  let overlap = 0;
  for (const token of a) {
    if (b.has(token)) {
      overlap += 1;
    }
  }

  return overlap / (a.size + b.size - overlap);
};

export const textSimilarity = (left: string, right: string): number => {
  if (!left || !right) {
    return 0;
  }

  if (left.toLowerCase() === right.toLowerCase()) {
    return 1;
  }

  return setJaccard(wordSet(left), wordSet(right));
};

export const appendNote = (notes: string, note: string): string => (notes ? `${notes}; ${note}` : note);
