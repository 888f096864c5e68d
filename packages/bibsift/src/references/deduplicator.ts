import type { ExtractedReference } from './types.js';
import { textSimilarity } from './utils.js';

export const TITLE_SIMILARITY_THRESHOLD = 0.8;
export const FULL_TEXT_SIMILARITY_THRESHOLD = 0.9;

export const isSameReference = (left: ExtractedReference, right: ExtractedReference): boolean => {
  if (left.title && right.title) {
    return textSimilarity(left.title, right.title) > TITLE_SIMILARITY_THRESHOLD;
  }

  return textSimilarity(left.fullText, right.fullText) > FULL_TEXT_SIMILARITY_THRESHOLD;
};

/**
 * Keeps one reference per identity. A newcomer displaces the entries it matches only when
 * it beats all of them; it then takes the slot of the first. Output order follows first
 * acceptance, and no two kept entries match each other.
 */
export const deduplicateReferences = (references: ExtractedReference[]): ExtractedReference[] => {
  let accepted: ExtractedReference[] = [];

  for (const incoming of references) {
    const matched = accepted.filter((existing) => isSameReference(existing, incoming));

    if (matched.length === 0) {
      accepted.push(incoming);
      continue;
    }

    if (!matched.every((existing) => incoming.confidenceScore > existing.confidenceScore)) {
      continue;
    }

    const slot = accepted.indexOf(matched[0] ?? incoming);
    accepted = accepted.flatMap((existing, index) => {
      if (index === slot) {
        return [incoming];
      }
      return matched.includes(existing) ? [] : [existing];
    });
  }

  return accepted;
};
