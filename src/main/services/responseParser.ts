/**
 * Classification Response Parser
 *
 * Extracts per-track categories from a backend reply of the form
 * `Track N: **Category**`. The reply format is not guaranteed, so parsing
 * tolerates case variation, extra words around the category, duplicate
 * and out-of-range track numbers. It never throws.
 */

import { CATEGORIES, CanonicalCategory, ClassificationResult, isCanonicalCategory } from '../../shared/types';

const PREDICTION_PATTERN = /Track\s+(\d+):\s*\*\*([^*]+)\*\*/gi;

/**
 * Maps raw category text to a canonical category.
 *
 * Exact (case-sensitive) matches win outright. Otherwise the categories are
 * scanned in declared order and the first one that contains, or is contained
 * by, the text (case-insensitively) is returned. Blank text is contained in
 * every category, so it resolves to the first one.
 */
export function resolveCategory(rawCategory: string): CanonicalCategory | null {
  const trimmed = rawCategory.trim();
  if (isCanonicalCategory(trimmed)) {
    return trimmed;
  }

  const lowered = trimmed.toLowerCase();
  for (const category of CATEGORIES) {
    const canonical = category.toLowerCase();
    if (lowered.includes(canonical) || canonical.includes(lowered)) {
      return category;
    }
  }

  return null;
}

/**
 * Collects resolved categories keyed by 1-based track number.
 * Later lines for the same number replace earlier ones; unresolvable
 * lines leave any earlier mapping in place.
 */
export function extractPredictions(response: string): Map<number, CanonicalCategory> {
  const predictions = new Map<number, CanonicalCategory>();

  for (const match of response.matchAll(PREDICTION_PATTERN)) {
    const trackNumber = Number.parseInt(match[1], 10);
    const category = resolveCategory(match[2]);
    if (category !== null) {
      predictions.set(trackNumber, category);
    }
  }

  return predictions;
}

/**
 * Parses a reply into exactly `expectedCount` results, positionally aligned
 * with the batch. Tracks without a resolvable line are null.
 */
export function parseClassificationResponse(response: string, expectedCount: number): ClassificationResult[] {
  const predictions = extractPredictions(response);
  const results: ClassificationResult[] = [];

  for (let trackNumber = 1; trackNumber <= expectedCount; trackNumber++) {
    results.push(predictions.get(trackNumber) ?? null);
  }

  return results;
}

/**
 * Number of non-null results.
 */
export function countClassified(results: readonly ClassificationResult[]): number {
  return results.filter((result) => result !== null).length;
}
