/**
 * Tallies classified tracks into per-category counts and a success rate.
 */

import { isCanonicalCategory } from '../../shared/types';
import type { CanonicalCategory, ClassificationSummary } from '../../shared/types';

/** A category map with every canonical category at zero */
export function emptyCategoryCounts(): Record<CanonicalCategory, number> {
  return { 'Dance Pop': 0, House: 0, Bass: 0 };
}

/**
 * Summarizes classification results. Anything other than a canonical
 * category counts as unclassified. An empty list yields an all-zero
 * summary without dividing.
 */
export function summarizeClassifications(tracks: ReadonlyArray<{ classification?: unknown }>): ClassificationSummary {
  const categories = emptyCategoryCounts();
  const totalTracks = tracks.length;

  if (totalTracks === 0) {
    return { totalTracks: 0, categories, unclassified: 0, successRate: 0 };
  }

  let unclassified = 0;
  for (const track of tracks) {
    if (isCanonicalCategory(track.classification)) {
      categories[track.classification]++;
    } else {
      unclassified++;
    }
  }

  return {
    totalTracks,
    categories,
    unclassified,
    successRate: (totalTracks - unclassified) / totalTracks,
  };
}

/**
 * Percentage of the total, one decimal place ("40.0").
 */
export function formatShare(count: number, total: number): string {
  return total > 0 ? ((count / total) * 100).toFixed(1) : '0.0';
}
