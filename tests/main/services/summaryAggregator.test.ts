import { describe, it, expect } from 'vitest';
import type { ClassificationResult } from '../../../src/shared/types';
import {
  emptyCategoryCounts,
  formatShare,
  summarizeClassifications,
} from '../../../src/main/services/summaryAggregator';

function withClassifications(results: ClassificationResult[]): Array<{ classification: ClassificationResult }> {
  return results.map((classification) => ({ classification }));
}

describe('summarizeClassifications', () => {
  it('should count categories and unclassified tracks', () => {
    const summary = summarizeClassifications(
      withClassifications(['Dance Pop', 'Dance Pop', 'House', 'Bass', null]),
    );

    expect(summary).toEqual({
      totalTracks: 5,
      categories: { 'Dance Pop': 2, House: 1, Bass: 1 },
      unclassified: 1,
      successRate: 0.8,
    });
  });

  it('should return a zeroed summary for no tracks', () => {
    expect(summarizeClassifications([])).toEqual({
      totalTracks: 0,
      categories: { 'Dance Pop': 0, House: 0, Bass: 0 },
      unclassified: 0,
      successRate: 0,
    });
  });

  it('should zero-fill categories that never occur', () => {
    const summary = summarizeClassifications(withClassifications(['Bass', 'Bass']));
    expect(summary.categories).toEqual({ 'Dance Pop': 0, House: 0, Bass: 2 });
    expect(summary.successRate).toBe(1);
  });

  it('should count labels outside the canonical set as unclassified', () => {
    const summary = summarizeClassifications([{ classification: 'Techno' }, { classification: 'house' }, {}]);
    expect(summary.unclassified).toBe(3);
    expect(summary.successRate).toBe(0);
  });
});

describe('emptyCategoryCounts', () => {
  it('should return a fresh map each call', () => {
    const first = emptyCategoryCounts();
    first.House = 4;
    expect(emptyCategoryCounts().House).toBe(0);
  });
});

describe('formatShare', () => {
  it('should render a percentage with one decimal', () => {
    expect(formatShare(2, 5)).toBe('40.0');
    expect(formatShare(1, 3)).toBe('33.3');
  });

  it('should render zero for an empty total', () => {
    expect(formatShare(0, 0)).toBe('0.0');
  });
});
