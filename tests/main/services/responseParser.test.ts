import { describe, it, expect } from 'vitest';
import {
  countClassified,
  extractPredictions,
  parseClassificationResponse,
  resolveCategory,
} from '../../../src/main/services/responseParser';

describe('resolveCategory', () => {
  it('should return exact matches', () => {
    expect(resolveCategory('Dance Pop')).toBe('Dance Pop');
    expect(resolveCategory('House')).toBe('House');
    expect(resolveCategory('Bass')).toBe('Bass');
  });

  it('should trim surrounding whitespace', () => {
    expect(resolveCategory('  House \n')).toBe('House');
  });

  it('should match case-insensitively by containment', () => {
    expect(resolveCategory('dance pop')).toBe('Dance Pop');
    expect(resolveCategory('HOUSE')).toBe('House');
    expect(resolveCategory('bass music')).toBe('Bass');
  });

  it('should match when the text is contained in a category', () => {
    expect(resolveCategory('pop')).toBe('Dance Pop');
    expect(resolveCategory('ass')).toBe('Bass');
  });

  it('should pick the first category in declared order when several match', () => {
    expect(resolveCategory('Deep House Bass')).toBe('House');
    expect(resolveCategory('Bass-heavy Dance Pop')).toBe('Dance Pop');
  });

  it('should return null when nothing matches', () => {
    expect(resolveCategory('Techno')).toBeNull();
  });

  it('should resolve blank text to the first declared category', () => {
    expect(resolveCategory('   ')).toBe('Dance Pop');
    expect(parseClassificationResponse('Track 1: ** **', 1)).toEqual(['Dance Pop']);
  });
});

describe('extractPredictions', () => {
  it('should let later lines for the same track win', () => {
    const predictions = extractPredictions('Track 1: **House**\nTrack 1: **Bass**');
    expect(predictions.get(1)).toBe('Bass');
    expect(predictions.size).toBe(1);
  });

  it('should keep an earlier mapping when a later line does not resolve', () => {
    const predictions = extractPredictions('Track 1: **House**\nTrack 1: **Techno**');
    expect(predictions.get(1)).toBe('House');
  });
});

describe('parseClassificationResponse', () => {
  it('should parse well-formed lines in order', () => {
    const response = 'Track 1: **Dance Pop**\nTrack 2: **House**\nTrack 3: **Bass**';
    expect(parseClassificationResponse(response, 3)).toEqual(['Dance Pop', 'House', 'Bass']);
  });

  it('should leave missing tracks null', () => {
    const response = 'Track 1: **Dance Pop**\nTrack 3: **House**';
    expect(parseClassificationResponse(response, 3)).toEqual(['Dance Pop', null, 'House']);
  });

  it('should return k resolved entries followed by nulls', () => {
    const response = 'Track 1: **House**\nTrack 2: **Bass**';
    expect(parseClassificationResponse(response, 5)).toEqual(['House', 'Bass', null, null, null]);
  });

  it('should apply fuzzy matching', () => {
    const response = 'Track 1: **dance pop**\nTrack 2: **HOUSE**\nTrack 3: **bass music**';
    expect(parseClassificationResponse(response, 3)).toEqual(['Dance Pop', 'House', 'Bass']);
  });

  it('should yield null for unknown categories without throwing', () => {
    expect(parseClassificationResponse('Track 1: **Techno**\nTrack 2: **House**', 2)).toEqual([null, 'House']);
  });

  it('should accept any casing of the word Track', () => {
    expect(parseClassificationResponse('track 1: **House**\nTRACK 2: **Bass**', 2)).toEqual(['House', 'Bass']);
  });

  it('should accept missing whitespace after the colon', () => {
    expect(parseClassificationResponse('Track 1:**Bass**', 1)).toEqual(['Bass']);
  });

  it('should ignore track numbers outside the batch', () => {
    const response = 'Track 0: **House**\nTrack 4: **Bass**\nTrack 2: **House**';
    expect(parseClassificationResponse(response, 2)).toEqual([null, 'House']);
  });

  it('should ignore prose around the prediction lines', () => {
    const response = 'Here are the predictions:\n\nTrack 1: **Bass**\nTrack 2: **House** (strong 4/4 groove)\n';
    expect(parseClassificationResponse(response, 2)).toEqual(['Bass', 'House']);
  });

  it('should ignore lines without the asterisk markup', () => {
    expect(parseClassificationResponse('Track 1: House', 1)).toEqual([null]);
  });

  it('should return all nulls for an empty reply', () => {
    expect(parseClassificationResponse('', 3)).toEqual([null, null, null]);
  });

  it('should return an empty list for an empty batch', () => {
    expect(parseClassificationResponse('Track 1: **House**', 0)).toEqual([]);
  });
});

describe('countClassified', () => {
  it('should count non-null entries', () => {
    expect(countClassified(['House', null, 'Bass', null])).toBe(2);
    expect(countClassified([])).toBe(0);
  });
});
