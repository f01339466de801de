import { describe, it, expect } from 'vitest';
import { AnalyzerError } from '../../src/errors.js';
import { OOV_INDEX, applyVocabulary, centered, scaleTo01, scaleToZScore } from '../../src/transform/ops.js';

describe('centered', () => {
  it('subtracts the mean from scalars and vectors', () => {
    expect(centered(5, 2)).toBe(3);
    expect(centered([1, 2, 3], 2)).toEqual([-1, 0, 1]);
  });

  it('passes absent values through as null', () => {
    expect(centered(null, 2)).toBeNull();
    expect(centered(undefined, 2)).toBeNull();
  });

  it('rejects string input', () => {
    expect(() => centered('five', 2)).toThrow('centered expects numeric values, got string');
    expect(() => centered([1, 'two'], 2)).toThrow(AnalyzerError);
  });
});

describe('scaleTo01', () => {
  it('scales into the unit interval', () => {
    expect(scaleTo01(1, { min: 1, max: 3 })).toBe(0);
    expect(scaleTo01(2, { min: 1, max: 3 })).toBe(0.5);
    expect(scaleTo01([3, 5], { min: 1, max: 3 })).toEqual([1, 2]);
  });

  it('maps everything to 0 when the range is degenerate', () => {
    expect(scaleTo01(7, { min: 7, max: 7 })).toBe(0);
    expect(scaleTo01(9, { min: 7, max: 7 })).toBe(0);
  });
});

describe('scaleToZScore', () => {
  it('divides the centered value by the standard deviation', () => {
    expect(scaleToZScore(7, { mean: 3, variance: 4, count: 10 })).toBe(2);
  });

  it('scores a constant field as 0', () => {
    expect(scaleToZScore(3, { mean: 3, variance: 0, count: 5 })).toBe(0);
  });
});

describe('applyVocabulary', () => {
  const vocabulary = { tokens: ['hello', 'world'], frequencies: [2, 1] };

  it('maps tokens to their index', () => {
    expect(applyVocabulary('hello', vocabulary)).toBe(0);
    expect(applyVocabulary(['world', 'hello'], vocabulary)).toEqual([1, 0]);
  });

  it('maps unseen tokens to the out-of-vocabulary index', () => {
    expect(OOV_INDEX).toBe(-1);
    expect(applyVocabulary('unseen', vocabulary)).toBe(OOV_INDEX);
    expect(applyVocabulary('anything', { tokens: [], frequencies: [] })).toBe(OOV_INDEX);
  });

  it('rejects numeric tokens during the transform phase', () => {
    try {
      applyVocabulary(3, vocabulary);
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(AnalyzerError);
      if (error instanceof AnalyzerError) {
        expect(error.kind).toBe('TYPE_MISMATCH');
        expect(error.phase).toBe('transforming');
        expect(error.message).toBe('applyVocabulary expects string values, got number');
      }
    }
  });
});
