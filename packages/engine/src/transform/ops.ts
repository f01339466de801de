/**
 * Per-record operations that consume analyzer constants.
 *
 * Each op works element-wise on vector values and passes absent values
 * through as null.
 */

import type { MinMaxConstant, MomentsConstant, VocabularyConstant } from '../analyzers/types.js';
import { AnalyzerError } from '../errors.js';
import type { FieldValue } from '../schema/types.js';

/** Index assigned to tokens that were not seen during analysis */
export const OOV_INDEX = -1;

type NumericResult = number | number[] | null;

function mapNumbers(value: FieldValue, op: string, fn: (x: number) => number): NumericResult {
  if (value === null || value === undefined) {
    return null;
  }
  if (typeof value === 'number') {
    return fn(value);
  }
  if (typeof value === 'string') {
    throw new AnalyzerError('TYPE_MISMATCH', `${op} expects numeric values, got string`, undefined, 'transforming');
  }
  return value.map((element) => {
    if (typeof element !== 'number') {
      throw new AnalyzerError('TYPE_MISMATCH', `${op} expects numeric values, got string`, undefined, 'transforming');
    }
    return fn(element);
  });
}

/**
 * Subtract a mean
 */
export function centered(value: FieldValue, mean: number): NumericResult {
  return mapNumbers(value, 'centered', (x) => x - mean);
}

/**
 * Min-max scale into [0, 1]. A single-valued field (max == min) scales to 0.
 */
export function scaleTo01(value: FieldValue, range: MinMaxConstant): NumericResult {
  const span = range.max - range.min;
  return mapNumbers(value, 'scaleTo01', (x) => (span === 0 ? 0 : (x - range.min) / span));
}

/**
 * Standard score. A constant field (variance 0) scores 0.
 */
export function scaleToZScore(value: FieldValue, moments: MomentsConstant): NumericResult {
  const std = Math.sqrt(moments.variance);
  return mapNumbers(value, 'scaleToZScore', (x) => (std === 0 ? 0 : (x - moments.mean) / std));
}

const vocabularyIndexCache = new WeakMap<VocabularyConstant, ReadonlyMap<string, number>>();

function indexOf(vocabulary: VocabularyConstant): ReadonlyMap<string, number> {
  let index = vocabularyIndexCache.get(vocabulary);
  if (!index) {
    index = new Map(vocabulary.tokens.map((token, i): [string, number] => [token, i]));
    vocabularyIndexCache.set(vocabulary, index);
  }
  return index;
}

/**
 * Map tokens to their vocabulary index; unseen tokens map to OOV_INDEX
 */
export function applyVocabulary(value: FieldValue, vocabulary: VocabularyConstant): NumericResult {
  if (value === null || value === undefined) {
    return null;
  }
  const index = indexOf(vocabulary);
  const lookup = (token: string | number): number => {
    if (typeof token !== 'string') {
      throw new AnalyzerError(
        'TYPE_MISMATCH',
        `applyVocabulary expects string values, got ${typeof token}`,
        undefined,
        'transforming'
      );
    }
    return index.get(token) ?? OOV_INDEX;
  };
  if (typeof value === 'string' || typeof value === 'number') {
    return lookup(value);
  }
  return value.map(lookup);
}
