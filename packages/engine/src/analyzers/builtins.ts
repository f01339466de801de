/**
 * Built-in analyzers
 *
 * Pure reductions. Every accumulator starts from an identity seed so an
 * empty shard merges as a no-op.
 */

import { AnalyzerError } from '../errors.js';
import type { ScalarValue } from '../schema/types.js';
import { specKey } from './specs.js';
import type {
  AnalyzerDefinition,
  AnalyzerSpec,
  MinMaxConstant,
  MomentsConstant,
  Position,
  VocabularyConstant,
} from './types.js';

function numeric(value: ScalarValue, spec: AnalyzerSpec): number {
  if (typeof value !== 'number') {
    throw new AnalyzerError(
      'TYPE_MISMATCH',
      `${specKey(spec)} expects numeric values, got ${typeof value}`,
      spec.field
    );
  }
  return value;
}

/** JSON has no negative zero; a stored constant must survive a reload */
function unsigned(value: number): number {
  return value === 0 ? 0 : value;
}

function emptyInput(spec: AnalyzerSpec): AnalyzerError {
  return new AnalyzerError('EMPTY_INPUT', `${specKey(spec)} received no values`, spec.field);
}

// ---------------------------------------------------------------------------
// MEAN

export interface MeanAccumulator {
  spec: AnalyzerSpec;
  sum: number;
  count: number;
}

export const meanAnalyzer: AnalyzerDefinition<MeanAccumulator, number> = {
  kind: 'mean',
  name: 'Mean',
  accepts: 'numeric',
  seed: (spec) => ({ spec, sum: 0, count: 0 }),
  accumulate(acc, value) {
    acc.sum += numeric(value, acc.spec);
    acc.count += 1;
    return acc;
  },
  merge(left, right) {
    left.sum += right.sum;
    left.count += right.count;
    return left;
  },
  finalize(acc, spec) {
    if (acc.count === 0) {
      throw emptyInput(spec);
    }
    return unsigned(acc.sum / acc.count);
  },
};

// ---------------------------------------------------------------------------
// MIN / MAX / SCALE_0_1 share one running-range accumulator

export interface RangeAccumulator {
  spec: AnalyzerSpec;
  min: number;
  max: number;
  count: number;
}

function seedRange(spec: AnalyzerSpec): RangeAccumulator {
  return { spec, min: Infinity, max: -Infinity, count: 0 };
}

function accumulateRange(acc: RangeAccumulator, value: ScalarValue): RangeAccumulator {
  const x = numeric(value, acc.spec);
  if (x < acc.min) acc.min = x;
  if (x > acc.max) acc.max = x;
  acc.count += 1;
  return acc;
}

function mergeRange(left: RangeAccumulator, right: RangeAccumulator): RangeAccumulator {
  left.min = Math.min(left.min, right.min);
  left.max = Math.max(left.max, right.max);
  left.count += right.count;
  return left;
}

export const minAnalyzer: AnalyzerDefinition<RangeAccumulator, number> = {
  kind: 'min',
  name: 'Minimum',
  accepts: 'numeric',
  seed: seedRange,
  accumulate: accumulateRange,
  merge: mergeRange,
  finalize(acc, spec) {
    if (acc.count === 0) {
      throw emptyInput(spec);
    }
    return unsigned(acc.min);
  },
};

export const maxAnalyzer: AnalyzerDefinition<RangeAccumulator, number> = {
  kind: 'max',
  name: 'Maximum',
  accepts: 'numeric',
  seed: seedRange,
  accumulate: accumulateRange,
  merge: mergeRange,
  finalize(acc, spec) {
    if (acc.count === 0) {
      throw emptyInput(spec);
    }
    return unsigned(acc.max);
  },
};

export const scale01Analyzer: AnalyzerDefinition<RangeAccumulator, MinMaxConstant> = {
  kind: 'scale_0_1',
  name: 'Scale to [0, 1]',
  accepts: 'numeric',
  seed: seedRange,
  accumulate: accumulateRange,
  merge: mergeRange,
  finalize(acc, spec) {
    if (acc.count === 0) {
      throw emptyInput(spec);
    }
    return { min: unsigned(acc.min), max: unsigned(acc.max) };
  },
};

// ---------------------------------------------------------------------------
// VARIANCE (Welford update, pairwise merge)

export interface MomentsAccumulator {
  spec: AnalyzerSpec;
  count: number;
  mean: number;
  m2: number;
}

export const varianceAnalyzer: AnalyzerDefinition<MomentsAccumulator, MomentsConstant> = {
  kind: 'variance',
  name: 'Mean and variance',
  accepts: 'numeric',
  seed: (spec) => ({ spec, count: 0, mean: 0, m2: 0 }),
  accumulate(acc, value) {
    const x = numeric(value, acc.spec);
    acc.count += 1;
    const delta = x - acc.mean;
    acc.mean += delta / acc.count;
    acc.m2 += delta * (x - acc.mean);
    return acc;
  },
  merge(left, right) {
    if (right.count === 0) {
      return left;
    }
    if (left.count === 0) {
      left.count = right.count;
      left.mean = right.mean;
      left.m2 = right.m2;
      return left;
    }
    const count = left.count + right.count;
    const delta = right.mean - left.mean;
    left.mean += (delta * right.count) / count;
    left.m2 += right.m2 + (delta * delta * left.count * right.count) / count;
    left.count = count;
    return left;
  },
  finalize(acc, spec) {
    if (acc.count === 0) {
      throw emptyInput(spec);
    }
    return { mean: unsigned(acc.mean), variance: Math.max(0, acc.m2 / acc.count), count: acc.count };
  },
};

// ---------------------------------------------------------------------------
// VOCABULARY

interface TokenStats {
  count: number;
  firstSeen: Position;
}

export interface VocabularyAccumulator {
  spec: AnalyzerSpec;
  tokens: Map<string, TokenStats>;
}

function comparePositions(a: Position, b: Position): number {
  return a[0] - b[0] || a[1] - b[1];
}

export const vocabularyAnalyzer: AnalyzerDefinition<VocabularyAccumulator, VocabularyConstant> = {
  kind: 'vocabulary',
  name: 'Vocabulary',
  accepts: 'string',
  seed: (spec) => ({ spec, tokens: new Map() }),
  accumulate(acc, value, position) {
    if (typeof value !== 'string') {
      throw new AnalyzerError(
        'TYPE_MISMATCH',
        `${specKey(acc.spec)} expects string values, got ${typeof value}`,
        acc.spec.field
      );
    }
    const stats = acc.tokens.get(value);
    if (stats) {
      stats.count += 1;
      if (comparePositions(position, stats.firstSeen) < 0) {
        stats.firstSeen = position;
      }
    } else {
      acc.tokens.set(value, { count: 1, firstSeen: position });
    }
    return acc;
  },
  merge(left, right) {
    for (const [token, theirs] of right.tokens) {
      const ours = left.tokens.get(token);
      if (!ours) {
        left.tokens.set(token, { ...theirs });
        continue;
      }
      ours.count += theirs.count;
      if (comparePositions(theirs.firstSeen, ours.firstSeen) < 0) {
        ours.firstSeen = theirs.firstSeen;
      }
    }
    return left;
  },
  finalize(acc, spec) {
    const threshold = spec.kind === 'vocabulary' ? (spec.frequencyThreshold ?? 1) : 1;
    const topK = spec.kind === 'vocabulary' ? spec.topK : undefined;

    // Descending frequency; ties go to the token seen first in the batch
    const ranked = Array.from(acc.tokens.entries())
      .filter(([, stats]) => stats.count >= threshold)
      .sort(([, a], [, b]) => b.count - a.count || comparePositions(a.firstSeen, b.firstSeen));
    const kept = topK !== undefined ? ranked.slice(0, topK) : ranked;

    return {
      tokens: kept.map(([token]) => token),
      frequencies: kept.map(([, stats]) => stats.count),
    };
  },
};

export const BUILTIN_ANALYZERS: readonly AnalyzerDefinition[] = [
  meanAnalyzer,
  minAnalyzer,
  maxAnalyzer,
  scale01Analyzer,
  varianceAnalyzer,
  vocabularyAnalyzer,
];
