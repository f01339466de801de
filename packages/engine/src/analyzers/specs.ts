/**
 * Analyzer spec builders and canonical keys
 */

import type { AnalyzerSpec, AnalyzerSpecOf } from './types.js';

export function mean(field: string): AnalyzerSpecOf<'mean'> {
  return { kind: 'mean', field };
}

export function min(field: string): AnalyzerSpecOf<'min'> {
  return { kind: 'min', field };
}

export function max(field: string): AnalyzerSpecOf<'max'> {
  return { kind: 'max', field };
}

/**
 * Min-max range of a field, consumed by scaleTo01()
 */
export function scale01(field: string): AnalyzerSpecOf<'scale_0_1'> {
  return { kind: 'scale_0_1', field };
}

/**
 * Mean and population variance of a field, consumed by scaleToZScore()
 */
export function variance(field: string): AnalyzerSpecOf<'variance'> {
  return { kind: 'variance', field };
}

export interface VocabularyOptions {
  /** Keep only the k most frequent tokens */
  topK?: number;
  /** Drop tokens seen fewer times than this */
  frequencyThreshold?: number;
}

export function vocabulary(field: string, options: VocabularyOptions = {}): AnalyzerSpecOf<'vocabulary'> {
  const spec: AnalyzerSpecOf<'vocabulary'> = { kind: 'vocabulary', field };
  if (options.topK !== undefined) spec.topK = options.topK;
  if (options.frequencyThreshold !== undefined) spec.frequencyThreshold = options.frequencyThreshold;
  return spec;
}

/**
 * Canonical key of a spec, e.g. `mean(x)` or `vocabulary(s;top_k=10)`.
 * Identical specs share a key and are computed once.
 */
export function specKey(spec: AnalyzerSpec): string {
  if (spec.kind !== 'vocabulary') {
    return `${spec.kind}(${spec.field})`;
  }
  const params: string[] = [];
  if (spec.frequencyThreshold !== undefined) params.push(`frequency_threshold=${spec.frequencyThreshold}`);
  if (spec.topK !== undefined) params.push(`top_k=${spec.topK}`);
  return params.length ? `vocabulary(${spec.field};${params.join(';')})` : `vocabulary(${spec.field})`;
}

/**
 * Distinct specs in first-reference order
 */
export function distinctSpecs(specs: Iterable<AnalyzerSpec>): AnalyzerSpec[] {
  const byKey = new Map<string, AnalyzerSpec>();
  for (const spec of specs) {
    const key = specKey(spec);
    if (!byKey.has(key)) {
      byKey.set(key, spec);
    }
  }
  return Array.from(byKey.values());
}

/**
 * The same spec with its keys in a fixed order, whatever order the caller
 * wrote them in
 */
export function canonicalSpec(spec: AnalyzerSpec): AnalyzerSpec {
  if (spec.kind !== 'vocabulary') {
    return { kind: spec.kind, field: spec.field };
  }
  return vocabulary(spec.field, { topK: spec.topK, frequencyThreshold: spec.frequencyThreshold });
}
