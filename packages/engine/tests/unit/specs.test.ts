import { describe, it, expect } from 'vitest';
import { distinctSpecs, mean, scale01, specKey, vocabulary } from '../../src/analyzers/specs.js';

describe('specKey', () => {
  it('formats kind and field', () => {
    expect(specKey(mean('price'))).toBe('mean(price)');
    expect(specKey(scale01('y'))).toBe('scale_0_1(y)');
  });

  it('includes vocabulary options in a fixed order', () => {
    expect(specKey(vocabulary('s'))).toBe('vocabulary(s)');
    expect(specKey(vocabulary('s', { topK: 10 }))).toBe('vocabulary(s;top_k=10)');
    expect(specKey(vocabulary('s', { topK: 5, frequencyThreshold: 2 }))).toBe(
      'vocabulary(s;frequency_threshold=2;top_k=5)'
    );
  });
});

describe('vocabulary', () => {
  it('omits options that were not given', () => {
    expect(vocabulary('s', {})).toEqual({ kind: 'vocabulary', field: 's' });
    expect(Object.keys(vocabulary('s', { topK: 3 }))).toEqual(['kind', 'field', 'topK']);
  });
});

describe('distinctSpecs', () => {
  it('keeps the first spec of each key in reference order', () => {
    const specs = distinctSpecs([mean('x'), vocabulary('s'), mean('x'), vocabulary('s', { topK: 2 }), vocabulary('s')]);

    expect(specs.map(specKey)).toEqual(['mean(x)', 'vocabulary(s)', 'vocabulary(s;top_k=2)']);
  });
});
