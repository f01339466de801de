import { describe, it, expect } from 'vitest';
import { MetadataError } from '../../src/errors.js';
import {
  assertOutputMatches,
  deriveOutputSchema,
  inferFieldSpec,
} from '../../src/metadata/deriveOutputSchema.js';
import type { IndexedOutput } from '../../src/metadata/deriveOutputSchema.js';
import { buildSchema } from '../../src/schema/Schema.js';
import type { FeatureRecord } from '../../src/schema/types.js';

function outputs(...records: FeatureRecord[]): IndexedOutput[] {
  return records.map((values, index) => ({ index, values }));
}

describe('deriveOutputSchema', () => {
  it('infers type, arity and presence from the produced values', () => {
    const schema = deriveOutputSchema(outputs({ a: 1, b: 'x', v: [1, 2] }, { a: 2, b: null, v: [3, 4] }));

    expect(schema.toString()).toBe('a: float scalar, b: string scalar?, v: float vector(2)');
  });

  it('treats a field missing from some records as optional', () => {
    const schema = deriveOutputSchema(outputs({ a: 1 }, { a: 2, extra: 'yes' }));

    expect(schema.get('extra')).toEqual({ name: 'extra', valueType: 'string', arity: { kind: 'scalar' }, required: false });
  });

  it('rejects arity drift between records', () => {
    expect(() => deriveOutputSchema(outputs({ a: 1 }, { a: [1, 2] }))).toThrow(
      "Output 'a' drifted: record 1 produced float vector(2), record 0 produced float scalar"
    );
  });

  it('rejects type drift between records', () => {
    try {
      deriveOutputSchema(outputs({ a: 'x' }, { a: 'y' }, { a: 3 }));
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(MetadataError);
      if (error instanceof MetadataError) {
        expect(error.field).toBe('a');
        expect(error.phase).toBe('transforming');
        expect(error.message).toBe("Output 'a' drifted: record 2 produced float scalar, record 0 produced string scalar");
      }
    }
  });

  it('rejects vectors that mix numbers and strings', () => {
    expect(() => deriveOutputSchema(outputs({ v: [1, 'a'] }))).toThrow(
      "Output 'v' of record 0 mixes numbers and strings"
    );
  });

  it('rejects non-finite numbers', () => {
    expect(() => deriveOutputSchema(outputs({ a: 1 }, { a: NaN }))).toThrow("Output 'a' of record 1 is NaN");
  });

  it('requires a declaration for empty lists and all-null fields', () => {
    expect(() => deriveOutputSchema(outputs({ tags: [] }))).toThrow(
      "Output 'tags' of record 0 is an empty list; declare the output to fix its type"
    );
    expect(() => deriveOutputSchema(outputs({ c: null }))).toThrow(
      "Output 'c' was never produced with a value; declare the output to fix its type"
    );
  });

  it('uses declarations instead of inference', () => {
    const schema = deriveOutputSchema(outputs({ idx: 0, words: [] }, { idx: 3, words: ['a', 'b', 'c'] }), {
      idx: { valueType: 'int' },
      words: { valueType: 'string', arity: { kind: 'varlen' } },
    });

    expect(schema.toString()).toBe('idx: int scalar, words: string varlen');
  });

  it('rejects values that break their declaration', () => {
    expect(() => deriveOutputSchema(outputs({ idx: 1.5 }), { idx: { valueType: 'int' } })).toThrow(
      "Output 'idx' of record 0 breaks its declaration: expected int, got number"
    );
  });

  it('rejects declared required outputs that are missing', () => {
    expect(() => deriveOutputSchema(outputs({ idx: 1 }, {}), { idx: { valueType: 'int' } })).toThrow(
      "Output 'idx' is declared required but some records did not produce it"
    );
    expect(() => deriveOutputSchema(outputs({ a: 1 }), { idx: { valueType: 'int' } })).toThrow(
      "Output 'idx' is declared required but no record produced it"
    );
  });

  it('derives declared outputs for an empty batch', () => {
    const schema = deriveOutputSchema([], { idx: { valueType: 'int', required: false } });
    expect(schema.names()).toEqual(['idx']);
  });
});

describe('inferFieldSpec', () => {
  it('infers a required spec for a present value', () => {
    expect(inferFieldSpec('v', [1, 2])).toEqual({
      name: 'v',
      valueType: 'float',
      arity: { kind: 'vector', length: 2 },
      required: true,
    });
    expect(inferFieldSpec('v', null)).toBeNull();
  });
});

describe('assertOutputMatches', () => {
  const frozen = buildSchema({ a: { valueType: 'float' } });

  it('accepts conforming records', () => {
    expect(() => assertOutputMatches(frozen, { a: 0.5 }, 'serving')).not.toThrow();
  });

  it('names the first drifting field', () => {
    expect(() => assertOutputMatches(frozen, { a: 'x' }, 'serving')).toThrow(
      "Output does not match the frozen output schema: field 'a': expected float, got string"
    );
    expect(() => assertOutputMatches(frozen, { a: 1, extra: 2 }, 'serving')).toThrow(
      "Output does not match the frozen output schema: field 'extra': field is not declared in the schema"
    );
  });
});
