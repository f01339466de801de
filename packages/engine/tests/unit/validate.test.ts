import { describe, it, expect } from 'vitest';
import { buildSchema } from '../../src/schema/Schema.js';
import { assertValidRecord, checkFieldValue, validateBatch, validateRecord } from '../../src/schema/validate.js';
import { ValidationError } from '../../src/errors.js';

const schema = buildSchema({
  x: { valueType: 'float' },
  n: { valueType: 'int', required: false },
  s: { valueType: 'string' },
  v: { valueType: 'float', arity: { kind: 'vector', length: 2 }, required: false },
  tags: { valueType: 'string', arity: { kind: 'varlen' }, required: false },
});

describe('validateRecord', () => {
  it('accepts a conforming record', () => {
    expect(validateRecord(schema, { x: 1.5, n: 3, s: 'a', v: [0, 1], tags: [] })).toEqual({ ok: true });
  });

  it('treats null and missing optional fields as absent', () => {
    expect(validateRecord(schema, { x: 1, s: 'a', n: null })).toEqual({ ok: true });
  });

  it('reports missing required fields', () => {
    expect(validateRecord(schema, { x: 1 })).toEqual({
      ok: false,
      issues: [{ field: 's', reason: 'required field is missing' }],
    });
  });

  it('reports undeclared fields', () => {
    expect(validateRecord(schema, { x: 1, s: 'a', extra: 2 })).toEqual({
      ok: false,
      issues: [{ field: 'extra', reason: 'field is not declared in the schema' }],
    });
  });

  it('reports type and arity mismatches', () => {
    const result = validateRecord(schema, { x: 'one', n: 2.5, s: 'a', v: [1, 2, 3], tags: ['ok', 4] });

    expect(result).toEqual({
      ok: false,
      issues: [
        { field: 'x', reason: 'expected float, got string' },
        { field: 'n', reason: 'expected int, got number' },
        { field: 'v', reason: 'expected vector(2), got 3 elements' },
        { field: 'tags', reason: 'element 1: expected string, got number' },
      ],
    });
  });
});

describe('checkFieldValue', () => {
  it('rejects lists for scalar fields and scalars for list fields', () => {
    const x = schema.get('x');
    const v = schema.get('v');
    expect(x && checkFieldValue(x, [1])).toBe('expected scalar float, got list of 1');
    expect(v && checkFieldValue(v, 1)).toBe('expected vector(2) of float, got number');
  });

  it('rejects non-finite floats', () => {
    const x = schema.get('x');
    expect(x && checkFieldValue(x, Number.NaN)).toBe('expected float, got NaN');
  });
});

describe('validateBatch', () => {
  it('collects issues of every invalid record with its index', () => {
    const result = validateBatch(schema, [{ x: 1, s: 'a' }, { x: 2 }, { x: 3, s: 'c' }, { s: 'd' }]);

    expect(result.valid).toEqual([0, 2]);
    expect(result.invalidCount).toBe(2);
    expect(result.issues).toEqual([
      { field: 's', reason: 'required field is missing', recordIndex: 1 },
      { field: 'x', reason: 'required field is missing', recordIndex: 3 },
    ]);
  });
});

describe('assertValidRecord', () => {
  it('throws a ValidationError in the serving phase by default', () => {
    try {
      assertValidRecord(schema, { x: 1 });
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ValidationError);
      if (error instanceof ValidationError) {
        expect(error.phase).toBe('serving');
        expect(error.message).toBe("Record validation failed: field 's': required field is missing");
        expect(error.issues).toEqual([{ field: 's', reason: 'required field is missing' }]);
      }
    }
  });
});
