import { describe, it, expect } from 'vitest';
import { InvalidArgumentsError, normalizeOptions, parseArguments } from '../../src/core/argument-parser.js';
import { analyzeSchema, applySchema } from '../../src/command-defs/preprocess.js';

describe('Argument Parser', () => {
  describe('parseArguments', () => {
    it('applies defaults and coerces the shard count', () => {
      const args = parseArguments(analyzeSchema, {
        schema: 'schema.yaml',
        batch: 'train.ndjson',
        transform: 'example.basic',
        out: 'artifact.json',
        shards: '4',
      });

      expect(args).toEqual({
        schema: 'schema.yaml',
        batch: 'train.ndjson',
        transform: 'example.basic',
        out: 'artifact.json',
        shards: 4,
        lenient: false,
        format: 'table',
      });
    });

    it('lists every failing option', () => {
      try {
        parseArguments(analyzeSchema, { schema: 's', batch: 'b', transform: 't', shards: '0' });
        expect.unreachable();
      } catch (error) {
        expect(error).toBeInstanceOf(InvalidArgumentsError);
        if (error instanceof InvalidArgumentsError) {
          expect(error.issues).toEqual(['out: Required', 'shards: Number must be greater than 0']);
          expect(error.message).toBe('Invalid arguments:\n  out: Required\n  shards: Number must be greater than 0');
          expect(error.exitCode).toBe(64);
          expect(error.code).toBe('INVALID_ARGUMENTS');
        }
      }
    });

    it('rejects unknown output formats', () => {
      expect(() => parseArguments(applySchema, { artifact: 'a.json', record: '{}', format: 'csv' })).toThrow(
        "format: Invalid enum value. Expected 'json' | 'table', received 'csv'"
      );
    });
  });

  describe('normalizeOptions', () => {
    it('drops unset options and converts boolean strings', () => {
      expect(
        normalizeOptions({ a: undefined, b: null, lenient: 'true', strict: 'false', out: 'x.json', shards: 3 })
      ).toEqual({ lenient: true, strict: false, out: 'x.json', shards: 3 });
    });

    it('never renames keys', () => {
      expect(Object.keys(normalizeOptions({ shardCount: '2', 'dry-run': true }))).toEqual(['shardCount', 'dry-run']);
    });
  });
});
