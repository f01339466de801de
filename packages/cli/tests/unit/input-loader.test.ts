import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { promises as fs } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { NotFoundError } from '@prepflow/utils';
import { SchemaError, ValidationError } from '@prepflow/engine';
import {
  InputFileError,
  loadBatchFile,
  loadSchemaFile,
  parseRecordArgument,
  toBatch,
} from '../../src/core/input-loader.js';

describe('Input Loader', () => {
  let dir: string;

  async function writeFixture(name: string, content: string): Promise<string> {
    const path = join(dir, name);
    await fs.writeFile(path, content, 'utf-8');
    return path;
  }

  beforeAll(async () => {
    dir = await fs.mkdtemp(join(tmpdir(), 'prepflow-input-'));
  });

  afterAll(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  describe('loadSchemaFile', () => {
    it('reads a YAML mapping of field specs', async () => {
      const path = await writeFixture(
        'schema.yaml',
        ['x:', '  valueType: float', 's:', '  valueType: string', '  required: false', ''].join('\n')
      );

      const schema = await loadSchemaFile(path);
      expect(schema.toString()).toBe('x: float scalar, s: string scalar?');
    });

    it('reads a JSON list of named field specs', async () => {
      const path = await writeFixture(
        'schema.json',
        JSON.stringify([{ name: 'v', valueType: 'int', arity: { kind: 'vector', length: 2 } }])
      );

      const schema = await loadSchemaFile(path);
      expect(schema.toString()).toBe('v: int vector(2)');
    });

    it('rejects documents that are not schemas', async () => {
      const path = await writeFixture('number.json', '42');

      await expect(loadSchemaFile(path)).rejects.toThrow(SchemaError);
      await expect(loadSchemaFile(path)).rejects.toThrow(
        'Schema document must be a mapping of field specs or a list of named field specs'
      );
    });

    it('rejects invalid YAML', async () => {
      const path = await writeFixture('broken.yaml', 'x: [1, 2');

      await expect(loadSchemaFile(path)).rejects.toThrow(`${path} is not valid YAML`);
    });

    it('reports missing files as not found', async () => {
      const path = join(dir, 'missing.yaml');

      await expect(loadSchemaFile(path)).rejects.toBeInstanceOf(NotFoundError);
      await expect(loadSchemaFile(path)).rejects.toThrow(`File with identifier '${path}' not found`);
    });
  });

  describe('loadBatchFile', () => {
    it('reads one record per line from NDJSON and skips blank lines', async () => {
      const path = await writeFixture('batch.ndjson', '{"x": 1}\n\n{"x": 2, "tags": ["a", "b"]}\n');

      await expect(loadBatchFile(path)).resolves.toEqual([{ x: 1 }, { x: 2, tags: ['a', 'b'] }]);
    });

    it('names the line that is not JSON', async () => {
      const path = await writeFixture('bad.jsonl', '{"x": 1}\nnope\n');

      await expect(loadBatchFile(path)).rejects.toThrow(`Line 2 of ${path} is not valid JSON`);
    });

    it('reads a JSON array of records', async () => {
      const path = await writeFixture('batch.json', '[{"s": "a", "n": null}]');

      await expect(loadBatchFile(path)).resolves.toEqual([{ s: 'a', n: null }]);
    });

    it('requires a JSON array', async () => {
      const path = await writeFixture('object.json', '{"x": 1}');

      await expect(loadBatchFile(path)).rejects.toThrow(InputFileError);
      await expect(loadBatchFile(path)).rejects.toThrow(`${path} must contain a JSON array of records`);
    });
  });

  describe('toBatch', () => {
    it('rejects values no schema can describe', () => {
      try {
        toBatch([{ x: 1 }, { flag: true }]);
        expect.unreachable();
      } catch (error) {
        expect(error).toBeInstanceOf(ValidationError);
        if (error instanceof ValidationError) {
          expect(error.issues).toHaveLength(1);
          expect(error.issues[0]?.field).toBe('flag');
          expect(error.issues[0]?.recordIndex).toBe(1);
        }
      }
    });

    it('rejects items that are not objects', () => {
      expect(() => toBatch([[1, 2]])).toThrow("Record validation failed: record 0, field '(record)'");
    });
  });

  describe('parseRecordArgument', () => {
    it('parses a JSON object', () => {
      expect(parseRecordArgument('{"x": 2, "s": "hello"}')).toEqual({ x: 2, s: 'hello' });
    });

    it('rejects text that is not JSON', () => {
      expect(() => parseRecordArgument('x=2')).toThrow('--record is not valid JSON');
    });
  });
});
