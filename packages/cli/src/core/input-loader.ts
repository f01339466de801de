/**
 * Input files for the CLI: schemas (JSON or YAML) and batches (JSON array or NDJSON)
 */

import { promises as fs } from 'fs';
import { extname } from 'path';
import { load as loadYaml } from 'js-yaml';
import { z } from 'zod';
import { AppError, NotFoundError } from '@prepflow/utils';
import { ValidationError, parseSchema } from '@prepflow/engine';
import type { Batch, FeatureRecord, Schema, ValidationIssue } from '@prepflow/engine';

const ScalarShape = z.union([z.number(), z.string()]);

const RecordShape = z.record(z.union([ScalarShape, z.array(ScalarShape), z.null()]));

/**
 * An input file that cannot be read or parsed
 */
export class InputFileError extends AppError {
  constructor(message: string, path: string, cause?: string) {
    super(message, 'INPUT_FILE_ERROR', 66, { path, cause });
  }
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

async function readText(path: string): Promise<string> {
  try {
    return await fs.readFile(path, 'utf-8');
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      throw new NotFoundError('File', path);
    }
    throw new InputFileError(`Cannot read ${path}`, path, describe(error));
  }
}

function isYaml(path: string): boolean {
  const ext = extname(path).toLowerCase();
  return ext === '.yaml' || ext === '.yml';
}

function isNdjson(path: string): boolean {
  const ext = extname(path).toLowerCase();
  return ext === '.ndjson' || ext === '.jsonl';
}

function parseJson(text: string, path: string, where?: string): unknown {
  try {
    return JSON.parse(text);
  } catch (error) {
    throw new InputFileError(`${where ? `${where} of ` : ''}${path} is not valid JSON`, path, describe(error));
  }
}

/**
 * Load a schema file: a field → spec mapping or a list of named specs
 *
 * @throws SchemaError when the document is not a valid schema
 */
export async function loadSchemaFile(path: string): Promise<Schema> {
  const text = await readText(path);
  let document: unknown;
  if (isYaml(path)) {
    try {
      document = loadYaml(text);
    } catch (error) {
      throw new InputFileError(`${path} is not valid YAML`, path, describe(error));
    }
  } else {
    document = parseJson(text, path);
  }
  return parseSchema(document);
}

/**
 * Check that every parsed item is a record of supported values. Schema
 * conformance is the pipeline's job; this only rules out values no schema
 * can describe (booleans, nested objects).
 */
export function toBatch(items: readonly unknown[]): Batch {
  const records: FeatureRecord[] = [];
  const issues: ValidationIssue[] = [];

  items.forEach((item, recordIndex) => {
    const parsed = RecordShape.safeParse(item);
    if (parsed.success) {
      records.push(parsed.data);
      return;
    }
    for (const issue of parsed.error.issues) {
      issues.push({
        field: issue.path.length > 0 ? String(issue.path[0]) : '(record)',
        reason: issue.message,
        recordIndex,
      });
    }
  });

  if (issues.length > 0) {
    throw new ValidationError(issues, 'init');
  }
  return records;
}

/**
 * Load a batch: a JSON array of records, or one record per line for
 * .ndjson / .jsonl files (blank lines are ignored)
 */
export async function loadBatchFile(path: string): Promise<Batch> {
  const text = await readText(path);

  if (isNdjson(path)) {
    const items = text
      .split('\n')
      .map((line, i) => ({ line: line.trim(), lineNumber: i + 1 }))
      .filter(({ line }) => line.length > 0)
      .map(({ line, lineNumber }) => parseJson(line, path, `Line ${lineNumber}`));
    return toBatch(items);
  }

  const document = parseJson(text, path);
  if (!Array.isArray(document)) {
    throw new InputFileError(`${path} must contain a JSON array of records`, path);
  }
  return toBatch(document);
}

/**
 * Parse one record given inline on the command line
 */
export function parseRecordArgument(json: string): FeatureRecord {
  let value: unknown;
  try {
    value = JSON.parse(json);
  } catch (error) {
    throw new InputFileError('--record is not valid JSON', '--record', describe(error));
  }
  const [record] = toBatch([value]);
  if (!record) {
    throw new InputFileError('--record must be a JSON object', '--record');
  }
  return record;
}
