/**
 * Schema
 *
 * Immutable, name-keyed set of field specs in declaration order. Built once
 * before any record is read.
 */

import { z } from 'zod';
import { SchemaError } from '../errors.js';
import type { Arity, FieldSpec, FieldSpecInput } from './types.js';
import { FieldSpecInputShape, FieldSpecShape, describeArity } from './types.js';

export class Schema {
  private readonly fields: ReadonlyMap<string, FieldSpec>;

  /**
   * Use buildSchema(); the constructor trusts its input.
   */
  constructor(specs: readonly FieldSpec[]) {
    const fields = new Map<string, FieldSpec>();
    for (const spec of specs) {
      fields.set(spec.name, Object.freeze({ ...spec, arity: Object.freeze({ ...spec.arity }) }));
    }
    this.fields = fields;
    Object.freeze(this);
  }

  get size(): number {
    return this.fields.size;
  }

  get(name: string): FieldSpec | undefined {
    return this.fields.get(name);
  }

  has(name: string): boolean {
    return this.fields.has(name);
  }

  names(): string[] {
    return Array.from(this.fields.keys());
  }

  specs(): FieldSpec[] {
    return Array.from(this.fields.values());
  }

  /**
   * Two schemas are compatible when they declare the same fields with the
   * same type, arity and presence.
   */
  isCompatibleWith(other: Schema): boolean {
    if (other.size !== this.size) {
      return false;
    }
    for (const spec of this.fields.values()) {
      const theirs = other.get(spec.name);
      if (!theirs || !fieldSpecsEqual(spec, theirs)) {
        return false;
      }
    }
    return true;
  }

  toJSON(): FieldSpec[] {
    return this.specs();
  }

  toString(): string {
    return this.specs()
      .map((spec) => `${spec.name}: ${spec.valueType} ${describeArity(spec.arity)}${spec.required ? '' : '?'}`)
      .join(', ');
  }
}

export function fieldSpecsEqual(a: FieldSpec, b: FieldSpec): boolean {
  return (
    a.name === b.name &&
    a.valueType === b.valueType &&
    a.required === b.required &&
    aritiesEqual(a.arity, b.arity)
  );
}

export function aritiesEqual(a: Arity, b: Arity): boolean {
  if (a.kind === 'vector' && b.kind === 'vector') {
    return a.length === b.length;
  }
  return a.kind === b.kind;
}

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
}

function normalizeSpec(key: string | undefined, raw: unknown): FieldSpec {
  const parsed = FieldSpecInputShape.safeParse(raw);
  if (!parsed.success) {
    throw new SchemaError(`Malformed field spec${key ? ` for '${key}'` : ''}`, key, {
      issues: formatIssues(parsed.error),
    });
  }

  const { name: declaredName, valueType, arity, required } = parsed.data;
  const name = key ?? declaredName;
  if (!name) {
    throw new SchemaError('Field spec has no name');
  }
  if (key !== undefined && declaredName !== undefined && declaredName !== key) {
    throw new SchemaError(`Field spec name '${declaredName}' does not match its key '${key}'`, key);
  }

  if (arity.kind === 'vector' && (!Number.isInteger(arity.length) || arity.length < 1)) {
    throw new SchemaError(
      `Field '${name}' has vector length ${arity.length}; vector length must be a positive integer`,
      name
    );
  }

  return { name, valueType, arity, required };
}

/**
 * Build a schema from a field → spec mapping, or from a list of named specs.
 *
 * @throws SchemaError on a duplicated name, a malformed spec or an unsupported
 * type/arity combination
 */
export function buildSchema(fieldToSpec: Readonly<Record<string, FieldSpecInput>> | readonly FieldSpecInput[]): Schema {
  const entries: Array<[string | undefined, unknown]> = Array.isArray(fieldToSpec)
    ? fieldToSpec.map((spec): [string | undefined, unknown] => [undefined, spec])
    : Object.entries(fieldToSpec);
  return schemaFromEntries(entries);
}

function schemaFromEntries(entries: ReadonlyArray<[string | undefined, unknown]>): Schema {
  const specs: FieldSpec[] = [];
  const seen = new Set<string>();

  for (const [key, raw] of entries) {
    const spec = normalizeSpec(key, raw);
    if (seen.has(spec.name)) {
      throw new SchemaError(`Duplicate field name '${spec.name}'`, spec.name);
    }
    seen.add(spec.name);
    specs.push(spec);
  }

  return new Schema(specs);
}

const SchemaDocumentShape = z.union([z.array(z.unknown()), z.record(z.unknown())]);

/**
 * Build a schema from an untrusted document (a parsed JSON or YAML file):
 * either a field → spec mapping or a list of named specs.
 *
 * @throws SchemaError
 */
export function parseSchema(document: unknown): Schema {
  const parsed = SchemaDocumentShape.safeParse(document);
  if (!parsed.success) {
    throw new SchemaError('Schema document must be a mapping of field specs or a list of named field specs');
  }
  const value = parsed.data;
  return schemaFromEntries(
    Array.isArray(value)
      ? value.map((spec): [string | undefined, unknown] => [undefined, spec])
      : Object.entries(value)
  );
}

/**
 * Rebuild a schema from its serialized field list
 */
export function schemaFromJSON(value: unknown): Schema {
  const parsed = z.array(FieldSpecShape).safeParse(value);
  if (!parsed.success) {
    throw new SchemaError('Malformed serialized schema', undefined, {
      issues: formatIssues(parsed.error),
    });
  }
  return buildSchema(parsed.data);
}
