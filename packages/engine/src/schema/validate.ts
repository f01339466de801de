/**
 * Record validation against a schema. Pure; no side effects.
 */

import { ValidationError } from '../errors.js';
import type { PipelinePhase, ValidationIssue } from '../errors.js';
import type { Schema } from './Schema.js';
import type { Batch, FeatureRecord, FieldSpec, FieldValue, ScalarValue, ValueType } from './types.js';
import { describeArity } from './types.js';

export type RecordValidationResult = { ok: true } | { ok: false; issues: ValidationIssue[] };

export function isAbsent(value: FieldValue): value is null | undefined {
  return value === null || value === undefined;
}

function matchesType(value: ScalarValue, valueType: ValueType): boolean {
  switch (valueType) {
    case 'float':
      return typeof value === 'number' && Number.isFinite(value);
    case 'int':
      return typeof value === 'number' && Number.isInteger(value);
    case 'string':
      return typeof value === 'string';
  }
}

function describeValue(value: unknown): string {
  if (Array.isArray(value)) {
    return `list of ${value.length}`;
  }
  if (typeof value === 'number' && !Number.isFinite(value)) {
    return String(value);
  }
  return typeof value;
}

/**
 * Check one present value against its field spec. Returns the reason it
 * does not conform, or null.
 */
export function checkFieldValue(spec: FieldSpec, value: unknown): string | null {
  if (spec.arity.kind === 'scalar') {
    if (typeof value !== 'number' && typeof value !== 'string') {
      return `expected scalar ${spec.valueType}, got ${describeValue(value)}`;
    }
    if (!matchesType(value, spec.valueType)) {
      return `expected ${spec.valueType}, got ${describeValue(value)}`;
    }
    return null;
  }

  if (!Array.isArray(value)) {
    return `expected ${describeArity(spec.arity)} of ${spec.valueType}, got ${describeValue(value)}`;
  }
  const elements: readonly unknown[] = value;
  if (spec.arity.kind === 'vector' && elements.length !== spec.arity.length) {
    return `expected ${describeArity(spec.arity)}, got ${elements.length} elements`;
  }
  for (let i = 0; i < elements.length; i++) {
    const element = elements[i];
    if (
      (typeof element !== 'number' && typeof element !== 'string') ||
      !matchesType(element, spec.valueType)
    ) {
      return `element ${i}: expected ${spec.valueType}, got ${describeValue(element)}`;
    }
  }
  return null;
}

/**
 * Validate a record: required fields present, no unknown fields, types and
 * arities match.
 */
export function validateRecord(schema: Schema, record: FeatureRecord): RecordValidationResult {
  const issues: ValidationIssue[] = [];

  for (const spec of schema.specs()) {
    const value = record[spec.name];
    if (isAbsent(value)) {
      if (spec.required) {
        issues.push({ field: spec.name, reason: 'required field is missing' });
      }
      continue;
    }
    const reason = checkFieldValue(spec, value);
    if (reason) {
      issues.push({ field: spec.name, reason });
    }
  }

  for (const name of Object.keys(record)) {
    if (!schema.has(name)) {
      issues.push({ field: name, reason: 'field is not declared in the schema' });
    }
  }

  return issues.length === 0 ? { ok: true } : { ok: false, issues };
}

/**
 * @throws ValidationError listing every issue of the record
 */
export function assertValidRecord(schema: Schema, record: FeatureRecord, phase: PipelinePhase = 'serving'): void {
  const result = validateRecord(schema, record);
  if (!result.ok) {
    throw new ValidationError(result.issues, phase);
  }
}

export interface BatchValidationResult {
  /** Indices of records that validated */
  valid: number[];
  /** Issues of every invalid record, tagged with the record index */
  issues: ValidationIssue[];
  invalidCount: number;
}

/**
 * Validate every record of a batch, collecting all issues
 */
export function validateBatch(schema: Schema, batch: Batch): BatchValidationResult {
  const valid: number[] = [];
  const issues: ValidationIssue[] = [];
  let invalidCount = 0;

  batch.forEach((record, recordIndex) => {
    const result = validateRecord(schema, record);
    if (result.ok) {
      valid.push(recordIndex);
      return;
    }
    invalidCount++;
    for (const issue of result.issues) {
      issues.push({ ...issue, recordIndex });
    }
  });

  return { valid, issues, invalidCount };
}
