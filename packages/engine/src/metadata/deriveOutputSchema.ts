/**
 * Output Metadata Deriver
 *
 * Infers the schema of transformed records. Declared outputs win over
 * inference; every other field is typed from the values produced, and all
 * records must agree on it.
 */

import { MetadataError } from '../errors.js';
import type { PipelinePhase } from '../errors.js';
import { Schema, aritiesEqual, buildSchema } from '../schema/Schema.js';
import type { Arity, FeatureRecord, FieldSpec, FieldValue, ValueType } from '../schema/types.js';
import { describeArity } from '../schema/types.js';
import { checkFieldValue, isAbsent, validateRecord } from '../schema/validate.js';
import type { OutputDeclarations } from '../transform/types.js';

export interface IndexedOutput {
  /** Index of the input record this output came from */
  index: number;
  values: FeatureRecord;
}

export interface InferredShape {
  valueType: ValueType;
  arity: Arity;
}

function describeShape(shape: InferredShape): string {
  return `${shape.valueType} ${describeArity(shape.arity)}`;
}

function scalarType(value: unknown, field: string, index: number, phase: PipelinePhase): ValueType {
  if (typeof value === 'string') {
    return 'string';
  }
  if (typeof value === 'number') {
    if (!Number.isFinite(value)) {
      throw new MetadataError(`Output '${field}' of record ${index} is ${value}`, field, phase, { recordIndex: index });
    }
    return 'float';
  }
  throw new MetadataError(`Output '${field}' of record ${index} has unsupported value type ${typeof value}`, field, phase, {
    recordIndex: index,
  });
}

/**
 * Infer the shape of one produced value. Numbers infer as float; declare an
 * output to get int.
 */
export function inferShape(field: string, value: FieldValue, index: number = 0, phase: PipelinePhase = 'transforming'): InferredShape | null {
  if (isAbsent(value)) {
    return null;
  }
  if (typeof value === 'number' || typeof value === 'string') {
    return { valueType: scalarType(value, field, index, phase), arity: { kind: 'scalar' } };
  }
  if (value.length === 0) {
    throw new MetadataError(
      `Output '${field}' of record ${index} is an empty list; declare the output to fix its type`,
      field,
      phase,
      { recordIndex: index }
    );
  }
  const types = new Set(value.map((element) => scalarType(element, field, index, phase)));
  if (types.size > 1) {
    throw new MetadataError(`Output '${field}' of record ${index} mixes numbers and strings`, field, phase, {
      recordIndex: index,
    });
  }
  const [valueType] = types;
  return { valueType: valueType ?? 'float', arity: { kind: 'vector', length: value.length } };
}

/**
 * Field spec for a single produced value. Returns null for an absent value:
 * the field is optional and its type comes from other records.
 */
export function inferFieldSpec(name: string, value: FieldValue): FieldSpec | null {
  const shape = inferShape(name, value);
  return shape ? { name, ...shape, required: true } : null;
}

interface FieldState {
  shape: InferredShape | null;
  firstIndex: number;
  presentCount: number;
}

/**
 * Derive the output schema from every transformed record.
 *
 * @throws MetadataError when records disagree on a field's type or arity,
 * when a value breaks its declaration, or when a field is never produced
 * with a value
 */
export function deriveOutputSchema(
  outputs: readonly IndexedOutput[],
  declared?: OutputDeclarations,
  phase: PipelinePhase = 'transforming'
): Schema {
  const declaredSchema = declared ? buildSchema(declared) : null;
  const fields = new Map<string, FieldState>();

  for (const { index, values } of outputs) {
    for (const [name, value] of Object.entries(values)) {
      let state = fields.get(name);
      if (!state) {
        state = { shape: null, firstIndex: index, presentCount: 0 };
        fields.set(name, state);
      }
      if (isAbsent(value)) {
        continue;
      }
      state.presentCount++;

      const declaredSpec = declaredSchema?.get(name);
      if (declaredSpec) {
        const reason = checkFieldValue(declaredSpec, value);
        if (reason) {
          throw new MetadataError(`Output '${name}' of record ${index} breaks its declaration: ${reason}`, name, phase, {
            recordIndex: index,
          });
        }
        continue;
      }

      const shape = inferShape(name, value, index, phase);
      if (!shape) {
        continue;
      }
      if (!state.shape) {
        state.shape = shape;
        state.firstIndex = index;
        continue;
      }
      if (state.shape.valueType !== shape.valueType || !aritiesEqual(state.shape.arity, shape.arity)) {
        throw new MetadataError(
          `Output '${name}' drifted: record ${index} produced ${describeShape(shape)}, record ${state.firstIndex} produced ${describeShape(state.shape)}`,
          name,
          phase,
          { recordIndex: index, firstIndex: state.firstIndex }
        );
      }
    }
  }

  const specs: FieldSpec[] = [];
  for (const [name, state] of fields) {
    const declaredSpec = declaredSchema?.get(name);
    if (declaredSpec) {
      if (declaredSpec.required && state.presentCount < outputs.length) {
        throw new MetadataError(`Output '${name}' is declared required but some records did not produce it`, name, phase);
      }
      specs.push(declaredSpec);
      continue;
    }
    if (!state.shape) {
      throw new MetadataError(
        `Output '${name}' was never produced with a value; declare the output to fix its type`,
        name,
        phase
      );
    }
    specs.push({
      name,
      valueType: state.shape.valueType,
      arity: state.shape.arity,
      required: state.presentCount === outputs.length,
    });
  }

  // Declared outputs no record produced still belong to the schema
  for (const spec of declaredSchema?.specs() ?? []) {
    if (!fields.has(spec.name)) {
      if (spec.required && outputs.length > 0) {
        throw new MetadataError(`Output '${spec.name}' is declared required but no record produced it`, spec.name, phase);
      }
      specs.push(spec);
    }
  }

  return new Schema(specs);
}

/**
 * Check one transformed record against a frozen output schema
 *
 * @throws MetadataError naming the first drifting field
 */
export function assertOutputMatches(schema: Schema, values: FeatureRecord, phase: PipelinePhase): void {
  const result = validateRecord(schema, values);
  if (!result.ok) {
    const [first] = result.issues;
    const field = first?.field ?? '(record)';
    throw new MetadataError(
      `Output does not match the frozen output schema: field '${field}': ${first?.reason ?? 'unknown'}`,
      field,
      phase,
      { issues: result.issues }
    );
  }
}

/**
 * Output schema that serving checks against. An inferred field only records
 * which records produced a value during analysis, so at serving an absent
 * value is allowed; its type and arity still are not. Declared outputs keep
 * their declared presence.
 */
export function servingOutputSchema(frozen: Schema, declared?: OutputDeclarations): Schema {
  const declaredNames = new Set(declared ? buildSchema(declared).names() : []);
  return new Schema(
    frozen.specs().map((spec) => (declaredNames.has(spec.name) ? spec : { ...spec, required: false }))
  );
}
