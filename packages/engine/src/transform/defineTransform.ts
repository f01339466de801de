/**
 * Declaring and applying transforms
 */

import { distinctSpecs } from '../analyzers/specs.js';
import type { AnalyzerSpec, ConstantOf } from '../analyzers/types.js';
import { AnalyzerSpecShape } from '../analyzers/types.js';
import type { ConstantsTable } from '../constants/ConstantsTable.js';
import { MetadataError, SchemaError } from '../errors.js';
import type { PipelinePhase } from '../errors.js';
import type { FeatureRecord } from '../schema/types.js';
import type { AnalyzerBindings, ConstantsView, OutputDeclarations, TransformDefinition } from './types.js';

/**
 * Declare a transform. Analyzer bindings are checked here so a malformed
 * declaration fails before any record is read.
 *
 * @example
 * const preprocess = defineTransform({
 *   id: 'example.basic',
 *   version: '1',
 *   analyzers: { xMean: mean('x'), sVocab: vocabulary('s') },
 *   fn: (record, c) => ({
 *     x_centered: centered(record.x, c.get('xMean')),
 *     s_integerized: applyVocabulary(record.s, c.get('sVocab')),
 *   }),
 * });
 */
export function defineTransform<B extends AnalyzerBindings>(definition: TransformDefinition<B>): TransformDefinition<B> {
  if (!definition.id.trim()) {
    throw new SchemaError('Transform id must not be empty');
  }
  for (const [name, spec] of Object.entries(definition.analyzers)) {
    const parsed = AnalyzerSpecShape.safeParse(spec);
    if (!parsed.success) {
      throw new SchemaError(`Transform '${definition.id}' binds '${name}' to a malformed analyzer spec`, undefined, {
        binding: name,
        issues: parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
      });
    }
  }
  return Object.freeze({ ...definition });
}

/**
 * Distinct analyzer specs a transform references, in binding order
 */
export function requiredAnalyzers(analyzers: AnalyzerBindings): AnalyzerSpec[] {
  return distinctSpecs(Object.values(analyzers));
}

export function createConstantsView<B extends AnalyzerBindings>(bindings: B, table: ConstantsTable): ConstantsView<B> {
  return {
    get<N extends keyof B & string>(name: N): ConstantOf<B[N]> {
      return table.get(bindings[name]);
    },
    names(): string[] {
      return Object.keys(bindings);
    },
  };
}

/**
 * A transform with its analyzer constants bound. Shared by the batch
 * transform phase and serving so both run exactly the same code.
 */
export interface BoundTransform {
  readonly id: string;
  readonly version: string;
  apply(record: FeatureRecord, phase: PipelinePhase): FeatureRecord;
}

/**
 * Type-erased transform reference, as held by registries and artifacts
 */
export interface TransformHandle {
  readonly id: string;
  readonly version: string;
  readonly description?: string;
  readonly analyzers: AnalyzerBindings;
  readonly outputs?: OutputDeclarations;
  bind(table: ConstantsTable): BoundTransform;
}

export function bindTransform<B extends AnalyzerBindings>(
  transform: TransformDefinition<B>,
  table: ConstantsTable
): BoundTransform {
  const constants = createConstantsView(transform.analyzers, table);
  return {
    id: transform.id,
    version: transform.version,
    apply(record: FeatureRecord, phase: PipelinePhase): FeatureRecord {
      const output = transform.fn(record, constants);
      if (output === null || typeof output !== 'object' || Array.isArray(output)) {
        throw new MetadataError(
          `Transform '${transform.id}' must return an object of output fields`,
          '(record)',
          phase
        );
      }
      return Object.freeze({ ...output });
    },
  };
}

export function toTransformHandle<B extends AnalyzerBindings>(
  transform: TransformDefinition<B> | TransformHandle
): TransformHandle {
  if ('bind' in transform) {
    return transform;
  }
  return {
    id: transform.id,
    version: transform.version,
    description: transform.description,
    analyzers: transform.analyzers,
    outputs: transform.outputs,
    bind: (table) => bindTransform(transform, table),
  };
}
