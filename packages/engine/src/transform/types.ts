/**
 * Transform function types
 */

import type { AnalyzerSpec, ConstantOf } from '../analyzers/types.js';
import type { FeatureRecord, FieldSpecInput } from '../schema/types.js';

/**
 * Names under which a transform refers to analyzer results
 */
export type AnalyzerBindings = Readonly<Record<string, AnalyzerSpec>>;

/**
 * Declared output field, used instead of inference (e.g. `int` indices, `varlen` lists)
 */
export type OutputDeclaration = Omit<FieldSpecInput, 'name'>;

export type OutputDeclarations = Readonly<Record<string, OutputDeclaration>>;

/**
 * Read-only access to the frozen constants a transform bound
 */
export interface ConstantsView<B extends AnalyzerBindings> {
  get<N extends keyof B & string>(name: N): ConstantOf<B[N]>;
  names(): string[];
}

/**
 * A user transform: a pure mapping from an input record (plus frozen
 * analyzer constants) to an output record. Full-pass aggregation is only
 * legal through the declared `analyzers`.
 */
export interface TransformDefinition<B extends AnalyzerBindings = AnalyzerBindings> {
  /** Stable identifier stored in artifacts; resolved through a TransformRegistry at serving */
  readonly id: string;
  readonly version: string;
  readonly description?: string;
  readonly analyzers: B;
  readonly outputs?: OutputDeclarations;
  fn(record: FeatureRecord, constants: ConstantsView<B>): FeatureRecord;
}
