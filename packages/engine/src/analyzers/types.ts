/**
 * Analyzer types
 *
 * Analyzers are full-pass reductions over one field of a batch. The set of
 * kinds is closed; each kind has a spec shape and a constant shape.
 */

import { z } from 'zod';
import type { ScalarValue } from '../schema/types.js';

export const ANALYZER_KINDS = ['mean', 'min', 'max', 'scale_0_1', 'variance', 'vocabulary'] as const;

export type AnalyzerKind = (typeof ANALYZER_KINDS)[number];

const fieldName = z.string().min(1);

export const AnalyzerSpecShape = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('mean'), field: fieldName }).strict(),
  z.object({ kind: z.literal('min'), field: fieldName }).strict(),
  z.object({ kind: z.literal('max'), field: fieldName }).strict(),
  z.object({ kind: z.literal('scale_0_1'), field: fieldName }).strict(),
  z.object({ kind: z.literal('variance'), field: fieldName }).strict(),
  z
    .object({
      kind: z.literal('vocabulary'),
      field: fieldName,
      topK: z.number().int().positive().optional(),
      frequencyThreshold: z.number().int().positive().optional(),
    })
    .strict(),
]);

/**
 * Identifies one analyzer run: its kind, the field it folds, and for
 * vocabularies the pruning options.
 */
export type AnalyzerSpec = z.infer<typeof AnalyzerSpecShape>;

export type AnalyzerSpecOf<K extends AnalyzerKind> = Extract<AnalyzerSpec, { kind: K }>;

export const MinMaxConstantShape = z.object({ min: z.number(), max: z.number() }).strict();

export type MinMaxConstant = z.infer<typeof MinMaxConstantShape>;

export const MomentsConstantShape = z
  .object({ mean: z.number(), variance: z.number().nonnegative(), count: z.number().int().positive() })
  .strict();

export type MomentsConstant = z.infer<typeof MomentsConstantShape>;

export const VocabularyConstantShape = z
  .object({
    tokens: z.array(z.string()),
    frequencies: z.array(z.number().int().positive()),
  })
  .strict()
  .refine((v) => v.tokens.length === v.frequencies.length, {
    message: 'tokens and frequencies must have the same length',
  });

/**
 * Ordered vocabulary: the index of a token is its position in `tokens`
 */
export type VocabularyConstant = z.infer<typeof VocabularyConstantShape>;

export interface AnalyzerConstantMap {
  mean: number;
  min: number;
  max: number;
  scale_0_1: MinMaxConstant;
  variance: MomentsConstant;
  vocabulary: VocabularyConstant;
}

export type AnalyzerConstant = AnalyzerConstantMap[AnalyzerKind];

export type ConstantOf<S extends AnalyzerSpec> = AnalyzerConstantMap[S['kind']];

export const CONSTANT_SHAPES: { [K in AnalyzerKind]: z.ZodType<AnalyzerConstantMap[K], z.ZodTypeDef, unknown> } = {
  mean: z.number(),
  min: z.number(),
  max: z.number(),
  scale_0_1: MinMaxConstantShape,
  variance: MomentsConstantShape,
  vocabulary: VocabularyConstantShape,
};

/**
 * Where a value sits in the batch: record index, then element index within
 * a vector field. Used to break vocabulary frequency ties by first sighting.
 */
export type Position = readonly [record: number, element: number];

/**
 * Analyzer registry entry.
 *
 * The four steps must form a commutative, associative fold: partial
 * accumulators over disjoint shards merge to the same result in any grouping.
 * `accumulate` and `merge` may update their first argument in place and
 * return it.
 */
export interface AnalyzerDefinition<TAcc = unknown, TConst extends AnalyzerConstant = AnalyzerConstant> {
  kind: AnalyzerKind;
  name: string;
  /** Field value types this analyzer can fold */
  accepts: 'numeric' | 'string';
  seed(spec: AnalyzerSpec): TAcc;
  accumulate(acc: TAcc, value: ScalarValue, position: Position): TAcc;
  merge(left: TAcc, right: TAcc): TAcc;
  /**
   * @throws AnalyzerError(EMPTY_INPUT) when the constant is undefined for the input
   */
  finalize(acc: TAcc, spec: AnalyzerSpec): TConst;
}
