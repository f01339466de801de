/**
 * Schema types
 */

import { z } from 'zod';

export const VALUE_TYPES = ['float', 'int', 'string'] as const;

export type ValueType = (typeof VALUE_TYPES)[number];

export const ArityShape = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('scalar') }).strict(),
  z.object({ kind: z.literal('vector'), length: z.number() }).strict(),
  z.object({ kind: z.literal('varlen') }).strict(),
]);

export type Arity = z.infer<typeof ArityShape>;

/**
 * Shape accepted from callers. `name` may be omitted when the spec is given
 * under its name in a mapping; `required` defaults to true.
 */
export const FieldSpecInputShape = z
  .object({
    name: z.string().min(1).optional(),
    valueType: z.enum(VALUE_TYPES),
    arity: ArityShape.default({ kind: 'scalar' }),
    required: z.boolean().default(true),
  })
  .strict();

export type FieldSpecInput = z.input<typeof FieldSpecInputShape>;

export interface FieldSpec {
  readonly name: string;
  readonly valueType: ValueType;
  readonly arity: Arity;
  readonly required: boolean;
}

/**
 * Serialized form of a field spec, as stored in artifacts
 */
export const FieldSpecShape = z
  .object({
    name: z.string().min(1),
    valueType: z.enum(VALUE_TYPES),
    arity: ArityShape,
    required: z.boolean(),
  })
  .strict();

export type ScalarValue = number | string;

export type FieldValue = ScalarValue | readonly ScalarValue[] | null | undefined;

/**
 * One record: field name to value. Absent optional fields may be missing or null.
 */
export type FeatureRecord = Readonly<Record<string, FieldValue>>;

export type Batch = readonly FeatureRecord[];

export function isNumericType(valueType: ValueType): boolean {
  return valueType === 'float' || valueType === 'int';
}

export function describeArity(arity: Arity): string {
  switch (arity.kind) {
    case 'scalar':
      return 'scalar';
    case 'vector':
      return `vector(${arity.length})`;
    case 'varlen':
      return 'varlen';
  }
}
