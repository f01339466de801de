/**
 * ConstantsTable
 *
 * Frozen output of the analyze phase: one constant per distinct analyzer
 * spec. Created once per batch and shared read-only by every transform call,
 * at training and at serving.
 */

import { z } from 'zod';
import { NotFoundError } from '@prepflow/utils';
import { ArtifactError } from '../errors.js';
import { canonicalSpec, specKey } from '../analyzers/specs.js';
import { AnalyzerSpecShape, CONSTANT_SHAPES } from '../analyzers/types.js';
import type { AnalyzerConstant, AnalyzerConstantMap, AnalyzerKind, AnalyzerSpec, ConstantOf } from '../analyzers/types.js';

export interface ConstantEntry {
  readonly spec: AnalyzerSpec;
  readonly value: AnalyzerConstant;
}

/**
 * Runtime check that a constant has the shape its analyzer kind produces
 */
export function isConstantOfKind<K extends AnalyzerKind>(
  kind: K,
  value: AnalyzerConstant
): value is AnalyzerConstantMap[K] {
  switch (kind) {
    case 'mean':
    case 'min':
    case 'max':
      return typeof value === 'number';
    case 'scale_0_1':
      return typeof value === 'object' && 'min' in value && 'max' in value;
    case 'variance':
      return typeof value === 'object' && 'variance' in value;
    case 'vocabulary':
      return typeof value === 'object' && 'tokens' in value;
    default:
      return false;
  }
}

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}

const SerializedEntryShape = z.object({ spec: AnalyzerSpecShape, value: z.unknown() });

export class ConstantsTable {
  private readonly entries: ReadonlyMap<string, ConstantEntry>;

  constructor(entries: Iterable<ConstantEntry>) {
    const byKey = new Map<string, ConstantEntry>();
    for (const entry of entries) {
      byKey.set(specKey(entry.spec), deepFreeze({ spec: canonicalSpec(entry.spec), value: entry.value }));
    }
    this.entries = byKey;
    Object.freeze(this);
  }

  get size(): number {
    return this.entries.size;
  }

  has(spec: AnalyzerSpec): boolean {
    return this.entries.has(specKey(spec));
  }

  /**
   * Constant computed for a spec, typed by the spec's kind
   *
   * @throws NotFoundError when the spec was never analyzed
   */
  get<S extends AnalyzerSpec>(spec: S): ConstantOf<S> {
    const key = specKey(spec);
    const entry = this.entries.get(key);
    if (!entry) {
      throw new NotFoundError('Analyzer constant', key);
    }
    if (!isConstantOfKind<S['kind']>(spec.kind, entry.value)) {
      throw new ArtifactError(`Constant stored for ${key} does not have the shape of a ${spec.kind} result`, {
        key,
      });
    }
    return entry.value;
  }

  keys(): string[] {
    return Array.from(this.entries.keys());
  }

  toJSON(): ConstantEntry[] {
    return Array.from(this.entries.values());
  }

  /**
   * Rebuild a table from its serialized entries, validating every constant
   * against the shape of its kind
   */
  static fromJSON(value: unknown): ConstantsTable {
    const parsed = z.array(SerializedEntryShape).safeParse(value);
    if (!parsed.success) {
      throw new ArtifactError('Malformed constants table', {
        issues: parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
      });
    }

    const entries: ConstantEntry[] = parsed.data.map(({ spec, value: raw }) => {
      const constant = CONSTANT_SHAPES[spec.kind].safeParse(raw);
      if (!constant.success) {
        throw new ArtifactError(`Malformed constant for ${specKey(spec)}`, {
          key: specKey(spec),
          issues: constant.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
        });
      }
      return { spec, value: constant.data };
    });

    return new ConstantsTable(entries);
  }
}
