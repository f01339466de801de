/**
 * FrozenArtifact
 *
 * The packaged (input schema, output schema, constants, transform reference)
 * bundle. Serving replays the transform phase on single records with the
 * stored constants and never re-analyzes.
 */

import { createHash } from 'crypto';
import { z } from 'zod';
import { specKey } from '../analyzers/specs.js';
import { AnalyzerSpecShape } from '../analyzers/types.js';
import { ConstantsTable } from '../constants/ConstantsTable.js';
import type { ConstantEntry } from '../constants/ConstantsTable.js';
import { ArtifactError } from '../errors.js';
import { assertOutputMatches, servingOutputSchema } from '../metadata/deriveOutputSchema.js';
import { schemaFromJSON } from '../schema/Schema.js';
import type { Schema } from '../schema/Schema.js';
import { FieldSpecShape } from '../schema/types.js';
import type { FeatureRecord, FieldSpec } from '../schema/types.js';
import { assertValidRecord } from '../schema/validate.js';
import type { BoundTransform, TransformHandle } from '../transform/defineTransform.js';
import type { TransformRegistry } from '../transform/TransformRegistry.js';

export const ARTIFACT_FORMAT_VERSION = 1;

export const SerializedArtifactSchema = z.object({
  formatVersion: z.literal(ARTIFACT_FORMAT_VERSION),
  artifactId: z.string().min(1),
  createdAtIso: z.string().min(1),
  transform: z.object({ id: z.string().min(1), version: z.string() }),
  bindings: z.record(z.string()),
  inputSchema: z.array(FieldSpecShape),
  outputSchema: z.array(FieldSpecShape),
  constants: z.array(z.object({ spec: AnalyzerSpecShape, value: z.unknown() })),
});

export type SerializedArtifact = z.infer<typeof SerializedArtifactSchema>;

export interface FrozenArtifactInit {
  transform: TransformHandle;
  inputSchema: Schema;
  outputSchema: Schema;
  constants: ConstantsTable;
  createdAtIso: string;
}

interface ArtifactContent {
  transform: { id: string; version: string };
  bindings: Record<string, string>;
  inputSchema: FieldSpec[];
  outputSchema: FieldSpec[];
  constants: ConstantEntry[];
}

/**
 * Copy of a JSON value with object keys sorted at every depth. Array order
 * is kept: it carries meaning (vocabulary positions, field order).
 */
export function canonicalize(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map(canonicalize);
  }
  if (value !== null && typeof value === 'object') {
    const sorted: Record<string, unknown> = {};
    for (const [key, child] of Object.entries(value).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))) {
      sorted[key] = canonicalize(child);
    }
    return sorted;
  }
  return value;
}

/**
 * Content hash over everything but the creation time. Key order does not
 * matter, so a document rebuilt by the loader hashes the same.
 */
export function computeArtifactId(content: ArtifactContent): string {
  return createHash('sha256').update(JSON.stringify(canonicalize(content))).digest('hex').slice(0, 16);
}

function bindingKeys(transform: TransformHandle): Record<string, string> {
  const bindings: Record<string, string> = {};
  for (const name of Object.keys(transform.analyzers).sort()) {
    const spec = transform.analyzers[name];
    if (spec) {
      bindings[name] = specKey(spec);
    }
  }
  return bindings;
}

export class FrozenArtifact {
  readonly artifactId: string;
  readonly createdAtIso: string;
  readonly inputSchema: Schema;
  readonly outputSchema: Schema;
  readonly constants: ConstantsTable;
  readonly transformRef: { readonly id: string; readonly version: string };

  private readonly bindings: Record<string, string>;
  private readonly bound: BoundTransform;
  private readonly servingSchema: Schema;

  constructor(init: FrozenArtifactInit) {
    this.inputSchema = init.inputSchema;
    this.outputSchema = init.outputSchema;
    this.constants = init.constants;
    this.createdAtIso = init.createdAtIso;
    this.transformRef = Object.freeze({ id: init.transform.id, version: init.transform.version });
    this.bindings = bindingKeys(init.transform);

    for (const [name, key] of Object.entries(this.bindings)) {
      if (!this.constants.keys().includes(key)) {
        throw new ArtifactError(`Constants table has no value for binding '${name}' (${key})`, { binding: name, key });
      }
    }

    this.bound = init.transform.bind(this.constants);
    this.servingSchema = servingOutputSchema(this.outputSchema, init.transform.outputs);
    this.artifactId = computeArtifactId(this.content());
    Object.freeze(this);
  }

  /**
   * Serving entry point: transform one record with the frozen constants.
   *
   * @throws ValidationError when the record does not match the input schema
   * @throws MetadataError when an output value changes type or arity, or a
   * declared required output is missing
   */
  applySingle(record: FeatureRecord): FeatureRecord {
    assertValidRecord(this.inputSchema, record, 'serving');
    const output = this.bound.apply(record, 'serving');
    assertOutputMatches(this.servingSchema, output, 'serving');
    return output;
  }

  private content(): ArtifactContent {
    return {
      transform: { id: this.transformRef.id, version: this.transformRef.version },
      bindings: this.bindings,
      inputSchema: this.inputSchema.toJSON(),
      outputSchema: this.outputSchema.toJSON(),
      constants: this.constants.toJSON(),
    };
  }

  toJSON(): SerializedArtifact {
    const content = this.content();
    return {
      formatVersion: ARTIFACT_FORMAT_VERSION,
      artifactId: this.artifactId,
      createdAtIso: this.createdAtIso,
      ...content,
      inputSchema: content.inputSchema.map((spec) => ({ ...spec, arity: { ...spec.arity } })),
      outputSchema: content.outputSchema.map((spec) => ({ ...spec, arity: { ...spec.arity } })),
      constants: content.constants.map(({ spec, value }) => ({ spec: { ...spec }, value })),
    };
  }
}

function sameBindings(a: Record<string, string>, b: Record<string, string>): boolean {
  const aKeys = Object.keys(a).sort();
  const bKeys = Object.keys(b).sort();
  return aKeys.length === bKeys.length && aKeys.every((key, i) => key === bKeys[i] && a[key] === b[key]);
}

/**
 * Reconstruct an artifact from its serialized form. The transform is
 * resolved by id through the registry; its version and analyzer bindings
 * must match what was frozen, and the content hash must match the id.
 *
 * @throws ArtifactError
 */
export function loadArtifact(value: unknown, registry: TransformRegistry): FrozenArtifact {
  const parsed = SerializedArtifactSchema.safeParse(value);
  if (!parsed.success) {
    throw new ArtifactError('Malformed artifact document', {
      issues: parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    });
  }
  const doc = parsed.data;

  const transform = registry.get(doc.transform.id);
  if (!transform) {
    throw new ArtifactError(`Transform '${doc.transform.id}' is not registered`, {
      transformId: doc.transform.id,
      registered: registry.listIds(),
    });
  }
  if (transform.version !== doc.transform.version) {
    throw new ArtifactError(
      `Transform '${doc.transform.id}' is version ${transform.version}, artifact was frozen with ${doc.transform.version}`,
      { transformId: doc.transform.id }
    );
  }
  if (!sameBindings(bindingKeys(transform), doc.bindings)) {
    throw new ArtifactError(`Transform '${doc.transform.id}' binds different analyzers than the artifact`, {
      transformId: doc.transform.id,
      expected: doc.bindings,
      actual: bindingKeys(transform),
    });
  }

  let inputSchema: Schema;
  let outputSchema: Schema;
  try {
    inputSchema = schemaFromJSON(doc.inputSchema);
    outputSchema = schemaFromJSON(doc.outputSchema);
  } catch (error) {
    throw new ArtifactError('Artifact contains an invalid schema', {
      cause: error instanceof Error ? error.message : String(error),
    });
  }

  const artifact = new FrozenArtifact({
    transform,
    inputSchema,
    outputSchema,
    constants: ConstantsTable.fromJSON(doc.constants),
    createdAtIso: doc.createdAtIso,
  });

  if (artifact.artifactId !== doc.artifactId) {
    throw new ArtifactError('Artifact content does not match its id', {
      expected: doc.artifactId,
      actual: artifact.artifactId,
    });
  }

  return artifact;
}
