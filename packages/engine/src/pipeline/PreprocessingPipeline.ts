/**
 * PreprocessingPipeline
 *
 * Runs the analyze-then-transform protocol once per batch:
 *
 *   init → analyzing → transforming → frozen
 *
 * Any error moves the pipeline to `failed`, which only a fresh instance
 * leaves. Callers get either a complete artifact plus transformed batch or a
 * structured error; never a partially frozen artifact.
 */

import { DateTime } from 'luxon';
import { createLogger, getPipelineConfig } from '@prepflow/utils';
import type { Logger, ValidationMode } from '@prepflow/utils';
import { getAnalyzerRegistry } from '../analyzers/AnalyzerRegistry.js';
import type { AnalyzerRegistry } from '../analyzers/AnalyzerRegistry.js';
import { computeConstants, resolveAnalyzers } from '../analyzers/computeConstants.js';
import type { IndexedRecord } from '../analyzers/computeConstants.js';
import { specKey } from '../analyzers/specs.js';
import type { AnalyzerSpec } from '../analyzers/types.js';
import { FrozenArtifact } from '../artifact/FrozenArtifact.js';
import type { ConstantsTable } from '../constants/ConstantsTable.js';
import { StateError, ValidationError } from '../errors.js';
import type { PipelinePhase, ValidationIssue } from '../errors.js';
import { InProcessExecutor } from '../execution/BatchExecutor.js';
import type { BatchExecutor } from '../execution/BatchExecutor.js';
import { deriveOutputSchema } from '../metadata/deriveOutputSchema.js';
import type { IndexedOutput } from '../metadata/deriveOutputSchema.js';
import { buildSchema } from '../schema/Schema.js';
import type { Schema } from '../schema/Schema.js';
import type { Batch, FeatureRecord } from '../schema/types.js';
import { validateBatch } from '../schema/validate.js';
import { requiredAnalyzers, toTransformHandle } from '../transform/defineTransform.js';
import type { TransformHandle } from '../transform/defineTransform.js';
import type { AnalyzerBindings, TransformDefinition } from '../transform/types.js';

export type PipelineState = 'init' | 'analyzing' | 'transforming' | 'frozen' | 'failed';

export interface PipelineOptions {
  /** strict: any invalid record aborts; lenient: invalid records are skipped and reported */
  validationMode?: ValidationMode;
  /** Shards for the default in-process executor */
  shardCount?: number;
  executor?: BatchExecutor;
  registry?: AnalyzerRegistry;
  /** Clock for artifact timestamps */
  now?: () => DateTime;
}

export interface RunOptions {
  signal?: AbortSignal;
}

export interface PipelineResult {
  artifact: FrozenArtifact;
  /** Transformed records in input order, each tagged with its input index */
  outputs: IndexedOutput[];
  outputSchema: Schema;
  constants: ConstantsTable;
  /** Validation issues of records skipped in lenient mode */
  skipped: ValidationIssue[];
  recordCount: number;
}

export class PreprocessingPipeline<B extends AnalyzerBindings = AnalyzerBindings> {
  private _state: PipelineState = 'init';
  private _artifact: FrozenArtifact | null = null;

  private readonly transform: TransformHandle;
  private readonly analyzerSpecs: AnalyzerSpec[];
  private readonly validationMode: ValidationMode;
  private readonly executor: BatchExecutor;
  private readonly registry: AnalyzerRegistry;
  private readonly now: () => DateTime;
  private readonly logger: Logger;

  constructor(
    private readonly schema: Schema,
    transform: TransformDefinition<B> | TransformHandle,
    options: PipelineOptions = {}
  ) {
    this.transform = toTransformHandle(transform);
    this.analyzerSpecs = requiredAnalyzers(this.transform.analyzers);

    // Declared outputs are configuration; a malformed one fails here
    if (this.transform.outputs) {
      buildSchema(this.transform.outputs);
    }

    const needsConfig = options.validationMode === undefined || (options.executor === undefined && options.shardCount === undefined);
    const config = needsConfig ? getPipelineConfig() : undefined;

    this.validationMode = options.validationMode ?? config?.validationMode ?? 'strict';
    this.executor =
      options.executor ?? new InProcessExecutor({ shardCount: options.shardCount ?? config?.shardCount ?? 1 });
    this.registry = options.registry ?? getAnalyzerRegistry();
    this.now = options.now ?? (() => DateTime.utc());
    this.logger = createLogger('@prepflow/engine').child({ transformId: this.transform.id });
  }

  get state(): PipelineState {
    return this._state;
  }

  /**
   * The frozen artifact, once the pipeline reached `frozen`
   */
  get artifact(): FrozenArtifact | null {
    return this._artifact;
  }

  /**
   * Distinct analyzer specs the transform references; only these run
   */
  requiredAnalyzers(): AnalyzerSpec[] {
    return [...this.analyzerSpecs];
  }

  /**
   * Run the full protocol over one batch
   *
   * @throws ValidationError (strict mode) before analysis starts
   * @throws AnalyzerError when a statistic is undefined for the batch
   * @throws MetadataError when outputs drift
   * @throws StateError when called twice, after a failure, or when aborted
   */
  async run(batch: Batch, options: RunOptions = {}): Promise<PipelineResult> {
    this.assertRunnable();
    const { signal } = options;
    let phase: PipelinePhase = 'init';

    try {
      const { records, skipped } = this.validate(batch);
      resolveAnalyzers(this.analyzerSpecs, this.schema, this.registry);

      phase = this.transition('analyzing', { records: records.length, analyzers: this.analyzerSpecs.map(specKey) });
      const constants = await computeConstants(records, this.analyzerSpecs, {
        schema: this.schema,
        registry: this.registry,
        executor: this.executor,
        logger: this.logger,
        signal,
      });

      phase = this.transition('transforming', { constants: constants.size });
      const bound = this.transform.bind(constants);
      const outputs = await this.executor.map(
        records,
        ({ index, record }: IndexedRecord): IndexedOutput => ({ index, values: bound.apply(record, 'transforming') }),
        signal
      );

      const outputSchema = deriveOutputSchema(outputs, this.transform.outputs, 'transforming');
      const artifact = new FrozenArtifact({
        transform: this.transform,
        inputSchema: this.schema,
        outputSchema,
        constants,
        createdAtIso: this.timestamp(),
      });

      this._artifact = artifact;
      phase = this.transition('frozen', { artifactId: artifact.artifactId, outputFields: outputSchema.names() });

      return {
        artifact,
        outputs,
        outputSchema,
        constants,
        skipped,
        recordCount: batch.length,
      };
    } catch (error) {
      this._state = 'failed';
      this._artifact = null;
      const failure = signal?.aborted && !(error instanceof StateError)
        ? new StateError('ABORTED', `Pipeline aborted during ${phase}`, phase)
        : error;
      this.logger.warn('Pipeline failed', {
        phase,
        error: failure instanceof Error ? failure.message : String(failure),
      });
      throw failure;
    }
  }

  /**
   * Serving-time transform of one record with the frozen constants
   *
   * @throws StateError(NOT_FROZEN) before the pipeline froze
   */
  applySingle(record: FeatureRecord): FeatureRecord {
    if (this._state !== 'frozen' || !this._artifact) {
      throw new StateError('NOT_FROZEN', `applySingle requires a frozen pipeline (state: ${this._state})`, 'serving');
    }
    return this._artifact.applySingle(record);
  }

  /**
   * Return a frozen pipeline to `init` so it can analyze a new batch.
   * Artifacts already handed out stay valid.
   */
  reset(): void {
    switch (this._state) {
      case 'init':
        return;
      case 'frozen':
        this._state = 'init';
        this._artifact = null;
        this.logger.debug('Pipeline reset');
        return;
      case 'failed':
        throw new StateError('PIPELINE_FAILED', 'A failed pipeline cannot be reset; create a new one', 'init');
      case 'analyzing':
      case 'transforming':
        throw new StateError('ALREADY_RUNNING', `Cannot reset while ${this._state}`, this._state);
    }
  }

  private assertRunnable(): void {
    switch (this._state) {
      case 'init':
        return;
      case 'frozen':
        throw new StateError('ALREADY_FROZEN', 'Pipeline already analyzed a batch; reset it or create a new one', 'frozen');
      case 'failed':
        throw new StateError('PIPELINE_FAILED', 'Pipeline failed; create a new one', 'init');
      case 'analyzing':
      case 'transforming':
        throw new StateError('ALREADY_RUNNING', `Pipeline is already ${this._state}`, this._state);
    }
  }

  private transition(next: 'analyzing' | 'transforming' | 'frozen', context: Record<string, unknown>): PipelinePhase {
    this.logger.info(`Pipeline ${next}`, { from: this._state, ...context });
    this._state = next;
    return next;
  }

  private validate(batch: Batch): { records: IndexedRecord[]; skipped: ValidationIssue[] } {
    const result = validateBatch(this.schema, batch);

    if (result.invalidCount > 0) {
      if (this.validationMode === 'strict') {
        throw new ValidationError(result.issues, 'init');
      }
      this.logger.warn('Skipping invalid records', {
        skippedRecords: result.invalidCount,
        issues: result.issues.slice(0, 20),
      });
    }

    return {
      records: result.valid.map((index) => ({ index, record: batch[index] })),
      skipped: result.issues,
    };
  }

  private timestamp(): string {
    const iso = this.now().toUTC().toISO();
    if (!iso) {
      throw new StateError('PIPELINE_FAILED', 'Clock returned an invalid timestamp', 'frozen');
    }
    return iso;
  }
}
