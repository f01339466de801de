/**
 * Engine Error Classes
 *
 * Every error raised by the engine names the phase it occurred in so callers
 * always get a structured (phase, field, reason) triple instead of a bare message.
 */

import { AppError } from '@prepflow/utils';

export type PipelinePhase = 'schema' | 'init' | 'analyzing' | 'transforming' | 'frozen' | 'serving' | 'artifact';

/**
 * One record-level problem found while validating against a schema
 */
export interface ValidationIssue {
  field: string;
  reason: string;
  /** Position of the record in its batch, when validating a batch */
  recordIndex?: number;
}

abstract class EngineError extends AppError {
  public readonly phase: PipelinePhase;

  protected constructor(
    message: string,
    code: string,
    phase: PipelinePhase,
    context?: Record<string, unknown>,
    isOperational: boolean = true
  ) {
    super(message, code, 2, { phase, ...context }, isOperational);
    this.phase = phase;
  }
}

/**
 * Malformed schema declaration. Raised before any record is read.
 */
export class SchemaError extends EngineError {
  public readonly field?: string;

  constructor(message: string, field?: string, context?: Record<string, unknown>) {
    super(message, 'SCHEMA_ERROR', 'schema', { field, ...context });
    this.field = field;
  }
}

/**
 * One or more records do not match their schema
 */
export class ValidationError extends EngineError {
  public readonly issues: readonly ValidationIssue[];

  constructor(issues: readonly ValidationIssue[], phase: PipelinePhase = 'init') {
    super(ValidationError.describe(issues), 'VALIDATION_ERROR', phase, { issues });
    this.issues = issues;
  }

  private static describe(issues: readonly ValidationIssue[]): string {
    const [first] = issues;
    if (!first) {
      return 'Record validation failed';
    }
    const where = first.recordIndex !== undefined ? `record ${first.recordIndex}, ` : '';
    const more = issues.length > 1 ? ` (and ${issues.length - 1} more)` : '';
    return `Record validation failed: ${where}field '${first.field}': ${first.reason}${more}`;
  }
}

export type AnalyzerErrorKind = 'EMPTY_INPUT' | 'TYPE_MISMATCH' | 'UNSUPPORTED_FIELD';

/**
 * Degenerate statistics or an analyzer applied to the wrong field
 */
export class AnalyzerError extends EngineError {
  public readonly kind: AnalyzerErrorKind;
  public readonly field?: string;

  constructor(
    kind: AnalyzerErrorKind,
    message: string,
    field?: string,
    phase: PipelinePhase = 'analyzing',
    context?: Record<string, unknown>
  ) {
    super(message, `ANALYZER_${kind}`, phase, { kind, field, ...context });
    this.kind = kind;
    this.field = field;
  }
}

export type StateErrorReason =
  | 'ALREADY_FROZEN'
  | 'ALREADY_RUNNING'
  | 'NOT_FROZEN'
  | 'PIPELINE_FAILED'
  | 'ABORTED';

/**
 * Protocol violation on the pipeline state machine
 */
export class StateError extends EngineError {
  public readonly reason: StateErrorReason;

  constructor(reason: StateErrorReason, message: string, phase: PipelinePhase) {
    // Aborts are requested by the caller; everything else is a programming error
    super(message, `STATE_${reason}`, phase, { reason }, reason === 'ABORTED');
    this.reason = reason;
  }
}

/**
 * Output shape or type drift between transformed records
 */
export class MetadataError extends EngineError {
  public readonly field: string;

  constructor(message: string, field: string, phase: PipelinePhase = 'transforming', context?: Record<string, unknown>) {
    super(message, 'METADATA_ERROR', phase, { field, ...context });
    this.field = field;
  }
}

/**
 * A persisted artifact cannot be loaded or does not match its transform
 */
export class ArtifactError extends EngineError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'ARTIFACT_ERROR', 'artifact', context);
  }
}
