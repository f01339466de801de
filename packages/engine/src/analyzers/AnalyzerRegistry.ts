/**
 * Analyzer Registry
 *
 * Maps each analyzer kind to its reduction. The built-in set is registered
 * on construction; registering a kind again replaces its definition.
 */

import { AnalyzerError } from '../errors.js';
import type { Schema } from '../schema/Schema.js';
import { isNumericType } from '../schema/types.js';
import { BUILTIN_ANALYZERS } from './builtins.js';
import { specKey } from './specs.js';
import type { AnalyzerConstant, AnalyzerDefinition, AnalyzerKind, AnalyzerSpec } from './types.js';

export class AnalyzerRegistry {
  private analyzers: Map<AnalyzerKind, AnalyzerDefinition> = new Map();

  constructor() {
    this.registerDefaultAnalyzers();
  }

  register<TAcc, TConst extends AnalyzerConstant>(analyzer: AnalyzerDefinition<TAcc, TConst>): void {
    this.analyzers.set(analyzer.kind, analyzer);
  }

  get(kind: AnalyzerKind): AnalyzerDefinition | undefined {
    return this.analyzers.get(kind);
  }

  listKinds(): AnalyzerKind[] {
    return Array.from(this.analyzers.keys());
  }

  /**
   * Resolve the definition for a spec and check it against the input schema.
   *
   * @throws AnalyzerError(UNSUPPORTED_FIELD) when the field is not in the
   * schema or no analyzer is registered for the kind
   * @throws AnalyzerError(TYPE_MISMATCH) when the field's type cannot be folded
   */
  resolve(spec: AnalyzerSpec, schema: Schema): AnalyzerDefinition {
    const analyzer = this.analyzers.get(spec.kind);
    if (!analyzer) {
      throw new AnalyzerError(
        'UNSUPPORTED_FIELD',
        `No analyzer registered for kind '${spec.kind}'`,
        spec.field,
        'init'
      );
    }

    const field = schema.get(spec.field);
    if (!field) {
      throw new AnalyzerError(
        'UNSUPPORTED_FIELD',
        `${specKey(spec)} references field '${spec.field}', which is not in the input schema`,
        spec.field,
        'init'
      );
    }

    const numericField = isNumericType(field.valueType);
    if ((analyzer.accepts === 'numeric') !== numericField) {
      throw new AnalyzerError(
        'TYPE_MISMATCH',
        `${specKey(spec)} folds ${analyzer.accepts} values but '${spec.field}' is ${field.valueType}`,
        spec.field,
        'init'
      );
    }

    return analyzer;
  }

  private registerDefaultAnalyzers(): void {
    for (const analyzer of BUILTIN_ANALYZERS) {
      this.register(analyzer);
    }
  }
}

let globalRegistry: AnalyzerRegistry | null = null;

/**
 * Get global analyzer registry
 */
export function getAnalyzerRegistry(): AnalyzerRegistry {
  if (!globalRegistry) {
    globalRegistry = new AnalyzerRegistry();
  }
  return globalRegistry;
}
