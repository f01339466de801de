/**
 * Analyze phase: one full pass folding every required analyzer
 */

import type { Logger } from '@prepflow/utils';
import { ConstantsTable } from '../constants/ConstantsTable.js';
import type { ConstantEntry } from '../constants/ConstantsTable.js';
import type { BatchExecutor, FoldPlan } from '../execution/BatchExecutor.js';
import type { Schema } from '../schema/Schema.js';
import type { FeatureRecord } from '../schema/types.js';
import { isAbsent } from '../schema/validate.js';
import type { AnalyzerRegistry } from './AnalyzerRegistry.js';
import { specKey } from './specs.js';
import type { AnalyzerDefinition, AnalyzerSpec } from './types.js';

export interface IndexedRecord {
  /** Position of the record in the original batch */
  index: number;
  record: FeatureRecord;
}

export interface ComputeConstantsOptions {
  schema: Schema;
  registry: AnalyzerRegistry;
  executor: BatchExecutor;
  logger: Logger;
  signal?: AbortSignal;
}

interface ResolvedAnalyzer {
  spec: AnalyzerSpec;
  definition: AnalyzerDefinition;
}

/**
 * Resolve every spec against the registry and schema before any record is folded
 */
export function resolveAnalyzers(
  specs: readonly AnalyzerSpec[],
  schema: Schema,
  registry: AnalyzerRegistry
): ResolvedAnalyzer[] {
  return specs.map((spec) => ({ spec, definition: registry.resolve(spec, schema) }));
}

function foldPlan(analyzers: readonly ResolvedAnalyzer[]): FoldPlan<IndexedRecord, unknown[]> {
  return {
    seed: () => analyzers.map(({ spec, definition }) => definition.seed(spec)),
    accumulate(accs, { index, record }) {
      analyzers.forEach(({ spec, definition }, i) => {
        const value = record[spec.field];
        if (isAbsent(value)) {
          return;
        }
        if (typeof value === 'number' || typeof value === 'string') {
          accs[i] = definition.accumulate(accs[i], value, [index, 0]);
          return;
        }
        value.forEach((element, j) => {
          accs[i] = definition.accumulate(accs[i], element, [index, j]);
        });
      });
      return accs;
    },
    merge: (left, right) => left.map((acc, i) => analyzers[i].definition.merge(acc, right[i])),
  };
}

/**
 * Fold every record into every analyzer, then finalize into a frozen table.
 * No constant is finalized until the executor has merged every shard.
 */
export async function computeConstants(
  records: readonly IndexedRecord[],
  specs: readonly AnalyzerSpec[],
  options: ComputeConstantsOptions
): Promise<ConstantsTable> {
  const { schema, registry, executor, logger, signal } = options;
  const analyzers = resolveAnalyzers(specs, schema, registry);

  const accumulators = await executor.fold(records, foldPlan(analyzers), signal);

  const entries: ConstantEntry[] = analyzers.map(({ spec, definition }, i) => {
    const value = definition.finalize(accumulators[i], spec);
    logger.debug('Analyzer finalized', {
      analyzer: specKey(spec),
      summary:
        typeof value === 'number'
          ? value
          : 'tokens' in value
            ? { vocabularySize: value.tokens.length }
            : value,
    });
    return { spec, value };
  });

  return new ConstantsTable(entries);
}
