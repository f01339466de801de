/**
 * Batch execution boundary
 *
 * The engine expresses both phases as fold / map operations and hands them
 * to an executor. Contract:
 * - fold: every item is accumulated exactly once, partial accumulators meet
 *   only through `merge`, and the result is returned only after every shard
 *   has been merged
 * - map: items may run in any order; results come back in input order
 */

import { setImmediate as yieldToEventLoop } from 'timers/promises';

export interface FoldPlan<T, TAcc> {
  seed(): TAcc;
  accumulate(acc: TAcc, item: T): TAcc;
  merge(left: TAcc, right: TAcc): TAcc;
}

export interface BatchExecutor {
  fold<T, TAcc>(items: readonly T[], plan: FoldPlan<T, TAcc>, signal?: AbortSignal): Promise<TAcc>;
  map<T, R>(items: readonly T[], fn: (item: T) => R, signal?: AbortSignal): Promise<R[]>;
}

export interface InProcessExecutorOptions {
  /** Number of contiguous shards the batch is split into */
  shardCount?: number;
}

/**
 * Split items into at most `shardCount` contiguous, non-empty shards
 */
export function partition<T>(items: readonly T[], shardCount: number): T[][] {
  const count = Math.max(1, Math.min(Math.floor(shardCount), items.length));
  const size = Math.ceil(items.length / count);
  const shards: T[][] = [];
  for (let start = 0; start < items.length; start += size) {
    shards.push(items.slice(start, start + size));
  }
  return shards;
}

/**
 * Runs shards as concurrent tasks on the event loop
 */
export class InProcessExecutor implements BatchExecutor {
  readonly shardCount: number;

  constructor(options: InProcessExecutorOptions = {}) {
    this.shardCount = Math.max(1, Math.floor(options.shardCount ?? 1));
  }

  async fold<T, TAcc>(items: readonly T[], plan: FoldPlan<T, TAcc>, signal?: AbortSignal): Promise<TAcc> {
    signal?.throwIfAborted();
    const shards = partition(items, this.shardCount);

    // Barrier: nothing is merged until every shard finished
    const partials = await Promise.all(shards.map((shard) => this.foldShard(shard, plan, signal)));
    signal?.throwIfAborted();

    return partials.reduce((merged, partial) => plan.merge(merged, partial), plan.seed());
  }

  async map<T, R>(items: readonly T[], fn: (item: T) => R, signal?: AbortSignal): Promise<R[]> {
    signal?.throwIfAborted();
    const shards = partition(items, this.shardCount);
    const results = await Promise.all(shards.map((shard) => this.mapShard(shard, fn, signal)));
    signal?.throwIfAborted();
    const ordered: R[] = [];
    for (const shardResults of results) {
      for (const result of shardResults) {
        ordered.push(result);
      }
    }
    return ordered;
  }

  private async foldShard<T, TAcc>(shard: readonly T[], plan: FoldPlan<T, TAcc>, signal?: AbortSignal): Promise<TAcc> {
    await yieldToEventLoop();
    let acc = plan.seed();
    for (const item of shard) {
      signal?.throwIfAborted();
      acc = plan.accumulate(acc, item);
    }
    return acc;
  }

  private async mapShard<T, R>(shard: readonly T[], fn: (item: T) => R, signal?: AbortSignal): Promise<R[]> {
    await yieldToEventLoop();
    const results: R[] = [];
    for (const item of shard) {
      signal?.throwIfAborted();
      results.push(fn(item));
    }
    return results;
  }
}
