/**
 * Property Test: Train/Serve Parity
 * =================================
 *
 * For every record of the analyzed batch, serving the record through the
 * frozen artifact (also after a JSON round trip) must reproduce the batch
 * output exactly. Re-running the pipeline on the same batch must be
 * idempotent.
 */

import { describe, it, expect } from 'vitest';
import fc from 'fast-check';
import { loadArtifact } from '../../src/artifact/FrozenArtifact.js';
import { PreprocessingPipeline } from '../../src/pipeline/PreprocessingPipeline.js';
import { basicRegistry, basicTransform, fixedClock, inputSchema } from '../fixtures/basic-transform.js';

// Artifacts are JSON, which has no negative zero
const finite = fc.double({ min: -1e6, max: 1e6, noNaN: true }).map((v) => v + 0);

const recordArb = fc.record({
  x: finite,
  y: finite,
  s: fc.constantFrom('red', 'green', 'blue', 'cyan'),
});

function newPipeline(shardCount: number) {
  return new PreprocessingPipeline(inputSchema, basicTransform, {
    validationMode: 'strict',
    shardCount,
    now: fixedClock,
  });
}

describe('Train/Serve Parity - Property Tests', () => {
  it('CRITICAL: serving reproduces the batch output', async () => {
    await fc.assert(
      fc.asyncProperty(
        fc.array(recordArb, { minLength: 1, maxLength: 30 }),
        fc.integer({ min: 1, max: 4 }),
        async (batch, shardCount) => {
          const pipeline = newPipeline(shardCount);
          const result = await pipeline.run(batch);
          const reloaded = loadArtifact(JSON.parse(JSON.stringify(result.artifact.toJSON())), basicRegistry());

          batch.forEach((record, i) => {
            const expected = result.outputs[i]?.values;
            expect(pipeline.applySingle(record)).toEqual(expected);
            expect(reloaded.applySingle(record)).toEqual(expected);
          });
        }
      ),
      { numRuns: 40 }
    );
  });

  it('is idempotent on the same batch', async () => {
    await fc.assert(
      fc.asyncProperty(fc.array(recordArb, { minLength: 1, maxLength: 30 }), async (batch) => {
        const first = await newPipeline(1).run(batch);
        const second = await newPipeline(1).run(batch);

        expect(second.artifact.artifactId).toBe(first.artifact.artifactId);
        expect(second.outputs).toEqual(first.outputs);
      }),
      { numRuns: 30 }
    );
  });

  it('scaled outputs of the analyzed batch stay within [0, 1]', async () => {
    await fc.assert(
      fc.asyncProperty(fc.array(recordArb, { minLength: 1, maxLength: 30 }), async (batch) => {
        const { outputs } = await newPipeline(2).run(batch);

        for (const { values } of outputs) {
          const scaled = values.y_normalized;
          expect(typeof scaled).toBe('number');
          if (typeof scaled === 'number') {
            expect(scaled).toBeGreaterThanOrEqual(0);
            expect(scaled).toBeLessThanOrEqual(1);
          }
        }
      }),
      { numRuns: 30 }
    );
  });
});
