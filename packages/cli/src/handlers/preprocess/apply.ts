/**
 * Apply Handler
 *
 * Serves one record through a frozen artifact. No analysis runs.
 */

import type { FeatureRecord } from '@prepflow/engine';
import { readArtifact } from '@prepflow/engine';
import type { ApplyArgs } from '../../command-defs/preprocess.js';
import type { CommandContext } from '../../core/command-context.js';
import { parseRecordArgument } from '../../core/input-loader.js';

export async function applyHandler(args: ApplyArgs, ctx: CommandContext): Promise<FeatureRecord> {
  const record = parseRecordArgument(args.record);
  const artifact = await readArtifact(args.artifact, ctx.services.transforms());
  return artifact.applySingle(record);
}
