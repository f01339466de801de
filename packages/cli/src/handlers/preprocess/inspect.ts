/**
 * Inspect Handler
 */

import { DateTime } from 'luxon';
import { describeArity, readArtifact } from '@prepflow/engine';
import type { Schema } from '@prepflow/engine';
import type { InspectArgs } from '../../command-defs/preprocess.js';
import type { CommandContext } from '../../core/command-context.js';

export interface InspectResult {
  artifactId: string;
  transform: string;
  createdAt: string;
  inputSchema: string[];
  outputSchema: string[];
  constants: string[];
}

function describeFields(schema: Schema): string[] {
  return schema
    .specs()
    .map((spec) => `${spec.name}: ${spec.valueType} ${describeArity(spec.arity)}${spec.required ? '' : ' (optional)'}`);
}

export async function inspectHandler(args: InspectArgs, ctx: CommandContext): Promise<InspectResult> {
  const artifact = await readArtifact(args.artifact, ctx.services.transforms());
  const createdAt = DateTime.fromISO(artifact.createdAtIso, { zone: 'utc' });

  return {
    artifactId: artifact.artifactId,
    transform: `${artifact.transformRef.id}@${artifact.transformRef.version}`,
    createdAt: createdAt.isValid ? createdAt.toFormat("yyyy-LL-dd HH:mm:ss 'UTC'") : artifact.createdAtIso,
    inputSchema: describeFields(artifact.inputSchema),
    outputSchema: describeFields(artifact.outputSchema),
    constants: artifact.constants.keys(),
  };
}
