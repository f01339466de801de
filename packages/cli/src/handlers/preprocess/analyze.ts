/**
 * Analyze Handler
 *
 * Runs the full pipeline over a batch file and writes the frozen artifact.
 */

import { promises as fs } from 'fs';
import { dirname } from 'path';
import { NotFoundError } from '@prepflow/utils';
import { PreprocessingPipeline, writeArtifact } from '@prepflow/engine';
import type { AnalyzeArgs } from '../../command-defs/preprocess.js';
import type { CommandContext } from '../../core/command-context.js';
import { loadBatchFile, loadSchemaFile } from '../../core/input-loader.js';

export interface AnalyzeResult {
  artifactId: string;
  transform: string;
  records: number;
  transformed: number;
  skipped: number;
  outputFields: string[];
  artifactPath: string;
  outputPath?: string;
}

export async function analyzeHandler(args: AnalyzeArgs, ctx: CommandContext): Promise<AnalyzeResult> {
  const logger = ctx.services.logger();
  const transform = ctx.services.transforms().get(args.transform);
  if (!transform) {
    throw new NotFoundError('Transform', args.transform, { registered: ctx.services.transforms().listIds() });
  }

  const schema = await loadSchemaFile(args.schema);
  const batch = await loadBatchFile(args.batch);

  const pipeline = new PreprocessingPipeline(schema, transform, {
    validationMode: args.lenient ? 'lenient' : undefined,
    shardCount: args.shards,
    now: () => ctx.services.clock(),
  });
  const result = await pipeline.run(batch);

  await writeArtifact(args.out, result.artifact);
  logger.info('Artifact written', { artifactId: result.artifact.artifactId, path: args.out });

  if (args.output) {
    await fs.mkdir(dirname(args.output), { recursive: true });
    const lines = result.outputs.map(({ values }) => JSON.stringify(values));
    await fs.writeFile(args.output, lines.length > 0 ? `${lines.join('\n')}\n` : '', 'utf-8');
  }

  return {
    artifactId: result.artifact.artifactId,
    transform: `${transform.id}@${transform.version}`,
    records: result.recordCount,
    transformed: result.outputs.length,
    skipped: new Set(result.skipped.flatMap((issue) => issue.recordIndex ?? [])).size,
    outputFields: result.outputSchema.names(),
    artifactPath: args.out,
    ...(args.output ? { outputPath: args.output } : {}),
  };
}
