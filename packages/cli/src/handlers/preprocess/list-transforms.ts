/**
 * List Transforms Handler
 */

import { specKey } from '@prepflow/engine';
import type { TransformsArgs } from '../../command-defs/preprocess.js';
import type { CommandContext } from '../../core/command-context.js';

export interface TransformRow {
  id: string;
  version: string;
  description: string;
  analyzers: string;
}

export async function listTransformsHandler(_args: TransformsArgs, ctx: CommandContext): Promise<TransformRow[]> {
  return ctx.services
    .transforms()
    .list()
    .map((transform) => ({
      id: transform.id,
      version: transform.version,
      description: transform.description ?? '',
      analyzers: Object.entries(transform.analyzers)
        .map(([name, spec]) => `${name}=${specKey(spec)}`)
        .join(', '),
    }));
}
