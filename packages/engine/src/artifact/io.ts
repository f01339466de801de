/**
 * Artifact persistence
 */

import { promises as fs } from 'fs';
import { dirname } from 'path';
import { NotFoundError } from '@prepflow/utils';
import { ArtifactError } from '../errors.js';
import type { TransformRegistry } from '../transform/TransformRegistry.js';
import { loadArtifact } from './FrozenArtifact.js';
import type { FrozenArtifact } from './FrozenArtifact.js';

export async function writeArtifact(path: string, artifact: FrozenArtifact): Promise<void> {
  await fs.mkdir(dirname(path), { recursive: true });
  await fs.writeFile(path, JSON.stringify(artifact.toJSON(), null, 2) + '\n', 'utf-8');
}

/**
 * @throws NotFoundError when the file does not exist
 * @throws ArtifactError when the file is not JSON or not a valid artifact
 */
export async function readArtifact(path: string, registry: TransformRegistry): Promise<FrozenArtifact> {
  let content: string;
  try {
    content = await fs.readFile(path, 'utf-8');
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      throw new NotFoundError('Artifact file', path);
    }
    throw error;
  }
  let document: unknown;
  try {
    document = JSON.parse(content);
  } catch (error) {
    throw new ArtifactError(`Artifact file ${path} is not valid JSON`, {
      path,
      cause: error instanceof Error ? error.message : String(error),
    });
  }
  return loadArtifact(document, registry);
}
