/**
 * Transforms the CLI can run and serve
 */

import { TransformRegistry } from '@prepflow/engine';
import { exampleBasicTransform } from './example-basic.js';

export { exampleBasicTransform };

export function createDefaultTransformRegistry(): TransformRegistry {
  const registry = new TransformRegistry();
  registry.register(exampleBasicTransform);
  return registry;
}
