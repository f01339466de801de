/**
 * Transform Registry
 *
 * Resolves the transform reference stored in an artifact back to its code.
 * Serving processes register the same transforms the training job used.
 */

import { toTransformHandle } from './defineTransform.js';
import type { TransformHandle } from './defineTransform.js';
import type { AnalyzerBindings, TransformDefinition } from './types.js';

export class TransformRegistry {
  private transforms = new Map<string, TransformHandle>();

  /**
   * @throws Error if a transform with the same id is already registered
   */
  register<B extends AnalyzerBindings>(transform: TransformDefinition<B>): void {
    if (this.transforms.has(transform.id)) {
      throw new Error(`Transform with ID '${transform.id}' is already registered`);
    }
    this.transforms.set(transform.id, toTransformHandle(transform));
  }

  get(id: string): TransformHandle | undefined {
    return this.transforms.get(id);
  }

  has(id: string): boolean {
    return this.transforms.has(id);
  }

  listIds(): string[] {
    return Array.from(this.transforms.keys()).sort();
  }

  list(): TransformHandle[] {
    return this.listIds().flatMap((id) => this.transforms.get(id) ?? []);
  }

  /**
   * Unregister a transform (for testing)
   */
  unregister(id: string): boolean {
    return this.transforms.delete(id);
  }
}
