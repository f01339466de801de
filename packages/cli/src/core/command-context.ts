/**
 * Command Context - lazy service creation
 *
 * Handlers get their collaborators from here instead of constructing them,
 * so tests can swap in their own transform registry or clock.
 */

import { DateTime } from 'luxon';
import { createLogger } from '@prepflow/utils';
import type { Logger } from '@prepflow/utils';
import type { TransformRegistry } from '@prepflow/engine';
import { createDefaultTransformRegistry } from '../transforms/index.js';

/**
 * Services available in command context
 */
export interface CommandServices {
  transforms(): TransformRegistry;
  clock(): DateTime;
  logger(): Logger;
}

/**
 * Options for creating a CommandContext with service overrides
 */
export interface CommandContextOptions {
  /**
   * Override the transform registry (tests register their own transforms)
   */
  transformRegistryOverride?: TransformRegistry;
  /**
   * Override the clock used for artifact timestamps
   */
  clockOverride?: () => DateTime;
}

export class CommandContext {
  private _services: CommandServices | null = null;
  private _transforms: TransformRegistry | null = null;
  private readonly _options: CommandContextOptions;

  constructor(options: CommandContextOptions = {}) {
    this._options = options;
  }

  get services(): CommandServices {
    if (!this._services) {
      this._services = this._createServices();
    }
    return this._services;
  }

  private _createServices(): CommandServices {
    const logger = createLogger('@prepflow/cli');
    return {
      transforms: () => {
        if (!this._transforms) {
          this._transforms = this._options.transformRegistryOverride ?? createDefaultTransformRegistry();
        }
        return this._transforms;
      },
      clock: () => (this._options.clockOverride ? this._options.clockOverride() : DateTime.utc()),
      logger: () => logger,
    };
  }
}

export function createCommandContext(options?: CommandContextOptions): CommandContext {
  return new CommandContext(options);
}
