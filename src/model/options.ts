import { Logger, defaultLogger } from '../core/logger';
import { SchemaRegistry, getDefaultRegistry } from '../schema/registry';
import { Sha1Policy } from '../types';

/**
 * Collaborators shared by the model factories, converter and merger
 */
export interface EngineOptions {
  registry?: SchemaRegistry;
  logger?: Logger;
  sha1Policy?: Sha1Policy;
}

export interface ResolvedOptions {
  registry: SchemaRegistry;
  logger: Logger;
  sha1Policy: Sha1Policy;
}

export function resolveOptions(options: EngineOptions = {}): ResolvedOptions {
  return {
    registry: options.registry ?? getDefaultRegistry(),
    logger: options.logger ?? defaultLogger,
    sha1Policy: options.sha1Policy ?? 'warn',
  };
}
