import type { Logger } from '../logging/logger.js';
import type { IrDivergeConfig } from '../config/config.js';
import type { DialectRegistry } from '../parser/registry.js';

/** Everything a run needs besides its inputs; passed explicitly, never global. */
export interface RunContext {
  logger: Logger;
  config: IrDivergeConfig;
  registry: DialectRegistry;
}
