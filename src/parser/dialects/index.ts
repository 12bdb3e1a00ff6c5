import { DialectRegistry } from '../registry.js';
import { LegacyDialect } from './legacy/index.js';
import { NpmDialect } from './npm/index.js';

export function createDefaultRegistry(): DialectRegistry {
  const registry = new DialectRegistry();

  registry.register(new LegacyDialect());
  registry.register(new NpmDialect());

  return registry;
}
