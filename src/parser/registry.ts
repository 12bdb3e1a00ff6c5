import type { HeaderDialect } from './plugin.js';

export class DialectRegistry {
  private dialects = new Map<string, HeaderDialect>();

  register(dialect: HeaderDialect): void {
    this.dialects.set(dialect.id, dialect);
  }

  get(id: string): HeaderDialect | undefined {
    return this.dialects.get(id);
  }

  has(id: string): boolean {
    return this.dialects.has(id);
  }

  list(): HeaderDialect[] {
    return Array.from(this.dialects.values());
  }
}
