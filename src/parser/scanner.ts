import type { HeaderDescriptor } from '../model/pass.js';
import type { HeaderDialect } from './plugin.js';
import { splitLines } from '../utils/lines.js';

export function scanHeaders(text: string, dialect: HeaderDialect): HeaderDescriptor[] {
  return scanLines(splitLines(text), dialect);
}

export function scanLines(lines: readonly string[], dialect: HeaderDialect): HeaderDescriptor[] {
  const headers: HeaderDescriptor[] = [];

  for (let i = 0; i < lines.length; i++) {
    const match = dialect.matchHeader(lines[i]);
    if (!match) continue;

    headers.push({
      name: match.name,
      line: i,
      scope: match.scope,
      text: lines[i].trimEnd(),
    });
  }

  return headers;
}
