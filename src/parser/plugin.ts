import type { PassScope } from '../model/pass.js';

export interface HeaderMatch {
  name: string;
  scope: PassScope;
}

/** One banner format. `matchHeader` returns null for lines that are not headers. */
export interface HeaderDialect {
  id: string;
  description: string;
  matchHeader(line: string): HeaderMatch | null;
}
