import type { HeaderDialect, HeaderMatch } from '../../plugin.js';

const BANNER = /^\s*#?\s*\*\*\* IR Dump After (.+) \*\*\*:?/;
const PAREN_GROUP = /\(([^)]+)\)/g;

/**
 * Legacy pass manager banners:
 *
 *   *** IR Dump After Instrument function entry/exit (post-inline-ee-instrument) ***
 *
 * The pass id in the last parenthesized group is the canonical name.
 */
export class LegacyDialect implements HeaderDialect {
  id = 'legacy';
  description = '*** IR Dump After <description> (<pass-id>) ***';

  matchHeader(line: string): HeaderMatch | null {
    const match = BANNER.exec(line.trimEnd());
    if (!match) return null;

    return {
      name: lastParenthesized(match[1].trim()),
      scope: { kind: 'unknown' },
    };
  }
}

export function lastParenthesized(text: string): string {
  let last: string | undefined;
  for (const m of text.matchAll(PAREN_GROUP)) {
    last = m[1];
  }
  return (last ?? text).trim();
}
