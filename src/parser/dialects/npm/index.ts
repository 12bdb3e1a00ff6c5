import type { HeaderDialect, HeaderMatch } from '../../plugin.js';

const BANNER = /^\s*#?\s*; \*\*\* IR Dump After (.+?) on (.+?) \*\*\*/;
const MODULE_TARGET = '[module]';

/** New pass manager banners: `; *** IR Dump After <pass> on <target> ***` */
export class NpmDialect implements HeaderDialect {
  id = 'npm';
  description = '; *** IR Dump After <pass> on <function | [module]> ***';

  matchHeader(line: string): HeaderMatch | null {
    const match = BANNER.exec(line.trimEnd());
    if (!match) return null;

    const target = match[2].trim();
    return {
      name: match[1].trim(),
      scope: target === MODULE_TARGET ? { kind: 'module' } : { kind: 'function', target },
    };
  }
}
