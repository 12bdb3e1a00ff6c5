import { DEFAULT_NORMALIZE_OPTIONS, type NormalizeOptions } from './options.js';
import { canonicalName, createRenameState, type RenameState } from './rename-state.js';

const DEBUG_INFO = /,\s*!dbg\s*![0-9]+/g;
// Named (`entry:`) or numbered (`1:`) block label definition
const LABEL_DEF = /^(\s*)([A-Za-z$._][-A-Za-z$._0-9]*|[0-9]+):/;
const FUNCTION_START = /^\s*define\b/;
// A double-quoted string, or a maximal run of identifier characters
const TOKEN = /"(?:[^"\\]|\\.)*"|[-A-Za-z$._0-9]+/g;
const WHITESPACE = /\s+/g;

interface PreparedLine {
  text: string;
  /** Blank in the source, as opposed to emptied by a transformation */
  blank: boolean;
}

/**
 * Rewrite an IR block into canonical form so that blocks differing only in
 * value/label spelling, comments, debug attachments or layout compare equal.
 *
 * Pure: the rename tables are created per function and threaded through the
 * fold. Every `define` line starts a fresh numbering.
 */
export function normalize(text: string, options: NormalizeOptions = DEFAULT_NORMALIZE_OPTIONS): string {
  const out: string[] = [];

  for (const segment of splitFunctions(prepareLines(text, options))) {
    const state = createRenameState();
    if (options.renameLabels) collectLabels(segment, state);

    for (const line of segment) {
      if (line.blank) {
        out.push(options.collapseWhitespace ? '' : line.text);
        continue;
      }

      let rewritten = rewriteTokens(line.text, state, options);
      if (options.collapseWhitespace) {
        rewritten = rewritten.replace(WHITESPACE, ' ').trim();
      }
      if (rewritten.trim() === '') continue;

      out.push(rewritten);
    }
  }

  return out.join('\n');
}

/** Lines before the first `define`, then one segment per function. */
function splitFunctions(lines: readonly PreparedLine[]): PreparedLine[][] {
  const segments: PreparedLine[][] = [[]];
  for (const line of lines) {
    if (!line.blank && FUNCTION_START.test(line.text)) segments.push([]);
    segments[segments.length - 1].push(line);
  }
  return segments;
}

function prepareLines(text: string, options: NormalizeOptions): PreparedLine[] {
  const prepared: PreparedLine[] = [];

  for (const raw of text.split(/\r?\n/)) {
    if (raw.trim() === '') {
      if (!options.dropBlankLines) prepared.push({ text: raw, blank: true });
      continue;
    }
    if (options.dropMetadata && raw.trimStart().startsWith('!')) continue;

    let line = raw;
    if (options.stripComments) line = stripComment(line);
    if (options.stripDebugInfo) line = line.replace(DEBUG_INFO, '');
    prepared.push({ text: line, blank: false });
  }

  return prepared;
}

/** Cut at the first `;` that is not inside a double-quoted string. */
export function stripComment(line: string): string {
  let inString = false;
  for (let i = 0; i < line.length; i++) {
    const ch = line[i];
    if (inString) {
      if (ch === '\\') i++;
      else if (ch === '"') inString = false;
    } else if (ch === '"') {
      inString = true;
    } else if (ch === ';') {
      return line.slice(0, i);
    }
  }
  return line;
}

/** Build the label substitution table once, numbering labels by definition order. */
function collectLabels(lines: readonly PreparedLine[], state: RenameState): void {
  for (const line of lines) {
    if (line.blank) continue;
    const match = LABEL_DEF.exec(line.text);
    if (match) canonicalName(state.labels, match[2]);
  }
}

/**
 * Single tokenizing pass. Only a label definition and `%` names are
 * rewritten: a `%` name found in the label table becomes its label, any other
 * goes through the temporaries table. Quoted strings are skipped whole.
 */
function rewriteTokens(line: string, state: RenameState, options: NormalizeOptions): string {
  if (!options.renameLabels && !options.renameTemporaries) return line;

  const def = options.renameLabels ? LABEL_DEF.exec(line) : null;
  const defOffset = def ? def[1].length : -1;

  return line.replace(TOKEN, (token: string, offset: number) => {
    if (token.startsWith('"')) return token;

    if (offset === defOffset) return state.labels.names.get(token) ?? token;

    const sigil = offset > 0 ? line[offset - 1] : '';
    if (sigil !== '%') return token;

    const label = state.labels.names.get(token);
    if (label !== undefined) return label;

    return options.renameTemporaries ? canonicalName(state.temporaries, token) : token;
  });
}
