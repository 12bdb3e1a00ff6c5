import type { HeaderDescriptor, PassRecord } from '../model/pass.js';
import type { ArtifactStore } from '../storage/artifact-store.js';
import { silentLogger, type Logger } from '../logging/logger.js';
import { splitLines } from '../utils/lines.js';
import { sanitizeFileName } from '../utils/path.js';

export interface ExtractOptions {
  logger?: Logger;
}

/**
 * Slice `text` into one block per header and persist each block through
 * `store`. Block `i` runs from the line after header `i` up to the line
 * before header `i + 1`, or to the end of input.
 */
export function extract(
  text: string,
  headers: readonly HeaderDescriptor[],
  store: ArtifactStore,
  opts: ExtractOptions = {},
): PassRecord[] {
  const logger = opts.logger ?? silentLogger;
  const lines = splitLines(text);
  const records: PassRecord[] = [];

  const preamble = headers.length > 0 ? headers[0].line : lines.length;
  if (preamble > 0) {
    logger.debug(`Skipped ${preamble} lines before the first pass header`);
  }

  for (let i = 0; i < headers.length; i++) {
    const header = headers[i];
    const end = i + 1 < headers.length ? headers[i + 1].line : lines.length;
    const content = blockContent(lines, header.line + 1, end);

    const artifact = store.write(artifactName(i, header), content);

    records.push(Object.freeze({
      name: header.name,
      index: i,
      scope: header.scope,
      artifact,
      content,
    }));

    logger.debug(`Extracted pass ${i}: ${header.name}`);
  }

  return records;
}

function blockContent(lines: readonly string[], start: number, end: number): string {
  let out = '';
  for (let i = start; i < end; i++) {
    out += lines[i].trimEnd() + '\n';
  }
  return out;
}

/** `007_instcombine_main.ll` for function scope, `007_instcombine.ll` otherwise */
export function artifactName(index: number, header: Pick<HeaderDescriptor, 'name' | 'scope'>): string {
  const parts = [String(index).padStart(3, '0'), sanitizeFileName(header.name)];
  if (header.scope.kind === 'function') {
    parts.push(sanitizeFileName(header.scope.target));
  }
  return `${parts.join('_')}.ll`;
}
