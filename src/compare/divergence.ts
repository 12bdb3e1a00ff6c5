import type { AlignmentPair, DivergenceResult } from '../model/alignment.js';
import type { PassRecord } from '../model/pass.js';
import { normalize } from '../normalize/normalizer.js';
import { DEFAULT_NORMALIZE_OPTIONS, type NormalizeOptions } from '../normalize/options.js';
import { silentLogger, type Logger } from '../logging/logger.js';

export type ContentReader = (record: PassRecord) => string;

export interface DivergenceOptions {
  /** Where pass text comes from; defaults to the in-memory extracted content */
  read?: ContentReader;
  logger?: Logger;
}

const readContent: ContentReader = record => record.content;

/**
 * Compare aligned pairs in order and stop at the first pair whose normalized
 * text differs. Pairs after it are never read.
 */
export function findFirstDivergence(
  pairs: readonly AlignmentPair[],
  options: NormalizeOptions = DEFAULT_NORMALIZE_OPTIONS,
  opts: DivergenceOptions = {},
): DivergenceResult {
  const read = opts.read ?? readContent;
  const logger = opts.logger ?? silentLogger;

  for (let i = 0; i < pairs.length; i++) {
    const pair = pairs[i];
    logger.debug(`Comparing pass pair ${i}: ${pair.a.name} vs ${pair.b.name}`);

    const normalizedA = normalize(read(pair.a), options);
    const normalizedB = normalize(read(pair.b), options);
    if (normalizedA === normalizedB) continue;

    logger.info(`Divergence found at pass pair ${i}: ${pair.a.name} vs ${pair.b.name}`);
    return {
      found: true,
      index: i,
      pair,
      lastCommonPair: i > 0 ? pairs[i - 1] : null,
      normalizedA,
      normalizedB,
    };
  }

  logger.info('No divergence found: all compared passes have identical IR');
  return { found: false, compared: pairs.length };
}
