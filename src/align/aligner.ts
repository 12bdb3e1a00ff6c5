import type { PassRecord } from '../model/pass.js';
import type {
  AlignmentPair,
  AlignmentResult,
  AmbiguousTarget,
  ExclusionSets,
  NameMapping,
  UnmatchedPass,
} from '../model/alignment.js';
import { silentLogger, type Logger } from '../logging/logger.js';

export interface AlignOptions {
  logger?: Logger;
}

export const NO_EXCLUSIONS: ExclusionSets = { a: new Set(), b: new Set() };

/**
 * Greedy chronological alignment. Each A-pass, in order, takes the earliest
 * unused B-pass carrying its mapped name whose index is after the last B-pass
 * taken. The result is deterministic, not globally optimal: with a target
 * name that repeats in B, an early A-pass may take an occurrence a later
 * A-pass would have needed.
 */
export function align(
  passesA: readonly PassRecord[],
  passesB: readonly PassRecord[],
  mapping: NameMapping,
  exclusions: ExclusionSets = NO_EXCLUSIONS,
  opts: AlignOptions = {},
): AlignmentResult {
  const logger = opts.logger ?? silentLogger;
  const pairs: AlignmentPair[] = [];
  const unmatched: UnmatchedPass[] = [];
  const consumed = new Set<number>();
  let lastB = -1;

  const positionsByName = indexByName(passesB);

  for (const a of passesA) {
    if (exclusions.a.has(a.name)) {
      logger.info(`Excluding pipeline A pass: ${a.name}`);
      unmatched.push({ record: a, reason: 'excluded' });
      continue;
    }

    const target = mapping.get(a.name);
    if (target === undefined) {
      logger.warn(`No mapping found for pass: ${a.name}`);
      unmatched.push({ record: a, reason: 'unmapped' });
      continue;
    }

    if (exclusions.b.has(target)) {
      logger.info(`Excluding mapped pipeline B pass: ${a.name} -> ${target}`);
      unmatched.push({ record: a, reason: 'excluded-target', target });
      continue;
    }

    const bIndex = earliestAvailable(positionsByName.get(target), lastB, consumed);
    if (bIndex === undefined) {
      logger.warn(`No valid chronological match for: ${a.name} -> ${target}`);
      unmatched.push({ record: a, reason: 'no-chronological-match', target });
      continue;
    }

    const b = passesB[bIndex];
    pairs.push({ a, b });
    consumed.add(bIndex);
    lastB = bIndex;
    logger.debug(`Mapped: ${a.name} (#${a.index}) -> ${b.name} (#${b.index})`);
  }

  logger.info(`Aligned ${pairs.length} pass pairs, ${unmatched.length} unmatched`);
  return { pairs, unmatched };
}

/** Positions of each name in B, ascending. */
function indexByName(passes: readonly PassRecord[]): Map<string, number[]> {
  const byName = new Map<string, number[]>();
  passes.forEach((pass, position) => {
    const positions = byName.get(pass.name) ?? [];
    positions.push(position);
    byName.set(pass.name, positions);
  });
  return byName;
}

function earliestAvailable(
  positions: readonly number[] | undefined,
  lastB: number,
  consumed: ReadonlySet<number>,
): number | undefined {
  if (!positions) return undefined;
  for (const position of positions) {
    if (position > lastB && !consumed.has(position)) return position;
  }
  return undefined;
}

/** B-names that more than one A-name maps to, in first-seen order. */
export function findAmbiguousTargets(mapping: NameMapping): AmbiguousTarget[] {
  const sourcesByTarget = new Map<string, string[]>();
  for (const [source, target] of mapping) {
    const sources = sourcesByTarget.get(target) ?? [];
    sources.push(source);
    sourcesByTarget.set(target, sources);
  }

  const ambiguous: AmbiguousTarget[] = [];
  for (const [target, sources] of sourcesByTarget) {
    if (sources.length > 1) ambiguous.push({ target, sources });
  }
  return ambiguous;
}
