import type { PassRecord } from './pass.js';

export type NameMapping = ReadonlyMap<string, string>;

export interface ExclusionSets {
  a: ReadonlySet<string>;
  b: ReadonlySet<string>;
}

export interface AlignmentPair {
  readonly a: PassRecord;
  readonly b: PassRecord;
}

export type UnmatchedReason =
  | 'excluded'               // A-name is in the A exclusion set
  | 'unmapped'               // no mapping entry for the A-name
  | 'excluded-target'        // mapped B-name is in the B exclusion set
  | 'no-chronological-match'; // no unused B-pass after the last match

export interface UnmatchedPass {
  record: PassRecord;
  reason: UnmatchedReason;
  target?: string;
}

export interface AlignmentResult {
  pairs: AlignmentPair[];
  unmatched: UnmatchedPass[];
}

/** B-name targeted by more than one A-name */
export interface AmbiguousTarget {
  target: string;
  sources: string[];
}

export type DivergenceResult =
  | { found: false; compared: number }
  | {
      found: true;
      index: number;
      pair: AlignmentPair;
      lastCommonPair: AlignmentPair | null;
      normalizedA: string;
      normalizedB: string;
    };
