import { describe, it, expect, vi } from 'vitest';
import { align } from '../src/align/aligner.js';
import { findFirstDivergence, type ContentReader } from '../src/compare/divergence.js';
import { DEFAULT_NORMALIZE_OPTIONS } from '../src/normalize/options.js';
import { makePass, makePasses } from './helpers.js';

describe('findFirstDivergence', () => {
  const a = makePasses(['InstCombine', 'early-cse'], [
    'entry:\n  %x = add i32 %a, 1\n',
    'entry:\n  ret i32 %x\n',
  ]);
  const b = makePasses(['instcombine', 'simplifycfg', 'early-cse'], [
    'bb0:\n  %0 = add i32 %arg, 1\n',
    'bb0:\n  br label %bb0\n',
    'bb0:\n  ret i32 0\n',
  ]);
  const mapping = new Map([['InstCombine', 'instcombine'], ['early-cse', 'early-cse']]);
  const { pairs } = align(a, b, mapping);

  it('reports the first differing pair and the pair before it', () => {
    const result = findFirstDivergence(pairs);

    expect(result).toEqual({
      found: true,
      index: 1,
      pair: pairs[1],
      lastCommonPair: pairs[0],
      normalizedA: 'label_0:\nret i32 %temp_0',
      normalizedB: 'label_0:\nret i32 0',
    });
  });

  it('has no last common pair when the first pair differs', () => {
    const result = findFirstDivergence([{ a: makePass('x', 0, 'ret void'), b: makePass('y', 0, 'unreachable') }]);
    expect(result.found).toBe(true);
    if (result.found) {
      expect(result.index).toBe(0);
      expect(result.lastCommonPair).toBeNull();
    }
  });

  it('reports the number of pairs compared when nothing differs', () => {
    expect(findFirstDivergence(pairs.slice(0, 1))).toEqual({ found: false, compared: 1 });
    expect(findFirstDivergence([])).toEqual({ found: false, compared: 0 });
  });

  it('stops reading content at the first divergence', () => {
    const later = { a: makePass('c', 2, 'ret void'), b: makePass('c', 3, 'ret void') };
    const read = vi.fn<ContentReader>(record => record.content);

    findFirstDivergence([...pairs, later], DEFAULT_NORMALIZE_OPTIONS, { read });

    expect(read).toHaveBeenCalledTimes(4);
    expect(read.mock.calls.map(([record]) => record)).not.toContain(later.a);
  });

  it('uses the normalization options it is given', () => {
    const pair = { a: makePass('x', 0, 'ret void ; a'), b: makePass('x', 0, 'ret void ; b') };
    expect(findFirstDivergence([pair]).found).toBe(true);
    expect(findFirstDivergence([pair], { ...DEFAULT_NORMALIZE_OPTIONS, stripComments: true }).found).toBe(false);
  });
});
