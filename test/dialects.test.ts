import { describe, it, expect } from 'vitest';
import { LegacyDialect, lastParenthesized } from '../src/parser/dialects/legacy/index.js';
import { NpmDialect } from '../src/parser/dialects/npm/index.js';
import { createDefaultRegistry } from '../src/parser/dialects/index.js';

describe('LegacyDialect', () => {
  const dialect = new LegacyDialect();

  it('uses the last parenthesized group as the pass name', () => {
    const match = dialect.matchHeader(
      '*** IR Dump After Instrument function entry/exit (post inlining) (post-inline-ee-instrument) ***',
    );
    expect(match).toEqual({ name: 'post-inline-ee-instrument', scope: { kind: 'unknown' } });
  });

  it('falls back to the whole banner text without parentheses', () => {
    expect(dialect.matchHeader('*** IR Dump After InstCombine ***')?.name).toBe('InstCombine');
  });

  it('accepts a banner whose only text is a parenthesized id', () => {
    expect(dialect.matchHeader('*** IR Dump After (early-cse) ***')?.name).toBe('early-cse');
  });

  it('tolerates leading whitespace, a # marker and a trailing colon', () => {
    expect(dialect.matchHeader('   # *** IR Dump After Early CSE (early-cse) ***:')?.name).toBe('early-cse');
  });

  it('ignores lines that are not banners', () => {
    expect(dialect.matchHeader('  %sum = add i32 %a, %b')).toBeNull();
    expect(dialect.matchHeader('; *** IR Dump After InstCombinePass on main ***')).toBeNull();
  });

  it('trims the extracted group', () => {
    expect(lastParenthesized('Loop Pass ( loop-rotate )')).toBe('loop-rotate');
  });
});

describe('NpmDialect', () => {
  const dialect = new NpmDialect();

  it('reads function scope from the target', () => {
    expect(dialect.matchHeader('; *** IR Dump After InstCombinePass on main ***')).toEqual({
      name: 'InstCombinePass',
      scope: { kind: 'function', target: 'main' },
    });
  });

  it('recognizes the module marker', () => {
    expect(dialect.matchHeader('; *** IR Dump After VerifierPass on [module] ***')).toEqual({
      name: 'VerifierPass',
      scope: { kind: 'module' },
    });
  });

  it('tolerates leading whitespace and a # marker', () => {
    expect(dialect.matchHeader('  # ; *** IR Dump After DCEPass on foo ***')?.name).toBe('DCEPass');
  });

  it('ignores legacy banners and plain comments', () => {
    expect(dialect.matchHeader('*** IR Dump After Early CSE (early-cse) ***')).toBeNull();
    expect(dialect.matchHeader('; preds = %entry')).toBeNull();
  });
});

describe('createDefaultRegistry', () => {
  it('registers both dialects by id', () => {
    const registry = createDefaultRegistry();
    expect(registry.list().map(d => d.id)).toEqual(['legacy', 'npm']);
    expect(registry.get('npm')).toBeInstanceOf(NpmDialect);
    expect(registry.has('gcc')).toBe(false);
  });
});
