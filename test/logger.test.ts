import { describe, it, expect } from 'vitest';
import { readFileSync } from 'node:fs';
import { join } from 'node:path';
import { combineLoggers, createConsoleLogger, createFileLogger } from '../src/logging/logger.js';
import { tempDir } from './helpers.js';

function collect(opts: { verbose?: boolean; quiet?: boolean } = {}) {
  const lines: string[] = [];
  const logger = createConsoleLogger({ ...opts, write: line => lines.push(line) });
  return { logger, lines };
}

describe('createConsoleLogger', () => {
  it('hides debug output unless verbose', () => {
    const { logger, lines } = collect();
    logger.debug('scanning');
    logger.info('Found 4 pipeline A pass headers');
    logger.warn('No mapping found for pass: licm');
    logger.error('boom');

    expect(lines).toEqual([
      'Found 4 pipeline A pass headers',
      'warn: No mapping found for pass: licm',
      'error: boom',
    ]);
  });

  it('includes debug output when verbose', () => {
    const { logger, lines } = collect({ verbose: true });
    logger.debug('Extracted pass 0: verify');
    expect(lines).toEqual(['Extracted pass 0: verify']);
  });

  it('shows only errors when quiet', () => {
    const { logger, lines } = collect({ quiet: true, verbose: true });
    logger.debug('a');
    logger.info('b');
    logger.warn('c');
    logger.error('d');
    expect(lines).toEqual(['error: d']);
  });
});

describe('createFileLogger', () => {
  it('writes timestamped lines at every level to a fresh file', () => {
    const path = join(tempDir(), 'logs', 'irdiverge.log');
    const now = () => new Date('2026-01-02T03:04:05.000Z');

    createFileLogger(path, now).info('first run');
    const logger = createFileLogger(path, now);
    logger.info('hello');
    logger.debug('details');

    expect(readFileSync(path, 'utf-8')).toBe(
      '2026-01-02T03:04:05.000Z - INFO - hello\n2026-01-02T03:04:05.000Z - DEBUG - details\n',
    );
  });
});

describe('combineLoggers', () => {
  it('forwards each message to every logger', () => {
    const first = collect();
    const second = collect();
    combineLoggers(first.logger, second.logger).warn('twice');

    expect(first.lines).toEqual(['warn: twice']);
    expect(second.lines).toEqual(['warn: twice']);
  });
});
