import { mkdtempSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { fileURLToPath } from 'node:url';
import type { PassRecord, PassScope } from '../src/model/pass.js';

export function makePass(name: string, index: number, content = '', scope: PassScope = { kind: 'unknown' }): PassRecord {
  return { name, index, scope, artifact: `${index}_${name}`, content };
}

export function makePasses(names: string[], contents: string[] = []): PassRecord[] {
  return names.map((name, i) => makePass(name, i, contents[i] ?? ''));
}

export function fixturePath(name: string): string {
  return fileURLToPath(new URL(`./fixtures/${name}`, import.meta.url));
}

export function tempDir(prefix = 'irdiverge-'): string {
  return mkdtempSync(join(tmpdir(), prefix));
}
