import { closeSync, mkdirSync, openSync, readFileSync, writeFileSync } from 'node:fs';
import { join, resolve } from 'node:path';
import type { ArtifactHandle } from '../model/pass.js';
import { StorageFaultError } from '../errors.js';

/** Durable storage for extracted pass blocks. */
export interface ArtifactStore {
  /** @throws StorageFaultError when the block cannot be persisted */
  write(name: string, content: string): ArtifactHandle;
  read(handle: ArtifactHandle): string;
}

/** Stores each block as `<dir>/<name>`; the handle is the absolute path. */
export class FileArtifactStore implements ArtifactStore {
  readonly dir: string;

  constructor(dir: string) {
    this.dir = resolve(dir);
    try {
      mkdirSync(this.dir, { recursive: true });
    } catch (err) {
      throw new StorageFaultError(this.dir, err);
    }
  }

  write(name: string, content: string): ArtifactHandle {
    const filePath = join(this.dir, name);
    try {
      const fd = openSync(filePath, 'w');
      try {
        writeFileSync(fd, content, 'utf-8');
      } finally {
        closeSync(fd);
      }
    } catch (err) {
      throw new StorageFaultError(filePath, err);
    }
    return filePath;
  }

  read(handle: ArtifactHandle): string {
    return readFileSync(handle, 'utf-8');
  }
}
