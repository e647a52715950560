/**
 * File Snapshot Storage
 *
 * JSON file backend for engine snapshots. Writes go to a temp file that is
 * then renamed over the snapshot, so a crash mid-write leaves the previous
 * snapshot intact.
 *
 * @module db/file-storage
 */

import { constants, promises as fs } from 'fs';
import { dirname } from 'path';
import type { ISnapshotStorage } from '../packages/core/ports/ISnapshotStorage.js';
import { PersistenceError, errorMessage } from '../utils/errors.js';

export class FileSnapshotStorage implements ISnapshotStorage {
  constructor(private readonly filePath: string) {}

  get location(): string {
    return this.filePath;
  }

  async read(): Promise<unknown | null> {
    let content: string;
    try {
      content = await fs.readFile(this.filePath, 'utf-8');
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
        return null;
      }
      throw new PersistenceError(`Failed to read snapshot: ${errorMessage(error)}`, this.filePath, error);
    }

    try {
      return JSON.parse(content);
    } catch (error) {
      throw new PersistenceError(`Snapshot is not valid JSON: ${errorMessage(error)}`, this.filePath, error);
    }
  }

  async write(document: unknown): Promise<void> {
    const tempPath = `${this.filePath}.tmp`;
    const content = JSON.stringify(document, null, 2);

    try {
      await fs.mkdir(dirname(this.filePath), { recursive: true });
      await fs.writeFile(tempPath, content, 'utf-8');
      await fs.rename(tempPath, this.filePath);
    } catch (error) {
      throw new PersistenceError(`Failed to write snapshot: ${errorMessage(error)}`, this.filePath, error);
    }
  }
}

/**
 * Make sure the snapshot directory exists and is writable.
 * Used once at startup, where failure is fatal.
 */
export async function ensureSnapshotDirectory(filePath: string): Promise<void> {
  const directory = dirname(filePath);
  try {
    await fs.mkdir(directory, { recursive: true });
    await fs.access(directory, constants.W_OK);
  } catch (error) {
    throw new PersistenceError(`Snapshot directory is not usable: ${errorMessage(error)}`, directory, error);
  }
}
