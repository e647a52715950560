/**
 * Unit Tests for FileSnapshotStorage
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { promises as fs } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { FileSnapshotStorage, ensureSnapshotDirectory } from '../../src/db/file-storage.js';
import { PersistenceError } from '../../src/utils/errors.js';

describe('FileSnapshotStorage', () => {
  let directory: string;

  beforeEach(async () => {
    directory = await fs.mkdtemp(join(tmpdir(), 'levelup-snapshot-'));
  });

  afterEach(async () => {
    await fs.rm(directory, { recursive: true, force: true });
  });

  it('returns null when the file does not exist', async () => {
    const storage = new FileSnapshotStorage(join(directory, 'bot_data.json'));
    expect(await storage.read()).toBeNull();
  });

  it('writes pretty-printed JSON and reads it back', async () => {
    const filePath = join(directory, 'bot_data.json');
    const storage = new FileSnapshotStorage(filePath);

    await storage.write({ total_server_messages: 3 });

    expect(await fs.readFile(filePath, 'utf-8')).toBe('{\n  "total_server_messages": 3\n}');
    expect(await storage.read()).toEqual({ total_server_messages: 3 });
  });

  it('replaces the file without leaving the temp file behind', async () => {
    const filePath = join(directory, 'bot_data.json');
    const storage = new FileSnapshotStorage(filePath);

    await storage.write({ total_server_messages: 1 });
    await storage.write({ total_server_messages: 2 });

    expect(await storage.read()).toEqual({ total_server_messages: 2 });
    expect(await fs.readdir(directory)).toEqual(['bot_data.json']);
  });

  it('creates missing parent directories', async () => {
    const filePath = join(directory, 'nested', 'data', 'bot_data.json');
    const storage = new FileSnapshotStorage(filePath);

    await storage.write({});
    expect(await storage.read()).toEqual({});
  });

  it('raises a PersistenceError for invalid JSON', async () => {
    const filePath = join(directory, 'bot_data.json');
    await fs.writeFile(filePath, '{ not json', 'utf-8');
    const storage = new FileSnapshotStorage(filePath);

    await expect(storage.read()).rejects.toBeInstanceOf(PersistenceError);
  });

  it('raises a PersistenceError when the path is a directory', async () => {
    const storage = new FileSnapshotStorage(directory);
    await expect(storage.read()).rejects.toBeInstanceOf(PersistenceError);
  });

  it('reports its location', () => {
    const filePath = join(directory, 'bot_data.json');
    expect(new FileSnapshotStorage(filePath).location).toBe(filePath);
  });

  describe('ensureSnapshotDirectory', () => {
    it('creates the directory for the data file', async () => {
      const filePath = join(directory, 'data', 'bot_data.json');
      await ensureSnapshotDirectory(filePath);

      const stat = await fs.stat(join(directory, 'data'));
      expect(stat.isDirectory()).toBe(true);
    });

    it('fails when the parent path is a file', async () => {
      const blocker = join(directory, 'blocker');
      await fs.writeFile(blocker, '', 'utf-8');

      await expect(ensureSnapshotDirectory(join(blocker, 'bot_data.json'))).rejects.toBeInstanceOf(
        PersistenceError
      );
    });
  });
});
