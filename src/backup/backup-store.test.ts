/**
 * BackupStore tests — real directories under the OS temp folder.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { BackupStore, formatBackupName, isBackupName } from './backup-store.js';
import { ConfigurationError, StorageError } from '../errors/index.js';

// ─── Fixtures ─────────────────────────────────────────────────────────────────

function setName(day: number): string {
  return `2024.01.${String(day).padStart(2, '0')} 10-00-00`;
}

function makeSets(root: string, days: number[]): void {
  for (const day of days) {
    const dir = path.join(root, setName(day), 'Switch');
    fs.mkdirSync(dir, { recursive: true });
    fs.writeFileSync(path.join(dir, 'game.srm'), `save from day ${day}`);
  }
}

// ─── formatBackupName ─────────────────────────────────────────────────────────

describe('formatBackupName', () => {
  it('formats local time as YYYY.MM.DD HH-mm-ss', () => {
    expect(formatBackupName(new Date(2024, 0, 2, 9, 5, 7))).toBe('2024.01.02 09-05-07');
  });

  it('sorts lexicographically in chronological order', () => {
    const dates = [
      new Date(2024, 10, 3, 8, 0, 0),
      new Date(2023, 11, 31, 23, 59, 59),
      new Date(2024, 1, 10, 14, 30, 0),
      new Date(2024, 1, 9, 15, 0, 0),
    ];
    const byName = dates.map(formatBackupName).sort();
    const byTime = [...dates].sort((a, b) => a.getTime() - b.getTime()).map(formatBackupName);
    expect(byName).toEqual(byTime);
  });

  it('produces names recognised by isBackupName', () => {
    expect(isBackupName(formatBackupName(new Date(2025, 5, 15, 0, 0, 0)))).toBe(true);
    expect(isBackupName('Latest Saves')).toBe(false);
    expect(isBackupName('2024-01-02')).toBe(false);
  });
});

// ─── BackupStore ──────────────────────────────────────────────────────────────

describe('BackupStore', () => {
  let tmp: string;
  let root: string;
  let store: BackupStore;

  beforeEach(() => {
    tmp = fs.mkdtempSync(path.join(os.tmpdir(), 'savesync-backups-'));
    root = path.join(tmp, 'Backups');
    store = new BackupStore(root);
  });

  afterEach(() => {
    fs.rmSync(tmp, { recursive: true, force: true });
  });

  it('ensureLayout creates the root with parents', async () => {
    store = new BackupStore(path.join(tmp, 'a', 'b', 'Backups'));
    await store.ensureLayout();
    expect(fs.statSync(path.join(tmp, 'a', 'b', 'Backups')).isDirectory()).toBe(true);
  });

  it('list returns backup sets oldest first and ignores other entries', async () => {
    makeSets(root, [3, 1, 2]);
    fs.mkdirSync(path.join(root, 'notes'));
    fs.writeFileSync(path.join(root, '2024.01.09 10-00-00'), 'a file, not a set');

    expect(await store.list()).toEqual([setName(1), setName(2), setName(3)]);
  });

  it('list throws StorageError when the root is missing', async () => {
    await expect(store.list()).rejects.toBeInstanceOf(StorageError);
  });

  describe('prune()', () => {
    it('does nothing while below the cap', async () => {
      makeSets(root, [1, 2, 3]);
      expect(await store.prune(10)).toEqual([]);
      expect(await store.list()).toHaveLength(3);
    });

    it('deletes exactly the oldest sets until fewer than the cap remain', async () => {
      makeSets(root, [5, 1, 4, 2, 3]);

      const deleted = await store.prune(3);

      expect(deleted).toEqual([setName(1), setName(2), setName(3)]);
      expect(await store.list()).toEqual([setName(4), setName(5)]);
      expect(fs.existsSync(path.join(root, setName(1)))).toBe(false);
    });

    it('leaves room for one new set when already at the cap', async () => {
      makeSets(root, [1, 2, 3, 4, 5, 6, 7, 8, 9, 10]);

      const deleted = await store.prune(10);

      expect(deleted).toEqual([setName(1)]);
      expect(await store.list()).toHaveLength(9);
    });

    it('with a cap of 1 removes every set', async () => {
      makeSets(root, [1, 2]);
      expect(await store.prune(1)).toEqual([setName(1), setName(2)]);
      expect(await store.list()).toEqual([]);
    });

    it('keeps folders that are not backup sets', async () => {
      makeSets(root, [1, 2]);
      fs.mkdirSync(path.join(root, 'notes'));

      await store.prune(1);

      expect(fs.existsSync(path.join(root, 'notes'))).toBe(true);
    });

    it('rejects a cap below 1', async () => {
      await expect(store.prune(0)).rejects.toBeInstanceOf(ConfigurationError);
    });
  });

  describe('createNewSet()', () => {
    it('creates a directory named after the given time', async () => {
      await store.ensureLayout();
      const when = new Date(2024, 0, 2, 9, 0, 0);

      const set = await store.createNewSet(when);

      expect(set.name).toBe('2024.01.02 09-00-00');
      expect(set.path).toBe(path.join(root, '2024.01.02 09-00-00'));
      expect(fs.readdirSync(set.path)).toEqual([]);
    });

    it('refuses to reuse an existing set', async () => {
      await store.ensureLayout();
      const when = new Date(2024, 0, 2, 9, 0, 0);
      await store.createNewSet(when);

      await expect(store.createNewSet(when)).rejects.toBeInstanceOf(StorageError);
    });

    it('results in exactly the cap after pruning a full root', async () => {
      makeSets(root, [1, 2, 3, 4, 5, 6, 7, 8, 9, 10]);

      await store.prune(10);
      await store.createNewSet(new Date(2024, 1, 1, 12, 0, 0));

      const sets = await store.list();
      expect(sets).toHaveLength(10);
      expect(sets).not.toContain(setName(1));
      expect(sets[sets.length - 1]).toBe('2024.02.01 12-00-00');
    });
  });

  it('deviceDir creates the device folder inside the set', async () => {
    await store.ensureLayout();
    const set = await store.createNewSet(new Date(2024, 0, 2, 9, 0, 0));

    const dir = await store.deviceDir(set, 'Phone');

    expect(dir).toBe(path.join(set.path, 'Phone'));
    expect(fs.statSync(dir).isDirectory()).toBe(true);
  });
});
