/**
 * savesync Backup Store
 *
 * Owns the backup root: one directory per run, named by its creation time
 * so that name order is chronological order. Retention deletes the oldest
 * sets first. Every filesystem failure here is a StorageError and aborts
 * the run, since downloads have nowhere safe to go.
 */

import { mkdir, readdir, rm } from 'fs/promises';
import { join } from 'path';
import { ConfigurationError, StorageError, toError } from '../errors/index.js';
import type { BackupSet } from '../sync/types.js';

/** `2024.01.02 09-05-07` */
const BACKUP_NAME_RE = /^\d{4}\.\d{2}\.\d{2} \d{2}-\d{2}-\d{2}$/;

/**
 * Format a local time as a backup-set name. Fixed-width fields keep
 * lexicographic order equal to chronological order.
 */
export function formatBackupName(date: Date): string {
  const pad = (n: number): string => String(n).padStart(2, '0');
  return (
    `${date.getFullYear()}.${pad(date.getMonth() + 1)}.${pad(date.getDate())} ` +
    `${pad(date.getHours())}-${pad(date.getMinutes())}-${pad(date.getSeconds())}`
  );
}

export function isBackupName(name: string): boolean {
  return BACKUP_NAME_RE.test(name);
}

export class BackupStore {
  readonly root: string;

  constructor(root: string) {
    this.root = root;
  }

  /** Create the backup root (and parents) if missing. */
  async ensureLayout(): Promise<void> {
    await this.guard(`create backup folder ${this.root}`, () =>
      mkdir(this.root, { recursive: true })
    );
  }

  /**
   * Names of the backup sets under the root, oldest first. Files and
   * directories not named like a backup set are left alone.
   */
  async list(): Promise<string[]> {
    const entries = await this.guard(`read backup folder ${this.root}`, () =>
      readdir(this.root, { withFileTypes: true })
    );
    return entries
      .filter((e) => e.isDirectory() && isBackupName(e.name))
      .map((e) => e.name)
      .sort();
  }

  /**
   * Delete the oldest backup sets, one at a time, until fewer than
   * `maxCount` remain. Re-lists after every deletion.
   * Returns the deleted names in deletion order.
   */
  async prune(maxCount: number): Promise<string[]> {
    if (!Number.isInteger(maxCount) || maxCount < 1) {
      throw new ConfigurationError(`maxBackups must be an integer of at least 1, got ${maxCount}`);
    }

    const deleted: string[] = [];
    let sets = await this.list();
    while (sets.length >= maxCount) {
      const oldest = sets[0];
      await this.guard(`delete backup ${oldest}`, () =>
        rm(join(this.root, oldest), { recursive: true, force: true })
      );
      deleted.push(oldest);
      sets = await this.list();
      // rm() reported success, so the set must be gone
      if (sets[0] === oldest) {
        throw new StorageError(`Backup ${oldest} could not be removed`, { root: this.root });
      }
    }
    return deleted;
  }

  /**
   * Create the directory for a new backup set. Fails if a set with the
   * same name exists, so two runs never share a set.
   */
  async createNewSet(now: Date = new Date()): Promise<BackupSet> {
    const name = formatBackupName(now);
    const path = join(this.root, name);
    await this.guard(`create backup ${name}`, () => mkdir(path));
    return { name, path };
  }

  /** Create (if needed) and return a device's folder in a backup set. */
  async deviceDir(set: BackupSet, deviceName: string): Promise<string> {
    const dir = join(set.path, deviceName);
    await this.guard(`create backup folder for ${deviceName}`, () =>
      mkdir(dir, { recursive: true })
    );
    return dir;
  }

  private async guard<T>(action: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (err) {
      throw new StorageError(`Failed to ${action}: ${toError(err).message}`, {
        root: this.root,
      });
    }
  }
}
