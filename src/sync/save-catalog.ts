/**
 * SaveCatalog — pick one winning copy per save across devices.
 *
 * Works purely from the backup set on disk: a device is a candidate for a
 * filename when its backup folder holds that file, and its copy is dated
 * by the local mtime, which the download step set to the remote modify
 * time. The newest copy wins; on equal times the device listed first in
 * the configuration wins.
 */

import { copyFile, mkdir, stat, utimes } from 'fs/promises';
import type { Stats } from 'fs';
import { join } from 'path';
import { StorageError, toError } from '../errors/index.js';
import { LATEST_SAVES_DIR } from '../device/device.js';
import type { Device } from '../device/types.js';
import type { BackupSet, ReconciledSave, SaveCandidate } from './types.js';

/**
 * Order candidates newest first. Array.prototype.sort is stable, so equal
 * times keep their input (configuration) order.
 */
export function rankCandidates(candidates: readonly SaveCandidate[]): SaveCandidate[] {
  return [...candidates].sort((a, b) => b.modifiedMs - a.modifiedMs);
}

export class SaveCatalog {
  private readonly backupSet: BackupSet;
  private readonly devices: readonly Device[];
  private readonly saveFolder: string;

  constructor(backupSet: BackupSet, devices: readonly Device[], saveFolder: string) {
    this.backupSet = backupSet;
    this.devices = devices;
    this.saveFolder = saveFolder;
  }

  get latestDir(): string {
    return join(this.backupSet.path, LATEST_SAVES_DIR);
  }

  /**
   * Every device copy of `filename` present in the backup set, in
   * configuration order.
   */
  async candidatesFor(filename: string): Promise<SaveCandidate[]> {
    const candidates: SaveCandidate[] = [];
    for (const device of this.devices) {
      const s = await statOrNull(join(this.backupSet.path, device.name, filename));
      if (s?.isFile()) {
        candidates.push({ device: device.name, modifiedMs: s.mtimeMs });
      }
    }
    return candidates;
  }

  /**
   * Decide a winner for each filename. Filenames are deduplicated and
   * visited in sorted order; a filename no device provided is skipped.
   */
  async rank(filenames: Iterable<string>): Promise<ReconciledSave[]> {
    const decisions: ReconciledSave[] = [];
    for (const filename of [...new Set(filenames)].sort()) {
      const candidates = rankCandidates(await this.candidatesFor(filename));
      if (candidates.length === 0) continue;
      decisions.push({ filename, winner: candidates[0], candidates });
    }
    return decisions;
  }

  /**
   * Copy each winner into the canonical save folder (overwriting) and the
   * backup set's Latest Saves folder, keeping its timestamps.
   */
  async publish(decisions: readonly ReconciledSave[]): Promise<void> {
    await this.guard(`create ${this.saveFolder}`, () => mkdir(this.saveFolder, { recursive: true }));
    await this.guard(`create ${this.latestDir}`, () => mkdir(this.latestDir, { recursive: true }));

    for (const { filename, winner } of decisions) {
      const source = join(this.backupSet.path, winner.device, filename);
      await this.guard(`publish ${filename} from ${winner.device}`, async () => {
        const s = await stat(source);
        for (const dest of [join(this.saveFolder, filename), join(this.latestDir, filename)]) {
          await copyFile(source, dest);
          await utimes(dest, s.atime, s.mtime);
        }
      });
    }
  }

  /** rank() then publish(). */
  async reconcile(filenames: Iterable<string>): Promise<ReconciledSave[]> {
    const decisions = await this.rank(filenames);
    await this.publish(decisions);
    return decisions;
  }

  private async guard<T>(action: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (err) {
      throw new StorageError(`Failed to ${action}: ${toError(err).message}`, {
        backupSet: this.backupSet.name,
      });
    }
  }
}

async function statOrNull(path: string): Promise<Stats | null> {
  try {
    return await stat(path);
  } catch (err) {
    if (isMissing(err)) return null;
    throw new StorageError(`Failed to read ${path}: ${toError(err).message}`);
  }
}

function isMissing(err: unknown): boolean {
  return (
    typeof err === 'object' &&
    err !== null &&
    'code' in err &&
    (err.code === 'ENOENT' || err.code === 'ENOTDIR')
  );
}
