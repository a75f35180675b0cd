/**
 * Types shared by the backup store, save catalog and sync orchestrator.
 */

import type { Device, RemoteFile, TransferSession } from '../device/types.js';
import type { SaveSyncError } from '../errors/index.js';

/** Everything a sync run needs, built once from configuration. */
export interface RunContext {
  /** In configuration order; earlier devices win timestamp ties. */
  readonly devices: readonly Device[];
  /** Canonical folder: newest copy of every save */
  readonly saveFolder: string;
  /** Root holding one directory per backup set */
  readonly backupRoot: string;
  /** Backup sets kept, counting the one the run creates */
  readonly maxBackups: number;
  readonly connectTimeoutMs: number;
}

/** One run's snapshot directory under the backup root. */
export interface BackupSet {
  /** Directory name, a sortable timestamp */
  readonly name: string;
  /** Absolute path */
  readonly path: string;
}

/** A device's copy of one save, as found in the backup set. */
export interface SaveCandidate {
  readonly device: string;
  /** Local mtime of the downloaded copy, ms since epoch */
  readonly modifiedMs: number;
}

/** The decision for one filename. */
export interface ReconciledSave {
  readonly filename: string;
  readonly winner: SaveCandidate;
  /** Newest first; ties in configuration order */
  readonly candidates: readonly SaveCandidate[];
}

export type SyncPhase =
  | 'init'
  | 'pruned'
  | 'backup-created'
  | 'downloading'
  | 'reconciling'
  | 'publishing'
  | 'uploading'
  | 'done';

export type FailureStage = 'connect' | 'authenticate' | 'change-directory' | 'download' | 'upload';

/**
 * Result of the download phase for one device. Only a `downloaded`
 * outcome retains its session for the upload phase.
 */
export type DeviceOutcome =
  | {
      status: 'downloaded';
      device: Device;
      session: TransferSession;
      files: string[];
    }
  | {
      status: 'failed';
      device: Device;
      stage: Exclude<FailureStage, 'upload'>;
      error: SaveSyncError;
      /** Files that completed before the failure */
      files: string[];
    };

export interface DeviceFailure {
  stage: FailureStage;
  error: SaveSyncError;
}

/** Per-device summary of a finished run. */
export interface DeviceReport {
  device: string;
  downloaded: string[];
  uploaded: string[];
  failure?: DeviceFailure;
}

export interface SyncRunResult {
  backupSet: BackupSet;
  /** Backup sets deleted by retention, oldest first */
  pruned: string[];
  reconciled: ReconciledSave[];
  devices: DeviceReport[];
}

/** Receives progress from a sync run. */
export interface SyncReporter {
  phase(phase: SyncPhase): void;
  backupsPruned(names: string[]): void;
  backupCreated(set: BackupSet): void;
  deviceConnecting(device: Device): void;
  deviceConnected(device: Device): void;
  fileDownloaded(device: Device, file: RemoteFile): void;
  saveReconciled(save: ReconciledSave): void;
  uploadStarted(device: Device): void;
  fileUploaded(device: Device, filename: string): void;
  deviceFailed(device: Device, failure: DeviceFailure): void;
  finished(result: SyncRunResult): void;
}
