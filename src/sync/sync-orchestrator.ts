/**
 * SyncOrchestrator — one end-to-end save sync run.
 *
 *   init → pruned → backup-created → downloading → reconciling
 *        → publishing → uploading → done
 *
 * Devices are handled one at a time. A device that fails to connect, log
 * in, change directory or download is reported and skipped; it gets no
 * uploads. Only StorageError and ConfigurationError end a run early.
 */

import { mkdir, readdir, rm } from 'fs/promises';
import { join } from 'path';
import { BackupStore } from '../backup/backup-store.js';
import { openFtpSession } from '../device/ftp-session.js';
import type { Device, SessionOpener, TransferSession } from '../device/types.js';
import {
  AuthenticationError,
  ConnectionError,
  RemotePathError,
  SaveSyncError,
  StorageError,
  TransferError,
  ErrorHandler,
  toError,
} from '../errors/index.js';
import { SaveCatalog } from './save-catalog.js';
import { silentReporter } from './silent-reporter.js';
import type {
  BackupSet,
  DeviceFailure,
  DeviceOutcome,
  DeviceReport,
  RunContext,
  SyncPhase,
  SyncReporter,
  SyncRunResult,
} from './types.js';

export interface SyncOrchestratorOptions {
  /** How sessions are opened. Default: FTP via openFtpSession. */
  openSession?: SessionOpener;
  /** Default: silentReporter */
  reporter?: SyncReporter;
  /** Clock used to name the backup set. */
  now?: () => Date;
}

export class SyncOrchestrator {
  private readonly context: RunContext;
  private readonly openSession: SessionOpener;
  private readonly reporter: SyncReporter;
  private readonly now: () => Date;
  private readonly store: BackupStore;

  constructor(context: RunContext, options: SyncOrchestratorOptions = {}) {
    this.context = context;
    this.openSession = options.openSession ?? openFtpSession;
    this.reporter = options.reporter ?? silentReporter;
    this.now = options.now ?? (() => new Date());
    this.store = new BackupStore(context.backupRoot);
  }

  // ---------------------------------------------------------------------------
  // Public API
  // ---------------------------------------------------------------------------

  async run(): Promise<SyncRunResult> {
    this.enter('init');
    await this.ensureSaveFolder();
    await this.store.ensureLayout();

    const pruned = await this.store.prune(this.context.maxBackups);
    this.reporter.backupsPruned(pruned);
    this.enter('pruned');

    const backupSet = await this.store.createNewSet(this.now());
    this.reporter.backupCreated(backupSet);
    this.enter('backup-created');

    const outcomes: DeviceOutcome[] = [];
    const uploads = new Map<string, { uploaded: string[]; failure?: DeviceFailure }>();

    try {
      this.enter('downloading');
      for (const device of this.context.devices) {
        outcomes.push(await this.downloadFrom(device, backupSet));
      }

      this.enter('reconciling');
      const catalog = new SaveCatalog(backupSet, this.context.devices, this.context.saveFolder);
      const reconciled = await catalog.rank(outcomes.flatMap((o) => o.files));
      for (const save of reconciled) {
        this.reporter.saveReconciled(save);
      }

      this.enter('publishing');
      await catalog.publish(reconciled);

      this.enter('uploading');
      const canonical = await this.listSaveFolder();
      for (const outcome of outcomes) {
        if (outcome.status !== 'downloaded') continue;
        uploads.set(outcome.device.name, await this.uploadTo(outcome.session, canonical));
      }

      this.enter('done');
      const result: SyncRunResult = {
        backupSet,
        pruned,
        reconciled,
        devices: outcomes.map((o) => toReport(o, uploads.get(o.device.name))),
      };
      this.reporter.finished(result);
      return result;
    } finally {
      for (const outcome of outcomes) {
        if (outcome.status === 'downloaded') outcome.session.close();
      }
    }
  }

  // ---------------------------------------------------------------------------
  // Phases
  // ---------------------------------------------------------------------------

  /**
   * Open a session and pull every save into the device's backup folder.
   * Per-device failures become a `failed` outcome; storage failures throw.
   */
  private async downloadFrom(device: Device, backupSet: BackupSet): Promise<DeviceOutcome> {
    this.reporter.deviceConnecting(device);

    let session: TransferSession;
    try {
      session = await this.openSession(device, this.context.connectTimeoutMs);
    } catch (err) {
      const error = toSessionError(err, device);
      if (ErrorHandler.isFatal(error)) throw error;
      const stage = openStage(error);
      this.reporter.deviceFailed(device, { stage, error });
      return { status: 'failed', device, stage, error, files: [] };
    }
    this.reporter.deviceConnected(device);

    const files: string[] = [];
    try {
      const dir = await this.store.deviceDir(backupSet, device.name);
      for (const file of await session.list()) {
        const destination = join(dir, file.name);
        try {
          await session.download(file, destination);
        } catch (err) {
          await this.discardPartial(destination);
          throw err;
        }
        files.push(file.name);
        this.reporter.fileDownloaded(device, file);
      }
    } catch (err) {
      session.close();
      const error =
        err instanceof SaveSyncError
          ? err
          : new TransferError(toError(err).message, { device: device.name });
      if (ErrorHandler.isFatal(error)) throw error;
      this.reporter.deviceFailed(device, { stage: 'download', error });
      return { status: 'failed', device, stage: 'download', error, files };
    }

    return { status: 'downloaded', device, session, files };
  }

  /**
   * Push every canonical save through a retained session. Stops at the
   * first failed upload for that device.
   */
  private async uploadTo(
    session: TransferSession,
    filenames: string[]
  ): Promise<{ uploaded: string[]; failure?: DeviceFailure }> {
    const { device } = session;
    const uploaded: string[] = [];
    this.reporter.uploadStarted(device);
    try {
      for (const filename of filenames) {
        await session.upload(join(this.context.saveFolder, filename), filename);
        uploaded.push(filename);
        this.reporter.fileUploaded(device, filename);
      }
      return { uploaded };
    } catch (err) {
      const error =
        err instanceof SaveSyncError
          ? err
          : new TransferError(toError(err).message, { device: device.name });
      const failure: DeviceFailure = { stage: 'upload', error };
      this.reporter.deviceFailed(device, failure);
      return { uploaded, failure };
    } finally {
      session.close();
    }
  }

  // ---------------------------------------------------------------------------
  // Private helpers
  // ---------------------------------------------------------------------------

  private enter(phase: SyncPhase): void {
    this.reporter.phase(phase);
  }

  private async ensureSaveFolder(): Promise<void> {
    try {
      await mkdir(this.context.saveFolder, { recursive: true });
    } catch (err) {
      throw new StorageError(
        `Failed to create save folder ${this.context.saveFolder}: ${toError(err).message}`
      );
    }
  }

  /** Plain files in the canonical folder, sorted by name. */
  private async listSaveFolder(): Promise<string[]> {
    try {
      const entries = await readdir(this.context.saveFolder, { withFileTypes: true });
      return entries
        .filter((e) => e.isFile())
        .map((e) => e.name)
        .sort();
    } catch (err) {
      throw new StorageError(
        `Failed to read save folder ${this.context.saveFolder}: ${toError(err).message}`
      );
    }
  }

  private async discardPartial(path: string): Promise<void> {
    try {
      await rm(path, { force: true });
    } catch (err) {
      throw new StorageError(`Failed to remove partial download ${path}: ${toError(err).message}`);
    }
  }
}

// ---------------------------------------------------------------------------
// Outcome helpers
// ---------------------------------------------------------------------------

/** Anything an opener throws that isn't typed counts as a connection failure. */
function toSessionError(err: unknown, device: Device): SaveSyncError {
  if (err instanceof SaveSyncError) return err;
  return new ConnectionError(toError(err).message, 'unknown', { device: device.name });
}

function openStage(error: SaveSyncError): Exclude<DeviceFailure['stage'], 'download' | 'upload'> {
  if (error instanceof AuthenticationError) return 'authenticate';
  if (error instanceof RemotePathError) return 'change-directory';
  return 'connect';
}

function toReport(
  outcome: DeviceOutcome,
  upload: { uploaded: string[]; failure?: DeviceFailure } | undefined
): DeviceReport {
  const report: DeviceReport = {
    device: outcome.device.name,
    downloaded: outcome.files,
    uploaded: upload?.uploaded ?? [],
  };
  if (outcome.status === 'failed') {
    report.failure = { stage: outcome.stage, error: outcome.error };
  } else if (upload?.failure) {
    report.failure = upload.failure;
  }
  return report;
}
