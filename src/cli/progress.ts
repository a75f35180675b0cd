/**
 * savesync ConsoleReporter
 *
 * Prints a sync run's progress to the console: banner lines per device,
 * a spinner while a device connects, red errors, and a summary at the end.
 */

import ora from 'ora';
import { ErrorHandler } from '../errors/index.js';
import type { Device, RemoteFile } from '../device/types.js';
import type {
  BackupSet,
  DeviceFailure,
  ReconciledSave,
  SyncPhase,
  SyncReporter,
  SyncRunResult,
} from '../sync/types.js';
import { OutputFormatter, formatTimestamp, red } from './formatter.js';

export interface Spinner {
  succeed(text?: string): void;
  fail(text?: string): void;
}

export type SpinnerFactory = (text: string) => Spinner;

export const oraSpinner: SpinnerFactory = (text) => ora(text).start();

function banner(text: string): string {
  return `~~~~~~~~ ${text} ~~~~~~~~`;
}

const PHASE_BANNERS: Partial<Record<SyncPhase, string>> = {
  downloading: banner('Downloading saves'),
  reconciling: `\n${banner('Picking the newest saves')}`,
  uploading: `\n\n${banner('Uploading saves back to devices')}`,
};

export interface ConsoleReporterOptions {
  spinner?: SpinnerFactory;
  formatter?: OutputFormatter;
}

export class ConsoleReporter implements SyncReporter {
  private readonly spinner: SpinnerFactory;
  private readonly formatter: OutputFormatter;
  private connecting?: Spinner;

  constructor(options: ConsoleReporterOptions = {}) {
    this.spinner = options.spinner ?? oraSpinner;
    this.formatter = options.formatter ?? new OutputFormatter();
  }

  phase(phase: SyncPhase): void {
    const text = PHASE_BANNERS[phase];
    if (text !== undefined) console.log(text);
  }

  backupsPruned(names: string[]): void {
    for (const name of names) {
      console.log(`Removed old backup ${name}`);
    }
  }

  backupCreated(set: BackupSet): void {
    console.log(`Backing up to ${set.path}\n`);
  }

  deviceConnecting(device: Device): void {
    console.log(`\n${banner(`Connecting to ${device.name}`)}`);
    this.connecting = this.spinner(`${device.hostname}:${device.port}`);
  }

  deviceConnected(device: Device): void {
    const text = banner(`Connected to ${device.name}`);
    if (this.connecting) {
      this.connecting.succeed(text);
      this.connecting = undefined;
    } else {
      console.log(text);
    }
  }

  fileDownloaded(_device: Device, file: RemoteFile): void {
    console.log(`Downloaded ${file.name} ~ ${formatTimestamp(file.modifiedAt)} (${file.size} bytes)`);
  }

  saveReconciled(save: ReconciledSave): void {
    const candidates = save.candidates
      .map((c) => `${c.device} ~ ${formatTimestamp(new Date(c.modifiedMs))}`)
      .join(', ');
    console.log(`${save.filename}  ${candidates}`);
  }

  uploadStarted(device: Device): void {
    console.log(`\n${banner(`Uploading to ${device.name}`)}`);
  }

  fileUploaded(_device: Device, filename: string): void {
    console.log(`Uploaded ${filename}`);
  }

  deviceFailed(device: Device, failure: DeviceFailure): void {
    const text = banner(failureTitle(device, failure));
    if (this.connecting) {
      this.connecting.fail(red(text));
      this.connecting = undefined;
    } else {
      console.error(red(text));
    }
    console.error(red(ErrorHandler.toUserMessage(failure.error)));
  }

  finished(result: SyncRunResult): void {
    console.log(this.formatter.formatRunSummary(result));
  }
}

function failureTitle(device: Device, failure: DeviceFailure): string {
  switch (failure.stage) {
    case 'download':
      return `Failed to download from ${device.name}`;
    case 'upload':
      return `Failed to upload to ${device.name}`;
    default:
      return `Failed to connect to ${device.name}`;
  }
}
