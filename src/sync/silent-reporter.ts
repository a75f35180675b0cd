import type { SyncReporter } from './types.js';

const noop = (): void => undefined;

/** Reporter that discards everything. Default for library use and tests. */
export const silentReporter: SyncReporter = {
  phase: noop,
  backupsPruned: noop,
  backupCreated: noop,
  deviceConnecting: noop,
  deviceConnected: noop,
  fileDownloaded: noop,
  saveReconciled: noop,
  uploadStarted: noop,
  fileUploaded: noop,
  deviceFailed: noop,
  finished: noop,
};
