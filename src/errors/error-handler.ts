/**
 * savesync Error Handler
 *
 * Converts thrown values to user-facing hints, decides which failures
 * abort a run, and wraps async functions with structured error handling.
 */

import {
  SaveSyncError,
  ConnectionError,
  AuthenticationError,
  RemotePathError,
  TransferError,
  StorageError,
  ConfigurationError,
} from './savesync-error.js';

export { SaveSyncError } from './savesync-error.js';

export type WrapResult<T> =
  | { data: T; error?: undefined }
  | { data?: undefined; error: SaveSyncError };

export class ErrorHandler {
  /**
   * Convert any thrown value to a friendly user-facing message.
   */
  static toUserMessage(err: unknown): string {
    if (err instanceof ConnectionError) {
      switch (err.reason) {
        case 'refused':
          return 'Connection refused. Check that the FTP server is running and that the port is correct.';
        case 'timeout':
          return 'Connection timed out. Check that the device is awake and on the same network.';
        case 'unreachable':
          return 'Host unreachable. Check that the device is running and that the IP is correct.';
        default:
          return 'Could not connect. Check that the device is running and that the IP and port are correct.';
      }
    }
    if (err instanceof AuthenticationError) {
      return 'Invalid username or password.';
    }
    if (err instanceof RemotePathError) {
      return `${err.message}. Check the path and the type of slash used.`;
    }
    if (err instanceof TransferError) {
      return `Transfer failed: ${err.message}`;
    }
    if (err instanceof ConfigurationError) {
      if (err.problems.length === 0) return err.message;
      return `${err.message}:\n${err.problems.map((p) => `  - ${p}`).join('\n')}`;
    }
    if (err instanceof SaveSyncError) {
      return `${err.message} (${err.code})`;
    }
    if (err instanceof Error) {
      return err.message;
    }
    return 'An unexpected error occurred.';
  }

  /**
   * Returns true if the error must abort the whole run. Per-device
   * failures never do.
   */
  static isFatal(err: unknown): boolean {
    if (err instanceof StorageError) return true;
    if (err instanceof ConfigurationError) return true;
    if (err instanceof SaveSyncError) return false;
    // Anything untyped is a programming error.
    return true;
  }

  /**
   * Wrap an async function with structured error handling.
   * Never throws — failures are returned as { error }.
   */
  static async wrap<T>(
    fn: () => Promise<T>,
    context?: Record<string, unknown>
  ): Promise<WrapResult<T>> {
    try {
      const data = await fn();
      return { data };
    } catch (err) {
      if (err instanceof SaveSyncError) {
        return { error: err };
      }
      return {
        error: new SaveSyncError(
          err instanceof Error ? err.message : String(err),
          'UNKNOWN_ERROR',
          context
        ),
      };
    }
  }
}
