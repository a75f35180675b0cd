/**
 * savesync errors
 *
 * Barrel export for typed error hierarchy and error handler.
 */

export {
  SaveSyncError,
  ConnectionError,
  AuthenticationError,
  RemotePathError,
  TransferError,
  StorageError,
  ConfigurationError,
  toError,
} from './savesync-error.js';
export type { ConnectFailureReason } from './savesync-error.js';

export { ErrorHandler } from './error-handler.js';
export type { WrapResult } from './error-handler.js';
