/**
 * savesync typed error hierarchy
 *
 * Structured error classes with machine-readable codes and optional context.
 * Per-device failures (connection, auth, remote path, transfer) are caught at
 * the device boundary; storage and configuration failures abort a run.
 */

export class SaveSyncError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly context?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'SaveSyncError';
    // Maintain proper prototype chain for instanceof checks in transpiled JS
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/** Why a connection attempt failed, as far as the socket error tells us. */
export type ConnectFailureReason = 'unreachable' | 'refused' | 'timeout' | 'unknown';

export class ConnectionError extends SaveSyncError {
  constructor(
    message: string,
    public readonly reason: ConnectFailureReason = 'unknown',
    context?: Record<string, unknown>
  ) {
    super(message, 'CONNECTION_ERROR', context);
    this.name = 'ConnectionError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class AuthenticationError extends SaveSyncError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'AUTH_ERROR', context);
    this.name = 'AuthenticationError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class RemotePathError extends SaveSyncError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'REMOTE_PATH_ERROR', context);
    this.name = 'RemotePathError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class TransferError extends SaveSyncError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'TRANSFER_ERROR', context);
    this.name = 'TransferError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class StorageError extends SaveSyncError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'STORAGE_ERROR', context);
    this.name = 'StorageError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class ConfigurationError extends SaveSyncError {
  constructor(
    message: string,
    public readonly problems: string[] = [],
    context?: Record<string, unknown>
  ) {
    super(message, 'CONFIG_ERROR', context);
    this.name = 'ConfigurationError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/** Normalise an unknown thrown value to an Error. */
export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}
