/**
 * Type definitions for the device transport layer.
 */

/** A configured sync endpoint. Immutable for the lifetime of a run. */
export interface Device {
  /** Unique, human-readable name. Also the backup subdirectory name. */
  readonly name: string;
  /** Hostname or IP of the device's FTP server */
  readonly hostname: string;
  readonly port: number;
  /** Save directory on the device, relative to the FTP root or absolute */
  readonly remotePath: string;
  /** Omit for anonymous login */
  readonly username?: string;
  readonly password?: string;
}

/** One file entry observed on a device during listing. */
export interface RemoteFile {
  /** Filename only */
  readonly name: string;
  /** Last-modified instant, whole seconds */
  readonly modifiedAt: Date;
  /** File size in bytes, 0 if the server did not report it */
  readonly size: number;
}

/**
 * An open, authenticated connection to one device, already positioned in
 * the device's save directory.
 */
export interface TransferSession {
  readonly device: Device;
  list(): Promise<RemoteFile[]>;
  /** Download into `destinationPath` and stamp it with the remote mtime. */
  download(file: RemoteFile, destinationPath: string): Promise<void>;
  upload(localPath: string, remoteName: string): Promise<void>;
  /** Idempotent, never throws. */
  close(): void;
}

/**
 * Opens a session: connect, authenticate, change into the remote path.
 * Rejects with ConnectionError, AuthenticationError or RemotePathError.
 */
export type SessionOpener = (device: Device, timeoutMs: number) => Promise<TransferSession>;
