/**
 * FTP session for a single device
 *
 * Wraps one basic-ftp Client: connect, log in, change into the save
 * directory, list with modify times, download, upload, close. Each step
 * fails with its own error type so the orchestrator can skip just the
 * failing device.
 *
 * Listings always use MLSD and go through parseMlsdListing, since LIST
 * output carries no reliable timestamps.
 */

import { Client, FTPError, FileType } from 'basic-ftp';
import type { FileInfo } from 'basic-ftp';
import { mkdir, utimes } from 'fs/promises';
import { dirname } from 'path';
import {
  AuthenticationError,
  ConnectionError,
  RemotePathError,
  StorageError,
  TransferError,
  toError,
} from '../errors/index.js';
import type { ConnectFailureReason } from '../errors/index.js';
import { isListingArtifact, isPlainFileName, parseMlsdListing } from './mlsd.js';
import type { Device, RemoteFile, TransferSession } from './types.js';

export type { Device, RemoteFile, TransferSession, SessionOpener } from './types.js';

export class FtpSession implements TransferSession {
  readonly device: Device;
  private readonly client: Client;

  /**
   * Wrap an already-constructed client. Most callers want
   * openFtpSession(), which also connects and logs in.
   */
  constructor(device: Device, client: Client) {
    this.device = device;
    this.client = client;
  }

  // ---------------------------------------------------------------------------
  // Connection management
  // ---------------------------------------------------------------------------

  /**
   * Open the control connection. The client's timeout bounds the attempt.
   */
  async connect(): Promise<void> {
    try {
      await this.client.connect(this.device.hostname, this.device.port);
    } catch (err) {
      const reason = classifyConnectFailure(err);
      throw new ConnectionError(
        `Failed to connect to ${this.device.name} at ${this.device.hostname}:${this.device.port}: ${toError(err).message}`,
        reason,
        { device: this.device.name }
      );
    }
  }

  /**
   * Log in with the device's credentials, or anonymously when it has none,
   * then switch to binary mode and force MLSD listings.
   */
  async authenticate(): Promise<void> {
    try {
      if (this.device.username) {
        await this.client.login(this.device.username, this.device.password ?? '');
      } else {
        await this.client.login();
      }
    } catch (err) {
      if (err instanceof FTPError) {
        throw new AuthenticationError(`Login to ${this.device.name} rejected: ${err.message}`, {
          device: this.device.name,
          ftpCode: err.code,
        });
      }
      throw new ConnectionError(
        `Lost connection to ${this.device.name} during login: ${toError(err).message}`,
        classifyConnectFailure(err),
        { device: this.device.name }
      );
    }

    try {
      await this.client.useDefaultSettings();
    } catch (err) {
      throw new ConnectionError(
        `${this.device.name} rejected session setup: ${toError(err).message}`,
        classifyConnectFailure(err),
        { device: this.device.name }
      );
    }
    this.client.availableListCommands = ['MLSD'];
    this.client.parseList = parseMlsdListing;
  }

  /**
   * Change into a remote directory (the device's save path by default).
   */
  async changeDirectory(path: string = this.device.remotePath): Promise<void> {
    try {
      await this.client.cd(path);
    } catch (err) {
      if (err instanceof FTPError) {
        throw new RemotePathError(`Could not move to ${path} on ${this.device.name}`, {
          device: this.device.name,
          path,
          ftpCode: err.code,
        });
      }
      throw new ConnectionError(
        `Lost connection to ${this.device.name}: ${toError(err).message}`,
        classifyConnectFailure(err),
        { device: this.device.name }
      );
    }
  }

  /**
   * Release the connection. Safe to call more than once.
   */
  close(): void {
    if (this.isConnected()) {
      this.client.close();
    }
  }

  isConnected(): boolean {
    return !this.client.closed;
  }

  // ---------------------------------------------------------------------------
  // File operations
  // ---------------------------------------------------------------------------

  /**
   * List the files in the current directory, in server order.
   * Directories, listing artifacts, names that are not a single path
   * segment and entries without a usable modify time are left out.
   */
  async list(): Promise<RemoteFile[]> {
    let entries: FileInfo[];
    try {
      entries = await this.client.list();
    } catch (err) {
      throw new TransferError(`Listing ${this.device.remotePath} on ${this.device.name} failed: ${toError(err).message}`, {
        device: this.device.name,
      });
    }

    const files: RemoteFile[] = [];
    for (const entry of entries) {
      if (entry.type === FileType.Directory || entry.type === FileType.SymbolicLink) continue;
      if (isListingArtifact(entry.name, this.device.remotePath)) continue;
      if (!isPlainFileName(entry.name)) continue;
      if (!entry.modifiedAt) continue;
      files.push({
        name: entry.name,
        modifiedAt: entry.modifiedAt,
        size: entry.size,
      });
    }
    return files;
  }

  /**
   * Download a file in binary mode, then set the local file's atime and
   * mtime to the remote modify time. Creates parent directories as needed.
   *
   * Failures on the local side (creating the folder, writing the file,
   * stamping it) throw StorageError; everything else is a TransferError.
   */
  async download(file: RemoteFile, destinationPath: string): Promise<void> {
    const dir = dirname(destinationPath);
    try {
      await mkdir(dir, { recursive: true });
    } catch (err) {
      throw new StorageError(`Failed to create ${dir}: ${toError(err).message}`, {
        device: this.device.name,
        path: dir,
      });
    }

    try {
      await this.client.downloadTo(destinationPath, file.name);
    } catch (err) {
      if (isLocalWriteFailure(err)) {
        throw new StorageError(`Failed to write ${destinationPath}: ${toError(err).message}`, {
          device: this.device.name,
          file: file.name,
        });
      }
      throw new TransferError(`Downloading ${file.name} from ${this.device.name} failed: ${toError(err).message}`, {
        device: this.device.name,
        file: file.name,
      });
    }

    try {
      await utimes(destinationPath, file.modifiedAt, file.modifiedAt);
    } catch (err) {
      throw new StorageError(`Failed to set the modify time of ${destinationPath}: ${toError(err).message}`, {
        device: this.device.name,
        file: file.name,
      });
    }
  }

  /**
   * Upload a local file in binary mode under `remoteName`.
   */
  async upload(localPath: string, remoteName: string): Promise<void> {
    try {
      await this.client.uploadFrom(localPath, remoteName);
    } catch (err) {
      throw new TransferError(`Uploading ${remoteName} to ${this.device.name} failed: ${toError(err).message}`, {
        device: this.device.name,
        file: remoteName,
      });
    }
  }
}

/**
 * Connect, authenticate and change into the device's save directory.
 * The client is closed again if any step fails.
 */
export async function openFtpSession(device: Device, timeoutMs: number): Promise<FtpSession> {
  const session = new FtpSession(device, new Client(timeoutMs));
  try {
    await session.connect();
    await session.authenticate();
    await session.changeDirectory();
    return session;
  } catch (err) {
    session.close();
    throw err;
  }
}

// ---------------------------------------------------------------------------
// Private helpers
// ---------------------------------------------------------------------------

function errorCode(err: unknown): string | undefined {
  if (typeof err === 'object' && err !== null && 'code' in err && typeof err.code === 'string') {
    return err.code;
  }
  return undefined;
}

// Errno codes raised by the local write stream during downloadTo().
const LOCAL_WRITE_CODES = new Set(['ENOSPC', 'EACCES', 'EPERM', 'EROFS', 'EISDIR', 'ENOTDIR', 'EEXIST', 'EDQUOT']);

function isLocalWriteFailure(err: unknown): boolean {
  const code = errorCode(err);
  return code !== undefined && LOCAL_WRITE_CODES.has(code);
}

/** Map a socket error to the reason shown to the user. */
export function classifyConnectFailure(err: unknown): ConnectFailureReason {
  const code = errorCode(err);
  switch (code) {
    case 'ECONNREFUSED':
      return 'refused';
    case 'ETIMEDOUT':
      return 'timeout';
    case 'EHOSTUNREACH':
    case 'ENETUNREACH':
    case 'ENOTFOUND':
    case 'EAI_AGAIN':
      return 'unreachable';
  }
  // basic-ftp reports its own timeouts as "Timeout (control socket)"
  if (err instanceof Error && /^Timeout\b/.test(err.message)) {
    return 'timeout';
  }
  return 'unknown';
}
