/**
 * savesync configuration
 *
 * Manages the config file at ~/.savesync/config.json.
 * Supports environment variable overrides.
 * Validates the device list and folder settings before a run.
 */

import fs from 'fs';
import path from 'path';
import os from 'os';
import { ConfigurationError, toError } from '../errors/index.js';
import { createDevice, validateDeviceList } from '../device/device.js';
import type { RunContext } from '../sync/types.js';

export interface DeviceConfig {
  name: string;
  hostname: string;
  port: number;
  /** Save directory on the device, e.g. "RetroArch/savefiles/" */
  remotePath: string;
  /** Omit for anonymous login */
  username?: string;
  /** Stored as plaintext. */
  password?: string;
}

export interface SaveSyncConfig {
  /** Devices in sync order. Earlier devices win timestamp ties. */
  devices: DeviceConfig[];
  /** Canonical folder holding the newest copy of every save. Default: ~/savesync/Saves */
  saveFolder: string;
  /** Root of the timestamped backup sets. Default: ~/savesync/Backups */
  backupFolder: string;
  /** Backup sets kept, including the one a run creates. Default: 10 */
  maxBackups: number;
  /** Default: 10 */
  connectTimeoutSeconds: number;
}

export class ConfigManager {
  private readonly configPath: string;

  constructor(configPath?: string) {
    this.configPath = configPath ?? ConfigManager.defaultPath();
  }

  static defaultPath(): string {
    return path.join(os.homedir(), '.savesync', 'config.json');
  }

  get path(): string {
    return this.configPath;
  }

  exists(): boolean {
    return fs.existsSync(this.configPath);
  }

  /**
   * Load config from disk. Returns defaults if file doesn't exist.
   */
  load(): SaveSyncConfig {
    if (!fs.existsSync(this.configPath)) {
      return ConfigManager.defaults();
    }
    let parsed: Partial<SaveSyncConfig>;
    try {
      parsed = JSON.parse(fs.readFileSync(this.configPath, 'utf-8'));
    } catch (err) {
      throw new ConfigurationError(
        `Failed to read config at ${this.configPath}: ${toError(err).message}`
      );
    }
    if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
      throw new ConfigurationError(`Config at ${this.configPath} must be a JSON object`);
    }
    return this.merge(ConfigManager.defaults(), parsed);
  }

  /**
   * Save config to disk, creating parent directories as needed.
   */
  save(config: SaveSyncConfig): void {
    const dir = path.dirname(this.configPath);
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
    }
    fs.writeFileSync(this.configPath, JSON.stringify(config, null, 2) + '\n', 'utf-8');
  }

  /**
   * Validate a config object. Returns errors array — empty means valid.
   */
  validate(config: Partial<SaveSyncConfig>): { valid: boolean; errors: string[] } {
    const errors: string[] = [];

    if (!Array.isArray(config.devices) || config.devices.length === 0) {
      errors.push('devices must list at least one device');
    } else {
      errors.push(...validateDeviceList(config.devices));
    }

    if (typeof config.saveFolder !== 'string' || config.saveFolder.trim() === '') {
      errors.push('saveFolder is required');
    }
    if (typeof config.backupFolder !== 'string' || config.backupFolder.trim() === '') {
      errors.push('backupFolder is required');
    }
    if (
      typeof config.saveFolder === 'string' &&
      typeof config.backupFolder === 'string' &&
      config.saveFolder.trim() !== '' &&
      path.resolve(expandHome(config.saveFolder)) === path.resolve(expandHome(config.backupFolder))
    ) {
      errors.push('saveFolder and backupFolder must be different folders');
    }

    if (
      typeof config.maxBackups !== 'number' ||
      !Number.isInteger(config.maxBackups) ||
      config.maxBackups < 1
    ) {
      errors.push('maxBackups must be an integer of at least 1');
    }

    if (
      typeof config.connectTimeoutSeconds !== 'number' ||
      !Number.isFinite(config.connectTimeoutSeconds) ||
      config.connectTimeoutSeconds <= 0
    ) {
      errors.push('connectTimeoutSeconds must be a positive number');
    }

    return { valid: errors.length === 0, errors };
  }

  /**
   * Load config, then apply environment variable overrides.
   *
   * Supported env vars:
   *   SAVESYNC_SAVE_DIR, SAVESYNC_BACKUP_DIR, SAVESYNC_MAX_BACKUPS, SAVESYNC_TIMEOUT
   */
  loadWithEnvOverrides(): SaveSyncConfig {
    const config = this.load();

    if (process.env.SAVESYNC_SAVE_DIR) config.saveFolder = process.env.SAVESYNC_SAVE_DIR;
    if (process.env.SAVESYNC_BACKUP_DIR) config.backupFolder = process.env.SAVESYNC_BACKUP_DIR;
    if (process.env.SAVESYNC_MAX_BACKUPS) {
      config.maxBackups = parseInt(process.env.SAVESYNC_MAX_BACKUPS, 10);
    }
    if (process.env.SAVESYNC_TIMEOUT) {
      config.connectTimeoutSeconds = parseFloat(process.env.SAVESYNC_TIMEOUT);
    }

    return config;
  }

  /**
   * Validate and freeze a config into the value a sync run works from.
   * Throws ConfigurationError listing every problem.
   */
  toRunContext(config: SaveSyncConfig): RunContext {
    const { valid, errors } = this.validate(config);
    if (!valid) {
      throw new ConfigurationError('Invalid configuration', errors);
    }
    return Object.freeze({
      devices: Object.freeze(config.devices.map((d, i) => createDevice(d, `devices[${i}]`))),
      saveFolder: path.resolve(expandHome(config.saveFolder)),
      backupRoot: path.resolve(expandHome(config.backupFolder)),
      maxBackups: config.maxBackups,
      connectTimeoutMs: Math.round(config.connectTimeoutSeconds * 1000),
    });
  }

  /**
   * Return a default configuration with safe fallback values.
   * The device list is empty and must be filled in before syncing.
   */
  static defaults(): SaveSyncConfig {
    const home = os.homedir();
    return {
      devices: [],
      saveFolder: path.join(home, 'savesync', 'Saves'),
      backupFolder: path.join(home, 'savesync', 'Backups'),
      maxBackups: 10,
      connectTimeoutSeconds: 10,
    };
  }

  /** A starter config showing one password-protected and one anonymous device. */
  static example(): SaveSyncConfig {
    return {
      ...ConfigManager.defaults(),
      devices: [
        {
          name: 'Switch',
          hostname: '192.168.0.54',
          port: 5000,
          remotePath: 'retroarch/cores/savefiles/',
          username: 'user',
          password: 'password',
        },
        {
          name: 'Phone',
          hostname: '192.168.0.53',
          port: 12345,
          remotePath: 'RetroArch/savefiles/',
        },
      ],
    };
  }

  /** Shallow-merge source onto target, keeping only known keys. */
  private merge(target: SaveSyncConfig, source: Partial<SaveSyncConfig>): SaveSyncConfig {
    const result = { ...target };
    if (source.devices !== undefined) result.devices = source.devices;
    if (source.saveFolder !== undefined) result.saveFolder = source.saveFolder;
    if (source.backupFolder !== undefined) result.backupFolder = source.backupFolder;
    if (source.maxBackups !== undefined) result.maxBackups = source.maxBackups;
    if (source.connectTimeoutSeconds !== undefined) {
      result.connectTimeoutSeconds = source.connectTimeoutSeconds;
    }
    return result;
  }
}

/** Expand a leading `~` to the user's home directory. */
export function expandHome(p: string): string {
  if (p === '~') return os.homedir();
  if (p.startsWith('~/') || p.startsWith('~\\')) return path.join(os.homedir(), p.slice(2));
  return p;
}
