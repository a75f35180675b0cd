/**
 * Device records: validation and immutable construction.
 */

import { ConfigurationError } from '../errors/index.js';
import type { Device } from './types.js';

/** Name of the backup-set folder holding each run's reconciled winners. */
export const LATEST_SAVES_DIR = 'Latest Saves';

/** Untrusted device record, as read from a config file. */
export interface DeviceInput {
  name?: unknown;
  hostname?: unknown;
  port?: unknown;
  remotePath?: unknown;
  username?: unknown;
  password?: unknown;
}

/** The record's device fields, or undefined if it is not a JSON object. */
function toDeviceInput(value: unknown): DeviceInput | undefined {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return undefined;
  }
  const record: Record<string, unknown> = { ...value };
  return {
    name: record.name,
    hostname: record.hostname,
    port: record.port,
    remotePath: record.remotePath,
    username: record.username,
    password: record.password,
  };
}

/**
 * Validate a single device record. Returns a list of problems, each
 * prefixed with `label` — empty means valid.
 */
export function validateDevice(value: unknown, label: string): string[] {
  const input = toDeviceInput(value);
  if (!input) {
    return [`${label} must be an object`];
  }
  const errors: string[] = [];

  if (typeof input.name !== 'string' || input.name.trim() === '') {
    errors.push(`${label}.name is required`);
  } else if (/[\\/]/.test(input.name) || input.name === '.' || input.name === '..') {
    errors.push(`${label}.name must be usable as a folder name, got: ${input.name}`);
  } else if (input.name === LATEST_SAVES_DIR) {
    errors.push(`${label}.name must not be "${LATEST_SAVES_DIR}"`);
  }

  if (typeof input.hostname !== 'string' || input.hostname.trim() === '') {
    errors.push(`${label}.hostname is required`);
  }

  if (
    typeof input.port !== 'number' ||
    !Number.isInteger(input.port) ||
    input.port < 1 ||
    input.port > 65535
  ) {
    errors.push(`${label}.port must be an integer between 1 and 65535`);
  }

  if (typeof input.remotePath !== 'string' || input.remotePath.trim() === '') {
    errors.push(`${label}.remotePath is required`);
  }

  if (input.username !== undefined && typeof input.username !== 'string') {
    errors.push(`${label}.username must be a string`);
  }
  if (input.password !== undefined && typeof input.password !== 'string') {
    errors.push(`${label}.password must be a string`);
  }
  if (input.password !== undefined && !input.username) {
    errors.push(`${label}.password is set without a username`);
  }

  return errors;
}

/**
 * Build a frozen Device from an untrusted record.
 * Throws ConfigurationError listing every problem.
 */
export function createDevice(value: unknown, label = 'device'): Device {
  const errors = validateDevice(value, label);
  const input = toDeviceInput(value);
  if (
    errors.length > 0 ||
    !input ||
    typeof input.name !== 'string' ||
    typeof input.hostname !== 'string' ||
    typeof input.port !== 'number' ||
    typeof input.remotePath !== 'string'
  ) {
    throw new ConfigurationError(`Invalid ${label}`, errors);
  }

  const device: Device = {
    name: input.name,
    hostname: input.hostname,
    port: input.port,
    remotePath: input.remotePath,
    ...(typeof input.username === 'string' && input.username !== ''
      ? { username: input.username }
      : {}),
    ...(typeof input.password === 'string' ? { password: input.password } : {}),
  };
  return Object.freeze(device);
}

/** Problems that only show up across the whole device list. */
export function validateDeviceList(devices: readonly unknown[]): string[] {
  const errors: string[] = [];
  const seen = new Set<string>();
  devices.forEach((d, i) => {
    errors.push(...validateDevice(d, `devices[${i}]`));
    const name = toDeviceInput(d)?.name;
    if (typeof name === 'string') {
      if (seen.has(name)) {
        errors.push(`devices[${i}].name "${name}" is used by more than one device`);
      }
      seen.add(name);
    }
  });
  return errors;
}
