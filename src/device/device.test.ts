import { describe, it, expect } from 'vitest';
import { createDevice, validateDevice, validateDeviceList } from './device.js';
import { ConfigurationError } from '../errors/index.js';

const PHONE = { name: 'Phone', hostname: '192.168.0.53', port: 12345, remotePath: 'RetroArch/savefiles/' };

describe('validateDevice', () => {
  it('accepts an anonymous device', () => {
    expect(validateDevice(PHONE, 'phone')).toEqual([]);
  });

  it('accepts a device with credentials', () => {
    expect(validateDevice({ ...PHONE, username: 'player', password: 'test-secret' }, 'd')).toEqual([]);
  });

  it('reports every missing field', () => {
    expect(validateDevice({}, 'd')).toEqual([
      'd.name is required',
      'd.hostname is required',
      'd.port must be an integer between 1 and 65535',
      'd.remotePath is required',
    ]);
  });

  it.each(['a/b', 'a\\b', '.', '..'])('rejects %s as a name', (name) => {
    expect(validateDevice({ ...PHONE, name }, 'd')).toEqual([
      `d.name must be usable as a folder name, got: ${name}`,
    ]);
  });

  it('rejects the winners folder name', () => {
    expect(validateDevice({ ...PHONE, name: 'Latest Saves' }, 'd')).toEqual([
      'd.name must not be "Latest Saves"',
    ]);
  });

  it.each([0, 65536, 21.5, '21'])('rejects port %s', (port) => {
    expect(validateDevice({ ...PHONE, port }, 'd')).toEqual([
      'd.port must be an integer between 1 and 65535',
    ]);
  });

  it.each([null, 'Phone', 42])('rejects %j as a record', (value) => {
    expect(validateDevice(value, 'devices[0]')).toEqual(['devices[0] must be an object']);
  });

  it('rejects an array as a record', () => {
    expect(validateDevice([PHONE], 'devices[0]')).toEqual(['devices[0] must be an object']);
  });

  it('rejects a password without a username', () => {
    expect(validateDevice({ ...PHONE, password: 'test-secret' }, 'd')).toEqual([
      'd.password is set without a username',
    ]);
  });
});

describe('createDevice', () => {
  it('returns a frozen device', () => {
    const device = createDevice(PHONE);
    expect(device).toEqual(PHONE);
    expect(Object.isFrozen(device)).toBe(true);
  });

  it('drops an empty username', () => {
    expect(createDevice({ ...PHONE, username: '' }).username).toBeUndefined();
  });

  it('throws ConfigurationError for a non-object record', () => {
    expect(() => createDevice(null, 'devices[0]')).toThrow(ConfigurationError);
  });

  it('throws ConfigurationError with the problems', () => {
    expect(() => createDevice({ ...PHONE, port: 0 }, 'devices[0]')).toThrow(ConfigurationError);
    try {
      createDevice({ ...PHONE, port: 0 }, 'devices[0]');
    } catch (err) {
      expect(err instanceof ConfigurationError && err.problems).toEqual([
        'devices[0].port must be an integer between 1 and 65535',
      ]);
    }
  });
});

describe('validateDeviceList', () => {
  it('flags duplicate names after the first', () => {
    expect(validateDeviceList([PHONE, { ...PHONE, hostname: 'other' }])).toEqual([
      'devices[1].name "Phone" is used by more than one device',
    ]);
  });

  it('reports non-object entries without failing on the name check', () => {
    expect(validateDeviceList([null, PHONE, 'Phone'])).toEqual([
      'devices[0] must be an object',
      'devices[2] must be an object',
    ]);
  });
});
