import { describe, expect, test } from 'vitest';
import type { Config } from '../config.js';
import { Device, Folder, FolderIgnores } from '../supervisor/index.js';
import { describeEvent, formatBytes, resolveConfig } from './start.js';

const CONFIG: Config = {
  executable_path: 'syncthing',
  address: 'http://127.0.0.1:8384',
  api_key: 'test-secret',
  environment_variables: {},
  custom_home_dir: null,
  deny_upgrade: false,
  run_low_priority: false,
  hide_device_ids: true,
  connect_timeout_sec: 60,
};

describe('resolveConfig', () => {
  test('applies command-line overrides', () => {
    const config = resolveConfig(
      { executable: '/opt/st/syncthing', address: 'http://127.0.0.1:9000' },
      CONFIG
    );
    expect(config.executable_path).toBe('/opt/st/syncthing');
    expect(config.address).toBe('http://127.0.0.1:9000');
    expect(config.api_key).toBe('test-secret');
  });

  test('keeps file values without overrides', () => {
    expect(resolveConfig({}, CONFIG)).toEqual(CONFIG);
  });

  test('validates an overridden address', () => {
    expect(() => resolveConfig({ address: 'not a url' }, CONFIG)).toThrow(
      'Config "address" is not a valid URL: not a url'
    );
  });
});

describe('describeEvent', () => {
  test('describes state and device changes', () => {
    const device = new Device('DEV1', 'Laptop');
    device.setConnected('10.0.0.5:22000');

    expect(describeEvent({ type: 'stateChanged', oldState: 'starting', newState: 'running' })).toBe(
      'Service state: starting -> running'
    );
    expect(describeEvent({ type: 'deviceConnected', device })).toBe(
      'Device connected: Laptop (10.0.0.5:22000)'
    );
  });

  test('describes folder state changes by label', () => {
    const folder = new Folder('docs', 'Documents', '/home/user/docs', FolderIgnores.empty());
    expect(
      describeEvent({
        type: 'folderSyncStateChanged',
        folder,
        prevSyncState: 'idle',
        syncState: 'scanning',
      })
    ).toBe('Folder Documents: idle -> scanning');
  });

  test('leaves chatty events to debug logging', () => {
    expect(describeEvent({ type: 'messageLogged', message: 'INFO: ready' })).toBeNull();
  });
});

describe('formatBytes', () => {
  test('picks a unit', () => {
    expect(formatBytes(512)).toBe('512 B');
    expect(formatBytes(1536)).toBe('1.5 KiB');
    expect(formatBytes(3 * 1024 * 1024)).toBe('3.0 MiB');
  });
});
