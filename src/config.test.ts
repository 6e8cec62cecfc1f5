import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { afterEach, beforeEach, describe, expect, test } from 'vitest';
import {
  DEFAULT_ADDRESS,
  loadConfig,
  parseConfig,
  toSupervisorSettings,
  type Config,
} from './config.js';
import { ConfigError } from './errors.js';

let tmpDir: string;

beforeEach(() => {
  tmpDir = mkdtempSync(join(tmpdir(), 'supervisor-config-test-'));
});

afterEach(() => {
  rmSync(tmpDir, { recursive: true, force: true });
});

function writeConfig(content: string): string {
  const file = join(tmpDir, 'config.json');
  writeFileSync(file, content);
  return file;
}

// ============================================================================
// loadConfig
// ============================================================================

describe('loadConfig', () => {
  test('a missing file gives the defaults', () => {
    const config = loadConfig(join(tmpDir, 'missing.json'));

    expect(config.executable_path).toBe('syncthing');
    expect(config.address).toBe(DEFAULT_ADDRESS);
    expect(config.api_key).toMatch(/^[0-9a-f]{32}$/);
    expect(config.environment_variables).toEqual({});
    expect(config.custom_home_dir).toBeNull();
    expect(config.deny_upgrade).toBe(false);
    expect(config.run_low_priority).toBe(false);
    expect(config.hide_device_ids).toBe(true);
    expect(config.connect_timeout_sec).toBe(60);
  });

  test('reads the values that are set', () => {
    const file = writeConfig(
      JSON.stringify({
        executable_path: '/usr/local/bin/syncthing',
        api_key: 'test-secret',
        environment_variables: { STTRACE: 'model' },
        custom_home_dir: '/var/lib/syncthing',
        run_low_priority: true,
        connect_timeout_sec: 30,
      })
    );

    expect(loadConfig(file)).toEqual({
      executable_path: '/usr/local/bin/syncthing',
      address: DEFAULT_ADDRESS,
      api_key: 'test-secret',
      environment_variables: { STTRACE: 'model' },
      custom_home_dir: '/var/lib/syncthing',
      deny_upgrade: false,
      run_low_priority: true,
      hide_device_ids: true,
      connect_timeout_sec: 30,
    });
  });

  test('invalid JSON is a ConfigError', () => {
    const file = writeConfig('{ nope');
    expect(() => loadConfig(file)).toThrow(`Invalid JSON in config file: ${file}`);
  });
});

// ============================================================================
// parseConfig
// ============================================================================

describe('parseConfig', () => {
  test('names the bad key', () => {
    expect(() => parseConfig({ deny_upgrade: 'yes' })).toThrow(
      'Config "deny_upgrade" must be true or false'
    );
    expect(() => parseConfig({ connect_timeout_sec: 0 })).toThrow(
      'Config "connect_timeout_sec" must be a positive number'
    );
    expect(() => parseConfig({ environment_variables: { A: 1 } })).toThrow(
      'Config "environment_variables.A" must be a string'
    );
  });

  test('rejects an address that is not a URL', () => {
    expect(() => parseConfig({ address: 'localhost 8384' })).toThrow(ConfigError);
  });

  test('rejects a non-object config', () => {
    expect(() => parseConfig([1, 2])).toThrow('Config must be a JSON object');
  });
});

// ============================================================================
// toSupervisorSettings
// ============================================================================

describe('toSupervisorSettings', () => {
  test('maps keys and converts the timeout to milliseconds', () => {
    const config: Config = {
      executable_path: 'syncthing',
      address: 'https://127.0.0.1:8443',
      api_key: 'test-secret',
      environment_variables: {},
      custom_home_dir: null,
      deny_upgrade: true,
      run_low_priority: false,
      hide_device_ids: false,
      connect_timeout_sec: 5,
    };

    const settings = toSupervisorSettings(config);

    expect(settings.address.href).toBe('https://127.0.0.1:8443/');
    expect(settings.apiKey).toBe('test-secret');
    expect(settings.denyUpgrade).toBe(true);
    expect(settings.hideDeviceIds).toBe(false);
    expect(settings.connectTimeoutMs).toBe(5000);
  });
});
