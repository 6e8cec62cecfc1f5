/**
 * Syncthing Supervisor - Configuration
 *
 * Reads config from ~/.config/syncthing-supervisor/config.json. Every key is
 * optional; a missing file means all defaults.
 */

import { randomBytes } from 'crypto';
import { existsSync, readFileSync } from 'fs';
import { join } from 'path';
import { ConfigError, errorMessage } from './errors.js';
import { logger } from './logger.js';
import { getConfigDir } from './paths.js';
import type { SupervisorSettings } from './supervisor/supervisor.js';

// ============================================================================
// Types
// ============================================================================

export interface Config {
  executable_path: string;
  address: string;
  api_key: string;
  environment_variables: Record<string, string>;
  custom_home_dir: string | null;
  deny_upgrade: boolean;
  run_low_priority: boolean;
  hide_device_ids: boolean;
  connect_timeout_sec: number;
}

// ============================================================================
// Constants
// ============================================================================

export const DEFAULT_EXECUTABLE_PATH = 'syncthing';
export const DEFAULT_ADDRESS = 'http://127.0.0.1:8384';
export const DEFAULT_CONNECT_TIMEOUT_SEC = 60;

export const CONFIG_FILE_NAME = 'config.json';

export function getConfigFilePath(): string {
  return join(getConfigDir(), CONFIG_FILE_NAME);
}

/**
 * API key handed to a service started by this run, unless one is configured.
 */
export function generateApiKey(): string {
  return randomBytes(16).toString('hex');
}

export function defaultConfig(): Config {
  return {
    executable_path: DEFAULT_EXECUTABLE_PATH,
    address: DEFAULT_ADDRESS,
    api_key: generateApiKey(),
    environment_variables: {},
    custom_home_dir: null,
    deny_upgrade: false,
    run_low_priority: false,
    hide_device_ids: true,
    connect_timeout_sec: DEFAULT_CONNECT_TIMEOUT_SEC,
  };
}

// ============================================================================
// Validation
// ============================================================================

type RawConfig = Record<string, unknown>;

function readString(raw: RawConfig, key: keyof Config, fallback: string): string {
  const value = raw[key];
  if (value === undefined) return fallback;
  if (typeof value !== 'string' || value.trim() === '') {
    throw new ConfigError(`Config "${key}" must be a non-empty string`);
  }
  return value;
}

function readBoolean(raw: RawConfig, key: keyof Config, fallback: boolean): boolean {
  const value = raw[key];
  if (value === undefined) return fallback;
  if (typeof value !== 'boolean') {
    throw new ConfigError(`Config "${key}" must be true or false`);
  }
  return value;
}

function readEnvironment(raw: RawConfig): Record<string, string> {
  const value = raw.environment_variables;
  if (value === undefined || value === null) return {};
  if (typeof value !== 'object' || Array.isArray(value)) {
    throw new ConfigError('Config "environment_variables" must be an object');
  }

  const env: Record<string, string> = {};
  for (const [name, envValue] of Object.entries(value)) {
    if (typeof envValue !== 'string') {
      throw new ConfigError(`Config "environment_variables.${name}" must be a string`);
    }
    env[name] = envValue;
  }
  return env;
}

function readHomeDir(raw: RawConfig): string | null {
  const value = raw.custom_home_dir;
  if (value === undefined || value === null || value === '') return null;
  if (typeof value !== 'string') {
    throw new ConfigError('Config "custom_home_dir" must be a string or null');
  }
  return value;
}

function readTimeout(raw: RawConfig, fallback: number): number {
  const value = raw.connect_timeout_sec;
  if (value === undefined) return fallback;
  if (typeof value !== 'number' || !Number.isFinite(value) || value <= 0) {
    throw new ConfigError('Config "connect_timeout_sec" must be a positive number');
  }
  return value;
}

function isValidUrl(value: string): boolean {
  try {
    new URL(value);
    return true;
  } catch {
    return false;
  }
}

/**
 * Validate a parsed config object, filling in defaults for missing keys.
 */
export function parseConfig(raw: unknown): Config {
  if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
    throw new ConfigError('Config must be a JSON object');
  }
  const obj: RawConfig = { ...raw };
  const defaults = defaultConfig();

  const address = readString(obj, 'address', defaults.address);
  if (!isValidUrl(address)) {
    throw new ConfigError(`Config "address" is not a valid URL: ${address}`);
  }

  return {
    executable_path: readString(obj, 'executable_path', defaults.executable_path),
    address,
    api_key: readString(obj, 'api_key', defaults.api_key),
    environment_variables: readEnvironment(obj),
    custom_home_dir: readHomeDir(obj),
    deny_upgrade: readBoolean(obj, 'deny_upgrade', defaults.deny_upgrade),
    run_low_priority: readBoolean(obj, 'run_low_priority', defaults.run_low_priority),
    hide_device_ids: readBoolean(obj, 'hide_device_ids', defaults.hide_device_ids),
    connect_timeout_sec: readTimeout(obj, defaults.connect_timeout_sec),
  };
}

// ============================================================================
// Loading
// ============================================================================

/**
 * Load config from file. Throws ConfigError if the file is unreadable or
 * invalid.
 */
export function loadConfig(configFile: string = getConfigFilePath()): Config {
  if (!existsSync(configFile)) {
    logger.debug(`No config file at ${configFile}, using defaults`);
    return defaultConfig();
  }

  let content: string;
  try {
    content = readFileSync(configFile, 'utf-8');
  } catch (error) {
    throw new ConfigError(`Error reading config ${configFile}: ${errorMessage(error)}`);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch {
    throw new ConfigError(`Invalid JSON in config file: ${configFile}`);
  }

  const config = parseConfig(raw);
  logger.debug(`Loaded config from ${configFile}`);
  return config;
}

export function toSupervisorSettings(config: Config): SupervisorSettings {
  return {
    executablePath: config.executable_path,
    apiKey: config.api_key,
    address: new URL(config.address),
    environmentVariables: config.environment_variables,
    customHomeDir: config.custom_home_dir,
    denyUpgrade: config.deny_upgrade,
    runLowPriority: config.run_low_priority,
    hideDeviceIds: config.hide_device_ids,
    connectTimeoutMs: config.connect_timeout_sec * 1000,
  };
}
