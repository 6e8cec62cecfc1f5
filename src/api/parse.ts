/**
 * Service REST API - Response Parsing
 *
 * The REST API returns loosely-typed JSON. These helpers check the fields the
 * supervisor relies on and map them to typed results, throwing
 * ResponseFormatError when a required field is missing or of the wrong type.
 */

import type {
  Connections,
  DeviceConnection,
  Ignores,
  ServiceConfig,
  ServiceEvent,
  SystemInfo,
} from '../supervisor/types.js';
import type { ServiceVersion } from '../supervisor/models.js';

// ============================================================================
// Primitives
// ============================================================================

export class ResponseFormatError extends Error {
  constructor(what: string, detail: string) {
    super(`Unexpected ${what} response: ${detail}`);
    this.name = 'ResponseFormatError';
  }
}

type JsonObject = Record<string, unknown>;

export function isObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function expectObject(value: unknown, what: string): JsonObject {
  if (!isObject(value)) {
    throw new ResponseFormatError(what, 'expected an object');
  }
  return value;
}

function expectString(obj: JsonObject, key: string, what: string): string {
  const value = obj[key];
  if (typeof value !== 'string') {
    throw new ResponseFormatError(what, `"${key}" must be a string`);
  }
  return value;
}

function optionalString(obj: JsonObject, key: string, fallback: string): string {
  const value = obj[key];
  return typeof value === 'string' ? value : fallback;
}

function optionalNumber(obj: JsonObject, key: string, fallback: number): number {
  const value = obj[key];
  return typeof value === 'number' && Number.isFinite(value) ? value : fallback;
}

/** The service sends null for empty lists */
function stringList(obj: JsonObject, key: string, what: string): string[] {
  const value = obj[key];
  if (value === null || value === undefined) return [];
  if (!Array.isArray(value) || !value.every((item) => typeof item === 'string')) {
    throw new ResponseFormatError(what, `"${key}" must be a list of strings`);
  }
  return value;
}

function objectList(obj: JsonObject, key: string, what: string): JsonObject[] {
  const value = obj[key];
  if (value === null || value === undefined) return [];
  if (!Array.isArray(value)) {
    throw new ResponseFormatError(what, `"${key}" must be a list`);
  }
  return value.map((item) => expectObject(item, what));
}

// ============================================================================
// Endpoints
// ============================================================================

export function parseConfig(body: unknown): ServiceConfig {
  const what = 'config';
  const obj = expectObject(body, what);

  const folders = objectList(obj, 'folders', what).map((folder) => {
    const id = expectString(folder, 'id', what);
    return {
      id,
      label: optionalString(folder, 'label', '') || id,
      path: expectString(folder, 'path', what),
    };
  });

  const devices = objectList(obj, 'devices', what).map((device) => {
    const deviceId = expectString(device, 'deviceID', what);
    return { deviceId, name: optionalString(device, 'name', '') || deviceId };
  });

  return { folders, devices };
}

export function parseSystemInfo(body: unknown): SystemInfo {
  const what = 'system status';
  const obj = expectObject(body, what);
  return {
    myId: expectString(obj, 'myID', what),
    tilde: expectString(obj, 'tilde', what),
    uptimeSec: optionalNumber(obj, 'uptime', 0),
  };
}

export function parseVersion(body: unknown): ServiceVersion {
  const what = 'version';
  const obj = expectObject(body, what);
  const version = expectString(obj, 'version', what);
  return {
    version,
    longVersion: optionalString(obj, 'longVersion', version),
    os: optionalString(obj, 'os', ''),
    arch: optionalString(obj, 'arch', ''),
  };
}

/**
 * Timestamps arrive as RFC 3339 strings; unparseable ones fall back to `now`.
 */
function parseTimestamp(value: unknown, now: number): number {
  if (typeof value !== 'string') return now;
  const parsed = Date.parse(value);
  return Number.isNaN(parsed) ? now : parsed;
}

export function parseConnections(body: unknown, now: number = Date.now()): Connections {
  const what = 'connections';
  const obj = expectObject(body, what);
  const total = expectObject(obj.total, what);
  const connections = isObject(obj.connections) ? obj.connections : {};

  const deviceConnections: Record<string, DeviceConnection> = {};
  for (const [deviceId, raw] of Object.entries(connections)) {
    if (!isObject(raw)) continue;
    deviceConnections[deviceId] = {
      connected: raw.connected === true,
      address: optionalString(raw, 'address', ''),
      paused: raw.paused === true,
      inBytesTotal: optionalNumber(raw, 'inBytesTotal', 0),
      outBytesTotal: optionalNumber(raw, 'outBytesTotal', 0),
    };
  }

  return {
    total: {
      inBytesTotal: optionalNumber(total, 'inBytesTotal', 0),
      outBytesTotal: optionalNumber(total, 'outBytesTotal', 0),
      at: parseTimestamp(total.at, now),
    },
    deviceConnections,
  };
}

export function parseIgnores(body: unknown): Ignores {
  const what = 'ignores';
  const obj = expectObject(body, what);
  return {
    ignorePatterns: stringList(obj, 'ignore', what),
    expandedPatterns: stringList(obj, 'expanded', what),
  };
}

export function parseEvents(body: unknown): ServiceEvent[] {
  const what = 'events';
  if (body === null) return [];
  if (!Array.isArray(body)) {
    throw new ResponseFormatError(what, 'expected a list');
  }

  return body.map((item) => {
    const obj = expectObject(item, what);
    const id = obj.id;
    if (typeof id !== 'number') {
      throw new ResponseFormatError(what, '"id" must be a number');
    }
    return {
      id,
      type: expectString(obj, 'type', what),
      time: optionalString(obj, 'time', ''),
      data: obj.data,
    };
  });
}
