/**
 * Startup Snapshot
 *
 * The one-off load of configuration, system info, version and connections
 * performed once the service answers, turned into devices and folders. The
 * newest event id is taken first so that nothing raised during the load is
 * missed by the event watcher.
 */

import { join } from 'path';
import { logger } from '../logger.js';
import { FolderIgnores } from './ignores.js';
import { Device, Folder, type ServiceVersion } from './models.js';
import type { ApiClient, Connections, DeviceConfig, FolderConfig } from './types.js';

export interface StartupSnapshot {
  devices: Device[];
  folders: Folder[];
  version: ServiceVersion;
  /** Newest event id before anything else was fetched; live events resume here */
  lastEventId: number;
}

/**
 * Expand a leading ~ in a folder path against the service's home directory.
 */
export function resolveFolderPath(path: string, tilde: string): string {
  if (!path.startsWith('~')) return path;
  return join(tilde, path.slice(1).replace(/^[\\/]+/, ''));
}

function buildDevice(config: DeviceConfig, connections: Connections): Device {
  const device = new Device(config.deviceId, config.name);
  const connection = connections.deviceConnections[config.deviceId];
  if (connection) {
    if (connection.connected) device.setConnected(connection.address);
    device.setPaused(connection.paused);
  }
  return device;
}

async function buildFolder(
  client: ApiClient,
  config: FolderConfig,
  tilde: string,
  signal: AbortSignal
): Promise<Folder> {
  const ignores = await client.fetchIgnores(config.id, signal);
  const path = resolveFolderPath(config.path, tilde);
  return new Folder(
    config.id,
    config.label,
    path,
    new FolderIgnores(ignores.ignorePatterns, ignores.expandedPatterns)
  );
}

/**
 * Settle with `promise`, or reject with the abort reason as soon as `signal`
 * aborts.
 */
function untilAborted<T>(promise: Promise<T>, signal: AbortSignal): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const onAbort = (): void => reject(signal.reason);
    signal.addEventListener('abort', onAbort, { once: true });
    promise.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      }
    );
  });
}

/**
 * Load the startup snapshot. Throws the signal's abort reason if the attempt
 * is aborted before or during the load.
 */
export async function loadStartupSnapshot(
  client: ApiClient,
  signal: AbortSignal
): Promise<StartupSnapshot> {
  logger.debug('Loading startup data');

  signal.throwIfAborted();
  const latest = await untilAborted(client.fetchEvents({ since: 0, limit: 1, signal }), signal);
  const lastEventId = latest.at(-1)?.id ?? 0;

  const [config, system, version, connections] = await untilAborted(
    Promise.all([
      client.fetchConfig(signal),
      client.fetchSystemInfo(signal),
      client.fetchVersion(signal),
      client.fetchConnections(signal),
    ]),
    signal
  );

  const devices = config.devices.map((device) => buildDevice(device, connections));
  const folders = await untilAborted(
    Promise.all(config.folders.map((folder) => buildFolder(client, folder, system.tilde, signal))),
    signal
  );

  signal.throwIfAborted();
  logger.debug(
    `Startup data loaded: ${devices.length} device(s), ${folders.length} folder(s), ${version.version}`
  );

  return { devices, folders, version, lastEventId };
}
