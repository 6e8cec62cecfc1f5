/**
 * Syncthing Supervisor - Status Command
 *
 * Prints JSON status of the service at the configured address
 */

import { createApiClient } from '../api/create.js';
import { loadConfig } from '../config.js';
import { ApiError, ConnectTimeoutError, errorMessage } from '../errors.js';
import { logger } from '../logger.js';
import { loadStartupSnapshot } from '../supervisor/index.js';
import type { ApiClient } from '../supervisor/types.js';

// ============================================================================
// Types
// ============================================================================

interface RunningStatus {
  status: 'running';
  version: string;
  folders: number;
  devices: number;
  connectedDevices: string[];
}

interface StoppedStatus {
  status: 'stopped';
}

export type StatusResult = RunningStatus | StoppedStatus;

const STATUS_CONNECT_TIMEOUT_MS = 5000;

// ============================================================================
// Command
// ============================================================================

export async function collectStatus(client: ApiClient, signal: AbortSignal): Promise<RunningStatus> {
  const snapshot = await loadStartupSnapshot(client, signal);
  return {
    status: 'running',
    version: snapshot.version.version,
    folders: snapshot.folders.length,
    devices: snapshot.devices.length,
    connectedDevices: snapshot.devices
      .filter((device) => device.isConnected)
      .map((device) => device.name),
  };
}

export async function statusCommand(): Promise<void> {
  const config = loadConfig();
  const abort = new AbortController();

  let result: StatusResult;
  try {
    const client = await createApiClient(
      new URL(config.address),
      config.api_key,
      STATUS_CONNECT_TIMEOUT_MS,
      abort.signal
    );
    result = await collectStatus(client, abort.signal);
  } catch (error) {
    if (!(error instanceof ConnectTimeoutError)) {
      logger.error(`Failed to query service: ${errorMessage(error)}`);
      if (error instanceof ApiError && error.isUnauthorized) {
        logger.error('Set "api_key" in the config file to the key the service uses.');
      }
      process.exit(1);
    }
    result = { status: 'stopped' };
  }

  console.log(JSON.stringify(result));
}
