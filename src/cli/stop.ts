/**
 * Stop Command
 *
 * Asks the service at the configured address to shut down.
 */

import { createApiClient } from '../api/create.js';
import { loadConfig } from '../config.js';
import { ConnectTimeoutError, errorMessage } from '../errors.js';
import { logger } from '../logger.js';

const STOP_CONNECT_TIMEOUT_MS = 5000;

export async function stopCommand(): Promise<void> {
  const config = loadConfig();

  try {
    const client = await createApiClient(
      new URL(config.address),
      config.api_key,
      STOP_CONNECT_TIMEOUT_MS,
      new AbortController().signal
    );
    await client.shutdown();
  } catch (error) {
    if (error instanceof ConnectTimeoutError) {
      console.log('No running service found.');
      return;
    }
    logger.error(`Failed to stop service: ${errorMessage(error)}`);
    process.exit(1);
  }

  console.log('Shutdown requested.');
}
