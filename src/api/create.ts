/**
 * Service REST API - Connect
 *
 * The service takes a moment to open its REST listener after spawning. Keep
 * pinging until it answers, the API key is refused, the connect timeout runs
 * out, or the caller aborts.
 */

import { setTimeout as sleep } from 'timers/promises';
import { ApiError, ConnectTimeoutError, errorMessage } from '../errors.js';
import { logger } from '../logger.js';
import { RestApiClient } from './client.js';

/** Delay between pings while waiting for the service to come up */
export const CONNECT_RETRY_INTERVAL_MS = 1000;

export interface ConnectOptions {
  retryIntervalMs?: number;
}

export async function createApiClient(
  address: URL,
  apiKey: string,
  connectTimeoutMs: number,
  signal: AbortSignal,
  options: ConnectOptions = {}
): Promise<RestApiClient> {
  const retryIntervalMs = options.retryIntervalMs ?? CONNECT_RETRY_INTERVAL_MS;
  const client = new RestApiClient(address, apiKey);
  const startTime = Date.now();

  for (let attempt = 1; ; attempt++) {
    signal.throwIfAborted();

    // Bounded by what is left of the connect timeout
    const remainingMs = Math.max(1, connectTimeoutMs - (Date.now() - startTime));
    try {
      await client.ping(signal, remainingMs);
      logger.debug(`Service API answered after ${attempt} attempt(s)`);
      return client;
    } catch (error) {
      signal.throwIfAborted();
      if (error instanceof ApiError && error.isUnauthorized) {
        throw error;
      }

      const elapsed = Date.now() - startTime;
      if (elapsed + retryIntervalMs > connectTimeoutMs) {
        throw new ConnectTimeoutError(address.href, connectTimeoutMs);
      }
      logger.debug(`Service API not ready (attempt ${attempt}): ${errorMessage(error)}`);
    }

    await sleep(retryIntervalMs, undefined, { signal });
  }
}
