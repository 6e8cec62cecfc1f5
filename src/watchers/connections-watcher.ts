/**
 * Connections Watcher
 *
 * Samples the service's connection totals every few seconds and derives
 * transfer rates from consecutive samples.
 */

import type { ConnectionStats } from '../supervisor/models.js';
import type {
  ApiClient,
  ConnectionTotals,
  ConnectionsWatcher,
  ConnectionsWatcherEvents,
} from '../supervisor/types.js';
import { Poller, type PollerOptions } from './poller.js';

export const CONNECTIONS_POLL_INTERVAL_MS = 10_000;

/**
 * Per-second rates between two samples. The first sample, a clock that did
 * not move forward, or a counter reset gives zero.
 */
export function computeConnectionStats(
  current: ConnectionTotals,
  previous: ConnectionTotals | null
): ConnectionStats {
  let inBytesPerSecond = 0;
  let outBytesPerSecond = 0;

  if (previous) {
    const elapsedSec = (current.at - previous.at) / 1000;
    if (elapsedSec > 0) {
      inBytesPerSecond = Math.max(0, (current.inBytesTotal - previous.inBytesTotal) / elapsedSec);
      outBytesPerSecond = Math.max(
        0,
        (current.outBytesTotal - previous.outBytesTotal) / elapsedSec
      );
    }
  }

  return {
    inBytesTotal: current.inBytesTotal,
    outBytesTotal: current.outBytesTotal,
    inBytesPerSecond,
    outBytesPerSecond,
  };
}

export class ServiceConnectionsWatcher
  extends Poller<ConnectionsWatcherEvents>
  implements ConnectionsWatcher
{
  private previous: ConnectionTotals | null = null;

  constructor(client: ApiClient, options: PollerOptions = {}) {
    super(
      'Connections watcher',
      client,
      options.intervalMs ?? CONNECTIONS_POLL_INTERVAL_MS,
      options.backoffMs ?? CONNECTIONS_POLL_INTERVAL_MS
    );
  }

  protected async poll(signal: AbortSignal): Promise<void> {
    const { total } = await this.client.fetchConnections(signal);
    if (signal.aborted || this.isDisposed) return;

    const stats = computeConnectionStats(total, this.previous);
    this.previous = total;
    this.emit('totalConnectionStatsChanged', stats);
  }
}
