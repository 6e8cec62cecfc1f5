/**
 * Watchers
 */

import type { ConnectionsWatcherFactory, EventWatcherFactory } from '../supervisor/types.js';
import { ServiceConnectionsWatcher } from './connections-watcher.js';
import { ServiceEventWatcher } from './event-watcher.js';

export { Poller, type PollerOptions } from './poller.js';
export {
  ServiceEventWatcher,
  LONG_POLL_TIMEOUT_SEC,
  type EventWatcherOptions,
} from './event-watcher.js';
export {
  ServiceConnectionsWatcher,
  CONNECTIONS_POLL_INTERVAL_MS,
  computeConnectionStats,
} from './connections-watcher.js';

export const createEventWatcher: EventWatcherFactory = (client, sinceEventId) =>
  new ServiceEventWatcher(client, { sinceEventId });

export const createConnectionsWatcher: ConnectionsWatcherFactory = (client) =>
  new ServiceConnectionsWatcher(client);
