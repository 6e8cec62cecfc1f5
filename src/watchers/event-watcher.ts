/**
 * Event Watcher
 *
 * Long-polls the service's event stream and turns the event types the
 * supervisor cares about into typed notifications. Delivery starts after
 * `sinceEventId` when given; otherwise the first poll looks up the newest
 * event and everything up to it is skipped.
 */

import { isObject } from '../api/parse.js';
import { logger } from '../logger.js';
import { parseFolderSyncState } from '../supervisor/models.js';
import type {
  ApiClient,
  EventWatcher,
  EventWatcherEvents,
  ServiceEvent,
} from '../supervisor/types.js';
import { Poller, type PollerOptions } from './poller.js';

/** How long the service holds an events request open when nothing happens */
export const LONG_POLL_TIMEOUT_SEC = 60;

const EVENT_BACKOFF_MS = 5000;

type EventData = Record<string, unknown>;

function field(data: EventData, key: string): string | null {
  const value = data[key];
  return typeof value === 'string' ? value : null;
}

export interface EventWatcherOptions extends PollerOptions {
  sinceEventId?: number;
}

export class ServiceEventWatcher extends Poller<EventWatcherEvents> implements EventWatcher {
  private lastEventId: number | null;

  constructor(client: ApiClient, options: EventWatcherOptions = {}) {
    super('Event watcher', client, options.intervalMs ?? 0, options.backoffMs ?? EVENT_BACKOFF_MS);
    this.lastEventId = options.sinceEventId ?? null;
  }

  /** Id of the newest event seen, null until known */
  get lastSeenEventId(): number | null {
    return this.lastEventId;
  }

  protected async poll(signal: AbortSignal): Promise<void> {
    if (this.lastEventId === null) {
      const latest = await this.client.fetchEvents({ since: 0, limit: 1, signal });
      this.lastEventId = latest.at(-1)?.id ?? 0;
      logger.debug(`Event watcher starting after event ${this.lastEventId}`);
      return;
    }

    const since = this.lastEventId;
    const events = await this.client.fetchEvents({
      since,
      timeoutSec: LONG_POLL_TIMEOUT_SEC,
      signal,
    });

    for (const event of events) {
      if (signal.aborted || this.isDisposed) return;
      this.lastEventId = Math.max(this.lastEventId ?? since, event.id);
      this.dispatch(event);
    }
  }

  private dispatch(event: ServiceEvent): void {
    const data: EventData = isObject(event.data) ? event.data : {};

    switch (event.type) {
      case 'ItemStarted':
      case 'ItemFinished': {
        const folderId = field(data, 'folder');
        const item = field(data, 'item');
        if (folderId === null || item === null) break;
        this.emit(event.type === 'ItemStarted' ? 'itemStarted' : 'itemFinished', {
          folderId,
          item,
        });
        return;
      }

      case 'DeviceConnected': {
        const deviceId = field(data, 'id');
        if (deviceId === null) break;
        this.emit('deviceConnected', { deviceId, address: field(data, 'addr') ?? '' });
        return;
      }

      case 'DeviceDisconnected': {
        const deviceId = field(data, 'id');
        if (deviceId === null) break;
        this.emit('deviceDisconnected', { deviceId, error: field(data, 'error') ?? '' });
        return;
      }

      case 'DevicePaused':
      case 'DeviceResumed': {
        const deviceId = field(data, 'device');
        if (deviceId === null) break;
        this.emit(event.type === 'DevicePaused' ? 'devicePaused' : 'deviceResumed', {
          deviceId,
        });
        return;
      }

      case 'StateChanged': {
        const folderId = field(data, 'folder');
        const from = field(data, 'from');
        const to = field(data, 'to');
        if (folderId === null || from === null || to === null) break;
        this.emit('syncStateChanged', {
          folderId,
          prevSyncState: parseFolderSyncState(from),
          syncState: parseFolderSyncState(to),
        });
        return;
      }

      default:
        // Not one we forward
        return;
    }

    this.skip(event);
  }

  private skip(event: ServiceEvent): void {
    logger.debug(`Skipping malformed ${event.type} event ${event.id}`);
  }
}
