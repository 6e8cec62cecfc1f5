/**
 * Supervisor Events
 *
 * Every event the supervisor publishes to observers, as one tagged union,
 * and the dispatcher they all go through.
 */

import { EventEmitter } from 'events';
import { logger } from '../logger.js';
import { errorMessage } from '../errors.js';
import type { Unsubscribe } from './emitter.js';
import type { ConnectionStats, Device, Folder, FolderSyncState } from './models.js';
import type { SupervisorState } from './state.js';

// ============================================================================
// Event Types
// ============================================================================

export type SupervisorEvent =
  | { type: 'dataLoaded' }
  | { type: 'stateChanged'; oldState: SupervisorState; newState: SupervisorState }
  | { type: 'messageLogged'; message: string }
  | {
      type: 'folderSyncStateChanged';
      folder: Folder;
      prevSyncState: FolderSyncState;
      syncState: FolderSyncState;
    }
  | { type: 'itemStarted'; folder: Folder; item: string }
  | { type: 'itemFinished'; folder: Folder; item: string }
  | { type: 'totalConnectionStatsChanged'; stats: ConnectionStats }
  | { type: 'processExitedWithError' }
  | { type: 'deviceConnected'; device: Device }
  | { type: 'deviceDisconnected'; device: Device }
  | { type: 'devicePaused'; device: Device }
  | { type: 'deviceResumed'; device: Device };

export type SupervisorEventType = SupervisorEvent['type'];

export type SupervisorEventOf<K extends SupervisorEventType> = Extract<SupervisorEvent, { type: K }>;

export type SupervisorEventListener<K extends SupervisorEventType> = (
  event: SupervisorEventOf<K>
) => void;

/** Channel name for listeners that want every event */
const ANY_EVENT = '*';

// ============================================================================
// Dispatcher
// ============================================================================

export class EventDispatcher {
  private readonly emitter = new EventEmitter();

  constructor() {
    // Any number of observers may subscribe
    this.emitter.setMaxListeners(0);
  }

  on<K extends SupervisorEventType>(type: K, listener: SupervisorEventListener<K>): Unsubscribe {
    const wrapped = (event: SupervisorEventOf<K>): void => this.invoke(type, () => listener(event));
    this.emitter.on(type, wrapped);
    return () => {
      this.emitter.off(type, wrapped);
    };
  }

  onAny(listener: (event: SupervisorEvent) => void): Unsubscribe {
    const wrapped = (event: SupervisorEvent): void => this.invoke(event.type, () => listener(event));
    this.emitter.on(ANY_EVENT, wrapped);
    return () => {
      this.emitter.off(ANY_EVENT, wrapped);
    };
  }

  publish(event: SupervisorEvent): void {
    this.emitter.emit(event.type, event);
    this.emitter.emit(ANY_EVENT, event);
  }

  removeAllListeners(): void {
    this.emitter.removeAllListeners();
  }

  private invoke(type: SupervisorEventType, call: () => void): void {
    try {
      call();
    } catch (error) {
      logger.error(`Listener for ${type} failed: ${errorMessage(error)}`);
    }
  }
}
