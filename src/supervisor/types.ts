/**
 * Supervisor - Collaborator Contracts
 *
 * The process runner, API client and watchers the supervisor drives. Concrete
 * implementations live in src/process, src/api and src/watchers; tests swap
 * in fakes.
 */

import type { EventMap, Unsubscribe } from './emitter.js';
import type { ConnectionStats, FolderSyncState, ServiceVersion } from './models.js';

// ============================================================================
// Process Runner
// ============================================================================

export type ExitStatus = 'normal' | 'error';

export interface ProcessRunnerOptions {
  apiKey: string;
  /** host:port the service's GUI/REST listener binds to */
  hostAddress: string;
  executablePath: string;
  customHomeDir: string | null;
  environmentVariables: Record<string, string>;
  denyUpgrade: boolean;
  runLowPriority: boolean;
  hideDeviceIds: boolean;
}

export interface ProcessRunnerEvents {
  /** Raised right before the process is spawned; listeners may configure() */
  starting: [];
  stopped: [ExitStatus];
  /** The service asked to be restarted; a new `starting` follows */
  restarted: [];
  messageLogged: [string];
}

export interface ProcessRunner {
  configure(options: ProcessRunnerOptions): void;
  start(): void;
  kill(): void;
  killAllInstances(): void;
  dispose(): void;
  on<K extends keyof ProcessRunnerEvents & string>(
    event: K,
    listener: (...args: ProcessRunnerEvents[K]) => void
  ): Unsubscribe;
}

// ============================================================================
// API Client
// ============================================================================

export interface FolderConfig {
  id: string;
  label: string;
  path: string;
}

export interface DeviceConfig {
  deviceId: string;
  name: string;
}

export interface ServiceConfig {
  folders: FolderConfig[];
  devices: DeviceConfig[];
}

export interface SystemInfo {
  myId: string;
  /** The service's home directory, used to expand ~ in folder paths */
  tilde: string;
  uptimeSec: number;
}

export interface DeviceConnection {
  connected: boolean;
  address: string;
  paused: boolean;
  inBytesTotal: number;
  outBytesTotal: number;
}

export interface ConnectionTotals {
  inBytesTotal: number;
  outBytesTotal: number;
  /** Sample time in ms since epoch */
  at: number;
}

export interface Connections {
  total: ConnectionTotals;
  /** Every device the service reports on, keyed by device id */
  deviceConnections: Record<string, DeviceConnection>;
}

export interface Ignores {
  ignorePatterns: string[];
  expandedPatterns: string[];
}

export interface ServiceEvent {
  id: number;
  type: string;
  time: string;
  data: unknown;
}

export interface FetchEventsOptions {
  since: number;
  limit?: number;
  /** Long-poll timeout in seconds */
  timeoutSec?: number;
  signal?: AbortSignal;
}

/**
 * Every call takes an optional signal that cancels the request in flight.
 */
export interface ApiClient {
  fetchConfig(signal?: AbortSignal): Promise<ServiceConfig>;
  fetchSystemInfo(signal?: AbortSignal): Promise<SystemInfo>;
  fetchVersion(signal?: AbortSignal): Promise<ServiceVersion>;
  fetchConnections(signal?: AbortSignal): Promise<Connections>;
  fetchIgnores(folderId: string, signal?: AbortSignal): Promise<Ignores>;
  fetchEvents(options: FetchEventsOptions): Promise<ServiceEvent[]>;
  scan(folderId: string, subPath?: string, signal?: AbortSignal): Promise<void>;
  pauseDevice(deviceId: string, signal?: AbortSignal): Promise<void>;
  resumeDevice(deviceId: string, signal?: AbortSignal): Promise<void>;
  restart(signal?: AbortSignal): Promise<void>;
  shutdown(signal?: AbortSignal): Promise<void>;
}

/**
 * Resolve once the service answers at `address`, rejecting on timeout or when
 * `signal` aborts.
 */
export type ApiClientFactory = (
  address: URL,
  apiKey: string,
  connectTimeoutMs: number,
  signal: AbortSignal
) => Promise<ApiClient>;

// ============================================================================
// Watchers
// ============================================================================

export interface ItemNotification {
  folderId: string;
  item: string;
}

export interface DeviceConnectedNotification {
  deviceId: string;
  address: string;
}

export interface DeviceDisconnectedNotification {
  deviceId: string;
  error: string;
}

export interface DeviceNotification {
  deviceId: string;
}

export interface SyncStateChangedNotification {
  folderId: string;
  prevSyncState: FolderSyncState;
  syncState: FolderSyncState;
}

export interface EventWatcherEvents {
  itemStarted: [ItemNotification];
  itemFinished: [ItemNotification];
  deviceConnected: [DeviceConnectedNotification];
  deviceDisconnected: [DeviceDisconnectedNotification];
  devicePaused: [DeviceNotification];
  deviceResumed: [DeviceNotification];
  syncStateChanged: [SyncStateChangedNotification];
}

export interface ConnectionsWatcherEvents {
  totalConnectionStatsChanged: [ConnectionStats];
}

interface Watcher<Events extends EventMap<Events>> {
  start(): void;
  /** Idempotent */
  dispose(): void;
  on<K extends keyof Events & string>(event: K, listener: (...args: Events[K]) => void): Unsubscribe;
}

export type EventWatcher = Watcher<EventWatcherEvents>;
export type ConnectionsWatcher = Watcher<ConnectionsWatcherEvents>;

/**
 * `sinceEventId` is the newest event id seen before the startup snapshot was
 * fetched; the watcher delivers everything after it.
 */
export type EventWatcherFactory = (client: ApiClient, sinceEventId: number) => EventWatcher;
export type ConnectionsWatcherFactory = (client: ApiClient) => ConnectionsWatcher;
