/**
 * Supervisor
 *
 * Owns the lifecycle state of the supervised service, the API client and
 * the watchers, and republishes everything observers care about through one
 * dispatcher.
 *
 * Three sources race each other: the process runner (spawn/exit), the
 * watchers (live notifications) and API calls made here. All state changes
 * go through setState(), which is synchronous and so never interleaves with
 * another transition.
 */

import { logger } from '../logger.js';
import { ServiceNotRunningError, errorMessage, isAbortError } from '../errors.js';
import type { Unsubscribe } from './emitter.js';
import {
  EventDispatcher,
  type SupervisorEvent,
  type SupervisorEventListener,
  type SupervisorEventType,
} from './events.js';
import { FolderIgnores } from './ignores.js';
import type { ConnectionStats, Device, Folder, ServiceVersion } from './models.js';
import { DomainRegistry } from './registry.js';
import { loadStartupSnapshot } from './startup.js';
import { SupervisorState, resolveTransition } from './state.js';
import type {
  ApiClient,
  ApiClientFactory,
  ConnectionsWatcher,
  ConnectionsWatcherFactory,
  DeviceConnectedNotification,
  DeviceDisconnectedNotification,
  DeviceNotification,
  EventWatcher,
  EventWatcherFactory,
  ExitStatus,
  ItemNotification,
  ProcessRunner,
  SyncStateChangedNotification,
} from './types.js';

// ============================================================================
// Types
// ============================================================================

export interface SupervisorSettings {
  executablePath: string;
  apiKey: string;
  /** Base URL of the service's GUI/REST listener */
  address: URL;
  environmentVariables: Record<string, string>;
  customHomeDir: string | null;
  denyUpgrade: boolean;
  runLowPriority: boolean;
  hideDeviceIds: boolean;
  connectTimeoutMs: number;
}

export interface SupervisorDependencies {
  processRunner: ProcessRunner;
  apiClientFactory: ApiClientFactory;
  eventWatcherFactory: EventWatcherFactory;
  connectionsWatcherFactory: ConnectionsWatcherFactory;
}

const EMPTY_CONNECTION_STATS: ConnectionStats = {
  inBytesTotal: 0,
  outBytesTotal: 0,
  inBytesPerSecond: 0,
  outBytesPerSecond: 0,
};

const { STOPPED, STARTING, RUNNING, STOPPING, RESTARTING } = SupervisorState;

/**
 * Value handed to the service's --gui-address flag
 */
export function toHostAddress(address: URL): string {
  return address.protocol === 'https:' ? address.origin : address.host;
}

// ============================================================================
// Supervisor
// ============================================================================

export class Supervisor {
  readonly settings: SupervisorSettings;

  private readonly processRunner: ProcessRunner;
  private readonly apiClientFactory: ApiClientFactory;
  private readonly eventWatcherFactory: EventWatcherFactory;
  private readonly connectionsWatcherFactory: ConnectionsWatcherFactory;

  private readonly dispatcher = new EventDispatcher();
  private readonly registry = new DomainRegistry();
  private readonly runnerSubscriptions: Unsubscribe[];

  private currentState: SupervisorState = STOPPED;
  private apiClient: ApiClient | null = null;
  private eventWatcher: EventWatcher | null = null;
  private connectionsWatcher: ConnectionsWatcher | null = null;
  private watcherSubscriptions: Unsubscribe[] = [];
  private apiAbort: AbortController | null = null;
  private pendingStop: Promise<void> | null = null;

  private dataLoaded = false;
  private started: Date | null = null;
  private lastConnectivityEvent: Date | null = null;
  private serviceVersion: ServiceVersion | null = null;
  private connectionStats: ConnectionStats = EMPTY_CONNECTION_STATS;

  constructor(settings: SupervisorSettings, dependencies: SupervisorDependencies) {
    this.settings = settings;
    this.processRunner = dependencies.processRunner;
    this.apiClientFactory = dependencies.apiClientFactory;
    this.eventWatcherFactory = dependencies.eventWatcherFactory;
    this.connectionsWatcherFactory = dependencies.connectionsWatcherFactory;

    this.runnerSubscriptions = [
      this.processRunner.on('starting', () => this.onProcessStarting()),
      this.processRunner.on('stopped', (status) => this.onProcessStopped(status)),
      this.processRunner.on('restarted', () => this.setState(RESTARTING)),
      this.processRunner.on('messageLogged', (message) =>
        this.dispatcher.publish({ type: 'messageLogged', message })
      ),
    ];
  }

  // ==========================================================================
  // Observable State
  // ==========================================================================

  get state(): SupervisorState {
    return this.currentState;
  }

  get isDataLoaded(): boolean {
    return this.dataLoaded;
  }

  /** When the last startup snapshot finished loading */
  get startedTime(): Date | null {
    return this.started;
  }

  get lastConnectivityEventTime(): Date | null {
    return this.lastConnectivityEvent;
  }

  get version(): ServiceVersion | null {
    return this.serviceVersion;
  }

  get totalConnectionStats(): ConnectionStats {
    return this.connectionStats;
  }

  on<K extends SupervisorEventType>(type: K, listener: SupervisorEventListener<K>): Unsubscribe {
    return this.dispatcher.on(type, listener);
  }

  onAny(listener: (event: SupervisorEvent) => void): Unsubscribe {
    return this.dispatcher.onAny(listener);
  }

  // ==========================================================================
  // Queries
  // ==========================================================================

  lookupFolder(folderId: string): Folder | undefined {
    return this.registry.lookupFolder(folderId);
  }

  allFolders(): Folder[] {
    return this.registry.allFolders();
  }

  lookupDevice(deviceId: string): Device | undefined {
    return this.registry.lookupDevice(deviceId);
  }

  allDevices(): Device[] {
    return this.registry.allDevices();
  }

  // ==========================================================================
  // Commands
  // ==========================================================================

  /**
   * Start the service and connect to it. Rejects if the API could not be
   * reached or the startup data could not be loaded; the process has been
   * killed by then.
   */
  async start(): Promise<void> {
    if (this.currentState !== STOPPED) {
      logger.warn(`Ignoring start request: service is ${this.currentState}`);
      return;
    }
    this.processRunner.start();
    await this.startClient();
  }

  /**
   * Ask the service to shut down. The transition to stopped follows when the
   * process exits. Concurrent calls share one shutdown request.
   */
  stop(): Promise<void> {
    if (this.pendingStop) return this.pendingStop;
    if (this.currentState !== RUNNING) return Promise.resolve();

    // No signal: the process may exit before the reply arrives
    const client = this.requireApiClient('stop');
    this.pendingStop = client
      .shutdown()
      .then(() => {
        if (this.currentState === RUNNING) this.setState(STOPPING);
      })
      .finally(() => {
        this.pendingStop = null;
      });
    return this.pendingStop;
  }

  /**
   * Ask the service to restart itself. Resolves false when it is not running.
   */
  async restart(): Promise<boolean> {
    if (this.currentState !== RUNNING) return false;

    // No signal: the process may go down before the reply arrives
    await this.requireApiClient('restart').restart();
    return true;
  }

  kill(): void {
    this.processRunner.kill();
    this.setState(STOPPED);
  }

  killAll(): void {
    this.processRunner.killAllInstances();
  }

  async scan(folderId: string, subPath?: string): Promise<void> {
    return this.requireApiClient('scan').scan(folderId, subPath, this.apiSignal);
  }

  async reloadIgnores(folderId: string): Promise<void> {
    const folder = this.registry.lookupFolder(folderId);
    if (!folder) return;

    const ignores = await this.requireApiClient('reload ignores').fetchIgnores(
      folderId,
      this.apiSignal
    );
    folder.ignores = new FolderIgnores(ignores.ignorePatterns, ignores.expandedPatterns);
  }

  async pauseDevice(deviceId: string): Promise<void> {
    return this.requireApiClient('pause device').pauseDevice(deviceId, this.apiSignal);
  }

  async resumeDevice(deviceId: string): Promise<void> {
    return this.requireApiClient('resume device').resumeDevice(deviceId, this.apiSignal);
  }

  dispose(): void {
    for (const unsubscribe of this.runnerSubscriptions) unsubscribe();
    this.processRunner.dispose();
    this.apiAbort?.abort();
    this.stopApiClients();
    this.dispatcher.removeAllListeners();
  }

  // ==========================================================================
  // State Machine
  // ==========================================================================

  private setState(newState: SupervisorState): void {
    const oldState = this.currentState;
    const action = resolveTransition(oldState, newState);
    logger.debug(`Request to set state: ${oldState} -> ${newState} (${action})`);

    if (action === 'ignore' || action === 'reject') return;

    this.currentState = newState;

    if (action === 'abort') {
      logger.debug('Aborting API clients');
      this.apiAbort?.abort();
      this.stopApiClients();
    }

    this.dispatcher.publish({ type: 'stateChanged', oldState, newState });
  }

  /** Cancels with the connection attempt the current client belongs to */
  private get apiSignal(): AbortSignal | undefined {
    return this.apiAbort?.signal;
  }

  private requireApiClient(operation: string): ApiClient {
    if (!this.apiClient) {
      throw new ServiceNotRunningError(operation);
    }
    return this.apiClient;
  }

  // ==========================================================================
  // Startup
  // ==========================================================================

  private async startClient(): Promise<void> {
    // Only one attempt at a time; a reconnect after a restart supersedes it
    this.apiAbort?.abort();
    const abort = new AbortController();
    this.apiAbort = abort;
    const { signal } = abort;

    try {
      const client = await this.createApiClient(abort);
      const lastEventId = await this.loadStartupData(client, signal);
      this.startWatchers(client, signal, lastEventId);
    } catch (error) {
      // The process died or the state moved on while we were connecting
      if (signal.aborted || isAbortError(error)) {
        logger.debug('Connection attempt cancelled');
        return;
      }

      logger.error(`Error starting service API: ${errorMessage(error)}`);
      this.kill();
      throw error;
    }
  }

  private async createApiClient(abort: AbortController): Promise<ApiClient> {
    const { signal } = abort;
    const { address, apiKey, connectTimeoutMs } = this.settings;

    logger.debug(`Connecting to service API at ${address.href}`);
    const client = await this.apiClientFactory(address, apiKey, connectTimeoutMs, signal);
    signal.throwIfAborted();

    this.apiClient = client;
    this.setState(RUNNING);

    if (this.currentState !== RUNNING) {
      // Refused, the exit was seen before this late "ready"
      this.apiClient = null;
      abort.abort();
      signal.throwIfAborted();
    }
    return client;
  }

  /**
   * Returns the event id live notifications should resume after.
   */
  private async loadStartupData(client: ApiClient, signal: AbortSignal): Promise<number> {
    const snapshot = await loadStartupSnapshot(client, signal);
    signal.throwIfAborted();

    this.registry.replaceDevices(snapshot.devices);
    this.registry.replaceFolders(snapshot.folders);
    this.serviceVersion = snapshot.version;
    this.started = new Date();
    this.dataLoaded = true;

    this.dispatcher.publish({ type: 'dataLoaded' });
    return snapshot.lastEventId;
  }

  private startWatchers(client: ApiClient, signal: AbortSignal, sinceEventId: number): void {
    signal.throwIfAborted();
    if (this.apiClient !== client) {
      throw new Error('API client not set');
    }

    this.stopWatchers();

    const connectionsWatcher = this.connectionsWatcherFactory(client);
    this.connectionsWatcher = connectionsWatcher;
    const connectionsLive = (): boolean => this.connectionsWatcher === connectionsWatcher;
    this.watcherSubscriptions.push(
      connectionsWatcher.on('totalConnectionStatsChanged', (stats) => {
        if (connectionsLive()) this.onTotalConnectionStatsChanged(stats);
      })
    );
    connectionsWatcher.start();

    const eventWatcher = this.eventWatcherFactory(client, sinceEventId);
    this.eventWatcher = eventWatcher;
    const eventsLive = (): boolean => this.eventWatcher === eventWatcher;
    this.watcherSubscriptions.push(
      eventWatcher.on('syncStateChanged', (e) => {
        if (eventsLive()) this.onFolderSyncStateChanged(e);
      }),
      eventWatcher.on('itemStarted', (e) => {
        if (eventsLive()) this.onItemStarted(e);
      }),
      eventWatcher.on('itemFinished', (e) => {
        if (eventsLive()) this.onItemFinished(e);
      }),
      eventWatcher.on('deviceConnected', (e) => {
        if (eventsLive()) this.onDeviceConnected(e);
      }),
      eventWatcher.on('deviceDisconnected', (e) => {
        if (eventsLive()) this.onDeviceDisconnected(e);
      }),
      eventWatcher.on('devicePaused', (e) => {
        if (eventsLive()) this.onDevicePausedChanged(e, true);
      }),
      eventWatcher.on('deviceResumed', (e) => {
        if (eventsLive()) this.onDevicePausedChanged(e, false);
      })
    );
    eventWatcher.start();
  }

  private stopWatchers(): void {
    for (const unsubscribe of this.watcherSubscriptions) unsubscribe();
    this.watcherSubscriptions = [];

    const { connectionsWatcher, eventWatcher } = this;
    this.connectionsWatcher = null;
    this.eventWatcher = null;

    connectionsWatcher?.dispose();
    eventWatcher?.dispose();
  }

  private stopApiClients(): void {
    this.apiClient = null;
    this.stopWatchers();
  }

  // ==========================================================================
  // Process Runner Reactions
  // ==========================================================================

  private onProcessStarting(): void {
    const { settings } = this;
    this.processRunner.configure({
      apiKey: settings.apiKey,
      hostAddress: toHostAddress(settings.address),
      executablePath: settings.executablePath,
      customHomeDir: settings.customHomeDir,
      environmentVariables: settings.environmentVariables,
      denyUpgrade: settings.denyUpgrade,
      runLowPriority: settings.runLowPriority,
      hideDeviceIds: settings.hideDeviceIds,
    });

    const isRestart = this.currentState === RESTARTING;
    this.setState(STARTING);

    // A restart bypasses start(), so reconnect here
    if (isRestart) {
      this.startClient().catch((error: unknown) => {
        logger.error(`Failed to reconnect after service restart: ${errorMessage(error)}`);
      });
    }
  }

  private onProcessStopped(status: ExitStatus): void {
    this.setState(STOPPED);
    if (status === 'error') {
      this.dispatcher.publish({ type: 'processExitedWithError' });
    }
  }

  // ==========================================================================
  // Watcher Notifications
  // ==========================================================================

  private onItemStarted({ folderId, item }: ItemNotification): void {
    const folder = this.registry.lookupFolder(folderId);
    if (!folder) return; // Don't know about it

    folder.addSyncingPath(item);
    this.dispatcher.publish({ type: 'itemStarted', folder, item });
  }

  private onItemFinished({ folderId, item }: ItemNotification): void {
    const folder = this.registry.lookupFolder(folderId);
    if (!folder) return;

    folder.removeSyncingPath(item);
    this.dispatcher.publish({ type: 'itemFinished', folder, item });
  }

  private onDeviceConnected({ deviceId, address }: DeviceConnectedNotification): void {
    const device = this.registry.lookupDevice(deviceId);
    if (!device) {
      logger.warn(
        `Unexpected device connected: ${deviceId}, address ${address}. It was not in the loaded config`
      );
      return;
    }

    device.setConnected(address);
    this.lastConnectivityEvent = new Date();
    this.dispatcher.publish({ type: 'deviceConnected', device });
  }

  private onDeviceDisconnected({ deviceId, error }: DeviceDisconnectedNotification): void {
    const device = this.registry.lookupDevice(deviceId);
    if (!device) {
      logger.warn(
        `Unexpected device disconnected: ${deviceId}, error ${error}. It was not in the loaded config`
      );
      return;
    }

    device.setDisconnected();
    this.lastConnectivityEvent = new Date();
    this.dispatcher.publish({ type: 'deviceDisconnected', device });
  }

  private onDevicePausedChanged({ deviceId }: DeviceNotification, paused: boolean): void {
    const device = this.registry.lookupDevice(deviceId);
    if (!device) {
      logger.warn(`Unexpected device ${paused ? 'paused' : 'resumed'}: ${deviceId}`);
      return;
    }

    device.setPaused(paused);
    if (paused) {
      this.dispatcher.publish({ type: 'devicePaused', device });
    } else {
      this.dispatcher.publish({ type: 'deviceResumed', device });
    }
  }

  private onFolderSyncStateChanged(e: SyncStateChangedNotification): void {
    const folder = this.registry.lookupFolder(e.folderId);
    if (!folder) return;

    folder.syncState = e.syncState;
    this.dispatcher.publish({
      type: 'folderSyncStateChanged',
      folder,
      prevSyncState: e.prevSyncState,
      syncState: e.syncState,
    });
  }

  private onTotalConnectionStatsChanged(stats: ConnectionStats): void {
    this.connectionStats = stats;
    this.dispatcher.publish({ type: 'totalConnectionStatsChanged', stats });
  }
}
