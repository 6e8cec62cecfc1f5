/**
 * Supervisor Domain Models
 *
 * Devices and folders known to the supervised service. Instances are built
 * during the startup snapshot load and mutated in place by the supervisor as
 * live notifications arrive.
 */

import { FolderIgnores } from './ignores.js';

// ============================================================================
// Folder Sync State
// ============================================================================

export const FolderSyncState = {
  IDLE: 'idle',
  SCANNING: 'scanning',
  SYNCING: 'syncing',
  ERROR: 'error',
  UNKNOWN: 'unknown',
} as const;
export type FolderSyncState = (typeof FolderSyncState)[keyof typeof FolderSyncState];

/** Raw folder states reported by the service, folded into FolderSyncState */
const RAW_SYNC_STATES: Record<string, FolderSyncState> = {
  idle: FolderSyncState.IDLE,
  scanning: FolderSyncState.SCANNING,
  'scan-waiting': FolderSyncState.SCANNING,
  syncing: FolderSyncState.SYNCING,
  'sync-waiting': FolderSyncState.SYNCING,
  'sync-preparing': FolderSyncState.SYNCING,
  cleaning: FolderSyncState.SYNCING,
  'clean-waiting': FolderSyncState.SYNCING,
  error: FolderSyncState.ERROR,
};

export function parseFolderSyncState(raw: string): FolderSyncState {
  return Object.hasOwn(RAW_SYNC_STATES, raw) ? RAW_SYNC_STATES[raw] : FolderSyncState.UNKNOWN;
}

// ============================================================================
// Device
// ============================================================================

export class Device {
  readonly deviceId: string;
  readonly name: string;
  private connectedAddress: string | null = null;
  private pausedFlag = false;

  constructor(deviceId: string, name: string) {
    this.deviceId = deviceId;
    this.name = name;
  }

  get isConnected(): boolean {
    return this.connectedAddress !== null;
  }

  /** Remote address while connected, null otherwise */
  get address(): string | null {
    return this.connectedAddress;
  }

  get paused(): boolean {
    return this.pausedFlag;
  }

  setConnected(address: string): void {
    this.connectedAddress = address;
  }

  setDisconnected(): void {
    this.connectedAddress = null;
  }

  setPaused(paused: boolean): void {
    this.pausedFlag = paused;
  }
}

// ============================================================================
// Folder
// ============================================================================

export class Folder {
  readonly folderId: string;
  readonly label: string;
  /** Absolute path on disk, with any leading ~ already resolved */
  readonly path: string;
  ignores: FolderIgnores;
  syncState: FolderSyncState = FolderSyncState.IDLE;
  private readonly syncingPaths = new Set<string>();

  constructor(folderId: string, label: string, path: string, ignores: FolderIgnores) {
    this.folderId = folderId;
    this.label = label;
    this.path = path;
    this.ignores = ignores;
  }

  addSyncingPath(item: string): void {
    this.syncingPaths.add(item);
  }

  removeSyncingPath(item: string): void {
    this.syncingPaths.delete(item);
  }

  isSyncingPath(item: string): boolean {
    return this.syncingPaths.has(item);
  }

  getSyncingPaths(): string[] {
    return [...this.syncingPaths];
  }
}

// ============================================================================
// Connection Stats & Version
// ============================================================================

export interface ConnectionStats {
  readonly inBytesTotal: number;
  readonly outBytesTotal: number;
  readonly inBytesPerSecond: number;
  readonly outBytesPerSecond: number;
}

export interface ServiceVersion {
  /** e.g. "v1.27.2" */
  version: string;
  longVersion: string;
  os: string;
  arch: string;
}
