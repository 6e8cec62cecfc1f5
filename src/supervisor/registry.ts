/**
 * Domain Registry
 *
 * Folder and device lookups for the supervisor. Each map is replaced
 * wholesale on a (re)load by swapping the reference, so a reader holding the
 * old map keeps a consistent view. Entries are mutated in place afterwards.
 */

import type { Device, Folder } from './models.js';

export class DomainRegistry {
  private folders: ReadonlyMap<string, Folder> = new Map();
  private devices: ReadonlyMap<string, Device> = new Map();

  lookupFolder(folderId: string): Folder | undefined {
    return this.folders.get(folderId);
  }

  lookupDevice(deviceId: string): Device | undefined {
    return this.devices.get(deviceId);
  }

  /** Snapshot of all folders; later reloads do not affect the returned array */
  allFolders(): Folder[] {
    return [...this.folders.values()];
  }

  /** Snapshot of all devices; later reloads do not affect the returned array */
  allDevices(): Device[] {
    return [...this.devices.values()];
  }

  replaceFolders(folders: Iterable<Folder>): void {
    this.folders = new Map(
      [...folders].map((folder): [string, Folder] => [folder.folderId, folder])
    );
  }

  replaceDevices(devices: Iterable<Device>): void {
    this.devices = new Map(
      [...devices].map((device): [string, Device] => [device.deviceId, device])
    );
  }
}
