/**
 * Syncthing Supervisor - Wiring
 *
 * Builds a supervisor on the real process runner, REST client and watchers.
 */

import { createApiClient } from './api/create.js';
import { ServiceProcessRunner } from './process/runner.js';
import { Supervisor, type SupervisorSettings } from './supervisor/index.js';
import { createConnectionsWatcher, createEventWatcher } from './watchers/index.js';

export function createSupervisor(settings: SupervisorSettings): Supervisor {
  return new Supervisor(settings, {
    processRunner: new ServiceProcessRunner(),
    apiClientFactory: createApiClient,
    eventWatcherFactory: createEventWatcher,
    connectionsWatcherFactory: createConnectionsWatcher,
  });
}
