/**
 * Supervisor Module
 *
 * Re-exports the supervisor and its domain types.
 */

// Supervisor (state machine + event fan-in)
export {
  Supervisor,
  toHostAddress,
  type SupervisorSettings,
  type SupervisorDependencies,
} from './supervisor.js';

// Lifecycle state
export { SupervisorState, resolveTransition, type TransitionAction } from './state.js';

// Events
export {
  EventDispatcher,
  type SupervisorEvent,
  type SupervisorEventType,
  type SupervisorEventOf,
  type SupervisorEventListener,
} from './events.js';

// Domain
export {
  Device,
  Folder,
  FolderSyncState,
  parseFolderSyncState,
  type ConnectionStats,
  type ServiceVersion,
} from './models.js';
export { FolderIgnores, type IgnoreRule } from './ignores.js';
export { DomainRegistry } from './registry.js';
export { loadStartupSnapshot, resolveFolderPath, type StartupSnapshot } from './startup.js';

// Collaborator contracts
export { TypedEmitter, type Unsubscribe } from './emitter.js';
export type * from './types.js';
