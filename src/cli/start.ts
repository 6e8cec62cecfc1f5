/**
 * Syncthing Supervisor - Start Command
 *
 * Runs the service under the supervisor in the foreground until it exits or
 * the user interrupts.
 */

import { type Config, loadConfig, parseConfig, toSupervisorSettings } from '../config.js';
import { createSupervisor } from '../create.js';
import { errorMessage } from '../errors.js';
import {
  disableConsoleLogging,
  enableDebug,
  enableFileLogging,
  isDebugEnabled,
  logger,
} from '../logger.js';
import { type Supervisor, type SupervisorEvent, SupervisorState } from '../supervisor/index.js';

// ============================================================================
// Types
// ============================================================================

export interface StartOptions {
  debug?: boolean;
  executable?: string;
  address?: string;
  quiet?: boolean;
}

/** Time a graceful stop may take before the service is killed */
const STOP_TIMEOUT_MS = 10_000;

// ============================================================================
// Event Logging
// ============================================================================

export function formatBytes(bytes: number): string {
  if (bytes < 1024) return `${Math.round(bytes)} B`;
  if (bytes < 1024 * 1024) return `${(bytes / 1024).toFixed(1)} KiB`;
  return `${(bytes / (1024 * 1024)).toFixed(1)} MiB`;
}

/**
 * One info line for a supervisor event, or null for the chatty ones.
 */
export function describeEvent(event: SupervisorEvent): string | null {
  switch (event.type) {
    case 'stateChanged':
      return `Service state: ${event.oldState} -> ${event.newState}`;
    case 'dataLoaded':
      return 'Loaded folders and devices from the service';
    case 'processExitedWithError':
      return 'Service exited with an error';
    case 'deviceConnected':
      return `Device connected: ${event.device.name} (${event.device.address ?? 'unknown address'})`;
    case 'deviceDisconnected':
      return `Device disconnected: ${event.device.name}`;
    case 'devicePaused':
      return `Device paused: ${event.device.name}`;
    case 'deviceResumed':
      return `Device resumed: ${event.device.name}`;
    case 'folderSyncStateChanged':
      return `Folder ${event.folder.label}: ${event.prevSyncState} -> ${event.syncState}`;
    case 'itemStarted':
    case 'itemFinished':
    case 'totalConnectionStatsChanged':
    case 'messageLogged':
      return null;
  }
}

function logEvents(supervisor: Supervisor): void {
  supervisor.onAny((event) => {
    const line = describeEvent(event);
    if (line) {
      logger.info(line);
      return;
    }
    if (!isDebugEnabled()) return;

    switch (event.type) {
      case 'messageLogged':
        logger.debug(`[service] ${event.message}`);
        break;
      case 'itemStarted':
        logger.debug(`Syncing ${event.folder.label}/${event.item}`);
        break;
      case 'itemFinished':
        logger.debug(`Synced ${event.folder.label}/${event.item}`);
        break;
      case 'totalConnectionStatsChanged':
        logger.debug(
          `Transfer: in ${formatBytes(event.stats.inBytesPerSecond)}/s, ` +
            `out ${formatBytes(event.stats.outBytesPerSecond)}/s`
        );
        break;
    }
  });
}

// ============================================================================
// Lifecycle
// ============================================================================

function waitForStopped(supervisor: Supervisor): Promise<void> {
  if (supervisor.state === SupervisorState.STOPPED) return Promise.resolve();
  return new Promise<void>((resolve) => {
    const unsubscribe = supervisor.on('stateChanged', (event) => {
      if (event.newState === SupervisorState.STOPPED) {
        unsubscribe();
        resolve();
      }
    });
  });
}

/**
 * Ask the service to shut down, killing it if that fails or takes too long.
 * Anything short of Running is killed straight away.
 */
export async function stopGracefully(
  supervisor: Supervisor,
  timeoutMs: number = STOP_TIMEOUT_MS
): Promise<void> {
  const stopped = waitForStopped(supervisor);

  if (supervisor.state !== SupervisorState.RUNNING) {
    supervisor.kill();
    return stopped;
  }

  const forceKill = setTimeout(() => {
    logger.warn(`Service did not stop within ${timeoutMs / 1000}s, killing it`);
    supervisor.kill();
  }, timeoutMs);

  try {
    await supervisor.stop();
  } catch (error) {
    logger.warn(`Graceful stop failed, killing service: ${errorMessage(error)}`);
    supervisor.kill();
  }

  await stopped;
  clearTimeout(forceKill);
}

/**
 * Config file values with the command-line overrides applied on top.
 */
export function resolveConfig(options: StartOptions, config: Config = loadConfig()): Config {
  return parseConfig({
    ...config,
    executable_path: options.executable ?? config.executable_path,
    address: options.address ?? config.address,
  });
}

// ============================================================================
// CLI Command
// ============================================================================

export async function startCommand(options: StartOptions): Promise<void> {
  if (options.debug) {
    enableDebug();
  }
  if (options.quiet) {
    disableConsoleLogging();
  }
  const logFile = enableFileLogging();
  logger.debug(`Logging to ${logFile}`);

  let config: Config;
  try {
    config = resolveConfig(options);
  } catch (error) {
    logger.error(errorMessage(error));
    process.exit(1);
  }

  const supervisor = createSupervisor(toSupervisorSettings(config));
  logEvents(supervisor);

  let shuttingDown = false;
  let exitedWithError = false;

  const finish = (code: number): never => {
    shuttingDown = true;
    supervisor.dispose();
    process.exit(code);
  };

  const shutdown = (reason: string): void => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info(`${reason}, shutting down...`);
    stopGracefully(supervisor)
      .then(() => finish(0))
      .catch((error: unknown) => {
        logger.error(`Shutdown failed: ${errorMessage(error)}`);
        finish(1);
      });
  };

  // Global crash handlers - log errors and kill the service before exit
  process.on('uncaughtException', (error) => {
    logger.error(`Uncaught exception: ${error.message}`);
    if (error.stack) {
      logger.error(error.stack);
    }
    finish(1);
  });

  process.on('unhandledRejection', (reason) => {
    logger.error(`Unhandled rejection: ${errorMessage(reason)}`);
    if (reason instanceof Error && reason.stack) {
      logger.error(reason.stack);
    }
    finish(1);
  });

  process.once('SIGINT', () => shutdown('Interrupted'));
  process.once('SIGTERM', () => shutdown('SIGTERM received'));

  // The service went away on its own
  supervisor.on('processExitedWithError', () => {
    exitedWithError = true;
  });
  supervisor.on('stateChanged', (event) => {
    if (event.newState !== SupervisorState.STOPPED || shuttingDown) return;
    // processExitedWithError is published right after the state change
    setImmediate(() => {
      if (shuttingDown) return;
      logger.info('Service stopped');
      finish(exitedWithError ? 1 : 0);
    });
  });

  try {
    await supervisor.start();
  } catch (error) {
    logger.error(`Failed to start service: ${errorMessage(error)}`);
    finish(1);
  }

  if (supervisor.version) {
    logger.info(`Supervising ${supervisor.version.longVersion}`);
  }
}
