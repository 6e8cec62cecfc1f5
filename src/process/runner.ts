/**
 * Service Process Runner
 *
 * Spawns the service executable, forwards its output line by line and turns
 * its exit into `stopped` / `restarted` events for the supervisor.
 */

import { spawn, spawnSync, type ChildProcess } from 'child_process';
import { setPriority } from 'os';
import { basename } from 'path';
import { createInterface } from 'readline';
import { errorMessage } from '../errors.js';
import { logger } from '../logger.js';
import { TypedEmitter } from '../supervisor/emitter.js';
import type {
  ExitStatus,
  ProcessRunner,
  ProcessRunnerEvents,
  ProcessRunnerOptions,
} from '../supervisor/types.js';

// ============================================================================
// Constants
// ============================================================================

/** Exit codes the service uses to ask for a restart (plain / after upgrade) */
export const RESTART_EXIT_CODES: readonly number[] = [3, 4];

/** Nice value for low-priority runs */
const LOW_PRIORITY = 10;

const DEFAULT_EXECUTABLE = 'syncthing';

const DEVICE_ID_PATTERN = /\b([A-Z2-7]{7})(?:-[A-Z2-7]{7}){7}\b/g;

// ============================================================================
// Helpers
// ============================================================================

export function buildServiceArgs(options: ProcessRunnerOptions): string[] {
  const args = [
    'serve',
    '--no-browser',
    '--no-restart',
    `--gui-address=${options.hostAddress}`,
    `--gui-apikey=${options.apiKey}`,
  ];
  if (options.customHomeDir) {
    args.push(`--home=${options.customHomeDir}`);
  }
  return args;
}

export function buildServiceEnv(
  options: ProcessRunnerOptions,
  baseEnv: NodeJS.ProcessEnv
): NodeJS.ProcessEnv {
  const env: NodeJS.ProcessEnv = { ...baseEnv, ...options.environmentVariables };
  if (options.denyUpgrade) {
    env.STNOUPGRADE = '1';
  }
  return env;
}

/**
 * Replace every device id in a log line with its first group.
 */
export function maskDeviceIds(line: string): string {
  return line.replace(DEVICE_ID_PATTERN, '$1');
}

/**
 * Map an exit to what the supervisor is told.
 */
export function classifyExit(
  code: number | null,
  killRequested: boolean
): ExitStatus | 'restart' {
  if (killRequested) return 'normal';
  if (code !== null && RESTART_EXIT_CODES.includes(code)) return 'restart';
  return code === 0 ? 'normal' : 'error';
}

// ============================================================================
// Runner
// ============================================================================

export class ServiceProcessRunner
  extends TypedEmitter<ProcessRunnerEvents>
  implements ProcessRunner
{
  private options: ProcessRunnerOptions | null = null;
  private child: ChildProcess | null = null;
  private killRequested = false;
  private disposed = false;

  configure(options: ProcessRunnerOptions): void {
    this.options = options;
  }

  get isRunning(): boolean {
    return this.child !== null;
  }

  start(): void {
    if (this.disposed) {
      throw new Error('Process runner has been disposed');
    }
    if (this.child) {
      logger.warn('Service process is already running');
      return;
    }

    this.killRequested = false;
    // Listeners call configure() from here
    this.emit('starting');

    const options = this.options;
    if (!options) {
      throw new Error('Process runner was not configured before start');
    }

    const args = buildServiceArgs(options);
    logger.info(`Starting service: ${options.executablePath}`);
    const loggedArgs = args.map((arg) =>
      arg.startsWith('--gui-apikey=') ? '--gui-apikey=***' : arg
    );
    logger.debug(`Service arguments: ${loggedArgs.join(' ')}`);

    const child = spawn(options.executablePath, args, {
      env: buildServiceEnv(options, process.env),
      stdio: ['ignore', 'pipe', 'pipe'],
      windowsHide: true,
    });
    this.child = child;

    child.on('error', (error) => this.onError(child, error));
    child.once('exit', (code, signal) => this.onExit(child, code, signal));

    for (const stream of [child.stdout, child.stderr]) {
      if (!stream) continue;
      createInterface({ input: stream }).on('line', (line) => {
        this.emit('messageLogged', options.hideDeviceIds ? maskDeviceIds(line) : line);
      });
    }

    if (options.runLowPriority && child.pid !== undefined) {
      try {
        setPriority(child.pid, LOW_PRIORITY);
      } catch (error) {
        logger.warn(`Could not lower service priority: ${errorMessage(error)}`);
      }
    }
  }

  kill(): void {
    if (!this.child) return;
    this.killRequested = true;
    logger.info('Killing service process');
    this.child.kill();
  }

  /**
   * Kill every process on this machine running the service executable,
   * including ones this runner did not start.
   */
  killAllInstances(): void {
    const name = basename(this.options?.executablePath ?? DEFAULT_EXECUTABLE);
    const isWindows = process.platform === 'win32';
    const command = isWindows ? 'taskkill' : 'pkill';
    const args = isWindows
      ? ['/F', '/IM', name.endsWith('.exe') ? name : `${name}.exe`]
      : ['-x', name];

    logger.info(`Killing all instances of ${name}`);
    const result = spawnSync(command, args, { stdio: 'ignore' });
    if (result.error) {
      logger.error(`Failed to run ${command}: ${result.error.message}`);
    } else if (result.status !== 0) {
      logger.info(`No running instances of ${name} were killed`);
    }
  }

  dispose(): void {
    if (this.disposed) return;
    this.disposed = true;
    this.kill();
    this.removeAllListeners();
  }

  // ==========================================================================
  // Child Events
  // ==========================================================================

  private onError(child: ChildProcess, error: Error): void {
    // Spawn failures never produce an exit event
    if (child.pid !== undefined) {
      logger.warn(`Service process error: ${error.message}`);
      return;
    }
    if (this.child !== child) return;

    this.child = null;
    logger.error(`Failed to start service: ${error.message}`);
    this.emit('stopped', 'error');
  }

  private onExit(child: ChildProcess, code: number | null, signal: NodeJS.Signals | null): void {
    if (this.child !== child) return;
    this.child = null;

    const outcome = classifyExit(code, this.killRequested);
    logger.info(`Service exited (${signal ? `signal ${signal}` : `code ${code}`})`);

    if (outcome === 'restart') {
      logger.info('Service asked to be restarted');
      this.emit('restarted');
      if (!this.disposed) this.start();
      return;
    }
    this.emit('stopped', outcome);
  }
}
