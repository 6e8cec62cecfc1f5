/**
 * Syncthing Supervisor - Logger
 *
 * Logs to the console by default. The start command adds a file transport
 * under the state directory; in daemon-style runs console logging can be
 * switched off.
 */

import { existsSync, mkdirSync } from 'fs';
import { join } from 'path';
import winston from 'winston';
import { getStateDir } from './paths.js';

export const LOG_FILE_NAME = 'supervisor.log';

export const logger = winston.createLogger({
  level: 'info',
  format: winston.format.combine(winston.format.timestamp(), winston.format.json()),
  transports: [
    new winston.transports.Console({
      format: winston.format.combine(
        winston.format.colorize(),
        winston.format.printf(({ level, message }) => `${level}: ${message}`)
      ),
    }),
  ],
});

/**
 * Add a file transport writing to <state dir>/supervisor.log.
 * Returns the log file path.
 */
export function enableFileLogging(stateDir: string = getStateDir()): string {
  if (!existsSync(stateDir)) {
    mkdirSync(stateDir, { recursive: true });
  }
  const filename = join(stateDir, LOG_FILE_NAME);
  logger.add(new winston.transports.File({ filename }));
  return filename;
}

/**
 * Disable console logging (for background runs)
 */
export function disableConsoleLogging(): void {
  logger.transports.forEach((transport) => {
    if (transport instanceof winston.transports.Console) {
      transport.silent = true;
    }
  });
}

/**
 * Enable debug level logging
 */
export function enableDebug(): void {
  logger.level = 'debug';
}

/**
 * Check if debug logging is enabled
 */
export function isDebugEnabled(): boolean {
  return logger.level === 'debug';
}
