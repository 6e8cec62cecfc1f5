#!/usr/bin/env node

/**
 * Syncthing Supervisor CLI
 */

import { program } from 'commander';
import { errorMessage } from './errors.js';
import { logger } from './logger.js';
import { killAllCommand } from './cli/kill-all.js';
import { startCommand } from './cli/start.js';
import { statusCommand } from './cli/status.js';
import { stopCommand } from './cli/stop.js';

program
  .name('syncthing-supervisor')
  .description('Run and monitor a Syncthing instance')
  .version('1.0.0');

program
  .command('start')
  .description('Start the service and supervise it in the foreground')
  .option('--debug', 'Enable debug logging, including service output')
  .option('--executable <path>', 'Service executable to run')
  .option('--address <url>', 'Address for the service GUI/REST listener')
  .option('-q, --quiet', 'Log to the log file only')
  .action(startCommand);

program
  .command('status')
  .description('Print the status of the service as JSON')
  .action(statusCommand);

program.command('stop').description('Ask the running service to shut down').action(stopCommand);

program
  .command('kill-all')
  .description('Kill every running instance of the service executable')
  .action(killAllCommand);

program.parseAsync().catch((error: unknown) => {
  logger.error(errorMessage(error));
  process.exit(1);
});
