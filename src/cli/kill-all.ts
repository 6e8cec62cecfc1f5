/**
 * Kill-All Command
 */

import { loadConfig } from '../config.js';
import { ServiceProcessRunner } from '../process/runner.js';
import { toHostAddress } from '../supervisor/index.js';

/**
 * Kill every running instance of the configured service executable.
 */
export function killAllCommand(): void {
  const config = loadConfig();
  const runner = new ServiceProcessRunner();
  runner.configure({
    apiKey: config.api_key,
    hostAddress: toHostAddress(new URL(config.address)),
    executablePath: config.executable_path,
    customHomeDir: config.custom_home_dir,
    environmentVariables: config.environment_variables,
    denyUpgrade: config.deny_upgrade,
    runLowPriority: config.run_low_priority,
    hideDeviceIds: config.hide_device_ids,
  });
  runner.killAllInstances();
  runner.dispose();
}
