/**
 * Syncthing Supervisor - Cross-platform Path Helpers
 *
 * Provides consistent paths across macOS, Linux, and Windows:
 * - macOS/Linux: Uses XDG Base Directory specification
 * - Windows: Uses %APPDATA% and %LOCALAPPDATA%
 */

import { join } from 'path';
import { xdgConfig, xdgState } from 'xdg-basedir';

const APP_DIR_NAME = 'syncthing-supervisor';

/**
 * Get the configuration directory path.
 * - macOS/Linux: ~/.config/syncthing-supervisor
 * - Windows: %APPDATA%\syncthing-supervisor
 */
export function getConfigDir(): string {
  if (process.platform === 'win32') {
    const appData = process.env.APPDATA;
    if (!appData) {
      throw new Error('APPDATA environment variable is not set');
    }
    return join(appData, APP_DIR_NAME);
  }

  if (!xdgConfig) {
    throw new Error('Could not determine XDG config directory');
  }
  return join(xdgConfig, APP_DIR_NAME);
}

/**
 * Get the state directory path (for logs).
 * - macOS/Linux: ~/.local/state/syncthing-supervisor
 * - Windows: %LOCALAPPDATA%\syncthing-supervisor
 */
export function getStateDir(): string {
  if (process.platform === 'win32') {
    const localAppData = process.env.LOCALAPPDATA;
    if (!localAppData) {
      throw new Error('LOCALAPPDATA environment variable is not set');
    }
    return join(localAppData, APP_DIR_NAME);
  }

  if (!xdgState) {
    throw new Error('Could not determine XDG state directory');
  }
  return join(xdgState, APP_DIR_NAME);
}
