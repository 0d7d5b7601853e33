/**
 * Platform paths
 *
 * Resolves the platform-appropriate config directory that holds the
 * credentials, project bindings and issue cache.
 */

import { platform as osPlatform, homedir } from 'os';
import { join } from 'path';
import { mkdir } from 'fs/promises';

export const APP_NAME = 'jira-git-issue';

/**
 * Get the platform-appropriate base config directory
 */
export function getConfigBaseDir(
  platform: NodeJS.Platform = osPlatform(),
  env: NodeJS.ProcessEnv = process.env,
  home: string = homedir()
): string {
  switch (platform) {
    case 'win32':
      return env.APPDATA || join(home, 'AppData', 'Roaming');
    case 'darwin':
      return join(home, 'Library', 'Application Support');
    case 'linux':
      return env.XDG_CONFIG_HOME || join(home, '.config');
    default:
      return join(home, '.config');
  }
}

/**
 * Get the app-specific config directory
 *
 * @param appName - Subdirectory under the base config dir
 */
export function getAppConfigDir(appName: string = APP_NAME): string {
  return join(getConfigBaseDir(), appName);
}

/**
 * Create the config directory if needed. Owner-only, since it holds API keys.
 */
export async function ensureConfigDir(dir: string): Promise<string> {
  await mkdir(dir, { recursive: true, mode: 0o700 });
  return dir;
}
