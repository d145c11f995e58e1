import os from 'os';
import path from 'path';

export const APP_NAME = 'image-triage';

/**
 * getUserDataPath(): string
 *
 * CONTRACT:
 *   Inputs: none (reads IMAGE_TRIAGE_CONFIG_DIR, process.platform, LOCALAPPDATA)
 *
 *   Outputs:
 *     - absolute path of the per-user configuration directory
 *
 *   Invariants:
 *     - IMAGE_TRIAGE_CONFIG_DIR, when non-empty, wins over platform defaults
 *     - darwin: ~/Library/Application Support/image-triage
 *     - win32: %LOCALAPPDATA%\image-triage (falls back to ~/AppData/Local)
 *     - everything else: $XDG_CONFIG_HOME/image-triage or ~/.config/image-triage
 *     - Directory may not exist yet (caller must create)
 */
export function getUserDataPath(): string {
  const override = process.env.IMAGE_TRIAGE_CONFIG_DIR;
  if (override && override.trim().length > 0) {
    return path.resolve(override);
  }

  const home = os.homedir();
  switch (process.platform) {
    case 'darwin':
      return path.join(home, 'Library', 'Application Support', APP_NAME);
    case 'win32':
      return path.join(process.env.LOCALAPPDATA ?? path.join(home, 'AppData', 'Local'), APP_NAME);
    default:
      return path.join(process.env.XDG_CONFIG_HOME ?? path.join(home, '.config'), APP_NAME);
  }
}

export function getDefaultLogDir(): string {
  return path.join(getUserDataPath(), 'logs');
}

export function getDefaultCacheDir(): string {
  return path.join(getUserDataPath(), 'cache');
}
