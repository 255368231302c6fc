import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';

function resolveHomeDir(): string {
  const homeFromEnv = process.env.HOME;
  if (typeof homeFromEnv === 'string' && homeFromEnv.trim()) {
    return homeFromEnv;
  }
  return os.homedir();
}

function ensureDir(dir: string): string {
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true, mode: 0o700 });
  }
  return dir;
}

/**
 * Directory holding settings.json.
 * Resolution order: VOXEDIT_CONFIG_DIR, $XDG_CONFIG_HOME/voxedit, ~/.config/voxedit
 */
export function getConfigDir(): string {
  const override = process.env.VOXEDIT_CONFIG_DIR;
  if (typeof override === 'string' && override.trim()) {
    return ensureDir(override);
  }

  const xdgConfigHome = process.env.XDG_CONFIG_HOME;
  const baseDir =
    typeof xdgConfigHome === 'string' && xdgConfigHome.trim()
      ? xdgConfigHome
      : path.join(resolveHomeDir(), '.config');

  return ensureDir(path.join(baseDir, 'voxedit'));
}
