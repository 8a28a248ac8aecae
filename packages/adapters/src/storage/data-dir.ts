import os from 'node:os';
import path from 'node:path';

export const APP_DIR_NAME = 'linetest';
export const LOG_EXTENSIONS = ['.ltst', '.ltest'] as const;

type Env = Record<string, string | undefined>;

/** Per-user local data directory, the way each desktop platform lays it out. */
export function localDataDir(
  platform: NodeJS.Platform = process.platform,
  env: Env = process.env,
  home: string = os.homedir(),
): string {
  switch (platform) {
    case 'win32':
      return env['LOCALAPPDATA'] || path.win32.join(home, 'AppData', 'Local');
    case 'darwin':
      return path.posix.join(home, 'Library', 'Application Support');
    default:
      return env['XDG_DATA_HOME'] || path.posix.join(home, '.local', 'share');
  }
}

export function getDataDir(
  platform: NodeJS.Platform = process.platform,
  env: Env = process.env,
  home: string = os.homedir(),
): string {
  const pathApi = platform === 'win32' ? path.win32 : path.posix;
  return pathApi.join(localDataDir(platform, env, home), APP_DIR_NAME);
}

/** `2026-10-19-14h5m.ltst`, local time, fields not zero padded. */
export function defaultLogFileName(now: Date = new Date()): string {
  return `${now.getFullYear()}-${now.getMonth() + 1}-${now.getDate()}-${now.getHours()}h${now.getMinutes()}m.ltst`;
}

export function isLogFile(fileName: string): boolean {
  return LOG_EXTENSIONS.some((ext) => fileName.endsWith(ext));
}
