/**
 * Locating the database file: explicit path, then $THINGSDB, then the
 * app's default location.
 */

import { closeSync, existsSync, openSync, readSync, readdirSync, statSync } from 'node:fs';
import { homedir } from 'node:os';
import { join } from 'node:path';

export const DATABASE_PATH_ENV = 'THINGSDB';

export const DEFAULT_FILE_ROOT = join(
  homedir(), 'Library', 'Group Containers', 'JLMPQHK86H.com.culturedcode.ThingsMac',
);

const DATABASE_BUNDLE = 'Things Database.thingsdatabase';
const DATABASE_FILE = 'main.sqlite';
const DATA_DIR_PREFIX = 'ThingsData-';
const MOVED_MARKER = 'Your database file has been moved there';
const MARKER_PROBE_BYTES = 256;

/**
 * Default database path under `fileRoot`. Since the app's 2023 storage
 * change the bundle lives in a `ThingsData-*` directory and a plain file is
 * left at the old bundle path.
 */
export function getDefaultDbPath(fileRoot: string = DEFAULT_FILE_ROOT): string {
  let root = fileRoot;
  const legacyBundle = join(fileRoot, DATABASE_BUNDLE);

  if (existsSync(legacyBundle) && statSync(legacyBundle).isFile()) {
    const dataDirs = readdirSync(fileRoot).filter(name => name.startsWith(DATA_DIR_PREFIX)).sort();
    const latest = dataDirs[dataDirs.length - 1];
    if (latest) root = join(fileRoot, latest);
  }

  return join(root, DATABASE_BUNDLE, DATABASE_FILE);
}

function isFsErrorCode(err: unknown, codes: readonly string[]): boolean {
  return err instanceof Error && 'code' in err && typeof err.code === 'string' && codes.includes(err.code);
}

/** Whether the file at `path` is the one-line note the app leaves after moving its database */
export function isMovedMarker(path: string): boolean {
  let fd: number;
  try {
    fd = openSync(path, 'r');
  } catch (err: unknown) {
    if (isFsErrorCode(err, ['ENOENT', 'EACCES', 'EPERM', 'EISDIR'])) return false;
    throw err;
  }

  try {
    const buffer = Buffer.alloc(MARKER_PROBE_BYTES);
    const bytesRead = readSync(fd, buffer, 0, MARKER_PROBE_BYTES, 0);
    const firstLine = buffer.subarray(0, bytesRead).toString('utf8').split('\n')[0] ?? '';
    return firstLine.includes(MOVED_MARKER);
  } finally {
    closeSync(fd);
  }
}

export interface ResolveDbPathOptions {
  /** Explicit path, e.g. from a --database flag */
  filepath?: string;
  env?: NodeJS.ProcessEnv;
  fileRoot?: string;
}

/** Pick the database file to open, following a moved-database marker */
export function resolveDatabasePath(options: ResolveDbPathOptions = {}): string {
  const env = options.env ?? process.env;
  const defaultPath = getDefaultDbPath(options.fileRoot);
  const path = options.filepath || env[DATABASE_PATH_ENV] || defaultPath;

  return isMovedMarker(path) ? defaultPath : path;
}
