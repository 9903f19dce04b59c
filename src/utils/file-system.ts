/**
 * File system helpers used by the config loader.
 */
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';

/**
 * Read a file and return its contents as a string.
 */
export async function readFile(filePath: string): Promise<string> {
  return fs.promises.readFile(filePath, 'utf-8');
}

/**
 * Check if a file exists.
 */
export async function fileExists(filePath: string): Promise<boolean> {
  try {
    await fs.promises.access(filePath, fs.constants.F_OK);
    return true;
  } catch { /* file not found */ }
  return false;
}

/**
 * Expand a leading `~` to the user's home directory.
 */
export function expandHome(filePath: string, home: string = os.homedir()): string {
  if (filePath === '~') return home;
  if (filePath.startsWith('~/') || filePath.startsWith('~\\')) {
    return path.join(home, filePath.slice(2));
  }
  return filePath;
}

/**
 * Replace the home directory prefix with `~` for display.
 */
export function collapseHome(filePath: string, home: string = os.homedir()): string {
  if (filePath === home) return '~';
  if (filePath.startsWith(home + path.sep)) {
    return `~${filePath.slice(home.length)}`;
  }
  return filePath;
}
