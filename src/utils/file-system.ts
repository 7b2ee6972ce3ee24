/**
 * File system helpers used by the config loader and the source introspector.
 */
import * as fs from 'node:fs';

/**
 * Read a file and return its contents as a string.
 */
export async function readFile(filePath: string): Promise<string> {
  return fs.promises.readFile(filePath, 'utf-8');
}

/**
 * Read a file synchronously.
 */
export function readFileSync(filePath: string): string {
  return fs.readFileSync(filePath, 'utf-8');
}

/**
 * Check if a file exists.
 */
export async function fileExists(filePath: string): Promise<boolean> {
  try {
    await fs.promises.access(filePath, fs.constants.F_OK);
    return true;
  } catch {
    return false;
  }
}

/**
 * Check if a file exists (sync).
 */
export function fileExistsSync(filePath: string): boolean {
  return fs.existsSync(filePath);
}
