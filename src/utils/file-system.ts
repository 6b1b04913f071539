/**
 * File system helpers used by the loaders, workspace and config layer.
 */
import * as fs from 'node:fs';
import * as path from 'node:path';
import fg from 'fast-glob';

/**
 * Read a file and return its contents as a string.
 */
export async function readFile(filePath: string): Promise<string> {
  return fs.promises.readFile(filePath, 'utf-8');
}

/**
 * Read a file synchronously. Document loading is synchronous end to end.
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
  } catch { /* file not found */ }
  return false;
}

/**
 * Find document files matching glob patterns.
 */
export async function globFiles(
  patterns: string | string[],
  options: {
    cwd?: string;
    ignore?: string[];
  } = {}
): Promise<string[]> {
  const matches = await fg(patterns, {
    cwd: options.cwd || process.cwd(),
    ignore: options.ignore || ['**/node_modules/**'],
    absolute: true,
    onlyFiles: true,
  });
  return matches.sort();
}

/**
 * Normalize and resolve a path relative to a base.
 */
export function resolvePath(basePath: string, ...segments: string[]): string {
  return path.resolve(basePath, ...segments);
}

/**
 * Get the relative path from one path to another.
 */
export function relativePath(from: string, to: string): string {
  return path.relative(from, to);
}

/**
 * Get the lower-cased extension of a path, without the leading dot.
 */
export function extensionOf(filePath: string): string {
  return path.extname(filePath).slice(1).toLowerCase();
}

/**
 * Join path segments. Unlike resolvePath, a leading `/` on a later segment does not reset the base.
 */
export function joinPath(...segments: string[]): string {
  return path.join(...segments);
}

/**
 * Split a platform path into its segments.
 */
export function splitPath(filePath: string): string[] {
  return filePath.split(path.sep).filter((segment) => segment.length > 0);
}

/**
 * Check if a path is absolute.
 */
export function isAbsolute(filePath: string): boolean {
  return path.isAbsolute(filePath);
}
