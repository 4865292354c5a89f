/**
 * File Utilities
 *
 * Utility functions for file system operations.
 */

import * as fs from 'fs';
import * as path from 'path';
import { ERROR_MESSAGES } from '../constants/errors';
import { SceneGraphErrorFactory } from '../errors';

/**
 * Check if a path is a directory
 */
export function isDirectory(filePath: string): boolean {
  try {
    return fs.statSync(filePath).isDirectory();
  } catch {
    return false;
  }
}

/**
 * Check if a path is a regular file
 */
export function isFile(filePath: string): boolean {
  try {
    return fs.statSync(filePath).isFile();
  } catch {
    return false;
  }
}

/**
 * Check if path exists
 */
export function pathExists(filePath: string): boolean {
  try {
    fs.accessSync(filePath, fs.constants.F_OK);
    return true;
  } catch {
    return false;
  }
}

/**
 * Creates a directory and its parents. Returns true when it was created.
 */
export function ensureDirectory(dirPath: string): boolean {
  if (isDirectory(dirPath)) {
    return false;
  }
  try {
    fs.mkdirSync(dirPath, { recursive: true });
    return true;
  } catch (error) {
    throw SceneGraphErrorFactory.ioError(
      `${ERROR_MESSAGES.MKDIR_FAILED}: ${dirPath}`,
      dirPath,
      'mkdir',
      { cause: error instanceof Error ? error.message : String(error) }
    );
  }
}

/**
 * Writes binary or text content, wrapping failures in SceneGraphIoError
 */
export function writeFileChecked(filePath: string, content: Uint8Array | string): void {
  try {
    fs.writeFileSync(filePath, content);
  } catch (error) {
    throw SceneGraphErrorFactory.ioError(
      `${ERROR_MESSAGES.WRITE_FAILED}: ${filePath}`,
      filePath,
      'write',
      { cause: error instanceof Error ? error.message : String(error) }
    );
  }
}

/**
 * Get basename of file without extension
 * Example: "/path/to/helmet.glb" -> "helmet"
 */
export function getBasenameWithoutExt(filePath: string): string {
  const basename = path.basename(filePath);
  return basename.replace(/\.[^/.]+$/, '');
}

/**
 * Joins a relative reference onto a base directory. Returns null when the
 * reference is absolute or resolves outside the base directory.
 */
export function resolveContainedPath(baseDir: string, relativeRef: string): string | null {
  if (relativeRef.length === 0 || path.isAbsolute(relativeRef) || path.win32.isAbsolute(relativeRef)) {
    return null;
  }
  const base = path.resolve(baseDir);
  const resolved = path.resolve(base, relativeRef.replace(/\\/g, '/'));
  const relative = path.relative(base, resolved);
  if (relative.length === 0 || relative === '..' || relative.startsWith(`..${path.sep}`) || path.isAbsolute(relative)) {
    return null;
  }
  return resolved;
}
