/**
 * File Operations
 * 
 * Existence probes and teardown helpers for the file cache.
 */

import { statSync } from 'node:fs';
import { rename, rm, stat, unlink } from 'node:fs/promises';
import { isErrnoException } from './guards.js';

/**
 * Check synchronously whether a regular file exists at the path
 */
export function fileExistsSync(filePath: string): boolean {
  try {
    return statSync(filePath).isFile();
  } catch {
    return false;
  }
}

/**
 * Check whether anything exists at the path
 */
export async function pathExists(targetPath: string): Promise<boolean> {
  try {
    await stat(targetPath);
    return true;
  } catch (error) {
    if (isErrnoException(error) && error.code === 'ENOENT') {
      return false;
    }
    throw error;
  }
}

/**
 * Check whether a directory exists at the path
 */
export async function isDirectory(targetPath: string): Promise<boolean> {
  try {
    return (await stat(targetPath)).isDirectory();
  } catch (error) {
    if (isErrnoException(error) && error.code === 'ENOENT') {
      return false;
    }
    throw error;
  }
}

/**
 * Remove a single file
 */
export async function removeFile(filePath: string): Promise<void> {
  await unlink(filePath);
}

/**
 * Remove a directory and everything beneath it
 */
export async function removeDirRecursive(dirPath: string): Promise<void> {
  await rm(dirPath, { recursive: true, force: true });
}

/**
 * Rename a file or directory in place
 */
export async function renamePath(source: string, destination: string): Promise<void> {
  await rename(source, destination);
}
