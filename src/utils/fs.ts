/**
 * File System Utilities
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { createLogger } from './logger.js';

const logger = createLogger('FS');

/**
 * Check if a path exists
 */
export async function pathExists(target: string): Promise<boolean> {
  try {
    await fs.access(target);
    return true;
  } catch {
    return false;
  }
}

/**
 * Ensure a directory exists, creating it if necessary
 */
export async function ensureDirectory(dir: string): Promise<void> {
  await fs.mkdir(dir, { recursive: true });
}

/**
 * Check whether a directory has no entries; a missing directory counts as empty
 */
export async function isDirectoryEmpty(dir: string): Promise<boolean> {
  try {
    const entries = await fs.readdir(dir);
    return entries.length === 0;
  } catch (e) {
    logger.debug('Failed to read directory', { dir, error: String(e) });
    return true;
  }
}

/**
 * Collect files matching extensions recursively.
 * Extensions match case-sensitively, the way a shell glob does.
 * @param maxDepth 0 lists only the top level of searchDir
 */
export async function collectFiles(
  searchDir: string,
  extensions: Set<string>,
  maxDepth: number = 10
): Promise<string[]> {
  const results: string[] = [];

  async function walk(dir: string, depth: number) {
    if (depth > maxDepth) return;

    try {
      const entries = await fs.readdir(dir, { withFileTypes: true });
      for (const entry of entries) {
        const fullPath = path.join(dir, entry.name);
        if (entry.isDirectory()) {
          await walk(fullPath, depth + 1);
        } else if (entry.isFile()) {
          const ext = path.extname(entry.name);
          if (extensions.has(ext)) {
            results.push(fullPath);
          }
        }
      }
    } catch (e) {
      logger.debug('Failed to walk directory', { dir, error: String(e) });
    }
  }

  await walk(searchDir, 0);
  return results.sort();
}

/**
 * Copy file with directory creation
 */
export async function copyFile(src: string, dest: string): Promise<void> {
  const destDir = path.dirname(dest);
  await ensureDirectory(destDir);
  await fs.copyFile(src, dest);
}
