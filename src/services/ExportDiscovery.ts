import { promises as fs } from 'fs';
import type { Dirent } from 'fs';
import path from 'path';
import { Logger } from '../utils/logger';
import { errorMessage } from '../utils/errors';

const SKIPPABLE_DIR_ERRORS = new Set(['EACCES', 'EPERM', 'ENOENT', 'ENOTDIR']);

export interface DiscoveryOptions {
  fileName?: string;
  logger?: Logger;
}

/**
 * Recursively find every export file below rootDir whose name matches
 * `fileName` case-insensitively. Unreadable directories are skipped with a
 * warning. Symlinked directories are not followed.
 *
 * The result is sorted by full path so row order does not depend on the
 * filesystem's traversal order.
 */
export async function findExportFiles(rootDir: string, options: DiscoveryOptions = {}): Promise<string[]> {
  const target = (options.fileName ?? 'messages.json').toLowerCase();
  const logger = options.logger ?? Logger.silent();
  const found: string[] = [];
  const pending: string[] = [rootDir];

  while (pending.length > 0) {
    const dir = pending.pop();
    if (dir === undefined) break;

    let entries: Dirent[];
    try {
      entries = await fs.readdir(dir, { withFileTypes: true });
    } catch (error) {
      if (isSkippable(error)) {
        logger.warn(`⚠️  Skipping unreadable directory ${dir}: ${errorMessage(error)}`);
        continue;
      }
      throw error;
    }

    for (const entry of entries) {
      const fullPath = path.join(dir, entry.name);

      if (entry.isDirectory()) {
        pending.push(fullPath);
      } else if (entry.name.toLowerCase() === target && (await isRegularFile(entry, fullPath))) {
        found.push(fullPath);
      }
    }
  }

  return found.sort((a, b) => (a < b ? -1 : a > b ? 1 : 0));
}

async function isRegularFile(entry: Dirent, fullPath: string): Promise<boolean> {
  if (entry.isFile()) {
    return true;
  }
  if (!entry.isSymbolicLink()) {
    return false;
  }

  try {
    const stats = await fs.stat(fullPath);
    return stats.isFile();
  } catch {
    // Dangling link
    return false;
  }
}

function isSkippable(error: unknown): boolean {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return SKIPPABLE_DIR_ERRORS.has(error.code);
  }
  return false;
}
