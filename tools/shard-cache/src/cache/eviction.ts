/**
 * Size-bounded LRU eviction over a cache directory.
 *
 * The directory itself is the index: every sweep walks the tree, and files
 * are ordered by a recency key taken from their stat timestamps. Files that
 * disappear between the walk and the delete (another process, a parallel
 * sweep) are skipped silently.
 */
import type { Dirent, Stats } from 'node:fs';
import * as fsPromises from 'node:fs/promises';
import * as path from 'node:path';
import { errorMessage, isNotFoundError } from '../errors.js';
import { silentLogger, type Logger } from '../logger.js';
import type { CacheEntry, RecencyKey, SweepReport } from '../types.js';

export const DEFAULT_SWEEP_INTERVAL_MS = 30_000;

/** Creation (inode change) time, the default recency key. */
export const byChangeTime: RecencyKey = (entry) => entry.ctimeMs;
export const byAccessTime: RecencyKey = (entry) => entry.atimeMs;
export const byModifiedTime: RecencyKey = (entry) => entry.mtimeMs;

export interface EvictionOptions {
  cacheDir: string;
  /** Byte budget for everything under cacheDir. */
  cacheSize: number;
  /** Minimum time between two sweeps that scan; 0 sweeps on every call. */
  intervalMs?: number;
  recencyKey?: RecencyKey;
  logger?: Logger;
}

/**
 * Injectable dependencies for the sweeper.
 * Defaults to real implementations; tests can override.
 */
export interface EvictionDeps {
  now: () => number;
  unlink: (filePath: string) => Promise<void>;
}

const defaultDeps: EvictionDeps = {
  now: () => Date.now(),
  unlink: (filePath) => fsPromises.unlink(filePath),
};

/** Filesystem calls used by scanCacheDir; tests can override. */
export interface ScanDeps {
  readdir: (dirPath: string) => Promise<Dirent[]>;
  stat: (filePath: string) => Promise<Stats>;
}

const defaultScanDeps: ScanDeps = {
  readdir: (dirPath) => fsPromises.readdir(dirPath, { withFileTypes: true }),
  stat: (filePath) => fsPromises.stat(filePath),
};

export interface EvictionSweeper {
  sweep(): Promise<SweepReport>;
  /** Time of the last sweep that scanned, or null if none has. */
  lastRun(): number | null;
}

/**
 * Walk `cacheDir` and return every regular file under it. Files and
 * directories removed while walking are left out.
 */
export async function scanCacheDir(cacheDir: string, deps: Partial<ScanDeps> = {}): Promise<CacheEntry[]> {
  const { readdir, stat } = { ...defaultScanDeps, ...deps };
  const entries: CacheEntry[] = [];

  async function walk(dir: string): Promise<void> {
    let dirents: Dirent[];
    try {
      dirents = await readdir(dir);
    } catch (err) {
      if (isNotFoundError(err)) return;
      throw err;
    }

    for (const dirent of dirents) {
      const fullPath = path.join(dir, dirent.name);
      if (dirent.isDirectory()) {
        await walk(fullPath);
        continue;
      }
      if (!dirent.isFile()) continue;

      try {
        const stats = await stat(fullPath);
        entries.push({
          path: fullPath,
          relativePath: path.relative(cacheDir, fullPath),
          size: stats.size,
          atimeMs: stats.atimeMs,
          mtimeMs: stats.mtimeMs,
          ctimeMs: stats.ctimeMs,
        });
      } catch (err) {
        if (!isNotFoundError(err)) throw err;
      }
    }
  }

  await walk(cacheDir);
  return entries;
}

async function isDirectory(dirPath: string): Promise<boolean> {
  try {
    return (await fsPromises.stat(dirPath)).isDirectory();
  } catch (err) {
    if (isNotFoundError(err)) return false;
    throw err;
  }
}

/**
 * Create a sweeper that keeps the total size under `cacheDir` at or below
 * `cacheSize`, deleting the least recent files first.
 *
 * Deletion continues until the total fits, so a single file larger than the
 * whole budget is deleted too.
 */
export function createEvictionSweeper(
  options: EvictionOptions,
  deps: Partial<EvictionDeps> = {},
): EvictionSweeper {
  const { now, unlink } = { ...defaultDeps, ...deps };
  const {
    cacheDir,
    cacheSize,
    intervalMs = DEFAULT_SWEEP_INTERVAL_MS,
    recencyKey = byChangeTime,
    logger = silentLogger,
  } = options;

  let lastRun: number | null = null;

  function skipped(): SweepReport {
    return { ran: false, totalBytes: 0, remainingBytes: 0, deleted: [] };
  }

  /** Deletes oldest first, updating `report` after each delete. */
  async function evict(entries: CacheEntry[], report: SweepReport): Promise<void> {
    // Newest first, so pop() yields the oldest
    entries.sort((a, b) => recencyKey(b) - recencyKey(a));

    while (report.remainingBytes > cacheSize) {
      const entry = entries.pop();
      if (entry === undefined) break;

      logger.debug('Deleting cached file', { path: entry.path, size: entry.size });
      try {
        await unlink(entry.path);
        report.deleted.push(entry.relativePath);
      } catch (err) {
        if (!isNotFoundError(err)) throw err;
      }
      report.remainingBytes -= entry.size;
    }
  }

  return {
    async sweep(): Promise<SweepReport> {
      if (lastRun !== null && now() - lastRun < intervalMs) {
        return skipped();
      }
      try {
        if (!(await isDirectory(cacheDir))) {
          return skipped();
        }
      } catch (err) {
        logger.warn('Cannot inspect cache directory', { cacheDir, error: errorMessage(err) });
        return skipped();
      }

      const report: SweepReport = { ran: true, totalBytes: 0, remainingBytes: 0, deleted: [] };

      try {
        const entries = await scanCacheDir(cacheDir);
        report.totalBytes = entries.reduce((sum, entry) => sum + entry.size, 0);
        report.remainingBytes = report.totalBytes;
        if (report.totalBytes > cacheSize) {
          await evict(entries, report);
        }
      } catch (err) {
        logger.warn('Cache sweep stopped by I/O error', { cacheDir, error: errorMessage(err) });
      }

      lastRun = now();
      if (report.deleted.length > 0) {
        logger.info('Cache sweep evicted files', {
          cacheDir,
          deleted: report.deleted.length,
          totalBytes: report.totalBytes,
          remainingBytes: report.remainingBytes,
        });
      }
      return report;
    },

    lastRun(): number | null {
      return lastRun;
    },
  };
}
