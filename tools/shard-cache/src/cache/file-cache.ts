import * as fsPromises from 'node:fs/promises';
import * as path from 'node:path';
import type { Readable } from 'node:stream';
import { isLocalUrl, splitUrl, urlToCacheName } from './cache-name.js';
import { download } from './download.js';
import { createEvictionSweeper, type EvictionDeps, type EvictionSweeper } from './eviction.js';
import { describeFileType, isValidArchive, readPreview, type Validator } from './validate.js';
import { ValidationError, errorMessage, isNotFoundError } from '../errors.js';
import { silentLogger, type Logger } from '../logger.js';
import { DEFAULT_CHUNK_SIZE, createTransport } from '../transport.js';
import type { FileOpener, OpenedFile, RecencyKey, Transport, UrlToName } from '../types.js';

export interface FileCacheOptions {
  cacheDir: string;
  urlToName?: UrlToName;
  /** Check run on every fresh download; null accepts anything. */
  validator?: Validator | null;
  /** Byte budget; zero or negative disables eviction. */
  cacheSize?: number;
  cleanupIntervalMs?: number;
  recencyKey?: RecencyKey;
  transport?: Transport;
  chunkSize?: number;
  logger?: Logger;
}

/**
 * Injectable dependencies for createFileCache.
 * Defaults to real implementations; tests can override.
 */
export interface FileCacheDeps extends EvictionDeps {
  openRead: (filePath: string) => Promise<Readable>;
}

async function defaultOpenRead(filePath: string): Promise<Readable> {
  const handle = await fsPromises.open(filePath, 'r');
  return handle.createReadStream();
}

export interface FileCache extends FileOpener {
  readonly cacheDir: string;
  /** Null when eviction is disabled. */
  readonly sweeper: EvictionSweeper | null;
  /** Local path holding the content of `url`, downloading it on a miss. */
  getFile(url: string): Promise<string>;
  /** Open `url` for reading; local files are opened in place, anything else through the cache. */
  openFile(url: string): Promise<OpenedFile>;
}

async function exists(filePath: string): Promise<boolean> {
  try {
    await fsPromises.stat(filePath);
    return true;
  } catch (err) {
    if (isNotFoundError(err)) return false;
    throw err;
  }
}

/**
 * Create a file cache rooted at `options.cacheDir`.
 *
 * A cache path that exists is a hit and is returned as is. On a miss the
 * directory is swept first (when a budget is set), then the URL is downloaded
 * and validated before it is renamed onto its cache path. Sweeping only before downloads means the cache can run over
 * budget by up to one file until the next miss.
 */
export function createFileCache(options: FileCacheOptions, deps: Partial<FileCacheDeps> = {}): FileCache {
  const { openRead = defaultOpenRead, ...evictionDeps } = deps;
  const {
    cacheDir,
    urlToName = urlToCacheName,
    validator = isValidArchive,
    cacheSize = -1,
    chunkSize = DEFAULT_CHUNK_SIZE,
    logger = silentLogger,
  } = options;
  const transport = options.transport ?? createTransport({ chunkSize });

  const sweeper = cacheSize > 0
    ? createEvictionSweeper(
      {
        cacheDir,
        cacheSize,
        intervalMs: options.cleanupIntervalMs,
        recencyKey: options.recencyKey,
        logger,
      },
      evictionDeps,
    )
    : null;

  async function describeOrUnknown(filePath: string): Promise<string> {
    try {
      return await describeFileType(filePath);
    } catch {
      return 'unknown';
    }
  }

  async function previewOrEmpty(filePath: string): Promise<Buffer> {
    try {
      return await readPreview(filePath);
    } catch {
      return Buffer.alloc(0);
    }
  }

  /** Check the downloaded temporary file before it is published at `dest`. */
  async function verifyArchive(check: Validator, url: string, dest: string, tempPath: string): Promise<void> {
    let valid = false;
    let cause: unknown;
    try {
      valid = await check(tempPath);
    } catch (err) {
      cause = err;
      logger.warn('Archive check failed', { url, error: errorMessage(err) });
    }
    if (valid) return;

    const fileType = await describeOrUnknown(tempPath);
    const preview = await previewOrEmpty(tempPath);
    throw new ValidationError(url, dest, fileType, preview, cause === undefined ? undefined : { cause });
  }

  async function getFile(url: string): Promise<string> {
    const dest = path.join(cacheDir, urlToName(url));
    await fsPromises.mkdir(path.dirname(dest), { recursive: true });

    if (await exists(dest)) {
      logger.debug('Cache hit', { url, path: dest });
      return dest;
    }

    if (sweeper !== null) {
      await sweeper.sweep();
    }

    logger.debug('Downloading', { url, path: dest });
    await download(url, dest, {
      transport,
      chunkSize,
      verify: validator === null ? undefined : (tempPath) => verifyArchive(validator, url, dest, tempPath),
    });
    return dest;
  }

  return {
    cacheDir,
    sweeper,
    getFile,

    async openFile(url: string): Promise<OpenedFile> {
      const localPath = isLocalUrl(url) ? splitUrl(url).path : await getFile(url);
      return { stream: await openRead(localPath), localPath };
    },
  };
}
