// Types
export type {
  UrlRecord,
  UrlRequest,
  Transport,
  ErrorHandler,
  UrlToName,
  OpenedFile,
  FileOpener,
  OpenStreamResult,
  CacheEntry,
  RecencyKey,
  SweepReport,
} from './types.js';

// Errors
export { FetchError, ValidationError, errorMessage, isNotFoundError } from './errors.js';

// Logging
export { createLogger, formatLogLine, silentLogger } from './logger.js';
export type { LogContext, LogLevel, Logger, LoggerDeps, LoggerOptions } from './logger.js';

// Config
export { cacheConfigSchema, parseByteSize, DEFAULT_CACHE_DIR, DEFAULT_CACHE_SIZE } from './config/schema.js';
export type { CacheConfig } from './config/schema.js';
export { loadCacheConfig, CONFIG_FILE_NAME, ENV_VARS } from './config/loader.js';
export type { CliOptions, ConfigDeps } from './config/loader.js';

// Cache
export {
  urlToCacheName,
  pipeCleaner,
  pipeUrlToCacheName,
  splitUrl,
  isLocalUrl,
  PATH_NAMED_SCHEMES,
} from './cache/cache-name.js';
export type { SplitUrl } from './cache/cache-name.js';
export { download, nextTempToken, tempPathFor } from './cache/download.js';
export type { DownloadOptions } from './cache/download.js';
export {
  createArchiveValidator,
  isValidArchive,
  describeFileType,
  readPreview,
  DEFAULT_ARCHIVE_TYPES,
} from './cache/validate.js';
export type { Validator } from './cache/validate.js';
export {
  createEvictionSweeper,
  scanCacheDir,
  byChangeTime,
  byAccessTime,
  byModifiedTime,
  DEFAULT_SWEEP_INTERVAL_MS,
} from './cache/eviction.js';
export type { EvictionSweeper, EvictionOptions, EvictionDeps, ScanDeps } from './cache/eviction.js';
export { createFileCache } from './cache/file-cache.js';
export type { FileCache, FileCacheOptions, FileCacheDeps } from './cache/file-cache.js';

// Transport
export { createTransport, DEFAULT_CHUNK_SIZE, DEFAULT_TIMEOUT_MS } from './transport.js';
export type { TransportOptions, TransportDeps } from './transport.js';

// Streams
export {
  openStreams,
  createStreamOpener,
  createDirectOpener,
  createCachedUrlOpener,
  DEFAULT_MAX_ATTEMPTS,
} from './stream-opener.js';
export type { StreamOpenerOptions, CachedUrlOpenerOptions } from './stream-opener.js';
export {
  reraiseException,
  ignoreAndContinue,
  ignoreAndStop,
  warnAndContinue,
  warnAndStop,
} from './handlers.js';

// Scheduling
export { createSweepScheduler } from './sweep-scheduler.js';
export type { SweepScheduler, SweepSchedulerOptions, SweepSchedulerDeps } from './sweep-scheduler.js';
