/**
 * Turns a sequence of URL requests into a lazy sequence of opened streams.
 *
 * Every failure goes to one pluggable handler. Its answer is the only control
 * signal: true retries the URL (up to the attempt ceiling, then moves on),
 * false ends the whole sequence.
 */
import { createFileCache, type FileCacheDeps, type FileCacheOptions } from './cache/file-cache.js';
import { pipeUrlToCacheName, splitUrl } from './cache/cache-name.js';
import { errorMessage } from './errors.js';
import { reraiseException } from './handlers.js';
import { silentLogger, type Logger } from './logger.js';
import type {
  ErrorHandler,
  FileOpener,
  OpenStreamResult,
  OpenedFile,
  Transport,
  UrlRecord,
  UrlRequest,
} from './types.js';

export const DEFAULT_MAX_ATTEMPTS = 10;

export interface StreamOpenerOptions {
  handler?: ErrorHandler;
  maxAttempts?: number;
  logger?: Logger;
}

type AttemptOutcome =
  | { kind: 'success'; opened: OpenedFile }
  | { kind: 'retry'; error: unknown }
  | { kind: 'stop' };

function normalizeRequest(request: UrlRequest): UrlRecord {
  if (typeof request === 'string') {
    return { url: request };
  }
  if (typeof request.url !== 'string') {
    throw new TypeError(`URL request has no string "url" field: ${JSON.stringify(request)}`);
  }
  return request;
}

async function attempt(opener: FileOpener, url: string, handler: ErrorHandler): Promise<AttemptOutcome> {
  try {
    return { kind: 'success', opened: await opener.openFile(url) };
  } catch (error) {
    return handler(error) ? { kind: 'retry', error } : { kind: 'stop' };
  }
}

/**
 * Open every requested URL through `opener`, yielding
 * `{ ...metadata, url, stream, localPath }` in request order. The consumer
 * owns each yielded stream. URLs that exhaust their attempts are left out.
 */
export async function* openStreams(
  requests: Iterable<UrlRequest> | AsyncIterable<UrlRequest>,
  opener: FileOpener,
  options: StreamOpenerOptions = {},
): AsyncGenerator<OpenStreamResult, void, undefined> {
  const { handler = reraiseException, maxAttempts = DEFAULT_MAX_ATTEMPTS, logger = silentLogger } = options;

  for await (const request of requests) {
    let record: UrlRecord;
    try {
      record = normalizeRequest(request);
    } catch (error) {
      if (handler(error)) continue;
      return;
    }

    const { url, ...metadata } = record;
    let lastError: unknown = null;
    let opened: OpenedFile | null = null;

    for (let i = 0; i < maxAttempts && opened === null; i++) {
      const outcome = await attempt(opener, url, handler);
      switch (outcome.kind) {
        case 'success':
          opened = outcome.opened;
          break;
        case 'retry':
          lastError = outcome.error;
          logger.debug('Open failed, retrying', { url, attempt: i + 1 });
          break;
        case 'stop':
          return;
      }
    }

    if (opened === null) {
      logger.warn('Giving up on URL', { url, attempts: maxAttempts, error: errorMessage(lastError) });
      continue;
    }

    yield { ...metadata, url, stream: opened.stream, localPath: opened.localPath };
  }
}

/** Bind an opener and options into a reusable pipeline stage. */
export function createStreamOpener(opener: FileOpener, options: StreamOpenerOptions = {}) {
  return (requests: Iterable<UrlRequest> | AsyncIterable<UrlRequest>) =>
    openStreams(requests, opener, options);
}

/** Opener that streams straight from the transport, with no caching. */
export function createDirectOpener(transport: Transport): FileOpener {
  return {
    async openFile(url: string): Promise<OpenedFile> {
      const { scheme, path } = splitUrl(url);
      const localPath = scheme === '' || scheme === 'file' ? path : null;
      return { stream: await transport.openStream(url), localPath };
    },
  };
}

export type CachedUrlOpenerOptions = Omit<FileCacheOptions, 'urlToName'> & StreamOpenerOptions;

/**
 * Cache-backed stream stage: shards are named after the URL inside any
 * "pipe:" command, fetched through the cache, then opened.
 */
export function createCachedUrlOpener(options: CachedUrlOpenerOptions, deps: Partial<FileCacheDeps> = {}) {
  const { handler, maxAttempts, ...cacheOptions } = options;
  const cache = createFileCache({ ...cacheOptions, urlToName: (url) => pipeUrlToCacheName(url) }, deps);
  return createStreamOpener(cache, { handler, maxAttempts, logger: options.logger });
}
