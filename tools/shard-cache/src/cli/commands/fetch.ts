import { Command } from 'commander';
import { pipeUrlToCacheName, urlToCacheName } from '../../cache/cache-name.js';
import { createFileCache } from '../../cache/file-cache.js';
import { warnAndContinue } from '../../handlers.js';
import { openStreams } from '../../stream-opener.js';
import { createTransport } from '../../transport.js';
import type { CliOptions } from '../../config/loader.js';
import { addCacheOptions, buildContext, exitWithError } from '../utils/options.js';

interface FetchOptions extends CliOptions {
  pipe: boolean;
}

export const fetchCommand = addCacheOptions(
  new Command('fetch')
    .description('Fetch URLs into the cache and print "url<TAB>local path" for each')
    .argument('<urls...>', 'URLs to fetch'),
)
  .option('--pipe', 'Name entries after the URL inside "pipe:" commands', false)
  .action(async (urls: string[], options: FetchOptions) => {
    try {
      const { config, logger } = buildContext(options);
      const cache = createFileCache({
        cacheDir: config.cacheDir,
        cacheSize: config.cacheSize,
        cleanupIntervalMs: config.cleanupIntervalSeconds * 1000,
        urlToName: options.pipe ? (url) => pipeUrlToCacheName(url) : (url) => urlToCacheName(url),
        transport: createTransport({ timeoutMs: config.timeoutSeconds * 1000 }),
        logger,
      });

      let fetched = 0;
      const results = openStreams(urls, cache, {
        handler: warnAndContinue(logger),
        maxAttempts: config.maxAttempts,
        logger,
      });
      for await (const result of results) {
        result.stream.destroy();
        process.stdout.write(`${result.url}\t${result.localPath ?? ''}\n`);
        fetched++;
      }

      if (fetched < urls.length) {
        logger.warn('Some URLs could not be fetched', { requested: urls.length, fetched });
        process.exitCode = 1;
      }
    } catch (err) {
      exitWithError(err);
    }
  });
