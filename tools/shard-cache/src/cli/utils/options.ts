import type { Command } from 'commander';
import { loadCacheConfig, type CliOptions } from '../../config/loader.js';
import type { CacheConfig } from '../../config/schema.js';
import { errorMessage } from '../../errors.js';
import { createLogger, type Logger } from '../../logger.js';

export interface CommandContext {
  config: CacheConfig;
  logger: Logger;
}

/** Options shared by every command that touches the cache directory. */
export function addCacheOptions(command: Command): Command {
  return command
    .option('--cache-dir <path>', 'Cache root directory (default ./_cache)')
    .option('--cache-size <bytes>', 'Cache budget in bytes, e.g. 500000000 or 20G')
    .option('--interval <seconds>', 'Minimum seconds between eviction sweeps (default 30)')
    .option('--timeout <seconds>', 'Download timeout in seconds (default 300)')
    .option('--max-attempts <n>', 'Attempts per URL before giving up (default 10)')
    .option('--config <path>', 'YAML config file (default ./.shard-cache.yaml)')
    .option('--verbose', 'Verbose output', false);
}

export function buildContext(options: CliOptions): CommandContext {
  const config = loadCacheConfig(options);
  return { config, logger: createLogger({ verbose: config.verbose, prefix: 'shard-cache' }) };
}

export function exitWithError(err: unknown): never {
  process.stderr.write(`Error: ${errorMessage(err)}\n`);
  process.exit(2);
}
