import { Command } from 'commander';
import { createEvictionSweeper } from '../../cache/eviction.js';
import { createSweepScheduler } from '../../sweep-scheduler.js';
import type { CliOptions } from '../../config/loader.js';
import type { SweepReport } from '../../types.js';
import { addCacheOptions, buildContext, exitWithError } from '../utils/options.js';

interface SweepOptions extends CliOptions {
  watch: boolean;
}

const MIN_WATCH_INTERVAL_MS = 1000;

function printReport(report: SweepReport): void {
  process.stdout.write(JSON.stringify(report) + '\n');
}

export const sweepCommand = addCacheOptions(
  new Command('sweep').description('Evict the oldest cached files until the cache is within budget'),
)
  .option('--watch', 'Keep sweeping every --interval seconds until interrupted', false)
  .action(async (options: SweepOptions) => {
    try {
      const { config, logger } = buildContext(options);
      // Scheduling is done here, so the sweeper itself never skips a call
      const sweeper = createEvictionSweeper({
        cacheDir: config.cacheDir,
        cacheSize: config.cacheSize,
        intervalMs: 0,
        logger,
      });

      printReport(await sweeper.sweep());
      if (!options.watch) return;

      const scheduler = createSweepScheduler(
        sweeper,
        { intervalMs: Math.max(MIN_WATCH_INTERVAL_MS, config.cleanupIntervalSeconds * 1000) },
        { logger, onSweep: printReport },
      );
      const stop = () => scheduler.stop();
      process.once('SIGINT', stop);
      process.once('SIGTERM', stop);
      scheduler.start();
    } catch (err) {
      exitWithError(err);
    }
  });
