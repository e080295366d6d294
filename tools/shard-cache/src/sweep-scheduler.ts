/**
 * Timer-driven eviction, for running sweeps off the request path.
 *
 * Runs the sweeper at a fixed interval with an executing guard so a slow
 * sweep is never overlapped by the next tick. Failures are logged, never thrown.
 */
import type { EvictionSweeper } from './cache/eviction.js';
import { errorMessage } from './errors.js';
import { silentLogger, type Logger } from './logger.js';
import type { SweepReport } from './types.js';

export interface SweepSchedulerOptions {
  intervalMs: number;
}

/**
 * Injectable dependencies for the sweep scheduler.
 */
export interface SweepSchedulerDeps {
  logger: Logger;
  now: () => number;
  onSweep?: (report: SweepReport) => void;
}

export interface SweepScheduler {
  start(): void;
  stop(): void;
  isRunning(): boolean;
}

const defaultDeps: SweepSchedulerDeps = {
  logger: silentLogger,
  now: () => Date.now(),
};

export function createSweepScheduler(
  sweeper: EvictionSweeper,
  options: SweepSchedulerOptions,
  deps: Partial<SweepSchedulerDeps> = {},
): SweepScheduler {
  const { logger, now, onSweep } = { ...defaultDeps, ...deps };

  let running = false;
  let executing = false;
  let timer: ReturnType<typeof setInterval> | null = null;

  function tick(): void {
    if (!running) return;

    if (executing) {
      logger.warn('Cache sweep still executing, skipping interval');
      return;
    }

    executing = true;
    const startTime = now();

    sweeper.sweep()
      .then((report) => {
        logger.debug('Cache sweep completed', {
          durationMs: now() - startTime,
          deleted: report.deleted.length,
        });
        onSweep?.(report);
      })
      .catch((err: unknown) => {
        logger.error('Cache sweep failed', { error: errorMessage(err) });
      })
      .finally(() => {
        executing = false;
      });
  }

  return {
    start(): void {
      if (running) throw new Error('Sweep scheduler already running');
      running = true;
      timer = setInterval(tick, options.intervalMs);
      logger.info('Sweep scheduler started', { intervalMs: options.intervalMs });
    },

    stop(): void {
      if (!running) return;
      running = false;
      if (timer !== null) {
        clearInterval(timer);
        timer = null;
      }
      logger.info('Sweep scheduler stopped');
    },

    isRunning(): boolean {
      return running;
    },
  };
}
