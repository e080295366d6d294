import { errorMessage } from './errors.js';
import type { Logger } from './logger.js';
import type { ErrorHandler } from './types.js';

/** Rethrow the error, ending the sequence with it. */
export const reraiseException: ErrorHandler = (error) => {
  throw error;
};

/** Skip the failure and keep going. */
export const ignoreAndContinue: ErrorHandler = () => true;

/** Stop the sequence quietly. */
export const ignoreAndStop: ErrorHandler = () => false;

export function warnAndContinue(logger: Logger): ErrorHandler {
  return (error) => {
    logger.warn('Continuing after error', { error: errorMessage(error) });
    return true;
  };
}

export function warnAndStop(logger: Logger): ErrorHandler {
  return (error) => {
    logger.warn('Stopping after error', { error: errorMessage(error) });
    return false;
  };
}
