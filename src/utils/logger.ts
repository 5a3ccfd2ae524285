/**
 * Centralized Logger — replaces all console.log/warn/error across the importer.
 *
 * Outside production and test runs, logs are printed to the console with
 * category tags. NODE_ENV=production or NODE_ENV=test silences everything.
 *
 * Usage:
 *   import { logger } from '../utils/logger';
 *   logger.info('Import', 'Detected V2 backup');
 *   logger.warn('Import', 'Record has no address');
 *   logger.error('Import', 'Decryption failed', error);
 *   logger.perfStart('Import: outer decrypt'); ... logger.perfEnd('Import: outer decrypt');
 */

function isEnabled(): boolean {
  const env = process.env.NODE_ENV;
  return env !== 'production' && env !== 'test';
}

// Performance tracking
const perfTimers = new Map<string, number>();

export const logger = {
  /** Informational log */
  info: (tag: string, ...args: unknown[]) => {
    if (isEnabled()) console.log(`[${tag}]`, ...args);
  },

  /** Warning */
  warn: (tag: string, ...args: unknown[]) => {
    if (isEnabled()) console.warn(`[${tag}]`, ...args);
  },

  /** Error */
  error: (tag: string, ...args: unknown[]) => {
    if (isEnabled()) console.error(`[${tag}]`, ...args);
  },

  /** Start a performance timer */
  perfStart: (label: string) => {
    if (isEnabled()) perfTimers.set(label, Date.now());
  },

  /** End a performance timer and log the duration */
  perfEnd: (label: string) => {
    if (!isEnabled()) return;
    const start = perfTimers.get(label);
    if (start !== undefined) {
      const duration = Date.now() - start;
      perfTimers.delete(label);
      console.log(`[Perf] ${label}: ${duration}ms`);
    }
  },
};

export default logger;
