/**
 * Concurrency limiters.
 *
 * Usage:
 *   import { processLimit } from '../utils/concurrency.js';
 *   const result = await processLimit(() => runExternalTool(...));
 */

// Lightweight p-limit: const limit = createLimit(n); limit(() => promise)

export type LimitFunction = <T>(fn: () => Promise<T> | T) => Promise<T>;

export function createLimit(concurrency: number): LimitFunction {
  if (!Number.isInteger(concurrency) || concurrency < 1) {
    throw new RangeError('concurrency must be an integer >= 1');
  }

  let activeCount = 0;
  const queue: Array<() => void> = [];

  function next(): void {
    const start = queue.shift();
    if (start) {
      activeCount++;
      start();
    }
  }

  function run<T>(fn: () => Promise<T> | T): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      const execute = async (): Promise<void> => {
        try {
          resolve(await fn());
        } catch (err) {
          reject(err);
        } finally {
          activeCount--;
          next();
        }
      };

      if (activeCount < concurrency) {
        activeCount++;
        void execute();
      } else {
        queue.push(() => { void execute(); });
      }
    });
  }

  return run;
}

function envConcurrency(name: string, fallback: number): number {
  const value = parseInt(process.env[name] || '', 10);
  return Number.isInteger(value) && value >= 1 ? value : fallback;
}

/** External decompiler processes. */
export const processLimit = createLimit(
  envConcurrency('LUAU_RESTORE_PROCESS_CONCURRENCY', 4)
);
