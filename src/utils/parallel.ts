import { createLimit } from './concurrency.js';
import { logger } from './logger.js';

export interface ParallelOptions {
  maxConcurrency?: number;
}

export type TaskResult<T> =
  | { success: true; data: T; duration: number }
  | { success: false; error: Error; duration: number };

/**
 * Run `executor` over every item with bounded concurrency. A rejected task
 * is recorded in its slot and never cancels the others; results keep the
 * input order.
 */
export async function parallelExecute<T, R>(
  items: readonly T[],
  executor: (item: T, index: number) => Promise<R>,
  options: ParallelOptions = {}
): Promise<TaskResult<R>[]> {
  const { maxConcurrency = 4 } = options;
  const limit = createLimit(maxConcurrency);

  return Promise.all(
    items.map((item, index) =>
      limit(async (): Promise<TaskResult<R>> => {
        const startTime = Date.now();
        try {
          const data = await executor(item, index);
          return { success: true, data, duration: Date.now() - startTime };
        } catch (error) {
          logger.debug(`Task ${index} failed`, error);
          return {
            success: false,
            error: error instanceof Error ? error : new Error(String(error)),
            duration: Date.now() - startTime,
          };
        }
      })
    )
  );
}
