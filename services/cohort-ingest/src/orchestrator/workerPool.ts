export const MIN_CONCURRENCY = 1;
export const MAX_CONCURRENCY = 64;

export type TaskOutcome<T> =
  | { index: number; status: 'fulfilled'; value: T }
  | { index: number; status: 'rejected'; reason: unknown };

export type WorkerPool = {
  readonly limit: number;
  /**
   * Runs every task with at most `limit` in flight and reports each outcome
   * to `onSettled` in completion order. Resolves once all tasks settled.
   */
  runAll<T>(tasks: ReadonlyArray<() => Promise<T>>, onSettled: (outcome: TaskOutcome<T>) => void): Promise<void>;
};

export function createWorkerPool(limit: number): WorkerPool {
  if (!Number.isInteger(limit) || limit < MIN_CONCURRENCY || limit > MAX_CONCURRENCY) {
    throw new RangeError(`Concurrency limit must be an integer between ${MIN_CONCURRENCY} and ${MAX_CONCURRENCY}`);
  }

  return {
    limit,
    runAll<T>(tasks: ReadonlyArray<() => Promise<T>>, onSettled: (outcome: TaskOutcome<T>) => void): Promise<void> {
      return new Promise((resolve, reject) => {
        const queue = tasks.map((task, index) => ({ task, index }));
        const active = new Set<number>();
        let settled = 0;
        let failed = false;

        if (queue.length === 0) {
          resolve();
          return;
        }

        const complete = (outcome: TaskOutcome<T>) => {
          active.delete(outcome.index);
          settled += 1;
          if (failed) {
            return;
          }
          try {
            onSettled(outcome);
          } catch (error) {
            failed = true;
            reject(error);
            return;
          }
          if (settled === tasks.length) {
            resolve();
            return;
          }
          processQueue();
        };

        const processQueue = () => {
          while (active.size < limit && queue.length > 0) {
            const next = queue.shift();
            if (!next) {
              break;
            }
            active.add(next.index);
            void Promise.resolve()
              .then(() => next.task())
              .then(
                (value) => complete({ index: next.index, status: 'fulfilled', value }),
                (reason: unknown) => complete({ index: next.index, status: 'rejected', reason })
              );
          }
        };

        processQueue();
      });
    }
  };
}
