/**
 * Create a limiter that runs at most `concurrency` tasks at once.
 *
 * Tasks beyond the limit wait in FIFO order; a rejected task frees its slot
 * like a resolved one.
 *
 * @param concurrency - Maximum number of in-flight tasks.
 * @returns Function that schedules a task under the limit.
 */
export function limitConcurrency(concurrency: number) {
  if (!Number.isInteger(concurrency) || concurrency < 1) {
    throw new RangeError('concurrency must be a positive integer');
  }

  let active = 0;
  const queue: Array<() => void> = [];

  const next = () => {
    active -= 1;
    const start = queue.shift();
    if (start) start();
  };

  return function run<T>(fn: () => Promise<T>): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      const start = () => {
        active += 1;
        void fn().then(resolve, reject).finally(next);
      };
      if (active < concurrency) {
        start();
      } else {
        queue.push(start);
      }
    });
  };
}
