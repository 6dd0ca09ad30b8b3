/**
 * Counted-permit semaphore (no external deps).
 * Usage:
 *   const sem = createSemaphore(4);
 *   await sem.use(() => doWork(), signal);
 *
 * `acquire` hands back a release function that is safe to call more than once;
 * only the first call returns the permit.
 */
export type Release = () => void;

export type SemaphoreStats = {
  permits: number;
  inUse: number;
  waiting: number;
};

export type Semaphore = {
  acquire: (signal?: AbortSignal) => Promise<Release>;
  use: <T>(task: () => Promise<T>, signal?: AbortSignal) => Promise<T>;
  stats: () => SemaphoreStats;
};

type Waiter = {
  grant: () => void;
};

const abortReason = (signal: AbortSignal): unknown =>
  signal.reason ?? new Error("The operation was aborted");

export const createSemaphore = (permits: number): Semaphore => {
  if (!Number.isInteger(permits) || permits < 1) {
    throw new Error("permits must be an integer >= 1");
  }

  let inUse = 0;
  const waiters: Waiter[] = [];

  const makeRelease = (): Release => {
    let released = false;
    return () => {
      if (released) return;
      released = true;
      const next = waiters.shift();
      if (next) {
        // hand the permit over directly; inUse stays the same
        next.grant();
        return;
      }
      inUse -= 1;
    };
  };

  const acquire = (signal?: AbortSignal): Promise<Release> => {
    if (signal?.aborted) {
      return Promise.reject(abortReason(signal));
    }

    if (inUse < permits) {
      inUse += 1;
      return Promise.resolve(makeRelease());
    }

    return new Promise<Release>((resolve, reject) => {
      const onAbort = () => {
        const index = waiters.indexOf(waiter);
        if (index !== -1) waiters.splice(index, 1);
        reject(signal ? abortReason(signal) : new Error("The operation was aborted"));
      };

      const waiter: Waiter = {
        grant: () => {
          signal?.removeEventListener("abort", onAbort);
          resolve(makeRelease());
        }
      };

      waiters.push(waiter);
      signal?.addEventListener("abort", onAbort, { once: true });
    });
  };

  const use = async <T>(task: () => Promise<T>, signal?: AbortSignal): Promise<T> => {
    const release = await acquire(signal);
    try {
      return await task();
    } finally {
      release();
    }
  };

  return {
    acquire,
    use,
    stats: () => ({ permits, inUse, waiting: waiters.length })
  };
};
