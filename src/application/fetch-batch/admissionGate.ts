import type { Semaphore, SemaphoreStats } from "../../shared/concurrency/semaphore";
import { createSemaphore } from "../../shared/concurrency/semaphore";

/**
 * System-wide cap on batches that run at the same time.
 * Waiting has no timeout and no queue limit; a waiter leaves only when its
 * signal aborts.
 */
export class AdmissionGate {
  private readonly slots: Semaphore;

  constructor(readonly maxInflight: number) {
    this.slots = createSemaphore(maxInflight);
  }

  /**
   * Runs `task` while holding one slot; the slot is returned however `task` ends.
   */
  async admit<T>(task: () => Promise<T>, signal?: AbortSignal): Promise<T> {
    const release = await this.slots.acquire(signal);
    try {
      return await task();
    } finally {
      release();
    }
  }

  stats(): SemaphoreStats {
    return this.slots.stats();
  }
}
