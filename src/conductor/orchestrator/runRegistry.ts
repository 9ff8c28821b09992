/**
 * Process-local bookkeeping for runs: one single-slot lock per run id and the
 * abort handle of the run currently being driven.
 */

import { ConcurrencyLimiter } from "../utils/concurrencyLimiter.js";

export class RunRegistry {
  private readonly locks = new Map<string, ConcurrencyLimiter>();
  private readonly abortControllers = new Map<string, AbortController>();
  /** Runs with a cancel waiting for the lock; anything driven before it starts aborted */
  private readonly cancelRequests = new Set<string>();

  /**
   * Serialize `task` with every other locked task of the same run.
   * The lock entry is dropped once nobody holds or waits for it.
   */
  async withLock<T>(runId: string, task: () => Promise<T>): Promise<T> {
    let lock = this.locks.get(runId);
    if (!lock) {
      lock = new ConcurrencyLimiter(1);
      this.locks.set(runId, lock);
    }
    const held = lock;
    try {
      return await held.run(task);
    } finally {
      if (held.idle && this.locks.get(runId) === held) {
        this.locks.delete(runId);
      }
    }
  }

  /**
   * Register a fresh abort handle for a run about to be driven.
   */
  attach(runId: string): AbortController {
    const controller = new AbortController();
    if (this.cancelRequests.has(runId)) {
      controller.abort();
    }
    this.abortControllers.set(runId, controller);
    return controller;
  }

  detach(runId: string, controller: AbortController): void {
    if (this.abortControllers.get(runId) === controller) {
      this.abortControllers.delete(runId);
    }
  }

  isActive(runId: string): boolean {
    return this.abortControllers.has(runId);
  }

  /**
   * Fire the abort signal of an in-flight run.
   * @returns false when the run is not being driven by this process
   */
  abort(runId: string): boolean {
    const controller = this.abortControllers.get(runId);
    if (!controller) return false;
    this.cancelRequests.add(runId);
    if (!controller.signal.aborted) {
      controller.abort();
    }
    return true;
  }

  /** Called by the cancel that requested the abort once it holds the lock. */
  clearCancel(runId: string): void {
    this.cancelRequests.delete(runId);
  }

  stats(): { locked: number; active: number } {
    return { locked: this.locks.size, active: this.abortControllers.size };
  }
}
