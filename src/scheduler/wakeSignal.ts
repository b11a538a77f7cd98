/**
 * src/scheduler/wakeSignal.ts
 * WHAT: Interruptible sleep for the timer loop.
 * WHY: The loop sleeps until the earliest pending timer; schedule/cancel/reschedule
 *      must be able to cut that sleep short when the earliest timer changes.
 * FLOWS:
 *  - wait(ms) → true when notified, false on timeout
 *  - notify() → wakes the current waiter, or latches so the next wait() returns at once
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

export class WakeSignal {
  private latched = false;
  private resolveWaiter: ((woken: boolean) => void) | null = null;
  private timeout: ReturnType<typeof setTimeout> | null = null;

  /**
   * Single waiter only; the scheduler loop is the one consumer.
   */
  wait(timeoutMs: number): Promise<boolean> {
    if (this.latched) {
      this.latched = false;
      return Promise.resolve(true);
    }
    if (this.resolveWaiter) {
      return Promise.reject(new Error("WakeSignal already has a waiter"));
    }

    return new Promise<boolean>((resolve) => {
      this.resolveWaiter = resolve;
      this.timeout = setTimeout(() => this.settle(false), Math.max(0, timeoutMs));
      // Never keep the process alive just to sleep
      this.timeout.unref();
    });
  }

  notify(): void {
    if (this.resolveWaiter) {
      this.settle(true);
    } else {
      this.latched = true;
    }
  }

  private settle(woken: boolean): void {
    const resolve = this.resolveWaiter;
    if (this.timeout) clearTimeout(this.timeout);
    this.timeout = null;
    this.resolveWaiter = null;
    resolve?.(woken);
  }
}
