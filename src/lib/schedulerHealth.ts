/**
 * src/lib/schedulerHealth.ts
 * WHAT: Health tracking for background loops (the timer scheduler records one run per drain pass).
 * WHY: A loop that keeps failing against an unreachable store should be loud, not silent.
 * FLOWS:
 *  - recordSchedulerRun(name, success) → update health state → alert if threshold exceeded
 *  - getSchedulerHealth() → all health states
 *  - getSchedulerHealthByName(name) → single health state
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { logger } from "./logger.js";

export interface SchedulerHealth {
  /** Loop name (e.g., "timers") */
  name: string;
  /** Timestamp (ms) of last run attempt, null if never run */
  lastRunAt: number | null;
  lastSuccessAt: number | null;
  lastErrorAt: number | null;
  /** Count of consecutive failures since last success */
  consecutiveFailures: number;
  totalRuns: number;
  totalFailures: number;
}

const CONSECUTIVE_FAILURE_ALERT_THRESHOLD = 3;

const schedulerHealth = new Map<string, SchedulerHealth>();

/**
 * WHAT: Record a loop run result (success or failure).
 * WHY: Updates health tracking and alerts if consecutive failures exceed threshold.
 *
 * @example
 * try {
 *   await scheduler.runDuePass();
 *   recordSchedulerRun("timers", true);
 * } catch (err) {
 *   recordSchedulerRun("timers", false);
 * }
 */
export function recordSchedulerRun(name: string, success: boolean): void {
  const now = Date.now();

  const health: SchedulerHealth = schedulerHealth.get(name) ?? {
    name,
    lastRunAt: null,
    lastSuccessAt: null,
    lastErrorAt: null,
    consecutiveFailures: 0,
    totalRuns: 0,
    totalFailures: 0,
  };

  health.lastRunAt = now;
  health.totalRuns++;

  if (success) {
    health.lastSuccessAt = now;
    health.consecutiveFailures = 0;
  } else {
    health.lastErrorAt = now;
    health.consecutiveFailures++;
    health.totalFailures++;
  }

  schedulerHealth.set(name, health);

  if (health.consecutiveFailures >= CONSECUTIVE_FAILURE_ALERT_THRESHOLD) {
    logger.error(
      {
        scheduler: name,
        consecutiveFailures: health.consecutiveFailures,
        totalFailures: health.totalFailures,
        totalRuns: health.totalRuns,
      },
      "[scheduler] Multiple consecutive failures - requires attention"
    );
  }
}

export function getSchedulerHealth(): Map<string, SchedulerHealth> {
  return new Map(schedulerHealth);
}

/**
 * @returns A copy of the health state, or undefined if the loop never ran
 */
export function getSchedulerHealthByName(name: string): SchedulerHealth | undefined {
  const health = schedulerHealth.get(name);
  return health ? { ...health } : undefined;
}

/**
 * Test helper - clean slate between tests.
 */
export function _clearAllSchedulerHealth(): void {
  schedulerHealth.clear();
}
