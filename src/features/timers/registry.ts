/**
 * src/features/timers/registry.ts
 * WHAT: Maps event kinds ("reminder", "tempmute") to handlers.
 * WHY: The scheduler stays ignorant of what a timer means; features plug in here.
 * FLOWS:
 *  - register(kind, handler) during startup
 *  - freeze() when the scheduler starts; later registrations throw
 *  - resolve(kind) on every dispatch
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { ConfigurationError } from "../../lib/errors.js";
import type { TimerHandler } from "./types.js";

export class HandlerRegistry {
  private readonly handlers = new Map<string, TimerHandler>();
  private frozen = false;

  /**
   * @throws ConfigurationError on a duplicate kind, an empty kind, or after freeze()
   */
  register(eventKind: string, handler: TimerHandler): void {
    if (this.frozen) {
      throw new ConfigurationError(`cannot register handler for "${eventKind}" after start`, eventKind);
    }
    if (eventKind.trim().length === 0) {
      throw new ConfigurationError("event kind must be a non-empty string", eventKind);
    }
    if (this.handlers.has(eventKind)) {
      throw new ConfigurationError(`handler already registered for "${eventKind}"`, eventKind);
    }
    this.handlers.set(eventKind, handler);
  }

  resolve(eventKind: string): TimerHandler | undefined {
    return this.handlers.get(eventKind);
  }

  kinds(): string[] {
    return [...this.handlers.keys()].sort();
  }

  freeze(): void {
    this.frozen = true;
  }
}
