/**
 * tests/lib/eventWrap.test.ts
 * WHAT: Unit tests for the gateway event wrapper.
 * WHY: A failing guildCreate/guildDelete listener must be logged and reported, never rethrown.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { describe, it, expect, vi, beforeEach } from "vitest";

const mockLogger = vi.hoisted(() => ({
  debug: vi.fn(),
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
}));

vi.mock("../../src/lib/logger.js", () => ({
  logger: mockLogger,
}));

vi.mock("../../src/lib/sentry.js", () => ({
  captureException: vi.fn(),
}));

import { wrapEvent } from "../../src/lib/eventWrap.js";
import { captureException } from "../../src/lib/sentry.js";
import { createNetworkError } from "../utils/errorFixtures.js";

describe("wrapEvent", () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  it("calls the handler with the event arguments", async () => {
    const handler = vi.fn();
    const wrapped = wrapEvent("guildCreate", handler);

    await wrapped({ id: "111111111111111111" }, "extra");

    expect(handler).toHaveBeenCalledWith({ id: "111111111111111111" }, "extra");
    expect(mockLogger.error).not.toHaveBeenCalled();
  });

  it("logs and reports a rejected handler without rethrowing", async () => {
    const error = new Error("insert failed");
    const wrapped = wrapEvent("guildCreate", vi.fn().mockRejectedValue(error));

    await expect(wrapped({ id: "111111111111111111" })).resolves.toBeUndefined();

    expect(mockLogger.error).toHaveBeenCalledWith(
      {
        evt: "event_error",
        event: "guildCreate",
        errorKind: "unknown",
        guildId: "111111111111111111",
        err: error,
      },
      "[guildCreate] event handler failed: insert failed"
    );
    expect(captureException).toHaveBeenCalledWith(error, {
      event: "guildCreate",
      errorKind: "unknown",
      guildId: "111111111111111111",
    });
  });

  it("catches synchronous throws", async () => {
    const wrapped = wrapEvent("ready", () => {
      throw new Error("sync boom");
    });

    await expect(wrapped()).resolves.toBeUndefined();
    expect(mockLogger.error).toHaveBeenCalledTimes(1);
  });

  it("does not report transient failures to Sentry", async () => {
    const wrapped = wrapEvent("guildDelete", vi.fn().mockRejectedValue(createNetworkError("ECONNRESET")));

    await wrapped({ guildId: "222222222222222222" });

    expect(mockLogger.error).toHaveBeenCalledWith(
      expect.objectContaining({ errorKind: "network", guildId: "222222222222222222" }),
      "[guildDelete] event handler failed: Network error: ECONNRESET"
    );
    expect(captureException).not.toHaveBeenCalled();
  });

  it("gives up on a handler that outlives the timeout", async () => {
    const wrapped = wrapEvent("ready", () => new Promise<void>((resolve) => setTimeout(resolve, 20_000)), 5000);

    const pending = wrapped();
    await vi.advanceTimersByTimeAsync(5000);
    await pending;

    expect(mockLogger.error).toHaveBeenCalledWith(
      expect.objectContaining({ event: "ready", guildId: undefined }),
      "[ready] event handler failed: Event handler timeout after 5000ms"
    );
  });

  it("clears its timeout when the handler finishes first", async () => {
    const wrapped = wrapEvent("ready", vi.fn());

    await wrapped();

    expect(vi.getTimerCount()).toBe(0);
  });
});
