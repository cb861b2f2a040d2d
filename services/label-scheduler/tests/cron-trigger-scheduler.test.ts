// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@labelcron/label-scheduler/tests/cron-trigger-scheduler.test`
 * Purpose: Timer-level tests for the cron trigger scheduler.
 * Scope: Validation, fire instants, re-arming, overlap skip, unschedule and shutdown. Uses fake timers.
 * Side-effects: none
 * Links: src/adapters/cron/cron-trigger-scheduler.ts
 * @internal
 */

import {
  isInvalidCronExpressionError,
  isTriggerConflictError,
} from "@labelcron/scheduler-core";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { CronTriggerScheduler } from "../src/adapters/cron/cron-trigger-scheduler.js";
import { createMockLogger } from "./fixtures.js";

const FIFTEEN_MINUTES = 15 * 60 * 1000;

async function flushMicrotasks(): Promise<void> {
  for (let i = 0; i < 10; i++) {
    await Promise.resolve();
  }
}

function setup(timezone = "UTC") {
  const log = createMockLogger();
  const scheduler = new CronTriggerScheduler({ timezone, logger: log });
  return { log, scheduler };
}

describe("CronTriggerScheduler", () => {
  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date("2025-01-15T10:30:10.000Z"));
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  describe("validateCronExpression", () => {
    it.each(["*/5 * * * *", "0 2 * * *", "30 4 1,15 * 1-5"])(
      "accepts %s",
      (expr) => {
        expect(setup().scheduler.validateCronExpression(expr)).toBe(true);
      }
    );

    it.each([
      "* * * *",
      "0 0 * * * *",
      "@daily",
      "61 * * * *",
      "not a cron at all",
      "",
    ])("rejects %j", (expr) => {
      expect(setup().scheduler.validateCronExpression(expr)).toBe(false);
    });
  });

  describe("schedule", () => {
    it("throws InvalidCronExpressionError for a bad expression", () => {
      const { scheduler } = setup();
      let caught: unknown;
      try {
        scheduler.schedule("* * * *", "job1", () => {}, []);
      } catch (err) {
        caught = err;
      }
      expect(isInvalidCronExpressionError(caught)).toBe(true);
      expect(scheduler.listScheduledIds()).toEqual([]);
    });

    it("throws TriggerConflictError for a taken id", () => {
      const { scheduler } = setup();
      scheduler.schedule("*/15 * * * *", "job1", () => {}, []);

      let caught: unknown;
      try {
        scheduler.schedule("0 * * * *", "job1", () => {}, []);
      } catch (err) {
        caught = err;
      }
      expect(isTriggerConflictError(caught)).toBe(true);
      expect(scheduler.listScheduledIds()).toEqual(["job1"]);
    });

    it("does not arm before start", async () => {
      const { scheduler } = setup();
      const callback = vi.fn();
      scheduler.schedule("*/15 * * * *", "job1", callback, []);

      expect(scheduler.nextRunAt("job1")).toBeNull();
      await vi.advanceTimersByTimeAsync(2 * FIFTEEN_MINUTES);
      expect(callback).not.toHaveBeenCalled();
    });
  });

  describe("firing", () => {
    it("fires at the next matching instant with the registered args", async () => {
      const { scheduler } = setup();
      const callback = vi.fn();
      scheduler.schedule("*/15 * * * *", "job1", callback, ["a", 1] as const);
      scheduler.start();

      expect(scheduler.nextRunAt("job1")?.toISOString()).toBe(
        "2025-01-15T10:45:00.000Z"
      );

      await vi.advanceTimersByTimeAsync(FIFTEEN_MINUTES - 10_001);
      expect(callback).not.toHaveBeenCalled();

      await vi.advanceTimersByTimeAsync(1);
      expect(callback).toHaveBeenCalledTimes(1);
      expect(callback).toHaveBeenCalledWith("a", 1);
      expect(scheduler.nextRunAt("job1")?.toISOString()).toBe(
        "2025-01-15T11:00:00.000Z"
      );

      await vi.advanceTimersByTimeAsync(FIFTEEN_MINUTES);
      expect(callback).toHaveBeenCalledTimes(2);
    });

    it("arms jobs scheduled after start immediately", async () => {
      const { scheduler } = setup();
      const callback = vi.fn();
      scheduler.start();
      scheduler.schedule("0 11 * * *", "job1", callback, []);

      expect(scheduler.nextRunAt("job1")?.toISOString()).toBe(
        "2025-01-15T11:00:00.000Z"
      );
      await vi.advanceTimersByTimeAsync(30 * 60 * 1000);
      expect(callback).toHaveBeenCalledTimes(1);
    });

    it("evaluates expressions in the configured timezone", () => {
      const { scheduler } = setup("America/New_York");
      scheduler.schedule("0 9 * * *", "job1", () => {}, []);
      scheduler.start();

      // 09:00 EST is 14:00 UTC
      expect(scheduler.nextRunAt("job1")?.toISOString()).toBe(
        "2025-01-15T14:00:00.000Z"
      );
    });

    it("chains timers for fire instants beyond the setTimeout limit", async () => {
      const { scheduler } = setup();
      const callback = vi.fn();
      scheduler.schedule("0 0 1 1 *", "yearly", callback, []);
      scheduler.start();

      const fireAt = scheduler.nextRunAt("yearly");
      expect(fireAt?.toISOString()).toBe("2026-01-01T00:00:00.000Z");

      await vi.advanceTimersByTimeAsync(30 * 24 * 60 * 60 * 1000);
      expect(callback).not.toHaveBeenCalled();

      await vi.advanceTimersByTimeAsync(
        Date.parse("2026-01-01T00:00:00.000Z") - Date.now()
      );
      expect(callback).toHaveBeenCalledTimes(1);
    });

    it("skips a fire while the previous run is still in flight", async () => {
      const { scheduler, log } = setup();
      let release: () => void = () => {};
      const callback = vi.fn(
        () =>
          new Promise<void>((resolve) => {
            release = resolve;
          })
      );
      scheduler.schedule("*/15 * * * *", "slow", callback, []);
      scheduler.start();

      await vi.advanceTimersByTimeAsync(FIFTEEN_MINUTES);
      expect(callback).toHaveBeenCalledTimes(1);

      await vi.advanceTimersByTimeAsync(FIFTEEN_MINUTES);
      expect(callback).toHaveBeenCalledTimes(1);
      expect(log.warn).toHaveBeenCalledWith(
        { jobId: "slow", scheduledFor: "2025-01-15T11:00:00.000Z" },
        "Skipping fire: previous run still in progress"
      );

      release();
      await flushMicrotasks();
      await vi.advanceTimersByTimeAsync(FIFTEEN_MINUTES);
      expect(callback).toHaveBeenCalledTimes(2);
    });

    it("keeps the in-flight guard across unschedule and re-registration", async () => {
      const { scheduler, log } = setup();
      let release: () => void = () => {};
      const callback = vi.fn(
        () =>
          new Promise<void>((resolve) => {
            release = resolve;
          })
      );
      scheduler.schedule("*/15 * * * *", "abc_job", callback, []);
      scheduler.start();

      await vi.advanceTimersByTimeAsync(FIFTEEN_MINUTES);
      expect(callback).toHaveBeenCalledTimes(1);

      scheduler.unschedule("abc_job");
      scheduler.schedule("*/15 * * * *", "abc_job", callback, []);

      await vi.advanceTimersByTimeAsync(FIFTEEN_MINUTES);
      expect(callback).toHaveBeenCalledTimes(1);
      expect(log.warn).toHaveBeenCalledWith(
        { jobId: "abc_job", scheduledFor: "2025-01-15T11:00:00.000Z" },
        "Skipping fire: previous run still in progress"
      );

      release();
      await flushMicrotasks();
      await vi.advanceTimersByTimeAsync(FIFTEEN_MINUTES);
      expect(callback).toHaveBeenCalledTimes(2);
    });

    it("logs a rejected callback and keeps the job scheduled", async () => {
      const { scheduler, log } = setup();
      const callback = vi.fn(async () => {
        throw new Error("boom");
      });
      scheduler.schedule("*/15 * * * *", "job1", callback, []);
      scheduler.start();

      await vi.advanceTimersByTimeAsync(FIFTEEN_MINUTES);
      await flushMicrotasks();

      expect(log.error).toHaveBeenCalledWith(
        { jobId: "job1", err: "boom" },
        "Trigger callback failed"
      );
      expect(scheduler.nextRunAt("job1")?.toISOString()).toBe(
        "2025-01-15T11:00:00.000Z"
      );

      await vi.advanceTimersByTimeAsync(FIFTEEN_MINUTES);
      expect(callback).toHaveBeenCalledTimes(2);
    });
  });

  describe("unschedule", () => {
    it("removes the trigger and cancels its timer", async () => {
      const { scheduler } = setup();
      const callback = vi.fn();
      scheduler.schedule("*/15 * * * *", "job1", callback, []);
      scheduler.start();

      expect(scheduler.unschedule("job1")).toBe(true);
      expect(scheduler.listScheduledIds()).toEqual([]);
      expect(scheduler.nextRunAt("job1")).toBeNull();

      await vi.advanceTimersByTimeAsync(4 * FIFTEEN_MINUTES);
      expect(callback).not.toHaveBeenCalled();
    });

    it("returns false for an unknown id", () => {
      expect(setup().scheduler.unschedule("missing")).toBe(false);
    });

    it("frees the id for a new registration", () => {
      const { scheduler } = setup();
      scheduler.schedule("*/15 * * * *", "job1", () => {}, []);
      scheduler.unschedule("job1");
      scheduler.schedule("0 * * * *", "job1", () => {}, []);

      expect(scheduler.listScheduledIds()).toEqual(["job1"]);
    });
  });

  describe("shutdown", () => {
    it("stops future fires but keeps registrations", async () => {
      const { scheduler, log } = setup();
      const callback = vi.fn();
      scheduler.schedule("*/15 * * * *", "job1", callback, []);
      scheduler.start();
      scheduler.shutdown();

      await vi.advanceTimersByTimeAsync(4 * FIFTEEN_MINUTES);
      expect(callback).not.toHaveBeenCalled();
      expect(scheduler.listScheduledIds()).toEqual(["job1"]);
      expect(log.info).toHaveBeenCalledWith(
        { triggers: 1 },
        "Trigger scheduler stopped"
      );
    });

    it("does not wait for a running callback", async () => {
      const { scheduler } = setup();
      const callback = vi.fn(() => new Promise<void>(() => {}));
      scheduler.schedule("*/15 * * * *", "job1", callback, []);
      scheduler.start();

      await vi.advanceTimersByTimeAsync(FIFTEEN_MINUTES);
      expect(callback).toHaveBeenCalledTimes(1);
      expect(() => scheduler.shutdown()).not.toThrow();
    });
  });
});
