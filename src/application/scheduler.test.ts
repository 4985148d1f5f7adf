import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { Scheduler, createScheduler } from "./scheduler.js";
import { intervalTrigger } from "./triggers.js";
import type { Trigger } from "../core/types/scheduler.js";
import { ConfigSchema } from "../infrastructure/config/index.js";

const SECOND = 1000;
const MINUTE = 60 * SECOND;

describe("Scheduler", () => {
  // Wednesday, 10 June 2026, 06:30 local time
  const start = new Date(2026, 5, 10, 6, 30, 0);
  let scheduler: Scheduler;

  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(start);
    scheduler = new Scheduler({ tickIntervalMs: SECOND });
  });

  afterEach(() => {
    if (scheduler.running) {
      scheduler.stop();
    }
    vi.useRealTimers();
  });

  describe("lifecycle", () => {
    it("starts and stops once", () => {
      expect(scheduler.start()).toBe(true);
      expect(scheduler.start()).toBe(false);
      expect(scheduler.stop()).toBe(true);
      expect(scheduler.stop()).toBe(false);
    });

    it("rejects job operations while stopped", () => {
      const trigger = intervalTrigger(MINUTE);
      expect(scheduler.addJob("a", "lights on", trigger)).toBe(false);
      expect(
        scheduler.scheduleFromText("a", "lights on", "in 5 minutes"),
      ).toBe(false);
      expect(scheduler.removeJob("a")).toBe(false);
      expect(scheduler.runJob("a")).toBe(false);
      expect(scheduler.getJobs()).toEqual([]);
    });

    it("comes back empty after stop and start", () => {
      scheduler.start();
      scheduler.scheduleDaily("wake", "good morning", 7);
      scheduler.scheduleInterval("water", "water plants", { minutes: 10 });
      expect(scheduler.getJobs()).toHaveLength(2);

      scheduler.stop();
      scheduler.start();
      expect(scheduler.getJobs()).toEqual([]);
      expect(scheduler.status().jobCount).toBe(0);
    });
  });

  describe("job management", () => {
    beforeEach(() => {
      scheduler.start();
    });

    it("computes the first run when a job is added", () => {
      expect(scheduler.scheduleDaily("wake", "good morning", 7, 0)).toBe(true);

      const [job] = scheduler.getJobs();
      expect(job.id).toBe("wake");
      expect(job.command).toBe("good morning");
      expect(job.nextRunAt).toEqual(new Date(2026, 5, 10, 7, 0, 0));
      expect(job.trigger).toEqual({
        kind: "cron",
        expression: "0 0 7 * * *",
        fields: { hour: "7", minute: "0" },
      });
    });

    it("schedules weekly jobs on the next matching weekday", () => {
      expect(
        scheduler.scheduleWeekly("bins", "take out the bins", "mon", 19, 30),
      ).toBe(true);
      expect(scheduler.getJob("bins")?.nextRunAt).toEqual(
        new Date(2026, 5, 15, 19, 30, 0),
      );
    });

    it("schedules from natural language", () => {
      expect(
        scheduler.scheduleFromText("tea", "make tea", "in 30 minutes"),
      ).toBe(true);
      expect(scheduler.getJob("tea")?.nextRunAt).toEqual(
        new Date(start.getTime() + 30 * MINUTE),
      );
      expect(
        scheduler.scheduleFromText("junk", "make tea", "nonsense text"),
      ).toBe(false);
      expect(scheduler.getJob("junk")).toBeUndefined();
    });

    it("replaces a job that reuses an id", () => {
      scheduler.scheduleInterval("job", "first command", { minutes: 5 });
      expect(scheduler.scheduleDaily("job", "second command", 7)).toBe(true);

      const jobs = scheduler.getJobs();
      expect(jobs).toHaveLength(1);
      expect(jobs[0].command).toBe("second command");
      expect(jobs[0].trigger.kind).toBe("cron");
    });

    it("keeps the old job when its replacement is rejected", () => {
      scheduler.scheduleInterval("job", "first command", { minutes: 5 });
      const past = new Date(start.getTime() - SECOND);
      expect(scheduler.scheduleOnce("job", "late", past)).toBe(false);

      const jobs = scheduler.getJobs();
      expect(jobs).toHaveLength(1);
      expect(jobs[0].command).toBe("first command");
    });

    it("rejects one-shot jobs whose time has passed", () => {
      const past = new Date(start.getTime() - SECOND);
      expect(scheduler.scheduleOnce("late", "too late", past)).toBe(false);
      expect(scheduler.getJobs()).toEqual([]);
    });

    it("rejects schedules whose counts overflow a date", () => {
      expect(
        scheduler.scheduleFromText(
          "big",
          "cmd",
          "every 1000000000000000 minutes",
        ),
      ).toBe(false);
      expect(
        scheduler.scheduleFromText("far", "cmd", "in 999999999999999 minutes"),
      ).toBe(false);
      expect(
        scheduler.scheduleInterval("huge", "cmd", { minutes: 1e15 }),
      ).toBe(false);

      expect(scheduler.getJobs()).toEqual([]);
      expect(scheduler.status().nextWakeAt).toBeNull();
    });

    it("rejects a trigger whose next run no date can hold", async () => {
      const far: Trigger = { kind: "interval", periodMs: 1e20, start };
      const timers = vi.spyOn(globalThis, "setTimeout");

      expect(scheduler.addJob("far", "cmd", far)).toBe(false);
      expect(scheduler.getJobs()).toEqual([]);

      await vi.advanceTimersByTimeAsync(SECOND);
      expect(timers).toHaveBeenCalledTimes(1);
      timers.mockRestore();
    });

    it("rejects empty ids, empty commands and invalid schedules", () => {
      expect(scheduler.scheduleInterval("", "cmd", { minutes: 1 })).toBe(false);
      expect(scheduler.scheduleInterval("id", " ", { minutes: 1 })).toBe(false);
      expect(scheduler.scheduleInterval("id", "cmd", {})).toBe(false);
      expect(scheduler.scheduleDaily("id", "cmd", 25)).toBe(false);
      expect(scheduler.getJobs()).toEqual([]);
    });

    it("removes jobs and reports missing ones", () => {
      scheduler.scheduleInterval("water", "water plants", { minutes: 10 });
      expect(scheduler.removeJob("missing")).toBe(false);
      expect(scheduler.removeJob("water")).toBe(true);
      expect(scheduler.getJobs()).toEqual([]);
    });

    it("lists jobs soonest first as detached snapshots", () => {
      scheduler.scheduleInterval("later", "later", { hours: 2 });
      scheduler.scheduleInterval("sooner", "sooner", { minutes: 10 });

      const jobs = scheduler.getJobs();
      expect(jobs.map((job) => job.id)).toEqual(["sooner", "later"]);

      jobs[0].nextRunAt?.setFullYear(2000);
      jobs[0].command = "changed";
      expect(scheduler.getJob("sooner")?.nextRunAt).toEqual(
        new Date(start.getTime() + 10 * MINUTE),
      );
      expect(scheduler.getJob("sooner")?.command).toBe("sooner");
    });

    it("keeps every job from many concurrent adds", async () => {
      const results = await Promise.all(
        Array.from({ length: 50 }, (_, i) =>
          Promise.resolve().then(() =>
            scheduler.scheduleInterval(`job-${i}`, `command ${i}`, {
              minutes: i + 1,
            }),
          ),
        ),
      );

      expect(results.every(Boolean)).toBe(true);
      const ids = new Set(scheduler.getJobs().map((job) => job.id));
      expect(ids.size).toBe(50);
      expect(ids.has("job-0")).toBe(true);
      expect(ids.has("job-49")).toBe(true);
    });

    it("reports status", () => {
      scheduler.scheduleInterval("water", "water plants", { minutes: 10 });
      expect(scheduler.status()).toEqual({
        running: true,
        jobCount: 1,
        nextWakeAt: new Date(start.getTime() + 10 * MINUTE),
        inFlight: 0,
      });
    });
  });

  describe("timing loop", () => {
    const callback = vi.fn(
      async (command: string) => `done: ${command}`,
    );

    beforeEach(() => {
      callback.mockClear();
      scheduler.setCommandCallback(callback);
      scheduler.start();
    });

    it("fires a one-shot job once and then drops it", async () => {
      const at = new Date(start.getTime() + 5 * SECOND);
      scheduler.scheduleOnce("tea", "make tea", at);

      await vi.advanceTimersByTimeAsync(4 * SECOND);
      expect(callback).not.toHaveBeenCalled();

      await vi.advanceTimersByTimeAsync(SECOND);
      expect(callback).toHaveBeenCalledTimes(1);
      expect(callback).toHaveBeenCalledWith("make tea");
      expect(scheduler.getJobs()).toEqual([]);

      await vi.advanceTimersByTimeAsync(10 * SECOND);
      expect(callback).toHaveBeenCalledTimes(1);
    });

    it("fires interval jobs once per period", async () => {
      scheduler.scheduleInterval("water", "water plants", { minutes: 10 });

      await vi.advanceTimersByTimeAsync(30 * MINUTE);

      expect(callback).toHaveBeenCalledTimes(3);
      const [job] = scheduler.getJobs();
      expect(job.nextRunAt).toEqual(new Date(start.getTime() + 40 * MINUTE));
      expect(job.lastRunAt).toEqual(new Date(start.getTime() + 30 * MINUTE));
      expect(job.lastStatus).toBe("ok");
    });

    it("fires cron jobs at the matching wall-clock time", async () => {
      scheduler.scheduleDaily("wake", "good morning", 7);

      await vi.advanceTimersByTimeAsync(30 * MINUTE);

      expect(callback).toHaveBeenCalledWith("good morning");
      expect(scheduler.getJob("wake")?.nextRunAt).toEqual(
        new Date(2026, 5, 11, 7, 0, 0),
      );
    });

    it("keeps a failing job on its schedule", async () => {
      const failing = vi.fn(
        async (_command: string): Promise<string> => {
          throw new Error("device offline");
        },
      );
      scheduler.setCommandCallback(failing);
      scheduler.scheduleInterval("lamp", "lamp on", { minutes: 1 });

      await vi.advanceTimersByTimeAsync(MINUTE);

      expect(failing).toHaveBeenCalledTimes(1);
      const job = scheduler.getJob("lamp");
      expect(job?.lastStatus).toBe("error");
      expect(job?.lastError).toBe(
        "Command for job 'lamp' failed: device offline",
      );
      expect(job?.nextRunAt).toEqual(new Date(start.getTime() + 2 * MINUTE));

      await vi.advanceTimersByTimeAsync(MINUTE);
      expect(failing).toHaveBeenCalledTimes(2);
    });

    it("does not let a slow command hold up other jobs", async () => {
      const mixed = vi.fn((command: string) =>
        command === "slow"
          ? new Promise<string>(() => {})
          : `done: ${command}`,
      );
      scheduler.setCommandCallback(mixed);
      const soon = new Date(start.getTime() + SECOND);
      const later = new Date(start.getTime() + 2 * SECOND);
      scheduler.scheduleOnce("slow", "slow", soon);
      scheduler.scheduleOnce("fast", "fast", later);

      await vi.advanceTimersByTimeAsync(2 * SECOND);

      expect(mixed).toHaveBeenCalledWith("slow");
      expect(mixed).toHaveBeenCalledWith("fast");
      expect(scheduler.status().inFlight).toBe(1);
    });

    it("skips due jobs while no callback is set", async () => {
      const bare = new Scheduler({ tickIntervalMs: SECOND });
      bare.start();
      bare.scheduleInterval("water", "water plants", { minutes: 1 });

      await vi.advanceTimersByTimeAsync(MINUTE);

      const job = bare.getJob("water");
      expect(job?.lastStatus).toBe("skipped");
      expect(job?.nextRunAt).toEqual(new Date(start.getTime() + 2 * MINUTE));
      bare.stop();
    });

    it("runs a job on demand without moving its schedule", async () => {
      scheduler.scheduleDaily("wake", "good morning", 7);

      expect(scheduler.runJob("wake")).toBe(true);
      expect(scheduler.runJob("missing")).toBe(false);
      await vi.advanceTimersByTimeAsync(0);

      expect(callback).toHaveBeenCalledWith("good morning");
      expect(scheduler.getJob("wake")?.nextRunAt).toEqual(
        new Date(2026, 5, 10, 7, 0, 0),
      );
    });

    it("fires nothing after stop", async () => {
      const at = new Date(start.getTime() + 5 * SECOND);
      scheduler.scheduleOnce("tea", "make tea", at);
      scheduler.stop();

      await vi.advanceTimersByTimeAsync(10 * SECOND);
      expect(callback).not.toHaveBeenCalled();
    });
  });
});

describe("createScheduler", () => {
  it("builds a stopped scheduler from configuration", () => {
    const config = ConfigSchema.parse({ scheduler: { workers: 2 } });
    const scheduler = createScheduler(config);
    expect(scheduler.status()).toEqual({
      running: false,
      jobCount: 0,
      nextWakeAt: null,
      inFlight: 0,
    });
  });
});
