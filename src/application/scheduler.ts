/**
 * Command scheduler: owns the job set, runs the timing loop and hands due
 * commands to the dispatcher.
 */

import type {
  CommandCallback,
  CronFieldsInput,
  IntervalSpec,
  Job,
  JobInfo,
  SchedulerStatus,
  Trigger,
} from "../core/types/scheduler.js";
import type { IScheduler } from "../core/interfaces/scheduler.js";
import {
  ConfigurationError,
  InvalidTriggerError,
  TriggerExhaustedError,
} from "../core/errors.js";
import {
  CommandDispatcher,
  DEFAULT_COMMAND_TIMEOUT_MS,
  DEFAULT_WORKERS,
} from "../infrastructure/queue/index.js";
import type { AppConfig } from "../infrastructure/config/index.js";
import {
  DEFAULT_CRON_SEARCH_YEARS,
  computeNextFireTime,
  cronTrigger,
  intervalToMs,
  intervalTrigger,
  isRepresentableTime,
  onceTrigger,
  summarizeTrigger,
} from "./triggers.js";
import { parseSchedule } from "./schedule-parser.js";
import logger from "../utils/logger.js";

/** Default gap between due-job checks: 1 second */
export const DEFAULT_TICK_INTERVAL_MS = 1000;

export interface SchedulerOptions {
  tickIntervalMs?: number;
  workers?: number;
  commandTimeoutMs?: number;
  cronSearchYears?: number;
  /** Timezone for cron triggers built by scheduleCron/Daily/Weekly */
  timezone?: string;
  onCommand?: CommandCallback;
}

function toJobInfo(job: Job): JobInfo {
  return {
    id: job.id,
    command: job.command,
    nextRunAt: job.nextRunAt ? new Date(job.nextRunAt.getTime()) : null,
    trigger: summarizeTrigger(job.trigger),
    createdAt: new Date(job.createdAt.getTime()),
    ...(job.lastRunAt ? { lastRunAt: new Date(job.lastRunAt.getTime()) } : {}),
    ...(job.lastStatus ? { lastStatus: job.lastStatus } : {}),
    ...(job.lastError ? { lastError: job.lastError } : {}),
  };
}

/**
 * In-memory command scheduler.
 *
 * Jobs live only while the scheduler runs; stop() discards them. Every
 * public operation reports failure through its return value and logs the
 * cause instead of throwing.
 */
export class Scheduler implements IScheduler {
  private readonly tickIntervalMs: number;
  private readonly workers: number;
  private readonly commandTimeoutMs: number;
  private readonly cronSearchYears: number;
  private readonly timezone: string | undefined;

  private jobs: Map<string, Job> = new Map();
  private onCommand: CommandCallback | null;
  private dispatcher: CommandDispatcher | null = null;
  private timerTimeout: ReturnType<typeof setTimeout> | null = null;
  private _running = false;

  constructor(options: SchedulerOptions = {}) {
    this.tickIntervalMs = options.tickIntervalMs ?? DEFAULT_TICK_INTERVAL_MS;
    this.workers = options.workers ?? DEFAULT_WORKERS;
    this.commandTimeoutMs =
      options.commandTimeoutMs ?? DEFAULT_COMMAND_TIMEOUT_MS;
    this.cronSearchYears = options.cronSearchYears ?? DEFAULT_CRON_SEARCH_YEARS;
    this.timezone = options.timezone;
    this.onCommand = options.onCommand ?? null;
  }

  get running(): boolean {
    return this._running;
  }

  /**
   * Start the timing loop and the worker pool.
   */
  start(): boolean {
    if (this._running) {
      logger.warn("Scheduler already running");
      return false;
    }

    this._running = true;
    this.dispatcher = new CommandDispatcher({
      workers: this.workers,
      commandTimeoutMs: this.commandTimeoutMs,
    });
    this.dispatcher.start();
    this.armTimer();
    logger.info(
      { tickIntervalMs: this.tickIntervalMs, workers: this.workers },
      "Scheduler started",
    );
    return true;
  }

  /**
   * Stop the timing loop and discard all jobs. Commands already running
   * are left to finish; queued ones are dropped.
   */
  stop(): boolean {
    if (!this._running) {
      logger.warn("Scheduler not running");
      return false;
    }

    this._running = false;
    if (this.timerTimeout) {
      clearTimeout(this.timerTimeout);
      this.timerTimeout = null;
    }

    const discarded = this.jobs.size;
    this.jobs.clear();
    const dropped = this.dispatcher?.stop() ?? 0;
    this.dispatcher = null;

    logger.info({ discarded, dropped }, "Scheduler stopped");
    return true;
  }

  /**
   * Register the command callback, replacing any previous one.
   */
  setCommandCallback(callback: CommandCallback): void {
    this.onCommand = callback;
  }

  // ========== Job management ==========

  /**
   * Add a job, atomically replacing any job with the same id.
   *
   * A one-shot trigger whose time has already passed is rejected.
   */
  addJob(id: string, command: string, trigger: Trigger): boolean {
    if (!this.ensureRunning("add job", id)) {
      return false;
    }
    if (!id.trim() || !command.trim()) {
      logger.warn(
        { jobId: id },
        "Scheduler: job id and command must not be empty",
      );
      return false;
    }

    const now = new Date();
    let nextRunAt: Date | null;
    try {
      nextRunAt = computeNextFireTime(trigger, now, {
        searchYears: this.cronSearchYears,
      });
    } catch (error) {
      logger.error(
        { jobId: id, error },
        "Scheduler: failed to compute first run",
      );
      return false;
    }

    if (!nextRunAt) {
      const error = new TriggerExhaustedError(
        `Trigger for job '${id}' has no future fire time`,
        { jobId: id, trigger: summarizeTrigger(trigger) },
      );
      logger.warn({ jobId: id, error }, "Scheduler: rejected job");
      return false;
    }
    if (!isRepresentableTime(nextRunAt.getTime())) {
      const error = new InvalidTriggerError(
        `Trigger for job '${id}' gives a run time out of range`,
        { jobId: id, kind: trigger.kind },
      );
      logger.warn({ jobId: id, error }, "Scheduler: rejected job");
      return false;
    }

    const replaced = this.jobs.has(id);
    this.jobs.set(id, { id, command, trigger, createdAt: now, nextRunAt });
    this.armTimer();

    logger.info(
      { jobId: id, kind: trigger.kind, nextRunAt: nextRunAt.toISOString() },
      replaced ? "Scheduler: replaced job" : "Scheduler: added job",
    );
    return true;
  }

  /**
   * Remove a job by ID.
   */
  removeJob(id: string): boolean {
    if (!this.ensureRunning("remove job", id)) {
      return false;
    }

    const removed = this.jobs.delete(id);
    if (removed) {
      this.armTimer();
      logger.info({ jobId: id }, "Scheduler: removed job");
    } else {
      logger.debug({ jobId: id }, "Scheduler: no such job to remove");
    }
    return removed;
  }

  /**
   * List all jobs, soonest first.
   */
  getJobs(): JobInfo[] {
    if (!this._running) {
      return [];
    }
    return Array.from(this.jobs.values())
      .map(toJobInfo)
      .sort(
        (a, b) =>
          (a.nextRunAt?.getTime() ?? Infinity) -
          (b.nextRunAt?.getTime() ?? Infinity),
      );
  }

  getJob(id: string): JobInfo | undefined {
    const job = this._running ? this.jobs.get(id) : undefined;
    return job ? toJobInfo(job) : undefined;
  }

  /**
   * Manually run a job now. Its schedule is left as is.
   */
  runJob(id: string): boolean {
    if (!this.ensureRunning("run job", id)) {
      return false;
    }

    const job = this.jobs.get(id);
    if (!job) {
      logger.warn({ jobId: id }, "Scheduler: no such job to run");
      return false;
    }

    const now = new Date();
    job.lastRunAt = now;
    return this.dispatch(job, now);
  }

  /**
   * Get scheduler status.
   */
  status(): SchedulerStatus {
    const nextWake = this.getNextWakeMs();
    return {
      running: this._running,
      jobCount: this.jobs.size,
      nextWakeAt: nextWake === undefined ? null : new Date(nextWake),
      inFlight: this.dispatcher?.inFlight ?? 0,
    };
  }

  // ========== Convenience constructors ==========

  scheduleOnce(id: string, command: string, at: Date): boolean {
    return this.addBuilt(id, command, () => onceTrigger(at));
  }

  scheduleInterval(
    id: string,
    command: string,
    every: IntervalSpec,
    start?: Date,
  ): boolean {
    return this.addBuilt(id, command, () =>
      intervalTrigger(intervalToMs(every), start),
    );
  }

  scheduleCron(
    id: string,
    command: string,
    fields: CronFieldsInput,
    timezone: string | undefined = this.timezone,
  ): boolean {
    return this.addBuilt(id, command, () => cronTrigger(fields, timezone));
  }

  scheduleDaily(
    id: string,
    command: string,
    hour: number,
    minute = 0,
  ): boolean {
    return this.scheduleCron(id, command, { hour, minute });
  }

  scheduleWeekly(
    id: string,
    command: string,
    dayOfWeek: string | number,
    hour: number,
    minute = 0,
  ): boolean {
    return this.scheduleCron(id, command, { dayOfWeek, hour, minute });
  }

  /**
   * Schedule from a phrase such as "every day at 7:00" or "in 30 minutes".
   */
  scheduleFromText(id: string, command: string, text: string): boolean {
    return this.addBuilt(id, command, () => parseSchedule(text));
  }

  // ========== Timing loop ==========

  private ensureRunning(operation: string, jobId: string): boolean {
    if (this._running) {
      return true;
    }
    const error = new ConfigurationError(
      `Cannot ${operation}: scheduler is not running`,
    );
    logger.error({ jobId, error }, `Scheduler: cannot ${operation}`);
    return false;
  }

  private addBuilt(
    id: string,
    command: string,
    build: () => Trigger,
  ): boolean {
    let trigger: Trigger;
    try {
      trigger = build();
    } catch (error) {
      logger.error({ jobId: id, error }, "Scheduler: invalid schedule");
      return false;
    }
    return this.addJob(id, command, trigger);
  }

  /**
   * Get the earliest next run time across all jobs.
   */
  private getNextWakeMs(): number | undefined {
    let earliest: number | undefined;
    for (const job of this.jobs.values()) {
      const at = job.nextRunAt?.getTime();
      if (at === undefined) continue;
      if (earliest === undefined || at < earliest) {
        earliest = at;
      }
    }
    return earliest;
  }

  /**
   * Schedule the next tick: at the earliest due job, but never later than
   * one tick interval.
   */
  private armTimer(): void {
    if (this.timerTimeout) {
      clearTimeout(this.timerTimeout);
      this.timerTimeout = null;
    }
    if (!this._running) {
      return;
    }

    const nextWake = this.getNextWakeMs();
    const delayMs =
      nextWake === undefined
        ? this.tickIntervalMs
        : Math.min(
            this.tickIntervalMs,
            Math.max(0, nextWake - Date.now()),
          );

    this.timerTimeout = setTimeout(() => {
      this.timerTimeout = null;
      this.onTimer();
      this.armTimer();
    }, delayMs);
  }

  /**
   * Handle timer tick - dispatch due jobs and advance their schedules.
   */
  private onTimer(): void {
    if (!this._running) {
      return;
    }

    const now = new Date();
    const dueJobs = Array.from(this.jobs.values()).filter(
      (job) =>
        job.nextRunAt !== null && job.nextRunAt.getTime() <= now.getTime(),
    );

    for (const job of dueJobs) {
      try {
        job.lastRunAt = now;
        this.dispatch(job, now);
        this.advance(job, now);
      } catch (error) {
        logger.error(
          { jobId: job.id, error },
          "Scheduler: failed to fire job",
        );
      }
    }
  }

  private dispatch(job: Job, firedAt: Date): boolean {
    const callback = this.onCommand;
    if (!callback || !this.dispatcher) {
      job.lastStatus = "skipped";
      logger.warn(
        { jobId: job.id },
        "Scheduler: no command callback set, skipping job",
      );
      return false;
    }

    logger.info(
      { jobId: job.id, command: job.command },
      "Scheduler: executing job",
    );
    return this.dispatcher.dispatch({
      jobId: job.id,
      command: job.command,
      firedAt,
      callback,
      onSettled: (outcome) => {
        job.lastStatus = outcome.status;
        job.lastError = outcome.error?.message;
      },
    });
  }

  /**
   * Move a fired job to its next run, dropping it when exhausted.
   */
  private advance(job: Job, firedAt: Date): void {
    let next: Date | null;
    try {
      next = computeNextFireTime(job.trigger, firedAt, {
        searchYears: this.cronSearchYears,
      });
    } catch (error) {
      logger.error(
        { jobId: job.id, error },
        "Scheduler: no further run time, removing job",
      );
      next = null;
    }

    job.nextRunAt = next;
    if (next === null) {
      if (this.jobs.get(job.id) === job) {
        this.jobs.delete(job.id);
      }
      logger.info({ jobId: job.id }, "Scheduler: job exhausted");
    }
  }
}

/**
 * Build a scheduler from loaded configuration.
 */
export function createScheduler(
  config: AppConfig,
  onCommand?: CommandCallback,
): Scheduler {
  return new Scheduler({ ...config.scheduler, onCommand });
}
