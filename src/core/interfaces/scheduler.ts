/**
 * Scheduler interface.
 */

import type {
  CommandCallback,
  CronFieldsInput,
  IntervalSpec,
  JobInfo,
  SchedulerStatus,
  Trigger,
} from "../types/scheduler.js";

/**
 * Interface for the command scheduler.
 *
 * Job operations only take effect while the scheduler is running and
 * report failure through their return value instead of throwing.
 */
export interface IScheduler {
  /**
   * Start the timing loop. Returns false if already running.
   */
  start(): boolean;

  /**
   * Stop the timing loop and discard every job. Returns false if not running.
   */
  stop(): boolean;

  /**
   * Register the command callback, replacing any previous one.
   */
  setCommandCallback(callback: CommandCallback): void;

  /**
   * Add a job, replacing any job with the same id.
   */
  addJob(id: string, command: string, trigger: Trigger): boolean;

  /**
   * Remove a job by ID.
   */
  removeJob(id: string): boolean;

  /**
   * Snapshot of all jobs, soonest first.
   */
  getJobs(): JobInfo[];

  /**
   * Snapshot of one job.
   */
  getJob(id: string): JobInfo | undefined;

  /**
   * Dispatch a job's command now without touching its schedule.
   */
  runJob(id: string): boolean;

  /**
   * Get scheduler status.
   */
  status(): SchedulerStatus;

  scheduleOnce(id: string, command: string, at: Date): boolean;
  scheduleInterval(
    id: string,
    command: string,
    every: IntervalSpec,
    start?: Date,
  ): boolean;
  scheduleCron(
    id: string,
    command: string,
    fields: CronFieldsInput,
    timezone?: string,
  ): boolean;
  scheduleDaily(
    id: string,
    command: string,
    hour: number,
    minute?: number,
  ): boolean;
  scheduleWeekly(
    id: string,
    command: string,
    dayOfWeek: string | number,
    hour: number,
    minute?: number,
  ): boolean;
  scheduleFromText(id: string, command: string, text: string): boolean;
}
