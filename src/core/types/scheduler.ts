/**
 * Scheduler types for one-shot, interval and cron triggers.
 */

import type { SchedulerError } from "../errors.js";

/**
 * Fires exactly once at `at`.
 */
export interface OnceTrigger {
  readonly kind: "once";
  readonly at: Date;
}

/**
 * Fires every `periodMs`, counted from `start`.
 */
export interface IntervalTrigger {
  readonly kind: "interval";
  readonly periodMs: number;
  readonly start: Date;
}

export const CRON_FIELD_NAMES = [
  "year",
  "month",
  "day",
  "week",
  "dayOfWeek",
  "hour",
  "minute",
  "second",
] as const;

export type CronFieldName = (typeof CRON_FIELD_NAMES)[number];

/**
 * Cron-field constraints. A missing field is unconstrained.
 */
export type CronFields = { readonly [K in CronFieldName]?: string };

/**
 * Constructor input for cron fields; numbers are stringified.
 */
export type CronFieldsInput = { [K in CronFieldName]?: string | number };

/**
 * Fires whenever wall-clock time matches every constrained field.
 */
export interface CronTrigger {
  readonly kind: "cron";
  readonly fields: CronFields;
  /** IANA timezone for second..dayOfWeek; defaults to local time */
  readonly timezone?: string;
}

export type Trigger = OnceTrigger | IntervalTrigger | CronTrigger;

export type TriggerKind = Trigger["kind"];

/**
 * Serializable description of a trigger.
 */
export type TriggerSummary =
  | { kind: "once"; at: string }
  | { kind: "interval"; periodMs: number; start: string }
  | { kind: "cron"; expression: string; fields: CronFields; timezone?: string };

/**
 * Duration parts accepted by interval helpers.
 */
export interface IntervalSpec {
  weeks?: number;
  days?: number;
  hours?: number;
  minutes?: number;
  seconds?: number;
}

export type JobStatus = "ok" | "error" | "skipped";

/**
 * A scheduled job. Owned by the scheduler; never handed out.
 */
export interface Job {
  readonly id: string;
  readonly command: string;
  readonly trigger: Trigger;
  readonly createdAt: Date;
  /** null once a one-shot trigger has fired */
  nextRunAt: Date | null;
  lastRunAt?: Date;
  lastStatus?: JobStatus;
  lastError?: string;
}

/**
 * Read-only snapshot of a job.
 */
export interface JobInfo {
  id: string;
  command: string;
  nextRunAt: Date | null;
  trigger: TriggerSummary;
  createdAt: Date;
  lastRunAt?: Date;
  lastStatus?: JobStatus;
  lastError?: string;
}

export type CommandResult = string | void;

/**
 * Executes a command and returns its outcome.
 */
export type CommandCallback = (
  command: string,
) => CommandResult | Promise<CommandResult>;

/**
 * One dispatched firing of a job.
 */
export interface FireRequest {
  jobId: string;
  command: string;
  firedAt: Date;
  callback: CommandCallback;
  onSettled?: (outcome: FireOutcome) => void;
}

export interface FireOutcome {
  jobId: string;
  firedAt: Date;
  status: "ok" | "error";
  durationMs: number;
  result?: string;
  error?: SchedulerError;
}

export interface SchedulerStatus {
  running: boolean;
  jobCount: number;
  nextWakeAt: Date | null;
  inFlight: number;
}
