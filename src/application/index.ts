/**
 * Application module - scheduling logic.
 */

export {
  Scheduler,
  createScheduler,
  DEFAULT_TICK_INTERVAL_MS,
  type SchedulerOptions,
} from "./scheduler.js";
export { parseSchedule, tryParseSchedule } from "./schedule-parser.js";
export {
  onceTrigger,
  intervalTrigger,
  cronTrigger,
  intervalToMs,
  computeNextFireTime,
  resolveCronFields,
  toCronExpression,
  summarizeTrigger,
  DEFAULT_CRON_SEARCH_YEARS,
  type NextFireOptions,
} from "./triggers.js";
