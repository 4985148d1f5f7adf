/**
 * Trigger construction and next-fire computation.
 *
 * Everything here is pure: the next fire time depends only on the trigger
 * and the reference time passed in.
 */

import { CronExpressionParser } from "cron-parser";
import { DateTime } from "luxon";
import {
  CRON_FIELD_NAMES,
  type CronFieldName,
  type CronFields,
  type CronFieldsInput,
  type CronTrigger,
  type IntervalSpec,
  type IntervalTrigger,
  type OnceTrigger,
  type Trigger,
  type TriggerSummary,
} from "../core/types/scheduler.js";
import {
  InvalidTriggerError,
  NoMatchError,
  describeError,
} from "../core/errors.js";
import { compileField, type FieldMatcher } from "./cron-fields.js";

/** Default forward window for cron searches, in years */
export const DEFAULT_CRON_SEARCH_YEARS = 4;

/** Largest distance from the epoch a Date can hold */
export const MAX_DATE_MS = 8_640_000_000_000_000;

/** Upper bound on skip-ahead steps while filtering week/year/day candidates */
const MAX_CRON_STEPS = 10_000;

/**
 * Value an unconstrained field takes when it is finer than every
 * constrained field. Coarser unconstrained fields match anything.
 */
const CRON_FIELD_DEFAULTS: Record<CronFieldName, string> = {
  year: "*",
  month: "1",
  day: "1",
  week: "*",
  dayOfWeek: "*",
  hour: "0",
  minute: "0",
  second: "0",
};

const INTERVAL_UNITS = [
  "weeks",
  "days",
  "hours",
  "minutes",
  "seconds",
] as const;

const MS_PER_UNIT: Record<(typeof INTERVAL_UNITS)[number], number> = {
  weeks: 7 * 24 * 60 * 60 * 1000,
  days: 24 * 60 * 60 * 1000,
  hours: 60 * 60 * 1000,
  minutes: 60 * 1000,
  seconds: 1000,
};

export interface NextFireOptions {
  /** Forward window for cron searches */
  searchYears?: number;
}

interface CompiledCron {
  expression: string;
  zone: string;
  year?: FieldMatcher;
  week?: FieldMatcher;
  day?: FieldMatcher;
}

function isValidDate(date: Date): boolean {
  return date instanceof Date && Number.isFinite(date.getTime());
}

/**
 * Whether a millisecond timestamp can be held by a Date.
 */
export function isRepresentableTime(ms: number): boolean {
  return Number.isFinite(ms) && Math.abs(ms) <= MAX_DATE_MS;
}

/**
 * Trigger that fires once at `at`.
 */
export function onceTrigger(at: Date): OnceTrigger {
  if (!isValidDate(at)) {
    throw new InvalidTriggerError("Once trigger needs a valid date");
  }
  const trigger: OnceTrigger = { kind: "once", at: new Date(at.getTime()) };
  return Object.freeze(trigger);
}

/**
 * Trigger that fires every `periodMs` counted from `start`.
 */
export function intervalTrigger(
  periodMs: number,
  start: Date = new Date(),
): IntervalTrigger {
  if (!Number.isInteger(periodMs) || periodMs <= 0) {
    throw new InvalidTriggerError(
      `Interval period must be a positive integer, got ${periodMs}`,
      { periodMs },
    );
  }
  if (!isValidDate(start)) {
    throw new InvalidTriggerError("Interval trigger needs a valid start date");
  }
  if (
    !Number.isSafeInteger(periodMs) ||
    !isRepresentableTime(start.getTime() + periodMs)
  ) {
    throw new InvalidTriggerError(
      `Interval period ${periodMs}ms is out of range`,
      { periodMs },
    );
  }

  const trigger: IntervalTrigger = {
    kind: "interval",
    periodMs,
    start: new Date(start.getTime()),
  };
  return Object.freeze(trigger);
}

/**
 * Trigger that fires when wall-clock time matches every given field.
 */
export function cronTrigger(
  input: CronFieldsInput,
  timezone?: string,
): CronTrigger {
  const fields: { [K in CronFieldName]?: string } = {};
  for (const name of CRON_FIELD_NAMES) {
    const value = input[name];
    if (value === undefined) continue;

    const text = String(value).trim().toLowerCase();
    if (!text) {
      throw new InvalidTriggerError(`Empty ${name} field`, { field: name });
    }
    fields[name] = text;
  }

  const trigger: CronTrigger = timezone
    ? { kind: "cron", fields: Object.freeze(fields), timezone }
    : { kind: "cron", fields: Object.freeze(fields) };

  // Fail at construction rather than at the first tick.
  compileCron(trigger);
  return Object.freeze(trigger);
}

/**
 * Total milliseconds of an interval spec.
 */
export function intervalToMs(spec: IntervalSpec): number {
  let total = 0;
  for (const unit of INTERVAL_UNITS) {
    const amount = spec[unit] ?? 0;
    if (!Number.isFinite(amount) || amount < 0) {
      throw new InvalidTriggerError(`Invalid interval ${unit}: ${amount}`, {
        unit,
        amount,
      });
    }
    total += amount * MS_PER_UNIT[unit];
  }

  total = Math.round(total);
  if (total <= 0) {
    throw new InvalidTriggerError("Interval must be longer than zero", {
      spec,
    });
  }
  if (!Number.isSafeInteger(total)) {
    throw new InvalidTriggerError("Interval is out of range", { spec });
  }
  return total;
}

/**
 * Fill unconstrained fields: those coarser than the finest constrained
 * field match anything, finer ones take their minimum.
 */
export function resolveCronFields(
  fields: CronFields,
): Record<CronFieldName, string> {
  let finest = -1;
  CRON_FIELD_NAMES.forEach((name, index) => {
    if (fields[name] !== undefined) finest = index;
  });

  const resolved = { ...CRON_FIELD_DEFAULTS };
  CRON_FIELD_NAMES.forEach((name, index) => {
    resolved[name] =
      fields[name] ?? (index < finest ? "*" : CRON_FIELD_DEFAULTS[name]);
  });
  return resolved;
}

/**
 * Six-field expression (second minute hour day month dayOfWeek).
 */
export function toCronExpression(fields: CronFields): string {
  const f = resolveCronFields(fields);
  return [f.second, f.minute, f.hour, f.day, f.month, f.dayOfWeek].join(" ");
}

function compileCron(trigger: CronTrigger): CompiledCron {
  const f = resolveCronFields(trigger.fields);

  // Classic cron ORs day-of-month with day-of-week; fields here are ANDed,
  // so day-of-month is checked separately when both are constrained.
  const splitDay = f.day !== "*" && f.dayOfWeek !== "*";
  const day = splitDay ? "*" : f.day;
  const expression = [f.second, f.minute, f.hour, day, f.month, f.dayOfWeek]
    .join(" ");

  try {
    CronExpressionParser.parse(expression, { tz: trigger.timezone });
  } catch (error) {
    throw new InvalidTriggerError(
      `Invalid cron fields: ${describeError(error)}`,
      { expression, timezone: trigger.timezone },
    );
  }

  return {
    expression,
    zone: trigger.timezone ?? "local",
    year: f.year === "*" ? undefined : compileField("year", f.year, 1970, 9999),
    week: f.week === "*" ? undefined : compileField("week", f.week, 1, 53),
    day: splitDay ? compileField("day", f.day, 1, 31) : undefined,
  };
}

/**
 * Start of the next period worth searching, or null when the candidate
 * matches. Calendar fields are read in the trigger's zone.
 */
function skipTarget(compiled: CompiledCron, candidate: Date): Date | null {
  const local = DateTime.fromJSDate(candidate).setZone(compiled.zone);

  if (compiled.year && !compiled.year(local.year)) {
    return local.startOf("year").plus({ years: 1 }).toJSDate();
  }
  if (compiled.week && !compiled.week(local.weekNumber)) {
    return local.startOf("week").plus({ weeks: 1 }).toJSDate();
  }
  if (compiled.day && !compiled.day(local.day)) {
    return local.startOf("day").plus({ days: 1 }).toJSDate();
  }
  return null;
}

function nextCronTime(
  trigger: CronTrigger,
  reference: Date,
  searchYears: number,
): Date {
  const compiled = compileCron(trigger);
  const endDate = new Date(reference.getTime());
  endDate.setFullYear(endDate.getFullYear() + searchYears);

  let cursor = reference;
  for (
    let step = 0;
    step < MAX_CRON_STEPS && cursor.getTime() < endDate.getTime();
    step++
  ) {
    const interval = CronExpressionParser.parse(compiled.expression, {
      currentDate: cursor,
      endDate,
      tz: trigger.timezone,
    });
    if (!interval.hasNext()) break;

    const candidate = new Date(interval.next().getTime());
    const skipTo = skipTarget(compiled, candidate);
    if (!skipTo) {
      return candidate;
    }
    cursor = new Date(skipTo.getTime() - 1);
  }

  throw new NoMatchError(
    `No time matching cron fields within ${searchYears} years of ` +
      reference.toISOString(),
    { fields: trigger.fields, expression: compiled.expression },
  );
}

/**
 * Earliest time strictly after `reference` at which the trigger fires, or
 * null when it can never fire again.
 *
 * @throws NoMatchError when a cron trigger has no match in the search window
 */
export function computeNextFireTime(
  trigger: Trigger,
  reference: Date,
  options: NextFireOptions = {},
): Date | null {
  switch (trigger.kind) {
    case "once":
      return trigger.at.getTime() > reference.getTime()
        ? new Date(trigger.at.getTime())
        : null;

    case "interval": {
      const start = trigger.start.getTime();
      // Whole periods elapsed; a late caller skips to the next future tick.
      const elapsed = reference.getTime() - start;
      const steps = Math.max(0, Math.floor(elapsed / trigger.periodMs) + 1);
      const next = start + steps * trigger.periodMs;
      return isRepresentableTime(next) ? new Date(next) : null;
    }

    case "cron":
      return nextCronTime(
        trigger,
        reference,
        options.searchYears ?? DEFAULT_CRON_SEARCH_YEARS,
      );

    default: {
      const unreachable: never = trigger;
      throw new InvalidTriggerError(
        `Unknown trigger ${JSON.stringify(unreachable)}`,
      );
    }
  }
}

/**
 * Serializable summary of a trigger.
 */
export function summarizeTrigger(trigger: Trigger): TriggerSummary {
  switch (trigger.kind) {
    case "once":
      return { kind: "once", at: trigger.at.toISOString() };
    case "interval":
      return {
        kind: "interval",
        periodMs: trigger.periodMs,
        start: trigger.start.toISOString(),
      };
    case "cron":
      return {
        kind: "cron",
        expression: toCronExpression(trigger.fields),
        fields: { ...trigger.fields },
        ...(trigger.timezone ? { timezone: trigger.timezone } : {}),
      };
  }
}
