/**
 * Natural language schedule parser.
 *
 * Converts a small fixed set of phrasings to triggers:
 * - "every day at 7:00", "daily at 7"      → cron { hour, minute }
 * - "every 10 minutes", "every 2 hours"    → interval
 * - "tomorrow at 9", "tomorrow at 9:30"    → once (local time)
 * - "in 30 minutes", "in 2 hours"          → once
 *
 * Rules are tried in order and the first match wins, so "every 5 minutes
 * in 2 hours" is an interval.
 */

import type { Trigger } from "../core/types/scheduler.js";
import {
  InvalidTriggerError,
  UnparsableScheduleError,
} from "../core/errors.js";
import { cronTrigger, intervalTrigger, onceTrigger } from "./triggers.js";

const MINUTE_MS = 60 * 1000;
const HOUR_MS = 60 * MINUTE_MS;

interface ScheduleRule {
  name: string;
  pattern: RegExp;
  build: (captured: string, now: Date, text: string) => Trigger;
}

interface TimeOfDay {
  hour: number;
  minute: number;
}

function parseCount(value: string, text: string): number {
  if (!/^\d+$/.test(value)) {
    throw new UnparsableScheduleError(text, `'${value}' is not a whole number`);
  }
  const count = Number(value);
  if (count <= 0) {
    throw new UnparsableScheduleError(text, "count must be greater than zero");
  }
  return count;
}

function parseTimeOfDay(value: string, text: string): TimeOfDay {
  const match = /^(\d{1,2})(?::(\d{2}))?$/.exec(value);
  if (!match) {
    throw new UnparsableScheduleError(text, `'${value}' is not a time of day`);
  }

  const hour = Number(match[1]);
  const minute = match[2] === undefined ? 0 : Number(match[2]);
  if (hour > 23 || minute > 59) {
    throw new UnparsableScheduleError(text, `'${value}' is out of range`);
  }
  return { hour, minute };
}

function after(now: Date, ms: number): Trigger {
  return onceTrigger(new Date(now.getTime() + ms));
}

const RULES: readonly ScheduleRule[] = [
  {
    name: "daily",
    pattern: /\b(?:every\s+day|daily)\s+at\s+(\S+)/,
    build: (captured, _now, text) => {
      const { hour, minute } = parseTimeOfDay(captured, text);
      return cronTrigger({ hour: String(hour), minute: String(minute) });
    },
  },
  {
    name: "every-minutes",
    pattern: /\bevery\s+(\S+)\s+minutes?\b/,
    build: (captured, now, text) =>
      intervalTrigger(parseCount(captured, text) * MINUTE_MS, now),
  },
  {
    name: "every-hours",
    pattern: /\bevery\s+(\S+)\s+hours?\b/,
    build: (captured, now, text) =>
      intervalTrigger(parseCount(captured, text) * HOUR_MS, now),
  },
  {
    name: "tomorrow",
    pattern: /\btomorrow\s+at\s+(\S+)/,
    build: (captured, now, text) => {
      const { hour, minute } = parseTimeOfDay(captured, text);
      return onceTrigger(
        new Date(
          now.getFullYear(),
          now.getMonth(),
          now.getDate() + 1,
          hour,
          minute,
          0,
          0,
        ),
      );
    },
  },
  {
    name: "in-minutes",
    pattern: /\bin\s+(\S+)\s+minutes?\b/,
    build: (captured, now, text) =>
      after(now, parseCount(captured, text) * MINUTE_MS),
  },
  {
    name: "in-hours",
    pattern: /\bin\s+(\S+)\s+hours?\b/,
    build: (captured, now, text) =>
      after(now, parseCount(captured, text) * HOUR_MS),
  },
];

/**
 * Parse a schedule phrase into a trigger.
 *
 * @param now - Reference time for relative phrases; defaults to now
 * @throws UnparsableScheduleError when no rule matches or a matched value is
 * malformed or too large
 */
export function parseSchedule(text: string, now: Date = new Date()): Trigger {
  const normalized = text.toLowerCase().trim().replace(/\s+/g, " ");

  for (const rule of RULES) {
    const match = rule.pattern.exec(normalized);
    if (!match) continue;

    try {
      return rule.build(match[1], now, text);
    } catch (error) {
      if (error instanceof InvalidTriggerError) {
        throw new UnparsableScheduleError(text, error.message);
      }
      throw error;
    }
  }

  throw new UnparsableScheduleError(text);
}

/**
 * Like parseSchedule, but returns null instead of throwing.
 */
export function tryParseSchedule(
  text: string,
  now: Date = new Date(),
): Trigger | null {
  try {
    return parseSchedule(text, now);
  } catch (error) {
    if (error instanceof UnparsableScheduleError) {
      return null;
    }
    throw error;
  }
}
