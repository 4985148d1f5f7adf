/**
 * Matchers for the cron fields cron-parser does not evaluate itself:
 * ISO week, year, and day-of-month when it must be ANDed with day-of-week.
 */

import { InvalidTriggerError } from "../core/errors.js";

export type FieldMatcher = (value: number) => boolean;

interface FieldRange {
  from: number;
  to: number;
  step: number;
}

const STEP_PATTERN = /^(\*|\d+(?:-\d+)?)(?:\/(\d+))?$/;

/**
 * Compile a constraint such as "*", "5", "1-10", "*\/2", "2025-2030/2" or a
 * comma list of those into a predicate over [min, max].
 */
export function compileField(
  name: string,
  spec: string,
  min: number,
  max: number,
): FieldMatcher {
  const ranges: FieldRange[] = [];

  for (const part of spec.split(",")) {
    const match = STEP_PATTERN.exec(part.trim());
    if (!match) {
      throw new InvalidTriggerError(`Invalid ${name} field '${spec}'`, {
        field: name,
        spec,
      });
    }

    const [, range, stepText] = match;
    const step = stepText === undefined ? 1 : Number(stepText);
    let from = min;
    let to = max;
    if (range !== "*") {
      const bounds = range.split("-").map(Number);
      from = bounds[0];
      if (bounds.length > 1) {
        to = bounds[1];
      } else {
        to = stepText === undefined ? from : max;
      }
    }

    if (step < 1 || from < min || to > max || from > to) {
      throw new InvalidTriggerError(`Out of range ${name} field '${spec}'`, {
        field: name,
        spec,
      });
    }
    ranges.push({ from, to, step });
  }

  return (value) =>
    ranges.some(
      ({ from, to, step }) =>
        value >= from && value <= to && (value - from) % step === 0,
    );
}
