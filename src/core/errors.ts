/**
 * Error taxonomy for the scheduler.
 */

export type SchedulerErrorCode =
  | "CONFIGURATION_ERROR"
  | "UNPARSABLE_SCHEDULE"
  | "INVALID_TRIGGER"
  | "TRIGGER_EXHAUSTED"
  | "NO_MATCH"
  | "CALLBACK_FAILURE"
  | "COMMAND_TIMEOUT";

/**
 * Base class for every error the scheduler raises or logs.
 */
export class SchedulerError extends Error {
  constructor(
    message: string,
    public readonly code: SchedulerErrorCode,
    public readonly details?: unknown,
  ) {
    super(message);
    this.name = "SchedulerError";
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Operation attempted while the scheduler is stopped, or invalid
 * configuration.
 */
export class ConfigurationError extends SchedulerError {
  constructor(message: string, details?: unknown) {
    super(message, "CONFIGURATION_ERROR", details);
    this.name = "ConfigurationError";
  }
}

/**
 * Schedule text matches no known phrasing, or carries a malformed number
 * or time.
 */
export class UnparsableScheduleError extends SchedulerError {
  constructor(
    public readonly text: string,
    reason?: string,
  ) {
    super(
      reason
        ? `Cannot parse schedule '${text}': ${reason}`
        : `Cannot parse schedule '${text}'`,
      "UNPARSABLE_SCHEDULE",
      { text },
    );
    this.name = "UnparsableScheduleError";
  }
}

export class InvalidTriggerError extends SchedulerError {
  constructor(message: string, details?: unknown) {
    super(message, "INVALID_TRIGGER", details);
    this.name = "InvalidTriggerError";
  }
}

/**
 * A one-shot trigger whose time already passed at registration.
 */
export class TriggerExhaustedError extends SchedulerError {
  constructor(message: string, details?: unknown) {
    super(message, "TRIGGER_EXHAUSTED", details);
    this.name = "TriggerExhaustedError";
  }
}

/**
 * Cron search ran past its forward window.
 */
export class NoMatchError extends SchedulerError {
  constructor(message: string, details?: unknown) {
    super(message, "NO_MATCH", details);
    this.name = "NoMatchError";
  }
}

export class CallbackFailure extends SchedulerError {
  constructor(message: string, details?: unknown) {
    super(message, "CALLBACK_FAILURE", details);
    this.name = "CallbackFailure";
  }
}

export class CommandTimeoutError extends SchedulerError {
  constructor(message: string, details?: unknown) {
    super(message, "COMMAND_TIMEOUT", details);
    this.name = "CommandTimeoutError";
  }
}

/**
 * Best-effort message for an unknown thrown value.
 */
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
