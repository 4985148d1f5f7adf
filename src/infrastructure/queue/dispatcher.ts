/**
 * Fire queue and worker pool that run command callbacks off the timing loop.
 */

import type {
  CommandResult,
  FireOutcome,
  FireRequest,
} from "../../core/types/scheduler.js";
import {
  CallbackFailure,
  CommandTimeoutError,
  describeError,
  type SchedulerError,
} from "../../core/errors.js";
import logger from "../../utils/logger.js";

/** Default number of concurrent command workers */
export const DEFAULT_WORKERS = 4;

/** Default bound on a single command: 5 minutes */
export const DEFAULT_COMMAND_TIMEOUT_MS = 5 * 60 * 1000;

/**
 * Simple async FIFO queue. Closing it wakes every waiting consumer with null.
 */
export class AsyncQueue<T> {
  private queue: T[] = [];
  private resolvers: ((value: T | null) => void)[] = [];
  private closed = false;

  /**
   * Enqueue an item. Returns false once the queue is closed.
   */
  push(item: T): boolean {
    if (this.closed) {
      return false;
    }

    const resolver = this.resolvers.shift();
    if (resolver) {
      resolver(item);
    } else {
      this.queue.push(item);
    }
    return true;
  }

  /**
   * Next item, waiting if none is queued; null after close.
   */
  async pop(): Promise<T | null> {
    const item = this.queue.shift();
    if (item !== undefined) {
      return item;
    }
    if (this.closed) {
      return null;
    }
    return new Promise((resolve) => {
      this.resolvers.push(resolve);
    });
  }

  /**
   * Close the queue and return the items nobody consumed.
   */
  close(): T[] {
    this.closed = true;
    const dropped = this.queue;
    this.queue = [];
    for (const resolve of this.resolvers.splice(0)) {
      resolve(null);
    }
    return dropped;
  }

  get size(): number {
    return this.queue.length;
  }

  get isClosed(): boolean {
    return this.closed;
  }
}

export interface DispatcherOptions {
  workers?: number;
  commandTimeoutMs?: number;
}

/**
 * Runs fired commands on a fixed pool of workers.
 *
 * The timing loop only pushes requests; workers pull them in FIFO order,
 * so one job's successive firings start in the order they were fired.
 */
export class CommandDispatcher {
  private readonly queue = new AsyncQueue<FireRequest>();
  private readonly workerCount: number;
  private readonly commandTimeoutMs: number;
  private workers: Promise<void>[] = [];
  private _inFlight = 0;

  constructor(options: DispatcherOptions = {}) {
    this.workerCount = Math.max(1, options.workers ?? DEFAULT_WORKERS);
    this.commandTimeoutMs =
      options.commandTimeoutMs ?? DEFAULT_COMMAND_TIMEOUT_MS;
  }

  /**
   * Spawn the worker pool.
   */
  start(): void {
    if (this.workers.length > 0 || this.queue.isClosed) {
      return;
    }
    this.workers = Array.from({ length: this.workerCount }, (_, index) =>
      this.runWorker(index),
    );
  }

  /**
   * Queue a firing. Returns false when the dispatcher has been stopped.
   */
  dispatch(request: FireRequest): boolean {
    return this.queue.push(request);
  }

  /**
   * Stop accepting work and drop queued firings. In-flight commands finish
   * on their own. Returns the number of dropped firings.
   */
  stop(): number {
    const dropped = this.queue.close();
    for (const request of dropped) {
      logger.warn(
        { jobId: request.jobId, firedAt: request.firedAt.toISOString() },
        "Dispatcher: dropped queued command on stop",
      );
    }
    return dropped.length;
  }

  /**
   * Resolves once every worker has exited, i.e. after stop() and the
   * last in-flight command.
   */
  async idle(): Promise<void> {
    await Promise.all(this.workers);
  }

  get inFlight(): number {
    return this._inFlight;
  }

  get pending(): number {
    return this.queue.size;
  }

  private async runWorker(index: number): Promise<void> {
    for (;;) {
      const request = await this.queue.pop();
      if (request === null) {
        logger.debug({ worker: index }, "Dispatcher: worker exiting");
        return;
      }

      this._inFlight++;
      try {
        const outcome = await this.invoke(request);
        request.onSettled?.(outcome);
      } catch (error) {
        logger.error(
          { jobId: request.jobId, error },
          "Dispatcher: error reporting outcome",
        );
      } finally {
        this._inFlight--;
      }
    }
  }

  private async invoke(request: FireRequest): Promise<FireOutcome> {
    const { jobId, command, firedAt } = request;
    const startedAt = Date.now();
    let timedOut = false;

    const call: Promise<CommandResult> = Promise.resolve().then(() =>
      request.callback(command),
    );

    let rejectTimeout: (error: SchedulerError) => void = () => {};
    const timeout = new Promise<never>((_, reject) => {
      rejectTimeout = reject;
    });
    const timer = setTimeout(() => {
      timedOut = true;
      rejectTimeout(
        new CommandTimeoutError(
          `Command for job '${jobId}' did not finish within ` +
            `${this.commandTimeoutMs}ms`,
          { jobId, command },
        ),
      );
    }, this.commandTimeoutMs);

    // Late results are still observed once the worker has moved on.
    void call.then(
      () => {
        if (!timedOut) return;
        logger.warn({ jobId }, "Dispatcher: command finished after timeout");
      },
      (error: unknown) => {
        if (!timedOut) return;
        logger.error(
          { jobId, error },
          "Dispatcher: command failed after timeout",
        );
      },
    );

    logger.debug({ jobId, command }, "Dispatcher: executing command");

    try {
      const result = await Promise.race([call, timeout]);
      const durationMs = Date.now() - startedAt;
      logger.info({ jobId, durationMs }, "Dispatcher: command completed");
      return {
        jobId,
        firedAt,
        status: "ok",
        durationMs,
        ...(typeof result === "string" ? { result } : {}),
      };
    } catch (error) {
      const failure =
        error instanceof CommandTimeoutError
          ? error
          : new CallbackFailure(
              `Command for job '${jobId}' failed: ${describeError(error)}`,
              { jobId, command, cause: error },
            );
      logger.error(
        { jobId, command, error: failure },
        "Dispatcher: command failed",
      );
      return {
        jobId,
        firedAt,
        status: "error",
        durationMs: Date.now() - startedAt,
        error: failure,
      };
    } finally {
      clearTimeout(timer);
    }
  }
}
