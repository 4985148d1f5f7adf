/**
 * Queue infrastructure exports.
 */

export {
  AsyncQueue,
  CommandDispatcher,
  DEFAULT_WORKERS,
  DEFAULT_COMMAND_TIMEOUT_MS,
  type DispatcherOptions,
} from "./dispatcher.js";
