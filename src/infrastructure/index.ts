/**
 * Infrastructure module - configuration and command dispatch.
 */

export * from "./queue/index.js";
export * from "./config/index.js";
