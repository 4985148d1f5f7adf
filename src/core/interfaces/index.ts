/**
 * Core interface exports.
 */

export * from "./scheduler.js";
