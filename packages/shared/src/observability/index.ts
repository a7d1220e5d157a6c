/**
 * Observability
 *
 * Structured logging for HUD presentation and animation events.
 */

export * from "./logger.js";
export * from "./types.js";
