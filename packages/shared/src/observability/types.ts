/**
 * Observability Types
 *
 * Structured log entries shared by the controller, the sequencer and the facade.
 */

/** Correlation context attached to every entry written by a logger */
export type CorrelationContext = {
  /** Controller instance ID */
  controllerId: string;
  /** Presentation generation the entry belongs to */
  generation: number;
  /** Sequencer cycle the entry belongs to */
  cycle: number;
};

export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogCategory = "presentation" | "animation" | "config" | "facade";

/** Structured log entry */
export type LogEntry = {
  timestamp: string;
  level: LogLevel;
  category: LogCategory;
  message: string;
  context: Partial<CorrelationContext>;
  data?: Record<string, unknown>;
};

export const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];
