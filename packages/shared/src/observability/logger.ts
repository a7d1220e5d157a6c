import { getFeatureFlag } from "../featureFlags.js";
import type { CorrelationContext, LogCategory, LogEntry, LogLevel } from "./types.js";

export type LoggerConfig = {
  minLevel: LogLevel;
  /** Write formatted lines to stdout (debug/info) and stderr (warn/error) */
  console: boolean;
  handler?: (entry: LogEntry) => void;
  context?: Partial<CorrelationContext>;
};

const LEVEL_RANK: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

function formatEntry(entry: LogEntry): string {
  const owner = entry.context.controllerId ? ` (hud:${entry.context.controllerId})` : "";
  const head = `[${entry.timestamp}] [${entry.level.toUpperCase()}] [${entry.category}]${owner}`;
  return entry.data ? `${head} ${entry.message} ${JSON.stringify(entry.data)}` : `${head} ${entry.message}`;
}

/**
 * Structured logger for the HUD packages. Entries carry the controller,
 * presentation generation and sequencer cycle they belong to.
 */
export class HudLogger {
  private readonly config: LoggerConfig;

  constructor(config: Partial<LoggerConfig> = {}) {
    this.config = {
      minLevel: config.minLevel ?? "info",
      console: config.console ?? true,
      handler: config.handler,
      context: { ...config.context },
    };
  }

  /** Logger sharing this one's sinks, with `context` merged in */
  child(context: Partial<CorrelationContext>): HudLogger {
    return new HudLogger({ ...this.config, context: { ...this.config.context, ...context } });
  }

  getMinLevel(): LogLevel {
    return this.config.minLevel;
  }

  debug(category: LogCategory, message: string, data?: Record<string, unknown>): void {
    this.write("debug", category, message, data);
  }

  warn(category: LogCategory, message: string, data?: Record<string, unknown>): void {
    this.write("warn", category, message, data);
  }

  logPresentation(generation: number, action: string, details: Record<string, unknown>): void {
    this.debug("presentation", `Presentation #${generation} -> ${action}`, {
      generation,
      action,
      ...details,
    });
  }

  logPhase(cycle: number, phase: string, details: Record<string, unknown> = {}): void {
    this.debug("animation", `Cycle #${cycle} -> ${phase}`, { cycle, phase, ...details });
  }

  logStaleTimer(kind: "auto-hide" | "phase", token: number, current: number): void {
    this.debug(
      kind === "phase" ? "animation" : "presentation",
      `Suppressed stale ${kind} timer (${token} != ${current})`,
      { kind, token, current }
    );
  }

  private write(
    level: LogLevel,
    category: LogCategory,
    message: string,
    data?: Record<string, unknown>
  ): void {
    if (LEVEL_RANK[level] < LEVEL_RANK[this.config.minLevel]) {
      return;
    }
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      category,
      message,
      context: { ...this.config.context },
      data,
    };
    this.config.handler?.(entry);
    if (this.config.console && typeof process !== "undefined") {
      const stream = LEVEL_RANK[level] >= LEVEL_RANK.warn ? process.stderr : process.stdout;
      stream.write(`${formatEntry(entry)}\n`);
    }
  }
}

let defaultLogger: HudLogger | null = null;

/** Process-wide logger; its minimum level comes from the `log_level` flag */
export function getLogger(): HudLogger {
  if (!defaultLogger) {
    defaultLogger = new HudLogger({ minLevel: getFeatureFlag("log_level") });
  }
  return defaultLogger;
}

export function setDefaultLogger(logger: HudLogger): void {
  defaultLogger = logger;
}

export function resetDefaultLogger(): void {
  defaultLogger = null;
}
