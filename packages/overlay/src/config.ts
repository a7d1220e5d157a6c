/**
 * HUD Configuration
 *
 * Zod schemas for the values callers hand in at construction time, plus the
 * process-wide default config that new controllers start from.
 */

import { HUD_TIMING, INSTANT_TIMING, getFeatureFlag, type HudTiming } from "@status-hud/shared";
import { z } from "zod";
import type { HudConfig } from "./types";

export const HudConfigSchema = z.object({
  backgroundColor: z.string().trim().min(1),
  textColor: z.string().trim().min(1),
  maskColor: z.string().trim().min(1),
  allowUserInteraction: z.boolean(),
});

/** Largest delay `setTimeout` honors; longer ones fire after 1ms */
export const MAX_TIMER_DELAY_MS = 2_147_483_647;

export const HudTimingSchema = z.object({
  baseMs: z.number().finite().nonnegative().max(MAX_TIMER_DELAY_MS),
  strokeMs: z.number().finite().nonnegative().max(MAX_TIMER_DELAY_MS),
});

/** Defaults carried over from the original card design */
export const DEFAULT_HUD_CONFIG: HudConfig = {
  backgroundColor: "rgba(245, 245, 245, 0.9)",
  textColor: "rgba(130, 130, 130, 1)",
  maskColor: "rgba(0, 0, 0, 0.4)",
  allowUserInteraction: false,
};

/**
 * Thrown when a config or timing override fails validation.
 */
export class HudConfigError extends Error {
  constructor(
    message: string,
    public readonly issues: z.ZodIssue[]
  ) {
    super(message);
    this.name = "HudConfigError";
  }
}

function formatIssues(issues: z.ZodIssue[]): string {
  return issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`).join("; ");
}

let defaultConfig: HudConfig = { ...DEFAULT_HUD_CONFIG };

/**
 * Validate overrides on top of the current default config.
 */
export function createHudConfig(overrides: Partial<HudConfig> = {}): HudConfig {
  const result = HudConfigSchema.safeParse({ ...defaultConfig, ...overrides });
  if (!result.success) {
    throw new HudConfigError(
      `Invalid HUD config: ${formatIssues(result.error.issues)}`,
      result.error.issues
    );
  }
  return result.data;
}

export function getDefaultHudConfig(): HudConfig {
  return { ...defaultConfig };
}

/** Change the defaults used by controllers created afterwards */
export function setDefaultHudConfig(overrides: Partial<HudConfig>): HudConfig {
  defaultConfig = createHudConfig(overrides);
  return getDefaultHudConfig();
}

export function resetDefaultHudConfig(): void {
  defaultConfig = { ...DEFAULT_HUD_CONFIG };
}

/**
 * Resolve sequencer timing. `instant_transitions` swaps the baseline for zero durations.
 */
export function resolveHudTiming(overrides: Partial<HudTiming> = {}): HudTiming {
  const baseline = getFeatureFlag("instant_transitions") ? INSTANT_TIMING : HUD_TIMING;
  const result = HudTimingSchema.safeParse({ ...baseline, ...overrides });
  if (!result.success) {
    throw new HudConfigError(
      `Invalid HUD timing: ${formatIssues(result.error.issues)}`,
      result.error.issues
    );
  }
  return result.data;
}
