/**
 * Feature Flags
 *
 * Centralized flag definitions for the HUD packages.
 * Flags can be controlled via environment variables or runtime configuration.
 */

import type { LogLevel } from "./observability/types.js";
import { LOG_LEVELS } from "./observability/types.js";

/**
 * Read a boolean flag from an environment variable or string value.
 */
function readBooleanFlag(value: string | undefined, fallback: boolean): boolean {
  if (value === undefined) {
    return fallback;
  }
  return value === "true" || value === "1";
}

function readLogLevel(value: string | undefined, fallback: LogLevel): LogLevel {
  const normalized = value?.trim().toLowerCase();
  for (const level of LOG_LEVELS) {
    if (level === normalized) {
      return level;
    }
  }
  return fallback;
}

function readEnvValue(key: string): string | undefined {
  if (typeof process === "undefined") {
    return undefined;
  }
  return process.env[key];
}

export type FeatureFlags = {
  /** Minimum level written by the default logger. Default: info */
  log_level: LogLevel;
  /**
   * Collapse every show/hide phase and the stroke animation to zero duration.
   * Intended for screenshot runs and server-side rendering. Default: false
   */
  instant_transitions: boolean;
};

/**
 * Feature flag definitions.
 * Default values are set here; can be overridden via environment variables.
 */
export const FEATURE_FLAGS: Readonly<FeatureFlags> = {
  log_level: readLogLevel(readEnvValue("HUD_LOG_LEVEL"), "info"),
  instant_transitions: readBooleanFlag(readEnvValue("HUD_INSTANT_TRANSITIONS"), false),
};

/**
 * Runtime feature flag overrides.
 * Allows programmatic control of feature flags for testing or dynamic configuration.
 */
let runtimeOverrides: Partial<FeatureFlags> = {};

/**
 * Override a feature flag at runtime.
 */
export function setFeatureFlagOverride<K extends keyof FeatureFlags>(
  flag: K,
  value: FeatureFlags[K]
): void {
  runtimeOverrides = { ...runtimeOverrides, [flag]: value };
}

/**
 * Clear all runtime feature flag overrides.
 */
export function clearFeatureFlagOverrides(): void {
  runtimeOverrides = {};
}

/**
 * Get the effective value of a feature flag, considering runtime overrides.
 */
export function getFeatureFlag<K extends keyof FeatureFlags>(flag: K): FeatureFlags[K] {
  const effective: FeatureFlags = { ...FEATURE_FLAGS, ...runtimeOverrides };
  return effective[flag];
}
