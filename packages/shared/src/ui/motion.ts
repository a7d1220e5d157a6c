/**
 * Shared Motion Constants for the HUD card.
 *
 * Timings follow a "pop" silhouette: a fast ease-out grow past the resting size,
 * then two short ease-in-out settles. Curves are CSS-equivalent cubic Béziers.
 */

import { cubicBezier } from "framer-motion";

export type EasingName = "linear" | "easeOut" | "easeInOut";

export type EasingFunction = (progress: number) => number;

export type BezierTuple = readonly [number, number, number, number];

export const EASING_CURVES = {
  easeOut: [0, 0, 0.58, 1],
  easeInOut: [0.42, 0, 0.58, 1],
} as const satisfies Record<Exclude<EasingName, "linear">, BezierTuple>;

const linear: EasingFunction = (progress) => progress;

const EASINGS: Record<EasingName, EasingFunction> = {
  linear,
  easeOut: cubicBezier(...EASING_CURVES.easeOut),
  easeInOut: cubicBezier(...EASING_CURVES.easeInOut),
};

export function getEasing(name: EasingName): EasingFunction {
  return EASINGS[name];
}

/** Card timing in milliseconds */
export type HudTiming = {
  /** Base duration the three phases are derived from */
  baseMs: number;
  /** Duration of the linear checkmark/cross stroke reveal */
  strokeMs: number;
};

export const HUD_TIMING: HudTiming = {
  baseMs: 300,
  strokeMs: 600,
};

export const INSTANT_TIMING: HudTiming = {
  baseMs: 0,
  strokeMs: 0,
};

/** Per-phase durations of one show or hide sequence */
export type PhaseDurations = readonly [number, number, number];

export function getPhaseDurations(timing: HudTiming): PhaseDurations {
  return [timing.baseMs / 1.5, timing.baseMs / 2, timing.baseMs / 2];
}

/** Card scale keyframes */
export const CARD_SCALE = {
  collapsed: 0.001,
  overshoot: 1.1,
  undershoot: 0.9,
  resting: 1,
  exit: 0.1,
} as const;
