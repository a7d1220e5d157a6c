import { clamp } from "@status-hud/shared";
import type { Rect, StrokePath } from "../types";
import { distance, interpolate, pointIn, segmentFraction } from "./strokePath";

/**
 * Partial checkmark inside `rect`.
 *
 * Two segments, drawn in order: lower-left to the bottom joint, then the joint to the
 * upper-right tip. `progress` (clamped to 0..1) is the share of the combined length drawn.
 */
export function checkmarkPath(rect: Rect, progress: number): StrokePath {
  const p1 = pointIn(rect, 0.25, 0.5);
  const p2 = pointIn(rect, 0.5, 0.75);
  const p3 = pointIn(rect, 0.85, 0.25);

  const d12 = distance(p1, p2);
  const d23 = distance(p2, p3);
  const current = clamp(progress, 0, 1) * (d12 + d23);

  if (current <= d12) {
    return { subpaths: [[p1, interpolate(p1, p2, segmentFraction(current, d12))]] };
  }

  const tip = interpolate(p2, p3, segmentFraction(current - d12, d23));
  return { subpaths: [[p1, p2, tip]] };
}
