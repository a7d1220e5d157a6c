import { clamp } from "@status-hud/shared";
import type { Rect, StrokePath } from "../types";
import { distance, interpolate, pointIn, segmentFraction } from "./strokePath";

/**
 * Partial "X" inside `rect`.
 *
 * The top-left to bottom-right diagonal is drawn first. The second diagonal
 * (top-right to bottom-left) only appears once the first is complete, as its own subpath.
 */
export function crossPath(rect: Rect, progress: number): StrokePath {
  const a1 = pointIn(rect, 0.15, 0.15);
  const a2 = pointIn(rect, 0.85, 0.85);
  const b1 = pointIn(rect, 0.85, 0.15);
  const b2 = pointIn(rect, 0.15, 0.85);

  const d1 = distance(a1, a2);
  const d2 = distance(b1, b2);
  const current = clamp(progress, 0, 1) * (d1 + d2);

  if (current <= d1) {
    return { subpaths: [[a1, interpolate(a1, a2, segmentFraction(current, d1))]] };
  }

  const end = interpolate(b1, b2, segmentFraction(current - d1, d2));
  return {
    subpaths: [
      [a1, a2],
      [b1, end],
    ],
  };
}
