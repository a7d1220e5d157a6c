/**
 * Stroke path geometry helpers shared by the checkmark and cross generators.
 */

import type { Point, Rect, StrokePath } from "../types";

export function distance(a: Point, b: Point): number {
  return Math.hypot(a.x - b.x, a.y - b.y);
}

export function interpolate(a: Point, b: Point, t: number): Point {
  return {
    x: a.x + (b.x - a.x) * t,
    y: a.y + (b.y - a.y) * t,
  };
}

/** Point at fractional coordinates of a rect */
export function pointIn(rect: Rect, fx: number, fy: number): Point {
  return {
    x: rect.x + rect.width * fx,
    y: rect.y + rect.height * fy,
  };
}

/**
 * Fraction of `length` covered by `covered`. A zero-length segment yields 0.
 */
export function segmentFraction(covered: number, length: number): number {
  if (length === 0) {
    return 0;
  }
  return Math.min(1, covered / length);
}

/** Total drawn length across all subpaths */
export function strokePathLength(path: StrokePath): number {
  let total = 0;
  for (const subpath of path.subpaths) {
    for (let i = 1; i < subpath.length; i += 1) {
      total += distance(subpath[i - 1], subpath[i]);
    }
  }
  return total;
}

function formatCoordinate(value: number): string {
  const rounded = Number(value.toFixed(2));
  return Object.is(rounded, -0) ? "0" : String(rounded);
}

/**
 * SVG path data. Every subpath opens with its own `M`, so disjoint strokes stay disjoint.
 */
export function toSvgPathData(path: StrokePath): string {
  const commands: string[] = [];
  for (const subpath of path.subpaths) {
    subpath.forEach((point, index) => {
      const op = index === 0 ? "M" : "L";
      commands.push(`${op} ${formatCoordinate(point.x)} ${formatCoordinate(point.y)}`);
    });
  }
  return commands.join(" ");
}
