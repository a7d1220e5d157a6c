import type { Rect, StrokePath, StrokeShape } from "../types";
import { checkmarkPath } from "./checkmark";
import { crossPath } from "./cross";

export { checkmarkPath } from "./checkmark";
export { crossPath } from "./cross";
export {
  distance,
  interpolate,
  pointIn,
  segmentFraction,
  strokePathLength,
  toSvgPathData,
} from "./strokePath";

const GENERATORS: Record<StrokeShape, (rect: Rect, progress: number) => StrokePath> = {
  checkmark: checkmarkPath,
  cross: crossPath,
};

/** Partial stroke path for `shape` */
export function strokePathFor(shape: StrokeShape, rect: Rect, progress: number): StrokePath {
  return GENERATORS[shape](rect, progress);
}
