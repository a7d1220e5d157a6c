/**
 * HUD Renderer
 *
 * Maps presentation state plus a sampled animation frame to render data.
 * Platform-agnostic rendering data - actual DOM rendering is done by the UI layer.
 */

import { isNonEmptyString } from "@status-hud/shared";
import { strokePathFor, toSvgPathData } from "./shapes";
import type {
  AnimationFrame,
  HudCssTokens,
  HudVariant,
  OverlayState,
  StrokeShape,
} from "./types";
import { DEFAULT_HUD_TOKENS } from "./types";

export type HudPointerEvents = "auto" | "none";

export type HudSpinnerNode = {
  kind: "spinner";
  color: string;
  size: number;
};

export type HudStrokeNode = {
  kind: "stroke";
  shape: StrokeShape;
  color: string;
  size: number;
  lineWidth: number;
  lineCap: "round";
  lineJoin: "round";
  progress: number;
  /** SVG path data in a `0 0 size size` view box */
  pathData: string;
};

export type HudIndicatorNode = HudSpinnerNode | HudStrokeNode;

export type HudRenderTree = {
  pointerEvents: HudPointerEvents;
  mask: {
    className: string;
    color: string;
    opacity: number;
  };
  card: {
    classes: string[];
    style: Record<string, string>;
    indicator: HudIndicatorNode;
    message: {
      text: string;
      style: Record<string, string>;
    } | null;
  };
};

const STROKE_SHAPES: Record<Exclude<HudVariant, "loading">, StrokeShape> = {
  success: "checkmark",
  failure: "cross",
};

/**
 * Pointer policy: the overlay swallows input only while the card is on screen
 * and the presentation does not allow interaction.
 */
export function getHudPointerEvents(state: OverlayState, frame: AnimationFrame): HudPointerEvents {
  return frame.isVisible && !state.config.allowUserInteraction ? "auto" : "none";
}

/** Build the indicator node for a variant */
export function renderIndicator(
  variant: HudVariant,
  strokeProgress: number,
  tokens: HudCssTokens = DEFAULT_HUD_TOKENS
): HudIndicatorNode {
  if (variant === "loading") {
    return { kind: "spinner", color: tokens.spinnerColor, size: tokens.indicatorSize };
  }

  const shape = STROKE_SHAPES[variant];
  const size = tokens.indicatorSize;
  const path = strokePathFor(shape, { x: 0, y: 0, width: size, height: size }, strokeProgress);

  return {
    kind: "stroke",
    shape,
    color: shape === "checkmark" ? tokens.checkmarkColor : tokens.crossColor,
    size,
    lineWidth: tokens.strokeWidth,
    lineCap: "round",
    lineJoin: "round",
    progress: strokeProgress,
    pathData: toSvgPathData(path),
  };
}

/**
 * Inline style for the card element at the given frame
 */
export function getCardStyle(
  state: OverlayState,
  frame: AnimationFrame,
  tokens: HudCssTokens = DEFAULT_HUD_TOKENS
): Record<string, string> {
  return {
    transform: `scale(${frame.cardScale})`,
    opacity: `${frame.cardOpacity}`,
    background: state.config.backgroundColor,
    borderRadius: `${tokens.cornerRadius}px`,
    minWidth: `${tokens.minCardWidth}px`,
    maxWidth: `${tokens.maxCardWidthVw}vw`,
    padding: `${tokens.contentGap * 2}px 20px`,
    gap: `${tokens.contentGap}px`,
    boxShadow: `0 0 ${tokens.shadowRadius}px rgba(0, 0, 0, 0.33)`,
  };
}

/**
 * Get CSS class names for the card
 */
export function getCardClasses(variant: HudVariant): string[] {
  return ["hud-card", `hud-card--${variant}`];
}

/**
 * Render the overlay. Returns null once the hide animation has finished.
 */
export function renderHud(
  state: OverlayState,
  frame: AnimationFrame,
  tokens: HudCssTokens = DEFAULT_HUD_TOKENS
): HudRenderTree | null {
  if (!frame.isVisible) {
    return null;
  }

  const message = isNonEmptyString(state.message)
    ? {
        text: state.message,
        style: {
          color: state.config.textColor,
          fontSize: `${tokens.messageFontSize}px`,
          textAlign: "center",
          padding: "0 8px",
        },
      }
    : null;

  return {
    pointerEvents: getHudPointerEvents(state, frame),
    mask: {
      className: "hud-mask",
      color: state.config.maskColor,
      opacity: frame.maskOpacity,
    },
    card: {
      classes: getCardClasses(state.variant),
      style: getCardStyle(state, frame, tokens),
      indicator: renderIndicator(state.variant, frame.strokeProgress, tokens),
      message,
    },
  };
}

/**
 * Generate CSS for the overlay
 */
export function generateHudCss(tokens: HudCssTokens = DEFAULT_HUD_TOKENS): string {
  return `
.hud-root {
  position: fixed;
  inset: 0;
  display: flex;
  align-items: center;
  justify-content: center;
  z-index: ${tokens.zIndex};
}

.hud-mask {
  position: absolute;
  inset: 0;
}

.hud-card {
  position: relative;
  display: flex;
  flex-direction: column;
  align-items: center;
  box-sizing: border-box;
}

.hud-spinner {
  width: ${tokens.indicatorSize}px;
  height: ${tokens.indicatorSize}px;
  border: ${tokens.strokeWidth}px solid transparent;
  border-top-color: ${tokens.spinnerColor};
  border-radius: 50%;
  animation: hud-spin 0.8s linear infinite;
}

.hud-stroke {
  width: ${tokens.indicatorSize}px;
  height: ${tokens.indicatorSize}px;
  fill: none;
}

@keyframes hud-spin {
  to {
    transform: rotate(360deg);
  }
}
`.trim();
}
