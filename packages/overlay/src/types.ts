/**
 * HUD Types
 *
 * Data model shared by the controller, the sequencer and the renderer.
 */

/** Which status card is shown */
export type HudVariant = "loading" | "success" | "failure";

/** Appearance and pointer behavior of one presentation */
export type HudConfig = {
  /** Background color of the central card */
  backgroundColor: string;
  /** Color of the message label */
  textColor: string;
  /** Color of the full-screen mask behind the card */
  maskColor: string;
  /** When true, pointer events pass through the overlay */
  allowUserInteraction: boolean;
};

/** Presentation state, owned by the controller */
export type OverlayState = {
  isPresented: boolean;
  variant: HudVariant;
  message: string | null;
  config: HudConfig;
};

/** Sequencer lifecycle */
export type SequencerPhase = "hidden" | "appearing" | "settled" | "disappearing";

/** Animated card properties */
export type AnimationChannel = "cardScale" | "cardOpacity" | "maskOpacity" | "strokeProgress";

/** One sampled frame of the card animation */
export type AnimationFrame = Record<AnimationChannel, number> & {
  phase: SequencerPhase;
  isVisible: boolean;
  /** Show/hide cycle the frame belongs to */
  cycle: number;
};

export type Point = {
  x: number;
  y: number;
};

export type Rect = {
  x: number;
  y: number;
  width: number;
  height: number;
};

/** Drawn shapes */
export type StrokeShape = "checkmark" | "cross";

/**
 * Partial stroke of a shape. Each subpath is a polyline that starts with its own
 * move-to; renderers must not join consecutive subpaths.
 */
export type StrokePath = {
  subpaths: Point[][];
};

/** Per-call presentation options */
export type ShowLoadingOptions = {
  allowUserInteraction?: boolean;
  /** Hide automatically after this many milliseconds */
  autoHideAfterMs?: number;
};

export type ShowResultOptions = {
  allowUserInteraction?: boolean;
  /** Default: 1000 */
  autoHideAfterMs?: number;
  /** Called once, after the HUD is dismissed */
  onDismiss?: () => void;
};

/** Visual constants of the card that are not part of {@link HudConfig} */
export type HudCssTokens = {
  spinnerColor: string;
  checkmarkColor: string;
  crossColor: string;
  /** Indicator box edge, px */
  indicatorSize: number;
  strokeWidth: number;
  /** Gap between indicator and message, px */
  contentGap: number;
  cornerRadius: number;
  minCardWidth: number;
  /** Max card width, percent of the viewport width */
  maxCardWidthVw: number;
  shadowRadius: number;
  messageFontSize: number;
  zIndex: number;
};

export const DEFAULT_HUD_TOKENS: HudCssTokens = {
  spinnerColor: "orange",
  checkmarkColor: "orange",
  crossColor: "red",
  indicatorSize: 45,
  strokeWidth: 3,
  contentGap: 10,
  cornerRadius: 30,
  minCardWidth: 120,
  maxCardWidthVw: 40,
  shadowRadius: 12,
  messageFontSize: 16,
  zIndex: 9999,
};
