/**
 * Status HUD overlay
 *
 * Transient status card (loading spinner, animated checkmark, animated cross):
 * - Presentation controller with generation-tagged auto-hide
 * - Three-phase show/hide animation sequencer
 * - Progressive checkmark/cross stroke paths
 * - Framework-free render data
 */

// Types
export * from "./types";

// Configuration
export {
  DEFAULT_HUD_CONFIG,
  HudConfigError,
  HudConfigSchema,
  HudTimingSchema,
  MAX_TIMER_DELAY_MS,
  createHudConfig,
  getDefaultHudConfig,
  resetDefaultHudConfig,
  resolveHudTiming,
  setDefaultHudConfig,
} from "./config";

// State management
export { clearDismissedHud, createOverlayState, dismissHud, presentHud } from "./state";

// Shape paths
export {
  checkmarkPath,
  crossPath,
  strokePathFor,
  strokePathLength,
  toSvgPathData,
} from "./shapes";

// Controller
export {
  DEFAULT_RESULT_AUTO_HIDE_MS,
  HudController,
  createHudController,
  type DismissReason,
  type HudControllerEvents,
  type HudControllerOptions,
} from "./hudController";

// Animation
export {
  AnimationSequencer,
  buildAppearSteps,
  buildDisappearSteps,
  createAnimationSequencer,
  drawsStroke,
  type PhaseListener,
  type PhaseStep,
  type SequencerOptions,
} from "./animationSequencer";

// Renderer
export {
  generateHudCss,
  getCardClasses,
  getCardStyle,
  getHudPointerEvents,
  renderHud,
  renderIndicator,
  type HudIndicatorNode,
  type HudPointerEvents,
  type HudRenderTree,
  type HudSpinnerNode,
  type HudStrokeNode,
} from "./renderer";

// Mount
export { mountHudOverlay, type HudOverlayHandle, type HudOverlayOptions } from "./mount";

// Facade
export {
  HUD,
  getSharedHudController,
  resetSharedHudController,
  setSharedHudController,
} from "./hud";
