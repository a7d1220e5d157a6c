/**
 * HUD Overlay Mount
 *
 * Attaches a controller to an animation sequencer and the renderer for one
 * overlay host, usually once at the application root.
 */

import { AnimationSequencer, type PhaseListener, type SequencerOptions } from "./animationSequencer";
import type { HudController } from "./hudController";
import { type HudRenderTree, generateHudCss, renderHud } from "./renderer";
import type { AnimationFrame, HudCssTokens } from "./types";
import { DEFAULT_HUD_TOKENS } from "./types";

export type HudOverlayOptions = {
  /** Existing sequencer, or options for a new one */
  sequencer?: AnimationSequencer | SequencerOptions;
  tokens?: HudCssTokens;
};

export type HudOverlayHandle = {
  controller: HudController;
  sequencer: AnimationSequencer;
  /** Sampled animation frame */
  getFrame: (now?: number) => AnimationFrame;
  /** Render tree for the current frame; null while hidden */
  render: (now?: number) => HudRenderTree | null;
  /** Stylesheet for the class names the render tree uses */
  getCss: () => string;
  /** Subscribe to sequencer phase changes */
  subscribe: (listener: PhaseListener) => () => void;
  /** Detach from the controller and stop pending animation timers */
  unmount: () => void;
};

/**
 * Mount an overlay for `controller`. If it is already presenting, the appear
 * sequence starts immediately.
 */
export function mountHudOverlay(
  controller: HudController,
  options: HudOverlayOptions = {}
): HudOverlayHandle {
  const sequencer =
    options.sequencer instanceof AnimationSequencer
      ? options.sequencer
      : new AnimationSequencer(options.sequencer);
  const tokens = options.tokens ?? DEFAULT_HUD_TOKENS;

  const stopPhases = sequencer.subscribe((phase) => {
    if (phase === "hidden") {
      controller.clearAfterDismissal();
    }
  });
  const stopState = controller.subscribe((state) => {
    sequencer.handleStateChange(state);
  });

  if (controller.getState().isPresented) {
    sequencer.present(controller.getState().variant);
  }

  return {
    controller,
    sequencer,
    getFrame: (now) => sequencer.sample(now),
    render: (now) => renderHud(controller.getState(), sequencer.sample(now), tokens),
    getCss: () => generateHudCss(tokens),
    subscribe: (listener) => sequencer.subscribe(listener),
    unmount: () => {
      stopState();
      stopPhases();
      sequencer.dispose();
    },
  };
}
