/**
 * HUD State Management
 *
 * Pure state transitions for the presentation state.
 * No UI framework dependencies - works in Node.js and Browser.
 */

import { createHudConfig } from "./config";
import type { HudConfig, HudVariant, OverlayState } from "./types";

/** Create initial overlay state */
export function createOverlayState(
  initial: Partial<Omit<OverlayState, "config">> = {},
  config?: Partial<HudConfig>
): OverlayState {
  return {
    isPresented: initial.isPresented ?? false,
    variant: initial.variant ?? "loading",
    message: initial.message ?? null,
    config: createHudConfig(config),
  };
}

/** Present a HUD, overwriting whatever is on screen */
export function presentHud(
  state: OverlayState,
  variant: HudVariant,
  message: string | null,
  allowUserInteraction: boolean
): OverlayState {
  return {
    ...state,
    isPresented: true,
    variant,
    message,
    config: { ...state.config, allowUserInteraction },
  };
}

/** Dismiss the HUD; variant and message stay readable for the hide animation */
export function dismissHud(state: OverlayState): OverlayState {
  return {
    ...state,
    isPresented: false,
  };
}

/** Clear per-presentation leftovers once the hide animation has finished */
export function clearDismissedHud(state: OverlayState): OverlayState {
  if (state.isPresented) {
    return state;
  }
  return {
    ...state,
    message: null,
  };
}

