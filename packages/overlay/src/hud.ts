/**
 * HUD Facade
 *
 * Static convenience API over a process-wide default controller:
 *
 * ```ts
 * HUD.showLoading("Loading...");
 * HUD.showSuccess("Done!");
 * HUD.showFailure("Something went wrong");
 * HUD.hide();
 * ```
 *
 * Controllers can also be created and mounted directly; the shared one is only a default.
 */

import { observability } from "@status-hud/shared";
import { HudController } from "./hudController";
import type { ShowLoadingOptions, ShowResultOptions } from "./types";

let sharedController: HudController | null = null;

export function getSharedHudController(): HudController {
  if (!sharedController) {
    sharedController = new HudController({ id: "hud-shared" });
    observability.getLogger().debug("facade", "Created shared HUD controller");
  }
  return sharedController;
}

/** Replace the controller the facade forwards to */
export function setSharedHudController(controller: HudController): void {
  if (sharedController && sharedController !== controller) {
    sharedController.dispose();
  }
  sharedController = controller;
}

/** Dispose the shared controller; the next facade call creates a fresh one */
export function resetSharedHudController(): void {
  sharedController?.dispose();
  sharedController = null;
}

export const HUD = {
  showLoading(message?: string | null, options?: ShowLoadingOptions): void {
    getSharedHudController().showLoading(message, options);
  },

  showSuccess(message?: string | null, options?: ShowResultOptions): void {
    getSharedHudController().showSuccess(message, options);
  },

  showFailure(message?: string | null, options?: ShowResultOptions): void {
    getSharedHudController().showFailure(message, options);
  },

  hide(onDismiss?: () => void): void {
    getSharedHudController().hide(onDismiss);
  },
} as const;
