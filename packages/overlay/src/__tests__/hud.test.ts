/**
 * HUD Facade Tests
 */

import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import {
  HUD,
  getSharedHudController,
  resetSharedHudController,
  setSharedHudController,
} from "../hud.js";
import { DEFAULT_RESULT_AUTO_HIDE_MS, HudController } from "../hudController.js";
import { createQuietLogger } from "./helpers/quietLogger.js";

describe("HUD facade", () => {
  let controller: HudController;

  beforeEach(() => {
    vi.useFakeTimers();
    controller = new HudController({ logger: createQuietLogger().logger });
    setSharedHudController(controller);
  });

  afterEach(() => {
    resetSharedHudController();
    vi.useRealTimers();
  });

  it("should forward to the shared controller", () => {
    HUD.showLoading("Syncing");

    expect(controller.getState()).toMatchObject({
      isPresented: true,
      variant: "loading",
      message: "Syncing",
    });

    HUD.hide();
    expect(controller.getState().isPresented).toBe(false);
  });

  it("should block interaction by default for every variant", () => {
    HUD.showSuccess("Saved");
    expect(controller.allowUserInteraction).toBe(false);

    HUD.showFailure("Failed");
    expect(controller.allowUserInteraction).toBe(false);
  });

  it("should auto-hide results and call onDismiss", () => {
    const onDismiss = vi.fn();
    HUD.showFailure("Failed", { onDismiss });

    vi.advanceTimersByTime(DEFAULT_RESULT_AUTO_HIDE_MS);

    expect(controller.getState().isPresented).toBe(false);
    expect(onDismiss).toHaveBeenCalledTimes(1);
  });

  it("should pass the hide callback through", () => {
    const onDismiss = vi.fn();
    HUD.showLoading();

    HUD.hide(onDismiss);

    expect(onDismiss).toHaveBeenCalledTimes(1);
  });

  it("should dispose the replaced controller", () => {
    HUD.showSuccess();
    const replacement = new HudController({ logger: createQuietLogger().logger });
    setSharedHudController(replacement);

    vi.advanceTimersByTime(DEFAULT_RESULT_AUTO_HIDE_MS);

    expect(controller.getState().isPresented).toBe(true);
    expect(getSharedHudController()).toBe(replacement);
  });

  it("should create a fresh shared controller after reset", () => {
    resetSharedHudController();

    const shared = getSharedHudController();

    expect(shared.id).toBe("hud-shared");
    expect(shared).not.toBe(controller);
    expect(getSharedHudController()).toBe(shared);
  });
});
