/**
 * HUD Controller Tests
 */

import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { HudConfigError, MAX_TIMER_DELAY_MS } from "../config.js";
import { DEFAULT_RESULT_AUTO_HIDE_MS, HudController } from "../hudController.js";
import type { OverlayState } from "../types.js";
import { createQuietLogger } from "./helpers/quietLogger.js";

function createController(): HudController {
  return new HudController({ logger: createQuietLogger().logger });
}

describe("HudController", () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  describe("showLoading", () => {
    it("should present a loading card without auto-hide", () => {
      const controller = createController();
      controller.showLoading("Loading...");

      expect(controller.getState()).toMatchObject({
        isPresented: true,
        variant: "loading",
        message: "Loading...",
      });
      expect(controller.hasPendingAutoHide()).toBe(false);

      vi.advanceTimersByTime(60_000);
      expect(controller.getState().isPresented).toBe(true);
    });

    it("should hide after the requested delay", () => {
      const controller = createController();
      controller.showLoading(null, { autoHideAfterMs: 3000 });

      vi.advanceTimersByTime(2999);
      expect(controller.getState().isPresented).toBe(true);

      vi.advanceTimersByTime(1);
      expect(controller.getState().isPresented).toBe(false);
    });
  });

  describe("showSuccess / showFailure", () => {
    it("should auto-hide after one second by default", () => {
      const controller = createController();
      controller.showFailure("Nope");

      vi.advanceTimersByTime(DEFAULT_RESULT_AUTO_HIDE_MS - 1);
      expect(controller.getState().isPresented).toBe(true);

      vi.advanceTimersByTime(1);
      expect(controller.getState()).toMatchObject({
        isPresented: false,
        variant: "failure",
        message: "Nope",
      });
    });

    it("should call onDismiss exactly once after the auto-hide", () => {
      const controller = createController();
      const onDismiss = vi.fn();
      controller.showSuccess("Done", { autoHideAfterMs: 1200, onDismiss });

      expect(controller.getState()).toMatchObject({ isPresented: true, variant: "success" });

      vi.advanceTimersByTime(1199);
      expect(onDismiss).not.toHaveBeenCalled();

      vi.advanceTimersByTime(1);
      expect(onDismiss).toHaveBeenCalledTimes(1);
      expect(controller.getState().isPresented).toBe(false);

      vi.advanceTimersByTime(5000);
      expect(onDismiss).toHaveBeenCalledTimes(1);
    });

    it("should flip state before calling onDismiss", () => {
      const controller = createController();
      let presentedDuringCallback: boolean | null = null;
      controller.showSuccess(null, {
        onDismiss: () => {
          presentedDuringCallback = controller.getState().isPresented;
        },
      });

      vi.advanceTimersByTime(DEFAULT_RESULT_AUTO_HIDE_MS);

      expect(presentedDuringCallback).toBe(false);
    });

    it("should drop the earlier auto-hide and callback when superseded", () => {
      const controller = createController();
      const successDismissed = vi.fn();
      controller.showSuccess("Saved", { onDismiss: successDismissed });
      controller.showFailure("Failed", { autoHideAfterMs: 5000 });

      expect(controller.getState()).toMatchObject({ isPresented: true, variant: "failure" });

      vi.advanceTimersByTime(DEFAULT_RESULT_AUTO_HIDE_MS);
      expect(controller.getState().isPresented).toBe(true);
      expect(successDismissed).not.toHaveBeenCalled();

      vi.advanceTimersByTime(4000);
      expect(controller.getState().isPresented).toBe(false);
      expect(successDismissed).not.toHaveBeenCalled();
    });

    it("should not let a loading auto-hide cut a later presentation short", () => {
      const controller = createController();

      controller.showLoading(null, { autoHideAfterMs: 3000 });
      vi.advanceTimersByTime(1000);
      controller.hide();
      vi.advanceTimersByTime(500);
      controller.showLoading(null, { autoHideAfterMs: 3000 });

      vi.advanceTimersByTime(2000);
      expect(controller.getState().isPresented).toBe(true);

      vi.advanceTimersByTime(1000);
      expect(controller.getState().isPresented).toBe(false);
    });
  });

  describe("auto-hide delays", () => {
    it("should treat a negative delay as zero", () => {
      const controller = createController();
      controller.showSuccess(null, { autoHideAfterMs: -50 });

      expect(controller.getState().isPresented).toBe(true);
      vi.advanceTimersByTime(0);
      expect(controller.getState().isPresented).toBe(false);
    });

    it("should warn and not schedule on NaN", () => {
      const { logger, entries } = createQuietLogger();
      const controller = new HudController({ logger });
      controller.showSuccess(null, { autoHideAfterMs: Number.NaN });

      expect(controller.hasPendingAutoHide()).toBe(false);
      const warnings = entries.filter((entry) => entry.level === "warn");
      expect(warnings).toHaveLength(1);
      expect(warnings[0]?.message).toBe("Auto-hide delay is NaN; not scheduling");
      expect(warnings[0]?.context.controllerId).toBe(controller.id);
    });

    it("should never hide on an infinite delay", () => {
      const controller = createController();
      controller.showFailure(null, { autoHideAfterMs: Number.POSITIVE_INFINITY });

      expect(controller.hasPendingAutoHide()).toBe(false);
      vi.advanceTimersByTime(1_000_000);
      expect(controller.getState().isPresented).toBe(true);
    });

    it("should never hide on a delay past the timer limit", () => {
      const controller = createController();
      controller.showLoading("Syncing", { autoHideAfterMs: 30 * 24 * 60 * 60 * 1000 });

      expect(controller.hasPendingAutoHide()).toBe(false);
      vi.advanceTimersByTime(1_000_000);
      expect(controller.getState().isPresented).toBe(true);
    });

    it("should still schedule a delay at the timer limit", () => {
      const controller = createController();
      controller.showSuccess(null, { autoHideAfterMs: MAX_TIMER_DELAY_MS });

      expect(controller.hasPendingAutoHide()).toBe(true);
      vi.advanceTimersByTime(1_000_000);
      expect(controller.getState().isPresented).toBe(true);
    });
  });

  describe("hide", () => {
    it("should do nothing when nothing is presented", () => {
      const controller = createController();
      const onDismiss = vi.fn();
      const onStateChange = vi.fn();
      controller.subscribe(onStateChange);

      controller.hide(onDismiss);

      expect(onDismiss).not.toHaveBeenCalled();
      expect(onStateChange).not.toHaveBeenCalled();
      expect(controller.getGeneration()).toBe(0);
    });

    it("should cancel the pending auto-hide", () => {
      const controller = createController();
      const autoDismissed = vi.fn();
      controller.showSuccess(null, { onDismiss: autoDismissed });

      const manualDismissed = vi.fn();
      controller.hide(manualDismissed);

      expect(manualDismissed).toHaveBeenCalledTimes(1);
      expect(controller.hasPendingAutoHide()).toBe(false);
      vi.advanceTimersByTime(DEFAULT_RESULT_AUTO_HIDE_MS);
      expect(autoDismissed).not.toHaveBeenCalled();
    });

    it("should report the reason and generation", () => {
      const controller = createController();
      const dismissed = vi.fn();
      controller.on("dismissed", dismissed);

      controller.showLoading();
      controller.hide();
      controller.showSuccess();
      vi.advanceTimersByTime(DEFAULT_RESULT_AUTO_HIDE_MS);

      expect(dismissed.mock.calls).toEqual([
        [{ generation: 1, reason: "manual" }],
        [{ generation: 3, reason: "autoHide" }],
      ]);
      expect(controller.getGeneration()).toBe(4);
    });
  });

  describe("allowUserInteraction", () => {
    it("should default to false on every call", () => {
      const controller = createController();
      controller.showLoading(null, { allowUserInteraction: true });
      expect(controller.allowUserInteraction).toBe(true);

      controller.showSuccess();
      expect(controller.allowUserInteraction).toBe(false);
      expect(controller.getConfig().allowUserInteraction).toBe(false);
    });
  });

  describe("events", () => {
    it("should emit a snapshot for every change", () => {
      const controller = createController();
      const states: OverlayState[] = [];
      const unsubscribe = controller.subscribe((state) => states.push(state));

      controller.showLoading("a");
      controller.showSuccess("b");
      unsubscribe();
      controller.hide();

      expect(states.map((state) => [state.isPresented, state.variant, state.message])).toEqual([
        [true, "loading", "a"],
        [true, "success", "b"],
      ]);
    });

    it("should stop emitting after off", () => {
      const controller = createController();
      const listener = vi.fn();
      controller.on("stateChange", listener);
      controller.off("stateChange", listener);

      controller.showLoading();

      expect(listener).not.toHaveBeenCalled();
    });
  });

  describe("clearAfterDismissal", () => {
    it("should clear the message once hidden", () => {
      const controller = createController();
      const listener = vi.fn();
      controller.showSuccess("Done");
      controller.hide();
      controller.subscribe(listener);

      controller.clearAfterDismissal();

      expect(controller.getState().message).toBeNull();
      expect(listener).toHaveBeenCalledTimes(1);
    });

    it("should leave a presented HUD alone", () => {
      const controller = createController();
      controller.showLoading("Still here");

      controller.clearAfterDismissal();

      expect(controller.getState().message).toBe("Still here");
    });
  });

  describe("dispose", () => {
    it("should cancel the pending auto-hide", () => {
      const controller = createController();
      controller.showSuccess();

      controller.dispose();
      vi.advanceTimersByTime(DEFAULT_RESULT_AUTO_HIDE_MS);

      expect(controller.getState().isPresented).toBe(true);
    });
  });

  describe("construction", () => {
    it("should validate config overrides", () => {
      expect(() => new HudController({ config: { maskColor: "" } })).toThrow(HudConfigError);
    });

    it("should use the given id", () => {
      expect(new HudController({ id: "checkout", logger: createQuietLogger().logger }).id).toBe(
        "checkout"
      );
    });
  });
});
