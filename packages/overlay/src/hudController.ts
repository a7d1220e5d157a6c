/**
 * HUD Controller
 *
 * Owns the presentation state and the auto-hide timer.
 * Platform-agnostic - animation and rendering observe it through `subscribe`.
 */

import { isFiniteNumber, observability } from "@status-hud/shared";
import { MAX_TIMER_DELAY_MS } from "./config";
import { clearDismissedHud, createOverlayState, dismissHud, presentHud } from "./state";
import type {
  HudConfig,
  HudVariant,
  OverlayState,
  ShowLoadingOptions,
  ShowResultOptions,
} from "./types";

/** Default auto-hide delay for success and failure cards */
export const DEFAULT_RESULT_AUTO_HIDE_MS = 1000;

export type DismissReason = "manual" | "autoHide";

/** HUD controller events */
export type HudControllerEvents = {
  stateChange: (state: OverlayState) => void;
  dismissed: (info: { generation: number; reason: DismissReason }) => void;
};

export type HudControllerOptions = {
  /** Starting state; a presented start has no auto-hide */
  initialState?: Partial<Omit<OverlayState, "config">>;
  /** Overrides on top of the default config */
  config?: Partial<HudConfig>;
  logger?: observability.HudLogger;
  id?: string;
};

type PendingAutoHide = {
  handle: ReturnType<typeof setTimeout>;
  generation: number;
};

let controllerCount = 0;

/**
 * Presentation controller.
 *
 * Every `show*` starts a new generation; an auto-hide timer only acts on the
 * generation it was scheduled for.
 */
export class HudController {
  readonly id: string;
  private state: OverlayState;
  private generation = 0;
  private pendingAutoHide: PendingAutoHide | null = null;
  private logger: observability.HudLogger;
  private listeners: { [K in keyof HudControllerEvents]: Set<HudControllerEvents[K]> } = {
    stateChange: new Set(),
    dismissed: new Set(),
  };

  constructor(options: HudControllerOptions = {}) {
    controllerCount += 1;
    this.id = options.id ?? `hud-${controllerCount}`;
    this.state = createOverlayState(options.initialState, options.config);
    this.logger = (options.logger ?? observability.getLogger()).child({ controllerId: this.id });
  }

  // ============================================================================
  // State
  // ============================================================================

  getState(): OverlayState {
    return this.state;
  }

  getConfig(): HudConfig {
    return this.state.config;
  }

  /** Presentation generation; bumps on every show and every effective hide */
  getGeneration(): number {
    return this.generation;
  }

  /** Whether pointer events pass through the overlay */
  get allowUserInteraction(): boolean {
    return this.state.config.allowUserInteraction;
  }

  hasPendingAutoHide(): boolean {
    return this.pendingAutoHide !== null;
  }

  // ============================================================================
  // Presentation
  // ============================================================================

  showLoading(message?: string | null, options: ShowLoadingOptions = {}): void {
    this.present("loading", message, options.allowUserInteraction ?? false);
    if (options.autoHideAfterMs !== undefined) {
      this.scheduleHide(options.autoHideAfterMs);
    }
  }

  showSuccess(message?: string | null, options: ShowResultOptions = {}): void {
    this.present("success", message, options.allowUserInteraction ?? false);
    this.scheduleHide(options.autoHideAfterMs ?? DEFAULT_RESULT_AUTO_HIDE_MS, options.onDismiss);
  }

  showFailure(message?: string | null, options: ShowResultOptions = {}): void {
    this.present("failure", message, options.allowUserInteraction ?? false);
    this.scheduleHide(options.autoHideAfterMs ?? DEFAULT_RESULT_AUTO_HIDE_MS, options.onDismiss);
  }

  /** Hide the current HUD. No-op (and no callback) when nothing is presented. */
  hide(onDismiss?: () => void): void {
    this.dismiss("manual", onDismiss);
  }

  /**
   * Reset per-presentation leftovers once the hide animation is over.
   * Ignored while a HUD is presented.
   */
  clearAfterDismissal(): void {
    const next = clearDismissedHud(this.state);
    if (next === this.state || next.message === this.state.message) {
      return;
    }
    this.state = next;
    this.emitStateChange();
  }

  /** Cancel the pending timer and drop all listeners */
  dispose(): void {
    this.cancelAutoHide();
    this.listeners.stateChange.clear();
    this.listeners.dismissed.clear();
  }

  // ============================================================================
  // Event Handling
  // ============================================================================

  on<K extends keyof HudControllerEvents>(event: K, listener: HudControllerEvents[K]): void {
    this.listeners[event].add(listener);
  }

  off<K extends keyof HudControllerEvents>(event: K, listener: HudControllerEvents[K]): void {
    this.listeners[event].delete(listener);
  }

  /** Subscribe to state changes */
  subscribe(listener: (state: OverlayState) => void): () => void {
    this.on("stateChange", listener);
    return () => this.off("stateChange", listener);
  }

  // ============================================================================
  // Internals
  // ============================================================================

  private present(variant: HudVariant, message: string | null | undefined, allow: boolean): void {
    this.cancelAutoHide();
    this.generation += 1;
    this.state = presentHud(this.state, variant, message ?? null, allow);
    this.logger.logPresentation(this.generation, "show", {
      variant,
      allowUserInteraction: allow,
    });
    this.emitStateChange();
  }

  private dismiss(reason: DismissReason, onDismiss?: () => void): void {
    if (!this.state.isPresented) {
      this.logger.debug("presentation", "Hide ignored: nothing presented", { reason });
      return;
    }
    this.cancelAutoHide();
    const dismissed = this.generation;
    this.generation += 1;
    this.state = dismissHud(this.state);
    this.logger.logPresentation(dismissed, "hide", { reason });
    this.emitStateChange();
    for (const listener of this.listeners.dismissed) {
      listener({ generation: dismissed, reason });
    }
    onDismiss?.();
  }

  private scheduleHide(delayMs: number, onDismiss?: () => void): void {
    // Delays past the timer limit never hide, like Infinity
    if (!isFiniteNumber(delayMs) || delayMs > MAX_TIMER_DELAY_MS) {
      if (Number.isNaN(delayMs)) {
        this.logger.warn("presentation", "Auto-hide delay is NaN; not scheduling", {
          generation: this.generation,
        });
      }
      return;
    }

    const generation = this.generation;
    const handle = setTimeout(() => {
      if (this.pendingAutoHide?.generation === generation) {
        this.pendingAutoHide = null;
      }
      if (generation !== this.generation || !this.state.isPresented) {
        this.logger.logStaleTimer("auto-hide", generation, this.generation);
        return;
      }
      this.dismiss("autoHide", onDismiss);
    }, Math.max(0, delayMs));

    this.pendingAutoHide = { handle, generation };
  }

  private cancelAutoHide(): void {
    if (this.pendingAutoHide) {
      clearTimeout(this.pendingAutoHide.handle);
      this.pendingAutoHide = null;
    }
  }

  private emitStateChange(): void {
    for (const listener of this.listeners.stateChange) {
      listener(this.state);
    }
  }
}

/**
 * Create a HUD controller instance
 */
export function createHudController(options?: HudControllerOptions): HudController {
  return new HudController(options);
}
