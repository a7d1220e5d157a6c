/**
 * HUD Animation Sequencer
 *
 * Turns `isPresented` transitions into timed card animations:
 *
 *   hidden -> appearing -> settled -> disappearing -> hidden
 *
 * Each sequence is three phases run strictly in order, one `setTimeout` per boundary.
 * Channels are tweened, so a frame can be sampled at any time with `sample()`.
 */

import {
  CARD_SCALE,
  type EasingFunction,
  type EasingName,
  type HudTiming,
  getEasing,
  getPhaseDurations,
  observability,
} from "@status-hud/shared";
import { resolveHudTiming } from "./config";
import type {
  AnimationChannel,
  AnimationFrame,
  HudVariant,
  OverlayState,
  SequencerPhase,
} from "./types";

/** One timed step of a sequence */
export type PhaseStep = {
  name: string;
  durationMs: number;
  easing: EasingName;
  targets: Partial<Record<AnimationChannel, number>>;
};

type Tween = {
  from: number;
  to: number;
  startedAt: number;
  durationMs: number;
  ease: EasingFunction;
};

export type SequencerOptions = {
  timing?: Partial<HudTiming>;
  /** Millisecond clock used to sample tweens */
  now?: () => number;
  logger?: observability.HudLogger;
};

export type PhaseListener = (phase: SequencerPhase, cycle: number) => void;

const CHANNELS: readonly AnimationChannel[] = [
  "cardScale",
  "cardOpacity",
  "maskOpacity",
  "strokeProgress",
];

const RESTING_VALUES: Record<AnimationChannel, number> = {
  cardScale: CARD_SCALE.collapsed,
  cardOpacity: 0,
  maskOpacity: 0,
  strokeProgress: 0,
};

/** Whether a variant animates a stroke */
export function drawsStroke(variant: HudVariant): boolean {
  return variant === "success" || variant === "failure";
}

/** Appearing: grow past full size, dip below it, settle */
export function buildAppearSteps(timing: HudTiming): PhaseStep[] {
  const [d1, d2, d3] = getPhaseDurations(timing);
  return [
    {
      name: "appear:grow",
      durationMs: d1,
      easing: "easeOut",
      targets: { maskOpacity: 1, cardOpacity: 1, cardScale: CARD_SCALE.overshoot },
    },
    {
      name: "appear:dip",
      durationMs: d2,
      easing: "easeInOut",
      targets: { cardScale: CARD_SCALE.undershoot },
    },
    {
      name: "appear:settle",
      durationMs: d3,
      easing: "easeInOut",
      targets: { cardScale: CARD_SCALE.resting },
    },
  ];
}

/** Disappearing: mirror of the appear pop, ending faded and shrunk */
export function buildDisappearSteps(timing: HudTiming): PhaseStep[] {
  const [d1, d2, d3] = getPhaseDurations(timing);
  return [
    {
      name: "disappear:dip",
      durationMs: d1,
      easing: "easeInOut",
      targets: { maskOpacity: 0, cardScale: CARD_SCALE.undershoot },
    },
    {
      name: "disappear:swell",
      durationMs: d2,
      easing: "easeInOut",
      targets: { cardScale: CARD_SCALE.overshoot },
    },
    {
      name: "disappear:shrink",
      durationMs: d3,
      easing: "easeInOut",
      targets: { cardOpacity: 0, cardScale: CARD_SCALE.exit },
    },
  ];
}

function staticTween(value: number, at: number): Tween {
  return { from: value, to: value, startedAt: at, durationMs: 0, ease: getEasing("linear") };
}

function sampleTween(tween: Tween, now: number): number {
  const elapsed = now - tween.startedAt;
  if (tween.durationMs <= 0 || elapsed >= tween.durationMs) {
    return tween.to;
  }
  if (elapsed <= 0) {
    return tween.from;
  }
  return tween.from + (tween.to - tween.from) * tween.ease(elapsed / tween.durationMs);
}

/**
 * Animation sequencer for one HUD card.
 */
export class AnimationSequencer {
  private readonly timing: HudTiming;
  private readonly now: () => number;
  private readonly logger: observability.HudLogger;

  private phase: SequencerPhase = "hidden";
  private isVisible = false;
  private cycle = 0;
  private variant: HudVariant | null = null;
  private dismissAfterAppear = false;
  private phaseTimer: ReturnType<typeof setTimeout> | null = null;
  private tweens: Record<AnimationChannel, Tween>;
  private listeners = new Set<PhaseListener>();

  constructor(options: SequencerOptions = {}) {
    this.timing = resolveHudTiming(options.timing);
    this.now = options.now ?? (() => Date.now());
    this.logger = options.logger ?? observability.getLogger();
    this.tweens = this.restingTweens();
  }

  getPhase(): SequencerPhase {
    return this.phase;
  }

  getCycle(): number {
    return this.cycle;
  }

  getTiming(): HudTiming {
    return { ...this.timing };
  }

  /** Sample every channel at `now` */
  sample(now: number = this.now()): AnimationFrame {
    return {
      phase: this.phase,
      isVisible: this.isVisible,
      cycle: this.cycle,
      cardScale: sampleTween(this.tweens.cardScale, now),
      cardOpacity: sampleTween(this.tweens.cardOpacity, now),
      maskOpacity: sampleTween(this.tweens.maskOpacity, now),
      strokeProgress: sampleTween(this.tweens.strokeProgress, now),
    };
  }

  /**
   * Feed a controller state snapshot. Starts or stops sequences on `isPresented`
   * transitions and restarts the stroke when the variant changes on screen.
   */
  handleStateChange(state: OverlayState): void {
    const onScreen = this.phase === "appearing" || this.phase === "settled";

    if (state.isPresented) {
      if (!onScreen) {
        this.present(state.variant);
        return;
      }
      if (this.dismissAfterAppear) {
        this.dismissAfterAppear = false;
        this.logger.logPhase(this.cycle, "deferred hide dropped");
      }
      if (state.variant !== this.variant) {
        this.restartStroke(state.variant);
      }
      return;
    }

    if (onScreen) {
      this.dismiss();
    }
  }

  /**
   * Start an Appearing sequence from a forced reset, cancelling whatever was in flight.
   */
  present(variant: HudVariant): void {
    const at = this.now();
    this.beginCycle();
    this.variant = variant;
    this.isVisible = true;
    this.tweens = this.restingTweens(at);
    this.startStroke(variant, at);
    this.setPhase("appearing");
    this.runSteps(buildAppearSteps(this.timing), 0, () => {
      this.setPhase("settled");
      if (this.dismissAfterAppear) {
        this.dismissAfterAppear = false;
        this.dismiss();
      }
    });
  }

  /**
   * Start a Disappearing sequence. A hide during Appearing waits until the card settles.
   */
  dismiss(): void {
    if (this.phase === "appearing") {
      this.dismissAfterAppear = true;
      this.logger.logPhase(this.cycle, "hide deferred until settled");
      return;
    }
    if (this.phase !== "settled") {
      return;
    }
    this.setPhase("disappearing");
    this.runSteps(buildDisappearSteps(this.timing), 0, () => this.finishCycle());
  }

  /** Restart (or clear) the stroke for a variant shown on an already visible card */
  restartStroke(variant: HudVariant): void {
    this.variant = variant;
    this.startStroke(variant, this.now());
  }

  subscribe(listener: PhaseListener): () => void {
    this.listeners.add(listener);
    return () => this.listeners.delete(listener);
  }

  /** Cancel pending phase timers and drop listeners */
  dispose(): void {
    this.clearPhaseTimer();
    this.listeners.clear();
  }

  // ============================================================================
  // Internals
  // ============================================================================

  private beginCycle(): void {
    this.clearPhaseTimer();
    this.dismissAfterAppear = false;
    this.cycle += 1;
  }

  private finishCycle(): void {
    const at = this.now();
    this.isVisible = false;
    this.tweens = {
      ...this.tweens,
      cardScale: staticTween(CARD_SCALE.collapsed, at),
      strokeProgress: staticTween(0, at),
    };
    this.setPhase("hidden");
  }

  private runSteps(steps: PhaseStep[], index: number, onDone: () => void): void {
    const step = steps[index];
    if (!step) {
      onDone();
      return;
    }

    const at = this.now();
    for (const channel of CHANNELS) {
      const target = step.targets[channel];
      if (target === undefined) {
        continue;
      }
      this.tweens[channel] = {
        from: sampleTween(this.tweens[channel], at),
        to: target,
        startedAt: at,
        durationMs: step.durationMs,
        ease: getEasing(step.easing),
      };
    }
    this.logger.logPhase(this.cycle, step.name, { durationMs: step.durationMs });

    const cycle = this.cycle;
    this.phaseTimer = setTimeout(() => {
      this.phaseTimer = null;
      if (cycle !== this.cycle) {
        this.logger.logStaleTimer("phase", cycle, this.cycle);
        return;
      }
      this.runSteps(steps, index + 1, onDone);
    }, step.durationMs);
  }

  private startStroke(variant: HudVariant, at: number): void {
    this.tweens.strokeProgress = drawsStroke(variant)
      ? {
          from: 0,
          to: 1,
          startedAt: at,
          durationMs: this.timing.strokeMs,
          ease: getEasing("linear"),
        }
      : staticTween(0, at);
  }

  private restingTweens(at = 0): Record<AnimationChannel, Tween> {
    return {
      cardScale: staticTween(RESTING_VALUES.cardScale, at),
      cardOpacity: staticTween(RESTING_VALUES.cardOpacity, at),
      maskOpacity: staticTween(RESTING_VALUES.maskOpacity, at),
      strokeProgress: staticTween(RESTING_VALUES.strokeProgress, at),
    };
  }

  private setPhase(phase: SequencerPhase): void {
    this.phase = phase;
    this.logger.logPhase(this.cycle, phase);
    for (const listener of this.listeners) {
      listener(phase, this.cycle);
    }
  }

  private clearPhaseTimer(): void {
    if (this.phaseTimer !== null) {
      clearTimeout(this.phaseTimer);
      this.phaseTimer = null;
    }
  }
}

/**
 * Create an animation sequencer instance
 */
export function createAnimationSequencer(options?: SequencerOptions): AnimationSequencer {
  return new AnimationSequencer(options);
}
