export interface HpEffectTiming {
  readonly holdMs: number;
  readonly catchUpMs: number;
  readonly flashMs: number;
  readonly blinkPeriodMs: number;
}

export const DEFAULT_HP_EFFECT_TIMING: HpEffectTiming = {
  holdMs: 500,
  catchUpMs: 300,
  flashMs: 600,
  blinkPeriodMs: 100,
};

/**
 * One lagging indicator. `value` chases the current HP: after a change it holds
 * still until `holdUntilMs`, then moves linearly from `lerpFromValue` to the
 * current HP over `catchUpMs`.
 */
export interface GhostTrack {
  readonly value: number;
  readonly holdUntilMs: number;
  readonly lerpStartMs: number | null;
  readonly lerpFromValue: number;
}

export interface HpEffectState {
  readonly lastHp: number;
  /** Damage chip, always >= current HP. */
  readonly ghost: GhostTrack;
  /** Heal chip, always <= current HP. */
  readonly healGhost: GhostTrack;
  readonly flashRemainingMs: number;
  readonly lastUpdateMs: number;
}

export const ghostHp = (state: HpEffectState): number => state.ghost.value;

export const healGhostHp = (state: HpEffectState): number => state.healGhost.value;

const settledTrack = (value: number): GhostTrack => ({
  value,
  holdUntilMs: 0,
  lerpStartMs: null,
  lerpFromValue: value,
});

const heldTrack = (value: number, holdUntilMs: number): GhostTrack => ({
  value,
  holdUntilMs,
  lerpStartMs: null,
  lerpFromValue: value,
});

const advanceTrack = (
  track: GhostTrack,
  currentHp: number,
  nowMs: number,
  timing: HpEffectTiming,
): GhostTrack => {
  if (track.value === currentHp) {
    return track.lerpStartMs === null ? track : settledTrack(currentHp);
  }
  if (nowMs <= track.holdUntilMs) {
    return track;
  }

  const lerpStartMs = track.lerpStartMs ?? track.holdUntilMs;
  const lerpFromValue = track.lerpStartMs === null ? track.value : track.lerpFromValue;
  const duration = Math.max(1, timing.catchUpMs);
  const t = (nowMs - lerpStartMs) / duration;
  if (t >= 1) {
    return settledTrack(currentHp);
  }

  const candidate = lerpFromValue + (currentHp - lerpFromValue) * t;
  // Clamp between the previous value and the target so the chip never reverses.
  const value =
    track.value > currentHp
      ? Math.min(track.value, Math.max(currentHp, candidate))
      : Math.max(track.value, Math.min(currentHp, candidate));
  return { value, holdUntilMs: track.holdUntilMs, lerpStartMs, lerpFromValue };
};

export const createHpEffect = (currentHp: number, nowMs: number): HpEffectState => ({
  lastHp: currentHp,
  ghost: settledTrack(currentHp),
  healGhost: settledTrack(currentHp),
  flashRemainingMs: 0,
  lastUpdateMs: nowMs,
});

/**
 * Advances the ghost bars of one entity. Pure: the same inputs always produce
 * the same state, so it may run once per tick or once per authoritative update.
 */
export const stepHpEffect = (
  previous: HpEffectState | null | undefined,
  currentHp: number,
  nowMs: number,
  timing: HpEffectTiming = DEFAULT_HP_EFFECT_TIMING,
): HpEffectState => {
  if (!previous) {
    return createHpEffect(currentHp, nowMs);
  }

  const elapsedMs = Math.max(0, nowMs - previous.lastUpdateMs);
  let ghost = previous.ghost;
  let healGhost = previous.healGhost;
  let flashRemainingMs = Math.max(0, previous.flashRemainingMs - elapsedMs);

  if (currentHp < previous.lastHp) {
    ghost = heldTrack(Math.max(ghost.value, previous.lastHp), nowMs + timing.holdMs);
    healGhost = settledTrack(currentHp);
    flashRemainingMs = timing.flashMs;
  } else if (currentHp > previous.lastHp) {
    healGhost = heldTrack(Math.min(healGhost.value, previous.lastHp), nowMs + timing.holdMs);
    ghost = settledTrack(currentHp);
    flashRemainingMs = timing.flashMs;
  }

  if (ghost.value < currentHp) {
    ghost = settledTrack(currentHp);
  }
  if (healGhost.value > currentHp) {
    healGhost = settledTrack(currentHp);
  }

  return {
    lastHp: currentHp,
    ghost: advanceTrack(ghost, currentHp, nowMs, timing),
    healGhost: advanceTrack(healGhost, currentHp, nowMs, timing),
    flashRemainingMs,
    lastUpdateMs: nowMs,
  };
};

export const isHpEffectSettled = (state: HpEffectState): boolean =>
  state.ghost.value === state.lastHp && state.healGhost.value === state.lastHp;

/** Whether the blinking cue is lit right now. Off once the flash timer runs out. */
export const isBlinkVisible = (
  state: HpEffectState,
  timing: HpEffectTiming = DEFAULT_HP_EFFECT_TIMING,
): boolean => {
  if (state.flashRemainingMs <= 0 || isHpEffectSettled(state)) {
    return false;
  }
  const period = Math.max(1, timing.blinkPeriodMs);
  return Math.floor(state.flashRemainingMs / period) % 2 === 0;
};

export type HpEffectCategory = "unit" | "base";

export class HpEffectTracker {
  private units = new Map<number, HpEffectState>();
  private bases = new Map<number, HpEffectState>();

  constructor(private readonly timing: HpEffectTiming = DEFAULT_HP_EFFECT_TIMING) {}

  step(category: HpEffectCategory, id: number, currentHp: number, nowMs: number): HpEffectState {
    const table = this.table(category);
    const next = stepHpEffect(table.get(id), currentHp, nowMs, this.timing);
    table.set(id, next);
    return next;
  }

  get(category: HpEffectCategory, id: number): HpEffectState | null {
    return this.table(category).get(id) ?? null;
  }

  isBlinkVisible(category: HpEffectCategory, id: number): boolean {
    const state = this.get(category, id);
    return state ? isBlinkVisible(state, this.timing) : false;
  }

  /** Drops entries for entities that no longer exist. */
  prune(category: HpEffectCategory, liveIds: Iterable<number>): void {
    const table = this.table(category);
    const live = new Set(liveIds);
    for (const id of [...table.keys()]) {
      if (!live.has(id)) {
        table.delete(id);
      }
    }
  }

  entries(category: HpEffectCategory): ReadonlyMap<number, HpEffectState> {
    return new Map(this.table(category));
  }

  size(category?: HpEffectCategory): number {
    if (category) {
      return this.table(category).size;
    }
    return this.units.size + this.bases.size;
  }

  reset(): void {
    this.units = new Map();
    this.bases = new Map();
  }

  private table(category: HpEffectCategory): Map<number, HpEffectState> {
    return category === "unit" ? this.units : this.bases;
  }
}
