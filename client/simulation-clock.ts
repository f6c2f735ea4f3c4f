export interface SimulationClockOptions {
  readonly tickRate?: number;
  readonly maxStepsPerAdvance?: number;
}

const DEFAULT_TICK_RATE = 60;
const DEFAULT_MAX_STEPS_PER_ADVANCE = 5;

/**
 * Single source of simulated time for every time-driven subsystem.
 *
 * Interpolation, spawn animations and hp ghost decay all read from one clock so
 * that pausing halts them together; while paused neither the accumulator nor
 * {@link SimulationClock.elapsedMs} moves.
 */
export class SimulationClock {
  readonly stepSeconds: number;
  readonly stepMs: number;
  private readonly maxStepsPerAdvance: number;
  private accumulatorMs = 0;
  private simulatedMs = 0;
  private stepCount = 0;
  private pausedFlag = false;

  constructor(options: SimulationClockOptions = {}) {
    const tickRate = options.tickRate ?? DEFAULT_TICK_RATE;
    const rate = Number.isFinite(tickRate) && tickRate > 0 ? tickRate : DEFAULT_TICK_RATE;
    this.stepSeconds = 1 / rate;
    this.stepMs = 1000 / rate;
    const maxSteps = options.maxStepsPerAdvance ?? DEFAULT_MAX_STEPS_PER_ADVANCE;
    this.maxStepsPerAdvance = Math.max(1, Math.floor(maxSteps));
  }

  get paused(): boolean {
    return this.pausedFlag;
  }

  get elapsedMs(): number {
    return this.simulatedMs;
  }

  get steps(): number {
    return this.stepCount;
  }

  pause(): void {
    if (this.pausedFlag) {
      return;
    }
    this.pausedFlag = true;
    this.accumulatorMs = 0;
  }

  resume(): void {
    this.pausedFlag = false;
  }

  setPaused(paused: boolean): void {
    if (paused) {
      this.pause();
    } else {
      this.resume();
    }
  }

  /**
   * Feeds wall-clock time into the accumulator and runs one `step` per whole
   * fixed timestep. Returns the number of steps run.
   */
  advance(elapsedMs: number, step: (dtSeconds: number) => void): number {
    if (this.pausedFlag || !Number.isFinite(elapsedMs) || elapsedMs <= 0) {
      return 0;
    }

    this.accumulatorMs += elapsedMs;
    let ran = 0;
    while (this.accumulatorMs >= this.stepMs && ran < this.maxStepsPerAdvance) {
      step(this.stepSeconds);
      this.accumulatorMs -= this.stepMs;
      this.simulatedMs += this.stepMs;
      this.stepCount += 1;
      ran += 1;
    }

    if (ran === this.maxStepsPerAdvance && this.accumulatorMs >= this.stepMs) {
      // Long stalls are dropped instead of replayed in a burst.
      this.accumulatorMs = 0;
    }
    return ran;
  }

  reset(): void {
    this.accumulatorMs = 0;
    this.simulatedMs = 0;
    this.stepCount = 0;
    this.pausedFlag = false;
  }
}
