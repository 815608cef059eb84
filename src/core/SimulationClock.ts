export type StepCallback = (deltaSeconds: number) => void;

export interface SimulationClockOptions {
  /** Length of one simulation step. */
  readonly stepSeconds: number;
  readonly onStep: StepCallback;
  /** A timer-driven step that throws stops the clock and lands here. */
  readonly onError?: (error: unknown) => void;
}

/**
 * Feeds the round lifecycle fixed steps of simulated time. Either it runs on
 * its own interval timer, or the caller drives it through {@link advance}.
 */
export class SimulationClock {
  readonly stepSeconds: number;
  private readonly onStep: StepCallback;
  private readonly onError: (error: unknown) => void;
  private timer: ReturnType<typeof setInterval> | null = null;
  private carrySeconds = 0;
  private stepCount = 0;

  constructor(options: SimulationClockOptions) {
    if (!Number.isFinite(options.stepSeconds) || options.stepSeconds <= 0) {
      throw new RangeError('Step length must be a positive number of seconds');
    }
    this.stepSeconds = options.stepSeconds;
    this.onStep = options.onStep;
    this.onError = options.onError ?? ((error) => console.warn('Simulation step failed', error));
  }

  start(): void {
    if (this.timer !== null) {
      return;
    }
    this.carrySeconds = 0;
    this.timer = setInterval(() => {
      try {
        this.step();
      } catch (error) {
        this.stop();
        this.onError(error);
      }
    }, this.stepSeconds * 1000);
  }

  stop(): void {
    if (this.timer !== null) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }

  isRunning(): boolean {
    return this.timer !== null;
  }

  /** Steps taken since construction, by either driver. */
  getStepCount(): number {
    return this.stepCount;
  }

  /**
   * Run every whole step that fits in `seconds` plus the carried remainder.
   * Does nothing while the timer drives the clock. Errors reach the caller.
   */
  advance(seconds: number): number {
    if (this.timer !== null || !Number.isFinite(seconds) || seconds <= 0) {
      return 0;
    }
    this.carrySeconds += seconds;
    let steps = 0;
    // Absorbs float drift from summing fractional steps.
    while (this.carrySeconds + 1e-9 >= this.stepSeconds) {
      this.carrySeconds = Math.max(0, this.carrySeconds - this.stepSeconds);
      this.step();
      steps += 1;
    }
    return steps;
  }

  private step(): void {
    this.stepCount += 1;
    this.onStep(this.stepSeconds);
  }
}
