export function canStartDefense(buildingPhaseElapsedTime: number, minimumDuration: number): boolean {
  return buildingPhaseElapsedTime >= minimumDuration;
}

export interface PhaseGateEvaluation {
  readonly allowed: boolean;
  readonly elapsedSeconds: number;
  readonly remainingSeconds: number;
}

/** Tracks when the building phase opened and whether it has lasted long enough. */
export class PhaseGate {
  private buildingStartedAt = 0;

  constructor(private readonly minimumDuration: number) {}

  openBuildingPhase(now: number): void {
    this.buildingStartedAt = now;
  }

  elapsed(now: number): number {
    return Math.max(0, now - this.buildingStartedAt);
  }

  evaluate(now: number): PhaseGateEvaluation {
    const elapsedSeconds = this.elapsed(now);
    return {
      allowed: canStartDefense(elapsedSeconds, this.minimumDuration),
      elapsedSeconds,
      remainingSeconds: Math.max(0, this.minimumDuration - elapsedSeconds)
    };
  }
}
