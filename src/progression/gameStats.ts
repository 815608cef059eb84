import type { StorageLike } from '../logging/logStore.ts';
import { getDefaultStorage, safeLoadJSON } from '../state/storage.ts';

export interface GameStatsSummary {
  readonly finalRound: number;
  readonly enemiesKilled: number;
  readonly buildingsBuilt: number;
}

export interface GameStatsRecord {
  readonly last: GameStatsSummary | null;
  readonly bestRound: number;
}

export const GAME_STATS_STORAGE_KEY = 'progression:gameStats';

const EMPTY_SUMMARY: GameStatsSummary = Object.freeze({
  finalRound: 0,
  enemiesKilled: 0,
  buildingsBuilt: 0
});

function sanitizeCount(value: unknown): number {
  const numeric = Number(value);
  if (!Number.isFinite(numeric)) {
    return 0;
  }
  return Math.max(0, Math.floor(numeric));
}

function sanitizeSummary(value: unknown): GameStatsSummary | null {
  if (typeof value !== 'object' || value === null) {
    return null;
  }
  return {
    finalRound: 'finalRound' in value ? sanitizeCount(value.finalRound) : 0,
    enemiesKilled: 'enemiesKilled' in value ? sanitizeCount(value.enemiesKilled) : 0,
    buildingsBuilt: 'buildingsBuilt' in value ? sanitizeCount(value.buildingsBuilt) : 0
  };
}

/** End-of-game tallies plus the best round reached across games. */
export class GameStats {
  private current: GameStatsSummary = EMPTY_SUMMARY;
  private buildingsBuilt = 0;
  private bestRound = 0;
  private last: GameStatsSummary | null = null;
  private readonly storage: StorageLike | null;

  constructor(storage: StorageLike | null = getDefaultStorage()) {
    this.storage = storage;
    this.restore();
  }

  incrementBuildingsBuilt(): void {
    this.buildingsBuilt += 1;
  }

  getBuildingsBuilt(): number {
    return this.buildingsBuilt;
  }

  recordGameOver(finalRound: number, enemiesKilled: number): GameStatsSummary {
    const summary: GameStatsSummary = Object.freeze({
      finalRound: sanitizeCount(finalRound),
      enemiesKilled: sanitizeCount(enemiesKilled),
      buildingsBuilt: this.buildingsBuilt
    });
    this.current = summary;
    this.last = summary;
    this.bestRound = Math.max(this.bestRound, summary.finalRound);
    this.persist();
    return summary;
  }

  getSummary(): GameStatsSummary {
    return this.current;
  }

  getRecord(): GameStatsRecord {
    return { last: this.last, bestRound: this.bestRound };
  }

  /** Clears the running tallies; the persisted record survives. */
  reset(): void {
    this.current = EMPTY_SUMMARY;
    this.buildingsBuilt = 0;
  }

  private restore(): void {
    if (!this.storage) {
      return;
    }
    const raw = safeLoadJSON(this.storage, GAME_STATS_STORAGE_KEY);
    if (typeof raw !== 'object' || raw === null) {
      return;
    }
    this.bestRound = 'bestRound' in raw ? sanitizeCount(raw.bestRound) : 0;
    this.last = 'last' in raw ? sanitizeSummary(raw.last) : null;
  }

  private persist(): void {
    if (!this.storage) {
      return;
    }
    const record: GameStatsRecord = { last: this.last, bestRound: this.bestRound };
    try {
      this.storage.setItem(GAME_STATS_STORAGE_KEY, JSON.stringify(record));
    } catch (error) {
      console.warn('Failed to persist game stats', error);
    }
  }
}
