import { DEFAULT_ROUND_RULES, type EconomyRules } from '../config/roundRules.ts';
import type { UnitTypeTag } from '../data/unitCatalog.ts';
import type { EventBus } from '../events/EventBus.ts';
import type { RoundEvents, TritiumChangedPayload } from '../events/types.ts';
import type { LogStore } from '../logging/logStore.ts';
import type { RewardCollaborator } from '../sim/collaborators.ts';

function sanitizeAmount(value: number): number {
  return Number.isFinite(value) ? Math.max(0, Math.floor(value)) : 0;
}

export interface PlayerStatsOptions {
  readonly economy?: EconomyRules;
  readonly events?: EventBus<RoundEvents>;
  readonly log?: LogStore;
}

/**
 * Tritium wallet and kill tally. Plugs into the round lifecycle as its
 * reward collaborator.
 */
export class PlayerStats implements RewardCollaborator {
  private tritium = 0;
  private enemiesKilled = 0;
  private readonly economy: EconomyRules;
  private readonly events: EventBus<RoundEvents> | null;
  private readonly log: LogStore | null;

  constructor(options: PlayerStatsOptions = {}) {
    this.economy = options.economy ?? DEFAULT_ROUND_RULES.economy;
    this.events = options.events ?? null;
    this.log = options.log ?? null;
    this.tritium = this.economy.startingTritium;
  }

  getTritium(): number {
    return this.tritium;
  }

  getEnemiesKilled(): number {
    return this.enemiesKilled;
  }

  initializeNewGame(): void {
    this.enemiesKilled = 0;
    this.setTritium(this.economy.startingTritium, 'new-game');
  }

  canAfford(amount: number): boolean {
    return this.tritium >= sanitizeAmount(amount);
  }

  trySpend(amount: number): boolean {
    const cost = sanitizeAmount(amount);
    if (this.tritium < cost) {
      const message = `Not enough tritium: need ${cost}, have ${this.tritium}`;
      if (this.log) {
        this.log.emit({ type: 'economy', level: 'warn', message, metadata: { cost, tritium: this.tritium } });
      } else {
        console.warn(message);
      }
      return false;
    }
    this.setTritium(this.tritium - cost, 'spend');
    return true;
  }

  addTritium(amount: number): void {
    const gain = sanitizeAmount(amount);
    if (gain === 0) {
      return;
    }
    this.setTritium(this.tritium + gain, 'grant');
  }

  grantRoundCompletionReward(round: number): void {
    const reward = this.economy.roundCompletionReward;
    this.setTritium(this.tritium + reward, 'round-reward');
    this.log?.emit({
      type: 'economy',
      message: `Round ${round} reward: +${reward} tritium`,
      metadata: { round, reward, tritium: this.tritium }
    });
  }

  grantKillReward(tag: UnitTypeTag, reward: number): void {
    this.enemiesKilled += 1;
    const gain = sanitizeAmount(reward);
    if (gain > 0) {
      this.setTritium(this.tritium + gain, 'kill-reward');
    }
    this.log?.emit({
      type: 'economy',
      message: `Destroyed ${tag}: +${gain} tritium`,
      metadata: { unitTag: tag, reward: gain, enemiesKilled: this.enemiesKilled }
    });
  }

  private setTritium(amount: number, source: TritiumChangedPayload['source']): void {
    const delta = amount - this.tritium;
    this.tritium = amount;
    this.events?.emit('economy:tritium-changed', { amount, delta, source });
  }
}
