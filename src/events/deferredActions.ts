export type DeferredAction = () => void;

export interface DeferredActionHandle {
  readonly id: number;
  readonly label: string;
  readonly dueAt: number;
  cancel(): boolean;
}

interface QueuedAction {
  readonly id: number;
  readonly label: string;
  readonly dueAt: number;
  readonly action: DeferredAction;
}

/**
 * Callbacks keyed to simulation time rather than wall-clock timers. Nothing
 * fires until {@link advance} is called from the simulation tick, and every
 * pending action can be dropped at once when a game is reset.
 */
export class DeferredActionQueue {
  private clock = 0;
  private sequence = 0;
  private queue: QueuedAction[] = [];

  now(): number {
    return this.clock;
  }

  schedule(delaySeconds: number, label: string, action: DeferredAction): DeferredActionHandle {
    const delay = Number.isFinite(delaySeconds) ? Math.max(0, delaySeconds) : 0;
    this.sequence += 1;
    const queued: QueuedAction = { id: this.sequence, label, dueAt: this.clock + delay, action };
    this.queue.push(queued);
    this.sortQueue();
    return {
      id: queued.id,
      label,
      dueAt: queued.dueAt,
      cancel: () => this.cancel(queued.id)
    };
  }

  cancel(id: number): boolean {
    const idx = this.queue.findIndex((queued) => queued.id === id);
    if (idx === -1) {
      return false;
    }
    this.queue.splice(idx, 1);
    return true;
  }

  /** Drop every pending action whose label starts with `prefix`, or all of them. */
  cancelAll(prefix?: string): number {
    const before = this.queue.length;
    this.queue =
      prefix === undefined ? [] : this.queue.filter((queued) => !queued.label.startsWith(prefix));
    return before - this.queue.length;
  }

  pending(): number {
    return this.queue.length;
  }

  has(label: string): boolean {
    return this.queue.some((queued) => queued.label === label);
  }

  /**
   * Move the clock forward and run every action that has come due, earliest
   * first; ties run in scheduling order. Actions scheduled by a running action
   * fire in the same call when they fall inside the window.
   */
  advance(deltaSeconds: number): number {
    if (Number.isFinite(deltaSeconds) && deltaSeconds > 0) {
      this.clock += deltaSeconds;
    }
    let fired = 0;
    while (this.queue.length > 0 && this.queue[0].dueAt <= this.clock) {
      const next = this.queue.shift();
      if (!next) {
        break;
      }
      next.action();
      fired += 1;
    }
    return fired;
  }

  /** Clear pending actions and rewind the clock. */
  reset(): void {
    this.queue = [];
    this.clock = 0;
  }

  private sortQueue(): void {
    this.queue.sort((a, b) => a.dueAt - b.dueAt || a.id - b.id);
  }
}
