import type { ActionableLabel, ClassifierOutcome } from '../types/index.js';

/**
 * Per-label cooldown for actionable classifier labels. NO_EVENT and errors
 * always pass: they are liveness signals, not events.
 */
export class EventDebouncer {
  private readonly lastSurfaced = new Map<ActionableLabel, number>();

  constructor(
    private readonly cooldownMs: number,
    private readonly now: () => number = Date.now,
  ) {}

  /** Decide whether to surface the outcome; records the time when it does. */
  shouldSurface(outcome: ClassifierOutcome): boolean {
    if (outcome.label === 'NO_EVENT' || outcome.label === 'ERROR') return true;

    const now = this.now();
    const last = this.lastSurfaced.get(outcome.label);
    if (last !== undefined && now - last < this.cooldownMs) return false;

    this.lastSurfaced.set(outcome.label, now);
    return true;
  }

  reset(): void {
    this.lastSurfaced.clear();
  }
}
