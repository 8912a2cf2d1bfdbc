/**
 * Tactical pattern detection over snapshot deltas.
 *
 * Keeps two lists: the tactical event log (drained by the consumer, never
 * expired here) and deduplicated conclusion strings. Consumers see only the
 * tail of each.
 */

import { EventEmitter } from 'events';
import { logger } from '../logger.js';
import type { ChangeEvent, PlayerState, Snapshot, TacticalEvent } from '../types/index.js';

const DEFAULT_VISIBLE_COUNT = 5;

export interface TacticalEventDetectorOptions {
  /** Weapon names reported as upgrades. Matched case-insensitively. */
  premiumWeapons: readonly string[];
  /** How many events/conclusions the getters expose. */
  visibleCount?: number;
}

export interface TacticalEventDetectorEvents {
  tacticalEvent: [event: TacticalEvent];
  conclusion: [text: string];
}

export class TacticalEventDetector extends EventEmitter<TacticalEventDetectorEvents> {
  private eventLog: TacticalEvent[] = [];
  private conclusions: string[] = [];
  private readonly seenConclusions = new Set<string>();
  private readonly premiumWeapons: ReadonlySet<string>;
  private readonly visibleCount: number;

  constructor(options: TacticalEventDetectorOptions) {
    super();
    this.premiumWeapons = new Set(options.premiumWeapons.map(w => w.toLowerCase()));
    this.visibleCount = options.visibleCount ?? DEFAULT_VISIBLE_COUNT;
  }

  get eventCount(): number { return this.eventLog.length; }

  /** Apply every pattern rule to one change. */
  processChange(change: ChangeEvent, snapshot: Snapshot): void {
    switch (change.kind) {
      case 'PLAYER_DIED':
        this.onPlayerDied(change.player, snapshot);
        break;
      case 'WEAPON_CHANGE':
        this.onWeaponChange(change.player, change.newWeapon);
        break;
      default: {
        const unhandled: never = change;
        logger.warn('TacticalEventDetector: unhandled change', unhandled);
      }
    }
  }

  /** Last conclusions, most recent last. */
  getTacticalConclusions(): string[] {
    return this.conclusions.slice(-this.visibleCount);
  }

  /** Last tactical events, most recent last. The log itself is not modified. */
  getLatestEvents(): TacticalEvent[] {
    return this.eventLog.slice(-this.visibleCount);
  }

  /** Return the whole log and empty it (consumer hand-off). */
  drainEvents(): TacticalEvent[] {
    const drained = this.eventLog;
    this.eventLog = [];
    return drained;
  }

  clearEvents(): void {
    this.eventLog = [];
  }

  // ── Rules ───────────────────────────────────────────────────────────────

  /**
   * First death of the round: exactly one player of the snapshot is down.
   * Absent (disconnected) players are not counted, so the comparison is
   * against the snapshot's own player total.
   */
  private onPlayerDied(player: PlayerState, snapshot: Snapshot): void {
    const total = snapshot.players.size;
    let alive = 0;
    for (const p of snapshot.players.values()) {
      if (p.alive) alive++;
    }
    if (alive !== total - 1) return;

    const event: TacticalEvent = {
      eventType: 'FIRST_DEATH',
      timestamp: snapshot.timestamp,
      description: `First death of the round: ${player.name} (${player.teamName})`,
      metadata: {
        player: player.name,
        team: player.teamName,
        position: `${player.position.region_rc} (${player.position.quadrant})`,
        side: player.side,
      },
    };
    this.eventLog.push(event);
    logger.info(`TacticalEventDetector: ${event.description}`);
    this.emit('tacticalEvent', event);

    this.addConclusion(`Entry engagement lost by ${player.teamName} at ${player.position.region_rc}.`);
  }

  private onWeaponChange(player: PlayerState, newWeapon: string): void {
    if (!this.premiumWeapons.has(newWeapon.toLowerCase())) return;
    this.addConclusion(`${player.name} upgraded to ${newWeapon}. Strength increased.`);
  }

  private addConclusion(text: string): void {
    if (this.seenConclusions.has(text)) return;
    this.seenConclusions.add(text);
    this.conclusions.push(text);
    logger.info(`TacticalEventDetector: conclusion — ${text}`);
    this.emit('conclusion', text);
  }
}
