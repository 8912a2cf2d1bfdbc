/**
 * Consumer-facing event surface. Both sensor channels end here; the two are
 * reported side by side and never cross-checked.
 */

import { EventEmitter } from 'events';
import { logger } from '../logger.js';
import { RingBuffer } from '../state/ring-buffer.js';
import type { TacticalEventDetector } from '../state/tactical-events.js';
import type { HistoryStore } from '../state/history-store.js';
import type { HistoryEntry, Snapshot, TacticalEvent, VisualEvent } from '../types/index.js';

const VISUAL_EVENT_BUFFER = 50;

export interface EventSinkEvents {
  tactical: [event: TacticalEvent];
  conclusion: [text: string];
  visual: [event: VisualEvent];
}

export class MatchEventSink extends EventEmitter<EventSinkEvents> {
  private readonly visualEvents = new RingBuffer<VisualEvent>(VISUAL_EVENT_BUFFER);

  constructor(
    private readonly detector: TacticalEventDetector,
    private readonly history: HistoryStore,
  ) {
    super();
    detector.on('tacticalEvent', (event) => this.emit('tactical', event));
    detector.on('conclusion', (text) => this.emit('conclusion', text));
  }

  // ── State channel ───────────────────────────────────────────────────────

  /** Last 5 tactical events, most recent last. */
  getLatestEvents(): TacticalEvent[] {
    return this.detector.getLatestEvents();
  }

  /** Last 5 conclusions, most recent last. */
  getTacticalConclusions(): string[] {
    return this.detector.getTacticalConclusions();
  }

  /** Hand the whole tactical log to the caller and clear it. */
  drainEvents(): TacticalEvent[] {
    return this.detector.drainEvents();
  }

  clearEvents(): void {
    this.detector.clearEvents();
  }

  getSnapshotHistory(limit = 10): Snapshot[] {
    return this.history.recent(limit);
  }

  getPersistedHistory(): Promise<HistoryEntry[]> {
    return this.history.readPersisted();
  }

  describeSnapshot(): string {
    const snapshot = this.history.latest();
    if (!snapshot) return 'No live state data available.';

    const players = [...snapshot.players.values()];
    const alive = players.filter(p => p.alive);
    let summary = `Snapshot (Game: ${snapshot.gameId}): ${alive.length}/${players.length} players alive.`;
    if (alive.length > 0) {
      const example = alive[0];
      summary += ` Example: ${example.name} is at ${example.position.region_rc} with ${example.weapon ?? 'no weapon'}.`;
    }
    return summary;
  }

  describeRound(): string {
    const snapshot = this.history.latest();
    if (!snapshot) return 'No live state data available for round status.';

    let alive = 0;
    for (const p of snapshot.players.values()) {
      if (p.alive) alive++;
    }
    return `Round Status: ${alive} players alive. Game ID: ${snapshot.gameId}.`;
  }

  // ── Visual channel ──────────────────────────────────────────────────────

  recordVisual(event: VisualEvent): void {
    this.visualEvents.push(event);
    if (event.label !== 'NO_EVENT') {
      logger.debug(`MatchEventSink: visual ${event.label}`);
    }
    this.emit('visual', event);
  }

  /** Most recent surfaced visual events, most recent last. */
  getRecentVisualEvents(limit = 5): VisualEvent[] {
    return this.visualEvents.latest(limit);
  }
}
