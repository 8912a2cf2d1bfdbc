/**
 * Fixed-interval state polling loop.
 *
 * Each tick: fetch → diff against the previous snapshot → tactical detection
 * → history append, strictly in that order. A tick that throws is logged and
 * followed by a short backoff; nothing a single tick does can stop the loop.
 */

import { EventEmitter } from 'events';
import { logger } from '../logger.js';
import { pause } from '../util/pause.js';
import { diffSnapshots } from './snapshot-differ.js';
import type { TacticalEventDetector } from './tactical-events.js';
import type { HistoryStore } from './history-store.js';
import type { ChangeEvent, Snapshot } from '../types/index.js';

/** Boundary to the remote state service. Resolves null when there is no usable data. */
export interface SnapshotSource {
  fetchSnapshot(seriesId: string): Promise<Snapshot | null>;
}

export type TickOutcome = 'accepted' | 'empty';

export interface StatePollerOptions {
  seriesId: string;
  intervalMs?: number;      // 5s
  errorBackoffMs?: number;  // 1s
}

export interface StatePollerEvents {
  snapshot: [snapshot: Snapshot, changes: ChangeEvent[]];
  tickError: [error: unknown];
}

export class StatePoller extends EventEmitter<StatePollerEvents> {
  private _previous: Snapshot | null = null;
  private readonly seriesId: string;
  private readonly intervalMs: number;
  private readonly errorBackoffMs: number;

  constructor(
    private readonly source: SnapshotSource,
    private readonly detector: TacticalEventDetector,
    private readonly history: HistoryStore,
    options: StatePollerOptions,
  ) {
    super();
    this.seriesId = options.seriesId;
    this.intervalMs = options.intervalMs ?? 5_000;
    this.errorBackoffMs = options.errorBackoffMs ?? 1_000;
  }

  /** Last accepted snapshot. */
  get previous(): Snapshot | null { return this._previous; }

  /**
   * Run one poll. Empty results leave `previous` untouched.
   * Errors propagate to the caller (`run` handles them).
   */
  async tick(): Promise<TickOutcome> {
    const current = await this.source.fetchSnapshot(this.seriesId);
    if (!current || current.players.size === 0) {
      logger.debug('StatePoller: no snapshot this tick');
      return 'empty';
    }

    const changes = diffSnapshots(this._previous, current);
    for (const change of changes) {
      this.detector.processChange(change, current);
    }
    await this.history.append(current);
    this._previous = current;

    if (changes.length > 0) {
      logger.debug(`StatePoller: ${changes.length} change(s) in game ${current.gameId}`);
    }
    this.emit('snapshot', current, changes);
    return 'accepted';
  }

  /** Poll until the signal aborts. An in-flight fetch is allowed to finish. */
  async run(signal: AbortSignal): Promise<void> {
    logger.info(`StatePoller: polling series ${this.seriesId} every ${this.intervalMs / 1000}s`);

    while (!signal.aborted) {
      const startedAt = Date.now();
      let delayMs: number;
      try {
        await this.tick();
        delayMs = this.intervalMs - (Date.now() - startedAt);
      } catch (err) {
        logger.error('StatePoller: error in polling tick:', err);
        this.emit('tickError', err);
        delayMs = this.errorBackoffMs;
      }
      await pause(delayMs, signal);
    }

    logger.info('StatePoller: stopped');
  }
}
