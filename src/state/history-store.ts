/**
 * Rolling snapshot history with a best-effort JSON mirror on disk.
 *
 * The in-memory window serves in-process summaries; the file survives
 * restarts. The file is rewritten whole (temp file + rename) after each
 * accepted snapshot, so readers never see a partial write.
 */

import { mkdir, readFile, rename, rm, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { logger } from '../logger.js';
import { RingBuffer } from './ring-buffer.js';
import { isRecord } from '../util/json.js';
import type { HealthBucket, HistoryEntry, HistoryPlayerEntry, Snapshot } from '../types/index.js';

const DEFAULT_CAPACITY = 50;
/** The file never holds more than this many entries, whatever the window size. */
export const PERSISTED_LIMIT = 50;

const HEALTH_BUCKETS: ReadonlySet<string> = new Set<HealthBucket>(['full', 'damaged', 'critical', 'unknown']);

export interface HistoryStoreOptions {
  filePath: string;
  /** In-memory window size. The file keeps at most `PERSISTED_LIMIT` of these. */
  capacity?: number;
}

/** Simplified projection written to disk. */
export function toHistoryEntry(snapshot: Snapshot): HistoryEntry {
  const players: Record<string, HistoryPlayerEntry> = {};
  for (const [id, p] of snapshot.players) {
    players[id] = { alive: p.alive, hp_bucket: p.hpBucket, weapon: p.weapon };
  }
  return {
    series_id: snapshot.seriesId,
    game_id: snapshot.gameId,
    timestamp: snapshot.timestamp,
    players,
  };
}

function isHistoryPlayerEntry(value: unknown): value is HistoryPlayerEntry {
  return isRecord(value)
    && typeof value.alive === 'boolean'
    && typeof value.hp_bucket === 'string' && HEALTH_BUCKETS.has(value.hp_bucket)
    && (value.weapon === null || typeof value.weapon === 'string');
}

export function isHistoryEntry(value: unknown): value is HistoryEntry {
  if (!isRecord(value)) return false;
  if (typeof value.series_id !== 'string' || typeof value.game_id !== 'string' || typeof value.timestamp !== 'string') {
    return false;
  }
  const players = value.players;
  return isRecord(players) && Object.values(players).every(isHistoryPlayerEntry);
}

function isMissingFile(err: unknown): boolean {
  return isRecord(err) && err.code === 'ENOENT';
}

export class HistoryStore {
  private readonly window: RingBuffer<Snapshot>;
  private readonly filePath: string;
  private writeCount = 0;

  constructor(options: HistoryStoreOptions) {
    this.filePath = options.filePath;
    this.window = new RingBuffer<Snapshot>(options.capacity ?? DEFAULT_CAPACITY);
  }

  get size(): number { return this.window.size; }
  get capacity(): number { return this.window.capacity; }

  /**
   * Add an accepted snapshot and mirror the window to disk.
   * Write failures are logged; the in-memory window is updated regardless.
   */
  async append(snapshot: Snapshot): Promise<void> {
    if (snapshot.players.size === 0) {
      logger.debug('HistoryStore: ignoring snapshot with no players');
      return;
    }
    this.window.push(snapshot);
    await this.persist();
  }

  /** Up to `limit` most recent snapshots, oldest-first. */
  recent(limit = 10): Snapshot[] {
    return this.window.latest(limit);
  }

  latest(): Snapshot | null {
    return this.window.newest();
  }

  /**
   * Read the persisted projection. Independent of the in-memory window,
   * so it also returns entries written by a previous process.
   */
  async readPersisted(): Promise<HistoryEntry[]> {
    try {
      const raw = await readFile(this.filePath, 'utf-8');
      const parsed: unknown = JSON.parse(raw);
      if (!Array.isArray(parsed)) {
        logger.warn(`HistoryStore: ${this.filePath} does not contain an array — ignoring`);
        return [];
      }
      return parsed.filter(isHistoryEntry);
    } catch (err) {
      if (!isMissingFile(err)) {
        logger.error(`HistoryStore: failed to read ${this.filePath}:`, err);
      }
      return [];
    }
  }

  private async persist(): Promise<void> {
    const entries = this.window.latest(PERSISTED_LIMIT).map(toHistoryEntry);
    const tmpPath = `${this.filePath}.${process.pid}.${++this.writeCount}.tmp`;
    try {
      await mkdir(path.dirname(this.filePath), { recursive: true });
      await writeFile(tmpPath, JSON.stringify(entries, null, 2), 'utf-8');
      await rename(tmpPath, this.filePath);
      logger.debug(`HistoryStore: wrote ${entries.length} entries to ${this.filePath}`);
    } catch (err) {
      logger.error('HistoryStore: failed to save history:', err);
      await rm(tmpPath, { force: true }).catch((rmErr: unknown) => {
        logger.warn(`HistoryStore: could not remove ${tmpPath}:`, rmErr);
      });
    }
  }
}
