/**
 * Builders for hand-made snapshots and frames used by the smoke tests.
 */

import { unknownRegion } from '../src/state/player-metrics.js';
import type { SnapshotSource } from '../src/state/poller.js';
import type { CaptureRegion, PlayerState, RawFrame, Snapshot } from '../src/types/index.js';

export function player(id: string, overrides: Partial<PlayerState> = {}): PlayerState {
  return {
    id,
    name: id,
    teamName: 'Team Red',
    side: 'attacker',
    agent: null,
    alive: true,
    hpBucket: 'full',
    armorBucket: 'heavy',
    weapon: 'Classic',
    position: unknownRegion(),
    ...overrides,
  };
}

export function snapshot(players: PlayerState[], gameId = 'g1', timestamp = '2026-01-01T00:00:00.000Z'): Snapshot {
  return {
    seriesId: 's1',
    gameId,
    timestamp,
    players: new Map(players.map(p => [p.id, p])),
  };
}

/** Source that replays a script: snapshots, nulls (no data) and errors (thrown). */
export function scriptedSource(script: Array<Snapshot | null | Error>): SnapshotSource & { calls: number } {
  const queue = [...script];
  const source = {
    calls: 0,
    async fetchSnapshot(_seriesId: string): Promise<Snapshot | null> {
      source.calls++;
      const next = queue.shift();
      if (next instanceof Error) throw next;
      return next ?? null;
    },
  };
  return source;
}

/** Frame filled with one grey level. */
export function uniformFrame(width: number, height: number, value: number): RawFrame {
  return { width, height, channels: 3, data: new Uint8Array(width * height * 3).fill(value) };
}

export function regionFrame(region: CaptureRegion, value: number): RawFrame {
  return uniformFrame(region.width, region.height, value);
}
