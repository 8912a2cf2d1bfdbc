import type { ChangeEvent, Snapshot } from '../types/index.js';

/**
 * Compare two consecutive snapshots of the same game.
 *
 * Returns no events for the first snapshot (`previous === null`), and only
 * compares players present in both snapshots: joins and leaves are not modeled.
 * Events follow the iteration order of `current.players`.
 */
export function diffSnapshots(previous: Snapshot | null, current: Snapshot): ChangeEvent[] {
  const changes: ChangeEvent[] = [];
  if (!previous) return changes;

  for (const [playerId, now] of current.players) {
    const before = previous.players.get(playerId);
    if (!before) continue;

    if (before.alive && !now.alive) {
      changes.push({ kind: 'PLAYER_DIED', player: now });
    }

    if (now.weapon && before.weapon !== now.weapon) {
      changes.push({
        kind: 'WEAPON_CHANGE',
        player: now,
        oldWeapon: before.weapon,
        newWeapon: now.weapon,
      });
    }
  }

  return changes;
}
