/**
 * GRID series-state adapter, the production SnapshotSource.
 *
 * Discovers the player inventory field once per process, queries the live
 * series state over GraphQL and normalizes the most recent game into a
 * Snapshot. Every failure becomes `null` (no data this tick).
 */

import { logger } from '../logger.js';
import { armorBucket, computeBounds, hpBucket, regionLabels } from './player-metrics.js';
import { asArray, asString, field, isRecord, toNumber } from '../util/json.js';
import type { SnapshotSource } from './poller.js';
import type { PlayerState, Side, Snapshot } from '../types/index.js';

const DEFAULT_PLAYER_TYPE = 'GamePlayerStateValorant';
const DEFAULT_INVENTORY_FIELD = 'inventory';
const INVENTORY_TYPE = 'PlayerInventory';

const INTROSPECT_TYPE_FIELDS = `
query IntrospectType($name: String!) {
  __type(name: $name) {
    name
    fields {
      name
      type { kind name ofType { kind name ofType { kind name ofType { kind name }}}}
    }
  }
}`;

const INTROSPECT_SCHEMA_TYPE_NAMES = `
query IntrospectSchemaTypeNames {
  __schema {
    types { name }
  }
}`;

export class GridRequestError extends Error {
  constructor(message: string, readonly status?: number) {
    super(message);
    this.name = 'GridRequestError';
  }
}

export interface InventoryPath {
  playerType: string;
  inventoryField: string;
}

export interface GridClientOptions {
  apiKey: string;
  url: string;
  timeoutMs?: number;
  fetchImpl?: typeof fetch;
}

// ── Pure helpers ───────────────────────────────────────────────────────────

/** Unwrap NON_NULL/LIST wrappers down to the named GraphQL type. */
export function unwrapNamedType(typeRef: unknown): string | null {
  let cur = typeRef;
  for (let depth = 0; depth < 10 && isRecord(cur); depth++) {
    const name = asString(cur.name);
    if (name) return name;
    cur = cur.ofType;
  }
  return null;
}

/**
 * Pick the weapon a player is holding: the equipped item with the highest
 * (equipped, quantity, name); otherwise the first named item.
 */
export function extractWeapon(inventory: unknown): string | null {
  let best: { equipped: number; quantity: number; name: string } | null = null;
  let fallback: string | null = null;

  for (const item of asArray(field(inventory, 'items'))) {
    const name = asString(field(item, 'name'));
    if (!name) continue;
    fallback ??= name;

    const equipped = Math.trunc(toNumber(field(item, 'equipped')) ?? 0);
    const quantity = Math.trunc(toNumber(field(item, 'quantity')) ?? 0);
    if (equipped <= 0) continue;

    const better = best === null
      || equipped > best.equipped
      || (equipped === best.equipped && quantity > best.quantity)
      || (equipped === best.equipped && quantity === best.quantity && name > best.name);
    if (better) best = { equipped, quantity, name };
  }

  return best?.name ?? fallback;
}

function normalizeSide(raw: unknown): Side {
  const side = asString(raw)?.toLowerCase() ?? '';
  if (side.startsWith('attack')) return 'attacker';
  if (side.startsWith('defend') || side.startsWith('defense')) return 'defender';
  return 'unknown';
}

export function buildSeriesStateQuery(path: InventoryPath): string {
  return `
query MidRoundState($seriesId: ID!) {
  seriesState(id: $seriesId) {
    id
    games {
      id
      teams {
        __typename
        ... on GameTeamStateValorant {
          id
          name
          side
          players {
            __typename
            ... on ${path.playerType} {
              id
              name
              alive
              participationStatus
              currentHealth
              maxHealth
              currentArmor
              position { x y }
              character { name }
              ${path.inventoryField} {
                items { id name quantity equipped stashed }
              }
            }
          }
        }
      }
    }
  }
}`;
}

/**
 * Normalize a `seriesState` payload into a Snapshot of its most recent game
 * that has players. Returns null when no game has any.
 */
export function buildSnapshot(
  seriesId: string,
  seriesState: unknown,
  inventoryField: string,
  now: Date = new Date(),
): Snapshot | null {
  const games = asArray(field(seriesState, 'games'));

  for (let g = games.length - 1; g >= 0; g--) {
    const game = games[g];
    const teams = asArray(field(game, 'teams'));
    const rawPlayers = teams.flatMap(team =>
      asArray(field(team, 'players')).map(player => ({ team, player })));
    if (rawPlayers.length === 0) continue;

    const coords = rawPlayers.map(({ player }) => ({
      x: toNumber(field(field(player, 'position'), 'x')),
      y: toNumber(field(field(player, 'position'), 'y')),
    }));
    const bounds = computeBounds(coords);

    const players = new Map<string, PlayerState>();
    rawPlayers.forEach(({ team, player }, index) => {
      const teamName = asString(field(team, 'name')) ?? 'Unknown';
      const name = asString(field(player, 'name')) ?? `player-${index + 1}`;
      const id = asString(field(player, 'id')) ?? name;
      const { x, y } = coords[index];

      players.set(id, {
        id,
        name,
        teamName,
        side: normalizeSide(field(team, 'side')),
        agent: asString(field(field(player, 'character'), 'name')),
        alive: field(player, 'alive') === true,
        hpBucket: hpBucket(toNumber(field(player, 'currentHealth')), toNumber(field(player, 'maxHealth'))),
        armorBucket: armorBucket(toNumber(field(player, 'currentArmor'))),
        weapon: extractWeapon(field(player, inventoryField)),
        position: regionLabels(x, y, bounds),
      });
    });

    return {
      seriesId,
      gameId: asString(field(game, 'id')) ?? 'unknown',
      timestamp: now.toISOString(),
      players,
    };
  }

  return null;
}

// ── Client ─────────────────────────────────────────────────────────────────

export class GridClient {
  private readonly apiKey: string;
  private readonly url: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: typeof fetch;

  constructor(options: GridClientOptions) {
    this.apiKey = options.apiKey;
    this.url = options.url;
    this.timeoutMs = options.timeoutMs ?? 10_000;
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  /** POST a GraphQL operation and return its `data` object. */
  async query(query: string, operationName: string, variables: Record<string, unknown>): Promise<Record<string, unknown>> {
    const response = await this.fetchImpl(this.url, {
      method: 'POST',
      headers: {
        'x-api-key': this.apiKey,
        'Content-Type': 'application/json',
        Accept: 'application/json',
      },
      body: JSON.stringify({ query, operationName, variables }),
      signal: AbortSignal.timeout(this.timeoutMs),
    });

    if (!response.ok) {
      const text = await response.text();
      throw new GridRequestError(`HTTP ${response.status}: ${text.slice(0, 500)}`, response.status);
    }

    const body: unknown = await response.json();
    const errors = asArray(field(body, 'errors'));
    if (errors.length > 0) {
      throw new GridRequestError(JSON.stringify(errors).slice(0, 2000));
    }
    const data = field(body, 'data');
    return isRecord(data) ? data : {};
  }

  private async findInventoryField(typeName: string): Promise<string | null> {
    const data = await this.query(INTROSPECT_TYPE_FIELDS, 'IntrospectType', { name: typeName });
    for (const f of asArray(field(field(data, '__type'), 'fields'))) {
      const fieldName = asString(field(f, 'name'));
      if (fieldName && unwrapNamedType(field(f, 'type')) === INVENTORY_TYPE) return fieldName;
    }
    return null;
  }

  /**
   * Locate the player field typed PlayerInventory. Tries the known player
   * type first, then every schema type whose name mentions Player and Valorant.
   */
  async discoverInventoryPath(): Promise<InventoryPath | null> {
    try {
      const inventoryField = await this.findInventoryField(DEFAULT_PLAYER_TYPE);
      if (inventoryField) return { playerType: DEFAULT_PLAYER_TYPE, inventoryField };
    } catch (err) {
      logger.debug(`GridClient: introspection of ${DEFAULT_PLAYER_TYPE} failed:`, err);
    }

    const data = await this.query(INTROSPECT_SCHEMA_TYPE_NAMES, 'IntrospectSchemaTypeNames', {});
    const candidates = asArray(field(field(data, '__schema'), 'types'))
      .map(t => asString(field(t, 'name')))
      .filter((n): n is string => n !== null && n.includes('Player') && n.includes('Valorant'));

    for (const playerType of candidates) {
      try {
        const inventoryField = await this.findInventoryField(playerType);
        if (inventoryField) return { playerType, inventoryField };
      } catch (err) {
        logger.debug(`GridClient: introspection of ${playerType} failed:`, err);
      }
    }
    return null;
  }
}

export class GridStateFetcher implements SnapshotSource {
  private inventoryPath: Promise<InventoryPath> | null = null;

  constructor(private readonly client: GridClient) {}

  async fetchSnapshot(seriesId: string): Promise<Snapshot | null> {
    try {
      const path = await this.resolveInventoryPath();
      const data = await this.client.query(buildSeriesStateQuery(path), 'MidRoundState', { seriesId });
      const seriesState = data.seriesState;
      if (!isRecord(seriesState)) return null;
      return buildSnapshot(seriesId, seriesState, path.inventoryField);
    } catch (err) {
      logger.warn(`GridStateFetcher: series-state failed for ${seriesId}:`, err);
      return null;
    }
  }

  /** Discovery runs once; a failed discovery falls back to the known field path. */
  private resolveInventoryPath(): Promise<InventoryPath> {
    this.inventoryPath ??= this.client.discoverInventoryPath()
      .catch((err: unknown) => {
        logger.warn('GridStateFetcher: inventory discovery failed:', err);
        return null;
      })
      .then((found) => {
        if (found) {
          logger.info(`GridStateFetcher: inventory at ${found.playerType}.${found.inventoryField}`);
          return found;
        }
        logger.error('GridStateFetcher: could not discover inventory field — using defaults');
        return { playerType: DEFAULT_PLAYER_TYPE, inventoryField: DEFAULT_INVENTORY_FIELD };
      });
    return this.inventoryPath;
  }
}
