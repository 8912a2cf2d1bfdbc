// Player condition

export type Side = 'attacker' | 'defender' | 'unknown';

export type HealthBucket = 'full' | 'damaged' | 'critical' | 'unknown';

export type ArmorBucket = 'none' | 'light' | 'heavy' | 'unknown';

export type Quadrant = 'NE' | 'NW' | 'SE' | 'SW' | 'Unknown';

/** Coarse spatial label derived from a coordinate pair and the snapshot's bounds. */
export interface PositionRegion {
  x: number | null;
  y: number | null;
  /** "R<row>C<col>" on the 8×8 grid, or "Unknown". */
  region_rc: string;
  x_band: string;
  y_band: string;
  quadrant: Quadrant;
}

export interface PlayerState {
  readonly id: string;
  readonly name: string;
  readonly teamName: string;
  readonly side: Side;
  /** Character/agent name when the feed reports one. */
  readonly agent: string | null;
  readonly alive: boolean;
  readonly hpBucket: HealthBucket;
  readonly armorBucket: ArmorBucket;
  readonly weapon: string | null;
  readonly position: Readonly<PositionRegion>;
}

// Snapshot

export interface Snapshot {
  readonly seriesId: string;
  readonly gameId: string;
  /** ISO 8601 capture time. */
  readonly timestamp: string;
  /** Keyed by player id; iteration order is the feed's order. */
  readonly players: ReadonlyMap<string, PlayerState>;
}

// Snapshot deltas

export type ChangeEvent =
  | { kind: 'PLAYER_DIED'; player: PlayerState }
  | { kind: 'WEAPON_CHANGE'; player: PlayerState; oldWeapon: string | null; newWeapon: string };

// Tactical events

export type TacticalEventType = 'FIRST_DEATH';

export interface TacticalEvent {
  readonly eventType: TacticalEventType;
  readonly timestamp: string; // ISO 8601
  readonly description: string;
  readonly metadata: Readonly<Record<string, string>>;
}

// Persisted history

export interface HistoryPlayerEntry {
  alive: boolean;
  hp_bucket: HealthBucket;
  weapon: string | null;
}

export interface HistoryEntry {
  series_id: string;
  game_id: string;
  timestamp: string;
  players: Record<string, HistoryPlayerEntry>;
}

// Visual channel

export const VISUAL_LABELS = ['KILL', 'DEATH', 'ROUND_END', 'NO_EVENT'] as const;

export type VisualLabel = (typeof VISUAL_LABELS)[number];

/** Labels that are debounced; NO_EVENT and errors are liveness signals. */
export type ActionableLabel = Exclude<VisualLabel, 'NO_EVENT'>;

export type ClassifierOutcome =
  | { label: VisualLabel }
  | { label: 'ERROR'; message: string };

export type VisualEvent = ClassifierOutcome & {
  timestamp: string; // ISO 8601
};

/** Screen rectangle in pixels. */
export interface CaptureRegion {
  top: number;
  left: number;
  width: number;
  height: number;
}

/** Packed RGB pixels, row-major. */
export interface RawFrame {
  width: number;
  height: number;
  channels: 3;
  data: Uint8Array;
}
