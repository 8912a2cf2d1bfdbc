/**
 * Pure bucketing functions for player condition and position.
 */

import type { ArmorBucket, HealthBucket, PositionRegion, Quadrant } from '../types/index.js';

export const GRID_SIZE = 8;

export interface Bounds {
  minX: number;
  maxX: number;
  minY: number;
  maxY: number;
}

export function hpBucket(current: number | null, maximum: number | null): HealthBucket {
  if (current === null || maximum === null || maximum === 0) return 'unknown';
  const ratio = current / maximum;
  if (ratio > 0.8) return 'full';
  if (ratio > 0.3) return 'damaged';
  return 'critical';
}

export function armorBucket(armor: number | null): ArmorBucket {
  if (armor === null) return 'unknown';
  if (armor <= 0) return 'none';
  if (armor <= 25) return 'light';
  return 'heavy';
}

/**
 * Min/max bounds across every known coordinate pair.
 * A degenerate span is widened by 1 so binning never divides by zero.
 */
export function computeBounds(points: ReadonlyArray<{ x: number | null; y: number | null }>): Bounds | null {
  const xs: number[] = [];
  const ys: number[] = [];
  for (const p of points) {
    if (p.x !== null && p.y !== null) {
      xs.push(p.x);
      ys.push(p.y);
    }
  }
  if (xs.length === 0) return null;

  const minX = Math.min(...xs);
  let maxX = Math.max(...xs);
  const minY = Math.min(...ys);
  let maxY = Math.max(...ys);

  if (Math.abs(maxX - minX) < 1e-6) maxX = minX + 1;
  if (Math.abs(maxY - minY) < 1e-6) maxY = minY + 1;

  return { minX, maxX, minY, maxY };
}

function binIndex(v: number, min: number, max: number, n: number): number {
  const span = max - min;
  const r = Math.abs(span) > 1e-12 ? (v - min) / span : 0;
  const clamped = Math.min(Math.max(r, 0), 0.999999);
  return Math.floor(clamped * n);
}

export function unknownRegion(x: number | null = null, y: number | null = null): PositionRegion {
  return { x, y, region_rc: 'Unknown', x_band: 'Unknown', y_band: 'Unknown', quadrant: 'Unknown' };
}

/** Grid cell and compass quadrant of (x, y) relative to the snapshot bounds. */
export function regionLabels(
  x: number | null,
  y: number | null,
  bounds: Bounds | null,
  n = GRID_SIZE,
): PositionRegion {
  if (x === null || y === null || bounds === null) return unknownRegion(x, y);

  const col = binIndex(x, bounds.minX, bounds.maxX, n);
  const row = binIndex(y, bounds.minY, bounds.maxY, n);

  const midX = (bounds.minX + bounds.maxX) / 2;
  const midY = (bounds.minY + bounds.maxY) / 2;
  const east = x >= midX;
  const north = y >= midY;
  let quadrant: Quadrant;
  if (north) quadrant = east ? 'NE' : 'NW';
  else quadrant = east ? 'SE' : 'SW';

  return {
    x,
    y,
    region_rc: `R${row + 1}C${col + 1}`,
    x_band: `B${col + 1}`,
    y_band: `B${row + 1}`,
    quadrant,
  };
}
