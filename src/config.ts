import { logger, registerSecret } from './logger.js';
import type { CaptureRegion } from './types/index.js';
import { isRecord } from './util/json.js';

export type ClassifierBackend = 'ollama' | 'anthropic';

export interface SentinelConfig {
  // State channel
  seriesId: string;
  gridApiKey: string;
  gridSeriesStateUrl: string;
  gridRequestTimeoutMs: number;   // 10_000
  pollIntervalMs: number;         // 5_000
  pollErrorBackoffMs: number;     // 1_000

  // History
  historyWindowSize: number;      // 50; the file keeps at most 50
  historyFilePath: string;

  /** Weapons whose purchase is reported as an upgrade (case-insensitive). */
  premiumWeapons: string[];

  // Visual channel
  visionEnabled: boolean;
  screenId: string;
  killfeedRegion: CaptureRegion;
  roundEndRegion: CaptureRegion;
  downscaleFactor: number;        // 0.5
  captureDelayMs: number;         // 10
  classificationHz: number;       // 2
  eventCooldownMs: number;        // 2_000
  frameWaitMs: number;            // 500

  // Classifier
  classifierBackend: ClassifierBackend;
  ollamaUrl: string;
  ollamaModel: string;
  anthropicApiKey: string;
  anthropicModel: string;
}

/** Thrown for configuration the process cannot start without. */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export const DEFAULT_KILLFEED_REGION: CaptureRegion = { top: 40, left: 1240, width: 640, height: 260 };
export const DEFAULT_ROUND_END_REGION: CaptureRegion = { top: 260, left: 350, width: 1220, height: 340 };
export const DEFAULT_PREMIUM_WEAPONS = ['Vandal', 'Phantom', 'Operator'];

export function parseInt10(raw: string | undefined, fallback: number): number {
  if (!raw) return fallback;
  const n = parseInt(raw, 10);
  return Number.isFinite(n) ? n : fallback;
}

export function parseFloatOr(raw: string | undefined, fallback: number): number {
  if (!raw) return fallback;
  const n = parseFloat(raw);
  return Number.isFinite(n) ? n : fallback;
}

export function parseBool(raw: string | undefined, fallback: boolean): boolean {
  if (raw === undefined || raw.trim() === '') return fallback;
  return raw.trim().toLowerCase() !== 'false' && raw.trim() !== '0';
}

/** Comma-separated list; empty entries dropped. */
export function parseList(raw: string | undefined, fallback: string[]): string[] {
  if (!raw) return [...fallback];
  const items = raw.split(',').map(s => s.trim()).filter(s => s.length > 0);
  return items.length > 0 ? items : [...fallback];
}

function isNonNegativeInt(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value) && value >= 0;
}

/**
 * Parse a region given as JSON (`{"top":40,"left":1240,"width":640,"height":260}`).
 * Falls back to the default on malformed input.
 */
export function parseRegion(raw: string | undefined, fallback: CaptureRegion, name: string): CaptureRegion {
  if (!raw) return { ...fallback };
  try {
    const parsed: unknown = JSON.parse(raw);
    if (isRecord(parsed)) {
      const { top, left, width, height } = parsed;
      if (isNonNegativeInt(top) && isNonNegativeInt(left) && isNonNegativeInt(width) && isNonNegativeInt(height)
        && width > 0 && height > 0) {
        return { top, left, width, height };
      }
    }
  } catch { /* fall through to warning */ }
  logger.warn(`[config] ${name} is not a valid region — using default ${JSON.stringify(fallback)}`);
  return { ...fallback };
}

function parseBackend(raw: string | undefined): ClassifierBackend {
  const value = (raw ?? 'ollama').trim().toLowerCase();
  if (value === 'ollama' || value === 'anthropic') return value;
  throw new ConfigError(`CLASSIFIER_BACKEND must be "ollama" or "anthropic", got "${raw}"`);
}

/**
 * Build the configuration from environment variables.
 * Throws ConfigError when a required value is missing.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): SentinelConfig {
  const seriesId = (env.SERIES_ID ?? '').trim();
  if (!seriesId) {
    throw new ConfigError('SERIES_ID is required. Cannot start polling without a series to watch.');
  }

  const gridApiKey = env.GRID_API_KEY ?? '';
  if (!gridApiKey) {
    throw new ConfigError('GRID_API_KEY is required for the series-state feed.');
  }

  const anthropicApiKey = env.ANTHROPIC_API_KEY ?? '';
  registerSecret(gridApiKey);
  if (anthropicApiKey) registerSecret(anthropicApiKey);

  const visionEnabled = parseBool(env.VISION_ENABLED, true);
  const classifierBackend = parseBackend(env.CLASSIFIER_BACKEND);
  if (visionEnabled && classifierBackend === 'anthropic' && !anthropicApiKey) {
    throw new ConfigError('ANTHROPIC_API_KEY is required when CLASSIFIER_BACKEND=anthropic.');
  }

  const downscaleFactor = parseFloatOr(env.DOWNSCALE_FACTOR, 0.5);
  const classificationHz = parseFloatOr(env.CLASSIFICATION_HZ, 2);

  return {
    seriesId,
    gridApiKey,
    gridSeriesStateUrl: env.GRID_SERIES_STATE_URL ?? 'https://api-op.grid.gg/live-data-feed/series-state/graphql',
    gridRequestTimeoutMs: parseInt10(env.GRID_REQUEST_TIMEOUT_MS, 10_000),
    pollIntervalMs: parseInt10(env.POLL_INTERVAL_MS, 5_000),
    pollErrorBackoffMs: parseInt10(env.POLL_ERROR_BACKOFF_MS, 1_000),

    historyWindowSize: Math.max(1, parseInt10(env.HISTORY_WINDOW_SIZE, 50)),
    historyFilePath: env.HISTORY_FILE ?? './data/history.json',

    premiumWeapons: parseList(env.PREMIUM_WEAPONS, DEFAULT_PREMIUM_WEAPONS),

    visionEnabled,
    screenId: env.SCREEN_ID ?? '',
    killfeedRegion: parseRegion(env.KILLFEED_REGION, DEFAULT_KILLFEED_REGION, 'KILLFEED_REGION'),
    roundEndRegion: parseRegion(env.ROUND_END_REGION, DEFAULT_ROUND_END_REGION, 'ROUND_END_REGION'),
    downscaleFactor: downscaleFactor > 0 && downscaleFactor <= 1 ? downscaleFactor : 0.5,
    captureDelayMs: parseInt10(env.CAPTURE_DELAY_MS, 10),
    classificationHz: classificationHz > 0 ? classificationHz : 2,
    eventCooldownMs: parseInt10(env.EVENT_COOLDOWN_MS, 2_000),
    frameWaitMs: parseInt10(env.FRAME_WAIT_MS, 500),

    classifierBackend,
    ollamaUrl: env.OLLAMA_URL ?? 'http://localhost:11434/api/generate',
    ollamaModel: env.OLLAMA_MODEL ?? 'qwen3-vl:2b',
    anthropicApiKey,
    anthropicModel: env.ANTHROPIC_MODEL ?? 'claude-3-5-haiku-latest',
  };
}
