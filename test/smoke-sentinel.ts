/**
 * Configuration, redaction, event sink and full wiring smoke test.
 *
 * The end-to-end run drives both channels with in-process fakes for the
 * state feed, screen capture and classifier.
 * Run: npx tsx test/smoke-sentinel.ts
 */

import { ConfigError, DEFAULT_KILLFEED_REGION, DEFAULT_PREMIUM_WEAPONS, loadConfig } from '../src/config.js';
import { registerSecret, sanitize } from '../src/logger.js';
import { MatchEventSink } from '../src/output/event-sink.js';
import { HistoryStore } from '../src/state/history-store.js';
import { TacticalEventDetector } from '../src/state/tactical-events.js';
import { createSentinel } from '../src/sentinel.js';
import { player, regionFrame, scriptedSource, snapshot } from './fixtures.js';
import type { SentinelConfig } from '../src/config.js';
import type { ImageClassifier } from '../src/vision/classifier.js';
import type { CaptureRegion, RawFrame, TacticalEvent } from '../src/types/index.js';
import { mkdtemp } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';

// ── Helpers ─────────────────────────────────────────────────────────────────

let passed = 0;
let failed = 0;

function assert(condition: boolean, label: string): void {
  if (condition) {
    console.log(`  ✓ ${label}`);
    passed++;
  } else {
    console.error(`  ✗ ${label}`);
    failed++;
  }
}

function same(a: unknown, b: unknown): boolean {
  return JSON.stringify(a) === JSON.stringify(b);
}

function configError(env: NodeJS.ProcessEnv): string | null {
  try {
    loadConfig(env);
    return null;
  } catch (err) {
    return err instanceof ConfigError ? err.message : `unexpected: ${String(err)}`;
  }
}

const BASE_ENV: NodeJS.ProcessEnv = { SERIES_ID: 's1', GRID_API_KEY: 'test-secret-grid' };

async function main(): Promise<void> {

// ── Test 1: Required configuration ──────────────────────────────────────────

console.log('\n── Test 1: Required configuration ──');

assert(configError({}) === 'SERIES_ID is required. Cannot start polling without a series to watch.', 'Missing SERIES_ID rejected');
assert(configError({ SERIES_ID: '  ' }) !== null, 'Blank SERIES_ID rejected');
assert(configError({ SERIES_ID: 's1' }) === 'GRID_API_KEY is required for the series-state feed.', 'Missing GRID_API_KEY rejected');
assert(configError({ ...BASE_ENV, CLASSIFIER_BACKEND: 'remote' }) === 'CLASSIFIER_BACKEND must be "ollama" or "anthropic", got "remote"',
  'Unknown backend rejected');
assert(configError({ ...BASE_ENV, CLASSIFIER_BACKEND: 'anthropic' }) === 'ANTHROPIC_API_KEY is required when CLASSIFIER_BACKEND=anthropic.',
  'Anthropic backend needs a key');
assert(configError({ ...BASE_ENV, CLASSIFIER_BACKEND: 'anthropic', VISION_ENABLED: 'false' }) === null,
  'Key not needed with vision off');

// ── Test 2: Defaults and overrides ──────────────────────────────────────────

console.log('\n── Test 2: Defaults and overrides ──');

const defaults = loadConfig(BASE_ENV);
assert(defaults.pollIntervalMs === 5000 && defaults.pollErrorBackoffMs === 1000, 'Poll every 5s, 1s error backoff');
assert(defaults.historyWindowSize === 50 && defaults.historyFilePath === './data/history.json', 'History window 50 at ./data/history.json');
assert(same(defaults.premiumWeapons, DEFAULT_PREMIUM_WEAPONS), 'Default premium weapons');
assert(defaults.visionEnabled && defaults.classifierBackend === 'ollama', 'Vision on with the Ollama backend');
assert(defaults.downscaleFactor === 0.5 && defaults.classificationHz === 2 && defaults.eventCooldownMs === 2000,
  'Downscale 0.5, 2 Hz, 2s cooldown');
assert(same(defaults.killfeedRegion, DEFAULT_KILLFEED_REGION) && defaults.killfeedRegion !== DEFAULT_KILLFEED_REGION,
  'Default region copied');

const tuned = loadConfig({
  ...BASE_ENV,
  POLL_INTERVAL_MS: '2000',
  HISTORY_WINDOW_SIZE: '0',
  PREMIUM_WEAPONS: 'Vandal, Marshal,',
  DOWNSCALE_FACTOR: '2',
  CLASSIFICATION_HZ: '-1',
  KILLFEED_REGION: '{"top":1,"left":2,"width":3,"height":4}',
  ROUND_END_REGION: 'not json',
  VISION_ENABLED: '0',
});
assert(tuned.pollIntervalMs === 2000, 'Poll interval override');
assert(tuned.historyWindowSize === 1, 'Window size floored at 1');
assert(same(tuned.premiumWeapons, ['Vandal', 'Marshal']), 'Premium list trimmed, blanks dropped');
assert(tuned.downscaleFactor === 0.5 && tuned.classificationHz === 2, 'Out-of-range factors fall back');
assert(same(tuned.killfeedRegion, { top: 1, left: 2, width: 3, height: 4 }), 'Region parsed from JSON');
assert(same(tuned.roundEndRegion, { top: 260, left: 350, width: 1220, height: 340 }), 'Malformed region falls back');
assert(!tuned.visionEnabled, 'VISION_ENABLED=0 disables vision');

// ── Test 3: Log redaction ───────────────────────────────────────────────────

console.log('\n── Test 3: Log redaction ──');

assert(sanitize('grid key is test-secret-grid') === 'grid key is [REDACTED]', 'Registered key redacted');
assert(sanitize('{"x-api-key":"abc123"}') === '{"x-api-key":"[REDACTED]"}', 'x-api-key JSON value redacted');
assert(sanitize('x-api-key: abc123') === 'x-api-key: [REDACTED]', 'x-api-key header redacted');
registerSecret('short');
assert(sanitize('short') === 'short', 'Secrets under 8 characters are not registered');

// ── Test 4: Event sink summaries ────────────────────────────────────────────

console.log('\n── Test 4: Event sink ──');

const tmp = await mkdtemp(path.join(os.tmpdir(), 'sentinel-sink-'));
const detector = new TacticalEventDetector({ premiumWeapons: DEFAULT_PREMIUM_WEAPONS });
const history = new HistoryStore({ filePath: path.join(tmp, 'sink.json') });
const sink = new MatchEventSink(detector, history);

assert(sink.describeSnapshot() === 'No live state data available.', 'Snapshot summary before data');
assert(sink.describeRound() === 'No live state data available for round status.', 'Round summary before data');

await history.append(snapshot([
  player('A', { alive: false }),
  player('B', { weapon: 'Vandal', position: { x: 1, y: 2, region_rc: 'R2C3', x_band: 'B3', y_band: 'B2', quadrant: 'SW' } }),
  player('C'),
], 'g7'));
assert(sink.describeSnapshot() === 'Snapshot (Game: g7): 2/3 players alive. Example: B is at R2C3 with Vandal.',
  'Snapshot summary names the first living player');
assert(sink.describeRound() === 'Round Status: 2 players alive. Game ID: g7.', 'Round summary counts the living');

await history.append(snapshot([player('A', { weapon: null }), player('B', { alive: false })], 'g8'));
assert(sink.describeSnapshot() === 'Snapshot (Game: g8): 1/2 players alive. Example: A is at Unknown with no weapon.',
  'Unarmed player described');
assert(sink.getSnapshotHistory().length === 2 && (await sink.getPersistedHistory()).length === 2, 'History exposed in memory and on disk');

const tacticals: TacticalEvent[] = [];
const conclusions: string[] = [];
sink.on('tactical', (e) => tacticals.push(e));
sink.on('conclusion', (c) => conclusions.push(c));
const firstDeath = snapshot([player('A'), player('B', { alive: false })]);
detector.processChange({ kind: 'PLAYER_DIED', player: player('B', { alive: false }) }, firstDeath);
assert(tacticals.length === 1 && sink.getLatestEvents().length === 1, 'Tactical events forwarded');
assert(same(conclusions, ['Entry engagement lost by Team Red at Unknown.']) && same(sink.getTacticalConclusions(), conclusions),
  'Conclusions forwarded');
assert(sink.drainEvents().length === 1 && sink.getLatestEvents().length === 0, 'drainEvents empties the log');

for (let i = 0; i < 7; i++) {
  sink.recordVisual({ label: i % 2 === 0 ? 'KILL' : 'NO_EVENT', timestamp: `t${i}` });
}
assert(same(sink.getRecentVisualEvents().map(e => e.timestamp), ['t2', 't3', 't4', 't5', 't6']), 'Last 5 visual events, oldest-first');

// ── Test 5: Wiring ──────────────────────────────────────────────────────────

console.log('\n── Test 5: Wiring ──');

const stateOnly = createSentinel(loadConfig({ ...BASE_ENV, VISION_ENABLED: 'false', HISTORY_FILE: path.join(tmp, 'a.json') }), {
  source: scriptedSource([]),
});
assert(stateOnly.producer === null && stateOnly.classifier === null, 'Vision disabled → state channel only');

const noAdapters = createSentinel(loadConfig({ ...BASE_ENV, HISTORY_FILE: path.join(tmp, 'b.json') }), {
  source: scriptedSource([]),
});
assert(noAdapters.producer === null && noAdapters.classifier === null, 'Vision without adapters → state channel only');

// ── Test 6: Both channels end to end ────────────────────────────────────────

console.log('\n── Test 6: End to end ──');

const config: SentinelConfig = loadConfig({
  ...BASE_ENV,
  HISTORY_FILE: path.join(tmp, 'e2e.json'),
  POLL_INTERVAL_MS: '5',
  CAPTURE_DELAY_MS: '1',
  CLASSIFICATION_HZ: '100',
  FRAME_WAIT_MS: '50',
  KILLFEED_REGION: '{"top":0,"left":0,"width":4,"height":2}',
  ROUND_END_REGION: '{"top":10,"left":0,"width":4,"height":2}',
});

const captured: CaptureRegion[] = [];
const capture = async (region: CaptureRegion): Promise<RawFrame> => {
  captured.push(region);
  return regionFrame(region, 128);
};
const classifier: ImageClassifier = { classify: async () => 'ROUND_END' };
const encode = async (_frame: RawFrame): Promise<Buffer> => Buffer.from('jpeg');

const bothAlive = snapshot([player('A'), player('B')]);
const sentinel = createSentinel(config, {
  source: scriptedSource([bothAlive, firstDeath]),
  vision: { capture, classifier, encode },
});

const controller = new AbortController();
let sawTactical = false;
let sawVisual = false;
const stopWhenBoth = (): void => {
  if (sawTactical && sawVisual) controller.abort();
};
sentinel.sink.on('tactical', () => { sawTactical = true; stopWhenBoth(); });
sentinel.sink.on('visual', (e) => {
  if (e.label === 'ROUND_END') sawVisual = true;
  stopWhenBoth();
});

const safety = setTimeout(() => controller.abort(), 5000);
await sentinel.start(controller.signal);
clearTimeout(safety);

assert(sawTactical && sawVisual, 'Both channels reported before shutdown');
assert(sentinel.sink.getLatestEvents()[0]?.eventType === 'FIRST_DEATH', 'FIRST_DEATH reached the sink');
assert(sentinel.sink.getRecentVisualEvents().some(e => e.label === 'ROUND_END'), 'ROUND_END reached the sink');
assert(captured.some(r => r.top === 10) && captured.some(r => r.top === 0), 'Both screen regions captured');
assert((sentinel.producer?.framesProduced ?? 0) >= 1, 'Composite frames produced');
assert((await sentinel.sink.getPersistedHistory()).length === 2, 'Both accepted snapshots persisted');

// ── Results ─────────────────────────────────────────────────────────────────

console.log(`\n── Results: ${passed} passed, ${failed} failed ──\n`);
process.exit(failed > 0 ? 1 : 0);
}

main().catch((err) => {
  console.error('Async test failure:', err);
  process.exit(1);
});
