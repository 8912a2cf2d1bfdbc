/**
 * History offline smoke test.
 *
 * Ring buffer semantics, the rolling snapshot window and its JSON mirror,
 * including restart reads and write failures. Uses a temp directory only.
 * Run: npx tsx test/smoke-history.ts
 */

import { RingBuffer } from '../src/state/ring-buffer.js';
import { HistoryStore, isHistoryEntry, PERSISTED_LIMIT, toHistoryEntry } from '../src/state/history-store.js';
import { player, snapshot } from './fixtures.js';
import { mkdir, mkdtemp, readdir, readFile, writeFile } from 'node:fs/promises';
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

function tickTime(i: number): string {
  return new Date(Date.UTC(2026, 0, 1, 0, 0, i)).toISOString();
}

async function main(): Promise<void> {

// ── Test 1: Ring buffer ─────────────────────────────────────────────────────

console.log('\n── Test 1: Ring buffer ──');

const ring = new RingBuffer<number>(3);
assert(ring.push(1) === undefined && ring.push(2) === undefined && ring.push(3) === undefined, 'No eviction until full');
assert(ring.push(4) === 1, 'Oldest item evicted when full');
assert(same(ring.toArray(), [2, 3, 4]), 'Oldest-first order after wrap');
assert(same(ring.latest(2), [3, 4]), 'latest(2) is the two newest, oldest-first');
assert(ring.latest(0).length === 0, 'latest(0) is empty');
assert(ring.newest() === 4 && ring.size === 3, 'newest() and size');
ring.clear();
assert(ring.size === 0 && ring.newest() === null, 'clear() empties the buffer');

let rangeError = false;
try {
  new RingBuffer<number>(0);
} catch (err) {
  rangeError = err instanceof RangeError;
}
assert(rangeError, 'Zero capacity rejected');

// ── Test 2: Disk projection ─────────────────────────────────────────────────

console.log('\n── Test 2: Disk projection ──');

const projected = toHistoryEntry(snapshot([
  player('A', { hpBucket: 'damaged', weapon: 'Vandal' }),
  player('B', { alive: false, hpBucket: 'critical', weapon: null }),
]));
assert(same(projected, {
  series_id: 's1',
  game_id: 'g1',
  timestamp: '2026-01-01T00:00:00.000Z',
  players: {
    A: { alive: true, hp_bucket: 'damaged', weapon: 'Vandal' },
    B: { alive: false, hp_bucket: 'critical', weapon: null },
  },
}), 'Entry keeps alive, hp bucket and weapon per player');
assert(isHistoryEntry(projected), 'Projection passes the entry guard');
assert(!isHistoryEntry({ series_id: 's1', game_id: 'g1', timestamp: 't', players: { A: { alive: 'yes' } } }),
  'Malformed player entry rejected');

// ── Test 3: Rolling window and file cap ─────────────────────────────────────

console.log('\n── Test 3: Rolling window ──');

const tmp = await mkdtemp(path.join(os.tmpdir(), 'sentinel-history-'));
const filePath = path.join(tmp, 'nested', 'history.json');
const store = new HistoryStore({ filePath });

assert(await store.readPersisted().then(e => e.length === 0), 'Missing file reads as empty');
assert(store.latest() === null, 'No latest snapshot before the first append');

for (let i = 0; i < 55; i++) {
  await store.append(snapshot([player('A'), player('B')], 'g1', tickTime(i)));
}
assert(store.size === 50 && store.capacity === 50, 'Window holds the last 50 snapshots');
assert(store.latest()?.timestamp === tickTime(54), 'latest() is the last appended');

const recent = store.recent();
assert(recent.length === 10 && recent[0].timestamp === tickTime(45) && recent[9].timestamp === tickTime(54),
  'recent() defaults to 10, oldest-first');
assert(same(store.recent(2).map(s => s.timestamp), [tickTime(53), tickTime(54)]), 'recent(2) is the two newest');

const persisted = await store.readPersisted();
assert(persisted.length === 50, 'File capped at 50 entries');
assert(persisted[0]?.timestamp === tickTime(5) && persisted[49]?.timestamp === tickTime(54), 'File keeps the newest 50, oldest-first');

await store.append(snapshot([]));
assert(store.size === 50 && store.latest()?.timestamp === tickTime(54), 'Snapshot with no players is ignored');

const rawFile: unknown = JSON.parse(await readFile(filePath, 'utf-8'));
assert(Array.isArray(rawFile) && rawFile.length === 50, 'File is a JSON array');

// ── Test 4: Restart ─────────────────────────────────────────────────────────

console.log('\n── Test 4: Restart ──');

const restarted = new HistoryStore({ filePath });
assert(restarted.size === 0, 'New process starts with an empty window');
const survived = await restarted.readPersisted();
assert(survived.length === 50 && survived[49]?.timestamp === tickTime(54), 'Entries from the previous process are readable');

const small = new HistoryStore({ filePath: path.join(tmp, 'small.json'), capacity: 2 });
for (let i = 0; i < 4; i++) {
  await small.append(snapshot([player('A')], 'g1', tickTime(i)));
}
assert(same((await small.readPersisted()).map(e => e.timestamp), [tickTime(2), tickTime(3)]), 'Small window caps the file below 50');

const large = new HistoryStore({ filePath: path.join(tmp, 'large.json'), capacity: 60 });
for (let i = 0; i < 55; i++) {
  await large.append(snapshot([player('A')], 'g1', tickTime(i)));
}
const largeFile = await large.readPersisted();
assert(PERSISTED_LIMIT === 50 && large.size === 55, 'Window of 60 holds all 55 snapshots');
assert(largeFile.length === 50 && largeFile[0]?.timestamp === tickTime(5) && largeFile[49]?.timestamp === tickTime(54),
  'File stays at the newest 50 even with a larger window');

// ── Test 5: Corrupt files ───────────────────────────────────────────────────

console.log('\n── Test 5: Corrupt files ──');

const objectPath = path.join(tmp, 'object.json');
await writeFile(objectPath, '{"not":"an array"}', 'utf-8');
assert((await new HistoryStore({ filePath: objectPath }).readPersisted()).length === 0, 'Non-array file reads as empty');

const mixedPath = path.join(tmp, 'mixed.json');
await writeFile(mixedPath, JSON.stringify([projected, { bad: 1 }]), 'utf-8');
const mixed = await new HistoryStore({ filePath: mixedPath }).readPersisted();
assert(mixed.length === 1 && mixed[0]?.game_id === 'g1', 'Malformed entries are dropped');

const garbagePath = path.join(tmp, 'garbage.json');
await writeFile(garbagePath, 'not json', 'utf-8');
assert((await new HistoryStore({ filePath: garbagePath }).readPersisted()).length === 0, 'Unparseable file reads as empty');

// ── Test 6: Write failure ───────────────────────────────────────────────────

console.log('\n── Test 6: Write failure ──');

const blocker = path.join(tmp, 'blocker');
await writeFile(blocker, 'a file, not a directory', 'utf-8');
const unwritable = new HistoryStore({ filePath: path.join(blocker, 'history.json') });

let appendThrew = false;
try {
  await unwritable.append(snapshot([player('A')]));
} catch {
  appendThrew = true;
}
assert(!appendThrew, 'Write failure does not propagate');
assert(unwritable.size === 1, 'Window updated despite the failed write');

// Target path is a non-empty directory: the temp write succeeds, the rename fails.
const renameDir = path.join(tmp, 'rename-fails');
const occupied = path.join(renameDir, 'history.json');
await mkdir(path.join(occupied, 'keep'), { recursive: true });
const renameBlocked = new HistoryStore({ filePath: occupied });
for (let i = 0; i < 5; i++) {
  await renameBlocked.append(snapshot([player('A')], 'g1', tickTime(i)));
}
const leftovers = (await readdir(renameDir)).filter(name => name.endsWith('.tmp'));
assert(renameBlocked.size === 5, 'Window keeps growing while renames fail');
assert(leftovers.length === 0, 'Failed writes leave no temp files behind');
assert(same(await readdir(renameDir), ['history.json']), 'Only the blocked target remains in the directory');

// ── Results ─────────────────────────────────────────────────────────────────

console.log(`\n── Results: ${passed} passed, ${failed} failed ──\n`);
process.exit(failed > 0 ? 1 : 0);
}

main().catch((err) => {
  console.error('Async test failure:', err);
  process.exit(1);
});
