/**
 * Wires the state channel, the visual channel and the event sink from one
 * configuration object. The adapters (state source, capture, classifier,
 * encoder) are injected so the pipeline runs the same against fakes.
 */

import { logger } from './logger.js';
import { HistoryStore } from './state/history-store.js';
import { StatePoller } from './state/poller.js';
import { TacticalEventDetector } from './state/tactical-events.js';
import { EventDebouncer } from './vision/debounce.js';
import { FrameClassifier } from './vision/frame-classifier.js';
import { FrameProducer } from './vision/frame-producer.js';
import { LatestFrameSlot } from './vision/frame-slot.js';
import { MatchEventSink } from './output/event-sink.js';
import type { SentinelConfig } from './config.js';
import type { SnapshotSource } from './state/poller.js';
import type { CaptureRegionFn } from './vision/frame-producer.js';
import type { FrameEncoder } from './vision/frame-classifier.js';
import type { ImageClassifier } from './vision/classifier.js';
import type { RawFrame } from './types/index.js';

export interface VisionAdapters {
  capture: CaptureRegionFn;
  classifier: ImageClassifier;
  encode: FrameEncoder;
}

export interface SentinelAdapters {
  source: SnapshotSource;
  /** Omit to run the state channel only. */
  vision?: VisionAdapters;
}

export interface Sentinel {
  readonly sink: MatchEventSink;
  readonly poller: StatePoller;
  readonly producer: FrameProducer | null;
  readonly classifier: FrameClassifier | null;
  /** Run every loop until the signal aborts; resolves once all have exited. */
  start(signal: AbortSignal): Promise<void>;
}

export function createSentinel(config: SentinelConfig, adapters: SentinelAdapters): Sentinel {
  const detector = new TacticalEventDetector({ premiumWeapons: config.premiumWeapons });
  const history = new HistoryStore({ filePath: config.historyFilePath, capacity: config.historyWindowSize });
  const sink = new MatchEventSink(detector, history);

  const poller = new StatePoller(adapters.source, detector, history, {
    seriesId: config.seriesId,
    intervalMs: config.pollIntervalMs,
    errorBackoffMs: config.pollErrorBackoffMs,
  });

  let producer: FrameProducer | null = null;
  let classifier: FrameClassifier | null = null;

  if (config.visionEnabled && adapters.vision) {
    const slot = new LatestFrameSlot<RawFrame>();
    producer = new FrameProducer(adapters.vision.capture, slot, {
      primaryRegion: config.roundEndRegion,
      secondaryRegion: config.killfeedRegion,
      downscaleFactor: config.downscaleFactor,
      captureDelayMs: config.captureDelayMs,
    });
    classifier = new FrameClassifier(
      slot,
      adapters.vision.classifier,
      adapters.vision.encode,
      new EventDebouncer(config.eventCooldownMs),
      { frequencyHz: config.classificationHz, frameWaitMs: config.frameWaitMs },
    );
    classifier.on('event', (event) => sink.recordVisual(event));
  } else if (config.visionEnabled) {
    logger.warn('Sentinel: vision enabled but no vision adapters supplied — visual channel disabled');
  }

  async function start(signal: AbortSignal): Promise<void> {
    const loops: Array<Promise<void>> = [poller.run(signal)];
    if (producer) loops.push(producer.run(signal));
    if (classifier) loops.push(classifier.run(signal));

    const results = await Promise.allSettled(loops);
    for (const result of results) {
      if (result.status === 'rejected') {
        logger.error('Sentinel: loop exited with error:', result.reason);
      }
    }
  }

  return { sink, poller, producer, classifier, start };
}
