/**
 * Classification loop: on a fixed cadence, take the latest composite frame,
 * classify it once and surface the debounced result.
 *
 * A slow or failing classification only delays this loop; capture keeps
 * running and simply overwrites the slot in the meantime.
 */

import { EventEmitter } from 'events';
import { logger } from '../logger.js';
import { pause } from '../util/pause.js';
import { parseClassifierResponse } from './classifier.js';
import type { ImageClassifier } from './classifier.js';
import type { EventDebouncer } from './debounce.js';
import type { LatestFrameSlot } from './frame-slot.js';
import type { ClassifierOutcome, RawFrame, VisualEvent } from '../types/index.js';

export type FrameEncoder = (frame: RawFrame) => Promise<Buffer>;

export interface FrameClassifierOptions {
  frequencyHz?: number;  // 2
  /** How long one tick waits for a frame before giving up. */
  frameWaitMs?: number;  // 500
}

export interface FrameClassifierEvents {
  event: [event: VisualEvent];
}

export class FrameClassifier extends EventEmitter<FrameClassifierEvents> {
  private readonly periodMs: number;
  private readonly frameWaitMs: number;

  constructor(
    private readonly slot: LatestFrameSlot<RawFrame>,
    private readonly classifier: ImageClassifier,
    private readonly encode: FrameEncoder,
    private readonly debouncer: EventDebouncer,
    options: FrameClassifierOptions = {},
  ) {
    super();
    this.periodMs = 1000 / (options.frequencyHz ?? 2);
    this.frameWaitMs = options.frameWaitMs ?? 500;
  }

  /** Encode and classify one frame. Never throws: failures become ERROR outcomes. */
  async classifyFrame(frame: RawFrame): Promise<ClassifierOutcome> {
    try {
      const jpeg = await this.encode(frame);
      const raw = await this.classifier.classify(jpeg);
      return { label: parseClassifierResponse(raw) };
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      return { label: 'ERROR', message };
    }
  }

  /**
   * One tick: wait briefly for a frame, classify, debounce.
   * Returns the surfaced event, or null when there was no frame or the
   * label is still cooling down.
   */
  async tick(signal?: AbortSignal): Promise<VisualEvent | null> {
    const frame = await this.slot.waitForFrame(this.frameWaitMs, signal);
    if (!frame) return null;

    const outcome = await this.classifyFrame(frame);
    if (!this.debouncer.shouldSurface(outcome)) {
      logger.debug(`FrameClassifier: ${outcome.label} suppressed (cooldown)`);
      return null;
    }

    const event: VisualEvent = { ...outcome, timestamp: new Date().toISOString() };
    if (event.label === 'ERROR') {
      logger.warn(`FrameClassifier: ERROR: ${event.message}`);
    } else if (event.label === 'NO_EVENT') {
      logger.debug('FrameClassifier: NO_EVENT');
    } else {
      logger.info(`FrameClassifier: DETECTED ${event.label}`);
    }
    this.emit('event', event);
    return event;
  }

  /**
   * Classify whatever frame is buffered right now, without waiting and
   * without debouncing. NO_EVENT when the slot is empty.
   */
  async classifyNow(): Promise<ClassifierOutcome> {
    const frame = this.slot.take();
    if (!frame) return { label: 'NO_EVENT' };
    return this.classifyFrame(frame);
  }

  async run(signal: AbortSignal): Promise<void> {
    logger.info(`FrameClassifier: classifying at ${(1000 / this.periodMs).toFixed(1)} Hz`);

    while (!signal.aborted) {
      const startedAt = Date.now();
      try {
        await this.tick(signal);
      } catch (err) {
        logger.error('FrameClassifier: unexpected error in tick:', err);
      }
      await pause(this.periodMs - (Date.now() - startedAt), signal);
    }

    logger.info('FrameClassifier: stopped');
  }
}
