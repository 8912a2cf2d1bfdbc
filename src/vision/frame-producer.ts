/**
 * Capture loop: grabs the round-end and killfeed regions, builds one
 * downscaled composite and publishes it to the latest-frame slot.
 * Runs independently of classification pace.
 */

import { logger } from '../logger.js';
import { pause } from '../util/pause.js';
import { planComposite, resizeArea, resizeNearest, stackVertical } from './frame.js';
import type { CompositeGeometry } from './frame.js';
import type { LatestFrameSlot } from './frame-slot.js';
import type { CaptureRegion, RawFrame } from '../types/index.js';

/** Boundary to the OS screen grabber. */
export type CaptureRegionFn = (region: CaptureRegion) => Promise<RawFrame>;

export interface FrameProducerOptions {
  /** Stacked on top; its width is the composite width. */
  primaryRegion: CaptureRegion;
  /** Resized to the primary width and stacked below. */
  secondaryRegion: CaptureRegion;
  downscaleFactor?: number;  // 0.5
  captureDelayMs?: number;   // 10
  errorBackoffMs?: number;   // 1000
}

export class FrameProducer {
  readonly geometry: CompositeGeometry;
  private readonly primaryRegion: CaptureRegion;
  private readonly secondaryRegion: CaptureRegion;
  private readonly captureDelayMs: number;
  private readonly errorBackoffMs: number;
  private _framesProduced = 0;

  constructor(
    private readonly capture: CaptureRegionFn,
    private readonly slot: LatestFrameSlot<RawFrame>,
    options: FrameProducerOptions,
  ) {
    this.primaryRegion = options.primaryRegion;
    this.secondaryRegion = options.secondaryRegion;
    this.captureDelayMs = options.captureDelayMs ?? 10;
    this.errorBackoffMs = options.errorBackoffMs ?? 1_000;
    this.geometry = planComposite(this.primaryRegion, this.secondaryRegion, options.downscaleFactor ?? 0.5);
  }

  get framesProduced(): number { return this._framesProduced; }

  /** Capture both regions and build the final composite. */
  async captureComposite(): Promise<RawFrame> {
    const [primaryRaw, secondaryRaw] = await Promise.all([
      this.capture(this.primaryRegion),
      this.capture(this.secondaryRegion),
    ]);
    const { stackWidth, secondaryHeight, finalWidth, finalHeight } = this.geometry;

    const primary = resizeNearest(primaryRaw, stackWidth, this.primaryRegion.height);
    const secondary = resizeNearest(secondaryRaw, stackWidth, secondaryHeight);
    return resizeArea(stackVertical(primary, secondary), finalWidth, finalHeight);
  }

  /** One capture cycle. Errors propagate to the caller. */
  async cycle(): Promise<void> {
    const frame = await this.captureComposite();
    this.slot.put(frame);
    this._framesProduced++;
  }

  async run(signal: AbortSignal): Promise<void> {
    const { finalWidth, finalHeight } = this.geometry;
    logger.info(`FrameProducer: capturing composite frames at ${finalWidth}x${finalHeight}`);

    while (!signal.aborted) {
      try {
        await this.cycle();
        await pause(this.captureDelayMs, signal);
      } catch (err) {
        logger.warn('FrameProducer: capture cycle failed:', err);
        await pause(this.errorBackoffMs, signal);
      }
    }

    logger.info(`FrameProducer: stopped after ${this._framesProduced} frames`);
  }
}
