/**
 * Production adapters for the visual channel: screen-region capture and
 * JPEG encoding.
 */

import screenshot from 'screenshot-desktop';
import sharp from 'sharp';
import type { CaptureRegionFn } from './frame-producer.js';
import type { CaptureRegion, RawFrame } from '../types/index.js';

const JPEG_QUALITY = 80;

/** Decode any image sharp understands into packed RGB, optionally cropped. */
export async function decodeToRawFrame(image: Buffer, region?: CaptureRegion): Promise<RawFrame> {
  let pipeline = sharp(image);
  if (region) {
    pipeline = pipeline.extract({ left: region.left, top: region.top, width: region.width, height: region.height });
  }
  const { data, info } = await pipeline.removeAlpha().raw().toBuffer({ resolveWithObject: true });
  return { width: info.width, height: info.height, channels: 3, data: new Uint8Array(data) };
}

/**
 * Capture function backed by a full-screen grab, cropped to the region.
 * `screenId` selects a display when several are attached.
 */
export function createScreenCapture(screenId = ''): CaptureRegionFn {
  return async (region: CaptureRegion): Promise<RawFrame> => {
    const png = await screenshot(screenId ? { format: 'png', screen: screenId } : { format: 'png' });
    return decodeToRawFrame(png, region);
  };
}

export async function encodeJpeg(frame: RawFrame): Promise<Buffer> {
  return sharp(frame.data, { raw: { width: frame.width, height: frame.height, channels: frame.channels } })
    .jpeg({ quality: JPEG_QUALITY })
    .toBuffer();
}
