/**
 * Raw RGB frame operations used to build the classifier input:
 * nearest-neighbour resize, area-averaging resize and vertical stacking.
 */

import type { CaptureRegion, RawFrame } from '../types/index.js';

export function createFrame(width: number, height: number): RawFrame {
  return { width, height, channels: 3, data: new Uint8Array(width * height * 3) };
}

function assertSize(width: number, height: number): void {
  if (!Number.isInteger(width) || !Number.isInteger(height) || width < 1 || height < 1) {
    throw new RangeError(`Invalid frame size ${width}x${height}`);
  }
}

/** Fast resize; each destination pixel copies its nearest source pixel. */
export function resizeNearest(src: RawFrame, width: number, height: number): RawFrame {
  assertSize(width, height);
  if (src.width === width && src.height === height) return src;

  const out = createFrame(width, height);
  const xMap = new Int32Array(width);
  for (let x = 0; x < width; x++) {
    xMap[x] = Math.min(src.width - 1, Math.floor((x * src.width) / width));
  }

  for (let y = 0; y < height; y++) {
    const sy = Math.min(src.height - 1, Math.floor((y * src.height) / height));
    const srcRow = sy * src.width * 3;
    const dstRow = y * width * 3;
    for (let x = 0; x < width; x++) {
      const s = srcRow + xMap[x] * 3;
      const d = dstRow + x * 3;
      out.data[d] = src.data[s];
      out.data[d + 1] = src.data[s + 1];
      out.data[d + 2] = src.data[s + 2];
    }
  }
  return out;
}

interface AxisWeights {
  start: number;
  weights: number[];
}

/** Source coverage of each destination cell along one axis. */
function areaWeights(srcLen: number, dstLen: number): AxisWeights[] {
  const scale = srcLen / dstLen;
  const axis: AxisWeights[] = [];
  for (let d = 0; d < dstLen; d++) {
    const from = d * scale;
    const to = Math.min(srcLen, (d + 1) * scale);
    const start = Math.floor(from);
    const end = Math.min(srcLen, Math.ceil(to));
    const weights: number[] = [];
    for (let s = start; s < end; s++) {
      weights.push((Math.min(to, s + 1) - Math.max(from, s)) / (to - from));
    }
    axis.push({ start, weights });
  }
  return axis;
}

/**
 * Area-averaging resize: every destination pixel is the coverage-weighted
 * mean of the source pixels under it. Keeps thin text legible when shrinking.
 */
export function resizeArea(src: RawFrame, width: number, height: number): RawFrame {
  assertSize(width, height);
  if (src.width === width && src.height === height) return src;

  const out = createFrame(width, height);
  const xs = areaWeights(src.width, width);
  const ys = areaWeights(src.height, height);

  for (let y = 0; y < height; y++) {
    const { start: y0, weights: wy } = ys[y];
    for (let x = 0; x < width; x++) {
      const { start: x0, weights: wx } = xs[x];
      let r = 0;
      let g = 0;
      let b = 0;
      for (let j = 0; j < wy.length; j++) {
        const row = (y0 + j) * src.width;
        for (let i = 0; i < wx.length; i++) {
          const w = wy[j] * wx[i];
          const s = (row + x0 + i) * 3;
          r += src.data[s] * w;
          g += src.data[s + 1] * w;
          b += src.data[s + 2] * w;
        }
      }
      const d = (y * width + x) * 3;
      out.data[d] = Math.round(r);
      out.data[d + 1] = Math.round(g);
      out.data[d + 2] = Math.round(b);
    }
  }
  return out;
}

/** Place `top` above `bottom`. Both must share a width. */
export function stackVertical(top: RawFrame, bottom: RawFrame): RawFrame {
  if (top.width !== bottom.width) {
    throw new RangeError(`Cannot stack frames of width ${top.width} and ${bottom.width}`);
  }
  const out = createFrame(top.width, top.height + bottom.height);
  out.data.set(top.data, 0);
  out.data.set(bottom.data, top.data.length);
  return out;
}

export interface CompositeGeometry {
  /** Width both regions share before downscaling (the primary region's width). */
  stackWidth: number;
  /** Height of the secondary region once resized to `stackWidth`. */
  secondaryHeight: number;
  finalWidth: number;
  finalHeight: number;
}

/**
 * Pre-compute the composite layout: the secondary region is scaled to the
 * primary's width and stacked under it, then the whole is scaled by `scale`.
 */
export function planComposite(primary: CaptureRegion, secondary: CaptureRegion, scale: number): CompositeGeometry {
  const stackWidth = primary.width;
  const secondaryHeight = Math.trunc(secondary.height * (stackWidth / secondary.width));
  return {
    stackWidth,
    secondaryHeight,
    finalWidth: Math.max(1, Math.trunc(stackWidth * scale)),
    finalHeight: Math.max(1, Math.trunc((primary.height + secondaryHeight) * scale)),
  };
}
