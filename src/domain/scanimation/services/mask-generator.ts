import { RGBA_CHANNELS } from '../value-objects/frame.js';
import type { Frame } from '../value-objects/frame.js';
import { createGeometry, slicePeriod } from '../value-objects/geometry.js';
import type { ScanimationGeometry } from '../value-objects/geometry.js';

export interface Slit {
  readonly start: number;
  readonly end: number;
}

/**
 * Slit offsets along the stripe axis: `sliceSize` wide, one per period of `sliceSize * frameCount`,
 * starting at 0. Unlike the interlacer, the slice is not clamped to the extent.
 */
export function resolveSlits(extent: number, sliceSize: number, frameCount: number): Slit[] {
  const slice = Math.max(1, sliceSize);
  const period = slicePeriod(slice, frameCount);
  const slits: Slit[] = [];

  for (let start = 0; start < extent; start += period) {
    slits.push({ start, end: Math.min(start + slice, extent) });
  }

  return slits;
}

/**
 * Opaque black grille with transparent slits. Needs the same geometry the base was interlaced with,
 * never its pixels.
 */
export function generateMask(geometry: ScanimationGeometry): Frame {
  const { width, height, sliceSize, frameCount, direction } = createGeometry(geometry);
  const data = new Uint8ClampedArray(width * height * RGBA_CHANNELS);

  for (let index = 3; index < data.length; index += RGBA_CHANNELS) {
    data[index] = 255;
  }

  const rowStride = width * RGBA_CHANNELS;

  if (direction === 'vertical') {
    for (const slit of resolveSlits(width, sliceSize, frameCount)) {
      for (let y = 0; y < height; y += 1) {
        const rowOffset = y * rowStride;
        data.fill(0, rowOffset + slit.start * RGBA_CHANNELS, rowOffset + slit.end * RGBA_CHANNELS);
      }
    }
  } else {
    for (const slit of resolveSlits(height, sliceSize, frameCount)) {
      data.fill(0, slit.start * rowStride, slit.end * rowStride);
    }
  }

  return { width, height, data };
}
