import { clampChannel } from '../../../shared/media/numberUtils.js';
import { RGB_CHANNELS, RGBA_CHANNELS, toRasterImage } from '../value-objects/frame.js';
import type { Frame, RasterImage } from '../value-objects/frame.js';
import type { PostPassMode } from '../value-objects/geometry.js';

const WHITE = 255;

export function applyPostPass(canvas: Frame, mode: PostPassMode): RasterImage {
  switch (mode) {
    case 'none': {
      return toRasterImage(canvas);
    }
    case 'white-background': {
      return compositeOnWhite(canvas);
    }
    case 'drop-alpha': {
      return dropAlpha(canvas);
    }
    default: {
      const exhaustive: never = mode;
      throw new Error(`Unsupported post-pass mode ${String(exhaustive)}`);
    }
  }
}

/**
 * "Over" blend onto opaque white, weighted by each pixel's own alpha.
 */
export function compositeOnWhite(canvas: Frame): RasterImage {
  const pixelCount = canvas.width * canvas.height;
  const data = new Uint8ClampedArray(pixelCount * RGB_CHANNELS);

  for (let pixel = 0; pixel < pixelCount; pixel += 1) {
    const source = pixel * RGBA_CHANNELS;
    const target = pixel * RGB_CHANNELS;
    const alpha = (canvas.data[source + 3] ?? 0) / 255;

    for (let channel = 0; channel < RGB_CHANNELS; channel += 1) {
      const value = canvas.data[source + channel] ?? 0;
      data[target + channel] = clampChannel(value * alpha + WHITE * (1 - alpha));
    }
  }

  return { width: canvas.width, height: canvas.height, layout: 'rgb', data };
}

/**
 * Discards alpha without blending. Pixels the interlacer never painted keep the transparent
 * initializer's RGB, so they come out black rather than white.
 */
export function dropAlpha(canvas: Frame): RasterImage {
  const pixelCount = canvas.width * canvas.height;
  const data = new Uint8ClampedArray(pixelCount * RGB_CHANNELS);

  for (let pixel = 0; pixel < pixelCount; pixel += 1) {
    const source = pixel * RGBA_CHANNELS;
    data.set(canvas.data.subarray(source, source + RGB_CHANNELS), pixel * RGB_CHANNELS);
  }

  return { width: canvas.width, height: canvas.height, layout: 'rgb', data };
}
