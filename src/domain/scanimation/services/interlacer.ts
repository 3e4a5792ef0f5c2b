import { AppError } from '../../../shared/errors/app-error.js';
import { clamp } from '../../../shared/media/numberUtils.js';
import { createTransparentFrame, RGBA_CHANNELS } from '../value-objects/frame.js';
import type { Frame, FrameSet } from '../value-objects/frame.js';
import { createGeometry, stripeAxisExtent } from '../value-objects/geometry.js';
import type { ScanimationGeometry } from '../value-objects/geometry.js';

export interface Stripe {
  /** Inclusive start offset along the stripe axis. */
  readonly start: number;
  /** Exclusive end offset, never past the axis extent. */
  readonly end: number;
  readonly frameIndex: number;
}

/**
 * Splits `[0, extent)` into stripes of `sliceSize` pixels (clamped to `[1, extent]`), the last one
 * truncated to `extent mod sliceSize` when the extent is not a multiple. Stripe `k` reads from frame
 * `k mod frameCount`.
 */
export function resolveStripes(extent: number, sliceSize: number, frameCount: number): Stripe[] {
  const slice = clamp(sliceSize, 1, extent);
  const stripes: Stripe[] = [];

  for (let start = 0; start < extent; start += slice) {
    stripes.push({
      start,
      end: Math.min(start + slice, extent),
      frameIndex: Math.floor(start / slice) % frameCount,
    });
  }

  return stripes;
}

export type StripeLayout = Omit<ScanimationGeometry, 'frameCount'>;

export function interlaceFrames(frames: FrameSet, layout: StripeLayout): Frame {
  if (frames.length === 0) {
    throw AppError.insufficientFrames(0);
  }

  const { width, height, sliceSize, direction } = createGeometry({ ...layout, frameCount: frames.length });

  frames.forEach((frame, index) => {
    if (frame.width !== width || frame.height !== height) {
      throw AppError.invalidGeometry('Frames must be unified to the canvas size before interlacing', {
        index,
        expected: { width, height },
        actual: { width: frame.width, height: frame.height },
      });
    }
  });

  const canvas = createTransparentFrame(width, height);
  const stripes = resolveStripes(stripeAxisExtent({ width, height, direction }), sliceSize, frames.length);
  const rowStride = width * RGBA_CHANNELS;

  for (const stripe of stripes) {
    const source = frames[stripe.frameIndex];
    if (!source) {
      continue;
    }

    if (direction === 'vertical') {
      const from = stripe.start * RGBA_CHANNELS;
      const to = stripe.end * RGBA_CHANNELS;
      for (let y = 0; y < height; y += 1) {
        const rowOffset = y * rowStride;
        canvas.data.set(source.data.subarray(rowOffset + from, rowOffset + to), rowOffset + from);
      }
    } else {
      // Rows are contiguous, so a horizontal stripe is one block copy.
      const from = stripe.start * rowStride;
      canvas.data.set(source.data.subarray(from, stripe.end * rowStride), from);
    }
  }

  return canvas;
}
