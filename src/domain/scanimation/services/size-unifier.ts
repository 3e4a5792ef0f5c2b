import { AppError, ERROR_CODES } from '../../../shared/errors/app-error.js';
import type { FrameResampler } from '../contracts/frame-resampler.js';
import type { Frame, FrameSet } from '../value-objects/frame.js';
import type { ResizeStrategy } from '../value-objects/geometry.js';

export interface UnifiedFrameSet {
  readonly frames: FrameSet;
  readonly width: number;
  readonly height: number;
}

export function resolveTargetSize(
  frames: FrameSet,
  strategy: ResizeStrategy,
): { width: number; height: number } {
  const [first] = frames;
  if (!first || frames.length < 2) {
    throw AppError.insufficientFrames(frames.length);
  }

  switch (strategy) {
    case 'first': {
      return { width: first.width, height: first.height };
    }
    case 'min': {
      // Each axis independently; the result need not match any single frame.
      return {
        width: Math.min(...frames.map((frame) => frame.width)),
        height: Math.min(...frames.map((frame) => frame.height)),
      };
    }
    default: {
      const exhaustive: never = strategy;
      throw AppError.unsupported(ERROR_CODES.invalidOptions, `Unsupported resize strategy ${String(exhaustive)}`);
    }
  }
}

export function unifyFrameSizes(
  frames: FrameSet,
  strategy: ResizeStrategy,
  resampler: FrameResampler,
): UnifiedFrameSet {
  const { width, height } = resolveTargetSize(frames, strategy);

  const unified = frames.map((frame): Frame => {
    if (frame.width === width && frame.height === height) {
      return frame;
    }

    return resampler.resize(frame, width, height);
  });

  return { frames: unified, width, height };
}
