import { describe, expect, it, vi } from 'vitest';

import {
  resolveTargetSize,
  unifyFrameSizes,
  type Frame,
  type FrameResampler,
} from '@domain/scanimation/index.js';

import { BLUE, GREEN, RED, createSolidFrame } from '../../../support/pixels.js';

const createResampler = (): FrameResampler => ({
  resize: vi.fn((frame: Frame, width: number, height: number) => ({
    width,
    height,
    data: new Uint8ClampedArray(width * height * 4).fill(frame.data[0] ?? 0),
  })),
});

describe('resolveTargetSize', () => {
  it('takes the first frame size for the first strategy', () => {
    const frames = [createSolidFrame(4, 2, RED), createSolidFrame(6, 3, GREEN)];
    expect(resolveTargetSize(frames, 'first')).toEqual({ width: 4, height: 2 });
  });

  it('takes each minimum independently for the min strategy', () => {
    const frames = [createSolidFrame(5, 9, RED), createSolidFrame(8, 3, GREEN), createSolidFrame(6, 4, BLUE)];
    expect(resolveTargetSize(frames, 'min')).toEqual({ width: 5, height: 3 });
  });

  it('fails with fewer than two frames', () => {
    expect(() => resolveTargetSize([createSolidFrame(2, 2, RED)], 'first')).toThrowError(
      expect.objectContaining({ code: 'scanimation.insufficient-frames' }),
    );
  });
});

describe('unifyFrameSizes', () => {
  it('passes matching frames through and stretches the rest', () => {
    const resampler = createResampler();
    const first = createSolidFrame(4, 2, RED);
    const second = createSolidFrame(6, 3, GREEN);

    const unified = unifyFrameSizes([first, second], 'first', resampler);

    expect(unified.width).toBe(4);
    expect(unified.height).toBe(2);
    expect(unified.frames[0]).toBe(first);
    expect(unified.frames[1]).toMatchObject({ width: 4, height: 2 });
    expect(resampler.resize).toHaveBeenCalledTimes(1);
    expect(resampler.resize).toHaveBeenCalledWith(second, 4, 2);
  });

  it('resizes every frame when no single frame attains both minima', () => {
    const resampler = createResampler();
    const frames = [createSolidFrame(5, 9, RED), createSolidFrame(8, 3, GREEN), createSolidFrame(6, 4, BLUE)];

    const unified = unifyFrameSizes(frames, 'min', resampler);

    expect(resampler.resize).toHaveBeenCalledTimes(3);
    expect(unified.frames.map((frame) => [frame.width, frame.height])).toEqual([
      [5, 3],
      [5, 3],
      [5, 3],
    ]);
  });

  it('does not resample when all frames already agree', () => {
    const resampler = createResampler();
    const frames = [createSolidFrame(3, 3, RED), createSolidFrame(3, 3, BLUE)];

    const unified = unifyFrameSizes(frames, 'min', resampler);

    expect(resampler.resize).not.toHaveBeenCalled();
    expect(unified.frames).toEqual(frames);
  });
});
