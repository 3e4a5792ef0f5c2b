import { describe, expect, it } from 'vitest';

import {
  interlaceFrames,
  resolveStripes,
  type Frame,
} from '@domain/scanimation/index.js';

import { BLUE, GREEN, RED, columnPixels, pixelAt, createSolidFrame } from '../../../support/pixels.js';

const solidFrames = (width: number, height: number): Frame[] => [
  createSolidFrame(width, height, RED),
  createSolidFrame(width, height, GREEN),
  createSolidFrame(width, height, BLUE),
];

/** Every pixel encodes where it came from: [frameIndex, x, y, 255]. */
const coordinateFrames = (width: number, height: number, count: number): Frame[] =>
  Array.from({ length: count }, (_, frameIndex) => {
    const data = new Uint8ClampedArray(width * height * 4);
    for (let y = 0; y < height; y += 1) {
      for (let x = 0; x < width; x += 1) {
        data.set([frameIndex, x, y, 255], (y * width + x) * 4);
      }
    }
    return { width, height, data };
  });

describe('resolveStripes', () => {
  it('truncates the final stripe to the remainder of the extent', () => {
    expect(resolveStripes(5, 2, 2)).toEqual([
      { start: 0, end: 2, frameIndex: 0 },
      { start: 2, end: 4, frameIndex: 1 },
      { start: 4, end: 5, frameIndex: 0 },
    ]);
  });

  it('clamps the slice size to the extent', () => {
    expect(resolveStripes(4, 10, 3)).toEqual([{ start: 0, end: 4, frameIndex: 0 }]);
  });

  it('cycles frames strictly by position', () => {
    const stripes = resolveStripes(12, 1, 3);
    expect(stripes.map((stripe) => stripe.frameIndex)).toEqual([0, 1, 2, 0, 1, 2, 0, 1, 2, 0, 1, 2]);
  });
});

describe('interlaceFrames', () => {
  it('alternates single-pixel columns red, green, blue, red', () => {
    const canvas = interlaceFrames(solidFrames(4, 2), {
      width: 4,
      height: 2,
      sliceSize: 1,
      direction: 'vertical',
    });

    expect(canvas.width).toBe(4);
    expect(canvas.height).toBe(2);
    expect(columnPixels(canvas, 0)).toEqual([RED, RED]);
    expect(columnPixels(canvas, 1)).toEqual([GREEN, GREEN]);
    expect(columnPixels(canvas, 2)).toEqual([BLUE, BLUE]);
    expect(columnPixels(canvas, 3)).toEqual([RED, RED]);
  });

  it('never reaches the third frame when the period exceeds the width', () => {
    const canvas = interlaceFrames(solidFrames(4, 2), {
      width: 4,
      height: 2,
      sliceSize: 2,
      direction: 'vertical',
    });

    expect(columnPixels(canvas, 0)).toEqual([RED, RED]);
    expect(columnPixels(canvas, 1)).toEqual([RED, RED]);
    expect(columnPixels(canvas, 2)).toEqual([GREEN, GREEN]);
    expect(columnPixels(canvas, 3)).toEqual([GREEN, GREEN]);
  });

  it('stacks horizontal stripes top to bottom', () => {
    const canvas = interlaceFrames(solidFrames(2, 5), {
      width: 2,
      height: 5,
      sliceSize: 2,
      direction: 'horizontal',
    });

    const rowColors = Array.from({ length: 5 }, (_, y) => pixelAt(canvas, 1, y));
    expect(rowColors).toEqual([RED, RED, GREEN, GREEN, BLUE]);
  });

  it.each([
    { width: 7, height: 3, sliceSize: 3, count: 4 },
    { width: 9, height: 2, sliceSize: 2, count: 2 },
    { width: 5, height: 4, sliceSize: 1, count: 3 },
    { width: 6, height: 1, sliceSize: 4, count: 5 },
  ])('copies every vertical pixel from frame floor(x/S) mod N (%o)', ({ width, height, sliceSize, count }) => {
    const canvas = interlaceFrames(coordinateFrames(width, height, count), {
      width,
      height,
      sliceSize,
      direction: 'vertical',
    });

    for (let y = 0; y < height; y += 1) {
      for (let x = 0; x < width; x += 1) {
        expect(pixelAt(canvas, x, y)).toEqual([Math.floor(x / sliceSize) % count, x, y, 255]);
      }
    }
  });

  it('applies the transposed rule for horizontal stripes', () => {
    const width = 3;
    const height = 8;
    const canvas = interlaceFrames(coordinateFrames(width, height, 3), {
      width,
      height,
      sliceSize: 3,
      direction: 'horizontal',
    });

    for (let y = 0; y < height; y += 1) {
      for (let x = 0; x < width; x += 1) {
        expect(pixelAt(canvas, x, y)).toEqual([Math.floor(y / 3) % 3, x, y, 255]);
      }
    }
  });

  it('uses the first frame everywhere when the slice covers the whole width', () => {
    const canvas = interlaceFrames(solidFrames(4, 1), {
      width: 4,
      height: 1,
      sliceSize: 50,
      direction: 'vertical',
    });

    expect(Array.from({ length: 4 }, (_, x) => pixelAt(canvas, x, 0))).toEqual([RED, RED, RED, RED]);
  });

  it('rejects frames that were not unified to the canvas size', () => {
    const frames = [createSolidFrame(4, 2, RED), createSolidFrame(3, 2, GREEN)];

    expect(() =>
      interlaceFrames(frames, { width: 4, height: 2, sliceSize: 1, direction: 'vertical' }),
    ).toThrowError(expect.objectContaining({ code: 'scanimation.invalid-geometry' }));
  });

  it('rejects a non-positive slice size', () => {
    expect(() =>
      interlaceFrames(solidFrames(4, 2), { width: 4, height: 2, sliceSize: 0, direction: 'vertical' }),
    ).toThrowError(expect.objectContaining({ code: 'scanimation.invalid-geometry' }));
  });
});
