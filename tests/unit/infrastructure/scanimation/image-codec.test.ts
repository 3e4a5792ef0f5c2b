import { PNG } from 'pngjs';
import { describe, expect, it } from 'vitest';

import {
  decodeImageBuffer,
  encodeImage,
  encodePng,
  formatFromPath,
  normalizeExtension,
} from '@/infrastructure/scanimation/index.js';

describe('image codec', () => {
  it('maps extensions to formats case-insensitively', () => {
    expect(formatFromPath('/frames/SHOT.JPG')).toBe('jpeg');
    expect(formatFromPath('frame.webp')).toBe('webp');
    expect(formatFromPath('scan.tiff')).toBeUndefined();
    expect(normalizeExtension(' .PNG ')).toBe('png');
  });

  it('writes RGB images verbatim instead of blending them onto white', () => {
    const encoded = encodePng({
      width: 2,
      height: 1,
      layout: 'rgb',
      data: new Uint8ClampedArray([0, 0, 0, 10, 20, 30]),
    });

    const decoded = PNG.sync.read(encoded);
    expect(decoded.width).toBe(2);
    expect(decoded.height).toBe(1);
    expect(Array.from(decoded.data)).toEqual([0, 0, 0, 255, 10, 20, 30, 255]);
  });

  it('keeps transparent pixels when reading back an RGBA png', async () => {
    const pixels = [0, 0, 0, 0, 255, 0, 0, 255, 1, 2, 3, 128, 40, 50, 60, 255];
    const encoded = encodePng({ width: 2, height: 2, layout: 'rgba', data: new Uint8ClampedArray(pixels) });

    const frame = await decodeImageBuffer(encoded, 'png');

    expect(frame.width).toBe(2);
    expect(frame.height).toBe(2);
    expect(Array.from(frame.data)).toEqual(pixels);
  });

  it('encodes jpeg through the canvas backend', async () => {
    const image = {
      width: 3,
      height: 2,
      layout: 'rgb' as const,
      data: new Uint8ClampedArray(3 * 2 * 3).fill(200),
    };

    const encoded = encodeImage(image, 'jpeg');
    const frame = await decodeImageBuffer(encoded, 'jpeg');

    expect(encoded.subarray(0, 2)).toEqual(Buffer.from([0xff, 0xd8]));
    expect(frame.width).toBe(3);
    expect(frame.height).toBe(2);
  });

  it('refuses to write gif output', () => {
    expect(() =>
      encodeImage({ width: 1, height: 1, layout: 'rgba', data: new Uint8ClampedArray(4) }, 'gif'),
    ).toThrowError('Writing gif images is not supported');
  });
});
