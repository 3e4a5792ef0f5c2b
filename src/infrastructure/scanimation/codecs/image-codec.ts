import path from 'node:path';

import { createCanvas, loadImage } from '@napi-rs/canvas';
import { PNG } from 'pngjs';

import type { Frame, RasterImage } from '../../../domain/scanimation/index.js';

import { decodeGif } from '../../../shared/media/gifToolkit.js';

export type ImageFormat = 'png' | 'gif' | 'jpeg' | 'webp' | 'bmp';

const EXTENSION_FORMATS: Readonly<Record<string, ImageFormat>> = {
  png: 'png',
  gif: 'gif',
  jpg: 'jpeg',
  jpeg: 'jpeg',
  webp: 'webp',
  bmp: 'bmp',
};

export function normalizeExtension(extension: string): string {
  return extension.trim().replace(/^\./, '').toLowerCase();
}

export function formatFromPath(filePath: string): ImageFormat | undefined {
  return EXTENSION_FORMATS[normalizeExtension(path.extname(filePath))];
}

export async function decodeImageBuffer(buffer: Buffer, format: ImageFormat): Promise<Frame> {
  switch (format) {
    case 'png': {
      const png = PNG.sync.read(buffer);
      return { width: png.width, height: png.height, data: new Uint8ClampedArray(png.data) };
    }
    case 'gif': {
      const gif = decodeGif(buffer, { dropDuplicates: false });
      const [first] = gif.frames;
      if (!first) {
        throw new Error('GIF contains no frames');
      }

      return { width: gif.width, height: gif.height, data: first.data };
    }
    case 'jpeg':
    case 'webp':
    case 'bmp': {
      const image = await loadImage(buffer);
      const canvas = createCanvas(image.width, image.height);
      const ctx = canvas.getContext('2d');
      ctx.drawImage(image, 0, 0);
      const imageData = ctx.getImageData(0, 0, image.width, image.height);
      return { width: image.width, height: image.height, data: new Uint8ClampedArray(imageData.data) };
    }
    default: {
      const exhaustive: never = format;
      throw new Error(`Unsupported image format ${String(exhaustive)}`);
    }
  }
}

export function encodeImage(image: RasterImage, format: ImageFormat): Buffer {
  switch (format) {
    case 'png': {
      return encodePng(image);
    }
    case 'jpeg':
    case 'webp': {
      const canvas = createCanvas(image.width, image.height);
      const ctx = canvas.getContext('2d');
      const imageData = ctx.createImageData(image.width, image.height);
      imageData.data.set(toRgba(image));
      ctx.putImageData(imageData, 0, 0);
      return format === 'jpeg' ? canvas.toBuffer('image/jpeg') : canvas.toBuffer('image/webp');
    }
    case 'gif':
    case 'bmp': {
      throw new Error(`Writing ${format} images is not supported`);
    }
    default: {
      const exhaustive: never = format;
      throw new Error(`Unsupported image format ${String(exhaustive)}`);
    }
  }
}

/**
 * RGB layouts are written as colour type 2 from an RGB input, so pngjs never blends the
 * missing alpha against its background colour.
 */
export function encodePng(image: RasterImage): Buffer {
  const colorType = image.layout === 'rgba' ? 6 : 2;
  const png = new PNG({ width: image.width, height: image.height });
  png.data = Buffer.from(image.data.buffer, image.data.byteOffset, image.data.byteLength);

  return PNG.sync.write(png, {
    colorType,
    inputColorType: colorType,
    inputHasAlpha: image.layout === 'rgba',
  });
}

function toRgba(image: RasterImage): Uint8ClampedArray {
  if (image.layout === 'rgba') {
    return image.data;
  }

  const pixelCount = image.width * image.height;
  const rgba = new Uint8ClampedArray(pixelCount * 4);
  for (let pixel = 0; pixel < pixelCount; pixel += 1) {
    rgba.set(image.data.subarray(pixel * 3, pixel * 3 + 3), pixel * 4);
    rgba[pixel * 4 + 3] = 255;
  }

  return rgba;
}
