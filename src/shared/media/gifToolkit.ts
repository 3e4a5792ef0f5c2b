import { createHash } from 'node:crypto';

import { decompressFrames, parseGIF } from 'gifuct-js';
import type { ParsedFrame } from 'gifuct-js';

export interface GifFrame {
  data: Uint8ClampedArray;
}

export interface DecodedGif {
  width: number;
  height: number;
  frames: GifFrame[];
  removedDuplicateFrames: number;
}

export interface GifDecodeOptions {
  /** Drop a frame when it is pixel-identical to the one kept before it. */
  dropDuplicates: boolean;
}

const DEFAULT_OPTIONS: GifDecodeOptions = {
  dropDuplicates: true,
};

/**
 * Decodes every frame of a GIF into a full-size RGBA bitmap, applying each frame's disposal
 * method to the running screen.
 */
export function decodeGif(buffer: Buffer, customOptions: Partial<GifDecodeOptions> = {}): DecodedGif {
  const options = { ...DEFAULT_OPTIONS, ...customOptions } satisfies GifDecodeOptions;
  const gif = parseGIF(new Uint8Array(buffer).buffer);
  const frames = decompressFrames(gif, true);
  const width = gif.lsd.width;
  const height = gif.lsd.height;
  const expanded = expandToFullFrames(frames, width, height);

  if (!options.dropDuplicates) {
    return { width, height, frames: expanded, removedDuplicateFrames: 0 };
  }

  const { sanitized, removed } = dropDuplicateFrames(expanded);
  return { width, height, frames: sanitized, removedDuplicateFrames: removed };
}

export function dropDuplicateFrames(frames: GifFrame[]): { sanitized: GifFrame[]; removed: number } {
  const sanitized: GifFrame[] = [];
  let removed = 0;
  let previousHash: string | null = null;

  for (const frame of frames) {
    const hash = hashFrame(frame.data);
    if (previousHash && previousHash === hash) {
      removed++;
      continue;
    }

    sanitized.push(frame);
    previousHash = hash;
  }

  return { sanitized, removed };
}

export function expandToFullFrames(frames: ParsedFrame[], width: number, height: number): GifFrame[] {
  const fullSize = width * height * 4;
  let previous = new Uint8ClampedArray(fullSize);

  return frames.map((frame) => {
    const beforeDrawing = new Uint8ClampedArray(previous);
    const working = new Uint8ClampedArray(previous);
    const { dims, patch } = frame;

    if (patch) {
      compositePatch(working, patch, dims, width, height);
    }

    const result = new Uint8ClampedArray(working);
    switch (frame.disposalType ?? 0) {
      case 2: {
        const cleared = new Uint8ClampedArray(working);
        clearPatch(cleared, dims, width, height);
        previous = cleared;
        break;
      }
      case 3: {
        previous = beforeDrawing;
        break;
      }
      default: {
        previous = working;
        break;
      }
    }

    return { data: result } satisfies GifFrame;
  });
}

function compositePatch(
  destination: Uint8ClampedArray,
  patch: Uint8ClampedArray,
  dims: ParsedFrame['dims'],
  width: number,
  height: number,
): void {
  const { top, left, width: patchWidth, height: patchHeight } = dims;

  for (let y = 0; y < patchHeight; y += 1) {
    const destY = top + y;
    if (destY >= height) {
      break;
    }

    for (let x = 0; x < patchWidth; x += 1) {
      const destX = left + x;
      const patchIndex = (y * patchWidth + x) * 4;
      const alpha = patch[patchIndex + 3] ?? 0;
      if (alpha === 0 || destX >= width) {
        continue;
      }

      const destIndex = (destY * width + destX) * 4;
      destination[destIndex] = patch[patchIndex] ?? 0;
      destination[destIndex + 1] = patch[patchIndex + 1] ?? 0;
      destination[destIndex + 2] = patch[patchIndex + 2] ?? 0;
      destination[destIndex + 3] = alpha;
    }
  }
}

function clearPatch(
  destination: Uint8ClampedArray,
  dims: ParsedFrame['dims'],
  width: number,
  height: number,
): void {
  const { top, left, width: patchWidth, height: patchHeight } = dims;
  const right = Math.min(left + patchWidth, width);
  const bottom = Math.min(top + patchHeight, height);

  for (let destY = top; destY < bottom; destY += 1) {
    destination.fill(0, (destY * width + left) * 4, (destY * width + right) * 4);
  }
}

function hashFrame(data: Uint8ClampedArray): string {
  return createHash('sha1').update(data).digest('hex');
}
