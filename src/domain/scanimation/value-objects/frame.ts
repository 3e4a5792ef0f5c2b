/**
 * Decoded RGBA bitmap, row-major, 8 bits per channel.
 */
export interface Frame {
  readonly width: number;
  readonly height: number;
  readonly data: Uint8ClampedArray;
}

/**
 * Frames in reveal order. Index 0 is the frame visible at the grille's starting position.
 */
export type FrameSet = readonly Frame[];

export type PixelLayout = 'rgba' | 'rgb';

export interface RasterImage {
  readonly width: number;
  readonly height: number;
  readonly layout: PixelLayout;
  readonly data: Uint8ClampedArray;
}

export const RGBA_CHANNELS = 4;

export const RGB_CHANNELS = 3;

export function createTransparentFrame(width: number, height: number): Frame {
  return { width, height, data: new Uint8ClampedArray(width * height * RGBA_CHANNELS) };
}

export function toRasterImage(frame: Frame): RasterImage {
  return { width: frame.width, height: frame.height, layout: 'rgba', data: frame.data };
}
