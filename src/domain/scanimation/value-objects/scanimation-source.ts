import type { PostPassMode, ResizeStrategy, StripeDirection } from './geometry.js';

/**
 * Where the ordered frames come from.
 */
export type ScanimationSource =
  | { type: 'directory'; path: string; recursive: boolean; extensions: readonly string[] }
  | { type: 'animatedGif'; path: string };

export interface ScanimationOptions {
  readonly sliceSize: number;
  readonly direction: StripeDirection;
  readonly resize: ResizeStrategy;
  readonly postPass: PostPassMode;
}

export interface ScanimationOutputTargets {
  readonly basePath: string;
  readonly maskPath?: string;
}
