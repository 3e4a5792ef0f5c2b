import type { Frame } from '../value-objects/frame.js';

export interface FrameResampler {
  /** Stretches `frame` to exactly `width` x `height`; aspect ratio is not preserved. */
  resize(frame: Frame, width: number, height: number): Frame;
}
