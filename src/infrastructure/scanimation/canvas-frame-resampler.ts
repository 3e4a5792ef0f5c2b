import { createCanvas } from '@napi-rs/canvas';

import type { Frame, FrameResampler } from '../../domain/scanimation/index.js';
import { createChildLogger } from '../../shared/logger/pino.js';

export class CanvasFrameResampler implements FrameResampler {
  private readonly logger = createChildLogger({ module: 'CanvasFrameResampler' });

  public resize(frame: Frame, width: number, height: number): Frame {
    this.logger.debug(
      { from: { width: frame.width, height: frame.height }, to: { width, height } },
      'Stretching frame to target size',
    );

    const source = createCanvas(frame.width, frame.height);
    const sourceCtx = source.getContext('2d');
    const imageData = sourceCtx.createImageData(frame.width, frame.height);
    imageData.data.set(frame.data);
    sourceCtx.putImageData(imageData, 0, 0);

    const target = createCanvas(width, height);
    const ctx = target.getContext('2d');
    ctx.imageSmoothingEnabled = true;
    ctx.imageSmoothingQuality = 'high';
    ctx.drawImage(source, 0, 0, width, height);

    const resized = ctx.getImageData(0, 0, width, height);
    return { width, height, data: new Uint8ClampedArray(resized.data) };
  }
}
