import type { RasterImage } from '../value-objects/frame.js';

export interface ImageSink {
  /** Persists `image` and resolves with the absolute path written. */
  write(filePath: string, image: RasterImage): Promise<string>;
}
