import { promises as fs } from 'node:fs';
import path from 'node:path';

import type { ImageSink, RasterImage } from '../../domain/scanimation/index.js';
import { AppError, ERROR_CODES } from '../../shared/errors/app-error.js';
import { createChildLogger } from '../../shared/logger/pino.js';

import { encodeImage, formatFromPath } from './codecs/image-codec.js';

const WRITABLE_FORMATS = new Set(['png', 'jpeg', 'webp']);

export class FileImageSink implements ImageSink {
  private readonly logger = createChildLogger({ module: 'FileImageSink' });

  public async write(filePath: string, image: RasterImage): Promise<string> {
    const outputPath = path.resolve(filePath);
    const format = formatFromPath(outputPath);

    if (!format || !WRITABLE_FORMATS.has(format)) {
      throw AppError.unsupported(
        ERROR_CODES.unsupportedFormat,
        `Cannot write "${path.extname(outputPath)}" images; use .png, .jpg, .jpeg or .webp`,
        { outputPath },
      );
    }

    const encoded = encodeImage(image, format);
    await fs.mkdir(path.dirname(outputPath), { recursive: true });
    await fs.writeFile(outputPath, encoded);

    this.logger.debug({ outputPath, format, bytes: encoded.byteLength }, 'Image written');
    return outputPath;
  }
}
