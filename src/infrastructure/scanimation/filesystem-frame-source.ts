import { promises as fs } from 'node:fs';
import path from 'node:path';

import { glob } from 'glob';

import type {
  FrameSource,
  ScanimationSource,
  SourcedFrame,
} from '../../domain/scanimation/index.js';
import { AppError, ERROR_CODES } from '../../shared/errors/app-error.js';
import { createChildLogger } from '../../shared/logger/pino.js';
import { decodeGif, type DecodedGif } from '../../shared/media/gifToolkit.js';

import { decodeImageBuffer, formatFromPath, normalizeExtension } from './codecs/image-codec.js';

type DirectorySource = Extract<ScanimationSource, { type: 'directory' }>;

const fileNameCollator = new Intl.Collator(undefined, { numeric: true, sensitivity: 'base' });

/**
 * Orders by file name only, numerically aware: `frame2` sorts before `frame10` whatever folder
 * either lives in. The full path breaks ties.
 */
export function sortByFileName(files: readonly string[]): string[] {
  return [...files].sort(
    (a, b) => fileNameCollator.compare(path.basename(a), path.basename(b)) || a.localeCompare(b),
  );
}

export class FilesystemFrameSource implements FrameSource {
  private readonly logger = createChildLogger({ module: 'FilesystemFrameSource' });

  public async collect(source: ScanimationSource): Promise<SourcedFrame[]> {
    switch (source.type) {
      case 'directory': {
        const files = await this.listFrameFiles(source);
        return this.decodeFiles(files);
      }
      case 'animatedGif': {
        return this.expandAnimatedGif(source.path);
      }
      default: {
        const exhaustive: never = source;
        throw AppError.unsupported(ERROR_CODES.unsupportedFormat, 'Unsupported frame source', {
          source: exhaustive,
        });
      }
    }
  }

  public async listFrameFiles(source: DirectorySource): Promise<string[]> {
    const folder = path.resolve(source.path);
    await this.assertDirectory(folder);

    const extensions = new Set(source.extensions.map(normalizeExtension).filter((ext) => ext.length > 0));
    const matches = await glob(source.recursive ? '**/*' : '*', {
      cwd: folder,
      absolute: true,
      nodir: true,
    });

    const files = sortByFileName(
      matches.filter((file) => extensions.has(normalizeExtension(path.extname(file)))),
    );

    if (files.length < 2) {
      throw AppError.insufficientFrames(files.length, { folder, extensions: [...extensions] });
    }

    this.logger.info({ folder, frameCount: files.length }, 'Collected frames');
    this.logger.debug({ files: files.map((file) => path.basename(file)) }, 'Frame order');

    return files;
  }

  private async decodeFiles(files: readonly string[]): Promise<SourcedFrame[]> {
    const frames: SourcedFrame[] = [];

    for (const file of files) {
      const format = formatFromPath(file);
      try {
        if (!format) {
          throw new Error(`No decoder for extension "${path.extname(file)}"`);
        }

        const buffer = await fs.readFile(file);
        const frame = await decodeImageBuffer(buffer, format);
        frames.push({ label: path.basename(file), frame });
      } catch (error) {
        throw AppError.frameDecodeFailure(file, error);
      }
    }

    return frames;
  }

  private async expandAnimatedGif(filePath: string): Promise<SourcedFrame[]> {
    const resolved = path.resolve(filePath);
    let decoded: DecodedGif;

    try {
      decoded = decodeGif(await fs.readFile(resolved));
    } catch (error) {
      throw AppError.frameDecodeFailure(resolved, error);
    }

    const { width, height, frames, removedDuplicateFrames } = decoded;
    if (frames.length < 2) {
      throw AppError.insufficientFrames(frames.length, { file: resolved });
    }

    this.logger.info(
      { file: resolved, frameCount: frames.length, removedDuplicateFrames },
      'Expanded animated GIF into frames',
    );

    const label = path.basename(resolved);
    return frames.map((frame, index) => ({
      label: `${label}#${index}`,
      frame: { width, height, data: frame.data },
    }));
  }

  private async assertDirectory(folder: string): Promise<void> {
    const stats = await fs.stat(folder).catch(() => null);
    if (!stats?.isDirectory()) {
      throw AppError.unsupported(ERROR_CODES.folderNotFound, `Folder not found: ${folder}`, { folder });
    }
  }
}
