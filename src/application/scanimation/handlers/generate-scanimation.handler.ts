import {
  applyPostPass,
  createGeometry,
  generateMask,
  interlaceFrames,
  resolveStripes,
  ScanimationJob,
  slicePeriod,
  stripeAxisExtent,
  toRasterImage,
  unifyFrameSizes,
} from '../../../domain/scanimation/index.js';
import type {
  FrameResampler,
  FrameSource,
  ImageSink,
  StripeDirection,
} from '../../../domain/scanimation/index.js';
import { AppError, ERROR_CODES } from '../../../shared/errors/app-error.js';
import { createChildLogger } from '../../../shared/logger/pino.js';
import type { GenerateScanimationCommand } from '../commands/generate-scanimation.command.js';
import {
  generateScanimationCommandSchema,
  type GenerateScanimationInput,
  type GenerateScanimationPayload,
} from '../dto/generate-scanimation.dto.js';

export interface GenerateScanimationDependencies {
  readonly frameSource: FrameSource;
  readonly imageSink: ImageSink;
  readonly resampler: FrameResampler;
}

export interface ScanimationOutcome {
  readonly width: number;
  readonly height: number;
  readonly frameCount: number;
  readonly frameLabels: readonly string[];
  readonly sliceSize: number;
  readonly direction: StripeDirection;
  readonly period: number;
  readonly stripeCount: number;
  readonly basePath: string;
  readonly maskPath?: string;
}

export class GenerateScanimationHandler {
  private readonly logger = createChildLogger({ module: 'GenerateScanimationHandler' });

  public constructor(private readonly dependencies: GenerateScanimationDependencies) {}

  public async execute(command: GenerateScanimationCommand): Promise<ScanimationOutcome> {
    const payload = this.validate(command.payload);

    this.logger.info({ jobId: payload.id, source: payload.source }, 'Starting scanimation');

    try {
      const job = ScanimationJob.create({
        id: payload.id,
        source: payload.source,
        options: payload.options,
        output: payload.output,
        createdAt: new Date(),
      });

      return await this.run(job);
    } catch (error) {
      this.logger.error({ jobId: payload.id, error }, 'Scanimation failed');
      throw AppError.fromUnknown(error, ERROR_CODES.failure);
    }
  }

  private async run(job: ScanimationJob): Promise<ScanimationOutcome> {
    const { frameSource, imageSink, resampler } = this.dependencies;
    const { sliceSize, direction, resize, postPass } = job.options;

    const sourced = await frameSource.collect(job.source);
    if (sourced.length < 2) {
      throw AppError.insufficientFrames(sourced.length, { source: job.source });
    }

    const unified = unifyFrameSizes(
      sourced.map((entry) => entry.frame),
      resize,
      resampler,
    );

    const geometry = createGeometry({
      width: unified.width,
      height: unified.height,
      sliceSize,
      direction,
      frameCount: unified.frames.length,
    });

    const canvas = interlaceFrames(unified.frames, geometry);
    const base = applyPostPass(canvas, postPass);
    const mask = job.wantsMask ? generateMask(geometry) : undefined;
    const { maskPath } = job.output;

    // The two writes do not depend on each other; both are attempted before any failure surfaces.
    const [baseWrite, maskWrite] = await Promise.allSettled([
      imageSink.write(job.output.basePath, base),
      mask && maskPath ? imageSink.write(maskPath, toRasterImage(mask)) : Promise.resolve(undefined),
    ]);

    if (baseWrite.status === 'rejected') {
      if (maskWrite.status === 'rejected') {
        this.logger.error({ jobId: job.id, error: maskWrite.reason }, 'Mask write failed');
      }
      throw baseWrite.reason;
    }

    const period = slicePeriod(sliceSize, unified.frames.length);

    this.logger.info(
      {
        jobId: job.id,
        basePath: baseWrite.value,
        width: unified.width,
        height: unified.height,
        frames: unified.frames.length,
        slice: sliceSize,
        direction,
      },
      'Base saved',
    );

    if (maskWrite.status === 'rejected') {
      throw maskWrite.reason;
    }

    if (maskWrite.value) {
      this.logger.info({ jobId: job.id, maskPath: maskWrite.value, period }, 'Mask saved');
    }

    return {
      width: unified.width,
      height: unified.height,
      frameCount: unified.frames.length,
      frameLabels: sourced.map((entry) => entry.label),
      sliceSize,
      direction,
      period,
      stripeCount: resolveStripes(stripeAxisExtent(geometry), sliceSize, unified.frames.length).length,
      basePath: baseWrite.value,
      maskPath: maskWrite.value,
    };
  }

  private validate(payload: GenerateScanimationInput): GenerateScanimationPayload {
    const parsed = generateScanimationCommandSchema.safeParse(payload);

    if (!parsed.success) {
      const error = AppError.validation(ERROR_CODES.invalidOptions, {
        issues: parsed.error.issues,
      });
      this.logger.warn({ issues: parsed.error.issues }, 'Invalid scanimation options received');
      throw error;
    }

    return parsed.data;
  }
}
