import { ScanimationError } from './base.error.js';

export const ERROR_CODES = {
  insufficientFrames: 'scanimation.insufficient-frames',
  frameDecodeFailure: 'scanimation.frame-decode-failure',
  invalidGeometry: 'scanimation.invalid-geometry',
  invalidOptions: 'scanimation.invalid-options',
  unsupportedFormat: 'scanimation.unsupported-format',
  folderNotFound: 'scanimation.folder-not-found',
  failure: 'scanimation.failure',
} as const;

interface AppErrorOptions {
  readonly code: string;
  readonly message: string;
  readonly metadata?: Record<string, unknown>;
  readonly cause?: unknown;
  readonly exposeMessage?: boolean;
}

export class AppError extends ScanimationError {
  private constructor(options: AppErrorOptions) {
    super({
      code: options.code,
      message: options.message,
      metadata: options.metadata,
      cause: options.cause,
      exposeMessage: options.exposeMessage ?? false,
    });
  }

  public static fromUnknown(error: unknown, code: string = ERROR_CODES.failure): AppError {
    if (error instanceof AppError) {
      return error;
    }

    const cause = error instanceof Error ? error : new Error('Unknown error');
    return new AppError({ code, message: cause.message, cause, exposeMessage: false });
  }

  public static validation(code: string, metadata: Record<string, unknown>): AppError {
    return new AppError({
      code,
      message: 'Validation failed for the provided options.',
      metadata,
      exposeMessage: true,
    });
  }

  public static insufficientFrames(frameCount: number, metadata: Record<string, unknown> = {}): AppError {
    return new AppError({
      code: ERROR_CODES.insufficientFrames,
      message: `Found ${frameCount} frame(s); at least 2 are required.`,
      metadata: { frameCount, ...metadata },
      exposeMessage: true,
    });
  }

  public static frameDecodeFailure(filePath: string, cause: unknown): AppError {
    const reason = cause instanceof Error ? cause.message : String(cause);
    return new AppError({
      code: ERROR_CODES.frameDecodeFailure,
      message: `Failed to open image: ${filePath} (${reason})`,
      metadata: { filePath },
      cause,
      exposeMessage: true,
    });
  }

  public static invalidGeometry(message: string, metadata: Record<string, unknown>): AppError {
    return new AppError({
      code: ERROR_CODES.invalidGeometry,
      message,
      metadata,
      exposeMessage: true,
    });
  }

  public static unsupported(
    code: string,
    message: string,
    metadata?: Record<string, unknown>,
  ): AppError {
    return new AppError({
      code,
      message,
      metadata,
      exposeMessage: true,
    });
  }
}
