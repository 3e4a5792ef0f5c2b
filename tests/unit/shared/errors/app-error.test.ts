import { describe, expect, it } from 'vitest';

import { AppError, ERROR_CODES } from '@/shared/errors/app-error.js';
import { ScanimationError } from '@/shared/errors/base.error.js';

describe('AppError', () => {
  it('names the file that failed to decode', () => {
    const error = AppError.frameDecodeFailure('/frames/03.png', new Error('bad CRC'));

    expect(error).toBeInstanceOf(ScanimationError);
    expect(error.code).toBe(ERROR_CODES.frameDecodeFailure);
    expect(error.message).toBe('Failed to open image: /frames/03.png (bad CRC)');
    expect(error.metadata).toEqual({ filePath: '/frames/03.png' });
  });

  it('reports the frame count when too few frames are found', () => {
    const error = AppError.insufficientFrames(1, { folder: '/frames' });

    expect(error.code).toBe('scanimation.insufficient-frames');
    expect(error.message).toBe('Found 1 frame(s); at least 2 are required.');
    expect(error.toJSON()).toEqual({
      name: 'AppError',
      code: 'scanimation.insufficient-frames',
      message: 'Found 1 frame(s); at least 2 are required.',
      metadata: { frameCount: 1, folder: '/frames' },
    });
  });

  it('returns existing AppErrors unchanged from fromUnknown', () => {
    const original = AppError.invalidGeometry('Slice size must be a positive integer', { sliceSize: 0 });

    expect(AppError.fromUnknown(original)).toBe(original);
  });

  it('wraps foreign errors with the fallback code', () => {
    const wrapped = AppError.fromUnknown(new Error('disk full'));

    expect(wrapped.code).toBe('scanimation.failure');
    expect(wrapped.message).toBe('disk full');
    expect(wrapped.exposeMessage).toBe(false);
  });
});
