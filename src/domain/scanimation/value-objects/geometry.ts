import { AppError } from '../../../shared/errors/app-error.js';

export const STRIPE_DIRECTIONS = ['vertical', 'horizontal'] as const;

export const RESIZE_STRATEGIES = ['first', 'min'] as const;

export const POST_PASS_MODES = ['none', 'white-background', 'drop-alpha'] as const;

/**
 * `vertical` stripes are read by sliding the grille left-right,
 * `horizontal` stripes by sliding it up-down.
 */
export type StripeDirection = (typeof STRIPE_DIRECTIONS)[number];

export type ResizeStrategy = (typeof RESIZE_STRATEGIES)[number];

export type PostPassMode = (typeof POST_PASS_MODES)[number];

export interface ScanimationGeometry {
  readonly width: number;
  readonly height: number;
  readonly sliceSize: number;
  readonly direction: StripeDirection;
  readonly frameCount: number;
}

export function createGeometry(props: ScanimationGeometry): ScanimationGeometry {
  const { width, height, sliceSize, frameCount } = props;

  if (!isPositiveInteger(width) || !isPositiveInteger(height)) {
    throw AppError.invalidGeometry('Canvas dimensions must be positive integers', { width, height });
  }

  if (!isPositiveInteger(sliceSize)) {
    throw AppError.invalidGeometry('Slice size must be a positive integer', { sliceSize });
  }

  if (!isPositiveInteger(frameCount)) {
    throw AppError.invalidGeometry('Frame count must be a positive integer', { frameCount });
  }

  return { ...props };
}

/** Length of the axis the stripes are laid out along. */
export function stripeAxisExtent(geometry: Pick<ScanimationGeometry, 'width' | 'height' | 'direction'>): number {
  return geometry.direction === 'vertical' ? geometry.width : geometry.height;
}

export function slicePeriod(sliceSize: number, frameCount: number): number {
  return Math.max(1, sliceSize) * frameCount;
}

function isPositiveInteger(value: number): boolean {
  return Number.isInteger(value) && value > 0;
}
