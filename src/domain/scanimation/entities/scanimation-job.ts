import { AppError, ERROR_CODES } from '../../../shared/errors/app-error.js';
import type {
  ScanimationOptions,
  ScanimationOutputTargets,
  ScanimationSource,
} from '../value-objects/scanimation-source.js';

export interface ScanimationJobProps {
  readonly id: string;
  readonly source: ScanimationSource;
  readonly options: ScanimationOptions;
  readonly output: ScanimationOutputTargets;
  readonly createdAt: Date;
}

export class ScanimationJob {
  public readonly id: string;

  public readonly source: ScanimationSource;

  public readonly options: ScanimationOptions;

  public readonly output: ScanimationOutputTargets;

  public readonly createdAt: Date;

  private constructor(props: ScanimationJobProps) {
    this.id = props.id;
    this.source = props.source;
    this.options = props.options;
    this.output = props.output;
    this.createdAt = props.createdAt;
  }

  public static create(props: ScanimationJobProps): ScanimationJob {
    if (!Number.isInteger(props.options.sliceSize) || props.options.sliceSize < 1) {
      throw AppError.invalidGeometry('Slice size must be a positive integer', {
        sliceSize: props.options.sliceSize,
      });
    }

    if (props.source.type === 'directory' && props.source.extensions.length === 0) {
      throw AppError.validation(ERROR_CODES.invalidOptions, { extensions: 'At least one extension is required' });
    }

    return new ScanimationJob(props);
  }

  public get wantsMask(): boolean {
    return this.output.maskPath !== undefined && this.output.maskPath.length > 0;
  }
}
