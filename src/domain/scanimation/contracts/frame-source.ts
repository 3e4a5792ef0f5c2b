import type { Frame } from '../value-objects/frame.js';
import type { ScanimationSource } from '../value-objects/scanimation-source.js';

export interface SourcedFrame {
  /** File name or `gif#index`, used in logs and error metadata. */
  readonly label: string;
  readonly frame: Frame;
}

export interface FrameSource {
  collect(source: ScanimationSource): Promise<SourcedFrame[]>;
}
