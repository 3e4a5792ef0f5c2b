import type { GenerateScanimationInput } from '../dto/generate-scanimation.dto.js';

export class GenerateScanimationCommand {
  public readonly payload: GenerateScanimationInput;

  public constructor(payload: GenerateScanimationInput) {
    this.payload = payload;
  }
}
