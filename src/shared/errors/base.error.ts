export interface ScanimationErrorOptions {
  readonly code: string;
  readonly message: string;
  readonly metadata?: Record<string, unknown>;
  readonly cause?: unknown;
  readonly exposeMessage: boolean;
}

export class ScanimationError extends Error {
  public readonly code: string;

  public readonly metadata: Record<string, unknown>;

  public readonly exposeMessage: boolean;

  protected constructor(options: ScanimationErrorOptions) {
    super(options.message, { cause: options.cause });
    this.name = new.target.name;
    this.code = options.code;
    this.metadata = options.metadata ?? {};
    this.exposeMessage = options.exposeMessage;
  }

  public toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      metadata: this.metadata,
    };
  }
}
