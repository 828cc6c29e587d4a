// A ConfigError reports an invalid configuration or preset.
export class ConfigError extends Error {
  constructor(msg: string) {
    super(msg);
    this.name = 'ConfigError';
  }
}

// A StepError wraps a failure inside a step with the step's name.
export class StepError extends Error {
  readonly step: string;
  readonly cause: unknown;

  constructor(step: string, cause: unknown) {
    super(`step ${step} failed: ${cause instanceof Error ? cause.message : String(cause)}`);
    this.name = 'StepError';
    this.step = step;
    this.cause = cause;
  }
}
