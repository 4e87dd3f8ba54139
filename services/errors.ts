// Config source missing or not parseable. Recovered by falling back to defaults.
export class ConfigurationUnreadable extends Error {
  readonly cause: unknown;

  constructor(message: string, cause?: unknown) {
    super(message);
    this.name = 'ConfigurationUnreadable';
    this.cause = cause;
  }
}

// Values that would make the run meaningless. Rejected before the run starts.
export class InvalidConfiguration extends Error {
  readonly field: string;

  constructor(field: string, message: string) {
    super(`${field}: ${message}`);
    this.name = 'InvalidConfiguration';
    this.field = field;
  }
}
