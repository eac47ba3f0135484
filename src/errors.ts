/** Thrown by resolveConfig when a configuration value is out of range. */
export class ConfigError extends RangeError {
  constructor(
    public readonly field: string,
    message: string,
  ) {
    super(`${field}: ${message}`);
    this.name = 'ConfigError';
  }
}

/** Thrown by parseSession when the input is not a session record. */
export class SessionFormatError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'SessionFormatError';
  }
}
