/**
 * Raised at startup when the resolved game configuration cannot be played.
 */
export class ConfigError extends Error {
  readonly field: string;

  constructor(field: string, message: string) {
    super(`Invalid config "${field}": ${message}`);
    this.name = 'ConfigError';
    this.field = field;
  }
}
