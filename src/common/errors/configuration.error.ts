/**
 * Raised while the application boots when required settings are missing or
 * malformed. Never thrown on the request path.
 */
export class ConfigurationError extends Error {
  constructor(
    message: string,
    readonly violations: string[] = [],
  ) {
    super(message);
    this.name = 'ConfigurationError';
  }
}
