/**
 * Error taxonomy for the exporter
 * Each class maps to a distinct CLI exit code
 */

export class ExporterError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * Missing or invalid configuration, raised before any network call
 */
export class ConfigError extends ExporterError {
  constructor(readonly problems: string[]) {
    super(`Invalid configuration:\n  - ${problems.join('\n  - ')}`);
  }
}

/**
 * Token or login cookie could not be obtained
 */
export class AuthError extends ExporterError {}

/**
 * An HTTP call failed or returned content that could not be used
 */
export class TransportError extends ExporterError {
  constructor(
    message: string,
    readonly url: string,
    readonly status?: number
  ) {
    super(message);
  }
}
