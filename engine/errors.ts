/**
 * Error types raised while bringing the device up.
 *
 * Configuration and catalogue errors are fatal at startup. Driver errors are
 * caught by the driver factory, which falls back to the next transport.
 */

export class ConfigError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ConfigError';
  }
}

export class CatalogueError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'CatalogueError';
  }
}

export class DriverUnavailableError extends Error {
  constructor(
    readonly transport: string,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'DriverUnavailableError';
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
