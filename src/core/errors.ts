/**
 * Custom error types for loading fact sets and configuration.
 * The engine itself never throws: a period it cannot resolve is null.
 * These errors only come from the edges (files, JSON, env).
 */

export class FactSetError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'FactSetError';
  }
}

export class FactFileError extends FactSetError {
  constructor(
    public readonly path: string,
    detail: string
  ) {
    super(`Could not read fact set "${path}": ${detail}`);
    this.name = 'FactFileError';
  }
}

export class FactValidationError extends FactSetError {
  constructor(
    public readonly issues: string[],
    public readonly source: string = 'input'
  ) {
    const shown = issues.slice(0, 5).join('; ');
    const more = issues.length > 5 ? ` (+${issues.length - 5} more)` : '';
    super(`Invalid fact set in ${source}: ${shown}${more}`);
    this.name = 'FactValidationError';
  }
}

export class ConfigError extends Error {
  constructor(
    public readonly key: string,
    detail: string
  ) {
    super(`Invalid configuration for ${key}: ${detail}`);
    this.name = 'ConfigError';
  }
}
