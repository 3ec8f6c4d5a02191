/**
 * The configuration file is missing, unreadable or invalid.
 */
export class ConfigError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ConfigError';
  }
}

/**
 * A data file could not be read, parsed, copied or written.
 */
export class DataFileError extends Error {
  readonly filePath: string;

  constructor(message: string, filePath: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'DataFileError';
    this.filePath = filePath;
  }
}
