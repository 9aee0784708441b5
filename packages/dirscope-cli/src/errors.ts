/**
 * Errors raised by the CLI before any traversal starts.
 */

/** The config file could not be read, parsed or validated */
export class ConfigError extends Error {
  public readonly configPath: string;

  constructor(configPath: string, message: string) {
    super(message);
    this.name = 'ConfigError';
    this.configPath = configPath;
  }
}

/** A root path does not exist or a wildcard matched nothing */
export class RootPathError extends Error {
  public readonly input: string;

  constructor(input: string, message: string) {
    super(message);
    this.name = 'RootPathError';
    this.input = input;
  }
}
