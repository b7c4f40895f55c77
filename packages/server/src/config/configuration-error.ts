/**
 * Startup configuration is incomplete or invalid. Lists every problem at
 * once so a deployment can be fixed in one pass.
 */
export class ConfigurationError extends Error {
  public readonly code: 'missingConfiguration' | 'invalidConfiguration';

  public constructor(
    message: string,
    code: ConfigurationError['code'],
    public readonly problems: string[],
  ) {
    super(message);
    this.name = 'ConfigurationError';
    this.code = code;
    Object.setPrototypeOf(this, ConfigurationError.prototype);
  }

  public static missing(keys: string[]): ConfigurationError {
    return new ConfigurationError(
      `Missing required configuration: ${keys.join(', ')}`,
      'missingConfiguration',
      keys,
    );
  }

  public static invalid(problems: string[]): ConfigurationError {
    return new ConfigurationError(
      `Invalid configuration: ${problems.join('; ')}`,
      'invalidConfiguration',
      problems,
    );
  }

  public toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      problems: this.problems,
    };
  }
}
