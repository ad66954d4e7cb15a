/**
 * Error thrown when a connection option has the wrong shape.
 */
export class ConfigurationError extends Error {
  /**
   * The option that failed validation.
   */
  public readonly option: string;

  public constructor(message: string, option: string) {
    super(message);
    this.name = "ConfigurationError";
    this.option = option;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, ConfigurationError);
    }
  }
}
