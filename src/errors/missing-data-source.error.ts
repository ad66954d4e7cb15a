/**
 * Error thrown when a model or a query refers to a directory connection the
 * registry does not know, or when no default connection was registered.
 */
export class MissingDataSourceError extends Error {
  /**
   * Name that was looked up, absent when the default one was missing.
   */
  public readonly dataSourceName?: string;

  public constructor(message: string, dataSourceName?: string) {
    super(message);
    this.name = "MissingDataSourceError";
    this.dataSourceName = dataSourceName;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, MissingDataSourceError);
    }
  }
}
