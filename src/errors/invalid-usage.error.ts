/**
 * Error thrown when an operation contradicts what the model declares,
 * e.g. converting a date for an attribute that is not a model date.
 */
export class InvalidUsageError extends Error {
  public constructor(message: string) {
    super(message);
    this.name = "InvalidUsageError";

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, InvalidUsageError);
    }
  }
}
