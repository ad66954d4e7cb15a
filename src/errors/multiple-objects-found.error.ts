/**
 * Error thrown when a lookup expecting at most one entry found several.
 */
export class MultipleObjectsFoundError extends Error {
  /**
   * The unescaped filter that was executed.
   */
  public readonly query?: string;

  /**
   * The DN the search was rooted at.
   */
  public readonly baseDn?: string;

  public constructor(query?: string, baseDn?: string) {
    super(
      query === undefined
        ? "Multiple directory entries were found."
        : `Multiple directory results for filter: [${query}] in: [${baseDn ?? ""}]`,
    );
    this.name = "MultipleObjectsFoundError";
    this.query = query;
    this.baseDn = baseDn;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, MultipleObjectsFoundError);
    }
  }
}
