/**
 * Error thrown when a single-result lookup matched no directory entry.
 *
 * Carries the executed filter and the search root for diagnostics.
 */
export class ModelNotFoundError extends Error {
  /**
   * The unescaped filter that was executed.
   */
  public readonly query?: string;

  /**
   * The DN the search was rooted at.
   */
  public readonly baseDn?: string;

  public constructor(message = "No directory entry was found.", query?: string, baseDn?: string) {
    super(message);
    this.name = "ModelNotFoundError";
    this.query = query;
    this.baseDn = baseDn;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, ModelNotFoundError);
    }
  }

  /**
   * Create the error for the given filter and search root.
   *
   * @example
   * ```typescript
   * throw ModelNotFoundError.forQuery("(cn=jdoe)", "dc=local,dc=com");
   * // No directory results for filter: [(cn=jdoe)] in: [dc=local,dc=com]
   * ```
   */
  public static forQuery(query: string, baseDn?: string): ModelNotFoundError {
    return new ModelNotFoundError(
      `No directory results for filter: [${query}] in: [${baseDn ?? ""}]`,
      query,
      baseDn,
    );
  }
}
