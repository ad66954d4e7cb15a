/**
 * Structured classification of a directory failure.
 *
 * Relations match on these kinds to tell "the desired state already holds"
 * apart from real failures.
 */
export type DirectoryErrorKind =
  | "already-exists"
  | "unwilling-to-perform"
  | "no-such-object"
  | "no-such-attribute"
  | "invalid-credentials"
  | "size-limit-exceeded"
  | "unknown";

/**
 * LDAP result codes mapped to their kind.
 */
const RESULT_CODE_KINDS: Record<number, DirectoryErrorKind> = {
  4: "size-limit-exceeded",
  16: "no-such-attribute",
  20: "already-exists",
  32: "no-such-object",
  49: "invalid-credentials",
  53: "unwilling-to-perform",
  68: "already-exists",
};

/**
 * Resolve the error kind of the given LDAP result code.
 */
export function kindFromResultCode(code?: number): DirectoryErrorKind {
  if (code === undefined) return "unknown";

  return RESULT_CODE_KINDS[code] ?? "unknown";
}

export type DirectoryOperationErrorOptions = {
  code?: number;
  kind?: DirectoryErrorKind;
  cause?: unknown;
};

/**
 * Error raised by a driver when a search or a modification fails.
 *
 * The server message is kept as-is so callers can still inspect it.
 */
export class DirectoryOperationError extends Error {
  /**
   * Structured kind of the failure.
   */
  public readonly kind: DirectoryErrorKind;

  /**
   * LDAP result code, when the server sent one.
   */
  public readonly code?: number;

  public constructor(message: string, options: DirectoryOperationErrorOptions = {}) {
    super(message, { cause: options.cause });
    this.name = "DirectoryOperationError";
    this.code = options.code;
    this.kind = options.kind ?? kindFromResultCode(options.code);

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, DirectoryOperationError);
    }
  }

  /**
   * Determine if the error is of any of the given kinds.
   */
  public isKind(...kinds: DirectoryErrorKind[]): boolean {
    return kinds.includes(this.kind);
  }
}
