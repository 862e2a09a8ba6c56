/**
 * Raised while building a client: unresolved or invalid credentials or URL,
 * an unreadable CA bundle, or a failed first authentication when `raiseForAuthFailure` is set.
 */
export class InitializationError extends Error {
  public readonly name = "InitializationError";

  public constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
  }
}

/** The authenticate endpoint answered 2xx but handed back no usable token. */
export class AuthenticationError extends Error {
  public readonly name = "AuthenticationError";

  public constructor(message: string) {
    super(message);
  }
}
