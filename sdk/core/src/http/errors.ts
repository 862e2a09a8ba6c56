export class HttpError extends Error {
  public readonly name = 'HttpError';
  public readonly status: number;
  /** Parsed JSON body when the server sent one, the raw text otherwise. */
  public readonly body: unknown;

  public constructor(message: string, status: number, body?: unknown) {
    super(message);
    this.status = status;
    this.body = body;
  }
}

export class NetworkError extends Error {
  public readonly name = 'NetworkError';

  public constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
  }
}

export class TimeoutError extends Error {
  public readonly name = 'TimeoutError';

  public constructor(message: string) {
    super(message);
  }
}

export function isHttpError(err: unknown, status?: number): err is HttpError {
  return err instanceof HttpError && (status === undefined || err.status === status);
}
