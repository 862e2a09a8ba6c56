import { type HttpClient, isHttpError } from "@simlab-sdk/core";
import { AuthenticationError } from "./errors.js";
import type { Logger } from "./logger.js";

export interface Credentials {
  readonly username: string;
  readonly password: string;
}

export type AuthHeaders = Record<string, string>;

/**
 * Holds the bearer token of one client and applies the re-authentication
 * policy to every authorized call.
 */
export class TokenAuth {
  private currentToken: string | undefined;

  constructor(
    private readonly http: HttpClient,
    private readonly credentials: Credentials,
    private readonly log: Logger
  ) {}

  get token(): string | undefined {
    return this.currentToken;
  }

  get authenticated(): boolean {
    return this.currentToken !== undefined;
  }

  /**
   * Exchanges the credentials for a bearer token and keeps it for subsequent
   * requests. A non-2xx answer rejects with the HttpError of the login call.
   */
  async authenticate(signal?: AbortSignal): Promise<string> {
    this.log.debug(`authenticating as ${this.credentials.username}`);
    const token = await this.http.post<unknown>("authenticate", {
      body: { username: this.credentials.username, password: this.credentials.password },
      ...(signal ? { signal } : {})
    });
    if (typeof token !== "string" || token.length === 0) {
      throw new AuthenticationError("authenticate returned no token");
    }
    this.currentToken = token;
    return token;
  }

  /** Forgets the token; the next authorized call logs in again. */
  clear(): void {
    this.currentToken = undefined;
  }

  headers(): AuthHeaders {
    return this.currentToken ? { Authorization: `Bearer ${this.currentToken}` } : {};
  }

  /**
   * Runs `call` with the bearer header. Logs in first when there is no token.
   * When the call is rejected with 401 the token is renewed once and the call
   * issued exactly once more; whatever that second attempt throws propagates.
   * Any other failure propagates at once.
   */
  async execute<T>(call: (headers: AuthHeaders) => Promise<T>, signal?: AbortSignal): Promise<T> {
    if (!this.currentToken) {
      await this.authenticate(signal);
    }
    try {
      return await call(this.headers());
    } catch (err) {
      if (!isHttpError(err, 401)) throw err;
      this.log.debug("token rejected with 401, re-authenticating");
      this.clear();
      await this.authenticate(signal);
      return call(this.headers());
    }
  }
}
