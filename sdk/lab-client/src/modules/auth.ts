import { ModuleBase } from "../base.js";
import type { LogoutOptions } from "../types.js";

export class AuthModule extends ModuleBase {
  /**
   * Log in again with the configured credentials and keep the new token.
   *
   * Authorized calls already do this on their own: once before the first
   * request, and once more when a request is rejected with 401. Call it
   * directly only to check the credentials up front.
   */
  authenticate(signal?: AbortSignal): Promise<string> {
    return this.ctx.auth.authenticate(signal);
  }

  get token(): string | undefined {
    return this.ctx.auth.token;
  }

  get isAuthenticated(): boolean {
    return this.ctx.auth.authenticated;
  }

  /**
   * Invalidate the session on the server and forget the token locally.
   * With `clearAllSessions` every session of the user is closed.
   */
  async logout(options: LogoutOptions = {}): Promise<void> {
    if (!this.ctx.auth.authenticated) return;
    await this.ctx.http.delete<unknown>("logout", {
      headers: this.ctx.auth.headers(),
      ...(options.clearAllSessions ? { query: { clear_all_sessions: true } } : {}),
      ...(options.signal ? { signal: options.signal } : {})
    });
    this.ctx.auth.clear();
  }
}
