import type { HttpMethod, RequestOptions } from "@simlab-sdk/core";
import type { LabClientContext } from "./context.js";

export abstract class ModuleBase {
  protected readonly ctx: LabClientContext;

  constructor(ctx: LabClientContext) {
    this.ctx = ctx;
  }

  /**
   * Sends an authorized request relative to the API root. Goes through the
   * token authenticator, so a 401 triggers one re-authentication and retry.
   */
  protected request<T>(method: HttpMethod, path: string, options: RequestOptions = {}): Promise<T> {
    const target = this.normalizePath(path);
    this.ctx.log.debug(`${method} ${target}`);
    return this.ctx.auth.execute(
      (authHeaders) =>
        this.ctx.http.request<T>(method, target, {
          ...options,
          headers: { ...(options.headers ?? {}), ...authHeaders }
        }),
      options.signal
    );
  }

  /**
   * Normalize a relative API path.
   * - Removes all leading '/' characters so the path stays under the API root.
   * - Collapses any repeated slashes in the middle or at the end to a single '/'.
   * Examples:
   *   "/labs/abc"  -> "labs/abc"
   *   "///labs"    -> "labs"
   *   "labs//abc"  -> "labs/abc"
   *   "/"          -> ""
   */
  protected normalizePath(path: string): string {
    // Drop leading slashes (offset === 0), collapse others to '/'
    return path.replace(/^\/+|\/{2,}/g, (_m, offset: number) => (offset === 0 ? "" : "/"));
  }

  protected labPath(labId: string, ...segments: string[]): string {
    return ["labs", encodeURIComponent(labId), ...segments].join("/");
  }
}
