import { ModuleBase } from "../base.js";
import type { SystemInformation } from "../types.js";

export class SystemModule extends ModuleBase {
  /** Blocks server-side until link-layer discovery reports every node connected. */
  async waitForLldConnected(signal?: AbortSignal): Promise<void> {
    await this.request<unknown>("GET", "wait_for_lld_connected", {
      ...(signal ? { signal } : {})
    });
  }

  /** Version and readiness; does not need a token. */
  systemInformation(signal?: AbortSignal): Promise<SystemInformation> {
    return this.ctx.http.get<SystemInformation>("system_information", {
      ...(signal ? { signal } : {})
    });
  }

  /** Authorized `GET labs`, used to confirm the credentials work. */
  async probe(signal?: AbortSignal): Promise<void> {
    await this.request<unknown>("GET", "labs", { ...(signal ? { signal } : {}) });
  }
}
