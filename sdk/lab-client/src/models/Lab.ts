import { delay, TimeoutError } from "@simlab-sdk/core";
import { ModuleBase } from "../base.js";
import type { LabClientContext } from "../context.js";
import type { ConvergeOptions, LabInfoWire, LabState, TopologyWire } from "../types.js";

const DEFAULT_CONVERGE_INTERVAL_MS = 5_000;
const DEFAULT_CONVERGE_ITERATIONS = 500;

/**
 * Local handle on one lab. Nothing here is authoritative: `sync()` pulls the
 * current title, description, state and element counts from the server.
 */
export class Lab extends ModuleBase {
  public readonly id: string;
  public title: string | undefined;
  public description = "";
  public labState: LabState | undefined;
  public nodeCount = 0;
  public linkCount = 0;

  constructor(ctx: LabClientContext, id: string, title?: string) {
    super(ctx);
    this.id = id;
    this.title = title;
  }

  get labBaseUrl(): string {
    return `${this.ctx.config.baseUrl}${this.labPath(this.id)}/`;
  }

  /**
   * Refresh the handle from `labs/<id>` and its topology.
   *
   * @param signal - Aborts the two requests.
   */
  async sync(signal?: AbortSignal): Promise<void> {
    const info = await this.request<LabInfoWire>("GET", this.labPath(this.id), {
      ...(signal ? { signal } : {})
    });
    const topology = await this.request<TopologyWire>("GET", this.labPath(this.id, "topology"), {
      ...(signal ? { signal } : {})
    });

    this.title = info.lab_title;
    this.description = info.lab_description ?? topology.lab_description ?? "";
    this.labState = info.state;
    this.nodeCount = topology.nodes?.length ?? info.node_count ?? 0;
    this.linkCount = topology.links?.length ?? info.link_count ?? 0;
  }

  /** Current state as reported by the server; also refreshes `labState`. */
  async state(signal?: AbortSignal): Promise<LabState> {
    const state = await this.request<LabState>("GET", this.labPath(this.id, "state"), {
      ...(signal ? { signal } : {})
    });
    this.labState = state;
    return state;
  }

  /**
   * Start every node of the lab. Returns once the server accepted the
   * request; use `waitUntilConverged` to wait for the nodes to boot.
   *
   * @param signal - Aborts the request.
   */
  async start(signal?: AbortSignal): Promise<void> {
    await this.request<unknown>("PUT", this.labPath(this.id, "start"), {
      ...(signal ? { signal } : {})
    });
  }

  /**
   * Stop every node of the lab.
   *
   * @param signal - Aborts the request.
   */
  async stop(signal?: AbortSignal): Promise<void> {
    await this.request<unknown>("PUT", this.labPath(this.id, "stop"), {
      ...(signal ? { signal } : {})
    });
  }

  /**
   * Discard the node disks of a stopped lab.
   *
   * @param signal - Aborts the request.
   */
  async wipe(signal?: AbortSignal): Promise<void> {
    await this.request<unknown>("PUT", this.labPath(this.id, "wipe"), {
      ...(signal ? { signal } : {})
    });
  }

  /**
   * Ask the server whether every node reached its target state.
   *
   * @param signal - Aborts the request.
   * @returns `true` only for a literal `true` answer.
   */
  async hasConverged(signal?: AbortSignal): Promise<boolean> {
    const converged = await this.request<unknown>(
      "GET",
      this.labPath(this.id, "check_if_converged"),
      { ...(signal ? { signal } : {}) }
    );
    return converged === true;
  }

  /**
   * Poll `hasConverged` until it answers `true`.
   *
   * @param options - `intervalMs` between checks (5000), `maxIterations` (500), `signal`.
   * @throws TimeoutError straight after the last failed check.
   */
  async waitUntilConverged(options: ConvergeOptions = {}): Promise<void> {
    const intervalMs = options.intervalMs ?? DEFAULT_CONVERGE_INTERVAL_MS;
    const maxIterations = options.maxIterations ?? DEFAULT_CONVERGE_ITERATIONS;

    for (let check = 1; check <= maxIterations; check++) {
      if (await this.hasConverged(options.signal)) return;
      this.ctx.log.debug(`lab ${this.id} not converged yet (check ${check}/${maxIterations})`);
      if (check < maxIterations) {
        await delay(intervalMs, options.signal);
      }
    }
    throw new TimeoutError(`lab ${this.id} did not converge after ${maxIterations} checks`);
  }

  /**
   * Export the lab.
   *
   * @param signal - Aborts the request.
   * @returns Topology in the platform's native YAML format.
   */
  download(signal?: AbortSignal): Promise<string> {
    return this.request<string>("GET", this.labPath(this.id, "download"), {
      ...(signal ? { signal } : {})
    });
  }

  /**
   * Delete the lab on the server. The handle is unusable afterwards.
   *
   * @param signal - Aborts the request.
   */
  async remove(signal?: AbortSignal): Promise<void> {
    await this.request<unknown>("DELETE", this.labPath(this.id), {
      ...(signal ? { signal } : {})
    });
  }

  toString(): string {
    return `Lab: ${this.title ?? this.id}`;
  }
}
