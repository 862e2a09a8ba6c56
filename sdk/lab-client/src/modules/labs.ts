import { readFile } from "node:fs/promises";
import { basename } from "node:path";
import invariant from "tiny-invariant";
import { ModuleBase } from "../base.js";
import { Lab } from "../models/Lab.js";
import { importEndpoint, topologyFormatFor } from "../topology.js";
import type { ImportResponse, LabInfoWire, LabTilesResponse, TopologyFormat } from "../types.js";

export class LabsModule extends ModuleBase {
  /**
   * Import a topology given as text. The body goes to the server unmodified;
   * parsing and validation happen there.
   *
   * @param topology - Topology document.
   * @param title - Title of the new lab.
   * @param format - Serialization of `topology` (default "yaml").
   * @param signal - Aborts the requests.
   * @returns A synced handle on the imported lab.
   */
  async importLab(
    topology: string,
    title: string,
    format: TopologyFormat = "yaml",
    signal?: AbortSignal
  ): Promise<Lab> {
    const { path, query } = importEndpoint(format, title);
    const result = await this.request<ImportResponse>("POST", path, {
      query,
      body: topology,
      ...(signal ? { signal } : {})
    });
    invariant(typeof result?.id === "string", "import response carries no lab id");
    for (const warning of result.warnings ?? []) {
      this.ctx.log.warn(`import of "${title}": ${warning}`);
    }

    const lab = new Lab(this.ctx, result.id, title);
    await lab.sync(signal);
    return lab;
  }

  /**
   * Import a topology file. `.ng` files are sent as JSON topologies, `.virl`
   * files to the legacy XML importer, anything else as YAML. The title
   * defaults to the file name. Read errors propagate as they are.
   *
   * @param path - Topology file; its extension selects the importer.
   * @param title - Title of the new lab.
   * @returns A synced handle on the imported lab.
   */
  async importLabFromPath(path: string, title?: string, signal?: AbortSignal): Promise<Lab> {
    const topology = await readFile(path, "utf8");
    return this.importLab(topology, title ?? basename(path), topologyFormatFor(path), signal);
  }

  /**
   * @param signal - Aborts the request.
   * @returns Ids of every lab visible to the user.
   */
  allLabIds(signal?: AbortSignal): Promise<string[]> {
    return this.request<string[]>("GET", "labs", { ...(signal ? { signal } : {}) });
  }

  /**
   * Join every lab visible to the user, one after another.
   *
   * @param signal - Aborts the requests.
   * @returns Synced handles, in the order the server lists them.
   */
  async allLabs(signal?: AbortSignal): Promise<Lab[]> {
    const ids = await this.allLabIds(signal);
    const labs: Lab[] = [];
    for (const id of ids) {
      labs.push(await this.joinExistingLab(id, signal));
    }
    return labs;
  }

  /**
   * Handle on a lab that already exists on the server.
   *
   * @param labId - Id of the lab.
   * @param signal - Aborts the requests.
   * @returns A synced handle; rejects with HttpError 404 for an unknown id.
   */
  async joinExistingLab(labId: string, signal?: AbortSignal): Promise<Lab> {
    const lab = new Lab(this.ctx, labId);
    await lab.sync(signal);
    return lab;
  }

  /**
   * Labs whose title is exactly `title`.
   *
   * @param title - Title to match, case-sensitive.
   * @param signal - Aborts the requests.
   * @returns Synced handles, possibly none.
   */
  async findLabsByTitle(title: string, signal?: AbortSignal): Promise<Lab[]> {
    const { lab_tiles: tiles } = await this.request<LabTilesResponse>("GET", "populate_lab_tiles", {
      ...(signal ? { signal } : {})
    });
    const labs: Lab[] = [];
    for (const [id, tile] of Object.entries(tiles)) {
      if (tile.lab_title === title) {
        labs.push(await this.joinExistingLab(id, signal));
      }
    }
    return labs;
  }

  /**
   * Create an empty lab.
   *
   * @param title - Title of the lab; the server picks one when omitted.
   * @param signal - Aborts the requests.
   * @returns A synced handle on the new lab.
   */
  async createLab(title?: string, signal?: AbortSignal): Promise<Lab> {
    const info = await this.request<LabInfoWire>("POST", "labs", {
      query: { title },
      ...(signal ? { signal } : {})
    });
    invariant(typeof info?.id === "string", "create response carries no lab id");

    const lab = new Lab(this.ctx, info.id, info.lab_title);
    await lab.sync(signal);
    return lab;
  }

  /**
   * Delete a lab without joining it first.
   *
   * @param labId - Id of the lab.
   * @param signal - Aborts the request.
   */
  async removeLabById(labId: string, signal?: AbortSignal): Promise<void> {
    await this.request<unknown>("DELETE", this.labPath(labId), { ...(signal ? { signal } : {}) });
  }
}
