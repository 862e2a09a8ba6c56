import { extname } from "node:path";
import type { QueryParams } from "@simlab-sdk/core";
import type { TopologyFormat } from "./types.js";

export function topologyFormatFor(path: string): TopologyFormat {
  switch (extname(path).toLowerCase()) {
    case ".ng":
      return "json";
    case ".virl":
      return "virl-1x";
    default:
      return "yaml";
  }
}

/** Import endpoint and query for a topology of the given format. */
export function importEndpoint(
  format: TopologyFormat,
  title: string
): { path: string; query: QueryParams } {
  switch (format) {
    case "json":
      return { path: "import", query: { is_json: true, title } };
    case "virl-1x":
      return { path: "import/virl-1x", query: { title } };
    case "yaml":
      return { path: "import", query: { title } };
  }
}
