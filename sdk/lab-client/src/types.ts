export enum LabState {
  Defined = "DEFINED_ON_CORE",
  Stopped = "STOPPED",
  Queued = "QUEUED",
  Started = "STARTED",
  Booted = "BOOTED"
}

/** Serialization of a topology file, chosen from its extension. */
export type TopologyFormat = "json" | "virl-1x" | "yaml";

// Wire shapes
export interface LabInfoWire {
  id: string;
  lab_title: string;
  lab_description?: string;
  state: LabState;
  node_count?: number;
  link_count?: number;
  // Allow future changes in response without breaking the type
  [k: string]: unknown;
}

export interface TopologyWire {
  lab_title?: string;
  lab_description?: string;
  nodes?: Array<{ id: string; label?: string }>;
  links?: Array<{ id: string }>;
  [k: string]: unknown;
}

export interface ImportResponse {
  id: string;
  warnings?: string[];
}

export interface LabTile {
  lab_title: string;
  lab_description?: string;
  state: LabState;
  [k: string]: unknown;
}

export interface LabTilesResponse {
  lab_tiles: Record<string, LabTile>;
}

export interface SystemInformation {
  version: string;
  ready: boolean;
  [k: string]: unknown;
}

export interface ConvergeOptions {
  /** Pause between two checks (default 5000 ms). */
  intervalMs?: number;
  /** Number of checks before giving up (default 500). */
  maxIterations?: number;
  signal?: AbortSignal;
}

export interface LogoutOptions {
  clearAllSessions?: boolean;
  signal?: AbortSignal;
}
