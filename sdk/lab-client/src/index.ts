export { ClientLibrary, type ClientOptions } from "./ClientLibrary.js";
export {
  API_PREFIX,
  DEFAULT_URL,
  ENV_CA_BUNDLE,
  ENV_PASS,
  ENV_URL,
  ENV_USER,
  normalizeBaseUrl,
  resolveConfig
} from "./config.js";
export type { ConfigOverrides, Environment, ResolvedClientConfig } from "./config.js";
export { AuthenticationError, InitializationError } from "./errors.js";
export type { Logger } from "./logger.js";
export { Lab } from "./models/Lab.js";
export { TokenAuth, type AuthHeaders, type Credentials } from "./session.js";
export { importEndpoint, topologyFormatFor } from "./topology.js";
export { LabState } from "./types.js";
export type {
  ConvergeOptions,
  ImportResponse,
  LabInfoWire,
  LabTile,
  LabTilesResponse,
  LogoutOptions,
  SystemInformation,
  TopologyFormat,
  TopologyWire
} from "./types.js";
