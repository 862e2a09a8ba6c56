import type { HttpClient } from "@simlab-sdk/core";
import type { ResolvedClientConfig } from "./config.js";
import type { Logger } from "./logger.js";
import type { TokenAuth } from "./session.js";

export interface LabClientContext {
  config: ResolvedClientConfig;
  http: HttpClient;
  auth: TokenAuth;
  log: Logger;
}
