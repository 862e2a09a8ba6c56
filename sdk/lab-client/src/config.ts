import type { TlsVerify } from "@simlab-sdk/core";
import { InitializationError } from "./errors.js";

export const ENV_URL = "VIRL2_URL";
export const ENV_USER = "VIRL2_USER";
export const ENV_PASS = "VIRL2_PASS";
export const ENV_CA_BUNDLE = "CA_BUNDLE";

export const DEFAULT_URL = "https://localhost";
export const API_PREFIX = "/api/v0/";

export type Environment = Readonly<Record<string, string | undefined>>;

export interface ConfigOverrides {
  url?: string;
  username?: string;
  password?: string;
  sslVerify?: TlsVerify;
  allowHttp?: boolean;
  raiseForAuthFailure?: boolean;
}

export interface ResolvedClientConfig {
  /** URL as supplied (argument, environment or default), before normalization. */
  readonly url: string;
  /** Normalized API root, always ending in `/api/v0/`. */
  readonly baseUrl: string;
  readonly username: string;
  readonly password: string;
  readonly sslVerify: TlsVerify;
  readonly allowHttp: boolean;
  readonly raiseForAuthFailure: boolean;
}

/**
 * Resolves the client configuration. Each value comes from the explicit
 * override when given, then from `env`, then from the built-in default (URL
 * and sslVerify only). Fails with InitializationError before any network call.
 */
export function resolveConfig(overrides: ConfigOverrides, env: Environment): ResolvedClientConfig {
  const allowHttp = overrides.allowHttp ?? false;
  const url = overrides.url ?? nonEmpty(env[ENV_URL]) ?? DEFAULT_URL;
  const username = overrides.username ?? env[ENV_USER];
  const password = overrides.password ?? env[ENV_PASS];

  if (!username) {
    throw new InitializationError(`no username provided (argument or ${ENV_USER})`);
  }
  if (!password) {
    throw new InitializationError(`no password provided (argument or ${ENV_PASS})`);
  }

  return Object.freeze({
    url,
    baseUrl: normalizeBaseUrl(url, allowHttp),
    username,
    password,
    sslVerify: overrides.sslVerify ?? nonEmpty(env[ENV_CA_BUNDLE]) ?? true,
    allowHttp,
    raiseForAuthFailure: overrides.raiseForAuthFailure ?? false
  });
}

/**
 * Turns a user-supplied URL or bare hostname into the API root.
 * Examples:
 *   "somehost"                  -> "https://somehost/api/v0/"
 *   "http://somehost"           -> "https://somehost/api/v0/" (unless allowHttp)
 *   "https://somehost:443"      -> "https://somehost/api/v0/"
 *   "http://0.0.0.0/fake_url/"  -> "https://0.0.0.0/fake_url/api/v0/"
 */
export function normalizeBaseUrl(raw: string, allowHttp: boolean): string {
  const candidate = raw.includes("://") ? raw : `https://${raw}`;

  let parsed: URL;
  try {
    parsed = new URL(candidate);
  } catch (err) {
    throw new InitializationError(`invalid URL "${raw}"`, { cause: err });
  }

  const scheme = parsed.protocol.replace(/:$/, "");
  if (scheme !== "http" && scheme !== "https") {
    throw new InitializationError(`unsupported scheme "${scheme}" in URL "${raw}"`);
  }
  if (!parsed.hostname) {
    throw new InitializationError(`no host in URL "${raw}"`);
  }
  if (scheme === "http" && !allowHttp) {
    parsed.protocol = "https:";
  }

  const prefix = parsed.pathname.replace(/\/+$/, "");
  parsed.pathname = prefix.endsWith(API_PREFIX.slice(0, -1)) ? `${prefix}/` : `${prefix}${API_PREFIX}`;
  parsed.search = "";
  parsed.hash = "";
  return parsed.toString();
}

function nonEmpty(value: string | undefined): string | undefined {
  return value ? value : undefined;
}
