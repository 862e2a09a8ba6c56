import { inspect } from "node:util";
import { createDispatcher, HttpClient, type TlsVerify } from "@simlab-sdk/core";
import type { Agent } from "undici";
import { type ConfigOverrides, type Environment, resolveConfig, type ResolvedClientConfig } from "./config.js";
import type { LabClientContext } from "./context.js";
import { InitializationError } from "./errors.js";
import { createLogger, type Logger } from "./logger.js";
import type { Lab } from "./models/Lab.js";
import { AuthModule } from "./modules/auth.js";
import { LabsModule } from "./modules/labs.js";
import { SystemModule } from "./modules/system.js";
import { TokenAuth } from "./session.js";
import type { SystemInformation, TopologyFormat } from "./types.js";

export interface ClientOptions extends ConfigOverrides {
  /** Environment to fall back on; `process.env` when omitted. */
  env?: Environment;
  /** Per-request timeout in milliseconds; none when omitted. */
  timeoutMs?: number;
  fetchImpl?: typeof fetch;
  logger?: Logger;
  verbose?: boolean;
}

export class ClientLibrary {
  public readonly config: ResolvedClientConfig;
  private readonly context: LabClientContext;
  private readonly dispatcher: Agent | undefined;
  public readonly auth: AuthModule;
  public readonly labs: LabsModule;
  public readonly system: SystemModule;

  private constructor(context: LabClientContext, dispatcher: Agent | undefined) {
    this.config = context.config;
    this.context = context;
    this.dispatcher = dispatcher;
    this.auth = new AuthModule(this.context);
    this.labs = new LabsModule(this.context);
    this.system = new SystemModule(this.context);
  }

  /**
   * Resolve the configuration, then confirm the credentials with an
   * authorized `GET labs`. When that first call fails the promise rejects
   * with InitializationError if `raiseForAuthFailure` is set; otherwise a
   * warning is logged and authentication is retried on first use.
   */
  static async connect(options: ClientOptions = {}): Promise<ClientLibrary> {
    const config = resolveConfig(options, options.env ?? process.env);
    const log = createLogger(options.logger ?? console, options.verbose ?? false);
    const dispatcher = buildDispatcher(config.sslVerify);

    const http = new HttpClient({
      baseUrl: config.baseUrl,
      ...(options.timeoutMs !== undefined && { timeoutMs: options.timeoutMs }),
      ...(options.fetchImpl !== undefined && { fetchImpl: options.fetchImpl }),
      ...(dispatcher !== undefined && { dispatcher })
    });
    const auth = new TokenAuth(http, config, log);

    const client = new ClientLibrary({ config, http, auth, log }, dispatcher);
    await client.checkAuthentication();
    return client;
  }

  get url(): string {
    return this.config.baseUrl;
  }

  get username(): string {
    return this.config.username;
  }

  get password(): string {
    return this.config.password;
  }

  get sslVerify(): TlsVerify {
    return this.config.sslVerify;
  }

  importLab(topology: string, title: string, format?: TopologyFormat): Promise<Lab> {
    return this.labs.importLab(topology, title, format);
  }

  importLabFromPath(path: string, title?: string): Promise<Lab> {
    return this.labs.importLabFromPath(path, title);
  }

  waitForLldConnected(): Promise<void> {
    return this.system.waitForLldConnected();
  }

  systemInformation(): Promise<SystemInformation> {
    return this.system.systemInformation();
  }

  /** Release the TLS dispatcher, if a custom one was built. */
  async close(): Promise<void> {
    await this.dispatcher?.close();
  }

  toString(): string {
    return `ClientLibrary URL: ${this.config.baseUrl}`;
  }

  [inspect.custom](): string {
    const { url, username, password, sslVerify, allowHttp, raiseForAuthFailure } = this.config;
    const args = [url, username, password, sslVerify, allowHttp, raiseForAuthFailure].map(renderArg);
    return `ClientLibrary(${args.join(", ")})`;
  }

  private async checkAuthentication(): Promise<void> {
    try {
      await this.system.probe();
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      if (this.config.raiseForAuthFailure) {
        await this.close();
        throw new InitializationError(`unable to authenticate at ${this.config.baseUrl}: ${reason}`, {
          cause: err
        });
      }
      this.context.log.warn(
        `authentication check at ${this.config.baseUrl} failed, retrying on first use: ${reason}`
      );
    }
  }
}

function buildDispatcher(sslVerify: TlsVerify): Agent | undefined {
  try {
    return createDispatcher(sslVerify);
  } catch (err) {
    throw new InitializationError(`cannot read CA bundle "${String(sslVerify)}"`, { cause: err });
  }
}

function renderArg(value: string | boolean): string {
  if (typeof value === "boolean") return value ? "True" : "False";
  return `'${value.replace(/\\/g, "\\\\").replace(/'/g, "\\'")}'`;
}
