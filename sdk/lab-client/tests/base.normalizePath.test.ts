import { describe, it, expect } from "vitest";
import { HttpClient } from "@simlab-sdk/core";
import { ModuleBase } from "../src/base.js";
import { resolveConfig } from "../src/config.js";
import type { LabClientContext } from "../src/context.js";
import { createLogger } from "../src/logger.js";
import { TokenAuth } from "../src/session.js";
import { silentLogger } from "./fakeController.js";

// Subclass exposes the protected utilities so we can unit test them
class ExposedBase extends ModuleBase {
  public callNormalizePath(path: string): string {
    return this.normalizePath(path);
  }

  public callLabPath(labId: string, ...segments: string[]): string {
    return this.labPath(labId, ...segments);
  }
}

// Construct a fully-typed minimal context without using `any`
const config = resolveConfig({ url: "localhost", username: "test", password: "test-secret" }, {});
const http = new HttpClient({ baseUrl: config.baseUrl });
const log = createLogger(silentLogger(), false);
const ctx: LabClientContext = { config, http, auth: new TokenAuth(http, config, log), log };

describe("ModuleBase.normalizePath", () => {
  const util = new ExposedBase(ctx);

  it("removes leading slashes", () => {
    expect(util.callNormalizePath("/labs/abc")).toBe("labs/abc");
    expect(util.callNormalizePath("///labs")).toBe("labs");
  });

  it("keeps clean paths unchanged", () => {
    expect(util.callNormalizePath("labs/abc/topology")).toBe("labs/abc/topology");
  });

  it("handles root and empty inputs", () => {
    expect(util.callNormalizePath("/")).toBe("");
    expect(util.callNormalizePath("")).toBe("");
  });

  it("collapses double slashes in the middle of the path", () => {
    expect(util.callNormalizePath("labs//abc")).toBe("labs/abc");
    expect(util.callNormalizePath("///a//b///")).toBe("a/b/");
  });
});

describe("ModuleBase.labPath", () => {
  const util = new ExposedBase(ctx);

  it("joins the lab id and segments", () => {
    expect(util.callLabPath("abc", "topology")).toBe("labs/abc/topology");
  });

  it("escapes the lab id", () => {
    expect(util.callLabPath("a/b c")).toBe("labs/a%2Fb%20c");
  });
});

describe("createLogger", () => {
  it("drops debug output unless verbose", () => {
    const sink = silentLogger();
    createLogger(sink, false).debug("hidden");
    createLogger(sink, true).debug("shown");
    createLogger(sink, false).warn("always");

    expect(sink.debug).toHaveBeenCalledTimes(1);
    expect(sink.debug).toHaveBeenCalledWith("shown");
    expect(sink.warn).toHaveBeenCalledWith("always");
  });
});
