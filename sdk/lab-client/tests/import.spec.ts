import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { ClientLibrary, LabState } from "../src/index.js";
import { importEndpoint, topologyFormatFor } from "../src/topology.js";
import { FakeController, silentLogger } from "./fakeController.js";

const JSON_TOPOLOGY = '{"nodes": [], "links": [], "interfaces": []}';
const VIRL_TOPOLOGY = "<?xml version='1.0' encoding='UTF-8'?>";

function controllerFor(title: string): FakeController {
  return new FakeController()
    .on("POST", "authenticate", { body: "test-token" })
    .on("GET", "labs", { body: [] })
    .on("POST", "import", { body: { id: "lab-1" } })
    .on("POST", "import/virl-1x", { body: { id: "lab-1" } })
    .on("GET", "labs/lab-1", {
      body: { id: "lab-1", lab_title: title, state: LabState.Defined, node_count: 0, link_count: 0 }
    })
    .on("GET", "labs/lab-1/topology", { body: { nodes: [], links: [] } });
}

function connect(controller: FakeController, logger = silentLogger()): Promise<ClientLibrary> {
  return ClientLibrary.connect({
    url: "http://0.0.0.0/fake_url/",
    username: "test",
    password: "pa$$",
    env: {},
    fetchImpl: controller.fetch,
    logger
  });
}

describe("importLabFromPath", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "lab-import-"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("posts a .ng file unmodified to the JSON importer", async () => {
    const path = join(dir, "topology.ng");
    writeFileSync(path, JSON_TOPOLOGY);
    const controller = controllerFor("topology.ng");
    const client = await connect(controller);

    const lab = await client.importLabFromPath(path);

    const imports = controller.calls.filter((call) => call.method === "POST" && call.route.startsWith("import"));
    expect(imports).toHaveLength(1);
    expect(imports[0]?.url).toBe(
      "https://0.0.0.0/fake_url/api/v0/import?is_json=true&title=topology.ng"
    );
    expect(imports[0]?.body).toBe(JSON_TOPOLOGY);
    expect(lab.id).toBe("lab-1");
    expect(lab.title).toBe("topology.ng");
    expect(lab.labBaseUrl).toBe("https://0.0.0.0/fake_url/api/v0/labs/lab-1/");
  });

  it("posts a .virl file to the legacy importer", async () => {
    const path = join(dir, "topology.virl");
    writeFileSync(path, VIRL_TOPOLOGY);
    const controller = controllerFor("topology.virl");
    const client = await connect(controller);

    const lab = await client.importLabFromPath(path);

    const imports = controller.calls.filter((call) => call.method === "POST" && call.route.startsWith("import"));
    expect(imports).toHaveLength(1);
    expect(imports[0]?.url).toBe("https://0.0.0.0/fake_url/api/v0/import/virl-1x?title=topology.virl");
    expect(imports[0]?.body).toBe(VIRL_TOPOLOGY);
    expect(lab.labBaseUrl.startsWith("https://0.0.0.0/fake_url/api/v0/labs/")).toBe(true);
  });

  it("syncs the new lab once", async () => {
    const path = join(dir, "topology.ng");
    writeFileSync(path, JSON_TOPOLOGY);
    const controller = controllerFor("topology.ng");
    const client = await connect(controller);

    const lab = await client.importLabFromPath(path);

    expect(controller.trace().slice(2)).toEqual([
      "POST import",
      "GET labs/lab-1",
      "GET labs/lab-1/topology"
    ]);
    expect(lab.labState).toBe(LabState.Defined);
  });

  it("sends other extensions to the YAML importer with an explicit title", async () => {
    const path = join(dir, "core.yaml");
    writeFileSync(path, "lab:\n  title: core\n");
    const controller = controllerFor("My Lab");
    const client = await connect(controller);

    await client.importLabFromPath(path, "My Lab");

    expect(controller.calls[2]?.url).toBe("https://0.0.0.0/fake_url/api/v0/import?title=My+Lab");
    expect(controller.calls[2]?.body).toBe("lab:\n  title: core\n");
  });

  it("logs import warnings", async () => {
    const path = join(dir, "topology.ng");
    writeFileSync(path, JSON_TOPOLOGY);
    const controller = controllerFor("topology.ng");
    controller.replace("POST", "import", { body: { id: "lab-1", warnings: ["unknown node definition"] } });
    const logger = silentLogger();
    const client = await connect(controller, logger);

    await client.importLabFromPath(path);

    expect(logger.warn).toHaveBeenCalledWith('import of "topology.ng": unknown node definition');
  });

  it("propagates a read failure without contacting the importer", async () => {
    const controller = controllerFor("missing.ng");
    const client = await connect(controller);

    await expect(client.importLabFromPath(join(dir, "missing.ng"))).rejects.toMatchObject({
      code: "ENOENT"
    });
    expect(controller.trace()).toEqual(["POST authenticate", "GET labs"]);
  });

  it("surfaces a rejected import", async () => {
    const path = join(dir, "topology.ng");
    writeFileSync(path, JSON_TOPOLOGY);
    const controller = controllerFor("topology.ng");
    controller.replace("POST", "import", { status: 400, body: { description: "bad topology" } });
    const client = await connect(controller);

    await expect(client.importLabFromPath(path)).rejects.toMatchObject({
      status: 400,
      body: { description: "bad topology" }
    });
  });
});

describe("topology helpers", () => {
  it("classifies by extension", () => {
    expect(topologyFormatFor("/tmp/a.ng")).toBe("json");
    expect(topologyFormatFor("/tmp/a.VIRL")).toBe("virl-1x");
    expect(topologyFormatFor("/tmp/a.yaml")).toBe("yaml");
    expect(topologyFormatFor("/tmp/noext")).toBe("yaml");
  });

  it("puts is_json before the title", () => {
    expect(importEndpoint("json", "t")).toEqual({ path: "import", query: { is_json: true, title: "t" } });
    expect(importEndpoint("virl-1x", "t")).toEqual({ path: "import/virl-1x", query: { title: "t" } });
  });
});
