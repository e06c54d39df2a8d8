import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import type { NodeIdentity } from "../identity/manifest.js";
import { DrizzleNodeRegistry, type INodeRegistry } from "../registry/node-registry.js";
import { createTestDir, openTestDb, type TestDb } from "../test/db.js";
import { createApp } from "./app.js";
import { formatUptime, type SurfaceDeps } from "./types.js";

vi.mock("../config/logger.js", () => ({
  logger: { warn: vi.fn(), info: vi.fn(), error: vi.fn(), debug: vi.fn() },
}));

const STARTED_AT = new Date("2026-03-01T10:00:00.000Z");
const NOW = new Date("2026-03-01T10:01:30.000Z");

describe("HTTP surface", () => {
  let dir: ReturnType<typeof createTestDir>;
  let t: TestDb;
  let registry: DrizzleNodeRegistry;

  function makeDeps(overrides: Partial<SurfaceDeps> = {}, identity: Partial<NodeIdentity> = {}): SurfaceDeps {
    const fullIdentity: NodeIdentity = {
      name: "widget-core",
      version: "1.0.0",
      uuid: "abc-123",
      server: "us-east",
      ...identity,
    };
    const nodeId = registry.register(fullIdentity);
    return {
      identity: fullIdentity,
      role: "parent",
      nodeId,
      registry,
      startedAt: STARTED_AT,
      now: () => NOW,
      staticDir: "./static",
      logsDir: "./data/logs",
      ...overrides,
    };
  }

  beforeEach(() => {
    dir = createTestDir("app-test-");
    t = openTestDb(dir.dbPath);
    registry = new DrizzleNodeRegistry(t.db);
  });

  afterEach(() => {
    t.sqlite.close();
    dir.cleanup();
  });

  describe("GET /health", () => {
    it("reports ok for an active node", async () => {
      const app = createApp(makeDeps());
      const res = await app.request("/health");

      expect(res.status).toBe(200);
      expect(await res.json()).toEqual({
        status: "ok",
        service: "widget-core",
        version: "1.0.0",
        nodeId: 1,
        nodeUuid: "abc-123",
        role: "parent",
        nodeStatus: "active",
        uptimeSeconds: 90,
      });
    });

    it("reports degraded once the node leaves the active status", async () => {
      const deps = makeDeps();
      registry.setStatus("abc-123", "maintenance");

      const res = await createApp(deps).request("/health");

      expect(res.status).toBe(200);
      expect(await res.json()).toMatchObject({ status: "degraded", nodeStatus: "maintenance" });
    });

    it("reports degraded when the store cannot be read", async () => {
      const failing: INodeRegistry = {
        register: vi.fn(),
        setStatus: vi.fn(),
        logEvent: vi.fn(),
        findByUuid: vi.fn(),
        listEvents: vi.fn(),
        getById: vi.fn(() => {
          throw new Error("database is locked");
        }),
      };
      const res = await createApp(makeDeps({ registry: failing })).request("/health");

      expect(res.status).toBe(200);
      expect(await res.json()).toMatchObject({ status: "degraded", nodeStatus: null });
    });
  });

  describe("GET /", () => {
    it("renders the node's identity and uptime", async () => {
      const res = await createApp(makeDeps()).request("/");
      const text = await res.text();

      expect(res.status).toBe(200);
      expect(res.headers.get("content-type")).toContain("text/html");
      expect(text).toContain("<h1>widget-core</h1>");
      expect(text).toContain("<dt>Version</dt><dd>1.0.0</dd>");
      expect(text).toContain("<dt>Node</dt><dd>#1 (parent)</dd>");
      expect(text).toContain("<dt>Uptime</dt><dd>1m 30s</dd>");
    });

    it("escapes identity values", async () => {
      const res = await createApp(makeDeps({}, { name: "<b>x</b>-core" })).request("/");
      const text = await res.text();

      expect(text).toContain("<h1>&lt;b&gt;x&lt;/b&gt;-core</h1>");
    });
  });

  describe("GET /logs", () => {
    it("lists this node's events newest first", async () => {
      const deps = makeDeps();
      registry.logEvent(deps.nodeId, "INFO", "first");
      registry.logEvent(deps.nodeId, "ERROR", "second", '{"code":7}');

      const text = await (await createApp(deps).request("/logs")).text();

      expect(text).toContain("<h1>Logs for node #1</h1>");
      expect(text.indexOf("second")).toBeLessThan(text.indexOf("first"));
      expect(text).toContain('<tr class="level-error">');
      expect(text).toContain("<td><code>{&quot;code&quot;:7}</code></td>");
    });

    it("shows a placeholder when there are no events", async () => {
      const text = await (await createApp(makeDeps()).request("/logs")).text();
      expect(text).toContain("No events recorded for this node.");
    });
  });

  describe("assets", () => {
    it("serves the favicon as image/x-icon", async () => {
      const res = await createApp(makeDeps()).request("/favicon.ico");

      expect(res.status).toBe(200);
      expect(res.headers.get("content-type")).toBe("image/x-icon");
      expect((await res.arrayBuffer()).byteLength).toBe(70);
    });

    it("returns 404 text when the favicon is missing", async () => {
      const res = await createApp(makeDeps({ staticDir: dir.dir })).request("/favicon.ico");

      expect(res.status).toBe(404);
      expect(await res.text()).toBe("Favicon not found");
    });

    it("answers the code endpoint", async () => {
      const res = await createApp(makeDeps()).request("/code");
      expect(res.status).toBe(200);
      expect(await res.text()).toBe("Code server endpoint");
    });

    it("serves files under /static", async () => {
      const res = await createApp(makeDeps()).request("/static/css/main.css");
      expect(res.status).toBe(200);
      expect(await res.text()).toContain("font-family: system-ui, sans-serif;");
    });

    it("returns JSON 404 for unknown paths", async () => {
      const res = await createApp(makeDeps()).request("/nope");
      expect(res.status).toBe(404);
      expect(await res.json()).toEqual({ error: "Not found" });
    });
  });
});

describe("formatUptime", () => {
  it("drops leading zero units", () => {
    expect(formatUptime(0)).toBe("0s");
    expect(formatUptime(59)).toBe("59s");
    expect(formatUptime(90)).toBe("1m 30s");
    expect(formatUptime(3_600)).toBe("1h 0m 0s");
  });

  it("includes days for long uptimes", () => {
    expect(formatUptime(2 * 86_400 + 3 * 3_600 + 4 * 60 + 5)).toBe("2d 3h 4m 5s");
  });
});
