import { readFile } from "node:fs/promises";
import { join } from "node:path";
import { serveStatic } from "@hono/node-server/serve-static";
import { Hono } from "hono";
import type { SurfaceDeps } from "../types.js";

export function createAssetRoutes(deps: Pick<SurfaceDeps, "staticDir" | "logsDir">): Hono {
  const routes = new Hono();

  routes.get("/favicon.ico", async (c) => {
    let content: Buffer;
    try {
      content = await readFile(join(deps.staticDir, "img", "favicon.ico"));
    } catch {
      return c.text("Favicon not found", 404);
    }
    return c.body(new Uint8Array(content), 200, { "Content-Type": "image/x-icon" });
  });

  // Placeholder kept for clients that probe it
  routes.get("/code", (c) => c.text("Code server endpoint"));

  routes.use(
    "/static/*",
    serveStatic({ root: deps.staticDir, rewriteRequestPath: (path) => path.replace(/^\/static/, "") }),
  );
  routes.use(
    "/data/logs/*",
    serveStatic({ root: deps.logsDir, rewriteRequestPath: (path) => path.replace(/^\/data\/logs/, "") }),
  );

  return routes;
}
