import { Hono } from "hono";
import { secureHeaders } from "hono/secure-headers";
import { logger } from "../config/logger.js";
import { createAssetRoutes } from "./routes/assets.js";
import { createHealthRoutes } from "./routes/health.js";
import { createPageRoutes } from "./routes/pages.js";
import type { SurfaceDeps } from "./types.js";

export const errorHandler: Parameters<Hono["onError"]>[0] = (err, c) => {
  logger.error("Unhandled error in request", {
    error: err.message,
    stack: err.stack,
    path: c.req.path,
    method: c.req.method,
  });

  return c.json(
    {
      error: "Internal server error",
      message: "An unexpected error occurred while processing your request",
    },
    500,
  );
};

/**
 * Build the HTTP surface around an already registered node.
 *
 * Routes:
 *   GET /             landing page
 *   GET /logs         events this node recorded in the store
 *   GET /health       JSON health for load balancers
 *   GET /favicon.ico
 *   GET /code
 *   /static/*         files under staticDir
 *   /data/logs/*      files under logsDir
 */
export function createApp(deps: SurfaceDeps): Hono {
  const app = new Hono();

  app.use("/*", secureHeaders());

  app.route("/health", createHealthRoutes(deps));
  app.route("/", createPageRoutes(deps));
  app.route("/", createAssetRoutes(deps));

  app.notFound((c) => c.json({ error: "Not found" }, 404));
  app.onError(errorHandler);

  return app;
}
