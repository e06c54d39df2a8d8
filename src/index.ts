import { serve } from "@hono/node-server";
import { createApp } from "./api/app.js";
import { bootNode, type NodeContext, shutdownNode } from "./boot.js";
import { config } from "./config/index.js";
import { logger } from "./config/logger.js";
import { installProcessHandlers } from "./process-handlers.js";

installProcessHandlers();

// No HTTP surface without a registered node: any boot failure exits non-zero.
function bootOrExit(): NodeContext {
  try {
    return bootNode({
      databasePath: config.databasePath,
      schemaPath: config.schemaPath,
      manifestPath: config.manifestPath,
    });
  } catch (err) {
    logger.error("Node failed to boot", {
      error: err instanceof Error ? err.message : String(err),
      cause: err instanceof Error && err.cause instanceof Error ? err.cause.message : undefined,
      stack: err instanceof Error ? err.stack : undefined,
    });
    process.exit(1);
  }
}

const ctx = bootOrExit();

const app = createApp({
  identity: ctx.identity,
  role: ctx.role,
  nodeId: ctx.nodeId,
  registry: ctx.registry,
  startedAt: ctx.startedAt,
  staticDir: config.staticDir,
  logsDir: config.logsDir,
});

const server = serve({ fetch: app.fetch, port: config.port, hostname: config.host }, (info) => {
  logger.info(`Server listening on http://${config.host}:${info.port}`);
  ctx.registry.logEvent(ctx.nodeId, "INFO", "Node started", JSON.stringify({ port: info.port }));
});

function shutdown(signal: string): void {
  logger.info(`Received ${signal}, shutting down`);
  server.close(() => {
    try {
      shutdownNode(ctx);
    } catch (err) {
      logger.error("Failed to record shutdown", { error: err instanceof Error ? err.message : String(err) });
      process.exit(1);
    }
    process.exit(0);
  });
}

process.on("SIGTERM", () => shutdown("SIGTERM"));
process.on("SIGINT", () => shutdown("SIGINT"));
