import { Hono } from "hono";
import { logger } from "../../config/logger.js";
import type { SurfaceDeps } from "../types.js";
import { uptimeSeconds } from "../types.js";

/**
 * Public, unauthenticated health check for load balancers and monitoring.
 *
 * "ok" only while this node's row exists and is active; a store that cannot
 * be read reports "degraded" rather than failing the probe.
 */
export function createHealthRoutes(deps: SurfaceDeps): Hono {
  const routes = new Hono();

  routes.get("/", (c) => {
    let nodeStatus: string | null = null;
    try {
      nodeStatus = deps.registry.getById(deps.nodeId)?.status ?? null;
    } catch (err) {
      logger.warn("Health check could not read node status", {
        nodeId: deps.nodeId,
        error: err instanceof Error ? err.message : String(err),
      });
    }

    return c.json({
      status: nodeStatus === "active" ? "ok" : "degraded",
      service: deps.identity.name,
      version: deps.identity.version,
      nodeId: deps.nodeId,
      nodeUuid: deps.identity.uuid,
      role: deps.role,
      nodeStatus,
      uptimeSeconds: uptimeSeconds(deps),
    });
  });

  return routes;
}
