import type { NodeIdentity } from "../identity/manifest.js";
import type { NodeRole } from "../identity/role.js";
import type { INodeRegistry } from "../registry/node-registry.js";

/** What boot hands to the HTTP surface. Nothing here is looked up globally. */
export interface SurfaceDeps {
  identity: NodeIdentity;
  role: NodeRole;
  nodeId: number;
  registry: INodeRegistry;
  startedAt: Date;
  staticDir: string;
  logsDir: string;
  now?: () => Date;
}

export function uptimeSeconds(deps: Pick<SurfaceDeps, "startedAt" | "now">): number {
  const now = deps.now ? deps.now() : new Date();
  return Math.max(0, Math.floor((now.getTime() - deps.startedAt.getTime()) / 1000));
}

/** "2d 3h 4m 5s", dropping leading zero units. */
export function formatUptime(totalSeconds: number): string {
  const days = Math.floor(totalSeconds / 86_400);
  const hours = Math.floor((totalSeconds % 86_400) / 3_600);
  const minutes = Math.floor((totalSeconds % 3_600) / 60);
  const seconds = totalSeconds % 60;

  const parts: string[] = [];
  if (days > 0) parts.push(`${days}d`);
  if (days > 0 || hours > 0) parts.push(`${hours}h`);
  if (days > 0 || hours > 0 || minutes > 0) parts.push(`${minutes}m`);
  parts.push(`${seconds}s`);
  return parts.join(" ");
}
