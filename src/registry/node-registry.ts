import { desc, eq } from "drizzle-orm";
import { logger } from "../config/logger.js";
import type { DrizzleDb } from "../db/index.js";
import { logs, system } from "../db/schema/index.js";
import type { NodeIdentity } from "../identity/manifest.js";
import { classifyRole } from "../identity/role.js";

export type SystemNode = typeof system.$inferSelect;
export type LogEvent = typeof logs.$inferSelect;

export const NODE_STATUSES = ["active", "inactive", "maintenance", "error"] as const;
export type NodeStatus = (typeof NODE_STATUSES)[number];

export const LOG_LEVELS = ["DEBUG", "INFO", "WARN", "ERROR", "FATAL"] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

/** Snapshot stored in `system.main_state` at first registration. */
export interface MainState {
  version: string;
  server: string;
  /** RFC 3339, UTC */
  started_at: string;
}

const DEFAULT_EVENT_LIMIT = 100;
const MAX_EVENT_LIMIT = 500;

/**
 * Thrown when another process registered the same uuid between our lookup
 * and our insert. The unique index on node_uuid is what catches it.
 */
export class NodeRegistrationConflictError extends Error {
  readonly name = "NodeRegistrationConflictError" as const;
  constructor(
    readonly nodeUuid: string,
    options?: { cause?: unknown },
  ) {
    super(`Node ${nodeUuid} was registered concurrently by another process`, options);
  }
}

/** True for a SQLite UNIQUE violation, whether or not the driver error was wrapped. */
function isUniqueViolation(err: unknown): boolean {
  let current: unknown = err;
  while (typeof current === "object" && current !== null) {
    if ("code" in current && current.code === "SQLITE_CONSTRAINT_UNIQUE") return true;
    current = "cause" in current ? current.cause : undefined;
  }
  return false;
}

export interface INodeRegistry {
  /** Ensure exactly one row exists for the identity's uuid and return its id. */
  register(identity: NodeIdentity): number;
  /** Returns the number of rows updated; 0 for an unknown uuid. */
  setStatus(nodeUuid: string, status: NodeStatus): number;
  logEvent(serverId: number, level: LogLevel, message: string, content?: string): void;
  findByUuid(nodeUuid: string): SystemNode | null;
  getById(id: number): SystemNode | null;
  listEvents(serverId: number, limit?: number): LogEvent[];
}

export class DrizzleNodeRegistry implements INodeRegistry {
  constructor(
    private readonly db: DrizzleDb,
    private readonly now: () => Date = () => new Date(),
  ) {}

  register(identity: NodeIdentity): number {
    const role = classifyRole(identity.name);

    // First write wins: a known uuid is never updated, even if name or version changed.
    const existing = this.findByUuid(identity.uuid);
    if (existing) {
      logger.info(`Node already registered: ${existing.serverName} (ID: ${existing.id})`, {
        nodeUuid: identity.uuid,
      });
      return existing.id;
    }

    const mainState: MainState = {
      version: identity.version,
      server: identity.server,
      started_at: this.now().toISOString(),
    };

    let inserted: { id: number };
    try {
      inserted = this.db
        .insert(system)
        .values({
          nodeUuid: identity.uuid,
          node: role,
          serverName: identity.name,
          mainState: JSON.stringify(mainState),
        })
        .returning({ id: system.id })
        .get();
    } catch (err) {
      if (isUniqueViolation(err)) throw new NodeRegistrationConflictError(identity.uuid, { cause: err });
      throw err;
    }

    logger.info(`Registered new ${role} node: ${identity.name} (ID: ${inserted.id})`, { nodeUuid: identity.uuid });
    return inserted.id;
  }

  setStatus(nodeUuid: string, status: NodeStatus): number {
    const result = this.db.update(system).set({ status }).where(eq(system.nodeUuid, nodeUuid)).run();
    if (result.changes === 0) {
      logger.warn(`Status update for unknown node ${nodeUuid} matched no rows`, { nodeUuid, status });
    } else {
      logger.info(`Node ${nodeUuid} status set to: ${status}`);
    }
    return result.changes;
  }

  logEvent(serverId: number, level: LogLevel, message: string, content?: string): void {
    this.db
      .insert(logs)
      .values({ serverId, logLevel: level, message, content: content ?? "{}" })
      .run();
  }

  findByUuid(nodeUuid: string): SystemNode | null {
    return this.db.select().from(system).where(eq(system.nodeUuid, nodeUuid)).get() ?? null;
  }

  getById(id: number): SystemNode | null {
    return this.db.select().from(system).where(eq(system.id, id)).get() ?? null;
  }

  /** Newest first. */
  listEvents(serverId: number, limit?: number): LogEvent[] {
    const n = Math.min(Math.max(1, limit ?? DEFAULT_EVENT_LIMIT), MAX_EVENT_LIMIT);
    return this.db.select().from(logs).where(eq(logs.serverId, serverId)).orderBy(desc(logs.id)).limit(n).all();
  }
}
