import { mkdirSync } from "node:fs";
import { dirname } from "node:path";
import Database from "better-sqlite3";
import { logger } from "./config/logger.js";
import { applyPlatformPragmas, createDb, type DrizzleDb, initSchema } from "./db/index.js";
import { type LoadIdentityOptions, loadIdentity, type NodeIdentity } from "./identity/manifest.js";
import { isNodeRole, type NodeRole } from "./identity/role.js";
import { DrizzleNodeRegistry, type INodeRegistry } from "./registry/node-registry.js";

export interface BootOptions extends LoadIdentityOptions {
  databasePath: string;
  schemaPath: string;
  manifestPath: string;
}

/** Everything the HTTP surface needs about this node, built once at startup. */
export interface NodeContext {
  sqlite: Database.Database;
  db: DrizzleDb;
  identity: NodeIdentity;
  role: NodeRole;
  nodeId: number;
  registry: INodeRegistry;
  startedAt: Date;
}

/**
 * Open the store, apply the schema, resolve this node's identity and register it.
 *
 * Any failure closes the database and rethrows: the caller must not serve
 * traffic without a registered node.
 */
export function bootNode(options: BootOptions): NodeContext {
  const startedAt = new Date();

  mkdirSync(dirname(options.databasePath), { recursive: true });
  const sqlite = new Database(options.databasePath);

  try {
    applyPlatformPragmas(sqlite);
    initSchema(sqlite, options.schemaPath);
    const db = createDb(sqlite);

    const identity = loadIdentity(options.manifestPath, { generateUuid: options.generateUuid });
    logger.info(`Package: ${identity.name} v${identity.version}`);
    logger.info(`Node UUID: ${identity.uuid}`);

    const registry = new DrizzleNodeRegistry(db);
    const nodeId = registry.register(identity);
    logger.info(`Node operational with ID: ${nodeId}`);

    // The stored role, not a fresh classification: the first registration wins.
    const stored = registry.getById(nodeId)?.node ?? "";
    const role: NodeRole = isNodeRole(stored) ? stored : "parent";

    return { sqlite, db, identity, role, nodeId, registry, startedAt };
  } catch (err) {
    sqlite.close();
    throw err;
  }
}

/** Mark the node inactive, record the shutdown and close the store. */
export function shutdownNode(ctx: NodeContext): void {
  try {
    ctx.registry.setStatus(ctx.identity.uuid, "inactive");
    ctx.registry.logEvent(ctx.nodeId, "INFO", "Node shutting down");
  } finally {
    ctx.sqlite.close();
  }
}
