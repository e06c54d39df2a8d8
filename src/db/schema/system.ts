import { sql } from "drizzle-orm";
import { index, integer, sqliteTable, text } from "drizzle-orm/sqlite-core";

/**
 * System table: one row per node that has ever booted against this store.
 * Mirrors `system` in data/db/main.sql, which is what actually creates it.
 */
export const system = sqliteTable(
  "system",
  {
    /** Surrogate key handed to the rest of the process as the node id */
    id: integer("id").primaryKey({ autoIncrement: true }),
    /** Package name at first registration */
    serverName: text("server_name").notNull(),
    /** Role: parent | child */
    node: text("node").notNull(),
    /** Natural key read from the node manifest */
    nodeUuid: text("node_uuid").notNull().unique(),
    /** Lifecycle status: active | inactive | maintenance | error */
    status: text("status").notNull().default("active"),
    createdAt: text("created_at").notNull().default(sql`(datetime('now'))`),
    /** JSON snapshot {version, server, started_at}, written once */
    mainState: text("main_state").notNull().default("{}"),
  },
  (table) => [
    index("idx_system_node").on(table.node),
    index("idx_system_status").on(table.status),
    index("idx_system_uuid").on(table.nodeUuid),
    index("idx_system_server_name").on(table.serverName),
  ],
);
