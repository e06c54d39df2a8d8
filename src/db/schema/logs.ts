import { sql } from "drizzle-orm";
import { index, integer, sqliteTable, text } from "drizzle-orm/sqlite-core";
import { system } from "./system.js";

export const logs = sqliteTable(
  "logs",
  {
    id: integer("id").primaryKey({ autoIncrement: true }),
    serverId: integer("server_id")
      .notNull()
      .references(() => system.id, { onDelete: "cascade" }),
    /** DEBUG | INFO | WARN | ERROR | FATAL */
    logLevel: text("log_level").notNull(),
    message: text("message").notNull(),
    createdAt: text("created_at").notNull().default(sql`(datetime('now'))`),
    /** JSON payload, "{}" when the event carries none */
    content: text("content").notNull().default("{}"),
  },
  (table) => [
    index("idx_logs_server").on(table.serverId),
    index("idx_logs_level").on(table.logLevel),
    index("idx_logs_created").on(table.createdAt),
  ],
);
