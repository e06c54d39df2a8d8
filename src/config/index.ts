import { z } from "zod";

export const configSchema = z.object({
  port: z.coerce.number().int().min(1).max(65535).default(8080),
  host: z.string().min(1).default("0.0.0.0"),
  nodeEnv: z.enum(["development", "production", "test"]).default("development"),
  logLevel: z.enum(["error", "warn", "info", "debug"]).default("info"),

  /** SQLite database file shared by every node on this host. */
  databasePath: z.string().min(1).default("./data/db/main.db"),
  /** SQL applied to the database on every boot. */
  schemaPath: z.string().min(1).default("./data/db/main.sql"),
  /** Line-oriented manifest holding the node's name, version, uuid and server label. */
  manifestPath: z.string().min(1).default("./node.toml"),

  staticDir: z.string().min(1).default("./static"),
  logsDir: z.string().min(1).default("./data/logs"),
});

export type Config = z.infer<typeof configSchema>;

export const config: Config = configSchema.parse({
  port: process.env.PORT,
  host: process.env.HOST,
  nodeEnv: process.env.NODE_ENV,
  logLevel: process.env.LOG_LEVEL,
  databasePath: process.env.DATABASE_PATH,
  schemaPath: process.env.SCHEMA_PATH,
  manifestPath: process.env.NODE_MANIFEST_PATH,
  staticDir: process.env.STATIC_DIR,
  logsDir: process.env.LOGS_DIR,
});
