import { readFileSync } from "node:fs";
import type Database from "better-sqlite3";
import { logger } from "../config/logger.js";

/** Thrown when the schema file cannot be read or applied. The store is unusable. */
export class SchemaInitError extends Error {
  readonly name = "SchemaInitError" as const;
  constructor(
    readonly schemaPath: string,
    reason: string,
    options?: { cause?: unknown },
  ) {
    super(`Failed to ${reason} schema ${schemaPath}`, options);
  }
}

/**
 * Apply a SQL file to the database as a single batch.
 *
 * Runs on every boot. This function does not make the statements idempotent;
 * the schema file has to (CREATE ... IF NOT EXISTS).
 */
export function initSchema(sqlite: Database.Database, schemaPath: string): void {
  logger.info(`Loading database schema from: ${schemaPath}`);

  let sql: string;
  try {
    sql = readFileSync(schemaPath, "utf-8");
  } catch (err) {
    throw new SchemaInitError(schemaPath, "read", { cause: err });
  }

  try {
    sqlite.exec(sql);
  } catch (err) {
    throw new SchemaInitError(schemaPath, "apply", { cause: err });
  }

  logger.info("Database schema initialized successfully");
}
