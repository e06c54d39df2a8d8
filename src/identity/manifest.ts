import { randomUUID } from "node:crypto";
import { readFileSync, writeFileSync } from "node:fs";
import { logger } from "../config/logger.js";

/** Who this process is, as read from the manifest file. */
export interface NodeIdentity {
  name: string;
  version: string;
  /** Stable across restarts once written back to the manifest. */
  uuid: string;
  /** Server or cluster label. */
  server: string;
}

export type PatchResult = "patched" | "no-uuid-line";

export interface LoadIdentityOptions {
  generateUuid?: () => string;
}

/** Thrown when the manifest cannot be read. Boot cannot continue without an identity. */
export class ManifestReadError extends Error {
  readonly name = "ManifestReadError" as const;
  constructor(
    readonly manifestPath: string,
    options?: { cause?: unknown },
  ) {
    super(`Failed to read node manifest at ${manifestPath}`, options);
  }
}

/** Thrown when a generated uuid cannot be written back to the manifest. */
export class ManifestWriteError extends Error {
  readonly name = "ManifestWriteError" as const;
  constructor(
    readonly manifestPath: string,
    options?: { cause?: unknown },
  ) {
    super(`Failed to patch uuid into node manifest at ${manifestPath}`, options);
  }
}

const IDENTITY_KEYS = ["name", "version", "uuid", "server"] as const;
type IdentityKey = (typeof IDENTITY_KEYS)[number];

function splitLines(content: string): string[] {
  const lines = content.split(/\r?\n/);
  if (lines.length > 0 && lines[lines.length - 1] === "") lines.pop();
  return lines;
}

/** Text between the first pair of double quotes, or "" when the line has none. */
function quotedValue(line: string): string {
  return line.split('"')[1] ?? "";
}

/**
 * Scan `key = "value"` lines for the identity fields.
 *
 * This is deliberately not a TOML parser: lines are trimmed, the first line
 * per key wins, and keys that never appear come back as "".
 */
export function readIdentity(manifestPath: string): NodeIdentity {
  let content: string;
  try {
    content = readFileSync(manifestPath, "utf-8");
  } catch (err) {
    throw new ManifestReadError(manifestPath, { cause: err });
  }

  const found = new Map<IdentityKey, string>();
  for (const raw of splitLines(content)) {
    const line = raw.trim();
    for (const key of IDENTITY_KEYS) {
      if (!found.has(key) && line.startsWith(`${key} =`)) {
        found.set(key, quotedValue(line));
      }
    }
  }

  return {
    name: found.get("name") ?? "",
    version: found.get("version") ?? "",
    uuid: found.get("uuid") ?? "",
    server: found.get("server") ?? "",
  };
}

/**
 * Rewrite every `uuid = "..."` line in place, keeping its leading whitespace
 * and every other line verbatim. A manifest without a uuid line is left as
 * is; the caller decides how loudly to report that.
 */
export function patchManifestUuid(manifestPath: string, uuid: string): PatchResult {
  let content: string;
  try {
    content = readFileSync(manifestPath, "utf-8");
  } catch (err) {
    throw new ManifestWriteError(manifestPath, { cause: err });
  }

  let patched = false;
  const out = splitLines(content).map((line) => {
    if (!line.trim().startsWith("uuid =")) return line;
    patched = true;
    const indent = line.slice(0, line.length - line.trimStart().length);
    return `${indent}uuid = "${uuid}"`;
  });

  if (!patched) return "no-uuid-line";

  try {
    writeFileSync(manifestPath, out.map((line) => `${line}\n`).join(""));
  } catch (err) {
    throw new ManifestWriteError(manifestPath, { cause: err });
  }
  return "patched";
}

/**
 * Read the node identity, generating and persisting a uuid on first run.
 *
 * Failing to persist is not fatal: the process keeps the generated uuid in
 * memory, but the next boot will generate a different one.
 */
export function loadIdentity(manifestPath: string, options: LoadIdentityOptions = {}): NodeIdentity {
  const identity = readIdentity(manifestPath);
  if (identity.uuid) return identity;

  const uuid = (options.generateUuid ?? randomUUID)();
  logger.info(`No uuid found in ${manifestPath}, generated new uuid: ${uuid}`, { uuid });

  try {
    const result = patchManifestUuid(manifestPath, uuid);
    if (result === "patched") {
      logger.info(`Patched uuid into ${manifestPath}: ${uuid}`, { uuid });
    } else {
      logger.warn(`No 'uuid =' line in ${manifestPath}; uuid was NOT persisted and will change on restart`, {
        uuid,
        hint: `add the line: uuid = "${uuid}"`,
      });
    }
  } catch (err) {
    logger.error(`Failed to patch uuid into ${manifestPath}`, {
      error: err instanceof Error ? (err.cause instanceof Error ? err.cause.message : err.message) : String(err),
    });
    logger.error(`Please manually add: uuid = "${uuid}"`, { uuid });
  }

  return { ...identity, uuid };
}
