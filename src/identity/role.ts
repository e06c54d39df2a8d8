import { logger } from "../config/logger.js";

export const NODE_ROLES = ["parent", "child"] as const;

export type NodeRole = (typeof NODE_ROLES)[number];

/**
 * Derive a node's role from its package name.
 *
 * `*core` names are parents and `*child` names are children. Anything else
 * falls back to parent; the warning is the only signal an operator gets that
 * the naming convention was broken, so keep it.
 */
export function classifyRole(name: string): NodeRole {
  if (name.endsWith("core")) return "parent";
  if (name.endsWith("child")) return "child";

  logger.warn(`Package name '${name}' doesn't end in 'core' or 'child', defaulting to parent`, { name });
  return "parent";
}

export function isNodeRole(value: string): value is NodeRole {
  return (NODE_ROLES as readonly string[]).includes(value);
}
