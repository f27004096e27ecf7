/**
 * Workspace containment for paths received from MCP clients.
 */
import path from "node:path";
import { FormatIoError } from "./errors.js";

export function resolveWorkspaceRoot(root: string | undefined): string | null {
  return root ? path.resolve(root) : null;
}

export function ensureInsideWorkspace(p: string, root: string | null): string {
  const abs = root ? path.resolve(root, p) : path.resolve(p);
  if (!root) return abs;
  const normAbs = path.normalize(abs);
  const normRoot = path.normalize(root);
  // Windows paths compare case-insensitively
  const a = process.platform === "win32" ? normAbs.toLowerCase() : normAbs;
  const b = process.platform === "win32" ? normRoot.toLowerCase() : normRoot;
  if (a === b || a.startsWith(b.endsWith(path.sep) ? b : b + path.sep)) return abs;
  throw new FormatIoError("outside-workspace", abs, `Path escapes workspace root: ${abs} (root=${root})`);
}
