/**
 * Path helpers shared by the renderer and the orchestrator
 */

import * as path from "node:path";
import { PathTraversalError } from "./errors.js";

/**
 * Absolute path of a relative POSIX path under root
 * @throws PathTraversalError when the path leaves root
 */
export function resolveInside(root: string, relativePath: string): string {
  const base = path.resolve(root);
  const resolved = path.resolve(base, ...relativePath.split("/"));
  const fromBase = path.relative(base, resolved);
  if (
    fromBase === "" ||
    fromBase === ".." ||
    fromBase.startsWith(`..${path.sep}`) ||
    path.isAbsolute(fromBase)
  ) {
    throw new PathTraversalError(relativePath, base);
  }
  return resolved;
}
