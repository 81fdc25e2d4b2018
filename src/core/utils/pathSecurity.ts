/**
 * Secure path resolution for tools that touch the filesystem.
 * Every path a tool receives is resolved inside its workspace root.
 */

import path from "path";
import { PathTraversalError } from "../errors";

export const MAX_PATH_LENGTH = 1024;

/**
 * Resolve a user-supplied relative path against an absolute base directory.
 *
 * Rejects absolute paths, `..` segments (plain or percent-encoded), null bytes,
 * and anything that normalizes to a location outside `basePath`.
 *
 * @returns the absolute resolved path
 */
export function secureResolvePath(basePath: string, userPath: string): string {
  if (!path.isAbsolute(basePath)) {
    throw new Error("basePath must be an absolute path");
  }
  if (userPath.length === 0) {
    throw new PathTraversalError("empty path");
  }
  if (userPath.length > MAX_PATH_LENGTH) {
    throw new PathTraversalError(`path exceeds ${MAX_PATH_LENGTH} characters`);
  }
  if (userPath.includes("\0")) {
    throw new PathTraversalError("null bytes not allowed");
  }

  let decoded: string;
  try {
    decoded = decodeURIComponent(userPath);
  } catch {
    decoded = userPath;
  }

  if (path.isAbsolute(decoded) || /^[A-Z]:[\\/]/i.test(decoded)) {
    throw new PathTraversalError("absolute paths not allowed");
  }
  if (decoded.split(/[\\/]/).includes("..")) {
    throw new PathTraversalError("traversal sequences not allowed");
  }

  const root = path.resolve(basePath);
  const resolved = path.resolve(root, decoded);
  const relative = path.relative(root, resolved);
  if (relative.startsWith("..") || path.isAbsolute(relative)) {
    throw new PathTraversalError("path resolves outside the workspace");
  }
  return resolved;
}
