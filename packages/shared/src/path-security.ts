import * as path from "node:path"

/**
 * Checks if a resolved path is inside (or equal to) a root directory.
 * Both arguments must already be absolute.
 *
 * @example
 * isPathWithinRoot("/work/web", "/work") // true
 * isPathWithinRoot("/workspace", "/work") // false
 */
export function isPathWithinRoot(resolvedPath: string, root: string): boolean {
  if (resolvedPath === root) return true
  const prefix = root.endsWith(path.sep) ? root : root + path.sep
  return resolvedPath.startsWith(prefix)
}

/**
 * Result of resolving a workspace-relative path
 */
export type RootedPath =
  | { valid: true; absolutePath: string; relativePath: string }
  | { valid: false; absolutePath: string; error: string }

/**
 * Resolve `target` against `root` and make sure it stays inside `root`.
 * `relativePath` uses forward slashes so it can be reused on the remote side.
 *
 * @example
 * resolveWithinRoot("/work", "./web") // { valid: true, absolutePath: "/work/web", relativePath: "web" }
 * resolveWithinRoot("/work", "../etc") // { valid: false, ... }
 */
export function resolveWithinRoot(root: string, target: string): RootedPath {
  const resolvedRoot = path.resolve(root)
  const absolutePath = path.resolve(resolvedRoot, target)

  if (!isPathWithinRoot(absolutePath, resolvedRoot) || absolutePath === resolvedRoot) {
    return { valid: false, absolutePath, error: `Path escapes workspace: ${target}` }
  }

  const relativePath = path.relative(resolvedRoot, absolutePath).split(path.sep).join("/")
  return { valid: true, absolutePath, relativePath }
}
