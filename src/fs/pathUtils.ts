import { normalize, relative, sep } from "path";

/**
 * Normalize path separators to forward slashes for deterministic cross-platform output.
 */
export function normalizeSeparators(p: string): string {
  return normalize(p).split(sep).join("/");
}

/** Root-relative path with forward slashes, as written into reports and matched against ignore fragments. */
export function toPosixRelative(root: string, absPath: string): string {
  return normalizeSeparators(relative(root, absPath));
}
