import { readdirSync } from "fs";
import { join, resolve } from "path";
import { stringCompareBinary } from "../determinism/CanonicalOrder.js";
import { toPosixRelative } from "./pathUtils.js";

const IGNORE_DIRS = new Set(["node_modules", "dist", "build", "coverage", ".git", ".next"]);
const SOURCE_PATTERN = /\.(ts|tsx)$/;
const DECLARATION_PATTERN = /\.d\.ts$/;

/**
 * Every .ts/.tsx file under root (declaration files excluded), as absolute
 * paths in binary order. A file is skipped when its root-relative path
 * contains one of the `ignore` fragments.
 */
export function listSourceFiles(root: string, ignore: string[] = []): string[] {
  const absRoot = resolve(root);
  const out: string[] = [];

  function walk(dir: string): void {
    for (const entry of readdirSync(dir, { withFileTypes: true })) {
      const abs = join(dir, entry.name);
      if (entry.isDirectory()) {
        if (!IGNORE_DIRS.has(entry.name)) walk(abs);
        continue;
      }
      if (!entry.isFile()) continue;
      if (!SOURCE_PATTERN.test(entry.name) || DECLARATION_PATTERN.test(entry.name)) continue;
      const rel = toPosixRelative(absRoot, abs);
      if (ignore.some((fragment) => rel.includes(fragment))) continue;
      out.push(abs);
    }
  }

  walk(absRoot);
  return out.sort((a, b) => stringCompareBinary(a, b));
}
