/**
 * .liftmine.yml loader (v1, frozen schema).
 * Command-line flags may override the values after loading.
 */

import { readFileSync, existsSync } from "fs";
import { join } from "path";
import { parse } from "yaml";

export const CONFIG_FILE = ".liftmine.yml";

const ALLOWED_KEYS = new Set(["pruneThreshold", "top", "maxFiles", "ignore"]);
const DEFAULT_PRUNE_THRESHOLD = 1;
const DEFAULT_TOP = 10;
const DEFAULT_MAX_FILES = 5000;
const MAX_PRUNE_THRESHOLD = 1_000_000;
const MIN_TOP = 1;
const MAX_TOP = 1000;
const MIN_MAX_FILES = 1;
const MAX_MAX_FILES = 100_000;

export interface LiftmineConfig {
  /** Joint cells with a count at or below this are pruned before ranking. */
  pruneThreshold: number;
  /** Lifts kept per column in the report. */
  top: number;
  maxFiles: number;
  ignore: string[];
}

export function defaultConfig(): LiftmineConfig {
  return { pruneThreshold: DEFAULT_PRUNE_THRESHOLD, top: DEFAULT_TOP, maxFiles: DEFAULT_MAX_FILES, ignore: [] };
}

function isPlainObject(v: unknown): v is Record<string, unknown> {
  return v !== null && typeof v === "object" && !Array.isArray(v);
}

function readInteger(obj: Record<string, unknown>, key: string, min: number, max: number, fallback: number): number {
  if (obj[key] === undefined) return fallback;
  const n = Number(obj[key]);
  if (!Number.isInteger(n) || n < min || n > max) {
    throw new Error(`${CONFIG_FILE}: ${key} must be an integer between ${min} and ${max}`);
  }
  return n;
}

/**
 * Load and validate .liftmine.yml from the mined root.
 * Unknown keys or invalid values → throw (caller exits 2).
 * Missing file → defaults.
 */
export function loadLiftmineConfig(root: string): LiftmineConfig {
  const path = join(root, CONFIG_FILE);
  if (!existsSync(path)) return defaultConfig();

  let raw: unknown;
  try {
    raw = parse(readFileSync(path, "utf8"));
  } catch (err) {
    const msg = err instanceof Error ? err.message : String(err);
    throw new Error(`${CONFIG_FILE}: invalid YAML — ${msg}`);
  }

  if (raw === null || raw === undefined) return defaultConfig();
  if (!isPlainObject(raw)) {
    throw new Error(`${CONFIG_FILE}: root must be an object`);
  }

  const obj = raw;

  for (const key of Object.keys(obj)) {
    if (!ALLOWED_KEYS.has(key)) {
      throw new Error(`${CONFIG_FILE}: unknown key "${key}" (v1 schema is frozen)`);
    }
  }

  const ignore: string[] = [];
  if (obj.ignore !== undefined) {
    if (!Array.isArray(obj.ignore)) {
      throw new Error(`${CONFIG_FILE}: ignore must be an array of path fragments`);
    }
    obj.ignore.forEach((v: unknown, i) => {
      if (typeof v !== "string") {
        throw new Error(`${CONFIG_FILE}: ignore[${i}] must be a string`);
      }
      ignore.push(v);
    });
  }

  return {
    pruneThreshold: readInteger(obj, "pruneThreshold", 0, MAX_PRUNE_THRESHOLD, DEFAULT_PRUNE_THRESHOLD),
    top: readInteger(obj, "top", MIN_TOP, MAX_TOP, DEFAULT_TOP),
    maxFiles: readInteger(obj, "maxFiles", MIN_MAX_FILES, MAX_MAX_FILES, DEFAULT_MAX_FILES),
    ignore,
  };
}
