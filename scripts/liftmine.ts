/**
 * liftmine CLI: mine call/statement associations from a TypeScript tree.
 * Flags override .liftmine.yml. Exit 0 on success, 2 on any failure.
 */

import { resolve } from "path";
import { loadLiftmineConfig } from "../src/config/liftmineYaml.js";
import type { LiftmineConfig } from "../src/config/liftmineYaml.js";
import { runMine } from "../src/mine/runMine.js";
import type { MineOptions } from "../src/mine/types.js";

interface CliArgs {
  root: string;
  options: MineOptions;
  overrides: Partial<Pick<LiftmineConfig, "top" | "pruneThreshold">>;
}

function parseInteger(flag: string, value: string, min: number): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < min) {
    throw new Error(`${flag} must be an integer of at least ${min}, got "${value}"`);
  }
  return n;
}

function parseArgs(argv: string[]): CliArgs {
  let root = ".";
  const options: MineOptions = {};
  const overrides: CliArgs["overrides"] = {};

  for (let i = 0; i < argv.length; i++) {
    const next = argv[i + 1];
    if (argv[i] === "--root" && next) {
      root = next;
      i++;
    } else if (argv[i] === "--out" && next) {
      options.reportPath = next;
      i++;
    } else if (argv[i] === "--snapshot" && next) {
      options.snapshotPath = next;
      i++;
    } else if (argv[i] === "--top" && next) {
      overrides.top = parseInteger("--top", next, 1);
      i++;
    } else if (argv[i] === "--prune" && next) {
      overrides.pruneThreshold = parseInteger("--prune", next, 0);
      i++;
    }
  }

  return { root: resolve(root), options, overrides };
}

function main(): number {
  let args: CliArgs;
  let config: LiftmineConfig;
  try {
    args = parseArgs(process.argv.slice(2));
    config = { ...loadLiftmineConfig(args.root), ...args.overrides };
  } catch (err) {
    console.error("liftmine: " + (err instanceof Error ? err.message : String(err)));
    return 2;
  }
  try {
    return runMine(args.root, config, args.options);
  } catch (err) {
    console.error("liftmine mine: " + (err instanceof Error ? err.message : String(err)));
    return 2;
  }
}

process.exit(main());
