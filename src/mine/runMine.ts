/**
 * Mine step: list sources, turn every function body into one observation
 * (called names × statement kinds), accumulate, prune, then write
 * artifacts/liftmine-report.json and optionally a snapshot.
 */

import { mkdirSync, readFileSync, writeFileSync } from "fs";
import { dirname, resolve } from "path";
import type { LiftmineConfig } from "../config/liftmineYaml.js";
import { ElementCooccurrence } from "../cooccurrence/ElementCooccurrence.js";
import { stringCompareBinary } from "../determinism/CanonicalOrder.js";
import { stableStringify } from "../determinism/StableJson.js";
import { listSourceFiles } from "../fs/listSourceFiles.js";
import { toPosixRelative } from "../fs/pathUtils.js";
import { extractIdiomObservations } from "../parse/extractIdioms.js";
import { saveSnapshot } from "../snapshot/store.js";
import { formatAssociations } from "./formatAssociations.js";
import { REPORT_VERSION } from "./types.js";
import type { ColumnAssociations, MineOptions, MineReport } from "./types.js";

export const DEFAULT_REPORT_PATH = "artifacts/liftmine-report.json";

function round4(n: number): number {
  return Math.round(n * 10_000) / 10_000;
}

function normalizeContent(raw: string): string {
  return raw.replace(/\r\n/g, "\n").replace(/\r/g, "\n").normalize("NFC");
}

export function buildReport(
  acc: ElementCooccurrence<string, string>,
  files: number,
  observations: number,
  config: LiftmineConfig,
): MineReport {
  const columns = acc.getColumnValues().sort((a, b) => stringCompareBinary(a, b));
  const associations: ColumnAssociations[] = [];
  for (const column of columns) {
    const lifts = acc
      .getCooccurringElementsForColumn(column)
      .slice(0, config.top)
      .map((l) => ({ row: l.row, lift: round4(l.lift), count: l.count }));
    if (lifts.length > 0) associations.push({ column, lifts });
  }

  return {
    version: REPORT_VERSION,
    files,
    observations,
    totalCooccurrences: acc.getTotalCooccurrences(),
    pruneThreshold: config.pruneThreshold,
    jointCells: acc.getJointCellCount(),
    popularRows: acc.getMostPopularRowFirst().slice(0, config.top),
    associations,
  };
}

/**
 * Run mine over cwd. Returns exit code (0 or 2).
 */
export function runMine(cwd: string, config: LiftmineConfig, options: MineOptions = {}): number {
  const root = resolve(cwd);
  const reportPath = process.env.LIFTMINE_REPORT_PATH ?? options.reportPath ?? DEFAULT_REPORT_PATH;
  const absReport = resolve(root, reportPath);

  let files = listSourceFiles(root, config.ignore);
  if (files.length === 0) {
    console.error("liftmine mine: no TypeScript sources under " + root);
    return 2;
  }
  if (files.length > config.maxFiles) {
    console.error(`liftmine mine: ${files.length} files exceed maxFiles ${config.maxFiles}; mining the first ${config.maxFiles}`);
    files = files.slice(0, config.maxFiles);
  }

  const acc = new ElementCooccurrence<string, string>();
  let observations = 0;
  for (const absFile of files) {
    const rel = toPosixRelative(root, absFile);
    let text: string;
    try {
      text = normalizeContent(readFileSync(absFile, "utf8"));
    } catch (err) {
      const msg = err instanceof Error ? err.message : String(err);
      console.error(`liftmine mine: cannot read ${rel} — ${msg}`);
      return 2;
    }
    for (const obs of extractIdiomObservations(rel, text)) {
      acc.add(obs.calls, obs.statements);
      observations++;
    }
  }

  acc.prune(config.pruneThreshold);

  const report = buildReport(acc, files.length, observations, config);
  mkdirSync(dirname(absReport), { recursive: true });
  writeFileSync(absReport, stableStringify(report) + "\n", "utf8");

  if (options.snapshotPath) {
    saveSnapshot(resolve(root, options.snapshotPath), acc);
  }

  console.log(formatAssociations(report));
  return 0;
}
