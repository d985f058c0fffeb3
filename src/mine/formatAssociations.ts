import { createLift, formatLift } from "../cooccurrence/records.js";
import type { MineReport } from "./types.js";

/** Console rendering of a mining report: one block per statement kind, best lift first. */
export function formatAssociations(report: MineReport): string {
  const lines: string[] = [
    `liftmine: ${report.files} files, ${report.observations} observations, ` +
      `${report.totalCooccurrences} co-occurrences, ${report.jointCells} pairs kept (pruned <= ${report.pruneThreshold})`,
  ];
  if (report.popularRows.length > 0) {
    lines.push("most called: " + report.popularRows.map((r) => `${r.element} (${r.count})`).join(", "));
  }
  for (const a of report.associations) {
    lines.push(a.column);
    for (const r of a.lifts) {
      lines.push(`  ${formatLift(createLift(r.row, a.column, r.lift, r.count))} (n=${r.count})`);
    }
  }
  return lines.join("\n");
}
