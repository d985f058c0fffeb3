export const REPORT_VERSION = "v1";

export interface RankedRow {
  row: string;
  /** Log lift rounded to 4 decimals. */
  lift: number;
  count: number;
}

export interface ColumnAssociations {
  column: string;
  lifts: RankedRow[];
}

export interface MineReport {
  version: typeof REPORT_VERSION;
  files: number;
  observations: number;
  totalCooccurrences: number;
  pruneThreshold: number;
  jointCells: number;
  popularRows: { element: string; count: number }[];
  associations: ColumnAssociations[];
}

export interface MineOptions {
  /** Report path relative to cwd. LIFTMINE_REPORT_PATH wins over this. */
  reportPath?: string;
  /** Write the pruned accumulator here when set. */
  snapshotPath?: string;
}
