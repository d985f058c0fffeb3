export const SNAPSHOT_VERSION = "v1";

export interface SnapshotCount {
  element: unknown;
  count: number;
}

export interface SnapshotCell {
  row: unknown;
  column: unknown;
  count: number;
}

/** Whole accumulator state. Rows, columns and cells are in binary key order. */
export interface CooccurrenceSnapshot {
  version: typeof SNAPSHOT_VERSION;
  totalCooccurrences: number;
  rows: SnapshotCount[];
  columns: SnapshotCount[];
  cells: SnapshotCell[];
}

/** Type guards that turn JSON values back into row and column elements. */
export interface SnapshotCodec<TRow, TColumn> {
  isRow(value: unknown): value is TRow;
  isColumn(value: unknown): value is TColumn;
}

export class SnapshotError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "SnapshotError";
  }
}
