/** Maps an element to the string that identifies it. Equal keys mean the same element. */
export type KeyFn<T> = (element: T) => string;

export interface CooccurrenceOptions<TRow, TColumn> {
  rowKey?: KeyFn<TRow>;
  columnKey?: KeyFn<TColumn>;
}

/** An element together with the log of its probability ratio. */
export interface MutualInformation<T> {
  readonly element: T;
  readonly logProb: number;
}

export interface Lift<TRow, TColumn> {
  readonly row: TRow;
  readonly column: TColumn;
  /** Natural-log lift: log P(r,c) - log P(r) - log P(c). */
  readonly lift: number;
  /** Raw joint count of the pair. */
  readonly count: number;
}

export interface ElementCount<T> {
  readonly element: T;
  readonly count: number;
}
