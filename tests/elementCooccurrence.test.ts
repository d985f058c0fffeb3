/**
 * Accumulator tests: marginal/joint accounting, log lift, mutual information, ranking, pruning.
 */

import { ElementCooccurrence } from "../src/cooccurrence/ElementCooccurrence.js";
import { InvalidArgumentError } from "../src/cooccurrence/errors.js";

// P(A,X) = 2/4, P(A) = 2/3, P(X) = 2/3
const LOG_9_8 = Math.log(9 / 8);

/** ({A,B},{X}) then ({A},{X,Y}). */
function twoObservations(): ElementCooccurrence<string, string> {
  const acc = new ElementCooccurrence<string, string>();
  acc.add(new Set(["A", "B"]), new Set(["X"]));
  acc.add(new Set(["A"]), new Set(["X", "Y"]));
  return acc;
}

/** Column k: a (2) and b (1); column m: b (1) and c (1). b,k is inserted first. */
function rankedState(): ElementCooccurrence<string, string> {
  const acc = new ElementCooccurrence<string, string>();
  acc.add(["b"], ["k"]);
  acc.add(["a"], ["k"]);
  acc.add(["a"], ["k"]);
  acc.add(["b"], ["m"]);
  acc.add(["c"], ["m"]);
  return acc;
}

function countsOf(map: ReadonlyMap<string, { element: string; count: number }>): Record<string, number> {
  const out: Record<string, number> = {};
  for (const v of map.values()) out[v.element] = v.count;
  return out;
}

describe("ElementCooccurrence.add", () => {
  it("accumulates marginals, joint cells and the joint total", () => {
    const acc = twoObservations();
    expect(countsOf(acc.getRowMultiset())).toEqual({ A: 2, B: 1 });
    expect(countsOf(acc.getColumnMultiset())).toEqual({ X: 2, Y: 1 });
    expect(acc.getJointCount("A", "X")).toBe(2);
    expect(acc.getJointCount("B", "X")).toBe(1);
    expect(acc.getJointCount("A", "Y")).toBe(1);
    expect(acc.getJointCount("B", "Y")).toBe(0);
    expect(acc.getJointCellCount()).toBe(3);
    expect(acc.getTotalCooccurrences()).toBe(2 * 1 + 1 * 2);
    expect(acc.getTotalRowObservations()).toBe(3);
    expect(acc.getTotalColumnObservations()).toBe(3);
  });

  it("an empty side only updates the other marginals", () => {
    const acc = new ElementCooccurrence<string, string>();
    acc.add([], ["X"]);
    expect(acc.getColumnCount("X")).toBe(1);
    expect(acc.getTotalRowObservations()).toBe(0);
    expect(acc.getTotalCooccurrences()).toBe(0);
    expect(acc.getJointCellCount()).toBe(0);
  });

  it("counts a repeated element once per call", () => {
    const acc = new ElementCooccurrence<string, string>();
    acc.add(["A", "A"], ["X", "X", "Y"]);
    expect(acc.getRowCount("A")).toBe(1);
    expect(acc.getTotalRowObservations()).toBe(1);
    expect(acc.getTotalColumnObservations()).toBe(2);
    expect(acc.getTotalCooccurrences()).toBe(2);
    expect(acc.getJointCount("A", "X")).toBe(1);
  });

  it("is not idempotent", () => {
    const acc = new ElementCooccurrence<string, string>();
    acc.add(["A"], ["X"]);
    acc.add(["A"], ["X"]);
    expect(acc.getJointCount("A", "X")).toBe(2);
    expect(acc.getTotalCooccurrences()).toBe(2);
  });

  it("identifies elements through the key functions", () => {
    const acc = new ElementCooccurrence<{ id: number; name: string }, string>({ rowKey: (r) => String(r.id) });
    acc.add([{ id: 1, name: "first" }], ["k"]);
    acc.add([{ id: 1, name: "renamed" }], ["k"]);
    expect(acc.getRowCount({ id: 1, name: "anything" })).toBe(2);
    expect(acc.getRowValues()).toEqual([{ id: 1, name: "first" }]);
    expect(acc.getJointCount({ id: 1, name: "" }, "k")).toBe(2);
  });

  it("keeps elements of different types apart by default", () => {
    const acc = new ElementCooccurrence<unknown, string>();
    acc.add([1n, 2n, Infinity, "Infinity", NaN, "NaN", null, undefined, 1, "1"], ["x"]);
    expect(acc.getRowValues()).toHaveLength(10);
    expect(acc.getRowCount(1n)).toBe(1);
    expect(acc.getRowCount("1")).toBe(1);
    expect(acc.getJointCount(2n, "x")).toBe(1);
  });

  it("keys dates by their time value", () => {
    const acc = new ElementCooccurrence<Date, string>();
    acc.add([new Date(0), new Date(86400000)], ["x"]);
    acc.add([new Date(0)], ["x"]);
    expect(acc.getRowValues()).toHaveLength(2);
    expect(acc.getRowCount(new Date(0))).toBe(2);
  });

  it("rejects elements the default key cannot identify", () => {
    const acc = new ElementCooccurrence<unknown, unknown>();
    expect(() => acc.add([Symbol("s")], ["x"])).toThrow(InvalidArgumentError);
    expect(() => acc.add([new Map([["a", 1]])], ["x"])).toThrow(
      "no default key for Map elements; pass rowKey/columnKey",
    );
    expect(() => acc.add(["ok"], [new Set(["a"])])).toThrow(InvalidArgumentError);
    expect(acc.getTotalRowObservations()).toBe(0);
  });

  it("treats structurally equal objects as one element by default", () => {
    const acc = new ElementCooccurrence<{ a: number; b: number }, string>();
    acc.add([{ a: 1, b: 2 }], ["k"]);
    acc.add([{ b: 2, a: 1 }], ["k"]);
    expect(acc.getRowValues()).toHaveLength(1);
    expect(acc.getRowCount({ a: 1, b: 2 })).toBe(2);
  });

  it("keeps marginal, joint-bound and total invariants over many observations", () => {
    const observations: [string[], string[]][] = [
      [["a", "b", "c"], ["x", "y"]],
      [["a"], ["y", "z"]],
      [[], ["x"]],
      [["b", "c"], []],
      [["c", "d"], ["x", "y", "z"]],
      [["a", "d"], ["z"]],
    ];
    const acc = new ElementCooccurrence<string, string>();
    let expectedTotal = 0;
    for (const [rows, columns] of observations) {
      acc.add(rows, columns);
      expectedTotal += rows.length * columns.length;
    }

    let rowSum = 0;
    for (const v of acc.getRowMultiset().values()) rowSum += v.count;
    let columnSum = 0;
    for (const v of acc.getColumnMultiset().values()) columnSum += v.count;
    expect(rowSum).toBe(acc.getTotalRowObservations());
    expect(columnSum).toBe(acc.getTotalColumnObservations());
    expect(acc.getTotalCooccurrences()).toBe(expectedTotal);

    for (const cell of acc.cells()) {
      expect(cell.count).toBeLessThanOrEqual(Math.min(acc.getRowCount(cell.row), acc.getColumnCount(cell.column)));
    }
  });
});

describe("ElementCooccurrence.getElementLogLift", () => {
  it("computes log P(r,c) - log P(c) - log P(r)", () => {
    const acc = twoObservations();
    expect(acc.getElementLogLift("A", "X")).toBeCloseTo(LOG_9_8, 10);
    expect(acc.getElementLogLift("A", "X")).toBeCloseTo(0.1178, 4);
  });

  it("gives -Infinity for pairs never seen together", () => {
    const acc = twoObservations();
    expect(acc.getElementLogLift("B", "Y")).toBe(-Infinity);
  });

  it("gives -Infinity for elements never observed", () => {
    const acc = twoObservations();
    expect(acc.getElementLogLift("Q", "X")).toBe(-Infinity);
    expect(acc.getElementLogLift("A", "Q")).toBe(-Infinity);
    expect(new ElementCooccurrence<string, string>().getElementLogLift("A", "X")).toBe(-Infinity);
  });
});

describe("ElementCooccurrence mutual information", () => {
  it("lists every column seen with a row in insertion order", () => {
    const acc = twoObservations();
    const mi = acc.getColumnMutualInformationFor("A");
    expect(mi.map((m) => m.element)).toEqual(["X", "Y"]);
    expect(mi[0].logProb).toBeCloseTo(LOG_9_8, 10);
    expect(mi[1].logProb).toBeCloseTo(LOG_9_8, 10);
  });

  it("throws InvalidArgumentError for a row never observed", () => {
    const acc = twoObservations();
    expect(() => acc.getColumnMutualInformationFor("Q")).toThrow(InvalidArgumentError);
  });

  it("throws InvalidArgumentError for a column never observed", () => {
    const acc = twoObservations();
    expect(() => acc.getRowMutualInformationFor("Q")).toThrow(InvalidArgumentError);
  });

  it("returns an empty list for an observed row without joint cells", () => {
    const acc = new ElementCooccurrence<string, string>();
    acc.add(["A"], []);
    expect(acc.getColumnMutualInformationFor("A")).toEqual([]);
  });

  it("returns an empty list for an observed column without joint cells", () => {
    const acc = new ElementCooccurrence<string, string>();
    acc.add([], ["X"]);
    expect(acc.getRowMutualInformationFor("X")).toEqual([]);
  });

  it("row information uses the row count stored under the column's own key", () => {
    const acc = twoObservations();
    // No row is keyed "X": the shared row term is log(0), so every entry is +Infinity.
    const mi = acc.getRowMutualInformationFor("X");
    expect(mi.map((m) => m.element)).toEqual(["A", "B"]);
    expect(mi.map((m) => m.logProb)).toEqual([Infinity, Infinity]);
  });

  it("row information diverges from the pointwise lift of the same pair", () => {
    const acc = new ElementCooccurrence<string, string>();
    acc.add(["X", "A"], ["X"]);
    acc.add(["A"], ["Y"]);
    const mi = acc.getRowMutualInformationFor("X");
    expect(mi.map((m) => m.element)).toEqual(["X", "A"]);
    expect(mi[0].logProb).toBeCloseTo(Math.LN2, 10);
    expect(mi[1].logProb).toBeCloseTo(Math.LN2, 10);
    expect(acc.getElementLogLift("A", "X")).toBeCloseTo(0, 10);
  });
});

describe("ElementCooccurrence ranking", () => {
  it("orders rows of a column by descending lift", () => {
    const lifts = rankedState().getCooccurringElementsForColumn("k");
    expect(lifts.map((l) => l.row)).toEqual(["a", "b"]);
    expect(lifts.map((l) => l.count)).toEqual([2, 1]);
    expect(lifts[0].lift).toBeCloseTo(Math.log(5 / 3), 10);
    expect(lifts[1].lift).toBeCloseTo(Math.log(5 / 6), 10);
    expect(lifts.every((l) => l.column === "k")).toBe(true);
  });

  it("orders columns of a row by descending lift", () => {
    const lifts = rankedState().getCooccurringElementsForRow("b");
    expect(lifts.map((l) => l.column)).toEqual(["m", "k"]);
    expect(lifts[0].lift).toBeCloseTo(Math.log(5 / 4), 10);
    expect(lifts[1].lift).toBeCloseTo(Math.log(5 / 6), 10);
    expect(lifts.every((l) => l.row === "b")).toBe(true);
  });

  it("breaks equal lifts by ascending row hash", () => {
    const acc = new ElementCooccurrence<string, string>();
    acc.add(["b"], ["k"]);
    acc.add(["a"], ["k"]);
    const lifts = acc.getCooccurringElementsForColumn("k");
    expect(lifts[0].lift).toBe(lifts[1].lift);
    // keys are "\"a\"" (hash 35715) and "\"b\"" (hash 35746)
    expect(lifts.map((l) => l.row)).toEqual(["a", "b"]);
  });

  it("row- and column-anchored lists agree with the pointwise lift", () => {
    const acc = rankedState();
    for (const cell of acc.cells()) {
      const byColumn = acc.getCooccurringElementsForColumn(cell.column).find((l) => l.row === cell.row);
      const byRow = acc.getCooccurringElementsForRow(cell.row).find((l) => l.column === cell.column);
      expect(byColumn).toBeDefined();
      expect(byRow).toBeDefined();
      expect(byColumn?.lift).toBeCloseTo(acc.getElementLogLift(cell.row, cell.column), 10);
      expect(byRow?.lift).toBeCloseTo(acc.getElementLogLift(cell.row, cell.column), 10);
    }
  });

  it("returns empty lists for elements without joint cells", () => {
    const acc = twoObservations();
    expect(acc.getCooccurringElementsForColumn("Q")).toEqual([]);
    expect(acc.getCooccurringElementsForRow("Q")).toEqual([]);
  });

  it("lists rows by popularity with binary key order on ties", () => {
    const acc = twoObservations();
    acc.add(["c", "b"], []);
    expect(acc.getMostPopularRowFirst()).toEqual([
      { element: "A", count: 2 },
      { element: "B", count: 1 },
      { element: "b", count: 1 },
      { element: "c", count: 1 },
    ]);
  });

  it("returns snapshots that later mutation does not change", () => {
    const acc = twoObservations();
    const rows = acc.getRowMultiset();
    const popular = acc.getMostPopularRowFirst();
    acc.add(["A", "Z"], ["X"]);
    expect(rows.get('"A"')?.count).toBe(2);
    expect(rows.has('"Z"')).toBe(false);
    expect(popular).toHaveLength(2);
  });
});

describe("ElementCooccurrence.prune", () => {
  it("removes cells at or below the threshold and keeps totals", () => {
    const acc = twoObservations();
    acc.prune(1);
    expect(acc.cells()).toEqual([{ row: "A", column: "X", count: 2 }]);
    expect(acc.getTotalCooccurrences()).toBe(4);
    expect(countsOf(acc.getRowMultiset())).toEqual({ A: 2, B: 1 });
    expect(countsOf(acc.getColumnMultiset())).toEqual({ X: 2, Y: 1 });
  });

  it("pruned pairs behave as if never seen together", () => {
    const acc = twoObservations();
    acc.prune(1);
    expect(acc.getElementLogLift("B", "X")).toBe(-Infinity);
    expect(acc.getElementLogLift("A", "X")).toBeCloseTo(LOG_9_8, 10);
    expect(acc.getCooccurringElementsForColumn("Y")).toEqual([]);
    expect(acc.getColumnMutualInformationFor("B")).toEqual([]);
    expect(acc.getCooccurringElementsForRow("A").map((l) => l.column)).toEqual(["X"]);
  });

  it("keeps every cell above the threshold", () => {
    const acc = rankedState();
    acc.prune(1);
    for (const cell of acc.cells()) expect(cell.count).toBeGreaterThan(1);
    expect(acc.getJointCellCount()).toBe(1);
  });

  it("threshold 0 removes nothing", () => {
    const acc = twoObservations();
    acc.prune(0);
    expect(acc.getJointCellCount()).toBe(3);
  });

  it("rejects negative and fractional thresholds", () => {
    const acc = twoObservations();
    expect(() => acc.prune(-1)).toThrow(InvalidArgumentError);
    expect(() => acc.prune(1.5)).toThrow("prune threshold must be a non-negative integer, got 1.5");
    expect(acc.getJointCellCount()).toBe(3);
  });
});
