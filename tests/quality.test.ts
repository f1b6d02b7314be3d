import {
  assessMissingness,
  boxSummary,
  describeColumn,
  describeNumeric,
  detectOutliers,
  outlierSummary,
  summarizeBoxPlots,
} from "@/lib/eda/quality";
import { buildDataset, getNumericColumn } from "@/lib/ingestion/dataset";
import { createSampleDataset } from "@/lib/ingestion/sample";
import type { NumericColumn } from "@/lib/types/dataset";

const numeric = (name: string, values: (number | null)[]): NumericColumn => ({ name, kind: "numeric", values });

describe("assessMissingness", () => {
  it("orders columns by missing count and keeps dataset order on ties", () => {
    const ds = buildDataset(
      "t",
      ["a", "b", "c", "d"],
      [
        [1, null, 1, 1],
        [null, 1, 2, 2],
        [null, 2, 3, 3],
      ],
      { type: "synthetic", reason: "test" }
    );
    const report = assessMissingness(ds);

    expect(report.map((m) => [m.column, m.missingCount])).toEqual([
      ["a", 2],
      ["b", 1],
      ["c", 0],
      ["d", 0],
    ]);
    expect(report[0].missingPct).toBeCloseTo(66.667, 3);
    expect(report[2].missingPct).toBe(0);
  });

  it("reports percentages that round back to the missing count", () => {
    for (const n of [1, 3, 7, 10, 33, 100, 997]) {
      for (const k of [0, 1, Math.floor(n / 3), n - 1, n]) {
        const ds = buildDataset(
          "t",
          ["a"],
          Array.from({ length: n }, (_, i) => [i < k ? null : i]),
          { type: "synthetic", reason: "test" }
        );
        const [entry] = assessMissingness(ds);
        expect(entry.missingCount).toBe(k);
        expect(Math.round((entry.missingPct * n) / 100)).toBe(k);
      }
    }
  });

  it("reports zero percent for a dataset without rows", () => {
    const ds = buildDataset("t", ["a"], [], { type: "synthetic", reason: "test" });
    expect(assessMissingness(ds)).toEqual([{ column: "a", missingCount: 0, missingPct: 0 }]);
  });
});

describe("descriptive statistics", () => {
  it("summarizes the sample budget column", () => {
    const [budget] = describeNumeric(createSampleDataset());

    expect(budget.column).toBe("budget");
    expect(budget.count).toBe(5);
    expect(budget.mean).toBe(174400000);
    expect(budget.std).toBeCloseTo(72658791.62, -2);
    expect([budget.min, budget.q1, budget.median, budget.q3, budget.max]).toEqual([
      55000000, 160000000, 200000000, 220000000, 237000000,
    ]);
  });

  it("interpolates quartiles between order statistics", () => {
    const s = describeColumn(numeric("x", [4, 1, 3, 2]));
    expect([s.q1, s.median, s.q3]).toEqual([1.75, 2.5, 3.25]);
  });

  it("leaves spread undefined for a single value and everything undefined when empty", () => {
    expect(describeColumn(numeric("x", [7, null]))).toEqual({
      column: "x",
      count: 1,
      mean: 7,
      std: null,
      min: 7,
      q1: 7,
      median: 7,
      q3: 7,
      max: 7,
    });
    expect(describeColumn(numeric("x", [null]))).toEqual({
      column: "x",
      count: 0,
      mean: null,
      std: null,
      min: null,
      q1: null,
      median: null,
      q3: null,
      max: null,
    });
  });
});

describe("outliers", () => {
  const sample = createSampleDataset();

  it("flags rows strictly outside the Tukey fences", () => {
    const byColumn = Object.fromEntries(detectOutliers(sample).map((o) => [o.column, o]));

    expect(byColumn.budget).toEqual({
      column: "budget",
      q1: 160000000,
      q3: 220000000,
      iqr: 60000000,
      lowerFence: 70000000,
      upperFence: 310000000,
      rowIndices: [3],
    });
    expect(byColumn.runtime.lowerFence).toBe(114.5);
    expect(byColumn.runtime.upperFence).toBe(190.5);
    expect(byColumn.runtime.rowIndices).toEqual([1]);
    expect(byColumn.revenue.rowIndices).toEqual([]);
    expect(byColumn.vote_average.rowIndices).toEqual([]);
  });

  it("widens the fences with the multiplier", () => {
    const runtime = getNumericColumn(sample, "runtime");
    expect(runtime).toBeDefined();
    if (!runtime) return;
    expect(outlierSummary(runtime, 3).rowIndices).toEqual([]);
  });

  it("keeps a value on the fence and flags anything off a constant core", () => {
    expect(outlierSummary(numeric("x", [0, 10, 10, 10, 25])).rowIndices).toEqual([0, 4]);
    expect(outlierSummary(numeric("x", [5, 5, 5, 5, 9])).rowIndices).toEqual([4]);
    expect(outlierSummary(numeric("x", [2, 2, 4, 4, 7])).rowIndices).toEqual([]);
  });

  it("returns undefined fences for an empty column", () => {
    expect(outlierSummary(numeric("x", [null, null]))).toEqual({
      column: "x",
      q1: null,
      q3: null,
      iqr: null,
      lowerFence: null,
      upperFence: null,
      rowIndices: [],
    });
  });
});

describe("box plots", () => {
  it("draws whiskers to the most extreme values inside the fences", () => {
    const budget = getNumericColumn(createSampleDataset(), "budget");
    expect(budget).toBeDefined();
    if (!budget) return;

    expect(boxSummary(budget)).toEqual({
      column: "budget",
      q1: 160000000,
      median: 200000000,
      q3: 220000000,
      lowerFence: 70000000,
      upperFence: 310000000,
      whiskerLow: 160000000,
      whiskerHigh: 237000000,
      outliers: [55000000],
    });
  });

  it("skips absent and non-numeric columns", () => {
    const { boxes, skipped } = summarizeBoxPlots(createSampleDataset(), ["budget", "genre", "gross"]);

    expect(boxes.map((b) => b.column)).toEqual(["budget"]);
    expect(skipped).toEqual([
      { stage: "quality", statistic: "box_plot", column: "genre", reason: "column is categorical, not numeric" },
      { stage: "quality", statistic: "box_plot", column: "gross", reason: "column is absent" },
    ]);
  });
});
