import {
  buildDataset,
  countMissing,
  getCategoricalColumn,
  getNumericColumn,
  numericColumns,
  rowRecord,
  uniqueHeader,
} from "@/lib/ingestion/dataset";
import { createSampleDataset } from "@/lib/ingestion/sample";

const synthetic = { type: "synthetic", reason: "test" } as const;

describe("uniqueHeader", () => {
  it("suffixes repeated names and fills blanks", () => {
    expect(uniqueHeader(["Genre", "genre", "", "GENRE"])).toEqual(["genre", "genre_2", "column_3", "genre_3"]);
  });
});

describe("buildDataset", () => {
  const ds = buildDataset(
    "movies",
    ["Title", "Budget", "Score"],
    [
      ["Alpha", "100", "7.5"],
      ["Beta", "NA"],
      ["Gamma", "300", "8"],
    ],
    synthetic
  );

  it("uses declared kinds for movie columns and infers the rest", () => {
    expect(ds.columns.map((c) => [c.name, c.kind])).toEqual([
      ["title", "categorical"],
      ["budget", "numeric"],
      ["score", "numeric"],
    ]);
  });

  it("pads short rows with missing cells", () => {
    expect(getNumericColumn(ds, "score")?.values).toEqual([7.5, null, 8]);
    expect(getNumericColumn(ds, "budget")?.values).toEqual([100, null, 300]);
    expect(ds.rowCount).toBe(3);
  });

  it("freezes the dataset and its columns", () => {
    expect(Object.isFrozen(ds)).toBe(true);
    expect(Object.isFrozen(ds.columns)).toBe(true);
    expect(Object.isFrozen(ds.columns[1].values)).toBe(true);
  });

  it("exposes typed column accessors", () => {
    expect(getCategoricalColumn(ds, "budget")).toBeUndefined();
    expect(getCategoricalColumn(ds, "title")?.values).toEqual(["Alpha", "Beta", "Gamma"]);
    expect(numericColumns(ds).map((c) => c.name)).toEqual(["budget", "score"]);
    expect(countMissing(ds.columns[1])).toBe(1);
    expect(rowRecord(ds, 1)).toEqual({ title: "Beta", budget: null, score: null });
  });
});

describe("createSampleDataset", () => {
  it("builds the five-film sample with nine typed columns", () => {
    const ds = createSampleDataset();
    expect(ds.rowCount).toBe(5);
    expect(ds.columns.map((c) => c.name)).toEqual([
      "title",
      "release_date",
      "budget",
      "revenue",
      "runtime",
      "vote_average",
      "genre",
      "director",
      "is_english",
    ]);
    expect(ds.columns.map((c) => c.kind)).toEqual([
      "categorical",
      "date",
      "numeric",
      "numeric",
      "numeric",
      "numeric",
      "categorical",
      "categorical",
      "boolean",
    ]);
    expect(ds.source).toEqual({ type: "synthetic", reason: "built-in sample" });
    expect(getCategoricalColumn(ds, "title")?.values).toEqual(["Avatar", "Titanic", "Avengers", "Joker", "Inception"]);
  });
});
