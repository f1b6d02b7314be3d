import fs from "fs";
import os from "os";
import path from "path";
import * as XLSX from "xlsx";
import { loadDataset } from "@/lib/ingestion/loader";
import { getCategoricalColumn, getNumericColumn } from "@/lib/ingestion/dataset";
import type { EdaLogger } from "@/lib/eda/logger";

function mockLogger() {
  return { log: jest.fn(), warn: jest.fn(), error: jest.fn() } satisfies EdaLogger;
}

describe("loadDataset", () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "movie-eda-"));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("falls back to the sample when the file does not exist", () => {
    const logger = mockLogger();
    const file = path.join(dir, "missing.csv");
    const { dataset, diagnostics } = loadDataset(file, logger);

    expect(dataset.name).toBe("sample_movies");
    expect(dataset.rowCount).toBe(5);
    expect(dataset.source).toEqual({ type: "synthetic", reason: "source unavailable: file not found" });
    expect(diagnostics).toEqual([{ kind: "source_unavailable", path: file, reason: "file not found" }]);
    expect(logger.warn).toHaveBeenCalledWith(
      `[eda:loader] Dataset not available at ${file} (file not found); using the built-in sample`
    );
  });

  it("rejects unsupported extensions before touching the file", () => {
    const file = path.join(dir, "movies.json");
    fs.writeFileSync(file, "[]");
    const { dataset, diagnostics } = loadDataset(file, mockLogger());

    expect(dataset.name).toBe("sample_movies");
    expect(diagnostics).toEqual([
      { kind: "source_unavailable", path: file, reason: 'unsupported file type ".json"' },
    ]);
  });

  it("treats a header-only file as unavailable", () => {
    const file = path.join(dir, "empty.csv");
    fs.writeFileSync(file, "title,budget\n");
    const { diagnostics } = loadDataset(file, mockLogger());

    expect(diagnostics).toEqual([{ kind: "source_unavailable", path: file, reason: "no data rows" }]);
  });

  it("loads a CSV, coercing NA markers and reporting absent columns", () => {
    const logger = mockLogger();
    const file = path.join(dir, "movies.csv");
    fs.writeFileSync(
      file,
      ["Title,Budget,Revenue,Runtime,Vote Average", "Alpha,100,NA,90,7", "Beta,200,300,,8", ""].join("\n")
    );

    const { dataset, diagnostics } = loadDataset(file, logger);

    expect(dataset.name).toBe("movies");
    expect(dataset.source).toEqual({ type: "file", path: file, format: "csv" });
    expect(dataset.columns.map((c) => c.name)).toEqual(["title", "budget", "revenue", "runtime", "vote_average"]);
    expect(getNumericColumn(dataset, "revenue")?.values).toEqual([null, 300]);
    expect(getNumericColumn(dataset, "runtime")?.values).toEqual([90, null]);
    expect(diagnostics).toEqual([
      { kind: "schema_gap", column: "genre", expectedKind: "categorical", actualKind: null },
    ]);
    expect(logger.log).toHaveBeenCalledWith(`[eda:loader] Loaded 2 rows × 5 columns from ${file}`);
    expect(logger.warn).toHaveBeenCalledWith(
      '[eda:loader] Expected categorical column "genre" is absent; dependent statistics will be skipped'
    );
  });

  it("detects tab-separated files", () => {
    const file = path.join(dir, "movies.tsv");
    fs.writeFileSync(file, "title\tbudget\tgenre\nAlpha\t5\tDrama\nBeta\t7\tAction\n");
    const { dataset } = loadDataset(file, mockLogger());

    expect(getNumericColumn(dataset, "budget")?.values).toEqual([5, 7]);
    expect(getCategoricalColumn(dataset, "genre")?.values).toEqual(["Drama", "Action"]);
  });

  it("reads the first sheet of an Excel workbook", () => {
    const sheet = XLSX.utils.aoa_to_sheet([
      ["Title", "Budget", "Genre"],
      ["Alpha", 100, "Drama"],
      ["Beta", null, "Action"],
    ]);
    const book = XLSX.utils.book_new();
    XLSX.utils.book_append_sheet(book, sheet, "movies");
    const file = path.join(dir, "movies.xlsx");
    fs.writeFileSync(file, XLSX.write(book, { type: "buffer", bookType: "xlsx" }));

    const { dataset, diagnostics } = loadDataset(file, mockLogger());

    expect(dataset.source).toEqual({ type: "file", path: file, format: "xlsx" });
    expect(getNumericColumn(dataset, "budget")?.values).toEqual([100, null]);
    expect(getCategoricalColumn(dataset, "genre")?.values).toEqual(["Drama", "Action"]);
    expect(diagnostics.map((d) => (d.kind === "schema_gap" ? d.column : d.kind))).toEqual([
      "revenue",
      "runtime",
      "vote_average",
    ]);
  });
});
