import { analyzeDataset } from "@/lib/eda/pipeline";
import { createEdaConfig } from "@/lib/eda/config";
import { silentLogger } from "@/lib/eda/logger";
import { formatReport, formatTable } from "@/lib/eda/report";
import { formatPct, formatStat, joinWords } from "@/lib/eda/format";
import { createSampleDataset } from "@/lib/ingestion/sample";

describe("formatters", () => {
  it("prints compact numbers and undefined values", () => {
    expect(formatStat(174400000)).toBe("174400000");
    expect(formatStat(129.20000000000002)).toBe("129.2");
    expect(formatStat(0.678130)).toBe("0.68");
    expect(formatStat(null)).toBe("n/a");
    expect(formatStat(NaN)).toBe("n/a");
    expect(formatStat(-Infinity)).toBe("-inf");
    expect(formatPct(40)).toBe("40.0%");
  });

  it("joins words into a readable list", () => {
    expect(joinWords([])).toBe("");
    expect(joinWords(["a"])).toBe("a");
    expect(joinWords(["a", "b"])).toBe("a and b");
    expect(joinWords(["a", "b", "c"])).toBe("a, b and c");
  });

  it("pads table columns to their widest cell", () => {
    expect(formatTable(["a", "bb"], [["x", "y"]])).toEqual(["a  bb", "-  --", "x  y"]);
    expect(formatTable(["Column", "n"], [["runtime", "5"]])).toEqual(["Column   n", "-------  -", "runtime  5"]);
  });
});

describe("formatReport", () => {
  const run = analyzeDataset(
    {
      dataset: createSampleDataset(),
      diagnostics: [{ kind: "schema_gap", column: "genre", expectedKind: "categorical", actualKind: "numeric" }],
    },
    createEdaConfig(),
    silentLogger
  );
  const lines = formatReport(run).split("\n");

  it("opens with the dataset origin and its diagnostics", () => {
    expect(lines[0]).toBe("Dataset: sample_movies (built-in sample)");
    expect(lines[1]).toBe('! Schema gap: expected categorical column "genre" (found numeric)');
  });

  it("prints the shape and the descriptive table", () => {
    expect(lines).toContain("(5, 9)");
    const budgetRow = lines.find((l) => l.startsWith("budget ") && l.split(/\s+/).length === 9);
    expect(budgetRow?.split(/\s+/)).toEqual([
      "budget",
      "5",
      "174400000",
      "72658791.62",
      "55000000",
      "160000000",
      "200000000",
      "220000000",
      "237000000",
    ]);
  });

  it("ends with the ranked insights", () => {
    expect(lines).toContain(
      '1. Key category popularity: "Action" (40.0%) and "Drama" (40.0%) are the most dominant values of "genre".'
    );
    expect(lines).toContain('2. Central tendency: "runtime" values cluster in [122, 129.2) (1 of 5 values).');
    expect(lines[lines.length - 1]).toBe("=".repeat(50));
  });

  it("says so when no rule fires and lists skipped statistics", () => {
    const quiet = analyzeDataset(
      { dataset: createSampleDataset(), diagnostics: [] },
      createEdaConfig({ columns: { category: "studio", modal: "studio" } }),
      silentLogger
    );
    const text = formatReport(quiet).split("\n");

    expect(text).toContain("No insight rule fired.");
    expect(text).toContain('- insights/dominant_categories "studio": column is absent');
    expect(text).toContain('- insights/central_tendency "studio": column is absent');
  });
});
