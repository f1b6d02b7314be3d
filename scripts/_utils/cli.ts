import type { EdaConfigOverrides } from "../../lib/eda/config";
import { EdaConfigError } from "../../lib/eda/errors";

export interface EdaCliArgs {
  source?: string;
  json: boolean;
  help: boolean;
  overrides: EdaConfigOverrides;
}

const NUMERIC_FLAGS = {
  bins: "histogramBins",
  iqr: "iqrMultiplier",
  corr: "correlationThreshold",
  missing: "missingThresholdPct",
  top: "topCategories",
} as const;

type NumericFlag = keyof typeof NUMERIC_FLAGS;

const isNumericFlag = (name: string): name is NumericFlag =>
  Object.prototype.hasOwnProperty.call(NUMERIC_FLAGS, name);

/**
 * Accepts --flag=value and --flag value. The first positional argument is
 * taken as the source path when --source is not given.
 * @throws EdaConfigError for unknown flags or non-numeric values
 */
export function parseEdaArgs(argv: string[]): EdaCliArgs {
  const args: EdaCliArgs = { json: false, help: false, overrides: {} };
  const issues: string[] = [];
  const positional: string[] = [];

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (!arg.startsWith("--")) {
      positional.push(arg);
      continue;
    }

    const eq = arg.indexOf("=");
    const name = eq === -1 ? arg.slice(2) : arg.slice(2, eq);

    if (name === "json") { args.json = true; continue; }
    if (name === "help") { args.help = true; continue; }
    if (name !== "source" && !isNumericFlag(name)) {
      issues.push(`unknown option --${name}`);
      continue;
    }

    let value: string | undefined = eq === -1 ? undefined : arg.slice(eq + 1);
    if (value === undefined) {
      value = argv[i + 1];
      i++;
    }
    if (value === undefined) {
      issues.push(`--${name} needs a value`);
      continue;
    }

    if (name === "source") {
      args.source = value;
    } else if (isNumericFlag(name)) {
      const n = Number(value);
      if (value.trim() === "" || Number.isNaN(n)) {
        issues.push(`--${name} must be a number (got "${value}")`);
      } else {
        args.overrides[NUMERIC_FLAGS[name]] = n;
      }
    }
  }

  if (issues.length > 0) throw new EdaConfigError(issues);
  if (args.source === undefined && positional.length > 0) args.source = positional[0];
  return args;
}

export const USAGE = `Usage: movie-eda [source] [options]

  --source <path>   CSV/TSV/XLSX file (default: $EDA_SOURCE or data/tmdb_movies.csv)
  --bins <n>        histogram bin count (default 10)
  --iqr <k>         IQR outlier multiplier (default 1.5)
  --corr <r>        correlation threshold for the financial insight (default 0.7)
  --missing <pct>   missing-percentage threshold (default 5)
  --top <n>         dominant categories to report (default 2)
  --json            print the full run as JSON
  --help            show this message`;
