#!/usr/bin/env node
import { readEdaEnv } from "../lib/eda/config";
import { isEdaConfigError } from "../lib/eda/errors";
import { runEdaPipeline } from "../lib/eda/pipeline";
import { formatReport } from "../lib/eda/report";
import { silentLogger } from "../lib/eda/logger";
import { loadEnvFiles } from "./_loadEnv";
import { parseEdaArgs, USAGE } from "./_utils/cli";

function main(): void {
  const args = parseEdaArgs(process.argv.slice(2));
  if (args.help) {
    console.log(USAGE);
    return;
  }

  loadEnvFiles();
  const env = readEdaEnv();
  const run = runEdaPipeline({
    source: args.source ?? env.source,
    config: { ...env.overrides, ...args.overrides },
    // keep stdout clean for piping JSON
    logger: args.json ? { ...silentLogger, warn: console.warn, error: console.error } : console,
  });

  if (args.json) {
    const { config, report, charts } = run;
    console.log(JSON.stringify({ config, report, charts }, null, 2));
  } else {
    console.log(formatReport(run));
  }
}

try {
  main();
} catch (error) {
  if (isEdaConfigError(error)) {
    console.error(error.message);
    console.error(USAGE);
  } else {
    console.error("EDA run failed:", error);
  }
  process.exitCode = 1;
}
