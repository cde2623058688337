#!/usr/bin/env node
import { parseArgs } from "./args.js";
import { loadConfig } from "./config.js";
import { runInteractive } from "./interactive.js";
import { Output } from "./output.js";
import { runSingleShot } from "./single.js";

main().then(
  (code) => process.exit(code),
  (error: unknown) => {
    console.error(error instanceof Error ? error.message : String(error));
    process.exit(1);
  }
);

function printHelp(): void {
  console.log(`
Usage:
  sounder                     Interactive research session
  sounder "<query>" [options] Run one query and print the report

Options:
  --model <name>          Model the researcher uses (default gpt-4o)
  --search-count <n>      Searches per round (default 5)
  --max-iterations <n>    Research iterations before writing (default 10)
  --max-searches <n>      Total search budget (default 15)
  --no-auto-decide        Confirm clarifying answers before continuing
  --json                  One JSON object per line on stdout
  --quiet, -q             Print only the report and errors
  --help, -h              Show this help

Configuration is read from .sounder/config.json and SOUNDER_* environment variables.
`);
}

async function main(): Promise<number> {
  const parsed = parseArgs(process.argv.slice(2));
  if (parsed.help) {
    printHelp();
    return 0;
  }
  if (parsed.errors.length > 0) {
    for (const error of parsed.errors) {
      console.error(error);
    }
    return 1;
  }

  const rootDir = process.cwd();
  const config = loadConfig(rootDir, { overrides: parsed.overrides });

  if (parsed.query) {
    return runSingleShot(parsed.query, config, { mode: parsed.mode, cwd: rootDir });
  }
  if (process.stdin.isTTY && process.stdout.isTTY) {
    return runInteractive(config, { cwd: rootDir });
  }
  new Output(parsed.mode).error(
    "MISSING_QUERY",
    "no query given and stdin is not a terminal. Example: sounder \"How do tides work?\""
  );
  return 1;
}
