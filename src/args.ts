import { OutputMode, RequestConfig } from "./types.js";

export type ParsedArgs = {
  query: string | null;
  overrides: Partial<RequestConfig>;
  mode: OutputMode;
  help: boolean;
  errors: string[];
};

const COUNT_FLAGS: Record<string, "search_count" | "max_iterations" | "max_searches"> = {
  "--search-count": "search_count",
  "--max-iterations": "max_iterations",
  "--max-searches": "max_searches",
};

export function parseArgs(argv: readonly string[]): ParsedArgs {
  const queryParts: string[] = [];
  const overrides: Partial<RequestConfig> = {};
  const errors: string[] = [];
  let json = false;
  let quiet = false;
  let help = false;

  for (let i = 0; i < argv.length; i += 1) {
    const arg = argv[i];
    if (arg === "--") {
      queryParts.push(...argv.slice(i + 1));
      break;
    }
    if (!arg.startsWith("-")) {
      queryParts.push(arg);
      continue;
    }

    const countKey = COUNT_FLAGS[arg];
    if (countKey) {
      const value = argv[i + 1];
      i += 1;
      if (value === undefined || !/^\d+$/.test(value)) {
        errors.push(`${arg} expects a non-negative integer`);
      } else {
        overrides[countKey] = Number.parseInt(value, 10);
      }
    } else if (arg === "--model") {
      const value = argv[i + 1];
      i += 1;
      if (!value) {
        errors.push("--model expects a model name");
      } else {
        overrides.model = value;
      }
    } else if (arg === "--no-auto-decide") {
      overrides.auto_decide = false;
    } else if (arg === "--json") {
      json = true;
    } else if (arg === "--quiet" || arg === "-q") {
      quiet = true;
    } else if (arg === "--help" || arg === "-h") {
      help = true;
    } else {
      errors.push(`Unknown option: ${arg}`);
    }
  }

  const query = queryParts.join(" ").trim();
  return {
    query: query ? query : null,
    overrides,
    mode: json ? "json" : quiet ? "quiet" : "human",
    help,
    errors,
  };
}
