import dotenv from "dotenv";
import fs from "fs";
import path from "path";
import { ConfigError } from "./errors.js";
import { Config, FileConfig, RequestConfig, WorkerConfig } from "./types.js";

export const CONFIG_DIRNAME = ".sounder";
export const CONFIG_FILENAME = "config.json";
export const ENV_PREFIX = "SOUNDER_";
export const ENV_FILENAME = ".env";

export const DEFAULT_REQUEST_CONFIG: RequestConfig = {
  model: "gpt-4o",
  search_count: 5,
  max_iterations: 10,
  max_searches: 15,
  auto_decide: true,
};

export const DEFAULT_WORKER: WorkerConfig = {
  command: "uv",
  args: ["run", "python", "-m", "research_worker.runner"],
};

export const DEFAULT_RUNS_DIR = "runs";

export type ConfigOverrides = Partial<RequestConfig>;

export type LoadConfigOptions = {
  env?: NodeJS.ProcessEnv;
  overrides?: ConfigOverrides;
};

export function configPath(rootDir: string): string {
  return path.join(rootDir, CONFIG_DIRNAME, CONFIG_FILENAME);
}

/** Reads `.sounder/config.json`; a missing file is an empty config. */
export function readConfigFile(rootDir: string): FileConfig {
  const filePath = configPath(rootDir);
  if (!fs.existsSync(filePath)) {
    return {};
  }

  const raw = fs.readFileSync(filePath, "utf8");
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new ConfigError(
      `Invalid JSON in ${filePath}: ${error instanceof Error ? error.message : String(error)}`
    );
  }
  return validateFileConfig(parsed, filePath);
}

/**
 * Fills `env` from `<rootDir>/.env`. Variables that are already set win; a
 * missing file is ignored.
 */
export function loadEnvFile(rootDir: string, env: NodeJS.ProcessEnv): void {
  const filePath = path.join(rootDir, ENV_FILENAME);
  if (!fs.existsSync(filePath)) {
    return;
  }
  const parsed = dotenv.parse(fs.readFileSync(filePath, "utf8"));
  for (const [key, value] of Object.entries(parsed)) {
    if (env[key] === undefined) {
      env[key] = value;
    }
  }
}

/**
 * Merges, highest first: explicit overrides (flags), `SOUNDER_*` environment
 * variables (after `.env` is loaded), the config file, built-in defaults.
 */
export function loadConfig(rootDir: string, options: LoadConfigOptions = {}): Config {
  const env = options.env ?? process.env;
  loadEnvFile(rootDir, env);
  const file = readConfigFile(rootDir);
  const fromEnv = requestConfigFromEnv(env);

  const flags = options.overrides ?? {};
  const defaults = file.defaults ?? {};
  const request: RequestConfig = {
    model: flags.model ?? fromEnv.model ?? defaults.model ?? DEFAULT_REQUEST_CONFIG.model,
    search_count:
      flags.search_count ??
      fromEnv.search_count ??
      defaults.search_count ??
      DEFAULT_REQUEST_CONFIG.search_count,
    max_iterations:
      flags.max_iterations ??
      fromEnv.max_iterations ??
      defaults.max_iterations ??
      DEFAULT_REQUEST_CONFIG.max_iterations,
    max_searches:
      flags.max_searches ??
      fromEnv.max_searches ??
      defaults.max_searches ??
      DEFAULT_REQUEST_CONFIG.max_searches,
    auto_decide:
      flags.auto_decide ??
      fromEnv.auto_decide ??
      defaults.auto_decide ??
      DEFAULT_REQUEST_CONFIG.auto_decide,
  };

  const envWorker = parseCommandLine(env[`${ENV_PREFIX}WORKER_COMMAND`]);
  const worker: WorkerConfig = envWorker ?? {
    command: file.worker?.command ?? DEFAULT_WORKER.command,
    args: file.worker?.args ?? (file.worker?.command ? [] : DEFAULT_WORKER.args),
    env: file.worker?.env,
  };

  const runsDir = nonEmpty(env[`${ENV_PREFIX}RUNS_DIR`]) ?? file.runsDir ?? DEFAULT_RUNS_DIR;

  return {
    request,
    worker,
    runsDir: path.resolve(rootDir, runsDir),
  };
}

export function requestConfigFromEnv(env: NodeJS.ProcessEnv): ConfigOverrides {
  return {
    model: nonEmpty(env[`${ENV_PREFIX}MODEL`]),
    search_count: parseCount(env[`${ENV_PREFIX}SEARCH_COUNT`]),
    max_iterations: parseCount(env[`${ENV_PREFIX}MAX_ITERATIONS`]),
    max_searches: parseCount(env[`${ENV_PREFIX}MAX_SEARCHES`]),
    auto_decide: parseFlag(env[`${ENV_PREFIX}AUTO_DECIDE`]),
  };
}

export function parseCount(value: string | undefined): number | undefined {
  if (value === undefined || !/^\s*\d+\s*$/.test(value)) {
    return undefined;
  }
  return Number.parseInt(value, 10);
}

export function parseFlag(value: string | undefined): boolean | undefined {
  switch (value?.trim().toLowerCase()) {
    case "1":
    case "true":
    case "yes":
    case "on":
      return true;
    case "0":
    case "false":
    case "no":
    case "off":
      return false;
    default:
      return undefined;
  }
}

function parseCommandLine(value: string | undefined): WorkerConfig | null {
  const parts = value?.trim().split(/\s+/).filter(Boolean) ?? [];
  if (parts.length === 0) {
    return null;
  }
  const [command, ...args] = parts;
  return { command, args };
}

function nonEmpty(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

function validateFileConfig(value: unknown, filePath: string): FileConfig {
  if (!isRecord(value)) {
    throw new ConfigError(`${filePath} must contain a JSON object.`);
  }
  const config: FileConfig = {};

  if (value.worker !== undefined) {
    const worker = value.worker;
    if (!isRecord(worker)) {
      throw new ConfigError(`${filePath}: "worker" must be an object.`);
    }
    config.worker = {};
    if (worker.command !== undefined) {
      if (typeof worker.command !== "string" || !worker.command.trim()) {
        throw new ConfigError(`${filePath}: "worker.command" must be a non-empty string.`);
      }
      config.worker.command = worker.command;
    }
    if (worker.args !== undefined) {
      if (!isStringArray(worker.args)) {
        throw new ConfigError(`${filePath}: "worker.args" must be an array of strings.`);
      }
      config.worker.args = worker.args;
    }
    if (worker.env !== undefined) {
      const env = worker.env;
      if (!isRecord(env) || !Object.values(env).every((v) => typeof v === "string")) {
        throw new ConfigError(`${filePath}: "worker.env" must map names to strings.`);
      }
      config.worker.env = Object.fromEntries(
        Object.entries(env).map(([key, v]) => [key, String(v)])
      );
    }
  }

  if (value.runsDir !== undefined) {
    if (typeof value.runsDir !== "string" || !value.runsDir.trim()) {
      throw new ConfigError(`${filePath}: "runsDir" must be a non-empty string.`);
    }
    config.runsDir = value.runsDir;
  }

  if (value.defaults !== undefined) {
    const defaults = value.defaults;
    if (!isRecord(defaults)) {
      throw new ConfigError(`${filePath}: "defaults" must be an object.`);
    }
    config.defaults = {};
    if (defaults.model !== undefined) {
      if (typeof defaults.model !== "string") {
        throw new ConfigError(`${filePath}: "defaults.model" must be a string.`);
      }
      config.defaults.model = defaults.model;
    }
    for (const key of ["search_count", "max_iterations", "max_searches"] as const) {
      const count = defaults[key];
      if (count === undefined) {
        continue;
      }
      if (typeof count !== "number" || !Number.isInteger(count) || count < 0) {
        throw new ConfigError(`${filePath}: "defaults.${key}" must be a non-negative integer.`);
      }
      config.defaults[key] = count;
    }
    if (defaults.auto_decide !== undefined) {
      if (typeof defaults.auto_decide !== "boolean") {
        throw new ConfigError(`${filePath}: "defaults.auto_decide" must be a boolean.`);
      }
      config.defaults.auto_decide = defaults.auto_decide;
    }
  }

  return config;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((item) => typeof item === "string");
}
