import assert from "node:assert/strict";
import test from "node:test";

import { parseArgs } from "../args.js";

test("words join into the query and flags become overrides", () => {
  assert.deepEqual(
    parseArgs(["how", "do", "tides", "work", "--model", "gpt-4o-mini", "--search-count", "3", "--no-auto-decide"]),
    {
      query: "how do tides work",
      overrides: { model: "gpt-4o-mini", search_count: 3, auto_decide: false },
      mode: "human",
      help: false,
      errors: [],
    }
  );
});

test("no words means no query", () => {
  const parsed = parseArgs(["--max-iterations", "2", "--max-searches", "8"]);
  assert.equal(parsed.query, null);
  assert.deepEqual(parsed.overrides, { max_iterations: 2, max_searches: 8 });
});

test("output mode flags", () => {
  assert.equal(parseArgs(["q", "--quiet"]).mode, "quiet");
  assert.equal(parseArgs(["q", "-q"]).mode, "quiet");
  assert.equal(parseArgs(["q", "--json", "--quiet"]).mode, "json");
  assert.equal(parseArgs(["-h"]).help, true);
});

test("bad values and unknown options are collected as errors", () => {
  assert.deepEqual(parseArgs(["q", "--search-count", "lots", "--verbose", "--model"]).errors, [
    "--search-count expects a non-negative integer",
    "Unknown option: --verbose",
    "--model expects a model name",
  ]);
});

test("everything after -- is query text", () => {
  assert.equal(parseArgs(["--", "--json", "is", "a", "flag"]).query, "--json is a flag");
});
