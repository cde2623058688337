import assert from "node:assert/strict";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import test from "node:test";

import { artifactName, ArtifactSink } from "../artifacts.js";
import { createRequest } from "../protocol.js";

function tempDir(): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), "sounder-artifacts-"));
}

function readJson(filePath: string): unknown {
  return JSON.parse(fs.readFileSync(filePath, "utf8"));
}

test("artifactName pads the sequence and slugs the agent", () => {
  assert.equal(artifactName("Planner", 7, "txt"), "007-planner.txt");
  assert.equal(artifactName("web/search", 12, "json"), "012-web-search.json");
  assert.equal(artifactName("a\\b", 1000, "txt"), "1000-a-b.txt");
});

test("writes request, prompts and raw responses under the run directory", () => {
  const runsDir = tempDir();
  const sink = new ArtifactSink(runsDir, "run-1");
  const request = createRequest("run-1", "quantum computing", {
    model: "gpt-4o",
    search_count: 5,
    max_iterations: 10,
    max_searches: 15,
    auto_decide: true,
  });

  sink.writeRequest(request);
  sink.writePrompt("Planner", 0, "plan the searches");
  sink.writeRawResponse("writer", 3, '{"ok":true}', {
    prompt_tokens: 10,
    completion_tokens: 5,
    total_tokens: 15,
  });
  sink.writeRawResponse("planner", 1, "plain");

  const runDir = path.join(runsDir, "run-1");
  assert.equal(sink.runDir, runDir);
  assert.equal(
    fs.readFileSync(path.join(runDir, "request.json"), "utf8"),
    JSON.stringify(request, null, 2)
  );
  assert.equal(
    fs.readFileSync(path.join(runDir, "prompts", "000-planner.txt"), "utf8"),
    "plan the searches"
  );
  assert.deepEqual(readJson(path.join(runDir, "raw_responses", "003-writer.json")), {
    agent: "writer",
    sequence: 3,
    content: '{"ok":true}',
    token_usage: { prompt_tokens: 10, completion_tokens: 5, total_tokens: 15 },
  });
  assert.deepEqual(readJson(path.join(runDir, "raw_responses", "001-planner.json")), {
    agent: "planner",
    sequence: 1,
    content: "plain",
  });
});

test("metadata collects trace and model details with null for what never arrived", () => {
  const runsDir = tempDir();
  let clock = 1_000;
  const sink = new ArtifactSink(runsDir, "run-2", () => clock);

  assert.deepEqual(sink.metadata(), {
    run_id: "run-2",
    model: null,
    total_tokens: null,
    duration_ms: 0,
    trace_id: null,
    trace_url: null,
  });

  sink.recordTrace({ type: "trace", trace_id: "trace-abc", trace_url: "https://example.test/t/abc" });
  sink.recordMetadata({ type: "metadata", model: "gpt-4o", total_tokens: 1234, duration_ms: 5 });
  clock = 1_750;
  sink.writeMetadata();

  assert.deepEqual(readJson(path.join(runsDir, "run-2", "metadata.json")), {
    run_id: "run-2",
    model: "gpt-4o",
    total_tokens: 1234,
    duration_ms: 750,
    trace_id: "trace-abc",
    trace_url: "https://example.test/t/abc",
  });
});

test("output.md is written only when a report arrived", () => {
  const runsDir = tempDir();
  const sink = new ArtifactSink(runsDir, "run-3");
  const outputPath = path.join(runsDir, "run-3", "output.md");

  sink.writeOutput();
  assert.equal(sink.hasReport, false);
  assert.equal(fs.existsSync(outputPath), false);

  sink.recordReport({
    type: "report",
    short_summary: "Short",
    markdown_report: "# Findings\n\nTides follow the moon.",
    follow_up_questions: [],
  });
  sink.writeOutput();
  assert.equal(sink.hasReport, true);
  assert.equal(fs.readFileSync(outputPath, "utf8"), "# Findings\n\nTides follow the moon.");
});
