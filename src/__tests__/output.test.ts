import assert from "node:assert/strict";
import { Writable } from "node:stream";
import test from "node:test";

import { DEFAULT_REQUEST_CONFIG } from "../config.js";
import { Output } from "../output.js";
import { OutputMode } from "../types.js";

function capture() {
  const chunks: string[] = [];
  const stream = new Writable({
    write(chunk: Buffer, _encoding, callback) {
      chunks.push(chunk.toString("utf8"));
      callback();
    },
  });
  return { stream, text: () => chunks.join("") };
}

function outputFor(mode: OutputMode) {
  const out = capture();
  const err = capture();
  const output = new Output(mode, { out: out.stream, err: err.stream, color: false });
  return { output, out: out.text, err: err.text };
}

test("json mode writes one object per line on stdout", () => {
  const { output, out, err } = outputFor("json");

  output.start("run-1", "/runs/run-1", DEFAULT_REQUEST_CONFIG);
  output.event({ type: "prompt", agent: "planner", sequence: 2, content: "secret prompt" });
  output.event({ type: "raw_response", agent: "planner", sequence: 3, content: "{}" });
  output.event({ type: "metadata", model: "gpt-4o", duration_ms: 10 });
  output.event({ type: "error", message: "boom" });
  output.warning("failed to write prompt: disk full");
  output.complete(false, "run-1", "/runs/run-1");

  assert.equal(
    out(),
    [
      '{"type":"start","version":"v1","run_id":"run-1","artifacts_dir":"/runs/run-1","model":"gpt-4o","search_count":5,"max_iterations":10,"max_searches":15,"auto_decide":true}',
      '{"type":"prompt","agent":"planner","sequence":2}',
      '{"type":"response","agent":"planner","sequence":3}',
      '{"type":"error","message":"boom"}',
      '{"type":"warning","message":"failed to write prompt: disk full"}',
      '{"type":"complete","success":false,"run_id":"run-1","artifacts_dir":"/runs/run-1"}',
      "",
    ].join("\n")
  );
  assert.equal(err(), "");
});

test("human mode narrates on stderr and prints the report on stdout", () => {
  const { output, out, err } = outputFor("human");

  output.event({ type: "status", message: "Searching" });
  output.event({ type: "trace", trace_id: "abcdefgh12345", trace_url: "https://example.test/t" });
  output.event({
    type: "decision",
    action: "search",
    reason: "gaps remain",
    remaining_searches: 4,
    remaining_iterations: 6,
  });
  output.event({
    type: "report",
    short_summary: "Tides follow the moon",
    markdown_report: "# Tides",
    follow_up_questions: ["Why two a day?"],
  });
  output.event({ type: "error", message: "slow down", code: "RATE_LIMIT" });
  output.complete(true, "run-1", "/runs/run-1");

  assert.equal(
    err(),
    [
      "→ Searching",
      "Trace [abcdefgh]: https://example.test/t",
      "Decision: search (searches: 4, iterations: 6)",
      "   Reason: gaps remain",
      "Error [RATE_LIMIT]: slow down",
      "Run complete. Artifacts saved to: /runs/run-1",
      "",
    ].join("\n")
  );
  assert.equal(
    out(),
    `\n${"=".repeat(60)}\n\nSUMMARY: Tides follow the moon\n\n# Tides\n\nFollow-up questions:\n  - Why two a day?\n`
  );
});

test("quiet mode keeps only the report and errors", () => {
  const { output, out, err } = outputFor("quiet");

  output.start("run-1", "/runs/run-1", DEFAULT_REQUEST_CONFIG);
  output.status("Searching");
  output.warning("ignored");
  output.report("Short", "Body", []);
  output.error("LAUNCH_FAILED", "failed to start worker");

  assert.equal(out(), `\n${"=".repeat(60)}\n\nSUMMARY: Short\n\nBody\n`);
  assert.equal(err(), "Error [LAUNCH_FAILED]: failed to start worker\n");
});
