import assert from "node:assert/strict";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import test from "node:test";
import { fileURLToPath } from "node:url";

import { DEFAULT_REQUEST_CONFIG } from "../config.js";
import { LaunchError } from "../errors.js";
import { spawnWorker } from "../exec.js";
import { createRequest } from "../protocol.js";
import { RunScope } from "../run-scope.js";
import { runSession } from "../session.js";
import { FakeWorker } from "./fixtures/fake-worker.js";

function thisDir(): string {
  return path.dirname(fileURLToPath(import.meta.url));
}

test("writes from concurrent senders never interleave", async () => {
  const worker = new FakeWorker();
  const lines = Array.from({ length: 20 }, (_, i) => `{"n":${i}}`);

  await Promise.all(lines.map((line) => worker.handle.send(line)));

  assert.deepEqual(worker.written, lines);
});

test("sending after the input is closed fails", async () => {
  const worker = new FakeWorker();
  await worker.handle.send("first");
  await worker.handle.endInput();
  await worker.handle.endInput();

  await assert.rejects(worker.handle.send("second"), /worker input is closed/);
  assert.equal(worker.inputEnded, true);
  assert.deepEqual(worker.written, ["first"]);
});

test("lines written before anyone reads are kept", async () => {
  const worker = new FakeWorker();
  worker.emitRaw("one");
  worker.emitRaw("two");
  worker.end(0);

  const seen: string[] = [];
  for await (const line of worker.handle.lines) {
    seen.push(line);
  }
  assert.deepEqual(seen, ["one", "two"]);
});

test("a missing worker binary is a LaunchError", async () => {
  await assert.rejects(
    spawnWorker({
      command: "sounder-missing-worker-binary",
      args: [],
      stderr: "ignore",
      initialLine: "{}\n",
    }),
    (error: unknown) => {
      assert.ok(error instanceof LaunchError);
      assert.match(
        error.message,
        /^failed to start worker `sounder-missing-worker-binary`: spawn sounder-missing-worker-binary ENOENT/
      );
      return true;
    }
  );
});

test("runs a real worker process end to end", async () => {
  const runsDir = fs.mkdtempSync(path.join(os.tmpdir(), "sounder-exec-"));
  const script = path.join(thisDir(), "fixtures", "worker-script.ts");
  const request = createRequest("run-real", "tides", DEFAULT_REQUEST_CONFIG);
  const events: string[] = [];
  const warnings: string[] = [];

  const outcome = await runSession({
    request,
    scope: new RunScope("run-real"),
    worker: { command: process.execPath, args: ["--import", "tsx", script] },
    runsDir,
    stderr: "ignore",
    onEvent: (event) => events.push(event.type === "status" ? `status:${event.message}` : event.type),
    warn: (message) => warnings.push(message),
    onClarification: (_questions, handoff) => {
      handoff.fulfill(["shallow"]);
    },
  });

  assert.deepEqual(warnings, []);
  assert.deepEqual(events, ["status:researching tides", "clarifying_questions", "report", "done"]);
  assert.equal(outcome.success, true);
  assert.deepEqual(outcome.exit, { exitCode: 0, signal: null, success: true });
  assert.equal(fs.readFileSync(path.join(outcome.runDir, "output.md"), "utf8"), "# Done");
});
