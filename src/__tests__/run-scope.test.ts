import assert from "node:assert/strict";
import test from "node:test";

import { AnswerHandoff } from "../handoff.js";
import { RunScope } from "../run-scope.js";

test("a handoff settles once; later settles are refused", async () => {
  const handoff = new AnswerHandoff();
  assert.equal(handoff.fulfill(["students"]), true);
  assert.equal(handoff.cancel(), false);
  assert.equal(handoff.abandon("too late"), false);
  assert.equal(handoff.settled, true);
  assert.deepEqual(await handoff.wait(), { kind: "answered", answers: ["students"] });
});

test("a run opens at most one clarifying round", () => {
  const scope = new RunScope("run-1");
  assert.equal(scope.submitAnswers(["early"]), false);

  const handoff = scope.openClarification();
  assert.ok(handoff);
  assert.equal(scope.awaitingAnswers, true);
  assert.equal(scope.openClarification(), null);

  assert.equal(scope.submitAnswers(["a"]), true);
  assert.equal(scope.awaitingAnswers, false);
  assert.equal(scope.submitAnswers(["b"]), false);
});

test("cancelAnswers settles the open round as cancelled", async () => {
  const scope = new RunScope("run-1");
  const handoff = scope.openClarification();
  assert.ok(handoff);
  assert.equal(scope.cancelAnswers(), true);
  assert.deepEqual(await handoff.wait(), { kind: "cancelled" });
});

test("dispose abandons a pending round and refuses further interrupts", async () => {
  const scope = new RunScope("run-1");
  const handoff = scope.openClarification();
  assert.ok(handoff);

  assert.equal(scope.interrupt("pause"), true);
  scope.dispose("user quit");
  scope.dispose("again");

  assert.equal(scope.active, false);
  assert.deepEqual(await handoff.wait(), { kind: "abandoned", reason: "user quit" });
  assert.equal(scope.interrupt("stop"), false);
  assert.deepEqual(scope.interrupts.drain(), ["pause"]);
  assert.equal(scope.interrupts.isClosed, true);
  assert.equal(scope.openClarification(), null);
});

test("abort fires the run's signal", () => {
  const scope = new RunScope("run-1");
  let fired = 0;
  scope.signal.addEventListener("abort", () => {
    fired += 1;
  });
  scope.abort();
  assert.equal(scope.signal.aborted, true);
  assert.equal(fired, 1);
});
