import assert from "node:assert/strict";
import test from "node:test";

import { AsyncQueue } from "../channel.js";

test("items come out in the order they went in", async () => {
  const queue = new AsyncQueue<number>();
  queue.push(1);
  queue.push(2);
  assert.deepEqual(await queue.next(), { done: false, value: 1 });
  assert.deepEqual(await queue.next(), { done: false, value: 2 });
});

test("a waiting consumer receives the next push", async () => {
  const queue = new AsyncQueue<string>();
  const pending = queue.next();
  queue.push("late");
  assert.deepEqual(await pending, { done: false, value: "late" });
  assert.equal(queue.size, 0);
});

test("closing delivers buffered items, then ends iteration", async () => {
  const queue = new AsyncQueue<string>();
  queue.push("a");
  queue.push("b");
  queue.close();

  assert.equal(queue.push("c"), false);
  const seen: string[] = [];
  for await (const item of queue) {
    seen.push(item);
  }
  assert.deepEqual(seen, ["a", "b"]);
});

test("close wakes a pending consumer", async () => {
  const queue = new AsyncQueue<string>();
  const pending = queue.next();
  queue.close();
  assert.deepEqual(await pending, { done: true, value: undefined });
});

test("poll gives up after the timeout without losing later items", async () => {
  const queue = new AsyncQueue<string>();
  assert.equal(await queue.poll(5), undefined);

  queue.push("kept");
  assert.equal(queue.size, 1);
  assert.equal(await queue.poll(5), "kept");
});

test("poll resolves as soon as an item arrives", async () => {
  const queue = new AsyncQueue<string>();
  const pending = queue.poll(1_000);
  queue.push("key");
  assert.equal(await pending, "key");
});

test("drain takes everything buffered without waiting", () => {
  const queue = new AsyncQueue<number>();
  assert.deepEqual(queue.drain(), []);
  queue.push(1);
  queue.push(2);
  assert.deepEqual(queue.drain(), [1, 2]);
  assert.equal(queue.size, 0);
});
