/**
 * Async event queue tests.
 *
 * Run: node --import tsx --test src/orchestrator/event-queue.test.ts
 */

import { strict as assert } from "node:assert";
import { describe, it } from "node:test";

import { AsyncEventQueue } from "./event-queue.js";

interface Item {
  n: number;
}

async function drain(queue: AsyncEventQueue<Item>): Promise<number[]> {
  const seen: number[] = [];
  for await (const item of queue) {
    seen.push(item.n);
  }
  return seen;
}

describe("AsyncEventQueue", () => {
  it("delivers buffered items in push order and ends after close", async () => {
    const queue = new AsyncEventQueue<Item>();
    queue.push({ n: 1 });
    queue.push({ n: 2 });
    queue.close();

    assert.deepEqual(await drain(queue), [1, 2]);
  });

  it("wakes a waiting consumer", async () => {
    const queue = new AsyncEventQueue<Item>();
    const drained = drain(queue);

    setImmediate(() => {
      queue.push({ n: 1 });
      queue.push({ n: 2 });
      queue.push({ n: 3 });
      queue.close();
    });

    assert.deepEqual(await drained, [1, 2, 3]);
  });

  it("can be iterated only once", () => {
    const queue = new AsyncEventQueue<Item>();
    queue[Symbol.asyncIterator]();
    assert.throws(() => queue[Symbol.asyncIterator](), /already consumed/);
  });

  it("rejects pushes after close", () => {
    const queue = new AsyncEventQueue<Item>();
    queue.close();
    assert.equal(queue.isClosed, true);
    assert.throws(() => queue.push({ n: 1 }), /closed/);
  });

  it("drops items once the consumer stops early", async () => {
    const queue = new AsyncEventQueue<Item>();
    queue.push({ n: 1 });
    queue.push({ n: 2 });

    for await (const item of queue) {
      assert.equal(item.n, 1);
      break;
    }

    queue.push({ n: 3 });
    assert.equal(queue.pending, 0);
  });
});
