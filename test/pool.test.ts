import test from "node:test";
import assert from "node:assert/strict";
import { runPool } from "../src/workflow/pool.js";

const tick = () => new Promise<void>((resolve) => setImmediate(resolve));

test("results keep input order whatever finishes first", async () => {
  const results = await runPool([30, 10, 20], 3, async (value) => {
    for (let i = 0; i < value / 10; i += 1) await tick();
    return value * 2;
  });
  assert.deepEqual(results, [60, 20, 40]);
});

test("no more than width workers run at once", async () => {
  let active = 0;
  let peak = 0;
  await runPool([1, 2, 3, 4, 5, 6, 7], 2, async () => {
    active += 1;
    peak = Math.max(peak, active);
    await tick();
    active -= 1;
  });
  assert.equal(peak, 2);
});

test("width one runs strictly in order", async () => {
  const seen: number[] = [];
  await runPool(["a", "b", "c"], 1, async (_item, index) => {
    seen.push(index);
    await tick();
  });
  assert.deepEqual(seen, [0, 1, 2]);
});

test("an empty input resolves to an empty list", async () => {
  assert.deepEqual(await runPool([], 4, async () => 1), []);
});

test("invalid widths are rejected", async () => {
  await assert.rejects(runPool([1], 0, async () => 1), RangeError);
  await assert.rejects(runPool([1], 1.5, async () => 1), RangeError);
});
