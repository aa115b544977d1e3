import test from "node:test";
import assert from "node:assert/strict";
import { ConfigInvalidError } from "../src/errors.js";
import { cycleOrdinalFor, decideRollout, findCycle, resolveCycle, validateCycleTable } from "../src/rollout/scheduler.js";
import type { Cycle } from "../src/types.js";
import { CYCLES } from "./helpers/fixtures.js";

test("every ordinal in range maps to exactly its cycle", () => {
  for (const cycle of CYCLES) {
    assert.equal(resolveCycle({ ordinal: cycle.ordinal }, CYCLES), cycle);
  }
});

test("ordinals wrap at the table boundary in both directions", () => {
  const n = CYCLES.length;
  assert.equal(resolveCycle({ ordinal: n + 1 }, CYCLES), resolveCycle({ ordinal: 1 }, CYCLES));
  assert.equal(resolveCycle({ ordinal: 2 * n + 2 }, CYCLES).name, "early");
  assert.equal(resolveCycle({ ordinal: 0 }, CYCLES).name, "broad");
  assert.equal(resolveCycle({ ordinal: -2 }, CYCLES).name, "pilot");
});

test("resolution is independent of table order", () => {
  const shuffled = [CYCLES[2], CYCLES[0], CYCLES[1]];
  for (let ordinal = 1; ordinal <= 7; ordinal += 1) {
    assert.equal(resolveCycle({ ordinal }, shuffled).name, resolveCycle({ ordinal }, CYCLES).name);
  }
});

test("calendar dates count whole weeks from the anchor", () => {
  assert.equal(cycleOrdinalFor(new Date("2025-01-06T00:00:00Z"), "2025-01-06"), 1);
  assert.equal(cycleOrdinalFor(new Date("2025-01-12T23:59:59Z"), "2025-01-06"), 1);
  assert.equal(cycleOrdinalFor(new Date("2025-01-13T00:00:00Z"), "2025-01-06"), 2);
  assert.equal(resolveCycle({ date: new Date("2025-01-27T12:00:00Z"), anchorDate: "2025-01-06" }, CYCLES).name, "pilot");
});

test("broken tables are configuration errors", () => {
  const gap: Cycle[] = [
    { name: "a", ordinal: 1, cohort: "A" },
    { name: "b", ordinal: 3, cohort: "B" }
  ];
  assert.deepEqual(validateCycleTable(gap), ["cycle ordinals must be exactly 1..2, got 1, 3"]);
  assert.deepEqual(validateCycleTable([]), ["cycle table is empty"]);
  assert.throws(() => resolveCycle({ ordinal: 1 }, gap), ConfigInvalidError);
  assert.throws(() => resolveCycle({ ordinal: 1.5 }, CYCLES), ConfigInvalidError);
});

test("cycles are found by name", () => {
  assert.equal(findCycle("broad", CYCLES).cohort, "Broad Group");
  assert.throws(() => findCycle("nightly", CYCLES), /unknown cycle: nightly \(known: pilot, early, broad\)/);
});

test("rollout decisions", () => {
  const cycle = CYCLES[0];
  assert.equal(decideRollout(cycle, undefined, "2.0"), "advance");
  assert.equal(decideRollout(cycle, "1.9", "2.0"), "advance");
  assert.equal(decideRollout(cycle, "1.10", "1.9"), "hold");
  assert.equal(decideRollout(cycle, "2.0", "2.0"), "hold");
  assert.equal(decideRollout({ ...cycle, paused: true }, "1.0", "2.0"), "pause");
});
