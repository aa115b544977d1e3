import { ConfigInvalidError } from "../errors.js";
import type { Cycle } from "../types.js";
import { compareVersions } from "../utils/version.js";

export type CalendarContext = { ordinal: number } | { date: Date; anchorDate: string };

export type RolloutDecision = "advance" | "hold" | "pause";

const DAY_MS = 24 * 60 * 60 * 1000;

/** Problems with a cycle table; empty when the table is usable. */
export function validateCycleTable(table: readonly Cycle[]): string[] {
  const problems: string[] = [];
  if (table.length === 0) {
    problems.push("cycle table is empty");
    return problems;
  }
  const ordinals = table.map((cycle) => cycle.ordinal).sort((a, b) => a - b);
  if (!ordinals.every((ordinal, index) => ordinal === index + 1)) {
    problems.push(`cycle ordinals must be exactly 1..${table.length}, got ${ordinals.join(", ")}`);
  }
  const names = new Set<string>();
  for (const cycle of table) {
    if (names.has(cycle.name)) {
      problems.push(`duplicate cycle name: ${cycle.name}`);
    }
    names.add(cycle.name);
  }
  return problems;
}

/** Week ordinal counted from the anchor date; the anchor's own week is 1. */
export function cycleOrdinalFor(date: Date, anchorDate: string): number {
  const anchor = Date.parse(`${anchorDate}T00:00:00Z`);
  if (Number.isNaN(anchor)) {
    throw new ConfigInvalidError([`anchorDate is not a date: ${anchorDate}`]);
  }
  const days = Math.floor((date.getTime() - anchor) / DAY_MS);
  return Math.floor(days / 7) + 1;
}

/**
 * Map a calendar context onto the table. Ordinals wrap modulo the table
 * size in both directions, so N+1 resolves like 1 and 0 like N.
 */
export function resolveCycle(context: CalendarContext, table: readonly Cycle[]): Cycle {
  const problems = validateCycleTable(table);
  if (problems.length > 0) {
    throw new ConfigInvalidError(problems);
  }
  const ordinal = "ordinal" in context ? context.ordinal : cycleOrdinalFor(context.date, context.anchorDate);
  if (!Number.isInteger(ordinal)) {
    throw new ConfigInvalidError([`cycle ordinal must be an integer, got ${ordinal}`]);
  }
  const size = table.length;
  const wrapped = ((((ordinal - 1) % size) + size) % size) + 1;
  const cycle = table.find((candidate) => candidate.ordinal === wrapped);
  if (!cycle) {
    throw new ConfigInvalidError([`no cycle with ordinal ${wrapped}`]);
  }
  return cycle;
}

export function findCycle(name: string, table: readonly Cycle[]): Cycle {
  const cycle = table.find((candidate) => candidate.name === name);
  if (!cycle) {
    throw new ConfigInvalidError([`unknown cycle: ${name} (known: ${table.map((c) => c.name).join(", ")})`]);
  }
  return cycle;
}

/**
 * Whether the policy for this cycle's cohort should move to `targetVersion`.
 * Paused cycles never mutate; policies already at or past the target hold.
 */
export function decideRollout(cycle: Cycle, currentPolicyVersion: string | undefined, targetVersion: string): RolloutDecision {
  if (cycle.paused) {
    return "pause";
  }
  if (currentPolicyVersion !== undefined && compareVersions(currentPolicyVersion, targetVersion) >= 0) {
    return "hold";
  }
  return "advance";
}
