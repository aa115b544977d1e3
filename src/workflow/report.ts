import type { AppOutcome } from "../types.js";
import type { RunSummary } from "./orchestrator.js";
import type { RunState } from "./run-state.js";

export function describeOutcome(outcome: AppOutcome): string {
  switch (outcome.status) {
    case "success":
      return `${outcome.appId}: success ${outcome.version}${outcome.cacheHit ? " (cache hit)" : ""}`;
    case "manual-intervention":
      return `${outcome.appId}: manual intervention required: ${outcome.reason}`;
    case "failed":
      return `${outcome.appId}: failed at ${outcome.phase} [${outcome.code}] ${outcome.reason}`;
    case "skipped":
      return `${outcome.appId}: skipped (${outcome.reason})`;
  }
}

/** Plain-text run summary, one line per application plus planned actions in dry runs. */
export function formatSummary(summary: RunSummary): string[] {
  const lines = [`Run ${summary.runId} (cycle ${summary.cycle}${summary.dryRun ? ", dry run" : ""})`];
  for (const outcome of summary.outcomes) {
    lines.push(`  ${describeOutcome(outcome)}`);
    if (outcome.status === "success" || outcome.status === "manual-intervention") {
      for (const action of outcome.actions) {
        lines.push(`    - ${action}`);
      }
    }
  }
  const { counts } = summary;
  lines.push(
    `Totals: ${counts.success} success, ${counts["manual-intervention"]} manual, ${counts.failed} failed, ${counts.skipped} skipped in ${(summary.durationMs / 1000).toFixed(1)}s`
  );
  lines.push(`Downloads: ${summary.downloads.cacheHits} cached, ${summary.downloads.cacheMisses} fetched, ${summary.downloads.bytes} bytes`);
  return lines;
}

export function formatRunState(state: RunState): string {
  const result = state.outcome ? describeOutcome(state.outcome) : `${state.appId}: in progress`;
  const error = state.lastError ? ` last error [${state.lastError.code}] at ${state.lastError.phase}` : "";
  return `${result} | phase ${state.phase} | run ${state.runId} | updated ${state.updatedAt}${error}`;
}
