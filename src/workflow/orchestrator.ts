import { randomUUID } from "node:crypto";
import path from "node:path";
import { CancelledError, FatalError, toPatchPilotError } from "../errors.js";
import type { CacheStore } from "../cache/store.js";
import { selectApplications, type LoadedConfig } from "../config/load.js";
import type { DownloadMetrics, Downloader, DryRunRecorder } from "../download/downloader.js";
import type { PackageNormalizer } from "../normalize/normalizer.js";
import type { PatchReconciler } from "../reconcile/reconciler.js";
import { CircuitBreaker } from "../retry/circuit.js";
import { findCycle, resolveCycle } from "../rollout/scheduler.js";
import { MemoryKeyValueStore } from "../store/kv.js";
import type { AppOutcome, ApplicationSpec, Cycle, OutcomeStatus, RunPhase } from "../types.js";
import { createTempDir, pathExists, removeDir } from "../utils/fs.js";
import type { Logger } from "../utils/log.js";
import type { Verifier } from "../verify/verifier.js";
import { runPool } from "./pool.js";
import { RunStateStore, phaseIndex, type RunError, type RunState, type RunStep } from "./run-state.js";

export interface RunOptions {
  apps: "all" | string[];
  cycleName?: string;
  /** Week ordinal; wins over the calendar when no cycle name is given. */
  week?: number;
  dryRun?: boolean;
  retryFrom?: RunStep;
  force?: boolean;
  signal?: AbortSignal;
}

export type ExitCode = 0 | 1 | 2;

export interface RunSummary {
  runId: string;
  dryRun: boolean;
  cycle: string;
  startedAt: string;
  finishedAt: string;
  durationMs: number;
  outcomes: AppOutcome[];
  counts: Record<OutcomeStatus, number>;
  exitCode: ExitCode;
  downloads: DownloadMetrics;
}

export interface OrchestratorDeps {
  config: LoadedConfig;
  cache: CacheStore;
  runStates: RunStateStore;
  downloader: Downloader;
  verifier: Verifier;
  normalizer: PackageNormalizer;
  /** Absent when no remote credentials are configured; only allowed for dry runs. */
  reconciler?: PatchReconciler;
  logger: Logger;
  now?: () => Date;
}

interface AppContext {
  runId: string;
  cycle: Cycle;
  options: RunOptions;
  circuit: CircuitBreaker;
  runStates: RunStateStore;
  stagingDir?: string;
}

/** Failed or skipped beats manual intervention, which beats success. */
export function exitCodeFor(outcomes: readonly AppOutcome[]): ExitCode {
  if (outcomes.some((outcome) => outcome.status === "failed" || outcome.status === "skipped")) {
    return 1;
  }
  if (outcomes.some((outcome) => outcome.status === "manual-intervention")) {
    return 2;
  }
  return 0;
}

export function countOutcomes(outcomes: readonly AppOutcome[]): Record<OutcomeStatus, number> {
  const counts: Record<OutcomeStatus, number> = { success: 0, "manual-intervention": 0, failed: 0, skipped: 0 };
  for (const outcome of outcomes) {
    counts[outcome.status] += 1;
  }
  return counts;
}

export class WorkflowOrchestrator {
  private readonly now: () => Date;

  constructor(private readonly deps: OrchestratorDeps) {
    this.now = deps.now ?? (() => new Date());
  }

  selectCycle(options: Pick<RunOptions, "cycleName" | "week">): Cycle {
    const { cycles } = this.deps.config;
    if (options.cycleName !== undefined) {
      return findCycle(options.cycleName, cycles.cycles);
    }
    if (options.week !== undefined) {
      return resolveCycle({ ordinal: options.week }, cycles.cycles);
    }
    if (cycles.anchorDate !== undefined) {
      return resolveCycle({ date: this.now(), anchorDate: cycles.anchorDate }, cycles.cycles);
    }
    return resolveCycle({ ordinal: 1 }, cycles.cycles);
  }

  /**
   * Run every selected application. Configuration problems throw before any
   * application starts; everything after that ends up in the summary.
   */
  async run(options: RunOptions): Promise<RunSummary> {
    const { config, logger } = this.deps;
    const apps = selectApplications(config.applications, options.apps);
    const cycle = this.selectCycle(options);
    const dryRun = options.dryRun ?? false;
    if (!dryRun && !this.deps.reconciler) {
      throw new FatalError("RECONCILER_MISSING", "remote patch API is not configured");
    }

    const started = this.now();
    const runId = `${started.toISOString().replace(/[-:.]/g, "")}-${randomUUID().slice(0, 8)}`;
    const circuit = new CircuitBreaker(config.workflow.circuitThreshold);
    logger.info(
      `run ${runId}: ${apps.length} application(s), cycle ${cycle.name} (cohort ${cycle.cohort})${dryRun ? ", dry run" : ""}`
    );

    const stagingDir = dryRun ? await createTempDir("patchpilot-dry-run-") : undefined;
    // Dry runs keep run state in memory so nothing on disk changes.
    const runStates = dryRun ? new RunStateStore(new MemoryKeyValueStore(), this.now) : this.deps.runStates;
    let outcomes: AppOutcome[];
    try {
      const ctx: AppContext = { runId, cycle, options, circuit, runStates, stagingDir };
      outcomes = await runPool(apps, config.workflow.concurrency, (app) => this.runApp(app, ctx));
    } finally {
      if (stagingDir) await removeDir(stagingDir);
    }

    const finished = this.now();
    const summary: RunSummary = {
      runId,
      dryRun,
      cycle: cycle.name,
      startedAt: started.toISOString(),
      finishedAt: finished.toISOString(),
      durationMs: finished.getTime() - started.getTime(),
      outcomes,
      counts: countOutcomes(outcomes),
      exitCode: exitCodeFor(outcomes),
      downloads: { ...this.deps.downloader.metrics }
    };
    const { counts } = summary;
    logger.info(
      `run ${runId} finished: ${counts.success} succeeded, ${counts["manual-intervention"]} need attention, ${counts.failed} failed, ${counts.skipped} skipped`
    );
    return summary;
  }

  private async runApp(app: ApplicationSpec, ctx: AppContext): Promise<AppOutcome> {
    const log = this.deps.logger.child(app.id);
    const { signal } = ctx.options;
    if (signal?.aborted) {
      return { status: "skipped", appId: app.id, reason: "cancelled" };
    }
    if (ctx.circuit.isOpen) {
      log.warn("circuit open, not attempted");
      return { status: "skipped", appId: app.id, reason: "circuit-open" };
    }

    const actions: string[] = [];
    let attempting: RunPhase = "downloaded";
    let state: RunState | undefined;
    try {
      const begun = await ctx.runStates.begin(app.id, ctx.runId, ctx.options.retryFrom);
      state = begun.state;
      if (begun.resumed) {
        log.info(`resuming from ${state.phase}`);
      }
      const outcome = await this.pipeline(app, state, ctx, actions, (phase) => {
        attempting = phase;
      });
      await ctx.runStates.finish(state, outcome);
      if (outcome.status === "success") {
        ctx.circuit.recordSuccess();
        log.info(`done: ${outcome.version}${outcome.cacheHit ? " (cached)" : ""}`);
      }
      return outcome;
    } catch (err) {
      if (err instanceof CancelledError) {
        log.warn(`cancelled before ${attempting}`);
        const outcome: AppOutcome = { status: "skipped", appId: app.id, reason: "cancelled" };
        await this.settle(ctx.runStates, state, outcome, log);
        return outcome;
      }
      const error = toPatchPilotError(err);
      ctx.circuit.recordFatal();
      log.error(`failed while reaching ${attempting}: ${error.message}`);
      if (error.kind === "SignatureMismatch" && !ctx.options.dryRun) {
        // The next run must fetch the artifact again instead of revalidating it.
        try {
          await this.deps.cache.clear(app.id);
        } catch (clearErr) {
          log.error(`could not drop the cache entry: ${toPatchPilotError(clearErr).message}`);
        }
      }
      const outcome: AppOutcome = { status: "failed", appId: app.id, reason: error.message, code: error.code, phase: attempting };
      await this.settle(ctx.runStates, state, outcome, log, { phase: attempting, code: error.code, kind: error.kind, message: error.message });
      return outcome;
    }
  }

  /** Record how an application ended. A store that cannot be written does not change the outcome. */
  private async settle(
    runStates: RunStateStore,
    state: RunState | undefined,
    outcome: AppOutcome,
    log: Logger,
    failure?: RunError
  ): Promise<void> {
    if (!state) {
      return;
    }
    try {
      if (failure) {
        await runStates.recordFailure(state, failure.phase, failure);
      }
      await runStates.finish(state, outcome);
    } catch (err) {
      log.error(`could not persist run state: ${toPatchPilotError(err).message}`);
    }
  }

  /** Whether `phase` is already reached and its output is still on disk. */
  private async reached(state: RunState, phase: RunPhase, outputPath: string | undefined): Promise<boolean> {
    if (phaseIndex(state.phase) < phaseIndex(phase)) {
      return false;
    }
    return outputPath !== undefined && (await pathExists(outputPath));
  }

  private async pipeline(
    app: ApplicationSpec,
    state: RunState,
    ctx: AppContext,
    actions: string[],
    enter: (phase: RunPhase) => void
  ): Promise<AppOutcome> {
    const { downloader, verifier, normalizer, cache } = this.deps;
    const { options, runStates } = ctx;
    const log = this.deps.logger.child(app.id);
    const dryRun: DryRunRecorder | undefined = options.dryRun ? { record: (action) => actions.push(action) } : undefined;
    const checkpoint = (phase: RunPhase) => {
      enter(phase);
      if (options.signal?.aborted) {
        throw new CancelledError();
      }
    };

    checkpoint("downloaded");
    if (!(await this.reached(state, "downloaded", state.artifact?.path))) {
      if (phaseIndex(state.phase) > phaseIndex("pending")) {
        log.info("downloaded artifact is gone, starting over");
        await runStates.rewind(state, "pending");
      }
      const entry = await cache.lookup(app.id);
      const { artifact, cacheHit } = await downloader.fetch(app, entry, {
        force: options.force,
        signal: options.signal,
        dryRun,
        stagingDir: ctx.stagingDir ? path.join(ctx.stagingDir, "downloads", app.id) : undefined
      });
      await runStates.advance(state, "downloaded", { artifact, cacheHit });
    }
    const artifact = state.artifact;
    if (!artifact) {
      throw new FatalError("STATE_INCONSISTENT", `${app.id}: no artifact after download`);
    }

    checkpoint("verified");
    if (phaseIndex(state.phase) < phaseIndex("verified") || !state.metadata) {
      const metadata = await verifier.verify(artifact, app.expectedIdentity, { expectedIdentifier: app.bundleId });
      if (phaseIndex(state.phase) >= phaseIndex("verified")) {
        await runStates.rewind(state, "downloaded");
      }
      await runStates.advance(state, "verified", { metadata });
    }
    const metadata = state.metadata;
    if (!metadata) {
      throw new FatalError("STATE_INCONSISTENT", `${app.id}: no metadata after verification`);
    }

    checkpoint("normalized");
    if (!(await this.reached(state, "normalized", state.package?.path))) {
      const outDir = ctx.stagingDir ? path.join(ctx.stagingDir, "packages") : undefined;
      const pkg = await normalizer.normalize(app, artifact, metadata, outDir);
      if (phaseIndex(state.phase) >= phaseIndex("normalized")) {
        await runStates.rewind(state, "verified");
      }
      await runStates.advance(state, "normalized", { package: pkg });
    }
    const pkg = state.package;
    if (!pkg) {
      throw new FatalError("STATE_INCONSISTENT", `${app.id}: no package after normalization`);
    }

    checkpoint("reconciled");
    if (phaseIndex(state.phase) < phaseIndex("reconciled")) {
      const { reconciler } = this.deps;
      if (!reconciler) {
        actions.push("reconcile skipped: remote patch API not configured");
      } else {
        const result = await reconciler.reconcile(app, pkg, ctx.cycle, { dryRun: options.dryRun, signal: options.signal });
        actions.push(...result.actions.map((action) => action.description));
        if (result.status === "manual-intervention") {
          return { status: "manual-intervention", appId: app.id, reason: result.reason ?? result.state, actions };
        }
      }
      await runStates.advance(state, "reconciled");
    }

    checkpoint("completed");
    await runStates.advance(state, "completed");
    return { status: "success", appId: app.id, version: pkg.version, cacheHit: state.cacheHit ?? false, actions };
  }
}
