import path from "node:path";
import { CacheStore } from "../cache/store.js";
import { readCredentials, type LoadedConfig } from "../config/load.js";
import { Downloader } from "../download/downloader.js";
import { ConfigInvalidError } from "../errors.js";
import { PackageNormalizer } from "../normalize/normalizer.js";
import { PatchApiClient, type PatchApiCredentials } from "../reconcile/client.js";
import { PatchReconciler } from "../reconcile/reconciler.js";
import { RetryCoordinator, type RetryDeps } from "../retry/coordinator.js";
import { FileKeyValueStore, type KeyValueStore } from "../store/kv.js";
import type { FetchLike } from "../utils/http.js";
import type { Logger } from "../utils/log.js";
import { Verifier } from "../verify/verifier.js";
import { WorkflowOrchestrator } from "./orchestrator.js";
import { RunStateStore } from "./run-state.js";

export interface EngineOptions {
  logger: Logger;
  dryRun?: boolean;
  env?: NodeJS.ProcessEnv;
  /** Takes precedence over the environment. */
  credentials?: PatchApiCredentials;
  fetchImpl?: FetchLike;
  signal?: AbortSignal;
  cacheBackend?: KeyValueStore;
  stateBackend?: KeyValueStore;
  retryDeps?: Omit<RetryDeps, "logger">;
  now?: () => Date;
}

function resolveCredentials(options: EngineOptions): PatchApiCredentials | undefined {
  if (options.credentials) {
    return options.credentials;
  }
  try {
    return readCredentials(options.env ?? process.env);
  } catch (err) {
    // A dry run still plans downloads and packaging without the remote API.
    if (options.dryRun && err instanceof ConfigInvalidError) {
      options.logger.warn(`remote patch API not configured, reconciliation will be skipped: ${err.problems.join("; ")}`);
      return undefined;
    }
    throw err;
  }
}

/** Cache entries live beside the per-application artifact directories; "_" never starts an application id. */
export function cacheIndexDir(cacheDir: string): string {
  return path.join(cacheDir, "_index");
}

/** Wire the components for one run from loaded configuration. */
export function createEngine(config: LoadedConfig, options: EngineOptions): WorkflowOrchestrator {
  const { logger, fetchImpl } = options;
  const { workflow } = config;
  const credentials = resolveCredentials(options);
  const retry = new RetryCoordinator(workflow.retry, { ...options.retryDeps, logger: logger.child("retry") });
  const cache = new CacheStore(options.cacheBackend ?? new FileKeyValueStore(cacheIndexDir(workflow.cacheDir)), options.now);
  const runStates = new RunStateStore(options.stateBackend ?? new FileKeyValueStore(workflow.stateDir), options.now);

  const downloader = new Downloader({
    cache,
    cacheDir: workflow.cacheDir,
    retry,
    logger: logger.child("download"),
    fetchImpl,
    requestTimeoutMs: workflow.requestTimeoutMs,
    downloadTimeoutMs: workflow.downloadTimeoutMs
  });
  const reconciler = credentials
    ? new PatchReconciler(
        new PatchApiClient({
          credentials,
          logger: logger.child("api"),
          fetchImpl,
          timeoutMs: workflow.requestTimeoutMs,
          now: options.now,
          signal: options.signal
        }),
        retry,
        logger.child("reconcile")
      )
    : undefined;

  return new WorkflowOrchestrator({
    config,
    cache,
    runStates,
    downloader,
    verifier: new Verifier(logger.child("verify")),
    normalizer: new PackageNormalizer({ outDir: workflow.workDir, pattern: workflow.namingPattern, logger: logger.child("normalize") }),
    reconciler,
    logger: logger.child("run"),
    now: options.now
  });
}
