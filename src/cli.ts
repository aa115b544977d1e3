#!/usr/bin/env node
import path from "node:path";
import { Command, InvalidArgumentError, Option } from "commander";
import { CacheStore } from "./cache/store.js";
import { loadConfig, selectApplications } from "./config/load.js";
import { ConfigInvalidError, errorMessage } from "./errors.js";
import { FileKeyValueStore } from "./store/kv.js";
import { removeDir } from "./utils/fs.js";
import { createConsoleLogger } from "./utils/log.js";
import { cacheIndexDir, createEngine } from "./workflow/engine.js";
import { formatRunState, formatSummary } from "./workflow/report.js";
import { RUN_STEPS, RunStateStore, type RunStep } from "./workflow/run-state.js";

interface RunCommandOptions {
  apps: string[];
  cycle?: string;
  week?: number;
  dryRun?: boolean;
  force?: boolean;
  verbose?: boolean;
  json?: boolean;
  retryFrom?: RunStep;
  config: string;
}

function parseWeek(value: string): number {
  const week = Number(value);
  if (!Number.isInteger(week) || week < 1) {
    throw new InvalidArgumentError("week must be a positive integer");
  }
  return week;
}

function appSelection(apps: string[] | undefined): "all" | string[] {
  if (!apps || apps.length === 0 || apps.includes("all")) {
    return "all";
  }
  return apps;
}

function reportFailure(err: unknown): void {
  if (err instanceof ConfigInvalidError) {
    console.error(err.message);
  } else {
    console.error(errorMessage(err));
  }
  process.exitCode = 1;
}

const program = new Command();

program.name("patchpilot").description("Download, verify, package and roll out third-party application patches.").version("0.1.0");

program
  .command("run")
  .description("Run the patch workflow for the selected applications.")
  .option("--apps <ids...>", "Application ids, or \"all\"", ["all"])
  .option("--cycle <name>", "Rollout cycle to target (defaults to the current week)")
  .option("--week <n>", "Week ordinal to resolve the cycle from", parseWeek)
  .option("--dry-run", "Plan every action without changing anything")
  .option("--force", "Ignore cached validators and download again")
  .addOption(new Option("--retry-from <step>", "Redo an unfinished run from this step").choices([...RUN_STEPS]))
  .option("--verbose", "Debug logging")
  .option("--json", "Print the run summary as JSON")
  .option("--config <dir>", "Configuration directory", "config")
  .action(async (opts: RunCommandOptions) => {
    const logger = createConsoleLogger({ verbose: opts.verbose });
    const controller = new AbortController();
    const onSignal = (signal: NodeJS.Signals) => {
      logger.warn(`${signal} received, stopping before the next phase`);
      controller.abort();
    };
    process.once("SIGINT", onSignal);
    process.once("SIGTERM", onSignal);
    try {
      const config = await loadConfig(opts.config);
      const engine = createEngine(config, { logger, dryRun: opts.dryRun, signal: controller.signal });
      const summary = await engine.run({
        apps: appSelection(opts.apps),
        cycleName: opts.cycle,
        week: opts.week,
        dryRun: opts.dryRun,
        force: opts.force,
        retryFrom: opts.retryFrom,
        signal: controller.signal
      });
      if (opts.json) {
        console.log(JSON.stringify(summary, null, 2));
      } else {
        for (const line of formatSummary(summary)) console.log(line);
      }
      process.exitCode = summary.exitCode;
    } catch (err) {
      reportFailure(err);
    } finally {
      process.off("SIGINT", onSignal);
      process.off("SIGTERM", onSignal);
    }
  });

program
  .command("status")
  .description("Show the persisted run state of each application.")
  .option("--apps <ids...>", "Application ids")
  .option("--config <dir>", "Configuration directory", "config")
  .action(async (opts: { apps?: string[]; config: string }) => {
    try {
      const config = await loadConfig(opts.config);
      const selected = new Set(selectApplications(config.applications, appSelection(opts.apps)).map((app) => app.id));
      const states = await new RunStateStore(new FileKeyValueStore(config.workflow.stateDir)).list();
      const shown = states.filter((state) => selected.has(state.appId));
      if (shown.length === 0) {
        console.log("No run state recorded.");
      }
      for (const state of shown) console.log(formatRunState(state));
    } catch (err) {
      reportFailure(err);
    }
  });

program
  .command("reset")
  .description("Forget run state, and optionally cached downloads, so the next run starts over.")
  .option("--apps <ids...>", "Application ids")
  .option("--cache", "Also delete cache entries and downloaded files")
  .option("--config <dir>", "Configuration directory", "config")
  .action(async (opts: { apps?: string[]; cache?: boolean; config: string }) => {
    try {
      const config = await loadConfig(opts.config);
      const apps = selectApplications(config.applications, appSelection(opts.apps));
      const runStates = new RunStateStore(new FileKeyValueStore(config.workflow.stateDir));
      const cache = new CacheStore(new FileKeyValueStore(cacheIndexDir(config.workflow.cacheDir)));
      for (const app of apps) {
        await runStates.delete(app.id);
        if (opts.cache) {
          await cache.clear(app.id);
          await removeDir(path.join(config.workflow.cacheDir, app.id));
        }
      }
      console.log(`Reset ${apps.length} application(s)${opts.cache ? " including cache" : ""}.`);
    } catch (err) {
      reportFailure(err);
    }
  });

program
  .command("apps")
  .description("Validate the configuration and list managed applications.")
  .option("--config <dir>", "Configuration directory", "config")
  .action(async (opts: { config: string }) => {
    try {
      const config = await loadConfig(opts.config);
      for (const app of config.applications) {
        console.log(`${app.id}\t${app.name}\t${app.source.kind}\t${app.expectedIdentity}\t${app.patchTitle}`);
      }
      console.log(`${config.applications.length} application(s), ${config.cycles.cycles.length} cycle(s).`);
    } catch (err) {
      reportFailure(err);
    }
  });

await program.parseAsync(process.argv);
