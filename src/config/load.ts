import path from "node:path";
import type { TSchema, Static } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import { ConfigInvalidError, errorMessage } from "../errors.js";
import type { PatchApiCredentials } from "../reconcile/client.js";
import { DEFAULT_RETRY_POLICY, type RetryPolicy } from "../retry/coordinator.js";
import { validateCycleTable } from "../rollout/scheduler.js";
import { DEFAULT_NAMING_PATTERN } from "../normalize/normalizer.js";
import { isErrno, readJsonFile } from "../utils/fs.js";
import { ApplicationsFileSchema, CyclesFileSchema, WorkflowFileSchema, type ApplicationSpec, type CyclesFile } from "./schema.js";

export const CONFIG_FILES = {
  applications: "applications.json",
  cycles: "cycles.json",
  workflow: "workflow.json"
} as const;

export interface WorkflowSettings {
  cacheDir: string;
  stateDir: string;
  workDir: string;
  concurrency: number;
  retry: RetryPolicy;
  circuitThreshold: number;
  requestTimeoutMs: number;
  downloadTimeoutMs: number;
  namingPattern: string;
}

export interface LoadedConfig {
  configDir: string;
  applications: ApplicationSpec[];
  cycles: CyclesFile;
  workflow: WorkflowSettings;
}

async function readConfigFile(filePath: string, required: boolean): Promise<unknown> {
  try {
    return await readJsonFile(filePath);
  } catch (err) {
    if (isErrno(err, "ENOENT")) {
      if (required) {
        throw new ConfigInvalidError([`${path.basename(filePath)} not found in ${path.dirname(filePath)}`]);
      }
      return {};
    }
    throw new ConfigInvalidError([`${path.basename(filePath)}: ${errorMessage(err)}`], { cause: err });
  }
}

function checkSchema<T extends TSchema>(schema: T, value: unknown, fileName: string): Static<T> {
  if (Value.Check(schema, value)) {
    return value;
  }
  const problems = [...Value.Errors(schema, value)].map((error) => `${fileName}${error.path || "/"}: ${error.message}`);
  throw new ConfigInvalidError(problems);
}

function duplicateIds(applications: ApplicationSpec[]): string[] {
  const seen = new Set<string>();
  const duplicates = new Set<string>();
  for (const app of applications) {
    if (seen.has(app.id)) duplicates.add(app.id);
    seen.add(app.id);
  }
  return [...duplicates];
}

/**
 * Load and cross-check the three config files. Relative directories in
 * workflow.json resolve against `baseDir`.
 */
export async function loadConfig(configDir: string, baseDir: string = process.cwd()): Promise<LoadedConfig> {
  const dir = path.resolve(baseDir, configDir);
  const applications = checkSchema(
    ApplicationsFileSchema,
    await readConfigFile(path.join(dir, CONFIG_FILES.applications), true),
    CONFIG_FILES.applications
  );
  const cycles = checkSchema(CyclesFileSchema, await readConfigFile(path.join(dir, CONFIG_FILES.cycles), true), CONFIG_FILES.cycles);
  const workflowFile = checkSchema(
    WorkflowFileSchema,
    await readConfigFile(path.join(dir, CONFIG_FILES.workflow), false),
    CONFIG_FILES.workflow
  );

  const problems = [
    ...duplicateIds(applications).map((id) => `${CONFIG_FILES.applications}: duplicate application id ${id}`),
    ...validateCycleTable(cycles.cycles).map((problem) => `${CONFIG_FILES.cycles}: ${problem}`)
  ];
  const retry: RetryPolicy = { ...DEFAULT_RETRY_POLICY, ...workflowFile.retry };
  if (retry.maxDelayMs < retry.baseDelayMs) {
    problems.push(`${CONFIG_FILES.workflow}: retry.maxDelayMs must not be below retry.baseDelayMs`);
  }
  if (problems.length > 0) {
    throw new ConfigInvalidError(problems);
  }

  return {
    configDir: dir,
    applications,
    cycles,
    workflow: {
      cacheDir: path.resolve(baseDir, workflowFile.cacheDir ?? "cache"),
      stateDir: path.resolve(baseDir, workflowFile.stateDir ?? "state"),
      workDir: path.resolve(baseDir, workflowFile.workDir ?? "work"),
      concurrency: workflowFile.concurrency ?? 5,
      retry,
      circuitThreshold: workflowFile.circuit?.threshold ?? 3,
      requestTimeoutMs: workflowFile.timeouts?.requestMs ?? 30_000,
      downloadTimeoutMs: workflowFile.timeouts?.downloadMs ?? 600_000,
      namingPattern: workflowFile.naming?.pattern ?? DEFAULT_NAMING_PATTERN
    }
  };
}

/** "all" or an explicit subset; unknown ids are a configuration error. */
export function selectApplications(applications: ApplicationSpec[], selection: "all" | string[]): ApplicationSpec[] {
  if (selection === "all") {
    return applications;
  }
  const unknown = selection.filter((id) => !applications.some((app) => app.id === id));
  if (unknown.length > 0) {
    throw new ConfigInvalidError(unknown.map((id) => `unknown application: ${id}`));
  }
  const wanted = new Set(selection);
  return applications.filter((app) => wanted.has(app.id));
}

export const CREDENTIAL_ENV = {
  baseUrl: "PATCH_API_URL",
  username: "PATCH_API_USERNAME",
  password: "PATCH_API_PASSWORD"
} as const;

export function readCredentials(env: NodeJS.ProcessEnv): PatchApiCredentials {
  const baseUrl = env[CREDENTIAL_ENV.baseUrl];
  const username = env[CREDENTIAL_ENV.username];
  const password = env[CREDENTIAL_ENV.password];
  if (!baseUrl || !username || !password) {
    const missing = Object.values(CREDENTIAL_ENV).filter((name) => !env[name]);
    throw new ConfigInvalidError(missing.map((name) => `environment variable ${name} is not set`));
  }
  return { baseUrl, username, password };
}
