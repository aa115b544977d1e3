import { FatalError, type ErrorKind } from "../errors.js";
import type { KeyValueStore } from "../store/kv.js";
import { RUN_PHASES, type AppOutcome, type Artifact, type NormalizedMetadata, type NormalizedPackage, type RunPhase } from "../types.js";

/** Steps a run can be restarted from; each produces the phase of the same index + 1. */
export const RUN_STEPS = ["download", "verify", "normalize", "reconcile"] as const;
export type RunStep = (typeof RUN_STEPS)[number];

export interface RunError {
  phase: RunPhase;
  code: string;
  kind: ErrorKind;
  message: string;
}

export interface RunState {
  runId: string;
  appId: string;
  phase: RunPhase;
  attempts: Partial<Record<RunPhase, number>>;
  startedAt: string;
  updatedAt: string;
  finishedAt?: string;
  lastError?: RunError;
  outcome?: AppOutcome;
  cacheHit?: boolean;
  artifact?: Artifact;
  metadata?: NormalizedMetadata;
  package?: NormalizedPackage;
}

export function phaseIndex(phase: RunPhase): number {
  return RUN_PHASES.indexOf(phase);
}

export function isRunPhase(value: unknown): value is RunPhase {
  return typeof value === "string" && RUN_PHASES.some((phase) => phase === value);
}

export function isRunStep(value: unknown): value is RunStep {
  return typeof value === "string" && RUN_STEPS.some((step) => step === value);
}

/** The phase a run sits in just before `step` executes. */
export function phaseBefore(step: RunStep): RunPhase {
  return RUN_PHASES[RUN_STEPS.indexOf(step)];
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function str(value: unknown): string | undefined {
  return typeof value === "string" ? value : undefined;
}

function parseArtifact(raw: unknown): Artifact | undefined {
  if (!isRecord(raw)) return undefined;
  const [appId, url, filePath, fingerprint] = [str(raw.appId), str(raw.url), str(raw.path), str(raw.fingerprint)];
  if (appId === undefined || url === undefined || filePath === undefined || fingerprint === undefined) return undefined;
  const artifact: Artifact = { appId, url, path: filePath, fingerprint };
  const declaredVersion = str(raw.declaredVersion);
  if (declaredVersion !== undefined) artifact.declaredVersion = declaredVersion;
  return artifact;
}

function parseMetadata(raw: unknown): NormalizedMetadata | undefined {
  if (!isRecord(raw)) return undefined;
  const [version, identifier, name, identity] = [str(raw.version), str(raw.identifier), str(raw.name), str(raw.identity)];
  if (version === undefined || identifier === undefined || name === undefined || identity === undefined) return undefined;
  const metadata: NormalizedMetadata = { version, identifier, name, identity };
  const minimumOs = str(raw.minimumOs);
  if (minimumOs !== undefined) metadata.minimumOs = minimumOs;
  return metadata;
}

function parsePackage(raw: unknown): NormalizedPackage | undefined {
  if (!isRecord(raw)) return undefined;
  const [appId, version, filename, fingerprint, filePath] = [
    str(raw.appId),
    str(raw.version),
    str(raw.filename),
    str(raw.fingerprint),
    str(raw.path)
  ];
  if (appId === undefined || version === undefined || filename === undefined || fingerprint === undefined || filePath === undefined) {
    return undefined;
  }
  return { appId, version, filename, fingerprint, path: filePath };
}

function stringList(value: unknown): string[] {
  return Array.isArray(value) ? value.filter((item): item is string => typeof item === "string") : [];
}

function parseOutcome(raw: unknown): AppOutcome | undefined {
  if (!isRecord(raw)) return undefined;
  const appId = str(raw.appId);
  if (appId === undefined) return undefined;
  switch (raw.status) {
    case "success": {
      const version = str(raw.version);
      return version === undefined
        ? undefined
        : { status: "success", appId, version, cacheHit: raw.cacheHit === true, actions: stringList(raw.actions) };
    }
    case "manual-intervention":
      return { status: "manual-intervention", appId, reason: str(raw.reason) ?? "", actions: stringList(raw.actions) };
    case "failed":
      return isRunPhase(raw.phase)
        ? { status: "failed", appId, reason: str(raw.reason) ?? "", code: str(raw.code) ?? "UNKNOWN", phase: raw.phase }
        : undefined;
    case "skipped":
      return raw.reason === "circuit-open" || raw.reason === "cancelled" ? { status: "skipped", appId, reason: raw.reason } : undefined;
    default:
      return undefined;
  }
}

/**
 * Reads back a persisted record. Anything unrecognisable reads as absent,
 * which only means the application starts from the beginning.
 */
export function parseRunState(appId: string, raw: unknown): RunState | undefined {
  if (!isRecord(raw) || raw.appId !== appId || !isRunPhase(raw.phase)) {
    return undefined;
  }
  const { runId, startedAt, updatedAt } = raw;
  if (typeof runId !== "string" || typeof startedAt !== "string" || typeof updatedAt !== "string") {
    return undefined;
  }
  const attempts: Partial<Record<RunPhase, number>> = {};
  if (isRecord(raw.attempts)) {
    for (const phase of RUN_PHASES) {
      const count = raw.attempts[phase];
      if (typeof count === "number") attempts[phase] = count;
    }
  }
  const state: RunState = { runId, appId, phase: raw.phase, attempts, startedAt, updatedAt };
  if (typeof raw.finishedAt === "string") state.finishedAt = raw.finishedAt;
  if (typeof raw.cacheHit === "boolean") state.cacheHit = raw.cacheHit;
  state.artifact = parseArtifact(raw.artifact);
  state.metadata = parseMetadata(raw.metadata);
  state.package = parsePackage(raw.package);
  state.outcome = parseOutcome(raw.outcome);
  if (isRecord(raw.lastError) && isRunPhase(raw.lastError.phase)) {
    const { code, kind, message } = raw.lastError;
    if (typeof code === "string" && typeof kind === "string" && typeof message === "string") {
      state.lastError = { phase: raw.lastError.phase, code, kind: toErrorKind(kind), message };
    }
  }
  return state;
}

const ERROR_KINDS: readonly ErrorKind[] = [
  "TransientIO",
  "AuthExpired",
  "SignatureMismatch",
  "RemoteConflict",
  "RemoteResourceMissing",
  "ConfigInvalid",
  "Cancelled",
  "Fatal"
];

function toErrorKind(kind: string): ErrorKind {
  return ERROR_KINDS.find((candidate) => candidate === kind) ?? "Fatal";
}

function isInterrupted(state: RunState): boolean {
  return state.outcome === undefined || state.outcome.status === "skipped";
}

export type PhaseOutputs = Pick<RunState, "artifact" | "metadata" | "package" | "cacheHit">;

/** RunState persistence. Phases only move forward unless rewound explicitly. */
export class RunStateStore {
  constructor(
    private readonly backend: KeyValueStore,
    private readonly now: () => Date = () => new Date()
  ) {}

  /** A record that is not valid JSON reads as absent, like any other unrecognisable one. */
  async load(appId: string): Promise<RunState | undefined> {
    let raw: unknown;
    try {
      raw = await this.backend.get(appId);
    } catch (err) {
      if (err instanceof SyntaxError) {
        return undefined;
      }
      throw err;
    }
    return parseRunState(appId, raw);
  }

  async list(): Promise<RunState[]> {
    const states: RunState[] = [];
    for (const key of await this.backend.keys()) {
      const state = await this.load(key);
      if (state) states.push(state);
    }
    return states;
  }

  async delete(appId?: string): Promise<string[]> {
    const targets = appId === undefined ? await this.backend.keys() : [appId];
    for (const key of targets) {
      await this.backend.delete(key);
    }
    return targets;
  }

  /**
   * State for a new run. A record left by a crash or a cancellation is
   * resumed. One that ended in an outcome (failed, manual intervention or
   * completed) is replaced, unless `retryFrom` names the step to restart
   * from; that rewinds the record to just before the step.
   */
  async begin(appId: string, runId: string, retryFrom?: RunStep): Promise<{ state: RunState; resumed: boolean }> {
    const existing = await this.load(appId);
    if (existing && existing.phase !== "completed" && (retryFrom !== undefined || isInterrupted(existing))) {
      const state: RunState = { ...existing, runId, finishedAt: undefined, outcome: undefined };
      if (retryFrom !== undefined && phaseIndex(phaseBefore(retryFrom)) < phaseIndex(state.phase)) {
        this.rewindInPlace(state, phaseBefore(retryFrom));
      }
      await this.save(state);
      return { state, resumed: true };
    }
    const timestamp = this.now().toISOString();
    const state: RunState = { runId, appId, phase: "pending", attempts: {}, startedAt: timestamp, updatedAt: timestamp };
    await this.save(state);
    return { state, resumed: false };
  }

  async advance(state: RunState, phase: RunPhase, outputs: PhaseOutputs = {}): Promise<RunState> {
    if (phaseIndex(phase) <= phaseIndex(state.phase)) {
      throw new FatalError("PHASE_REGRESSION", `${state.appId}: cannot move from ${state.phase} to ${phase}`);
    }
    Object.assign(state, outputs, { phase, lastError: undefined });
    await this.save(state);
    return state;
  }

  async rewind(state: RunState, phase: RunPhase): Promise<RunState> {
    this.rewindInPlace(state, phase);
    await this.save(state);
    return state;
  }

  async recordFailure(state: RunState, phase: RunPhase, error: { code: string; kind: ErrorKind; message: string }): Promise<RunState> {
    state.attempts[phase] = (state.attempts[phase] ?? 0) + 1;
    state.lastError = { phase, code: error.code, kind: error.kind, message: error.message };
    await this.save(state);
    return state;
  }

  async finish(state: RunState, outcome: AppOutcome): Promise<RunState> {
    state.outcome = outcome;
    state.finishedAt = this.now().toISOString();
    await this.save(state);
    return state;
  }

  private rewindInPlace(state: RunState, phase: RunPhase): void {
    const index = phaseIndex(phase);
    state.phase = phase;
    // Outputs of the phases being redone are dropped.
    if (index < phaseIndex("downloaded")) {
      state.artifact = undefined;
      state.cacheHit = undefined;
    }
    if (index < phaseIndex("verified")) state.metadata = undefined;
    if (index < phaseIndex("normalized")) state.package = undefined;
  }

  private async save(state: RunState): Promise<void> {
    state.updatedAt = this.now().toISOString();
    await this.backend.set(state.appId, state);
  }
}
