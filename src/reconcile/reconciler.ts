import { CancelledError, RemoteConflictError, RemoteResourceMissingError } from "../errors.js";
import type { RetryCoordinator } from "../retry/coordinator.js";
import { decideRollout, type RolloutDecision } from "../rollout/scheduler.js";
import type { ApplicationSpec, Cycle, NormalizedPackage } from "../types.js";
import type { Logger } from "../utils/log.js";
import type { ComputerGroup, PatchApiClient, PatchDefinition, PatchPolicy, PatchTitle, RemotePackage } from "./client.js";

export type ReconcileState =
  | "TitleMissing"
  | "DefinitionMissing"
  | "PackageUnattached"
  | "PolicyMissing"
  | "PolicyStale"
  | "Converged";

export type ActionKind =
  | "create-definition"
  | "create-package"
  | "upload-package"
  | "replace-package"
  | "attach-package"
  | "create-policy"
  | "update-policy";

export interface PlannedAction {
  kind: ActionKind;
  description: string;
}

/** Remote state as read at the start of an iteration. Never reused across iterations. */
export interface Observation {
  title?: PatchTitle;
  definition?: PatchDefinition;
  remotePackage?: RemotePackage;
  group?: ComputerGroup;
  policies: PatchPolicy[];
  /** Remote inconsistency that needs an operator before anything is changed. */
  problem?: string;
}

export interface ReconcileResult {
  status: "converged" | "paused" | "manual-intervention";
  /** State observed before any action ran. */
  initialState: ReconcileState;
  state: ReconcileState;
  /** Executed actions, or the planned ones in a dry run. */
  actions: PlannedAction[];
  decision?: RolloutDecision;
  reason?: string;
}

export interface ReconcileOptions {
  dryRun?: boolean;
  signal?: AbortSignal;
}

export const MAX_RECONCILE_STEPS = 12;

export function policyName(app: ApplicationSpec, cycle: Cycle): string {
  return `Patch - ${app.name} - ${cycle.name}`;
}

/** The first unmet step of title → definition → package → policy. */
export function deriveState(observation: Observation, pkg: NormalizedPackage, decision: RolloutDecision | undefined): ReconcileState {
  const { title, definition, remotePackage, policies } = observation;
  if (!title) return "TitleMissing";
  if (!definition) return "DefinitionMissing";
  if (!remotePackage || remotePackage.sha256 !== pkg.fingerprint || definition.packageId !== remotePackage.id) {
    return "PackageUnattached";
  }
  if (decision === "pause") return "Converged";
  if (policies.length === 0) return "PolicyMissing";
  if (decision === "advance") return "PolicyStale";
  return "Converged";
}

/** Every action still needed, in execution order. */
export function planActions(
  app: ApplicationSpec,
  pkg: NormalizedPackage,
  cycle: Cycle,
  observation: Observation,
  decision: RolloutDecision | undefined
): PlannedAction[] {
  const actions: PlannedAction[] = [];
  const { definition, remotePackage, policies } = observation;
  if (!definition) {
    actions.push({ kind: "create-definition", description: `create definition ${app.patchTitle} ${pkg.version}` });
  }
  if (!remotePackage) {
    actions.push({ kind: "create-package", description: `create package record ${pkg.filename}` });
    actions.push({ kind: "upload-package", description: `upload ${pkg.filename} (${pkg.fingerprint.slice(0, 12)})` });
  } else if (remotePackage.sha256 === undefined) {
    actions.push({ kind: "upload-package", description: `upload ${pkg.filename} (${pkg.fingerprint.slice(0, 12)})` });
  } else if (remotePackage.sha256 !== pkg.fingerprint) {
    actions.push({
      kind: "replace-package",
      description: `replace ${pkg.filename} (remote ${remotePackage.sha256.slice(0, 12)}, local ${pkg.fingerprint.slice(0, 12)})`
    });
  }
  if (!definition || !remotePackage || definition.packageId !== remotePackage.id) {
    actions.push({ kind: "attach-package", description: `attach ${pkg.filename} to ${app.patchTitle} ${pkg.version}` });
  }
  if (decision !== "pause") {
    if (policies.length === 0) {
      actions.push({ kind: "create-policy", description: `create policy "${policyName(app, cycle)}" for ${cycle.cohort} at ${pkg.version}` });
    } else if (decision === "advance") {
      actions.push({
        kind: "update-policy",
        description: `update policy ${policies[0].name} from ${policies[0].targetPatchVersion} to ${pkg.version}`
      });
    }
  }
  return actions;
}

/**
 * Drives one application's remote records toward the normalized package.
 * Each iteration observes fresh, executes the first planned action and
 * observes again, so an interrupted run resumes from whatever the remote
 * system holds now.
 */
export class PatchReconciler {
  constructor(
    private readonly client: PatchApiClient,
    private readonly retry: RetryCoordinator,
    private readonly logger: Logger
  ) {}

  private call<T>(label: string, op: () => Promise<T>, signal?: AbortSignal): Promise<T> {
    return this.retry.run(label, op, { signal });
  }

  async observe(app: ApplicationSpec, pkg: NormalizedPackage, cycle: Cycle, signal?: AbortSignal): Promise<Observation> {
    const title = await this.call(`${app.id}: find title`, () => this.client.findTitle(app.patchTitle), signal);
    if (!title) {
      return { policies: [] };
    }
    const definition = await this.call(`${app.id}: find definition`, () => this.client.findDefinition(title.id, pkg.version), signal);
    const remotePackage = await this.call(`${app.id}: find package`, () => this.client.findPackage(pkg.filename), signal);
    const group = await this.call(`${app.id}: find cohort`, () => this.client.findGroup(cycle.cohort), signal);
    if (!group) {
      return { title, definition, remotePackage, policies: [], problem: `computer group "${cycle.cohort}" does not exist` };
    }
    const policies = (await this.call(`${app.id}: list policies`, () => this.client.listPolicies(title.id), signal)).filter(
      (policy) => policy.computerGroupIds.includes(group.id)
    );
    const observation: Observation = { title, definition, remotePackage, group, policies };
    if (policies.length > 1) {
      observation.problem = `${policies.length} policies target ${app.patchTitle} for ${cycle.cohort}: ${policies.map((p) => p.id).join(", ")}`;
    }
    return observation;
  }

  async reconcile(app: ApplicationSpec, pkg: NormalizedPackage, cycle: Cycle, options: ReconcileOptions = {}): Promise<ReconcileResult> {
    const log = this.logger.child(app.id);
    const { signal } = options;
    const executed: PlannedAction[] = [];
    let initialState: ReconcileState | undefined;
    let previous: PlannedAction | undefined;

    for (let step = 0; step < MAX_RECONCILE_STEPS; step += 1) {
      const observation = await this.observe(app, pkg, cycle, signal);
      const decision = observation.title ? decideRollout(cycle, observation.policies[0]?.targetPatchVersion, pkg.version) : undefined;
      const state = deriveState(observation, pkg, decision);
      if (initialState === undefined) initialState = state;
      log.debug(`observed ${state}${decision ? ` (rollout ${decision})` : ""}`);

      if (state === "TitleMissing") {
        const reason = `patch title "${app.patchTitle}" does not exist; create it before this application can be automated`;
        log.warn(reason);
        return { status: "manual-intervention", initialState, state, actions: executed, reason };
      }
      if (observation.problem) {
        log.warn(observation.problem);
        return { status: "manual-intervention", initialState, state, actions: executed, reason: observation.problem };
      }

      const plan = planActions(app, pkg, cycle, observation, decision);
      if (options.dryRun) {
        for (const action of plan) log.info(`[dry-run] would ${action.description}`);
        return { status: decision === "pause" ? "paused" : "converged", initialState, state, actions: plan, decision };
      }
      if (plan.length === 0) {
        if (decision === "pause") log.info(`cycle ${cycle.name} is paused; policy left untouched`);
        return { status: decision === "pause" ? "paused" : "converged", initialState, state: "Converged", actions: executed, decision };
      }

      const next = plan[0];
      if (previous && previous.kind === next.kind && previous.description === next.description) {
        throw new RemoteConflictError(`${app.id}: remote state still requires "${next.description}" after it was applied`);
      }
      if (signal?.aborted) {
        throw new CancelledError();
      }
      await this.execute(app, pkg, cycle, observation, next, signal);
      executed.push(next);
      previous = next;
    }
    throw new RemoteConflictError(`${app.id}: did not converge within ${MAX_RECONCILE_STEPS} steps`);
  }

  private async execute(
    app: ApplicationSpec,
    pkg: NormalizedPackage,
    cycle: Cycle,
    observation: Observation,
    action: PlannedAction,
    signal?: AbortSignal
  ): Promise<void> {
    const log = this.logger.child(app.id);
    const { title, definition, remotePackage, group, policies } = observation;
    if (!title || !group) {
      throw new RemoteResourceMissingError("patch title", app.patchTitle);
    }
    const label = `${app.id}: ${action.kind}`;

    switch (action.kind) {
      case "create-definition": {
        const payload: PatchDefinition = { version: pkg.version };
        if (app.minimumOs) payload.minimumOperatingSystem = app.minimumOs;
        const created = await this.call(label, () => this.client.createDefinition(title.id, payload), signal);
        log.info(created ? `created definition ${pkg.version}` : `definition ${pkg.version} already existed`);
        return;
      }
      case "create-package": {
        const created = await this.call(label, () => this.client.createPackage(pkg.filename, `${app.name} ${pkg.version}`), signal);
        log.info(created ? `created package record ${pkg.filename} (${created.id})` : `package record ${pkg.filename} already existed`);
        return;
      }
      case "upload-package":
      case "replace-package": {
        if (!remotePackage) {
          throw new RemoteResourceMissingError("package", pkg.filename);
        }
        if (action.kind === "replace-package") {
          log.warn(`remote ${pkg.filename} has fingerprint ${remotePackage.sha256 ?? "none"}, replacing with ${pkg.fingerprint}`);
        }
        await this.call(label, () => this.client.uploadPackage(remotePackage.id, pkg.path, pkg.fingerprint), signal);
        log.info(`uploaded ${pkg.filename}`);
        return;
      }
      case "attach-package": {
        if (!definition || !remotePackage) {
          throw new RemoteResourceMissingError(definition ? "package" : "patch definition", definition ? pkg.filename : pkg.version);
        }
        await this.call(label, () => this.client.attachPackage(title.id, pkg.version, remotePackage.id), signal);
        log.info(`attached ${pkg.filename} to ${pkg.version}`);
        return;
      }
      case "create-policy": {
        const id = await this.call(
          label,
          () =>
            this.client.createPolicy({
              name: policyName(app, cycle),
              softwareTitleId: title.id,
              targetPatchVersion: pkg.version,
              computerGroupIds: [group.id],
              userInteraction: cycle.userInteraction
            }),
          signal
        );
        log.info(id ? `created policy ${id} for ${cycle.cohort}` : `policy for ${cycle.cohort} already existed`);
        return;
      }
      case "update-policy": {
        const policy = policies[0];
        await this.call(label, () => this.client.updatePolicyVersion(policy.id, pkg.version), signal);
        log.info(`policy ${policy.id} moved from ${policy.targetPatchVersion} to ${pkg.version}`);
        return;
      }
    }
  }
}
