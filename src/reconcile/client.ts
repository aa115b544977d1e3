import { openAsBlob } from "node:fs";
import path from "node:path";
import { AuthExpiredError, FatalError, HttpError, RemoteConflictError } from "../errors.js";
import { httpJson, type FetchLike, type HttpOptions } from "../utils/http.js";
import type { Logger } from "../utils/log.js";
import type { UserInteraction } from "../config/schema.js";

export interface PatchApiCredentials {
  baseUrl: string;
  username: string;
  password: string;
}

export interface PatchTitle {
  id: string;
  name: string;
}

export interface PatchDefinition {
  version: string;
  packageId?: string;
  minimumOperatingSystem?: string;
}

export interface RemotePackage {
  id: string;
  fileName: string;
  /** Digest of the uploaded bytes; absent until the first upload. */
  sha256?: string;
}

export interface ComputerGroup {
  id: string;
  name: string;
}

export interface PatchPolicy {
  id: string;
  name: string;
  softwareTitleId: string;
  targetPatchVersion: string;
  computerGroupIds: string[];
  enabled: boolean;
}

export interface NewPolicy {
  name: string;
  softwareTitleId: string;
  targetPatchVersion: string;
  computerGroupIds: string[];
  userInteraction?: UserInteraction;
}

export interface PatchApiClientOptions {
  credentials: PatchApiCredentials;
  logger: Logger;
  fetchImpl?: FetchLike;
  timeoutMs?: number;
  now?: () => Date;
  /** Refresh this long before the token's stated expiry. */
  refreshSkewMs?: number;
  signal?: AbortSignal;
}

const ENDPOINTS = {
  auth: "/api/v1/auth/token",
  titles: "/api/v2/patch-software-titles",
  policies: "/api/v2/patch-policies",
  packages: "/api/v1/packages",
  groups: "/api/v1/computer-groups"
} as const;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function idOf(value: unknown, what: string): string {
  if (typeof value === "string" && value) return value;
  if (typeof value === "number") return String(value);
  throw new FatalError("REMOTE_PAYLOAD_INVALID", `${what}: missing id`);
}

function resultsOf(data: unknown, what: string): Record<string, unknown>[] {
  if (!isRecord(data) || !Array.isArray(data.results)) {
    throw new FatalError("REMOTE_PAYLOAD_INVALID", `${what}: expected { results: [] }`);
  }
  return data.results.filter(isRecord);
}

function filterParam(field: string, value: string): string {
  return `?filter=${encodeURIComponent(`${field}=="${value}"`)}`;
}

function parseTitle(raw: Record<string, unknown>): PatchTitle {
  return { id: idOf(raw.id, "patch title"), name: String(raw.name ?? "") };
}

function parseDefinition(raw: Record<string, unknown>): PatchDefinition {
  if (typeof raw.version !== "string") {
    throw new FatalError("REMOTE_PAYLOAD_INVALID", "patch definition: missing version");
  }
  const definition: PatchDefinition = { version: raw.version };
  if (raw.packageId !== undefined && raw.packageId !== null) definition.packageId = idOf(raw.packageId, "definition package");
  if (typeof raw.minimumOperatingSystem === "string") definition.minimumOperatingSystem = raw.minimumOperatingSystem;
  return definition;
}

function parsePackage(raw: Record<string, unknown>): RemotePackage {
  const pkg: RemotePackage = { id: idOf(raw.id, "package"), fileName: String(raw.fileName ?? "") };
  if (typeof raw.sha256 === "string" && raw.sha256) pkg.sha256 = raw.sha256;
  return pkg;
}

function parsePolicy(raw: Record<string, unknown>): PatchPolicy {
  const scope = isRecord(raw.scope) ? raw.scope : {};
  const groupIds = Array.isArray(scope.computerGroupIds) ? scope.computerGroupIds.map((id) => idOf(id, "policy scope")) : [];
  return {
    id: idOf(raw.id, "patch policy"),
    name: String(raw.name ?? ""),
    softwareTitleId: idOf(raw.softwareTitleId, "policy title"),
    targetPatchVersion: String(raw.targetPatchVersion ?? ""),
    computerGroupIds: groupIds,
    enabled: raw.enabled !== false
  };
}

/**
 * Client for the remote patch management API. Holds a bearer token and
 * renews it before it expires; a 401 drops the token and surfaces as
 * AuthExpired so the caller's retry re-authenticates.
 */
export class PatchApiClient {
  private token?: { value: string; expiresAt: number };
  /** Shared by every caller that needs a token while one is being issued. */
  private pendingAuth?: Promise<string>;
  private readonly baseUrl: string;
  private readonly fetchImpl: FetchLike;
  private readonly timeoutMs: number;
  private readonly now: () => Date;
  private readonly refreshSkewMs: number;
  private readonly log: Logger;

  constructor(private readonly options: PatchApiClientOptions) {
    this.baseUrl = options.credentials.baseUrl.replace(/\/+$/, "");
    this.fetchImpl = options.fetchImpl ?? globalThis.fetch;
    this.timeoutMs = options.timeoutMs ?? 30_000;
    this.now = options.now ?? (() => new Date());
    this.refreshSkewMs = options.refreshSkewMs ?? 60_000;
    this.log = options.logger;
  }

  private http(allowStatuses?: number[]): HttpOptions {
    return { fetchImpl: this.fetchImpl, timeoutMs: this.timeoutMs, signal: this.options.signal, allowStatuses };
  }

  private async authenticate(): Promise<string> {
    const { username, password } = this.options.credentials;
    const basic = Buffer.from(`${username}:${password}`).toString("base64");
    const data = await httpJson(
      `${this.baseUrl}${ENDPOINTS.auth}`,
      { method: "POST", headers: { Authorization: `Basic ${basic}`, Accept: "application/json" } },
      this.http()
    );
    if (!isRecord(data) || typeof data.token !== "string" || typeof data.expires !== "string") {
      throw new FatalError("REMOTE_PAYLOAD_INVALID", "auth token response lacks token or expires");
    }
    const expiresAt = Date.parse(data.expires);
    if (Number.isNaN(expiresAt)) {
      throw new FatalError("REMOTE_PAYLOAD_INVALID", `auth token expiry is not a date: ${data.expires}`);
    }
    this.token = { value: data.token, expiresAt };
    this.log.debug(`authenticated, token valid until ${data.expires}`);
    return data.token;
  }

  private async bearer(): Promise<string> {
    if (this.token && this.now().getTime() < this.token.expiresAt - this.refreshSkewMs) {
      return this.token.value;
    }
    if (!this.pendingAuth) {
      if (this.token) {
        this.log.debug("token close to expiry, refreshing");
      }
      this.pendingAuth = this.authenticate().finally(() => {
        this.pendingAuth = undefined;
      });
    }
    return this.pendingAuth;
  }

  private async request(method: string, route: string, body?: unknown, allowStatuses?: number[]): Promise<unknown> {
    const token = await this.bearer();
    const headers: Record<string, string> = { Authorization: `Bearer ${token}`, Accept: "application/json" };
    const init: RequestInit = { method, headers };
    if (body !== undefined) {
      headers["Content-Type"] = "application/json";
      init.body = JSON.stringify(body);
    }
    try {
      return await httpJson(`${this.baseUrl}${route}`, init, this.http(allowStatuses));
    } catch (err) {
      throw this.mapError(err, `${method} ${route}`);
    }
  }

  private mapError(err: unknown, label: string): unknown {
    if (err instanceof HttpError && err.status === 401) {
      this.token = undefined;
      return new AuthExpiredError(`${label}: token rejected`, { cause: err });
    }
    if (err instanceof HttpError && err.status === 409) {
      return new RemoteConflictError(`${label}: conflict`, { cause: err });
    }
    return err;
  }

  async findTitle(name: string): Promise<PatchTitle | undefined> {
    const data = await this.request("GET", `${ENDPOINTS.titles}${filterParam("name", name)}`);
    const match = resultsOf(data, "patch titles").map(parseTitle).find((title) => title.name === name);
    return match;
  }

  async listDefinitions(titleId: string): Promise<PatchDefinition[]> {
    const data = await this.request("GET", `${ENDPOINTS.titles}/${encodeURIComponent(titleId)}/definitions`);
    return resultsOf(data, "patch definitions").map(parseDefinition);
  }

  async findDefinition(titleId: string, version: string): Promise<PatchDefinition | undefined> {
    const definitions = await this.listDefinitions(titleId);
    return definitions.find((definition) => definition.version === version);
  }

  /** Create a definition for `version`; false when it already existed. */
  async createDefinition(titleId: string, definition: PatchDefinition): Promise<boolean> {
    try {
      await this.request("POST", `${ENDPOINTS.titles}/${encodeURIComponent(titleId)}/definitions`, definition);
      return true;
    } catch (err) {
      if (err instanceof RemoteConflictError) {
        return false;
      }
      throw err;
    }
  }

  async attachPackage(titleId: string, version: string, packageId: string): Promise<void> {
    await this.request(
      "PATCH",
      `${ENDPOINTS.titles}/${encodeURIComponent(titleId)}/definitions/${encodeURIComponent(version)}`,
      { packageId }
    );
  }

  async findPackage(fileName: string): Promise<RemotePackage | undefined> {
    const data = await this.request("GET", `${ENDPOINTS.packages}${filterParam("fileName", fileName)}`);
    return resultsOf(data, "packages").map(parsePackage).find((pkg) => pkg.fileName === fileName);
  }

  /** Create the package record; undefined when one with this file name already exists. */
  async createPackage(fileName: string, displayName: string): Promise<RemotePackage | undefined> {
    try {
      const data = await this.request("POST", ENDPOINTS.packages, { packageName: displayName, fileName, category: "Patch Automation" });
      if (!isRecord(data)) {
        throw new FatalError("REMOTE_PAYLOAD_INVALID", "package create response is not an object");
      }
      return { id: idOf(data.id, "package"), fileName };
    } catch (err) {
      if (err instanceof RemoteConflictError) {
        return undefined;
      }
      throw err;
    }
  }

  /** Upload (or replace) the bytes behind a package record. */
  async uploadPackage(packageId: string, filePath: string, sha256: string): Promise<void> {
    const token = await this.bearer();
    const form = new FormData();
    form.append("file", await openAsBlob(filePath), path.basename(filePath));
    form.append("sha256", sha256);
    const route = `${ENDPOINTS.packages}/${encodeURIComponent(packageId)}/upload`;
    try {
      await httpJson(
        `${this.baseUrl}${route}`,
        { method: "POST", headers: { Authorization: `Bearer ${token}`, Accept: "application/json" }, body: form },
        this.http()
      );
    } catch (err) {
      throw this.mapError(err, `POST ${route}`);
    }
  }

  async findGroup(name: string): Promise<ComputerGroup | undefined> {
    const data = await this.request("GET", `${ENDPOINTS.groups}${filterParam("name", name)}`);
    return resultsOf(data, "computer groups")
      .map((raw) => ({ id: idOf(raw.id, "computer group"), name: String(raw.name ?? "") }))
      .find((group) => group.name === name);
  }

  async listPolicies(titleId: string): Promise<PatchPolicy[]> {
    const data = await this.request("GET", `${ENDPOINTS.policies}${filterParam("softwareTitleId", titleId)}`);
    return resultsOf(data, "patch policies")
      .map(parsePolicy)
      .filter((policy) => policy.softwareTitleId === titleId);
  }

  /** Returns the new policy id, or undefined when the server reports a conflict. */
  async createPolicy(policy: NewPolicy): Promise<string | undefined> {
    try {
      const data = await this.request("POST", ENDPOINTS.policies, {
        name: policy.name,
        enabled: true,
        softwareTitleId: policy.softwareTitleId,
        targetPatchVersion: policy.targetPatchVersion,
        scope: { computerGroupIds: policy.computerGroupIds },
        userInteraction: policy.userInteraction ?? {}
      });
      return isRecord(data) ? idOf(data.id, "patch policy") : undefined;
    } catch (err) {
      if (err instanceof RemoteConflictError) {
        return undefined;
      }
      throw err;
    }
  }

  async updatePolicyVersion(policyId: string, targetPatchVersion: string): Promise<void> {
    await this.request("PATCH", `${ENDPOINTS.policies}/${encodeURIComponent(policyId)}`, { targetPatchVersion });
  }
}
