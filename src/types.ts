export type { ApplicationSpec, Cycle, DownloadSource } from "./config/schema.js";

export interface CacheValidator {
  etag?: string;
  lastModified?: string;
}

export interface CacheEntry {
  appId: string;
  url: string;
  validator: CacheValidator;
  fingerprint: string;
  location: string;
  retrievedAt: string;
}

/** A downloaded, not yet verified file. Lives for one pipeline run. */
export interface Artifact {
  appId: string;
  url: string;
  path: string;
  fingerprint: string;
  declaredVersion?: string;
}

export interface NormalizedMetadata {
  version: string;
  identifier: string;
  name: string;
  identity: string;
  minimumOs?: string;
}

export interface NormalizedPackage {
  appId: string;
  version: string;
  filename: string;
  fingerprint: string;
  path: string;
}

export const RUN_PHASES = ["pending", "downloaded", "verified", "normalized", "reconciled", "completed"] as const;

export type RunPhase = (typeof RUN_PHASES)[number];

export type AppOutcome =
  | { status: "success"; appId: string; version: string; cacheHit: boolean; actions: string[] }
  | { status: "manual-intervention"; appId: string; reason: string; actions: string[] }
  | { status: "failed"; appId: string; reason: string; code: string; phase: RunPhase }
  | { status: "skipped"; appId: string; reason: "circuit-open" | "cancelled" };

export type OutcomeStatus = AppOutcome["status"];
