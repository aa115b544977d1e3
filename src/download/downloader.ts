import fs from "node:fs/promises";
import path from "node:path";
import { createHash, randomUUID } from "node:crypto";
import { FatalError } from "../errors.js";
import type { CacheStore } from "../cache/store.js";
import type { RetryCoordinator } from "../retry/coordinator.js";
import type { ApplicationSpec, Artifact, CacheEntry, CacheValidator } from "../types.js";
import { ensureDir, moveFile, pathExists } from "../utils/fs.js";
import { httpRequest, type FetchLike, type HttpOptions } from "../utils/http.js";
import type { Logger } from "../utils/log.js";
import { fileNameFromUrl } from "../utils/paths.js";
import { resolveSource } from "./sources.js";

export const DEFAULT_USER_AGENT = "patchpilot/0.1";

export interface DownloaderOptions {
  cache: CacheStore;
  cacheDir: string;
  retry: RetryCoordinator;
  logger: Logger;
  fetchImpl?: FetchLike;
  requestTimeoutMs?: number;
  downloadTimeoutMs?: number;
  userAgent?: string;
}

export interface DryRunRecorder {
  record(action: string): void;
}

export interface FetchContext {
  /** Ignore the cached validator and download unconditionally. */
  force?: boolean;
  signal?: AbortSignal;
  /** When set, nothing is committed; downloads land in `stagingDir`. */
  dryRun?: DryRunRecorder;
  stagingDir?: string;
}

export interface FetchResult {
  artifact: Artifact;
  cacheHit: boolean;
}

export interface DownloadMetrics {
  cacheHits: number;
  cacheMisses: number;
  bytes: number;
}

type Retrieval =
  | { kind: "not-modified" }
  | { kind: "downloaded"; tempPath: string; fingerprint: string; validator: CacheValidator; bytes: number };

function validatorHeaders(entry: CacheEntry): Record<string, string> {
  const headers: Record<string, string> = {};
  if (entry.validator.etag) headers["If-None-Match"] = entry.validator.etag;
  if (entry.validator.lastModified) headers["If-Modified-Since"] = entry.validator.lastModified;
  return headers;
}

function readValidator(response: Response): CacheValidator {
  const validator: CacheValidator = {};
  const etag = response.headers.get("etag");
  const lastModified = response.headers.get("last-modified");
  if (etag) validator.etag = etag;
  if (lastModified) validator.lastModified = lastModified;
  return validator;
}

export class Downloader {
  private readonly fetchImpl: FetchLike;
  private readonly requestTimeoutMs: number;
  private readonly downloadTimeoutMs: number;
  private readonly userAgent: string;
  readonly metrics: DownloadMetrics = { cacheHits: 0, cacheMisses: 0, bytes: 0 };

  constructor(private readonly options: DownloaderOptions) {
    this.fetchImpl = options.fetchImpl ?? globalThis.fetch;
    this.requestTimeoutMs = options.requestTimeoutMs ?? 30_000;
    this.downloadTimeoutMs = options.downloadTimeoutMs ?? 600_000;
    this.userAgent = options.userAgent ?? DEFAULT_USER_AGENT;
  }

  private http(timeoutMs: number, signal?: AbortSignal, allowStatuses?: number[]): HttpOptions {
    return { fetchImpl: this.fetchImpl, timeoutMs, signal, allowStatuses };
  }

  /**
   * Conditionally fetch the artifact for `spec`. A 304 returns the cached
   * file and leaves the cache entry untouched.
   */
  async fetch(spec: ApplicationSpec, cacheEntry: CacheEntry | undefined, ctx: FetchContext = {}): Promise<FetchResult> {
    const log = this.options.logger.child(spec.id);
    const { retry } = this.options;

    const resolved = await retry.run(
      `${spec.id}: resolve source`,
      () => resolveSource(spec.source, this.http(this.requestTimeoutMs, ctx.signal)),
      { signal: ctx.signal }
    );

    const conditional =
      cacheEntry !== undefined &&
      !ctx.force &&
      cacheEntry.url === resolved.url &&
      (await pathExists(cacheEntry.location));
    if (cacheEntry && !conditional) {
      log.debug(ctx.force ? "forced download, ignoring cached validator" : "cached entry unusable, downloading in full");
    }

    const stagingDir = ctx.stagingDir ?? path.join(this.options.cacheDir, spec.id);
    const retrieval = await retry.run(
      `${spec.id}: download`,
      () => this.retrieve(resolved.url, conditional ? cacheEntry : undefined, stagingDir, ctx.signal),
      { signal: ctx.signal }
    );

    if (retrieval.kind === "not-modified") {
      if (!cacheEntry) {
        throw new FatalError("UNEXPECTED_NOT_MODIFIED", `${resolved.url} answered 304 to an unconditional request`);
      }
      this.metrics.cacheHits += 1;
      log.info(`not modified since ${cacheEntry.retrievedAt}, using cached ${path.basename(cacheEntry.location)}`);
      return {
        cacheHit: true,
        artifact: {
          appId: spec.id,
          url: resolved.url,
          path: cacheEntry.location,
          fingerprint: cacheEntry.fingerprint,
          declaredVersion: resolved.declaredVersion
        }
      };
    }

    this.metrics.cacheMisses += 1;
    this.metrics.bytes += retrieval.bytes;
    log.info(`downloaded ${retrieval.bytes} bytes from ${resolved.url}`);

    let location = retrieval.tempPath;
    if (ctx.dryRun) {
      ctx.dryRun.record(`cache.commit ${spec.id} (${retrieval.fingerprint.slice(0, 12)})`);
    } else {
      location = path.join(this.options.cacheDir, spec.id, fileNameFromUrl(resolved.url));
      await moveFile(retrieval.tempPath, location);
      await this.options.cache.commit(spec.id, {
        url: resolved.url,
        validator: retrieval.validator,
        fingerprint: retrieval.fingerprint,
        location
      });
      await this.dropSuperseded(spec.id, cacheEntry, location);
    }

    return {
      cacheHit: false,
      artifact: {
        appId: spec.id,
        url: resolved.url,
        path: location,
        fingerprint: retrieval.fingerprint,
        declaredVersion: resolved.declaredVersion
      }
    };
  }

  /** Remove the artifact a new commit replaced, when it sits in this application's cache directory. */
  private async dropSuperseded(appId: string, previous: CacheEntry | undefined, current: string): Promise<void> {
    if (!previous || path.resolve(previous.location) === path.resolve(current)) {
      return;
    }
    if (path.dirname(path.resolve(previous.location)) !== path.resolve(this.options.cacheDir, appId)) {
      return;
    }
    await fs.rm(previous.location, { force: true });
    this.options.logger.child(appId).debug(`removed superseded ${path.basename(previous.location)}`);
  }

  private async retrieve(url: string, cached: CacheEntry | undefined, stagingDir: string, signal?: AbortSignal): Promise<Retrieval> {
    const headers: Record<string, string> = { "User-Agent": this.userAgent };
    if (cached) {
      Object.assign(headers, validatorHeaders(cached));
    }
    const { response, dispose } = await httpRequest(url, { headers, redirect: "follow" }, this.http(this.downloadTimeoutMs, signal, [304]));
    try {
      if (response.status === 304) {
        return { kind: "not-modified" };
      }
      await ensureDir(stagingDir);
      const tempPath = path.join(stagingDir, `.partial-${randomUUID()}`);
      try {
        const { fingerprint, bytes } = await writeBody(response, tempPath);
        return { kind: "downloaded", tempPath, fingerprint, bytes, validator: readValidator(response) };
      } catch (err) {
        await fs.rm(tempPath, { force: true });
        throw err;
      }
    } finally {
      dispose();
    }
  }
}

async function writeBody(response: Response, destPath: string): Promise<{ fingerprint: string; bytes: number }> {
  const hash = createHash("sha256");
  const handle = await fs.open(destPath, "w");
  let bytes = 0;
  try {
    if (response.body) {
      const reader = response.body.getReader();
      for (;;) {
        const { done, value } = await reader.read();
        if (done) break;
        hash.update(value);
        await handle.write(value);
        bytes += value.byteLength;
      }
    }
  } finally {
    await handle.close();
  }
  return { fingerprint: hash.digest("hex"), bytes };
}
