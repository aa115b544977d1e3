import type { KeyValueStore } from "../store/kv.js";
import type { CacheEntry, CacheValidator } from "../types.js";

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function optionalString(value: unknown): string | undefined {
  return typeof value === "string" && value.length > 0 ? value : undefined;
}

/**
 * Accept a stored entry only if every field is present. A damaged entry reads
 * as absent, which only costs a full download.
 */
function parseEntry(appId: string, raw: unknown): CacheEntry | undefined {
  if (!isRecord(raw) || raw.appId !== appId) {
    return undefined;
  }
  const { url, fingerprint, location, retrievedAt, validator } = raw;
  if (
    typeof url !== "string" ||
    typeof fingerprint !== "string" ||
    typeof location !== "string" ||
    typeof retrievedAt !== "string" ||
    !isRecord(validator)
  ) {
    return undefined;
  }
  const parsedValidator: CacheValidator = {};
  const etag = optionalString(validator.etag);
  const lastModified = optionalString(validator.lastModified);
  if (etag !== undefined) parsedValidator.etag = etag;
  if (lastModified !== undefined) parsedValidator.lastModified = lastModified;
  return { appId, url, fingerprint, location, retrievedAt, validator: parsedValidator };
}

export interface CommitInput {
  url: string;
  validator: CacheValidator;
  fingerprint: string;
  location: string;
}

/** One entry per application id. commit writes it and clear drops it. */
export class CacheStore {
  constructor(
    private readonly backend: KeyValueStore,
    private readonly now: () => Date = () => new Date()
  ) {}

  async lookup(appId: string): Promise<CacheEntry | undefined> {
    return parseEntry(appId, await this.backend.get(appId));
  }

  async commit(appId: string, input: CommitInput): Promise<CacheEntry> {
    const entry: CacheEntry = {
      appId,
      url: input.url,
      validator: input.validator,
      fingerprint: input.fingerprint,
      location: input.location,
      retrievedAt: this.now().toISOString()
    };
    await this.backend.set(appId, entry);
    return entry;
  }

  async clear(appId?: string): Promise<string[]> {
    const targets = appId === undefined ? await this.backend.keys() : [appId];
    for (const key of targets) {
      await this.backend.delete(key);
    }
    return targets;
  }
}
