import fs from "node:fs/promises";
import path from "node:path";
import { ensureDir, isErrno, readJsonFile, writeJsonFileAtomic } from "../utils/fs.js";
import { sanitizeFileName } from "../utils/paths.js";

/**
 * Persistence backend for cache entries and run state. Values are plain
 * JSON; callers validate what they read back.
 */
export interface KeyValueStore {
  get(key: string): Promise<unknown | undefined>;
  set(key: string, value: unknown): Promise<void>;
  delete(key: string): Promise<void>;
  keys(): Promise<string[]>;
}

/** One JSON file per key under a directory. Writes are tmp+rename. */
export class FileKeyValueStore implements KeyValueStore {
  constructor(private readonly dir: string) {}

  private pathFor(key: string): string {
    const fileName = sanitizeFileName(key);
    if (!fileName || fileName !== key) {
      throw new Error(`Invalid store key: ${key}`);
    }
    return path.join(this.dir, `${fileName}.json`);
  }

  async get(key: string): Promise<unknown | undefined> {
    try {
      return await readJsonFile(this.pathFor(key));
    } catch (err) {
      if (isErrno(err, "ENOENT")) {
        return undefined;
      }
      throw err;
    }
  }

  async set(key: string, value: unknown): Promise<void> {
    await writeJsonFileAtomic(this.pathFor(key), value);
  }

  async delete(key: string): Promise<void> {
    await fs.rm(this.pathFor(key), { force: true });
  }

  async keys(): Promise<string[]> {
    await ensureDir(this.dir);
    const entries = await fs.readdir(this.dir);
    return entries
      .filter((name) => name.endsWith(".json"))
      .map((name) => name.slice(0, -".json".length))
      .sort();
  }
}

export class MemoryKeyValueStore implements KeyValueStore {
  private readonly data = new Map<string, string>();

  async get(key: string): Promise<unknown | undefined> {
    const raw = this.data.get(key);
    return raw === undefined ? undefined : JSON.parse(raw);
  }

  async set(key: string, value: unknown): Promise<void> {
    // Round-trip through JSON so callers cannot mutate stored values.
    this.data.set(key, JSON.stringify(value));
  }

  async delete(key: string): Promise<void> {
    this.data.delete(key);
  }

  async keys(): Promise<string[]> {
    return [...this.data.keys()].sort();
  }
}
