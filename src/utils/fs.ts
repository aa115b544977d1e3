import fs from "node:fs/promises";
import path from "node:path";
import os from "node:os";
import { randomUUID } from "node:crypto";
import fg from "fast-glob";
import { FatalError } from "../errors.js";
import { safeJoin, toPosixPath } from "./paths.js";

/** Archive noise that never belongs in a deployment package. */
export const PACKAGE_IGNORE_PATTERNS = ["__MACOSX/**", "**/.DS_Store", ".DS_Store", "**/Thumbs.db"];

export async function ensureDir(dirPath: string): Promise<void> {
  await fs.mkdir(dirPath, { recursive: true });
}

export async function pathExists(targetPath: string): Promise<boolean> {
  try {
    await fs.access(targetPath);
    return true;
  } catch (err) {
    if (isErrno(err, "ENOENT")) {
      return false;
    }
    throw err;
  }
}

export async function readJsonFile(filePath: string): Promise<unknown> {
  const raw = await fs.readFile(filePath, "utf8");
  return JSON.parse(raw);
}

/**
 * Write JSON through a sibling temp file and rename, so readers never see a
 * half-written document.
 */
export async function writeJsonFileAtomic(filePath: string, data: unknown): Promise<void> {
  const payload = `${JSON.stringify(data, null, 2)}\n`;
  await ensureDir(path.dirname(filePath));
  const tempPath = `${filePath}.tmp-${randomUUID()}`;
  await fs.writeFile(tempPath, payload, "utf8");
  try {
    await fs.rename(tempPath, filePath);
  } catch (err) {
    await fs.rm(tempPath, { force: true });
    throw err;
  }
}

/**
 * Sorted posix paths of the regular files under `rootDir`. A symlink
 * anywhere in the tree is an error rather than something to follow.
 */
export async function listFiles(rootDir: string, ignore: string[] = []): Promise<string[]> {
  const entries = await fg("**/*", {
    cwd: rootDir,
    dot: true,
    onlyFiles: false,
    followSymbolicLinks: false,
    ignore,
    objectMode: true
  });
  const files: string[] = [];
  for (const entry of entries) {
    const relPath = toPosixPath(entry.path);
    if (entry.dirent.isSymbolicLink()) {
      throw new FatalError("UNSAFE_PATH", `${rootDir} contains a symlink: ${relPath}`);
    }
    if (entry.dirent.isFile()) {
      safeJoin(rootDir, relPath);
      files.push(relPath);
    }
  }
  return files.sort();
}

/** Move a file into place, replacing whatever was there. */
export async function moveFile(srcPath: string, destPath: string): Promise<void> {
  await ensureDir(path.dirname(destPath));
  try {
    await fs.rename(srcPath, destPath);
  } catch (err) {
    if (!isErrno(err, "EXDEV")) {
      throw err;
    }
    await fs.copyFile(srcPath, destPath);
    await fs.rm(srcPath, { force: true });
  }
}

export async function createTempDir(prefix: string): Promise<string> {
  const base = path.join(os.tmpdir(), prefix);
  return fs.mkdtemp(base);
}

export async function removeDir(targetPath: string): Promise<void> {
  await fs.rm(targetPath, { recursive: true, force: true });
}

export function isErrno(err: unknown, code: string): boolean {
  return err instanceof Error && "code" in err && err.code === code;
}
