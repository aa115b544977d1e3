import path from "node:path";
import { createWriteStream } from "node:fs";
import type { Readable } from "node:stream";
import { pipeline } from "node:stream/promises";
import * as yauzl from "yauzl";
import * as yazl from "yazl";
import { FatalError } from "../errors.js";
import { ensureDir, listFiles } from "./fs.js";
import { safeJoin, toPosixPath } from "./paths.js";

export const FIXED_ZIP_MTIME = new Date("2000-01-01T00:00:00Z");
export const FIXED_ZIP_MODE = 0o644;

export interface ZipEntryInfo {
  name: string;
  directory: boolean;
  mtime: Date;
}

/** Caps applied while extracting vendor archives. */
export interface ExtractLimits {
  maxEntries: number;
  maxBytes: number;
}

export const DEFAULT_EXTRACT_LIMITS: ExtractLimits = {
  maxEntries: 200_000,
  maxBytes: 8 * 1024 ** 3
};

const S_IFMT = 0o170000;
const S_IFLNK = 0o120000;

function openZip(zipPath: string): Promise<yauzl.ZipFile> {
  return new Promise((resolve, reject) => {
    yauzl.open(zipPath, { lazyEntries: true, autoClose: false }, (err, zipfile) => {
      if (err || !zipfile) {
        reject(err ?? new Error(`Unable to open zip: ${zipPath}`));
        return;
      }
      resolve(zipfile);
    });
  });
}

/** Read the next central-directory entry; undefined once the listing ends. */
function nextEntry(zipfile: yauzl.ZipFile): Promise<yauzl.Entry | undefined> {
  return new Promise((resolve, reject) => {
    const onEntry = (entry: yauzl.Entry) => {
      detach();
      resolve(entry);
    };
    const onEnd = () => {
      detach();
      resolve(undefined);
    };
    const onError = (err: Error) => {
      detach();
      reject(err);
    };
    const detach = () => {
      zipfile.off("entry", onEntry);
      zipfile.off("end", onEnd);
      zipfile.off("error", onError);
    };
    zipfile.on("entry", onEntry);
    zipfile.on("end", onEnd);
    zipfile.on("error", onError);
    zipfile.readEntry();
  });
}

function openEntryStream(zipfile: yauzl.ZipFile, entry: yauzl.Entry): Promise<Readable> {
  return new Promise((resolve, reject) => {
    zipfile.openReadStream(entry, (err, stream) => {
      if (err || !stream) {
        reject(err ?? new Error(`Unable to read entry ${entry.fileName}`));
        return;
      }
      resolve(stream);
    });
  });
}

function isSymlinkEntry(entry: yauzl.Entry): boolean {
  return ((entry.externalFileAttributes >>> 16) & S_IFMT) === S_IFLNK;
}

/**
 * Extract every entry under `outDir`, one at a time. Entry names that would
 * land outside `outDir`, symlink entries and archives over `limits` are
 * rejected with a FatalError before anything past them is written.
 */
export async function extractZip(zipPath: string, outDir: string, limits: ExtractLimits = DEFAULT_EXTRACT_LIMITS): Promise<void> {
  await ensureDir(outDir);
  const zipfile = await openZip(zipPath);
  const archive = path.basename(zipPath);
  let count = 0;
  let bytes = 0;
  try {
    for (let entry = await nextEntry(zipfile); entry; entry = await nextEntry(zipfile)) {
      count += 1;
      if (count > limits.maxEntries) {
        throw new FatalError("ARCHIVE_TOO_LARGE", `${archive} holds more than ${limits.maxEntries} entries`);
      }
      const name = toPosixPath(entry.fileName);
      if (name.endsWith("/")) {
        await ensureDir(safeJoin(outDir, name.slice(0, -1)));
        continue;
      }
      if (isSymlinkEntry(entry)) {
        throw new FatalError("UNSAFE_PATH", `${archive}: symlink entries are not allowed: ${name}`);
      }
      bytes += entry.uncompressedSize;
      if (bytes > limits.maxBytes) {
        throw new FatalError("ARCHIVE_TOO_LARGE", `${archive} expands beyond ${limits.maxBytes} bytes`);
      }
      const destPath = safeJoin(outDir, name);
      await ensureDir(path.dirname(destPath));
      await pipeline(await openEntryStream(zipfile, entry), createWriteStream(destPath));
    }
  } finally {
    zipfile.close();
  }
}

/** Central-directory listing without extracting anything. */
export async function readZipEntries(zipPath: string): Promise<ZipEntryInfo[]> {
  const zipfile = await openZip(zipPath);
  const entries: ZipEntryInfo[] = [];
  try {
    for (let entry = await nextEntry(zipfile); entry; entry = await nextEntry(zipfile)) {
      const name = toPosixPath(entry.fileName);
      entries.push({ name, directory: name.endsWith("/"), mtime: entry.getLastModDate() });
    }
  } finally {
    zipfile.close();
  }
  return entries;
}

/**
 * A zip is canonical when it holds only file entries, in sorted order, all
 * stamped with FIXED_ZIP_MTIME. createZipFromDir always produces one.
 */
export function isCanonicalListing(entries: ZipEntryInfo[]): boolean {
  if (entries.length === 0) {
    return false;
  }
  return entries.every(
    (entry, i) =>
      !entry.directory && entry.mtime.getTime() === FIXED_ZIP_MTIME.getTime() && (i === 0 || entries[i - 1].name < entry.name)
  );
}

/** Deterministic zip of `sourceDir`: sorted file entries only, fixed mtime and mode. */
export async function createZipFromDir(sourceDir: string, outZipPath: string, ignore: string[] = []): Promise<void> {
  await ensureDir(path.dirname(outZipPath));
  const files = await listFiles(sourceDir, ignore);
  const zipfile = new yazl.ZipFile();
  for (const relPath of files) {
    zipfile.addFile(safeJoin(sourceDir, relPath), relPath, { mtime: FIXED_ZIP_MTIME, mode: FIXED_ZIP_MODE });
  }
  zipfile.end();
  await pipeline(zipfile.outputStream, createWriteStream(outZipPath));
}
