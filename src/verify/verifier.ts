import path from "node:path";
import fs from "node:fs/promises";
import fg from "fast-glob";
import { SignatureMismatchError, errorMessage } from "../errors.js";
import type { Artifact, NormalizedMetadata } from "../types.js";
import { PACKAGE_IGNORE_PATTERNS, createTempDir, listFiles, readJsonFile, removeDir } from "../utils/fs.js";
import { hashFile } from "../utils/hash.js";
import type { Logger } from "../utils/log.js";
import { ensureSafeRelPath, safeJoin } from "../utils/paths.js";
import { extractZip } from "../utils/zip.js";

export const INFO_PATH = "Contents/Info.json";
export const SEAL_DIR = "Contents/_CodeSignature";
export const SEAL_PATH = `${SEAL_DIR}/CodeResources.json`;

export interface Seal {
  teamIdentifier: string;
  files: Record<string, string>;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

async function readBundleJson(bundleDir: string, relPath: string): Promise<Record<string, unknown>> {
  let data: unknown;
  try {
    data = await readJsonFile(safeJoin(bundleDir, relPath));
  } catch (err) {
    throw new SignatureMismatchError("metadata_missing", `${relPath} is missing or invalid: ${errorMessage(err)}`, { cause: err });
  }
  if (!isRecord(data)) {
    throw new SignatureMismatchError("metadata_missing", `${relPath} must be a JSON object`);
  }
  return data;
}

export function parseSeal(raw: Record<string, unknown>): Seal {
  const { teamIdentifier, files } = raw;
  if (typeof teamIdentifier !== "string" || !isRecord(files)) {
    throw new SignatureMismatchError("metadata_missing", `${SEAL_PATH} lacks teamIdentifier or files`);
  }
  const sealed: Record<string, string> = {};
  for (const [relPath, digest] of Object.entries(files)) {
    if (typeof digest !== "string") {
      throw new SignatureMismatchError("seal_broken", `Seal entry for ${relPath} is not a digest`);
    }
    try {
      ensureSafeRelPath(relPath);
    } catch (err) {
      throw new SignatureMismatchError("seal_broken", `Seal entry has an unsafe path: ${relPath}`, { cause: err });
    }
    sealed[relPath] = digest;
  }
  return { teamIdentifier, files: sealed };
}

export function parseInfo(raw: Record<string, unknown>): Omit<NormalizedMetadata, "identity"> {
  const identifier = raw.CFBundleIdentifier;
  const version = raw.CFBundleShortVersionString;
  const name = raw.CFBundleName;
  if (typeof identifier !== "string" || typeof version !== "string" || !version.trim()) {
    throw new SignatureMismatchError("metadata_missing", `${INFO_PATH} lacks CFBundleIdentifier or CFBundleShortVersionString`);
  }
  const metadata: Omit<NormalizedMetadata, "identity"> = {
    identifier,
    version: version.trim(),
    name: typeof name === "string" && name ? name : identifier
  };
  if (typeof raw.LSMinimumSystemVersion === "string") {
    metadata.minimumOs = raw.LSMinimumSystemVersion;
  }
  return metadata;
}

/** Every sealed file must hash to its digest and nothing outside the seal may be present. */
async function checkSeal(bundleDir: string, seal: Seal): Promise<void> {
  for (const [relPath, expected] of Object.entries(seal.files)) {
    const absPath = safeJoin(bundleDir, relPath);
    let stat;
    try {
      stat = await fs.lstat(absPath);
    } catch (err) {
      throw new SignatureMismatchError("seal_broken", `Sealed file is missing: ${relPath}`, { cause: err });
    }
    if (!stat.isFile()) {
      throw new SignatureMismatchError("seal_broken", `Sealed path is not a regular file: ${relPath}`);
    }
    const actual = await hashFile(absPath);
    if (actual !== expected) {
      throw new SignatureMismatchError("seal_broken", `Seal mismatch for ${relPath}: expected ${expected}, got ${actual}`);
    }
  }

  const present = await listFiles(bundleDir, [...PACKAGE_IGNORE_PATTERNS, `${SEAL_DIR}/**`]);
  const unsealed = present.filter((relPath) => !(relPath in seal.files));
  if (unsealed.length > 0) {
    throw new SignatureMismatchError("seal_broken", `Files not covered by the seal: ${unsealed.join(", ")}`);
  }
}

export interface VerifyOptions {
  /** Bundle identifier the application is configured with. */
  expectedIdentifier?: string;
}

/**
 * Checks the signing identity and seal of a downloaded container. Every
 * failure is a SignatureMismatchError; nothing here is retried.
 */
export class Verifier {
  constructor(private readonly logger: Logger) {}

  async verify(artifact: Artifact, expectedIdentity: string, options: VerifyOptions = {}): Promise<NormalizedMetadata> {
    const tempRoot = await createTempDir("patchpilot-verify-");
    try {
      const bundleDir = await this.unpack(artifact.path, tempRoot);
      const info = parseInfo(await readBundleJson(bundleDir, INFO_PATH));
      const seal = parseSeal(await readBundleJson(bundleDir, SEAL_PATH));

      if (seal.teamIdentifier !== expectedIdentity) {
        throw new SignatureMismatchError(
          "identity_mismatch",
          `${artifact.appId}: signed by ${seal.teamIdentifier}, expected ${expectedIdentity}`
        );
      }
      if (options.expectedIdentifier !== undefined && info.identifier !== options.expectedIdentifier) {
        throw new SignatureMismatchError(
          "identifier_mismatch",
          `${artifact.appId}: bundle identifier ${info.identifier}, expected ${options.expectedIdentifier}`
        );
      }
      await checkSeal(bundleDir, seal);

      if (artifact.declaredVersion !== undefined && artifact.declaredVersion !== info.version) {
        this.logger.warn(`${artifact.appId}: feed declared ${artifact.declaredVersion} but bundle reports ${info.version}`);
      }
      this.logger.debug(`${artifact.appId}: verified ${info.identifier} ${info.version} (${Object.keys(seal.files).length} sealed files)`);
      return { ...info, identity: seal.teamIdentifier };
    } finally {
      await removeDir(tempRoot);
    }
  }

  private async unpack(containerPath: string, tempRoot: string): Promise<string> {
    const extracted = path.join(tempRoot, "container");
    try {
      await extractZip(containerPath, extracted);
    } catch (err) {
      throw new SignatureMismatchError("unreadable_container", `Cannot open ${path.basename(containerPath)}: ${errorMessage(err)}`, {
        cause: err
      });
    }
    const bundles = await fg("*.app", { cwd: extracted, onlyDirectories: true, deep: 1 });
    if (bundles.length !== 1) {
      throw new SignatureMismatchError(
        "bundle_missing",
        `Expected exactly one .app bundle in ${path.basename(containerPath)}, found ${bundles.length}`
      );
    }
    return path.join(extracted, bundles[0]);
  }
}
