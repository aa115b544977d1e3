import path from "node:path";
import fs from "node:fs/promises";
import { randomUUID } from "node:crypto";
import { FatalError } from "../errors.js";
import type { ApplicationSpec, Artifact, NormalizedMetadata, NormalizedPackage } from "../types.js";
import { PACKAGE_IGNORE_PATTERNS, createTempDir, ensureDir, moveFile, removeDir } from "../utils/fs.js";
import { hashFile } from "../utils/hash.js";
import type { Logger } from "../utils/log.js";
import { sanitizeFileName } from "../utils/paths.js";
import { createZipFromDir, extractZip, isCanonicalListing, readZipEntries } from "../utils/zip.js";

export const DEFAULT_NAMING_PATTERN = "{id}-{version}.zip";

const PLACEHOLDER = /\{(id|name|version)\}/g;

/** Expand `{id}`, `{name}` and `{version}`, then strip unsafe characters. */
export function canonicalFileName(
  pattern: string,
  app: Pick<ApplicationSpec, "id" | "name">,
  metadata: Pick<NormalizedMetadata, "version">
): string {
  const values = { id: app.id, name: app.name, version: metadata.version };
  const expanded = pattern.replace(PLACEHOLDER, (_match, key: keyof typeof values) => values[key]);
  const fileName = sanitizeFileName(expanded);
  if (!fileName || fileName.startsWith(".")) {
    throw new FatalError("INVALID_PACKAGE_NAME", `Naming pattern ${pattern} yields no usable file name for ${app.id}`);
  }
  return fileName;
}

export interface NormalizerOptions {
  outDir: string;
  pattern?: string;
  logger: Logger;
}

export class PackageNormalizer {
  private readonly pattern: string;

  constructor(private readonly options: NormalizerOptions) {
    this.pattern = options.pattern ?? DEFAULT_NAMING_PATTERN;
  }

  /**
   * Produce the deployment package. Canonical input is copied byte for byte;
   * anything else is repacked with sorted entries and fixed timestamps, so
   * equal input always yields equal output.
   */
  async normalize(app: ApplicationSpec, artifact: Artifact, metadata: NormalizedMetadata, outDir = this.options.outDir): Promise<NormalizedPackage> {
    const filename = canonicalFileName(this.pattern, app, metadata);
    const destDir = path.join(outDir, app.id);
    const destPath = path.join(destDir, filename);
    await ensureDir(destDir);
    const stagingPath = path.join(destDir, `.${filename}.tmp-${randomUUID()}`);

    try {
      const entries = await readZipEntries(artifact.path);
      if (isCanonicalListing(entries)) {
        await fs.copyFile(artifact.path, stagingPath);
      } else {
        await this.repack(artifact.path, stagingPath);
      }
      await moveFile(stagingPath, destPath);
    } catch (err) {
      await fs.rm(stagingPath, { force: true });
      throw err;
    }

    await this.pruneOthers(destDir, filename);
    const fingerprint = await hashFile(destPath);
    this.options.logger.debug(`${app.id}: packaged ${filename} (${fingerprint.slice(0, 12)})`);
    return { appId: app.id, version: metadata.version, filename, fingerprint, path: destPath };
  }

  /** Each application directory holds only its current package. */
  private async pruneOthers(destDir: string, keep: string): Promise<void> {
    const entries = await fs.readdir(destDir, { withFileTypes: true });
    for (const entry of entries) {
      if (entry.isFile() && entry.name !== keep) {
        await fs.rm(path.join(destDir, entry.name), { force: true });
        this.options.logger.debug(`removed superseded package ${entry.name}`);
      }
    }
  }

  private async repack(sourceZip: string, outZip: string): Promise<void> {
    const tempRoot = await createTempDir("patchpilot-normalize-");
    try {
      const contentDir = path.join(tempRoot, "content");
      await extractZip(sourceZip, contentDir);
      await createZipFromDir(contentDir, outZip, PACKAGE_IGNORE_PATTERNS);
    } finally {
      await removeDir(tempRoot);
    }
  }
}
