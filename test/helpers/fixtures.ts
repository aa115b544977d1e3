import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { createWriteStream } from "node:fs";
import * as yazl from "yazl";
import type { ApplicationSpec, Cycle } from "../../src/types.js";
import { hashBytes } from "../../src/utils/hash.js";
import { createZipFromDir } from "../../src/utils/zip.js";

export async function makeTempDir(prefix = "patchpilot-test-"): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), prefix));
}

export async function writeFile(filePath: string, content: string | Uint8Array): Promise<void> {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  await fs.writeFile(filePath, content);
}

export interface BundleOptions {
  name?: string;
  identifier?: string;
  version?: string;
  teamIdentifier?: string;
  files?: Record<string, string>;
  /** Written after sealing, so they break the seal. */
  tamper?: Record<string, string>;
  omitSeal?: boolean;
}

/** Lay out `<Name>.app` under `root` with Info.json and a matching seal. */
export async function writeAppBundle(root: string, options: BundleOptions = {}): Promise<string> {
  const name = options.name ?? "Sample";
  const bundleDir = path.join(root, `${name}.app`);
  const files: Record<string, string> = {
    "Contents/Info.json": JSON.stringify({
      CFBundleIdentifier: options.identifier ?? "com.example.sample",
      CFBundleShortVersionString: options.version ?? "1.0.0",
      CFBundleName: name
    }),
    "Contents/MacOS/sample": "#!/bin/sh\necho sample\n",
    ...options.files
  };
  const seal: Record<string, string> = {};
  for (const [relPath, content] of Object.entries(files)) {
    await writeFile(path.join(bundleDir, relPath), content);
    seal[relPath] = hashBytes(content);
  }
  if (!options.omitSeal) {
    await writeFile(
      path.join(bundleDir, "Contents/_CodeSignature/CodeResources.json"),
      JSON.stringify({ teamIdentifier: options.teamIdentifier ?? "TEAM123456", files: seal })
    );
  }
  for (const [relPath, content] of Object.entries(options.tamper ?? {})) {
    await writeFile(path.join(bundleDir, relPath), content);
  }
  return bundleDir;
}

/** A canonical container zip holding one app bundle. */
export async function buildContainer(outZip: string, options: BundleOptions = {}): Promise<string> {
  const stage = await makeTempDir("patchpilot-fixture-");
  try {
    await writeAppBundle(stage, options);
    await createZipFromDir(stage, outZip);
  } finally {
    await fs.rm(stage, { recursive: true, force: true });
  }
  return outZip;
}

/**
 * A container the way vendors ship them: directory entries, real
 * timestamps and entries out of order.
 */
export async function buildVendorContainer(outZip: string, options: BundleOptions = {}): Promise<string> {
  const stage = await makeTempDir("patchpilot-fixture-");
  try {
    const bundleDir = await writeAppBundle(stage, options);
    const bundleName = path.basename(bundleDir);
    const zipfile = new yazl.ZipFile();
    const done = new Promise<void>((resolve, reject) => {
      zipfile.outputStream.pipe(createWriteStream(outZip)).on("close", resolve).on("error", reject);
    });
    const mtime = new Date("2024-03-01T10:00:00Z");
    zipfile.addEmptyDirectory(`${bundleName}/`, { mtime });
    const entries = await listRelative(bundleDir);
    for (const relPath of entries.reverse()) {
      zipfile.addFile(path.join(bundleDir, relPath), `${bundleName}/${relPath}`, { mtime });
    }
    zipfile.addBuffer(Buffer.from("finder noise"), `${bundleName}/.DS_Store`, { mtime });
    zipfile.end();
    await done;
  } finally {
    await fs.rm(stage, { recursive: true, force: true });
  }
  return outZip;
}

async function listRelative(dir: string, prefix = ""): Promise<string[]> {
  const out: string[] = [];
  for (const entry of await fs.readdir(dir, { withFileTypes: true })) {
    const rel = prefix ? `${prefix}/${entry.name}` : entry.name;
    if (entry.isDirectory()) {
      out.push(...(await listRelative(path.join(dir, entry.name), rel)));
    } else {
      out.push(rel);
    }
  }
  return out.sort();
}

export function sampleApp(overrides: Partial<ApplicationSpec> = {}): ApplicationSpec {
  const id = overrides.id ?? "sample";
  return {
    id,
    name: "Sample",
    bundleId: "com.example.sample",
    expectedIdentity: "TEAM123456",
    source: { kind: "direct", url: `https://vendor.test/${id}/Sample.zip` },
    patchTitle: "Sample",
    ...overrides
  };
}

export const CYCLES: Cycle[] = [
  { name: "pilot", ordinal: 1, cohort: "Pilot Group" },
  { name: "early", ordinal: 2, cohort: "Early Group" },
  { name: "broad", ordinal: 3, cohort: "Broad Group" }
];
