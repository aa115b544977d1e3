import path from "node:path";
import { createHash } from "node:crypto";
import { FatalError } from "../errors.js";

export function toPosixPath(inputPath: string): string {
  return inputPath.replace(/\\/g, "/");
}

/** Why `relPath` may not be used inside an extraction or package root, if it may not. */
function unsafePathReason(relPath: string): string | undefined {
  const posixPath = toPosixPath(relPath);
  if (posixPath.includes("\0")) return "contains a null byte";
  if (!posixPath || posixPath === ".") return "is empty";
  if (posixPath.startsWith("/") || /^[a-zA-Z]:/.test(posixPath)) return "is absolute";
  const segments = posixPath.split("/");
  if (segments.some((segment) => segment === "")) return "has an empty segment";
  if (segments.includes("..")) return "traverses upwards";
  return undefined;
}

export function ensureSafeRelPath(relPath: string): void {
  const reason = unsafePathReason(relPath);
  if (reason !== undefined) {
    throw new FatalError("UNSAFE_PATH", `Path ${JSON.stringify(relPath)} ${reason}`);
  }
}

/** Resolve a relative posix path under `rootDir`, refusing anything that escapes it. */
export function safeJoin(rootDir: string, relPosixPath: string): string {
  ensureSafeRelPath(relPosixPath);
  const root = path.resolve(rootDir);
  const target = path.resolve(root, ...toPosixPath(relPosixPath).split("/"));
  const relative = path.relative(root, target);
  if (relative.startsWith("..") || path.isAbsolute(relative)) {
    throw new FatalError("UNSAFE_PATH", `Path ${JSON.stringify(relPosixPath)} escapes ${root}`);
  }
  return target;
}

/** Keep only characters that are safe in a file name on every platform. */
export function sanitizeFileName(name: string): string {
  return name.replace(/[^A-Za-z0-9._-]/g, "");
}

/**
 * File name for a downloaded artifact: the URL's last path segment, or a
 * short digest of the URL when the path has none (redirecting endpoints).
 */
export function fileNameFromUrl(url: string): string {
  const parsed = new URL(url);
  const lastSegment = decodeURIComponent(parsed.pathname.split("/").pop() ?? "");
  const cleaned = sanitizeFileName(lastSegment);
  if (cleaned && cleaned !== "." && cleaned !== "..") {
    return cleaned;
  }
  return `${createHash("sha256").update(url).digest("hex").slice(0, 8)}.download`;
}
