import { FatalError } from "../errors.js";
import type { DownloadSource } from "../types.js";
import { httpJson, parseUrl, type HttpOptions } from "../utils/http.js";

export interface ResolvedSource {
  url: string;
  declaredVersion?: string;
}

const GITHUB_API = "https://api.github.com";

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Walk a dot path; numeric segments index into arrays. */
export function selectField(data: unknown, selector: string): unknown {
  let current: unknown = data;
  for (const key of selector.split(".")) {
    if (Array.isArray(current) && /^\d+$/.test(key)) {
      current = current[Number(key)];
    } else if (isRecord(current) && key in current) {
      current = current[key];
    } else {
      return undefined;
    }
  }
  return current;
}

function requireString(value: unknown, what: string, where: string): string {
  if (typeof value === "string" && value.length > 0) {
    return value;
  }
  if (typeof value === "number") {
    return String(value);
  }
  throw new FatalError("FEED_INVALID", `${where}: ${what} missing from response`);
}

async function resolveJsonFeed(source: Extract<DownloadSource, { kind: "json-feed" }>, http: HttpOptions): Promise<ResolvedSource> {
  const data = await httpJson(source.url, { headers: { Accept: "application/json" } }, http);
  const url = new URL(requireString(selectField(data, source.urlField), source.urlField, source.url), source.url).toString();
  return {
    url,
    declaredVersion: requireString(selectField(data, source.versionField), source.versionField, source.url)
  };
}

async function resolveGithubRelease(
  source: Extract<DownloadSource, { kind: "github-release" }>,
  http: HttpOptions
): Promise<ResolvedSource> {
  const apiUrl = `${source.apiBase ?? GITHUB_API}/repos/${source.repo}/releases/latest`;
  const release = await httpJson(apiUrl, { headers: { Accept: "application/vnd.github+json" } }, http);
  if (!isRecord(release) || !Array.isArray(release.assets)) {
    throw new FatalError("FEED_INVALID", `${apiUrl}: unexpected release payload`);
  }
  const tag = requireString(release.tag_name, "tag_name", apiUrl);
  let pattern: RegExp;
  try {
    pattern = new RegExp(source.assetPattern);
  } catch (err) {
    throw new FatalError("FEED_INVALID", `Invalid asset pattern for ${source.repo}: ${source.assetPattern}`, { cause: err });
  }
  for (const asset of release.assets) {
    if (isRecord(asset) && typeof asset.name === "string" && pattern.test(asset.name)) {
      return {
        url: requireString(asset.browser_download_url, "browser_download_url", apiUrl),
        declaredVersion: tag.replace(/^v/, "")
      };
    }
  }
  throw new FatalError("FEED_INVALID", `${apiUrl}: no asset matches ${source.assetPattern}`);
}

export async function resolveSource(source: DownloadSource, http: HttpOptions): Promise<ResolvedSource> {
  switch (source.kind) {
    case "direct":
      parseUrl(source.url);
      return { url: source.url };
    case "json-feed":
      return resolveJsonFeed(source, http);
    case "github-release":
      return resolveGithubRelease(source, http);
  }
}
