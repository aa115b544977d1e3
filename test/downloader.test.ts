import test, { type TestContext } from "node:test";
import assert from "node:assert/strict";
import fs from "node:fs/promises";
import path from "node:path";
import { CacheStore } from "../src/cache/store.js";
import { Downloader } from "../src/download/downloader.js";
import { resolveSource, selectField } from "../src/download/sources.js";
import { FatalError, HttpError } from "../src/errors.js";
import { RetryCoordinator } from "../src/retry/coordinator.js";
import { MemoryKeyValueStore } from "../src/store/kv.js";
import type { CacheEntry } from "../src/types.js";
import { hashBytes } from "../src/utils/hash.js";
import { createSilentLogger } from "../src/utils/log.js";
import { FakeFetch, bytesResponse, jsonResponse } from "./helpers/fake-fetch.js";
import { makeTempDir, sampleApp } from "./helpers/fixtures.js";

const BODY = new TextEncoder().encode("vendor bytes v1");
const SAMPLE_URL = "https://vendor.test/sample/Sample.zip";

async function setup(t: TestContext) {
  const dir = await makeTempDir();
  t.after(() => fs.rm(dir, { recursive: true, force: true }));
  const fake = new FakeFetch();
  const backend = new MemoryKeyValueStore();
  const cache = new CacheStore(backend, () => new Date("2025-01-01T00:00:00Z"));
  const retry = new RetryCoordinator({ maxAttempts: 3 }, { sleep: async () => undefined });
  const downloader = new Downloader({
    cache,
    cacheDir: path.join(dir, "cache"),
    retry,
    logger: createSilentLogger(),
    fetchImpl: fake.fetch
  });
  return { dir, fake, cache, downloader };
}

test("a fresh download is stored and committed with its validator", async (t) => {
  const { dir, fake, cache, downloader } = await setup(t);
  fake.on("GET", SAMPLE_URL, () => bytesResponse(BODY, { ETag: '"abc123"', "Last-Modified": "Mon, 06 Jan 2025 10:00:00 GMT" }));

  const { artifact, cacheHit } = await downloader.fetch(sampleApp(), undefined);

  assert.equal(cacheHit, false);
  assert.equal(artifact.path, path.join(dir, "cache", "sample", "Sample.zip"));
  assert.equal(artifact.fingerprint, hashBytes(BODY));
  assert.deepEqual(await fs.readFile(artifact.path), Buffer.from(BODY));
  const entry = await cache.lookup("sample");
  assert.deepEqual(entry?.validator, { etag: '"abc123"', lastModified: "Mon, 06 Jan 2025 10:00:00 GMT" });
  assert.equal(entry?.location, artifact.path);
  assert.deepEqual(await fs.readdir(path.join(dir, "cache", "sample")), ["Sample.zip"]);
  assert.deepEqual(downloader.metrics, { cacheHits: 0, cacheMisses: 1, bytes: BODY.byteLength });
});

test("an unchanged validator is a cache hit that writes nothing", async (t) => {
  const { dir, fake, cache, downloader } = await setup(t);
  const location = path.join(dir, "cache", "chrome", "googlechrome.zip");
  await fs.mkdir(path.dirname(location), { recursive: true });
  await fs.writeFile(location, BODY);
  const url = "https://vendor.test/chrome/googlechrome.zip";
  const seeded: CacheEntry = await cache.commit("chrome", {
    url,
    validator: { etag: '"abc123"' },
    fingerprint: hashBytes(BODY),
    location
  });
  fake.on("GET", url, (request) =>
    request.headers.get("if-none-match") === '"abc123"' ? new Response(null, { status: 304 }) : bytesResponse(BODY)
  );
  const app = sampleApp({ id: "chrome", source: { kind: "direct", url } });

  const { artifact, cacheHit } = await downloader.fetch(app, seeded);

  assert.equal(cacheHit, true);
  assert.equal(artifact.path, location);
  assert.equal(artifact.fingerprint, hashBytes(BODY));
  assert.deepEqual(await cache.lookup("chrome"), seeded);
  assert.deepEqual(await fs.readdir(path.dirname(location)), ["googlechrome.zip"]);
  assert.equal(downloader.metrics.cacheHits, 1);
});

test("validators are not sent when the cached file is gone or the download is forced", async (t) => {
  const { dir, fake, downloader } = await setup(t);
  fake.on("GET", SAMPLE_URL, () => bytesResponse(BODY));
  const entry: CacheEntry = {
    appId: "sample",
    url: SAMPLE_URL,
    validator: { etag: '"abc123"' },
    fingerprint: "old",
    location: path.join(dir, "nowhere.zip"),
    retrievedAt: "2024-12-01T00:00:00.000Z"
  };

  await downloader.fetch(sampleApp(), entry);
  assert.equal(fake.requests[0].headers.get("if-none-match"), null);

  const existing = path.join(dir, "cache", "sample", "Sample.zip");
  await downloader.fetch(sampleApp(), { ...entry, location: existing }, { force: true });
  assert.equal(fake.requests[1].headers.get("if-none-match"), null);
});

test("a new download replaces the artifact it supersedes", async (t) => {
  const { dir, fake, cache, downloader } = await setup(t);
  const appDir = path.join(dir, "cache", "sample");
  const oldLocation = path.join(appDir, "Sample-1.0.zip");
  await fs.mkdir(appDir, { recursive: true });
  await fs.writeFile(oldLocation, "vendor bytes v0");
  const previous = await cache.commit("sample", {
    url: "https://vendor.test/sample/Sample-1.0.zip",
    validator: { etag: '"v0"' },
    fingerprint: hashBytes("vendor bytes v0"),
    location: oldLocation
  });
  fake.on("GET", SAMPLE_URL, () => bytesResponse(BODY, { ETag: '"v1"' }));

  const { artifact } = await downloader.fetch(sampleApp(), previous);

  assert.equal(artifact.path, path.join(appDir, "Sample.zip"));
  assert.deepEqual(await fs.readdir(appDir), ["Sample.zip"]);
  assert.equal((await cache.lookup("sample"))?.location, artifact.path);
});

test("a superseded artifact outside the cache directory is left alone", async (t) => {
  const { dir, fake, downloader } = await setup(t);
  const outside = path.join(dir, "imported.zip");
  await fs.writeFile(outside, "operator copy");
  fake.on("GET", SAMPLE_URL, () => bytesResponse(BODY));
  const entry: CacheEntry = {
    appId: "sample",
    url: "https://vendor.test/sample/Imported.zip",
    validator: {},
    fingerprint: hashBytes("operator copy"),
    location: outside,
    retrievedAt: "2024-12-01T00:00:00.000Z"
  };

  await downloader.fetch(sampleApp(), entry);

  assert.equal(await fs.readFile(outside, "utf8"), "operator copy");
});

test("transient server errors are retried", async (t) => {
  const { fake, downloader } = await setup(t);
  let calls = 0;
  fake.on("GET", SAMPLE_URL, () => {
    calls += 1;
    return calls < 3 ? new Response("busy", { status: 503 }) : bytesResponse(BODY);
  });
  const { cacheHit } = await downloader.fetch(sampleApp(), undefined);
  assert.equal(cacheHit, false);
  assert.equal(calls, 3);
});

test("404 and malformed URLs fail without retry", async (t) => {
  const { fake, downloader } = await setup(t);
  fake.on("GET", SAMPLE_URL, () => new Response("gone", { status: 404 }));
  await assert.rejects(downloader.fetch(sampleApp(), undefined), (err: unknown) => err instanceof HttpError && err.status === 404);
  assert.equal(fake.requests.length, 1);

  await assert.rejects(
    downloader.fetch(sampleApp({ source: { kind: "direct", url: "not a url" } }), undefined),
    (err: unknown) => err instanceof FatalError && err.code === "MALFORMED_URL"
  );
  assert.equal(fake.requests.length, 1);
});

test("a dry run stages the download and only records the commit", async (t) => {
  const { dir, fake, cache, downloader } = await setup(t);
  fake.on("GET", SAMPLE_URL, () => bytesResponse(BODY, { ETag: '"v1"' }));
  const recorded: string[] = [];
  const stagingDir = path.join(dir, "staging");

  const { artifact } = await downloader.fetch(sampleApp(), undefined, { dryRun: { record: (a) => recorded.push(a) }, stagingDir });

  assert.equal(path.dirname(artifact.path), stagingDir);
  assert.equal(await cache.lookup("sample"), undefined);
  assert.deepEqual(recorded, [`cache.commit sample (${hashBytes(BODY).slice(0, 12)})`]);
});

test("json feeds resolve relative download links and declare a version", async () => {
  const fake = new FakeFetch();
  fake.on("GET", "https://vendor.test/feed.json", () =>
    jsonResponse({ releases: [{ version: "2.0.1", links: { zip: "/files/app-2.0.1.zip" } }] })
  );
  const resolved = await resolveSource(
    { kind: "json-feed", url: "https://vendor.test/feed.json", versionField: "releases.0.version", urlField: "releases.0.links.zip" },
    { fetchImpl: fake.fetch, timeoutMs: 1000 }
  );
  assert.deepEqual(resolved, { url: "https://vendor.test/files/app-2.0.1.zip", declaredVersion: "2.0.1" });
});

test("github releases pick the first matching asset", async () => {
  const fake = new FakeFetch();
  fake.on("GET", "https://gh.test/repos/acme/tool/releases/latest", () =>
    jsonResponse({
      tag_name: "v3.1.0",
      assets: [
        { name: "tool-linux.tar.gz", browser_download_url: "https://gh.test/dl/tool-linux.tar.gz" },
        { name: "tool-mac.zip", browser_download_url: "https://gh.test/dl/tool-mac.zip" }
      ]
    })
  );
  const resolved = await resolveSource(
    { kind: "github-release", repo: "acme/tool", assetPattern: "mac\\.zip$", apiBase: "https://gh.test" },
    { fetchImpl: fake.fetch, timeoutMs: 1000 }
  );
  assert.deepEqual(resolved, { url: "https://gh.test/dl/tool-mac.zip", declaredVersion: "3.1.0" });
});

test("selectField walks objects and arrays", () => {
  assert.equal(selectField({ a: [{ b: "x" }] }, "a.0.b"), "x");
  assert.equal(selectField({ a: 1 }, "a.b"), undefined);
});
