import test, { type TestContext } from "node:test";
import assert from "node:assert/strict";
import fs from "node:fs/promises";
import path from "node:path";
import { CancelledError, RemoteConflictError } from "../src/errors.js";
import { PatchApiClient } from "../src/reconcile/client.js";
import { PatchReconciler } from "../src/reconcile/reconciler.js";
import { RetryCoordinator } from "../src/retry/coordinator.js";
import type { NormalizedPackage } from "../src/types.js";
import { hashBytes } from "../src/utils/hash.js";
import { createRecordingLogger } from "../src/utils/log.js";
import { API_BASE, FakePatchApi } from "./helpers/fake-patch-api.js";
import { CYCLES, makeTempDir, sampleApp } from "./helpers/fixtures.js";

const CONTENT = "normalized package bytes";
const APP = sampleApp();
const PILOT = CYCLES[0];

async function setup(t: TestContext) {
  const dir = await makeTempDir();
  t.after(() => fs.rm(dir, { recursive: true, force: true }));
  const pkgPath = path.join(dir, "sample-2.0.zip");
  await fs.writeFile(pkgPath, CONTENT);
  const pkg: NormalizedPackage = { appId: "sample", version: "2.0", filename: "sample-2.0.zip", fingerprint: hashBytes(CONTENT), path: pkgPath };

  const api = new FakePatchApi();
  const logger = createRecordingLogger();
  const client = new PatchApiClient({
    credentials: { baseUrl: API_BASE, username: "test-user", password: "test-secret" },
    logger,
    fetchImpl: api.fetch,
    now: () => api.now()
  });
  const reconciler = new PatchReconciler(client, new RetryCoordinator({}, { sleep: async () => undefined }), logger);
  return { api, pkg, reconciler, logger };
}

test("an empty remote converges through every step", async (t) => {
  const { api, pkg, reconciler } = await setup(t);
  const titleId = api.addTitle("Sample");
  const groupId = api.addGroup("Pilot Group");

  const result = await reconciler.reconcile(APP, pkg, PILOT);

  assert.equal(result.status, "converged");
  assert.equal(result.initialState, "DefinitionMissing");
  assert.equal(result.state, "Converged");
  assert.deepEqual(
    result.actions.map((action) => action.kind),
    ["create-definition", "create-package", "upload-package", "attach-package", "create-policy"]
  );
  const [remotePkg] = api.packages;
  assert.equal(remotePkg.sha256, pkg.fingerprint);
  assert.deepEqual(api.titles.get(titleId)?.definitions, [{ version: "2.0", packageId: remotePkg.id }]);
  assert.equal(api.policies.length, 1);
  assert.equal(api.policies[0].name, "Patch - Sample - pilot");
  assert.equal(api.policies[0].targetPatchVersion, "2.0");
  assert.deepEqual(api.policies[0].scope.computerGroupIds, [groupId]);
});

test("reconciling a converged remote makes no mutating calls", async (t) => {
  const { api, pkg, reconciler } = await setup(t);
  api.addTitle("Sample");
  api.addGroup("Pilot Group");
  await reconciler.reconcile(APP, pkg, PILOT);
  const mutations = api.mutations.length;

  const again = await reconciler.reconcile(APP, pkg, PILOT);
  const third = await reconciler.reconcile(APP, pkg, PILOT);

  assert.equal(again.initialState, "Converged");
  assert.deepEqual(again.actions, []);
  assert.deepEqual(third.actions, []);
  assert.equal(api.mutations.length, mutations);
});

test("a missing title needs an operator and touches nothing else", async (t) => {
  const { api, pkg, reconciler } = await setup(t);
  api.addGroup("Pilot Group");

  const result = await reconciler.reconcile(sampleApp({ id: "newapp", patchTitle: "New App" }), pkg, PILOT);

  assert.equal(result.status, "manual-intervention");
  assert.equal(result.state, "TitleMissing");
  assert.match(result.reason ?? "", /patch title "New App" does not exist/);
  assert.deepEqual(api.mutations, []);
  const apiRequests = api.fake.requests.filter((request) => !request.url.endsWith("/auth/token"));
  assert.equal(apiRequests.length, 1);
  assert.match(apiRequests[0].url, /patch-software-titles\?filter=/);
});

test("an interrupted sequence resumes from the remote state", async (t) => {
  const { api, pkg, reconciler } = await setup(t);
  api.addTitle("Sample", [{ version: "2.0" }]);
  api.addGroup("Pilot Group");
  api.packages.push({ id: "77", fileName: "sample-2.0.zip" });

  const result = await reconciler.reconcile(APP, pkg, PILOT);

  assert.equal(result.initialState, "PackageUnattached");
  assert.deepEqual(
    result.actions.map((action) => action.kind),
    ["upload-package", "attach-package", "create-policy"]
  );
});

test("an attachment the remote never reflects is a conflict, not a loop", async (t) => {
  const { api, pkg, reconciler } = await setup(t);
  const titleId = api.addTitle("Sample", [{ version: "2.0" }]);
  api.addGroup("Pilot Group");
  api.packages.push({ id: "77", fileName: "sample-2.0.zip", sha256: pkg.fingerprint });
  api.dropAttachments = true;

  await assert.rejects(reconciler.reconcile(APP, pkg, PILOT), (err: unknown) => {
    assert.ok(err instanceof RemoteConflictError);
    assert.match(err.message, /still requires "attach sample-2\.0\.zip to Sample 2\.0" after it was applied/);
    return true;
  });
  assert.deepEqual(api.mutations, [`PATCH /api/v2/patch-software-titles/${titleId}/definitions/2.0`]);
  assert.deepEqual(api.policies, []);
});

test("a remote package with other bytes is replaced with a warning", async (t) => {
  const { api, pkg, reconciler, logger } = await setup(t);
  api.addTitle("Sample", [{ version: "2.0", packageId: "77" }]);
  api.addGroup("Pilot Group");
  api.packages.push({ id: "77", fileName: "sample-2.0.zip", sha256: "0".repeat(64) });

  const result = await reconciler.reconcile(APP, pkg, PILOT);

  assert.deepEqual(
    result.actions.map((action) => action.kind),
    ["replace-package", "create-policy"]
  );
  assert.equal(api.packages[0].sha256, pkg.fingerprint);
  const warnings = logger.records.filter((record) => record.level === "warn").map((record) => record.message);
  assert.deepEqual(warnings, [`remote sample-2.0.zip has fingerprint ${"0".repeat(64)}, replacing with ${pkg.fingerprint}`]);
});

test("older policies are updated in place and newer ones are left alone", async (t) => {
  const { api, pkg, reconciler } = await setup(t);
  const titleId = api.addTitle("Sample", [{ version: "2.0", packageId: "77" }]);
  const groupId = api.addGroup("Pilot Group");
  api.packages.push({ id: "77", fileName: "sample-2.0.zip", sha256: hashBytes(CONTENT) });
  api.policies.push({ id: "9", name: "Patch - Sample - pilot", softwareTitleId: titleId, targetPatchVersion: "1.5", scope: { computerGroupIds: [groupId] } });

  const updated = await reconciler.reconcile(APP, pkg, PILOT);
  assert.equal(updated.initialState, "PolicyStale");
  assert.deepEqual(updated.actions.map((action) => action.kind), ["update-policy"]);
  assert.equal(api.policies.length, 1);
  assert.equal(api.policies[0].targetPatchVersion, "2.0");

  api.policies[0].targetPatchVersion = "2.1";
  const held = await reconciler.reconcile(APP, pkg, PILOT);
  assert.equal(held.decision, "hold");
  assert.deepEqual(held.actions, []);
  assert.equal(api.policies[0].targetPatchVersion, "2.1");
});

test("a paused cycle attaches the package but leaves policies alone", async (t) => {
  const { api, pkg, reconciler } = await setup(t);
  api.addTitle("Sample");
  api.addGroup("Pilot Group");

  const result = await reconciler.reconcile(APP, pkg, { ...PILOT, paused: true });

  assert.equal(result.status, "paused");
  assert.deepEqual(
    result.actions.map((action) => action.kind),
    ["create-definition", "create-package", "upload-package", "attach-package"]
  );
  assert.equal(api.policies.length, 0);
});

test("a dry run plans without mutating", async (t) => {
  const { api, pkg, reconciler } = await setup(t);
  api.addTitle("Sample");
  api.addGroup("Pilot Group");

  const result = await reconciler.reconcile(APP, pkg, PILOT, { dryRun: true });

  assert.deepEqual(
    result.actions.map((action) => action.description),
    [
      "create definition Sample 2.0",
      "create package record sample-2.0.zip",
      `upload sample-2.0.zip (${pkg.fingerprint.slice(0, 12)})`,
      "attach sample-2.0.zip to Sample 2.0",
      'create policy "Patch - Sample - pilot" for Pilot Group at 2.0'
    ]
  );
  assert.deepEqual(api.mutations, []);
});

test("remote inconsistencies stop before any change", async (t) => {
  const { api, pkg, reconciler } = await setup(t);
  api.addTitle("Sample");

  const noGroup = await reconciler.reconcile(APP, pkg, PILOT);
  assert.equal(noGroup.status, "manual-intervention");
  assert.equal(noGroup.reason, 'computer group "Pilot Group" does not exist');
  assert.deepEqual(api.mutations, []);
});

test("cancellation stops before the next mutation", async (t) => {
  const { api, pkg, reconciler } = await setup(t);
  api.addTitle("Sample");
  api.addGroup("Pilot Group");
  const controller = new AbortController();
  controller.abort();

  await assert.rejects(reconciler.reconcile(APP, pkg, PILOT, { signal: controller.signal }), CancelledError);
  assert.deepEqual(api.mutations, []);
});

test("transient API errors during observation are retried", async (t) => {
  const { api, pkg, reconciler } = await setup(t);
  api.addTitle("Sample");
  api.addGroup("Pilot Group");
  api.failures.push(503, 502);

  const result = await reconciler.reconcile(APP, pkg, PILOT);
  assert.equal(result.status, "converged");
});
