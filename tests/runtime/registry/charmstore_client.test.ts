import test from "node:test";
import assert from "node:assert/strict";
import {
  RegistryAuthError,
  RegistryError,
  RegistryNotFoundError,
  RegistryTransientError,
} from "../../../src/core/errors";
import { CharmstoreClient, errorForStatus, toEntityPath } from "../../../runtime/registry/charmstore.client";
import type { FetchLike } from "../../../runtime/http/http.request";
import { scriptedFetch } from "../../helpers/http.fakes";

const BASE = "https://charmstore.test/v5";

test("charmstore: package names map to entity paths", () => {
  assert.equal(toEntityPath("cs:~containers/etcd"), "~containers/etcd");
  assert.equal(toEntityPath(" kubernetes-worker "), "kubernetes-worker");
  assert.equal(toEntityPath("cs:~user/name with space"), "~user/name%20with%20space");
  assert.throws(() => toEntityPath("cs:"), /REGISTRY_BAD_REQUEST/);
});

test("charmstore: status codes map to error kinds", () => {
  assert.ok(errorForStatus(404, "x") instanceof RegistryNotFoundError);
  assert.ok(errorForStatus(401, "x") instanceof RegistryAuthError);
  assert.ok(errorForStatus(403, "x") instanceof RegistryAuthError);
  assert.ok(errorForStatus(429, "x") instanceof RegistryTransientError);
  assert.ok(errorForStatus(502, "x") instanceof RegistryTransientError);
  assert.equal(errorForStatus(400, "manifest etcd-1").message, "REGISTRY_HTTP_400 manifest etcd-1");
});

test("charmstore: entity id, manifest and file are read from their endpoints", async () => {
  const { fetchImpl, requests } = scriptedFetch({
    [`${BASE}/~containers/etcd/meta/any`]: { body: '{"Id":"cs:~containers/etcd-12"}' },
    [`${BASE}/~containers/etcd-12/meta/manifest`]: {
      body: '[{"Name":"metadata.yaml"},{"Name":"repo-info"},{"Size":3}]',
    },
    [`${BASE}/~containers/etcd-12/archive/repo-info`]: { body: "commit-sha-1: abc\n" },
  });
  const client = new CharmstoreClient({ baseUrl: `${BASE}/`, timeoutMs: 1000, fetchImpl });

  assert.equal(await client.getEntityId("cs:~containers/etcd"), "cs:~containers/etcd-12");
  assert.deepEqual(await client.listFiles("cs:~containers/etcd", 12), ["metadata.yaml", "repo-info"]);
  assert.equal(await client.readFile("cs:~containers/etcd", 12, "repo-info"), "commit-sha-1: abc\n");
  assert.equal(requests.length, 3);
});

test("charmstore: http failures surface as classified errors", async () => {
  const { fetchImpl } = scriptedFetch({
    [`${BASE}/etcd-3/meta/manifest`]: { status: 503 },
    [`${BASE}/etcd-2/meta/manifest`]: { status: 401 },
  });
  const client = new CharmstoreClient({ baseUrl: BASE, timeoutMs: 1000, fetchImpl });

  await assert.rejects(client.listFiles("etcd", 3), RegistryTransientError);
  await assert.rejects(client.listFiles("etcd", 2), RegistryAuthError);
  await assert.rejects(client.listFiles("etcd", 1), RegistryNotFoundError);
});

test("charmstore: malformed payloads are bad responses", async () => {
  const { fetchImpl } = scriptedFetch({
    [`${BASE}/etcd/meta/any`]: { body: "{}" },
    [`${BASE}/etcd-1/meta/manifest`]: { body: "not json" },
  });
  const client = new CharmstoreClient({ baseUrl: BASE, timeoutMs: 1000, fetchImpl });

  await assert.rejects(client.getEntityId("etcd"), /REGISTRY_BAD_RESPONSE entity etcd: missing Id/);
  await assert.rejects(client.listFiles("etcd", 1), /REGISTRY_BAD_RESPONSE manifest etcd-1: invalid JSON/);
});

test("charmstore: network failures and timeouts are transient", async () => {
  const { fetchImpl } = scriptedFetch({ [`${BASE}/etcd/meta/any`]: new TypeError("fetch failed") });
  const offline = new CharmstoreClient({ baseUrl: BASE, timeoutMs: 1000, fetchImpl });
  await assert.rejects(offline.getEntityId("etcd"), RegistryTransientError);

  const hanging: FetchLike = (_input, init) =>
    new Promise<Response>((_resolve, reject) => {
      init?.signal?.addEventListener("abort", () => {
        const error = new Error("aborted");
        error.name = "AbortError";
        reject(error);
      });
    });
  const slow = new CharmstoreClient({ baseUrl: BASE, timeoutMs: 5, fetchImpl: hanging });
  await assert.rejects(slow.getEntityId("etcd"), /REGISTRY_TRANSIENT entity etcd: timed out after 5ms/);
});

test("charmstore: other request failures are not retried as transient", async () => {
  const { fetchImpl } = scriptedFetch({ [`${BASE}/etcd/meta/any`]: new Error("boom") });
  const client = new CharmstoreClient({ baseUrl: BASE, timeoutMs: 1000, fetchImpl });

  await assert.rejects(client.getEntityId("etcd"), (error: unknown) => {
    assert.ok(error instanceof RegistryError);
    assert.equal(error instanceof RegistryTransientError, false);
    assert.equal(error.message, "REGISTRY_REQUEST_FAILED entity etcd: boom");
    return true;
  });
});
