import test from "node:test";
import assert from "node:assert/strict";
import {
  BranchResolver,
  STABLE_COMMIT_LOOKBACK,
  isStableBranch,
  preferBranch,
} from "../../src/branches/branch.resolver";
import { SourceControlError } from "../../src/core/errors";
import type { BranchDescriptor, CommitDescriptor, SourceControlClient } from "../../src/branches/branch.types";
import { FakeSourceControl } from "../helpers/fakes";

function shas(prefix: string, count: number): string[] {
  return Array.from({ length: count }, (_, idx) => `${prefix}${String(idx).padStart(2, "0")}`);
}

test("branches: only stable/ prefixed names count as stable", () => {
  assert.equal(isStableBranch("stable/22.04"), true);
  assert.equal(isStableBranch("stable/"), false);
  assert.equal(isStableBranch("master"), false);
  assert.equal(isStableBranch("release/stable/1"), false);
});

test("branches: collects commits of stable branches only", async () => {
  const client = new FakeSourceControl(["master", "stable/21.10", "feature/x", "stable/22.04"], {
    master: ["m1"],
    "stable/21.10": ["a1", "a2"],
    "feature/x": ["f1"],
    "stable/22.04": ["b1"],
  });

  const window = await new BranchResolver(client).resolve("charmed-kubernetes", "charm-etcd");

  assert.deepEqual([...window.entries()], [
    ["a1", "stable/21.10"],
    ["a2", "stable/21.10"],
    ["b1", "stable/22.04"],
  ]);
  assert.deepEqual(client.commitRequests, ["stable/21.10", "stable/22.04"]);
});

test("branches: stops reading history after the lookback count", async () => {
  const client = new FakeSourceControl(["stable/22.04"], {
    "stable/22.04": shas("c", 30),
  });

  const window = await new BranchResolver(client).resolve("o", "r");

  assert.equal(STABLE_COMMIT_LOOKBACK, 20);
  assert.equal(window.size, 20);
  assert.equal(window.has("c19"), true);
  assert.equal(window.has("c20"), false);
  assert.equal(client.commitsYielded, 20);
});

test("branches: a commit on several stable branches goes to the greatest branch name", async () => {
  const forward = new FakeSourceControl(["stable/21.10", "stable/22.04"], {
    "stable/21.10": ["shared", "old"],
    "stable/22.04": ["shared"],
  });
  const backward = new FakeSourceControl(["stable/22.04", "stable/21.10"], {
    "stable/21.10": ["shared", "old"],
    "stable/22.04": ["shared"],
  });

  const first = await new BranchResolver(forward).resolve("o", "r");
  const second = await new BranchResolver(backward).resolve("o", "r");

  assert.equal(first.get("shared"), "stable/22.04");
  assert.equal(second.get("shared"), "stable/22.04");
  assert.equal(first.get("old"), "stable/21.10");
  assert.equal(preferBranch("stable/1.9", "stable/1.10"), "stable/1.9");
});

test("branches: source control failures propagate", async () => {
  const failing: SourceControlClient = {
    async listBranches(): Promise<readonly BranchDescriptor[]> {
      throw new SourceControlError("GITHUB_HTTP_403 branches of o/r", { status: 403 });
    },
    async *listCommits(): AsyncIterable<CommitDescriptor> {
      yield* [];
    },
  };

  await assert.rejects(new BranchResolver(failing).resolve("o", "r"), /GITHUB_HTTP_403/);
});
