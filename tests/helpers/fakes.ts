import type { BranchDescriptor, CommitDescriptor, SourceControlClient } from "../../src/branches/branch.types";
import { RegistryNotFoundError } from "../../src/core/errors";
import type { ReconcileLogger } from "../../src/core/logger";
import type { RegistryClient } from "../../src/revisions/revision.types";
import { parseRevisionState, serializeRevisionState } from "../../src/state/revision_state.store";
import type { RevisionStateDocument, RevisionStateStore } from "../../src/state/revision_state.types";

type Step = string | readonly string[] | Error;

export interface FakeRevision {
  /** Successive listing results; the last one repeats. */
  readonly listing?: readonly Step[];
  /** Successive repo-info reads; the last one repeats. */
  readonly content?: readonly Step[];
}

function nextStep(steps: readonly Step[], calls: number): Step {
  const step = steps[Math.min(calls, steps.length - 1)];
  if (step === undefined) {
    throw new Error("fake has no scripted response");
  }
  return step;
}

export class FakeRegistry implements RegistryClient {
  readonly listCalls: number[] = [];
  readonly readCalls: number[] = [];

  constructor(
    private readonly entityId: string | Error,
    private readonly revisions: Readonly<Record<number, FakeRevision>> = {}
  ) {}

  async getEntityId(_packageName: string): Promise<string> {
    if (this.entityId instanceof Error) {
      throw this.entityId;
    }
    return this.entityId;
  }

  async listFiles(_packageName: string, revision: number): Promise<readonly string[]> {
    const calls = this.listCalls.filter((value) => value === revision).length;
    this.listCalls.push(revision);
    const step = nextStep(this.revisions[revision]?.listing ?? [["metadata.yaml"]], calls);
    if (step instanceof Error) {
      throw step;
    }
    return typeof step === "string" ? [step] : step;
  }

  async readFile(_packageName: string, revision: number, _filename: string): Promise<string> {
    const calls = this.readCalls.filter((value) => value === revision).length;
    this.readCalls.push(revision);
    const step = nextStep(this.revisions[revision]?.content ?? [""], calls);
    if (step instanceof Error) {
      throw step;
    }
    return typeof step === "string" ? step : step.join("\n");
  }
}

/** Dispatches by package name; unknown names are not found. */
export class RoutingRegistry implements RegistryClient {
  constructor(private readonly routes: Readonly<Record<string, RegistryClient>>) {}

  getEntityId(packageName: string): Promise<string> {
    return this.route(packageName).getEntityId(packageName);
  }

  listFiles(packageName: string, revision: number): Promise<readonly string[]> {
    return this.route(packageName).listFiles(packageName, revision);
  }

  readFile(packageName: string, revision: number, filename: string): Promise<string> {
    return this.route(packageName).readFile(packageName, revision, filename);
  }

  private route(packageName: string): RegistryClient {
    const registry = this.routes[packageName];
    if (!registry) {
      throw new RegistryNotFoundError(`REGISTRY_NOT_FOUND entity ${packageName}`);
    }
    return registry;
  }
}

export function repoInfo(sha: string, remote?: string): FakeRevision {
  const lines = [`commit-sha-1: ${sha}`];
  if (remote) {
    lines.push(`remote: ${remote}`);
  }
  return { listing: [["metadata.yaml", "repo-info"]], content: [lines.join("\n")] };
}

export class FakeSourceControl implements SourceControlClient {
  readonly commitRequests: string[] = [];
  commitsYielded = 0;

  constructor(
    private readonly branches: readonly string[],
    private readonly commits: Readonly<Record<string, readonly string[]>>
  ) {}

  async listBranches(_owner: string, _repoName: string): Promise<readonly BranchDescriptor[]> {
    return this.branches.map((name) => ({ name }));
  }

  async *listCommits(_owner: string, _repoName: string, branch: string): AsyncIterable<CommitDescriptor> {
    this.commitRequests.push(branch);
    for (const sha of this.commits[branch] ?? []) {
      this.commitsYielded += 1;
      yield { sha };
    }
  }
}

/** Keeps the serialized text so tests can compare what would be on disk. */
export class MemoryStateStore implements RevisionStateStore {
  readonly snapshots: string[] = [];

  constructor(public text: string | null) {}

  async load(): Promise<RevisionStateDocument> {
    return this.text === null ? new Map() : parseRevisionState(this.text, "memory.yaml");
  }

  async save(document: RevisionStateDocument): Promise<void> {
    this.text = serializeRevisionState(document);
    this.snapshots.push(this.text);
  }
}

export class RecordingLogger implements ReconcileLogger {
  readonly lines: string[] = [];

  debug(message: string): void {
    this.lines.push(`debug ${message}`);
  }

  info(message: string): void {
    this.lines.push(`info ${message}`);
  }

  warn(message: string): void {
    this.lines.push(`warn ${message}`);
  }
}

export async function noSleep(_ms: number): Promise<void> {
  return undefined;
}
