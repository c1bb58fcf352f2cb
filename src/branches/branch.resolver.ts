import { NOOP_LOGGER, type ReconcileLogger } from "../core/logger";
import type { BranchCommitWindow, SourceControlClient } from "./branch.types";

export const STABLE_COMMIT_LOOKBACK = 20;
export const STABLE_BRANCH_PATTERN = /^stable\/.+$/;

export interface BranchResolverOptions {
  readonly lookback?: number;
  readonly logger?: ReconcileLogger;
}

export function isStableBranch(name: string): boolean {
  return STABLE_BRANCH_PATTERN.test(name);
}

/** Picks the branch a commit is attributed to when several stable branches carry it. */
export function preferBranch(current: string, candidate: string): string {
  return candidate > current ? candidate : current;
}

export class BranchResolver {
  private readonly lookback: number;
  private readonly logger: ReconcileLogger;

  constructor(
    private readonly client: SourceControlClient,
    options: BranchResolverOptions = {}
  ) {
    this.lookback = options.lookback ?? STABLE_COMMIT_LOOKBACK;
    this.logger = options.logger ?? NOOP_LOGGER;
  }

  async resolve(owner: string, repoName: string): Promise<BranchCommitWindow> {
    const window = new Map<string, string>();
    const branches = await this.client.listBranches(owner, repoName);

    for (const branch of branches) {
      if (!isStableBranch(branch.name)) {
        continue;
      }
      this.logger.debug(`[branches] found stable branch ${branch.name} in ${owner}/${repoName}`);

      let seen = 0;
      for await (const commit of this.client.listCommits(owner, repoName, branch.name)) {
        const existing = window.get(commit.sha);
        window.set(commit.sha, existing === undefined ? branch.name : preferBranch(existing, branch.name));
        seen += 1;
        if (seen >= this.lookback) {
          break;
        }
      }
    }

    return window;
  }
}
