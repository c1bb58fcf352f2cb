export interface BranchDescriptor {
  readonly name: string;
}

export interface CommitDescriptor {
  readonly sha: string;
}

export interface SourceControlClient {
  listBranches(owner: string, repoName: string): Promise<readonly BranchDescriptor[]>;
  /** Newest first; callers stop iterating once they have enough. */
  listCommits(owner: string, repoName: string, branch: string): AsyncIterable<CommitDescriptor>;
}

/** commit sha -> stable branch name, rebuilt on every run. */
export type BranchCommitWindow = ReadonlyMap<string, string>;
