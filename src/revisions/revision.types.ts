export interface RevisionRecord {
  readonly sha?: string;
  readonly owner?: string;
  readonly repoName?: string;
  readonly release?: string;
}

/** Revisions in scan order (highest first). */
export type ScannedRevisions = ReadonlyMap<number, RevisionRecord>;

export interface ProvenanceRecord {
  readonly sha: string;
  readonly owner?: string;
  readonly repoName?: string;
}

export interface RegistryClient {
  /** Self id of the latest published revision, e.g. `cs:~user/name-12`. */
  getEntityId(packageName: string): Promise<string>;
  listFiles(packageName: string, revision: number): Promise<readonly string[]>;
  readFile(packageName: string, revision: number, filename: string): Promise<string>;
}
