import type { RevisionRecord } from "../revisions/revision.types";

export interface PackageEntry {
  /** Highest revision already reconciled; 0 when never scanned. */
  readonly lastRevision: number;
  readonly revisions: ReadonlyMap<number, RevisionRecord>;
}

/** Tracked packages keyed by registry name. */
export type RevisionStateDocument = Map<string, PackageEntry>;

export interface RevisionStateStore {
  load(): Promise<RevisionStateDocument>;
  save(document: RevisionStateDocument): Promise<void>;
}
