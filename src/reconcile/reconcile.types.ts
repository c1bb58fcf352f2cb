import type { BranchResolver } from "../branches/branch.resolver";
import type { ReconcileLogger } from "../core/logger";
import type { RevisionScanner } from "../revisions/revision.scanner";
import type { PackageEntry } from "../state/revision_state.types";

export interface RepositoryRef {
  readonly owner: string;
  readonly repoName: string;
}

export interface ReconcileDeps {
  readonly scanner: Pick<RevisionScanner, "scan">;
  readonly resolver: Pick<BranchResolver, "resolve">;
  /** Stores the entry in the document and writes the whole document out. */
  readonly checkpoint: (packageName: string, entry: PackageEntry) => Promise<void>;
  readonly logger: ReconcileLogger;
}

export interface ReconcileSummary {
  readonly packageName: string;
  readonly scannedCount: number;
  readonly releaseCount: number;
  readonly lastRevision: number;
  readonly repository: RepositoryRef | null;
}
