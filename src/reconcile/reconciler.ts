import { NOOP_LOGGER, type ReconcileLogger } from "../core/logger";
import type { BranchResolver } from "../branches/branch.resolver";
import type { RevisionScanner } from "../revisions/revision.scanner";
import { emptyPackageEntry } from "../state/revision_state.store";
import type { PackageEntry, RevisionStateStore } from "../state/revision_state.types";
import { buildReconcileGraph, reconcilePackage } from "./reconcile.graph";
import type { ReconcileSummary } from "./reconcile.types";

export interface ReconcilerDeps {
  readonly scanner: Pick<RevisionScanner, "scan">;
  readonly resolver: Pick<BranchResolver, "resolve">;
  readonly store: RevisionStateStore;
  readonly logger?: ReconcileLogger;
}

export class Reconciler {
  private readonly logger: ReconcileLogger;

  constructor(private readonly deps: ReconcilerDeps) {
    this.logger = deps.logger ?? NOOP_LOGGER;
  }

  /** Reconciles every tracked package in name order, saving the store after each step that changes it. */
  async run(): Promise<ReconcileSummary[]> {
    const document = await this.deps.store.load();
    const names = [...document.keys()].sort();
    this.logger.info(`[reconcile] ${String(names.length)} tracked packages`);

    const graph = buildReconcileGraph({
      scanner: this.deps.scanner,
      resolver: this.deps.resolver,
      logger: this.logger,
      checkpoint: async (packageName: string, entry: PackageEntry) => {
        document.set(packageName, entry);
        await this.deps.store.save(document);
      },
    });

    const summaries: ReconcileSummary[] = [];
    for (const name of names) {
      const entry = document.get(name) ?? emptyPackageEntry();
      summaries.push(await reconcilePackage(graph, name, entry));
    }
    return summaries;
  }
}
