import { Annotation, END, START, StateGraph } from "@langchain/langgraph";
import type { BranchCommitWindow } from "../branches/branch.types";
import type { ScannedRevisions } from "../revisions/revision.types";
import type { PackageEntry } from "../state/revision_state.types";
import { countReleases, highestRevision, joinReleases, mergeRevisions } from "./release.join";
import type { ReconcileDeps, ReconcileSummary, RepositoryRef } from "./reconcile.types";

export const ReconcileStateAnnotation = Annotation.Root({
  packageName: Annotation<string>,
  entry: Annotation<PackageEntry>,
  scanned: Annotation<ScannedRevisions>,
  repository: Annotation<RepositoryRef | null>,
  window: Annotation<BranchCommitWindow | null>,
  joined: Annotation<ScannedRevisions>,
});

export type ReconcileState = typeof ReconcileStateAnnotation.State;
type ReconcileUpdate = typeof ReconcileStateAnnotation.Update;

export function locateRepository(scanned: ScannedRevisions): RepositoryRef | null {
  for (const record of scanned.values()) {
    if (record.owner && record.repoName) {
      return { owner: record.owner, repoName: record.repoName };
    }
  }
  return null;
}

function routeAfterScan(state: ReconcileState): "locate_repository" | typeof END {
  return state.scanned.size === 0 ? END : "locate_repository";
}

function routeAfterLocate(state: ReconcileState): "resolve_branches" | "join" {
  return state.repository ? "resolve_branches" : "join";
}

/**
 * Per-package pipeline. Every node after `scan` assumes a non-empty batch; the
 * repository identity is taken from one revision and reused for the batch.
 */
export function buildReconcileGraph(deps: ReconcileDeps) {
  const { logger } = deps;

  return new StateGraph(ReconcileStateAnnotation)
    .addNode("scan", async (state: ReconcileState): Promise<ReconcileUpdate> => {
      const scanned = await deps.scanner.scan(state.packageName, state.entry.lastRevision);
      if (scanned.size === 0) {
        logger.info(`[reconcile] ${state.packageName}: no new revisions after ${String(state.entry.lastRevision)}`);
      }
      return { scanned };
    })
    .addNode("locate_repository", async (state: ReconcileState): Promise<ReconcileUpdate> => {
      const repository = locateRepository(state.scanned);
      if (repository) {
        logger.debug(
          `[reconcile] ${state.packageName}: using github repository ${repository.owner}/${repository.repoName}`
        );
      } else {
        logger.warn(`[reconcile] ${state.packageName}: no revision names a github repository, releases left unset`);
      }
      return { repository };
    })
    .addNode("resolve_branches", async (state: ReconcileState): Promise<ReconcileUpdate> => {
      if (!state.repository) {
        return { window: null };
      }
      const window = await deps.resolver.resolve(state.repository.owner, state.repository.repoName);
      logger.debug(`[reconcile] ${state.packageName}: ${String(window.size)} stable commits in lookback window`);
      return { window };
    })
    .addNode("join", async (state: ReconcileState): Promise<ReconcileUpdate> => {
      return { joined: joinReleases(state.scanned, state.window ?? undefined) };
    })
    .addNode("persist", async (state: ReconcileState): Promise<ReconcileUpdate> => {
      for (const revision of state.joined.keys()) {
        logger.debug(`[reconcile] ${state.packageName}: updating details for revision ${String(revision)}`);
      }
      const entry = mergeRevisions(state.entry, state.joined);
      await deps.checkpoint(state.packageName, entry);
      return { entry };
    })
    .addNode("advance", async (state: ReconcileState): Promise<ReconcileUpdate> => {
      const highest = highestRevision(state.scanned) ?? state.entry.lastRevision;
      const entry: PackageEntry = { lastRevision: highest, revisions: state.entry.revisions };
      await deps.checkpoint(state.packageName, entry);
      logger.info(
        `[reconcile] ${state.packageName}: last_revision=${String(highest)} scanned=${String(state.scanned.size)} releases=${String(countReleases(state.joined))}`
      );
      return { entry };
    })
    .addEdge(START, "scan")
    .addConditionalEdges("scan", routeAfterScan, ["locate_repository", END])
    .addConditionalEdges("locate_repository", routeAfterLocate, ["resolve_branches", "join"])
    .addEdge("resolve_branches", "join")
    .addEdge("join", "persist")
    .addEdge("persist", "advance")
    .addEdge("advance", END)
    .compile();
}

export type ReconcileGraph = ReturnType<typeof buildReconcileGraph>;

export async function reconcilePackage(
  graph: ReconcileGraph,
  packageName: string,
  entry: PackageEntry
): Promise<ReconcileSummary> {
  const emptyBatch: ScannedRevisions = new Map();
  const finalState = await graph.invoke({
    packageName,
    entry,
    scanned: emptyBatch,
    repository: null,
    window: null,
    joined: emptyBatch,
  });

  return {
    packageName,
    scannedCount: finalState.scanned.size,
    releaseCount: countReleases(finalState.joined),
    lastRevision: finalState.entry.lastRevision,
    repository: finalState.repository,
  };
}
