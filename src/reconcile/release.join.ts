import type { BranchCommitWindow } from "../branches/branch.types";
import type { RevisionRecord, ScannedRevisions } from "../revisions/revision.types";
import type { PackageEntry } from "../state/revision_state.types";

export function joinReleases(
  scanned: ScannedRevisions,
  window: BranchCommitWindow | undefined
): ScannedRevisions {
  const out = new Map<number, RevisionRecord>();
  for (const [revision, record] of scanned) {
    const release = window && record.sha !== undefined ? window.get(record.sha) : undefined;
    out.set(revision, release === undefined ? record : { ...record, release });
  }
  return out;
}

/** Overlays scanned fields onto the stored records, creating entries that are new. */
export function mergeRevisions(entry: PackageEntry, scanned: ScannedRevisions): PackageEntry {
  const revisions = new Map(entry.revisions);
  for (const [revision, record] of scanned) {
    const existing = revisions.get(revision);
    revisions.set(revision, existing ? { ...existing, ...record } : record);
  }
  return { lastRevision: entry.lastRevision, revisions };
}

export function highestRevision(scanned: ScannedRevisions): number | undefined {
  let highest: number | undefined;
  for (const revision of scanned.keys()) {
    if (highest === undefined || revision > highest) {
      highest = revision;
    }
  }
  return highest;
}

export function countReleases(scanned: ScannedRevisions): number {
  let count = 0;
  for (const record of scanned.values()) {
    if (record.release !== undefined) {
      count += 1;
    }
  }
  return count;
}
