import {
  RegistryAuthError,
  RegistryError,
  RegistryNotFoundError,
  RegistryTransientError,
  asMessage,
} from "../core/errors";
import { NOOP_LOGGER, type ReconcileLogger } from "../core/logger";
import { PROVENANCE_FILENAME, parseProvenance } from "./provenance.parser";
import {
  CONTENT_RETRY_POLICY,
  LISTING_RETRY_POLICY,
  attemptWithRetry,
  sleep,
  type RetryDecision,
  type RetryPolicy,
  type Sleep,
} from "./retry.policy";
import type { RegistryClient, RevisionRecord, ScannedRevisions } from "./revision.types";

const ENTITY_REVISION_PATTERN = /-(\d+)$/;

export interface RevisionScannerOptions {
  readonly listingPolicy?: RetryPolicy;
  readonly contentPolicy?: RetryPolicy;
  readonly sleep?: Sleep;
  readonly logger?: ReconcileLogger;
}

function classifyListingError(error: unknown): RetryDecision {
  if (error instanceof RegistryNotFoundError) {
    return { action: "skip", reason: "not_found" };
  }
  if (error instanceof RegistryAuthError) {
    return { action: "skip", reason: "auth_required" };
  }
  if (error instanceof RegistryTransientError) {
    return { action: "retry" };
  }
  return { action: "raise" };
}

function classifyContentError(error: unknown): RetryDecision {
  if (error instanceof RegistryTransientError) {
    return { action: "retry" };
  }
  return { action: "raise" };
}

export function parseEntityRevision(entityId: string): number {
  const matched = ENTITY_REVISION_PATTERN.exec(entityId.trim());
  if (!matched?.[1]) {
    throw new RegistryError(
      `REGISTRY_BAD_RESPONSE entity id '${entityId}' does not end in a revision number`
    );
  }
  return Number(matched[1]);
}

export class RevisionScanner {
  private readonly listingPolicy: RetryPolicy;
  private readonly contentPolicy: RetryPolicy;
  private readonly sleep: Sleep;
  private readonly logger: ReconcileLogger;

  constructor(
    private readonly registry: RegistryClient,
    options: RevisionScannerOptions = {}
  ) {
    this.listingPolicy = options.listingPolicy ?? LISTING_RETRY_POLICY;
    this.contentPolicy = options.contentPolicy ?? CONTENT_RETRY_POLICY;
    this.sleep = options.sleep ?? sleep;
    this.logger = options.logger ?? NOOP_LOGGER;
  }

  async latestRevision(packageName: string): Promise<number> {
    this.logger.debug(`[scan] searching for entity ${packageName}`);
    const entityId = await this.registry.getEntityId(packageName);
    const revision = parseEntityRevision(entityId);
    this.logger.debug(`[scan] highest revision for ${packageName} is ${String(revision)}`);
    return revision;
  }

  async scan(packageName: string, lastCheckedRevision: number): Promise<ScannedRevisions> {
    const highest = await this.latestRevision(packageName);
    // A package whose only release is revision 0 would otherwise never be scanned.
    const floor = highest === 0 ? -1 : lastCheckedRevision;

    const out = new Map<number, RevisionRecord>();
    for (let revision = highest; revision > floor; revision -= 1) {
      const record = await this.scanRevision(packageName, revision);
      if (record) {
        out.set(revision, record);
      }
    }
    return out;
  }

  private async scanRevision(packageName: string, revision: number): Promise<RevisionRecord | null> {
    const location = `${packageName}-${String(revision)}`;
    this.logger.debug(`[scan] fetching file listing for ${location}`);

    const listing = await attemptWithRetry(
      () => this.registry.listFiles(packageName, revision),
      this.listingPolicy,
      classifyListingError,
      this.sleep
    );

    if (listing.status === "skipped") {
      if (listing.reason === "auth_required") {
        this.logger.warn(`[scan] login required for ${location}, skipping`);
      } else {
        this.logger.debug(`[scan] no registry files for ${location}, skipping`);
      }
      return null;
    }
    if (listing.status === "exhausted") {
      this.logger.warn(
        `[scan] file listing for ${location} failed ${String(listing.attempts)} times, skipping: ${asMessage(listing.lastError)}`
      );
      return null;
    }

    if (!listing.value.includes(PROVENANCE_FILENAME)) {
      this.logger.debug(`[scan] ${location} has no ${PROVENANCE_FILENAME} file`);
      return null;
    }

    const content = await attemptWithRetry(
      (attempt) => {
        if (attempt > 1) {
          this.logger.debug(`[scan] retrying ${PROVENANCE_FILENAME} for ${location} (attempt ${String(attempt)})`);
        }
        return this.registry.readFile(packageName, revision, PROVENANCE_FILENAME);
      },
      this.contentPolicy,
      classifyContentError,
      this.sleep
    );

    if (content.status !== "ok") {
      this.logger.warn(
        `[scan] ${PROVENANCE_FILENAME} for ${location} unavailable after ${String(content.attempts)} attempts, skipping`
      );
      return null;
    }

    const provenance = parseProvenance(content.value);
    if (!provenance) {
      this.logger.debug(`[scan] could not locate a commit sha for ${location}, skipping`);
      return null;
    }

    if (!provenance.owner || !provenance.repoName) {
      this.logger.debug(`[scan] ${location} has no GitHub remote`);
      return { sha: provenance.sha };
    }
    return {
      sha: provenance.sha,
      owner: provenance.owner,
      repoName: provenance.repoName,
    };
  }
}
