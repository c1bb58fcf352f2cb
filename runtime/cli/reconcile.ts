import { pathToFileURL } from "node:url";
import { BranchResolver } from "../../src/branches/branch.resolver";
import type { ReconcileLogger } from "../../src/core/logger";
import { Reconciler } from "../../src/reconcile/reconciler";
import type { ReconcileSummary } from "../../src/reconcile/reconcile.types";
import { RevisionScanner } from "../../src/revisions/revision.scanner";
import { FileRevisionStateStore } from "../../src/state/revision_state.store";
import { ConfigurationError } from "../config/config.errors";
import { resolveReconcileConfig, type ReconcileConfigEnv } from "../config/reconcile.config";
import { GitHubClient } from "../github/github.client";
import type { FetchLike } from "../http/http.request";
import { ConsoleReconcileLogger } from "../logging/console.logger";
import { CharmstoreClient } from "../registry/charmstore.client";
import { RECONCILE_USAGE, parseReconcileArgs } from "./reconcile.args";

export interface ReconcileCliIo {
  readonly log: (message: string) => void;
  readonly error: (message: string) => void;
}

export interface ReconcileCliOptions {
  readonly env?: ReconcileConfigEnv;
  readonly cwd?: string;
  readonly io?: ReconcileCliIo;
  readonly fetchImpl?: FetchLike;
}

const CONSOLE_IO: ReconcileCliIo = {
  log: (message) => console.log(message),
  error: (message) => console.error(message),
};

export function formatSummary(summary: ReconcileSummary): string {
  const repository = summary.repository
    ? `${summary.repository.owner}/${summary.repository.repoName}`
    : "-";
  return `${summary.packageName} last_revision=${String(summary.lastRevision)} scanned=${String(summary.scannedCount)} releases=${String(summary.releaseCount)} repo=${repository}`;
}

export async function runReconcileCli(
  argv: readonly string[],
  options: ReconcileCliOptions = {}
): Promise<number> {
  const io = options.io ?? CONSOLE_IO;
  const args = parseReconcileArgs(argv);
  if (args.help) {
    io.log(RECONCILE_USAGE);
    return 0;
  }

  const bootLogger = new ConsoleReconcileLogger({ verbose: false, out: io.log, err: io.error });
  const config = resolveReconcileConfig(
    { quiet: args.quiet, timeoutMs: args.timeoutMs },
    options.env ?? process.env,
    options.cwd ?? process.cwd(),
    bootLogger
  );
  const logger: ReconcileLogger = new ConsoleReconcileLogger({
    verbose: config.verbose,
    out: io.log,
    err: io.error,
  });

  const registry = new CharmstoreClient({ timeoutMs: config.timeoutMs, fetchImpl: options.fetchImpl });
  const github = new GitHubClient({
    credentials: config.github,
    timeoutMs: config.timeoutMs,
    fetchImpl: options.fetchImpl,
    logger,
  });
  if (github.login !== undefined) {
    logger.info(`[branches] authenticating to GitHub as ${github.login}`);
  } else {
    logger.info("[branches] no GitHub credentials, using anonymous access (lower rate limit)");
  }

  const reconciler = new Reconciler({
    scanner: new RevisionScanner(registry, { logger }),
    resolver: new BranchResolver(github, { logger }),
    store: new FileRevisionStateStore(config.statePath, { logger }),
    logger,
  });

  logger.info(`[reconcile] state file ${config.statePath}`);
  const summaries = await reconciler.run();
  for (const summary of summaries) {
    io.log(formatSummary(summary));
  }
  return 0;
}

async function main(): Promise<void> {
  try {
    process.exitCode = await runReconcileCli(process.argv.slice(2));
  } catch (error) {
    if (error instanceof ConfigurationError) {
      console.error(`reconcile configuration error: ${error.message}`);
      process.exitCode = 1;
      return;
    }

    const message = error instanceof Error ? error.stack ?? error.message : String(error);
    console.error(`reconcile failed: ${message}`);
    process.exitCode = 1;
  }
}

function isEntrypoint(): boolean {
  const scriptPath = process.argv[1];
  if (typeof scriptPath !== "string" || scriptPath.trim() === "") {
    return false;
  }
  return import.meta.url === pathToFileURL(scriptPath).href;
}

if (isEntrypoint()) {
  await main();
}
