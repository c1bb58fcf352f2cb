import { ConfigurationError } from "../config/config.errors";

export interface ReconcileArgs {
  quiet: boolean;
  timeoutMs?: number;
  help: boolean;
}

export const RECONCILE_USAGE =
  "Usage: reconcile [--quiet] [--timeoutMs <ms>]";

export function parseReconcileArgs(argv: readonly string[]): ReconcileArgs {
  let quiet = false;
  let timeoutMs: number | undefined;
  let help = false;

  for (let i = 0; i < argv.length; i += 1) {
    const token = argv[i];
    if (token === "--") {
      continue;
    }
    if (token === "--quiet" || token === "-q") {
      quiet = true;
      continue;
    }
    if (token === "--help" || token === "-h") {
      help = true;
      continue;
    }
    if (token === "--timeoutMs") {
      const next = argv[i + 1];
      const parsed = typeof next === "string" && next.trim() !== "" ? Number(next) : Number.NaN;
      if (Number.isFinite(parsed)) {
        timeoutMs = parsed;
        i += 1;
        continue;
      }
      throw new ConfigurationError(`--timeoutMs requires a number. ${RECONCILE_USAGE}`);
    }
    throw new ConfigurationError(`Unknown argument "${String(token)}". ${RECONCILE_USAGE}`);
  }

  return { quiet, timeoutMs, help };
}
