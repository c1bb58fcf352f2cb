import path from "node:path";
import type { ReconcileLogger } from "../../src/core/logger";
import { DEFAULT_STATE_FILENAME } from "../../src/state/revision_state.store";
import type { GitHubCredentials } from "../github/github.client";
import { ConfigurationError } from "./config.errors";

export interface ReconcileConfig {
  readonly statePath: string;
  readonly verbose: boolean;
  readonly timeoutMs: number;
  readonly github?: GitHubCredentials;
}

export interface ReconcileConfigArgs {
  readonly quiet?: boolean;
  readonly timeoutMs?: number;
}

export interface ReconcileConfigEnv {
  readonly RECONCILE_TIMEOUT_MS?: string;
  readonly GITHUB_USER?: string;
  readonly GITHUB_TOKEN?: string;
}

const DEFAULT_TIMEOUT_MS = 30000;

function toTrimmedString(value: unknown): string | undefined {
  if (typeof value !== "string") {
    return undefined;
  }
  const trimmed = value.trim();
  return trimmed === "" ? undefined : trimmed;
}

function parseIntegerOption(value: unknown, field: string): number | undefined {
  if (typeof value === "undefined") {
    return undefined;
  }
  const num = typeof value === "number" ? value : Number(String(value));
  if (!Number.isInteger(num)) {
    throw new ConfigurationError(`CONFIGURATION_ERROR ${field} must be an integer`);
  }
  return num;
}

function resolveCredentials(env: ReconcileConfigEnv, logger?: ReconcileLogger): GitHubCredentials | undefined {
  const user = toTrimmedString(env.GITHUB_USER);
  const token = toTrimmedString(env.GITHUB_TOKEN);
  if (user && token) {
    return { user, token };
  }
  if (user || token) {
    logger?.warn("[config] GITHUB_USER and GITHUB_TOKEN must both be set; using anonymous GitHub access");
  }
  return undefined;
}

export function resolveReconcileConfig(
  args: ReconcileConfigArgs,
  env: ReconcileConfigEnv,
  cwd: string = process.cwd(),
  logger?: ReconcileLogger
): ReconcileConfig {
  const timeoutMsRaw =
    typeof args.timeoutMs === "number"
      ? parseIntegerOption(args.timeoutMs, "timeoutMs")
      : parseIntegerOption(toTrimmedString(env.RECONCILE_TIMEOUT_MS), "timeoutMs");
  const timeoutMs = timeoutMsRaw ?? DEFAULT_TIMEOUT_MS;
  if (timeoutMs <= 0) {
    throw new ConfigurationError("CONFIGURATION_ERROR timeoutMs must be > 0");
  }

  return Object.freeze({
    statePath: path.resolve(cwd, DEFAULT_STATE_FILENAME),
    verbose: args.quiet !== true,
    timeoutMs,
    github: resolveCredentials(env, logger),
  });
}
