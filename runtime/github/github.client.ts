import { Octokit } from "@octokit/rest";
import { SourceControlError, asMessage } from "../../src/core/errors";
import { NOOP_LOGGER, type ReconcileLogger } from "../../src/core/logger";
import type {
  BranchDescriptor,
  CommitDescriptor,
  SourceControlClient,
} from "../../src/branches/branch.types";
import { isAbortError, type FetchLike } from "../http/http.request";

export const GITHUB_API = "https://api.github.com";
const USER_AGENT = "charm-release-map";
const BRANCH_PAGE_SIZE = 100;
const DEFAULT_COMMIT_PAGE_SIZE = 20;

export interface GitHubCredentials {
  readonly user: string;
  readonly token: string;
}

export interface GitHubClientOptions {
  readonly credentials?: GitHubCredentials;
  readonly timeoutMs: number;
  readonly baseUrl?: string;
  readonly commitPageSize?: number;
  readonly fetchImpl?: FetchLike;
  readonly logger?: ReconcileLogger;
}

function isTimeout(error: unknown): boolean {
  if (!(error instanceof Error)) {
    return false;
  }
  return error.name === "TimeoutError" || isAbortError(error) || isTimeout(error.cause);
}

// Octokit request errors carry the response only when the server answered.
function responseStatus(error: unknown): number | undefined {
  if (
    error instanceof Error &&
    "status" in error &&
    typeof error.status === "number" &&
    "response" in error &&
    error.response !== undefined
  ) {
    return error.status;
  }
  return undefined;
}

function requireString(value: unknown, what: string, field: string): string {
  if (typeof value !== "string" || value === "") {
    throw new SourceControlError(`GITHUB_BAD_RESPONSE ${what}: item without ${field}`);
  }
  return value;
}

export class GitHubClient implements SourceControlClient {
  readonly login: string | undefined;
  private readonly octokit: Octokit;
  private readonly timeoutMs: number;
  private readonly commitPageSize: number;

  constructor(options: GitHubClientOptions) {
    const logger = options.logger ?? NOOP_LOGGER;
    this.login = options.credentials?.user;
    this.timeoutMs = options.timeoutMs;
    this.commitPageSize = options.commitPageSize ?? DEFAULT_COMMIT_PAGE_SIZE;
    this.octokit = new Octokit({
      auth: options.credentials?.token,
      baseUrl: (options.baseUrl ?? GITHUB_API).replace(/\/+$/, ""),
      userAgent: USER_AGENT,
      request: options.fetchImpl ? { fetch: options.fetchImpl } : undefined,
      log: {
        debug: (message: string) => logger.debug(`[github] ${message}`),
        info: (message: string) => logger.debug(`[github] ${message}`),
        warn: (message: string) => logger.warn(`[github] ${message}`),
        error: (message: string) => logger.debug(`[github] ${message}`),
      },
    });

    // Every page gets its own deadline; pagination does not forward request options.
    const timeoutMs = this.timeoutMs;
    this.octokit.hook.before("request", (requestOptions) => {
      requestOptions.request = { ...requestOptions.request, signal: AbortSignal.timeout(timeoutMs) };
    });
  }

  get authenticated(): boolean {
    return this.login !== undefined;
  }

  async listBranches(owner: string, repoName: string): Promise<readonly BranchDescriptor[]> {
    const what = `branches of ${owner}/${repoName}`;
    try {
      const branches = await this.octokit.paginate(this.octokit.rest.repos.listBranches, {
        owner,
        repo: repoName,
        per_page: BRANCH_PAGE_SIZE,
      });
      return branches.map((branch) => ({ name: requireString(branch.name, what, "name") }));
    } catch (error) {
      throw this.failure(error, what);
    }
  }

  async *listCommits(owner: string, repoName: string, branch: string): AsyncIterable<CommitDescriptor> {
    const what = `commits of ${owner}/${repoName}@${branch}`;
    const pages = this.octokit.paginate.iterator(this.octokit.rest.repos.listCommits, {
      owner,
      repo: repoName,
      sha: branch,
      per_page: this.commitPageSize,
    });

    try {
      for await (const page of pages) {
        if (!Array.isArray(page.data)) {
          throw new SourceControlError(`GITHUB_BAD_RESPONSE ${what}: expected an array`);
        }
        for (const commit of page.data) {
          yield { sha: requireString(commit.sha, what, "sha") };
        }
      }
    } catch (error) {
      throw this.failure(error, what);
    }
  }

  private failure(error: unknown, what: string): SourceControlError {
    if (error instanceof SourceControlError) {
      return error;
    }
    if (isTimeout(error)) {
      return new SourceControlError(`GITHUB_TIMEOUT ${what} after ${String(this.timeoutMs)}ms`, { cause: error });
    }
    const status = responseStatus(error);
    if (status !== undefined) {
      return new SourceControlError(`GITHUB_HTTP_${String(status)} ${what}`, { status, cause: error });
    }
    return new SourceControlError(`GITHUB_REQUEST_FAILED ${what}: ${asMessage(error)}`, { cause: error });
  }
}
