import {
  RegistryAuthError,
  RegistryError,
  RegistryNotFoundError,
  RegistryTransientError,
  asMessage,
} from "../../src/core/errors";
import type { RegistryClient } from "../../src/revisions/revision.types";
import { getText, isAbortError, isNetworkError, type FetchLike, type TextResponse } from "../http/http.request";

export const CHARMSTORE_API = "https://api.jujucharms.com/charmstore/v5";

export interface CharmstoreClientOptions {
  readonly baseUrl?: string;
  readonly timeoutMs: number;
  readonly fetchImpl?: FetchLike;
}

/** `cs:~user/name` -> `~user/name`, each segment URL-encoded. */
export function toEntityPath(packageName: string): string {
  const trimmed = packageName.trim().replace(/^cs:/, "");
  if (trimmed === "") {
    throw new RegistryError("REGISTRY_BAD_REQUEST package name must be non-empty");
  }
  return trimmed
    .split("/")
    .map((segment) => encodeURIComponent(segment))
    .join("/");
}

export function errorForStatus(status: number, what: string): Error {
  if (status === 404) {
    return new RegistryNotFoundError(`REGISTRY_NOT_FOUND ${what}`);
  }
  if (status === 401 || status === 403 || status === 407) {
    return new RegistryAuthError(`REGISTRY_AUTH_REQUIRED ${what} (http ${String(status)})`);
  }
  if (status === 429 || status >= 500) {
    return new RegistryTransientError(`REGISTRY_TRANSIENT ${what} (http ${String(status)})`);
  }
  return new RegistryError(`REGISTRY_HTTP_${String(status)} ${what}`);
}

function parseJson(body: string, what: string): unknown {
  try {
    return JSON.parse(body) as unknown;
  } catch (error) {
    throw new RegistryError(`REGISTRY_BAD_RESPONSE ${what}: invalid JSON`, { cause: error });
  }
}

export class CharmstoreClient implements RegistryClient {
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: FetchLike;

  constructor(options: CharmstoreClientOptions) {
    this.baseUrl = (options.baseUrl ?? CHARMSTORE_API).replace(/\/+$/, "");
    this.timeoutMs = options.timeoutMs;
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  async getEntityId(packageName: string): Promise<string> {
    const what = `entity ${packageName}`;
    const response = await this.get(`${toEntityPath(packageName)}/meta/any`, what);
    const payload = parseJson(response.body, what);

    const id = typeof payload === "object" && payload !== null ? (payload as { Id?: unknown }).Id : undefined;
    if (typeof id !== "string" || id.trim() === "") {
      throw new RegistryError(`REGISTRY_BAD_RESPONSE ${what}: missing Id`);
    }
    return id;
  }

  async listFiles(packageName: string, revision: number): Promise<readonly string[]> {
    const what = `manifest ${packageName}-${String(revision)}`;
    const response = await this.get(`${toEntityPath(packageName)}-${String(revision)}/meta/manifest`, what);
    const payload = parseJson(response.body, what);

    if (!Array.isArray(payload)) {
      throw new RegistryError(`REGISTRY_BAD_RESPONSE ${what}: expected a list of files`);
    }
    const names: string[] = [];
    for (const item of payload) {
      const name = typeof item === "object" && item !== null ? (item as { Name?: unknown }).Name : undefined;
      if (typeof name === "string") {
        names.push(name);
      }
    }
    return names;
  }

  async readFile(packageName: string, revision: number, filename: string): Promise<string> {
    const what = `file ${filename} of ${packageName}-${String(revision)}`;
    const response = await this.get(
      `${toEntityPath(packageName)}-${String(revision)}/archive/${encodeURIComponent(filename)}`,
      what
    );
    return response.body;
  }

  private async get(pathname: string, what: string): Promise<TextResponse> {
    let response: TextResponse;
    try {
      response = await getText(this.fetchImpl, {
        url: `${this.baseUrl}/${pathname}`,
        timeoutMs: this.timeoutMs,
      });
    } catch (error) {
      if (isAbortError(error)) {
        throw new RegistryTransientError(`REGISTRY_TRANSIENT ${what}: timed out after ${String(this.timeoutMs)}ms`, {
          cause: error,
        });
      }
      if (isNetworkError(error)) {
        throw new RegistryTransientError(`REGISTRY_TRANSIENT ${what}: ${asMessage(error)}`, { cause: error });
      }
      throw new RegistryError(`REGISTRY_REQUEST_FAILED ${what}: ${asMessage(error)}`, { cause: error });
    }

    if (!response.ok) {
      throw errorForStatus(response.status, what);
    }
    return response;
  }
}
