import fs from "node:fs/promises";
import path from "node:path";
import { randomUUID } from "node:crypto";
import { NOOP_LOGGER, type ReconcileLogger } from "../core/logger";
import type { RevisionRecord } from "../revisions/revision.types";
import type { PackageEntry, RevisionStateDocument, RevisionStateStore } from "./revision_state.types";
import { parseYaml, stringifyYaml, type YamlNode, type YamlValue } from "./yaml.codec";

export const DEFAULT_STATE_FILENAME = "charm_revisions.yaml";

const LAST_REVISION_KEY = "last_revision";
const REVISION_KEY_PATTERN = /^\d+$/;

// Field names as they appear on disk.
const STORED_FIELDS = {
  sha: "sha",
  owner: "user",
  repoName: "repo",
  release: "release",
} as const satisfies Record<keyof RevisionRecord, string>;

export function emptyPackageEntry(): PackageEntry {
  return { lastRevision: 0, revisions: new Map() };
}

function isMapping(value: YamlValue | undefined): value is { [key: string]: YamlValue } {
  return typeof value === "object" && value !== null;
}

function validationError(filePath: string, message: string): Error {
  return new Error(`REVISION_STATE_VALIDATION_ERROR ${filePath}: ${message}`);
}

function readField(
  filePath: string,
  where: string,
  raw: { [key: string]: YamlValue },
  field: string
): string | undefined {
  const value = raw[field];
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value === "string") {
    return value;
  }
  // Unquoted all-digit shas come back as numbers.
  if (typeof value === "number") {
    return String(value);
  }
  throw validationError(filePath, `${where}.${field} must be a string`);
}

function readRevisionRecord(filePath: string, where: string, raw: YamlValue): RevisionRecord {
  if (raw === null) {
    return {};
  }
  if (!isMapping(raw)) {
    throw validationError(filePath, `${where} must be a mapping`);
  }

  const sha = readField(filePath, where, raw, STORED_FIELDS.sha);
  const owner = readField(filePath, where, raw, STORED_FIELDS.owner);
  const repoName = readField(filePath, where, raw, STORED_FIELDS.repoName);
  const release = readField(filePath, where, raw, STORED_FIELDS.release);

  return {
    ...(sha !== undefined ? { sha } : {}),
    ...(owner !== undefined ? { owner } : {}),
    ...(repoName !== undefined ? { repoName } : {}),
    ...(release !== undefined ? { release } : {}),
  };
}

export function normalizePackageEntry(
  filePath: string,
  name: string,
  raw: YamlValue,
  logger: ReconcileLogger = NOOP_LOGGER
): PackageEntry {
  // New entries are listed with no value; older files may carry a bare scalar.
  if (!isMapping(raw)) {
    if (raw !== null) {
      logger.debug(`[state] ${name} holds a legacy scalar, starting from revision 0`);
    }
    return emptyPackageEntry();
  }

  const lastRaw = raw[LAST_REVISION_KEY];
  let lastRevision = 0;
  if (lastRaw !== undefined && lastRaw !== null) {
    if (typeof lastRaw !== "number" || !Number.isInteger(lastRaw) || lastRaw < 0) {
      throw validationError(filePath, `${name}.${LAST_REVISION_KEY} must be a non-negative integer`);
    }
    lastRevision = lastRaw;
  }

  const revisions = new Map<number, RevisionRecord>();
  for (const [key, value] of Object.entries(raw)) {
    if (key === LAST_REVISION_KEY) {
      continue;
    }
    if (!REVISION_KEY_PATTERN.test(key)) {
      logger.warn(`[state] dropping unknown key ${name}.${key}`);
      continue;
    }
    revisions.set(Number(key), readRevisionRecord(filePath, `${name}.${key}`, value));
  }

  return { lastRevision, revisions };
}

export function parseRevisionState(
  raw: string,
  filePath: string,
  logger: ReconcileLogger = NOOP_LOGGER
): RevisionStateDocument {
  let parsed: YamlValue;
  try {
    parsed = parseYaml(raw, filePath);
  } catch (error) {
    throw new Error(
      `REVISION_STATE_PARSE_ERROR ${filePath}: ${error instanceof Error ? error.message : String(error)}`
    );
  }

  const document: RevisionStateDocument = new Map();
  if (parsed === null) {
    return document;
  }
  if (!isMapping(parsed)) {
    throw validationError(filePath, "top level must be a mapping of package names");
  }

  for (const [name, value] of Object.entries(parsed)) {
    document.set(name, normalizePackageEntry(filePath, name, value, logger));
  }
  return document;
}

function serializeRecord(record: RevisionRecord): YamlNode {
  const out: Record<string, string> = {};
  // Alphabetical by stored name: release, repo, sha, user.
  if (record.release !== undefined) {
    out[STORED_FIELDS.release] = record.release;
  }
  if (record.repoName !== undefined) {
    out[STORED_FIELDS.repoName] = record.repoName;
  }
  if (record.sha !== undefined) {
    out[STORED_FIELDS.sha] = record.sha;
  }
  if (record.owner !== undefined) {
    out[STORED_FIELDS.owner] = record.owner;
  }
  return out;
}

export function serializeRevisionState(document: RevisionStateDocument): string {
  const root = new Map<string, YamlNode>();
  const names = [...document.keys()].sort();

  for (const name of names) {
    const entry = document.get(name) ?? emptyPackageEntry();
    const node = new Map<string, YamlNode>([[LAST_REVISION_KEY, entry.lastRevision]]);
    const revisions = [...entry.revisions.keys()].sort((a, b) => a - b);
    for (const revision of revisions) {
      node.set(String(revision), serializeRecord(entry.revisions.get(revision) ?? {}));
    }
    root.set(name, node);
  }

  return stringifyYaml(root);
}

async function replaceFile(targetPath: string, data: string): Promise<void> {
  const dirPath = path.dirname(targetPath);
  const tempPath = path.join(dirPath, `.${path.basename(targetPath)}.${randomUUID()}.tmp`);

  await fs.mkdir(dirPath, { recursive: true });

  let handle: fs.FileHandle | undefined;
  try {
    handle = await fs.open(tempPath, "wx", 0o644);
    await handle.writeFile(data, "utf8");
    await handle.sync();
    await handle.close();
    handle = undefined;
    await fs.rename(tempPath, targetPath);
  } catch (error) {
    await handle?.close().catch(() => undefined);
    await fs.rm(tempPath, { force: true }).catch(() => undefined);
    throw error;
  }
}

export interface FileRevisionStateStoreOptions {
  readonly logger?: ReconcileLogger;
}

export class FileRevisionStateStore implements RevisionStateStore {
  private readonly logger: ReconcileLogger;

  constructor(
    readonly filePath: string,
    options: FileRevisionStateStoreOptions = {}
  ) {
    this.logger = options.logger ?? NOOP_LOGGER;
  }

  async load(): Promise<RevisionStateDocument> {
    let serialized: string;
    try {
      serialized = await fs.readFile(this.filePath, "utf8");
    } catch (error) {
      const nodeError = error as NodeJS.ErrnoException;
      if (nodeError?.code === "ENOENT") {
        this.logger.info(`[state] ${this.filePath} does not exist, nothing is tracked`);
        return new Map();
      }
      throw error;
    }

    return parseRevisionState(serialized, this.filePath, this.logger);
  }

  async save(document: RevisionStateDocument): Promise<void> {
    await replaceFile(this.filePath, serializeRevisionState(document));
  }
}
