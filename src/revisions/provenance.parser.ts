import type { ProvenanceRecord } from "./revision.types";

export const PROVENANCE_FILENAME = "repo-info";

const COMMIT_SHA_PATTERN = /commit-sha-1:[ \t]*([0-9a-f]+)/i;
const HTTPS_REMOTE_PATTERN =
  /^[ \t]*remote:[ \t]*https?:\/\/github\.com\/([A-Za-z0-9_.-]+)\/([A-Za-z0-9_.-]+?)(?:\.git)?\/?[ \t\r]*$/m;
const SSH_REMOTE_PATTERN =
  /^[ \t]*remote:[ \t]*git@github\.com:([A-Za-z0-9_.-]+)\/([A-Za-z0-9_.-]+?)(?:\.git)?[ \t\r]*$/m;

function matchRemote(text: string): { owner: string; repoName: string } | null {
  const matched = HTTPS_REMOTE_PATTERN.exec(text) ?? SSH_REMOTE_PATTERN.exec(text);
  if (!matched) {
    return null;
  }
  const owner = matched[1];
  const repoName = matched[2];
  if (!owner || !repoName) {
    return null;
  }
  return { owner, repoName };
}

/**
 * Extracts the source commit and GitHub remote from a `repo-info` file.
 * Returns null when there is no commit sha; a remote alone is not recorded.
 */
export function parseProvenance(text: string): ProvenanceRecord | null {
  const shaMatch = COMMIT_SHA_PATTERN.exec(text);
  const sha = shaMatch?.[1];
  if (!sha) {
    return null;
  }

  const remote = matchRemote(text);
  if (!remote) {
    return { sha: sha.toLowerCase() };
  }
  return { sha: sha.toLowerCase(), owner: remote.owner, repoName: remote.repoName };
}
