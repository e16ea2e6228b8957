import { InvalidArgumentError } from '../errors.js';

/**
 * Repository and issue reference formats accepted on the command line.
 */
export interface RepoRef {
  host?: string;
  owner: string;
  repo: string;
}

const REPO_RE = /^(?:([^/]+)\/)?([^/]+)\/([^/]+)$/;
const ISSUE_REF_RE = /^(#?\d+|https?:\/\/.+?\/.+?\/.+?\/issues\/\d+)$/;

/**
 * Parse `[HOST/]OWNER/REPO`.
 */
export function parseRepoRef(value: string): RepoRef {
  const match = value.match(REPO_RE);
  const owner = match?.[2];
  const repo = match?.[3];
  if (!match || !owner || !repo) {
    throw new InvalidArgumentError(`Expected the '[HOST/]OWNER/REPO' format, got '${value}'`);
  }
  const host = match[1];
  return host ? { host, owner, repo } : { owner, repo };
}

/**
 * Format a repo the way `gh --repo` takes it.
 */
export function formatRepoRef(ref: RepoRef): string {
  return [ref.host, ref.owner, ref.repo].filter(Boolean).join('/');
}

/**
 * True for an issue number (`12`, `#12`) or an issue URL.
 */
export function isIssueRef(value: string): boolean {
  return ISSUE_REF_RE.test(value);
}

export function assertIssueRef(value: string): void {
  if (!isIssueRef(value)) throw new InvalidArgumentError(`Invalid issue format '${value}'`);
}

/**
 * Issue argument as passed to `gh` (`#12` becomes `12`).
 */
export function ghIssueArg(value: string): string {
  return value.startsWith('#') ? value.slice(1) : value;
}
