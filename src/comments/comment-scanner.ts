/**
 * Finds the issue comment that reports the finished workflow.
 */

import type { CommentRequirements } from '../config/audit-config';
import { formatPullRequestReference } from '../config/templates';
import type { GitHubComment, RepositoryApi } from '../github/types';

function containsAll(haystack: string, needles: readonly string[]): boolean {
  return needles.every((needle) => haystack.includes(needle.toLowerCase()));
}

/**
 * A comment complies when its body (case-insensitive) contains the PR
 * reference, every keyword and every content flag.
 */
export function isCompliantComment(
  body: string,
  prNumber: number,
  requirements: CommentRequirements
): boolean {
  const normalized = body.toLowerCase();
  const reference = formatPullRequestReference(requirements.prReferenceFlag, prNumber).toLowerCase();

  if (!normalized.includes(reference)) {
    return false;
  }
  if (!containsAll(normalized, requirements.keywords)) {
    return false;
  }
  return containsAll(normalized, requirements.contentFlags);
}

/**
 * First compliant comment in listing order, or null
 */
export async function findCompliantComment(
  api: RepositoryApi,
  issueNumber: number,
  prNumber: number,
  requirements: CommentRequirements
): Promise<GitHubComment | null> {
  const comments = await api.listIssueComments(issueNumber);
  return comments.find((comment) => isCompliantComment(comment.body, prNumber, requirements)) ?? null;
}

export async function hasCompliantComment(
  api: RepositoryApi,
  issueNumber: number,
  prNumber: number,
  requirements: CommentRequirements
): Promise<boolean> {
  return (await findCompliantComment(api, issueNumber, prNumber, requirements)) !== null;
}
