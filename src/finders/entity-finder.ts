/**
 * Keyword lookup of the tracking issue and pull request
 */

import type { GitHubIssue, GitHubPullRequest, ItemState, RepositoryApi } from '../github/types';

export const SEARCH_STATES: readonly ItemState[] = ['open', 'closed'];
export const SEARCH_PAGE_SIZE = 30;

/**
 * True when every keyword appears in the title, ignoring case
 */
export function titleMatchesKeywords(title: string, keywords: readonly string[]): boolean {
  const normalized = title.toLowerCase();
  return keywords.every((keyword) => normalized.includes(keyword.toLowerCase()));
}

export async function findIssueByKeywords(
  api: RepositoryApi,
  titleKeywords: readonly string[]
): Promise<GitHubIssue | null> {
  for (const state of SEARCH_STATES) {
    const result = await api.listIssues(state, SEARCH_PAGE_SIZE);
    if (!result.success) {
      continue;
    }

    const match = result.data.find(
      (issue) => !issue.isPullRequest && titleMatchesKeywords(issue.title, titleKeywords)
    );
    if (match) {
      return match;
    }
  }
  return null;
}

export async function findPullRequestByKeywords(
  api: RepositoryApi,
  titleKeywords: readonly string[]
): Promise<GitHubPullRequest | null> {
  for (const state of SEARCH_STATES) {
    const result = await api.listPullRequests(state, SEARCH_PAGE_SIZE);
    if (!result.success) {
      continue;
    }

    const match = result.data.find((pr) => titleMatchesKeywords(pr.title, titleKeywords));
    if (match) {
      return match;
    }
  }
  return null;
}
