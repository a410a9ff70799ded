/**
 * Tests for keyword-based issue / pull request lookup
 */

import type { ApiResult, GitHubIssue, GitHubPullRequest, ItemState, RepositoryApi } from '../github/types';
import { findIssueByKeywords, findPullRequestByKeywords, titleMatchesKeywords } from './entity-finder';

function issue(number: number, title: string, isPullRequest = false): GitHubIssue {
  return { number, title, body: '', labels: [], isPullRequest };
}

function pr(number: number, title: string): GitHubPullRequest {
  return { number, title, body: '', labels: [] };
}

function createApi(listings: {
  issues?: Partial<Record<ItemState, ApiResult<GitHubIssue[]>>>;
  pulls?: Partial<Record<ItemState, ApiResult<GitHubPullRequest[]>>>;
}) {
  const empty = { success: true as const, data: [] };
  const api = {
    owner: 'test-org',
    repo: 'test-repo',
    branchExists: jest.fn(async () => true),
    getFileContent: jest.fn(async () => null),
    listIssues: jest.fn(async (state: ItemState) => listings.issues?.[state] ?? empty),
    listPullRequests: jest.fn(async (state: ItemState) => listings.pulls?.[state] ?? empty),
    listIssueComments: jest.fn(async () => []),
  };
  const repositoryApi: RepositoryApi = api;
  return { api, repositoryApi };
}

const KEYWORDS = ['Label', 'standard', 'documentation'];

describe('titleMatchesKeywords', () => {
  it('requires every keyword, ignoring case', () => {
    expect(titleMatchesKeywords('LABEL Standard Documentation', KEYWORDS)).toBe(true);
    expect(titleMatchesKeywords('Label standard', KEYWORDS)).toBe(false);
  });

  it('matches keywords as substrings', () => {
    expect(titleMatchesKeywords('Labels standardization documentation', KEYWORDS)).toBe(true);
  });

  it('matches any title for an empty keyword list', () => {
    expect(titleMatchesKeywords('anything', [])).toBe(true);
  });
});

describe('findIssueByKeywords', () => {
  it('returns the first matching open issue in listing order', async () => {
    const { api, repositoryApi } = createApi({
      issues: {
        open: {
          success: true,
          data: [
            issue(1, 'Fix login bug'),
            issue(2, 'Label standard documentation'),
            issue(3, 'label STANDARD documentation follow-up'),
          ],
        },
      },
    });

    const found = await findIssueByKeywords(repositoryApi, KEYWORDS);

    expect(found?.number).toBe(2);
    expect(api.listIssues).toHaveBeenCalledTimes(1);
    expect(api.listIssues).toHaveBeenCalledWith('open', 30);
  });

  it('skips pull requests surfacing in the issue listing', async () => {
    const { repositoryApi } = createApi({
      issues: {
        open: {
          success: true,
          data: [issue(4, 'Label standard documentation', true), issue(5, 'Label standard documentation')],
        },
      },
    });

    const found = await findIssueByKeywords(repositoryApi, KEYWORDS);

    expect(found?.number).toBe(5);
  });

  it('falls back to closed issues when no open issue matches', async () => {
    const { api, repositoryApi } = createApi({
      issues: {
        open: { success: true, data: [issue(1, 'Unrelated')] },
        closed: { success: true, data: [issue(9, 'Label standard documentation')] },
      },
    });

    const found = await findIssueByKeywords(repositoryApi, KEYWORDS);

    expect(found?.number).toBe(9);
    expect(api.listIssues.mock.calls).toEqual([
      ['open', 30],
      ['closed', 30],
    ]);
  });

  it('still searches closed issues when the open listing fails', async () => {
    const { repositoryApi } = createApi({
      issues: {
        open: { success: false, data: null },
        closed: { success: true, data: [issue(9, 'Label standard documentation')] },
      },
    });

    expect((await findIssueByKeywords(repositoryApi, KEYWORDS))?.number).toBe(9);
  });

  it('returns null when nothing matches', async () => {
    const { repositoryApi } = createApi({
      issues: { open: { success: true, data: [issue(1, 'Label cleanup')] } },
    });

    expect(await findIssueByKeywords(repositoryApi, KEYWORDS)).toBeNull();
  });
});

describe('findPullRequestByKeywords', () => {
  it('prefers an open match over a closed one', async () => {
    const { api, repositoryApi } = createApi({
      pulls: {
        open: { success: true, data: [pr(12, 'Add label standard documentation')] },
        closed: { success: true, data: [pr(3, 'Old label standard documentation')] },
      },
    });

    const found = await findPullRequestByKeywords(repositoryApi, KEYWORDS);

    expect(found?.number).toBe(12);
    expect(api.listPullRequests).toHaveBeenCalledTimes(1);
  });

  it('falls back to closed pull requests', async () => {
    const { repositoryApi } = createApi({
      pulls: {
        open: { success: true, data: [pr(13, 'Refactor')] },
        closed: { success: true, data: [pr(3, 'Label standard documentation')] },
      },
    });

    expect((await findPullRequestByKeywords(repositoryApi, KEYWORDS))?.number).toBe(3);
  });

  it('returns null when both listings fail', async () => {
    const { repositoryApi } = createApi({
      pulls: {
        open: { success: false, data: null },
        closed: { success: false, data: null },
      },
    });

    expect(await findPullRequestByKeywords(repositoryApi, KEYWORDS)).toBeNull();
  });
});
