/**
 * GitHub entities as the verifier sees them.
 * Payloads are narrowed to the fields the checks read.
 */

export type ItemState = 'open' | 'closed';

export interface GitHubLabel {
  name: string;
}

export interface GitHubIssue {
  number: number;
  title: string;
  body: string;
  labels: GitHubLabel[];
  /** Pull requests also surface in the issues listing */
  isPullRequest: boolean;
}

export interface GitHubPullRequest {
  number: number;
  title: string;
  body: string;
  labels: GitHubLabel[];
}

export interface GitHubComment {
  id: number;
  body: string;
}

/**
 * Uniform outcome of a single GET against the repository resource root.
 */
export type ApiResult<T> =
  | { success: true; data: T }
  | { success: false; data: null };

/**
 * Read-only view of one repository. Finders, the comment scanner and the
 * verification pipeline only depend on this interface.
 */
export interface RepositoryApi {
  readonly owner: string;
  readonly repo: string;

  branchExists(branch: string): Promise<boolean>;
  getFileContent(path: string, ref: string): Promise<string | null>;
  listIssues(state: ItemState, perPage?: number): Promise<ApiResult<GitHubIssue[]>>;
  listPullRequests(state: ItemState, perPage?: number): Promise<ApiResult<GitHubPullRequest[]>>;
  listIssueComments(issueNumber: number): Promise<GitHubComment[]>;
}

export function labelNames(labels: readonly GitHubLabel[]): string[] {
  return labels.map((label) => label.name);
}
