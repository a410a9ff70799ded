/**
 * GitHub REST Client
 *
 * Read-only access to a single repository. Every call is funnelled through
 * `request()`, which classifies the outcome into an ApiResult and never throws.
 */

import { Octokit, type RestEndpointMethodTypes } from '@octokit/rest';
import { logger } from '../logging/logger';
import type { GitHubRequestHeaders } from './headers';
import type {
  ApiResult,
  GitHubComment,
  GitHubIssue,
  GitHubLabel,
  GitHubPullRequest,
  ItemState,
  RepositoryApi,
} from './types';

export const DEFAULT_API_URL = 'https://api.github.com';
export const DEFAULT_REQUEST_TIMEOUT_MS = 30_000;
export const DEFAULT_PAGE_SIZE = 30;

const USER_AGENT = 'label-standard-verifier';

export interface GitHubClientOptions {
  owner: string;
  repo: string;
  headers: GitHubRequestHeaders;
  baseUrl?: string;
  requestTimeoutMs?: number;
}

/**
 * Per-call options merged into every Octokit request
 */
export interface CallOptions {
  headers: GitHubRequestHeaders;
  request: { signal: AbortSignal };
}

type RawIssue = RestEndpointMethodTypes['issues']['listForRepo']['response']['data'][number];
type RawPullRequest = RestEndpointMethodTypes['pulls']['list']['response']['data'][number];
type RawComment = RestEndpointMethodTypes['issues']['listComments']['response']['data'][number];
type RawLabel = string | { name?: string | null };

const FAILURE = { success: false, data: null } as const;

/**
 * Octokit reports transport faults (refused connection, DNS, aborted signal)
 * as a RequestError with status 500 but no `response`; only errors carrying a
 * response come from the server.
 */
function isHttpResponseError(error: unknown): error is { status: number; response: object } {
  return (
    typeof error === 'object' &&
    error !== null &&
    'status' in error &&
    typeof error.status === 'number' &&
    'response' in error &&
    typeof error.response === 'object' &&
    error.response !== null
  );
}

/**
 * Base64 → bytes → strict UTF-8. Throws a TypeError on invalid UTF-8.
 */
export function decodeBase64Utf8(encoded: string): string {
  const bytes = Buffer.from(encoded, 'base64');
  return new TextDecoder('utf-8', { fatal: true }).decode(bytes);
}

function toLabels(labels: readonly RawLabel[]): GitHubLabel[] {
  return labels.flatMap((label) => {
    const name = typeof label === 'string' ? label : label.name;
    return name ? [{ name }] : [];
  });
}

function toIssue(item: RawIssue): GitHubIssue {
  return {
    number: item.number,
    title: item.title,
    body: item.body ?? '',
    labels: toLabels(item.labels),
    isPullRequest: item.pull_request !== undefined && item.pull_request !== null,
  };
}

function toPullRequest(item: RawPullRequest): GitHubPullRequest {
  return {
    number: item.number,
    title: item.title,
    body: item.body ?? '',
    labels: toLabels(item.labels),
  };
}

function toComment(item: RawComment): GitHubComment {
  return {
    id: item.id,
    body: item.body ?? '',
  };
}

export class GitHubClient implements RepositoryApi {
  readonly owner: string;
  readonly repo: string;

  private readonly octokit: Octokit;
  private readonly headers: GitHubRequestHeaders;
  private readonly timeoutMs: number;
  private readonly log = logger.withComponent('github-client');

  constructor(options: GitHubClientOptions) {
    this.owner = options.owner;
    this.repo = options.repo;
    this.headers = options.headers;
    this.timeoutMs = options.requestTimeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;

    this.octokit = new Octokit({
      baseUrl: options.baseUrl ?? DEFAULT_API_URL,
      userAgent: USER_AGENT,
      log: {
        debug: (message: string) => this.log.debug(message),
        info: (message: string) => this.log.debug(message),
        warn: (message: string) => this.log.warn(message),
        error: (message: string) => this.log.error(message),
      },
    });
  }

  /**
   * Run one GET and classify the outcome.
   *
   * 200 → success; 404 → informational note; other status or a transport
   * exception → logged failure with the error message. No retries.
   */
  async request<T>(
    endpoint: string,
    call: (options: CallOptions) => Promise<{ status: number; data: T }>
  ): Promise<ApiResult<T>> {
    const context = { endpoint, owner: this.owner, repo: this.repo };

    try {
      const response = await call(this.callOptions());

      if (response.status === 200) {
        return { success: true, data: response.data };
      }

      this.log.error(`${endpoint} returned status ${response.status}`, undefined, {
        ...context,
        status: response.status,
      });
      return FAILURE;
    } catch (error) {
      if (isHttpResponseError(error)) {
        if (error.status === 404) {
          this.log.info(`${endpoint} not found (404)`, { ...context, status: 404 });
          return FAILURE;
        }

        this.log.error(`${endpoint} returned status ${error.status}`, error, {
          ...context,
          status: error.status,
        });
        return FAILURE;
      }

      this.log.error(`${endpoint} request failed`, error, context);
      return FAILURE;
    }
  }

  async branchExists(branch: string): Promise<boolean> {
    const result = await this.request(`branches/${branch}`, (options) =>
      this.octokit.rest.repos.getBranch({
        owner: this.owner,
        repo: this.repo,
        branch,
        ...options,
      })
    );
    return result.success;
  }

  /**
   * Fetch a file from `ref` and decode it. Directories, symlinks, submodules,
   * empty files and undecodable content all yield null.
   */
  async getFileContent(path: string, ref: string): Promise<string | null> {
    const endpoint = `contents/${path}?ref=${ref}`;
    const result = await this.request(endpoint, (options) =>
      this.octokit.rest.repos.getContent({
        owner: this.owner,
        repo: this.repo,
        path,
        ref,
        ...options,
      })
    );

    if (!result.success) {
      return null;
    }

    const payload = result.data;
    if (Array.isArray(payload) || !('content' in payload) || typeof payload.content !== 'string') {
      return null;
    }
    if (payload.content === '') {
      return null;
    }

    try {
      return decodeBase64Utf8(payload.content);
    } catch (error) {
      this.log.error(`Failed to decode ${path}`, error, { endpoint });
      return null;
    }
  }

  async listIssues(state: ItemState, perPage: number = DEFAULT_PAGE_SIZE): Promise<ApiResult<GitHubIssue[]>> {
    const result = await this.request(`issues?state=${state}&per_page=${perPage}`, (options) =>
      this.octokit.rest.issues.listForRepo({
        owner: this.owner,
        repo: this.repo,
        state,
        per_page: perPage,
        ...options,
      })
    );

    if (!result.success) {
      return result;
    }
    return { success: true, data: result.data.map(toIssue) };
  }

  async listPullRequests(
    state: ItemState,
    perPage: number = DEFAULT_PAGE_SIZE
  ): Promise<ApiResult<GitHubPullRequest[]>> {
    const result = await this.request(`pulls?state=${state}&per_page=${perPage}`, (options) =>
      this.octokit.rest.pulls.list({
        owner: this.owner,
        repo: this.repo,
        state,
        per_page: perPage,
        ...options,
      })
    );

    if (!result.success) {
      return result;
    }
    return { success: true, data: result.data.map(toPullRequest) };
  }

  /**
   * Single page of comments; a failed listing reads as no comments.
   */
  async listIssueComments(issueNumber: number): Promise<GitHubComment[]> {
    const result = await this.request(`issues/${issueNumber}/comments`, (options) =>
      this.octokit.rest.issues.listComments({
        owner: this.owner,
        repo: this.repo,
        issue_number: issueNumber,
        ...options,
      })
    );

    return result.success ? result.data.map(toComment) : [];
  }

  private callOptions(): CallOptions {
    return {
      headers: this.headers,
      request: { signal: AbortSignal.timeout(this.timeoutMs) },
    };
  }
}
