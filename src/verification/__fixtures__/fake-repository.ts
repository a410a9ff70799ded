/**
 * In-process stand-in for the GitHub repository used by pipeline tests.
 */

import { DEFAULT_AUDIT_CONFIG } from '../../config/audit-config';
import type {
  ApiResult,
  GitHubComment,
  GitHubIssue,
  GitHubPullRequest,
  ItemState,
  RepositoryApi,
} from '../../github/types';
import type {
  StepDefinition,
  VerificationReporter,
  VerificationSummary,
} from '../types';

export interface FakeRepositoryData {
  branches: string[];
  /** Keyed by `${ref}:${path}` */
  files: Record<string, string>;
  issues: Record<ItemState, GitHubIssue[]>;
  pullRequests: Record<ItemState, GitHubPullRequest[]>;
  comments: Record<number, GitHubComment[]>;
}

export class FakeRepositoryApi implements RepositoryApi {
  readonly calls: string[] = [];

  constructor(
    private readonly data: FakeRepositoryData,
    readonly owner: string = 'test-org',
    readonly repo: string = 'team-project-management'
  ) {}

  async branchExists(branch: string): Promise<boolean> {
    this.calls.push(`branches/${branch}`);
    return this.data.branches.includes(branch);
  }

  async getFileContent(path: string, ref: string): Promise<string | null> {
    this.calls.push(`contents/${path}?ref=${ref}`);
    return this.data.files[`${ref}:${path}`] ?? null;
  }

  async listIssues(state: ItemState, perPage: number = 30): Promise<ApiResult<GitHubIssue[]>> {
    this.calls.push(`issues?state=${state}&per_page=${perPage}`);
    return { success: true, data: this.data.issues[state].slice(0, perPage) };
  }

  async listPullRequests(state: ItemState, perPage: number = 30): Promise<ApiResult<GitHubPullRequest[]>> {
    this.calls.push(`pulls?state=${state}&per_page=${perPage}`);
    return { success: true, data: this.data.pullRequests[state].slice(0, perPage) };
  }

  async listIssueComments(issueNumber: number): Promise<GitHubComment[]> {
    this.calls.push(`issues/${issueNumber}/comments`);
    return this.data.comments[issueNumber] ?? [];
  }
}

export type ReporterEvent =
  | { type: 'started' }
  | { type: 'stepStarted' | 'stepPassed' | 'stepWarning' | 'stepFailed' | 'halted'; step: string; text?: string }
  | { type: 'completed'; summary: VerificationSummary };

export class RecordingReporter implements VerificationReporter {
  readonly events: ReporterEvent[] = [];

  started(): void {
    this.events.push({ type: 'started' });
  }

  stepStarted(step: StepDefinition): void {
    this.events.push({ type: 'stepStarted', step: step.id });
  }

  stepPassed(step: StepDefinition, message: string): void {
    this.events.push({ type: 'stepPassed', step: step.id, text: message });
  }

  stepWarning(step: StepDefinition, warning: string): void {
    this.events.push({ type: 'stepWarning', step: step.id, text: warning });
  }

  stepFailed(step: StepDefinition, reason: string): void {
    this.events.push({ type: 'stepFailed', step: step.id, text: reason });
  }

  halted(step: StepDefinition): void {
    this.events.push({ type: 'halted', step: step.id });
  }

  completed(summary: VerificationSummary): void {
    this.events.push({ type: 'completed', summary });
  }

  startedSteps(): string[] {
    return this.events.flatMap((event) => (event.type === 'stepStarted' ? [event.step] : []));
  }
}

export const ISSUE_NUMBER = 7;
export const PR_NUMBER = 12;
export const FEATURE_BRANCH = DEFAULT_AUDIT_CONFIG.featureBranch.name;
export const DOC_FILE = DEFAULT_AUDIT_CONFIG.featureBranch.docFile;

export const EXTRA_DOCUMENTED_LABELS = ['security', 'performance', 'duplicate'];

/**
 * Markdown document with one well-formed row per label, plus raw extra lines
 * appended inside the table.
 */
export function buildLabelDocument(labels: readonly string[], extraTableLines: readonly string[] = []): string {
  const rows = labels.map((label) => `| ${label} | #ededed | General |`);
  return [
    '# Label Color Standardization',
    '',
    'Every label in the project follows the table below.',
    '',
    DEFAULT_AUDIT_CONFIG.docParsing.tableHeader,
    '|------------|-----------|----------|',
    ...rows,
    ...extraTableLines,
    '',
    '## Notes',
    '',
    'Colors are reviewed every quarter.',
  ].join('\n');
}

export function buildIssue(overrides: Partial<GitHubIssue> = {}): GitHubIssue {
  return {
    number: ISSUE_NUMBER,
    title: 'Label color standard documentation',
    body: [
      '## Background',
      'Our label colors are inconsistent, so we need a standard.',
      '',
      '## Required Label List',
      'See the documentation for every label.',
    ].join('\n'),
    labels: DEFAULT_AUDIT_CONFIG.expectedLabels.map((name) => ({ name })),
    isPullRequest: false,
    ...overrides,
  };
}

export function buildPullRequest(overrides: Partial<GitHubPullRequest> = {}): GitHubPullRequest {
  return {
    number: PR_NUMBER,
    title: 'Add label standard documentation',
    body: [
      '## Summary',
      `Documents the label standard. Fixes #${ISSUE_NUMBER}`,
      '',
      '## Changes',
      '- Added the label documentation table',
    ].join('\n'),
    labels: ['bug', 'enhancement', 'documentation', 'feature', 'task'].map((name) => ({ name })),
    ...overrides,
  };
}

export const COMPLIANT_COMMENT: GitHubComment = {
  id: 202,
  body: `Label documentation completed in PR #${PR_NUMBER}. All labels verified and applied.`,
};

/**
 * Everything in place: 25 documented labels (22 expected + 3 extra), compliant
 * issue, pull request and comment.
 */
export function passingRepository(): FakeRepositoryData {
  return {
    branches: ['main', FEATURE_BRANCH],
    files: {
      [`${FEATURE_BRANCH}:${DOC_FILE}`]: buildLabelDocument([
        ...DEFAULT_AUDIT_CONFIG.expectedLabels,
        ...EXTRA_DOCUMENTED_LABELS,
      ]),
    },
    issues: {
      open: [buildIssue()],
      closed: [],
    },
    pullRequests: {
      open: [buildPullRequest()],
      closed: [],
    },
    comments: {
      [ISSUE_NUMBER]: [
        { id: 201, body: 'Working on it.' },
        COMPLIANT_COMMENT,
      ],
    },
  };
}

export const TEST_ENV = {
  GITHUB_TOKEN: 'test-token',
  GITHUB_ORG: 'test-org',
};
