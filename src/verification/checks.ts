/**
 * Verification Checks
 *
 * One function per pipeline step. Expected failures are returned as
 * `{ status: 'fail', reason }`, never thrown.
 */

import {
  coreExpectedLabels,
  type AuditConfig,
  type CommentRequirements,
  type IssueRequirements,
  type PullRequestRequirements,
} from '../config/audit-config';
import { ConfigError, type ConfigManager } from '../config/config-manager';
import { formatIssueReference } from '../config/templates';
import { findCompliantComment } from '../comments/comment-scanner';
import { findIssueByKeywords, findPullRequestByKeywords } from '../finders/entity-finder';
import { buildRequestHeaders, headersMatch, type GitHubRequestHeaders } from '../github/headers';
import {
  labelNames,
  type GitHubComment,
  type GitHubIssue,
  type GitHubPullRequest,
  type RepositoryApi,
} from '../github/types';
import { parseLabelTable } from '../parsers/label-table-parser';
import type { CheckResult, LoadedConfiguration } from './types';

const MISSING_PREVIEW_LIMIT = 5;
const UNEXPECTED_PREVIEW_LIMIT = 3;

export function pass<T>(value: T, message: string, warnings: string[] = []): CheckResult<T> {
  return { status: 'pass', value, message, warnings };
}

export function fail(reason: string, warnings: string[] = []): CheckResult<never> {
  return { status: 'fail', reason, warnings };
}

/**
 * "a, b, c, ..." when the list is longer than `limit`
 */
export function previewList(items: readonly string[], limit: number): string {
  const shown = items.slice(0, limit).join(', ');
  return items.length > limit ? `${shown}, ...` : shown;
}

/** Case-sensitive */
export function findMissingSections(body: string, sections: readonly string[]): string[] {
  return sections.filter((section) => !body.includes(section));
}

/** Case-insensitive */
export function findMissingKeywords(body: string, keywords: readonly string[]): string[] {
  const normalized = body.toLowerCase();
  return keywords.filter((keyword) => !normalized.includes(keyword.toLowerCase()));
}

export function findMissingLabels(present: readonly string[], required: readonly string[]): string[] {
  const names = new Set(present);
  return required.filter((label) => !names.has(label));
}

// ============================================================================
// 1. Environment
// ============================================================================

export function checkEnvironment(configManager: ConfigManager): CheckResult<LoadedConfiguration> {
  try {
    const runtime = configManager.getRuntimeConfig();
    const audit = configManager.loadAuditConfig(runtime.auditConfigPath);

    return pass(
      { runtime, audit },
      `Environment configured (target repository: ${runtime.github.org}/${audit.targetRepo})`
    );
  } catch (error) {
    if (error instanceof ConfigError) {
      return fail(error.message);
    }
    throw error;
  }
}

// ============================================================================
// 2. Request headers
// ============================================================================

/**
 * Structural self-check of the headers every request will carry.
 */
export function checkRequestHeaders(
  headers: GitHubRequestHeaders,
  token: string
): CheckResult<GitHubRequestHeaders> {
  if (!headersMatch(headers, buildRequestHeaders(token))) {
    return fail('API request headers do not match the GitHub REST API v3 format');
  }
  return pass(headers, 'API request headers match the GitHub REST API v3 format');
}

// ============================================================================
// 3. Feature branch
// ============================================================================

export async function checkFeatureBranch(api: RepositoryApi, branch: string): Promise<CheckResult<string>> {
  if (!(await api.branchExists(branch))) {
    return fail(`Feature branch ${branch} not found`);
  }
  return pass(branch, `Feature branch ${branch} exists`);
}

// ============================================================================
// 4. Label documentation
// ============================================================================

export async function checkLabelDocumentation(
  api: RepositoryApi,
  config: AuditConfig
): Promise<CheckResult<string[]>> {
  const { name: branch, docFile } = config.featureBranch;
  const content = await api.getFileContent(docFile, branch);

  if (content === null) {
    return fail(`Label documentation ${docFile} not found on branch ${branch}`);
  }

  const documentedLabels = parseLabelTable(content, config.docParsing.tableHeader);
  const { minLabelCount } = config.docParsing;

  if (documentedLabels.length < minLabelCount) {
    return fail(
      `Label documentation lists ${documentedLabels.length} labels, at least ${minLabelCount} required`
    );
  }

  return pass(documentedLabels, `Label documentation ${docFile} lists ${documentedLabels.length} labels`);
}

// ============================================================================
// 5. Tracking issue
// ============================================================================

export async function checkTrackingIssue(
  api: RepositoryApi,
  requirements: IssueRequirements
): Promise<CheckResult<GitHubIssue>> {
  const issue = await findIssueByKeywords(api, requirements.titleKeywords);
  if (!issue) {
    return fail(`No issue found with title keywords: ${requirements.titleKeywords.join(', ')}`);
  }

  const missingSections = findMissingSections(issue.body, requirements.requiredSections);
  if (missingSections.length > 0) {
    return fail(`Issue #${issue.number} is missing required sections: ${missingSections.join(', ')}`);
  }

  const missingKeywords = findMissingKeywords(issue.body, requirements.bodyKeywords);
  if (missingKeywords.length > 0) {
    return fail(`Issue #${issue.number} is missing required keywords: ${missingKeywords.join(', ')}`);
  }

  const missingLabels = findMissingLabels(labelNames(issue.labels), requirements.initialLabels);
  if (missingLabels.length > 0) {
    return fail(`Issue #${issue.number} is missing initial labels: ${missingLabels.join(', ')}`);
  }

  return pass(issue, `Issue #${issue.number} complies (title: ${issue.title})`);
}

// ============================================================================
// 6. Tracking pull request
// ============================================================================

export async function checkTrackingPullRequest(
  api: RepositoryApi,
  requirements: PullRequestRequirements,
  issueNumber: number
): Promise<CheckResult<GitHubPullRequest>> {
  const pr = await findPullRequestByKeywords(api, requirements.titleKeywords);
  if (!pr) {
    return fail(`No pull request found with title keywords: ${requirements.titleKeywords.join(', ')}`);
  }

  const issueReference = formatIssueReference(requirements.issueReferencePattern, issueNumber);
  if (!pr.body.toLowerCase().includes(issueReference.toLowerCase())) {
    return fail(`Pull request #${pr.number} does not reference the issue as "${issueReference}"`);
  }

  const missingSections = findMissingSections(pr.body, requirements.requiredSections);
  if (missingSections.length > 0) {
    return fail(`Pull request #${pr.number} is missing required sections: ${missingSections.join(', ')}`);
  }

  const missingKeywords = findMissingKeywords(pr.body, requirements.bodyKeywords);
  if (missingKeywords.length > 0) {
    return fail(`Pull request #${pr.number} is missing required keywords: ${missingKeywords.join(', ')}`);
  }

  if (pr.labels.length < requirements.minLabelsCount) {
    return fail(
      `Pull request #${pr.number} has ${pr.labels.length} labels, at least ${requirements.minLabelsCount} required`
    );
  }

  return pass(pr, `Pull request #${pr.number} complies (title: ${pr.title})`);
}

// ============================================================================
// 7. Issue labels
// ============================================================================

export function checkIssueLabels(issue: GitHubIssue, expectedLabels: readonly string[]): CheckResult<string[]> {
  const present = labelNames(issue.labels);
  const missing = findMissingLabels(present, expectedLabels);

  if (missing.length > 0) {
    return fail(
      `Issue #${issue.number} is missing ${missing.length} expected labels: ${previewList(missing, MISSING_PREVIEW_LIMIT)}`
    );
  }
  return pass(present, `Issue #${issue.number} carries all ${expectedLabels.length} expected labels`);
}

// ============================================================================
// 8. Issue comment
// ============================================================================

export async function checkIssueComment(
  api: RepositoryApi,
  issueNumber: number,
  prNumber: number,
  requirements: CommentRequirements
): Promise<CheckResult<GitHubComment>> {
  const comment = await findCompliantComment(api, issueNumber, prNumber, requirements);
  if (!comment) {
    return fail(`Issue #${issueNumber} has no compliant comment referencing PR #${prNumber}`);
  }
  return pass(comment, `Issue #${issueNumber} has a compliant comment referencing PR #${prNumber}`);
}

// ============================================================================
// 9. Documentation consistency
// ============================================================================

export interface ConsistencyOutcome {
  unexpectedInDocumentation: string[];
  missingCoreLabels: string[];
}

/**
 * Expected labels missing from the documentation are fatal; documented labels
 * nobody expects are only a warning. The pull request may miss at most half of
 * the core labels.
 */
export function checkDocumentationConsistency(
  documentedLabels: readonly string[],
  pr: GitHubPullRequest,
  config: AuditConfig
): CheckResult<ConsistencyOutcome> {
  const { expectedLabels } = config;

  const missingInDocumentation = findMissingLabels(documentedLabels, expectedLabels);
  if (missingInDocumentation.length > 0) {
    return fail(
      `${missingInDocumentation.length} expected labels are missing from the documentation: ${previewList(missingInDocumentation, MISSING_PREVIEW_LIMIT)}`
    );
  }

  const unexpectedInDocumentation = findMissingLabels(expectedLabels, documentedLabels);
  const warnings =
    unexpectedInDocumentation.length > 0
      ? [
          `Documentation lists labels that are not expected: ${previewList(unexpectedInDocumentation, UNEXPECTED_PREVIEW_LIMIT)}`,
        ]
      : [];

  const coreLabels = coreExpectedLabels(config);
  const missingCoreLabels = findMissingLabels(labelNames(pr.labels), coreLabels);
  const allowedMissing = Math.floor(coreLabels.length / 2);

  if (missingCoreLabels.length > allowedMissing) {
    return fail(
      `Pull request #${pr.number} is missing too many core labels (${missingCoreLabels.length} of ${coreLabels.length}): ${previewList(missingCoreLabels, UNEXPECTED_PREVIEW_LIMIT)}`,
      warnings
    );
  }

  return pass(
    { unexpectedInDocumentation, missingCoreLabels },
    `All ${expectedLabels.length} expected labels are documented; pull request #${pr.number} misses ${missingCoreLabels.length} of ${coreLabels.length} core labels`,
    warnings
  );
}
