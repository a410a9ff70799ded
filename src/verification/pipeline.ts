/**
 * Label Standardization Verifier
 *
 * Runs the nine checks in order and stops at the first failure. Nothing after
 * the failing step is executed or reported.
 */

import { configManager as defaultConfigManager, type ConfigManager } from '../config/config-manager';
import { GitHubClient } from '../github/github-client';
import { buildRequestHeaders } from '../github/headers';
import { logger } from '../logging/logger';
import {
  checkDocumentationConsistency,
  checkEnvironment,
  checkFeatureBranch,
  checkIssueComment,
  checkIssueLabels,
  checkLabelDocumentation,
  checkRequestHeaders,
  checkTrackingIssue,
  checkTrackingPullRequest,
} from './checks';
import { ConsoleReporter } from './console-reporter';
import { TOTAL_STEPS, getStep } from './steps';
import type {
  CheckResult,
  RepositoryApiFactory,
  StepId,
  StepRecord,
  VerificationReport,
  VerificationReporter,
} from './types';

export interface VerifierDependencies {
  configManager?: ConfigManager;
  createRepositoryApi?: RepositoryApiFactory;
  reporter?: VerificationReporter;
}

export const createGitHubRepositoryApi: RepositoryApiFactory = (options) =>
  new GitHubClient({
    owner: options.owner,
    repo: options.repo,
    headers: options.headers,
    baseUrl: options.baseUrl,
    requestTimeoutMs: options.requestTimeoutMs,
  });

export class LabelStandardizationVerifier {
  private readonly configManager: ConfigManager;
  private readonly createRepositoryApi: RepositoryApiFactory;
  private readonly reporter: VerificationReporter;
  private readonly log = logger.withComponent('pipeline');

  constructor(dependencies: VerifierDependencies = {}) {
    this.configManager = dependencies.configManager ?? defaultConfigManager;
    this.createRepositoryApi = dependencies.createRepositoryApi ?? createGitHubRepositoryApi;
    this.reporter = dependencies.reporter ?? new ConsoleReporter();
  }

  async run(): Promise<VerificationReport> {
    const records: StepRecord[] = [];
    this.reporter.started(TOTAL_STEPS);

    const environment = await this.execute(records, 'environment', () => checkEnvironment(this.configManager));
    if (environment.status === 'fail') return this.halt(records, 'environment');
    const { runtime, audit } = environment.value;

    const headers = buildRequestHeaders(runtime.github.token);
    const headerCheck = await this.execute(records, 'request-headers', () =>
      checkRequestHeaders(headers, runtime.github.token)
    );
    if (headerCheck.status === 'fail') return this.halt(records, 'request-headers');

    const api = this.createRepositoryApi({
      owner: runtime.github.org,
      repo: audit.targetRepo,
      headers,
      baseUrl: runtime.github.apiUrl,
      requestTimeoutMs: runtime.github.requestTimeoutMs,
    });

    const branch = await this.execute(records, 'feature-branch', () =>
      checkFeatureBranch(api, audit.featureBranch.name)
    );
    if (branch.status === 'fail') return this.halt(records, 'feature-branch');

    const documentation = await this.execute(records, 'label-documentation', () =>
      checkLabelDocumentation(api, audit)
    );
    if (documentation.status === 'fail') return this.halt(records, 'label-documentation');

    const issue = await this.execute(records, 'tracking-issue', () =>
      checkTrackingIssue(api, audit.issueRequirements)
    );
    if (issue.status === 'fail') return this.halt(records, 'tracking-issue');

    const pr = await this.execute(records, 'tracking-pull-request', () =>
      checkTrackingPullRequest(api, audit.prRequirements, issue.value.number)
    );
    if (pr.status === 'fail') return this.halt(records, 'tracking-pull-request');

    const issueLabels = await this.execute(records, 'issue-labels', () =>
      checkIssueLabels(issue.value, audit.expectedLabels)
    );
    if (issueLabels.status === 'fail') return this.halt(records, 'issue-labels');

    const comment = await this.execute(records, 'issue-comment', () =>
      checkIssueComment(api, issue.value.number, pr.value.number, audit.commentRequirements)
    );
    if (comment.status === 'fail') return this.halt(records, 'issue-comment');

    const consistency = await this.execute(records, 'documentation-consistency', () =>
      checkDocumentationConsistency(documentation.value, pr.value, audit)
    );
    if (consistency.status === 'fail') return this.halt(records, 'documentation-consistency');

    const summary = {
      org: runtime.github.org,
      repo: audit.targetRepo,
      branch: audit.featureBranch.name,
      issueNumber: issue.value.number,
      prNumber: pr.value.number,
    };
    this.reporter.completed(summary);

    return { passed: true, steps: records, summary };
  }

  private async execute<T>(
    records: StepRecord[],
    id: StepId,
    check: () => CheckResult<T> | Promise<CheckResult<T>>
  ): Promise<CheckResult<T>> {
    const step = getStep(id);
    this.reporter.stepStarted(step, TOTAL_STEPS);

    const startedAt = Date.now();
    const result = await check();
    const durationMs = Date.now() - startedAt;

    for (const warning of result.warnings) {
      this.reporter.stepWarning(step, warning);
    }

    if (result.status === 'pass') {
      this.reporter.stepPassed(step, result.message);
      records.push({ step, status: 'pass', detail: result.message, warnings: result.warnings, durationMs });
    } else {
      this.reporter.stepFailed(step, result.reason);
      records.push({ step, status: 'fail', detail: result.reason, warnings: result.warnings, durationMs });
    }

    this.log.timed(`Step ${step.id} ${result.status}`, durationMs, { step: step.id }, 'debug');
    return result;
  }

  private halt(records: StepRecord[], id: StepId): VerificationReport {
    this.reporter.halted(getStep(id), TOTAL_STEPS);
    return { passed: false, steps: records, failedStep: id };
  }
}
