/**
 * Verification Pipeline Types
 */

import type { AuditConfig } from '../config/audit-config';
import type { RuntimeConfig } from '../config/config-manager';
import type { GitHubRequestHeaders } from '../github/headers';
import type { RepositoryApi } from '../github/types';

export type StepId =
  | 'environment'
  | 'request-headers'
  | 'feature-branch'
  | 'label-documentation'
  | 'tracking-issue'
  | 'tracking-pull-request'
  | 'issue-labels'
  | 'issue-comment'
  | 'documentation-consistency';

export interface StepDefinition {
  id: StepId;
  /** 1-based position in the pipeline */
  index: number;
  title: string;
}

/**
 * Tagged outcome of a single check. `value` carries what later steps consume.
 */
export type CheckResult<T> =
  | { status: 'pass'; value: T; message: string; warnings: string[] }
  | { status: 'fail'; reason: string; warnings: string[] };

export interface StepRecord {
  step: StepDefinition;
  status: 'pass' | 'fail';
  /** Success message or failure reason */
  detail: string;
  warnings: string[];
  durationMs: number;
}

export interface VerificationSummary {
  org: string;
  repo: string;
  branch: string;
  issueNumber: number;
  prNumber: number;
}

export interface VerificationReport {
  passed: boolean;
  steps: StepRecord[];
  failedStep?: StepId;
  summary?: VerificationSummary;
}

export interface LoadedConfiguration {
  runtime: RuntimeConfig;
  audit: AuditConfig;
}

export interface RepositoryApiOptions {
  owner: string;
  repo: string;
  headers: GitHubRequestHeaders;
  baseUrl: string;
  requestTimeoutMs: number;
}

export type RepositoryApiFactory = (options: RepositoryApiOptions) => RepositoryApi;

/**
 * Receives progress events; the console implementation prints them.
 */
export interface VerificationReporter {
  started(total: number): void;
  stepStarted(step: StepDefinition, total: number): void;
  stepPassed(step: StepDefinition, message: string): void;
  stepWarning(step: StepDefinition, warning: string): void;
  stepFailed(step: StepDefinition, reason: string): void;
  halted(step: StepDefinition, total: number): void;
  completed(summary: VerificationSummary): void;
}
