/**
 * Audit Expectations
 *
 * What a correctly executed label-standardization workflow leaves behind in the
 * target repository. The defaults can be replaced as a whole by a JSON file
 * (see ConfigManager.loadAuditConfig); either way the result is deep-frozen.
 */

import { z } from 'zod';
import {
  isIssueReferenceTemplate,
  isPullRequestReferenceTemplate,
  type IssueReferenceTemplate,
  type PullRequestReferenceTemplate,
} from './templates';

export interface FeatureBranchConfig {
  readonly name: string;
  readonly docFile: string;
}

export interface DocParsingConfig {
  /** Substring that marks the header line of the label table */
  readonly tableHeader: string;
  readonly minLabelCount: number;
}

export interface IssueRequirements {
  readonly titleKeywords: readonly string[];
  readonly bodyKeywords: readonly string[];
  /** Matched case-sensitively */
  readonly requiredSections: readonly string[];
  readonly initialLabels: readonly string[];
}

export interface PullRequestRequirements {
  readonly titleKeywords: readonly string[];
  readonly bodyKeywords: readonly string[];
  readonly requiredSections: readonly string[];
  readonly minLabelsCount: number;
  readonly issueReferencePattern: IssueReferenceTemplate;
}

export interface CommentRequirements {
  readonly keywords: readonly string[];
  readonly prReferenceFlag: PullRequestReferenceTemplate;
  readonly contentFlags: readonly string[];
}

export interface AuditConfig {
  readonly targetRepo: string;
  readonly featureBranch: FeatureBranchConfig;
  readonly docParsing: DocParsingConfig;
  readonly issueRequirements: IssueRequirements;
  readonly prRequirements: PullRequestRequirements;
  readonly expectedLabels: readonly string[];
  /** Leading slice of expectedLabels checked against the pull request */
  readonly coreLabelCount: number;
  readonly commentRequirements: CommentRequirements;
}

const nonEmptyString = z.string().min(1);
const stringList = z.array(nonEmptyString);

const issueReferenceTemplate = z.custom<IssueReferenceTemplate>(
  (value) => typeof value === 'string' && isIssueReferenceTemplate(value),
  { message: 'must contain the {issue_number} placeholder' }
);

const pullRequestReferenceTemplate = z.custom<PullRequestReferenceTemplate>(
  (value) => typeof value === 'string' && isPullRequestReferenceTemplate(value),
  { message: 'must contain the {pr_number} placeholder' }
);

export const AuditConfigSchema: z.ZodType<AuditConfig, z.ZodTypeDef, unknown> = z
  .object({
    targetRepo: nonEmptyString,
    featureBranch: z.object({
      name: nonEmptyString,
      docFile: nonEmptyString,
    }),
    docParsing: z.object({
      tableHeader: nonEmptyString,
      minLabelCount: z.number().int().nonnegative(),
    }),
    issueRequirements: z.object({
      titleKeywords: stringList.min(1),
      bodyKeywords: stringList,
      requiredSections: stringList,
      initialLabels: stringList,
    }),
    prRequirements: z.object({
      titleKeywords: stringList.min(1),
      bodyKeywords: stringList,
      requiredSections: stringList,
      minLabelsCount: z.number().int().nonnegative(),
      issueReferencePattern: issueReferenceTemplate,
    }),
    expectedLabels: stringList.min(1),
    coreLabelCount: z.number().int().positive().default(10),
    commentRequirements: z.object({
      keywords: stringList,
      prReferenceFlag: pullRequestReferenceTemplate,
      contentFlags: stringList,
    }),
  })
  .strict();

export function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
    Object.freeze(value);
  }
  return value;
}

export const DEFAULT_AUDIT_CONFIG: AuditConfig = deepFreeze<AuditConfig>({
  targetRepo: 'team-project-management',
  featureBranch: {
    name: 'feat/label-color-standard',
    docFile: 'docs/label-color-standardization.md',
  },
  docParsing: {
    tableHeader: '| Label Name | Color Hex | Category |',
    minLabelCount: 22,
  },
  issueRequirements: {
    titleKeywords: ['Label', 'standard', 'documentation'],
    bodyKeywords: ['label', 'color', 'standard'],
    requiredSections: ['## Background', '## Required Label List'],
    initialLabels: ['documentation', 'enhancement'],
  },
  prRequirements: {
    titleKeywords: ['Label', 'standard', 'documentation'],
    bodyKeywords: ['label', 'documentation', 'standard'],
    requiredSections: ['## Summary', '## Changes'],
    minLabelsCount: 3,
    issueReferencePattern: 'Fixes #{issue_number}',
  },
  expectedLabels: [
    'bug',
    'enhancement',
    'documentation',
    'feature',
    'bug-critical',
    'bug-major',
    'bug-minor',
    'task',
    'question',
    'help-wanted',
    'good-first-issue',
    'priority-high',
    'priority-medium',
    'priority-low',
    'status-in-progress',
    'status-review',
    'status-done',
    'status-blocked',
    'component-frontend',
    'component-backend',
    'component-db',
    'wontfix',
  ],
  coreLabelCount: 10,
  commentRequirements: {
    keywords: ['label', 'documentation', 'completed'],
    prReferenceFlag: 'PR #{pr_number}',
    contentFlags: ['labels', 'verified', 'applied'],
  },
});

/**
 * First `coreLabelCount` expected labels
 */
export function coreExpectedLabels(config: AuditConfig): readonly string[] {
  return config.expectedLabels.slice(0, config.coreLabelCount);
}
