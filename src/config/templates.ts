/**
 * Reference templates with a single named placeholder.
 *
 * The template-literal types make a template without its placeholder a
 * compile error, e.g. `formatIssueReference('Fixes #{pr_number}', 1)`.
 */

export const ISSUE_NUMBER_PLACEHOLDER = '{issue_number}';
export const PR_NUMBER_PLACEHOLDER = '{pr_number}';

export type IssueReferenceTemplate = `${string}{issue_number}${string}`;
export type PullRequestReferenceTemplate = `${string}{pr_number}${string}`;

export function isIssueReferenceTemplate(value: string): value is IssueReferenceTemplate {
  return value.includes(ISSUE_NUMBER_PLACEHOLDER);
}

export function isPullRequestReferenceTemplate(value: string): value is PullRequestReferenceTemplate {
  return value.includes(PR_NUMBER_PLACEHOLDER);
}

export function formatIssueReference(template: IssueReferenceTemplate, issueNumber: number): string {
  return template.split(ISSUE_NUMBER_PLACEHOLDER).join(String(issueNumber));
}

export function formatPullRequestReference(
  template: PullRequestReferenceTemplate,
  prNumber: number
): string {
  return template.split(PR_NUMBER_PLACEHOLDER).join(String(prNumber));
}
