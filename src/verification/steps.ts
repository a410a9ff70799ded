/**
 * The nine verification steps, in execution order
 */

import type { StepDefinition, StepId } from './types';

const STEP_TITLES: ReadonlyArray<readonly [StepId, string]> = [
  ['environment', 'Environment configuration'],
  ['request-headers', 'API request headers'],
  ['feature-branch', 'Feature branch'],
  ['label-documentation', 'Label documentation'],
  ['tracking-issue', 'Tracking issue'],
  ['tracking-pull-request', 'Tracking pull request'],
  ['issue-labels', 'Issue label completeness'],
  ['issue-comment', 'Issue completion comment'],
  ['documentation-consistency', 'Documentation and label consistency'],
];

export const VERIFICATION_STEPS: readonly StepDefinition[] = STEP_TITLES.map(([id, title], position) => ({
  id,
  index: position + 1,
  title,
}));

export const TOTAL_STEPS = VERIFICATION_STEPS.length;

export function getStep(id: StepId): StepDefinition {
  const step = VERIFICATION_STEPS.find((candidate) => candidate.id === id);
  if (!step) {
    throw new Error(`Unknown verification step: ${id}`);
  }
  return step;
}
