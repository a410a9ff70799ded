/**
 * Console Reporter
 *
 * Human-readable progress: step headers and successes on stdout, failures on
 * stderr, a summary banner once every step has passed.
 */

import chalk from 'chalk';
import type { StepDefinition, VerificationReporter, VerificationSummary } from './types';

const RULE = '='.repeat(60);

export class ConsoleReporter implements VerificationReporter {
  constructor(private readonly colors: chalk.Chalk = chalk) {}

  started(total: number): void {
    console.log(this.colors.cyan(RULE));
    console.log(this.colors.cyan(`Label standardization verification (${total} steps)`));
    console.log(this.colors.cyan(RULE));
  }

  stepStarted(step: StepDefinition, total: number): void {
    console.log(this.colors.blue(`\n${step.index}/${total} ${step.title}...`));
  }

  stepPassed(_step: StepDefinition, message: string): void {
    console.log(this.colors.green(`✓ ${message}`));
  }

  stepWarning(_step: StepDefinition, warning: string): void {
    console.log(this.colors.yellow(`[warning] ${warning} (does not affect the result)`));
  }

  stepFailed(_step: StepDefinition, reason: string): void {
    console.error(this.colors.red(`[error] ${reason}`));
  }

  halted(step: StepDefinition, total: number): void {
    console.error(this.colors.red(`\n❌ Verification stopped at step ${step.index}/${total} (${step.title})`));
  }

  completed(summary: VerificationSummary): void {
    console.log(`\n${RULE}`);
    console.log(this.colors.green('✅ All label standardization checks passed!'));
    console.log(`Repository: ${summary.org}/${summary.repo}`);
    console.log(`Feature branch: ${summary.branch}`);
    console.log(`Issue: #${summary.issueNumber}`);
    console.log(`Pull request: #${summary.prNumber}`);
    console.log(RULE);
  }
}
