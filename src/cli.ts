/**
 * CLI wiring: .env loading, logger settings, exit-code mapping and interrupt
 * handling around a single verification run.
 */

import { ConfigManager } from './config/config-manager';
import { logger, resolveLoggerOptions } from './logging/logger';
import { LabelStandardizationVerifier } from './verification/pipeline';
import type { VerificationReport } from './verification/types';

export const EXIT_SUCCESS = 0;
export const EXIT_FAILURE = 1;

export interface Verifier {
  run(): Promise<VerificationReport>;
}

const log = logger.withComponent('cli');

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Run once and map the outcome to an exit code. Unexpected errors are
 * reported and mapped to a failure, never rethrown.
 */
export async function runVerification(createVerifier: () => Verifier): Promise<number> {
  try {
    const report = await createVerifier().run();
    return report.passed ? EXIT_SUCCESS : EXIT_FAILURE;
  } catch (error) {
    console.error(`\n\n❌ Unexpected error during verification: ${errorMessage(error)}`);
    log.error('Verification aborted by an unexpected error', error);
    return EXIT_FAILURE;
  }
}

export async function main(env: NodeJS.ProcessEnv = process.env, dotEnvPath: string = '.env'): Promise<number> {
  return runVerification(() => {
    const configManager = new ConfigManager(env);
    if (configManager.loadDotEnv(dotEnvPath)) {
      log.debug(`Loaded environment from ${dotEnvPath}`);
    }
    logger.configure(resolveLoggerOptions(env));

    return new LabelStandardizationVerifier({ configManager });
  });
}

/**
 * Ctrl+C ends the run with a failure exit code. Returns a function that
 * removes the handler.
 */
export function installInterruptHandler(
  exit: (code: number) => void = (code) => process.exit(code)
): () => void {
  const onInterrupt = (): void => {
    console.error('\n\n❌ Interrupted by user');
    exit(EXIT_FAILURE);
  };

  process.once('SIGINT', onInterrupt);
  return () => {
    process.removeListener('SIGINT', onInterrupt);
  };
}
