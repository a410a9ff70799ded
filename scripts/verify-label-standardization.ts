#!/usr/bin/env node
/**
 * Label Standardization Verification
 *
 * Audits the label-standardization workflow of GITHUB_ORG/team-project-management
 * through the GitHub REST API.
 *
 * Usage:
 *   npm run verify
 *   ts-node scripts/verify-label-standardization.ts
 *   LABEL_AUDIT_CONFIG=./label-audit.config.json npm run verify
 *
 * Environment (a .env file in the working directory is loaded first):
 *   GITHUB_TOKEN   - API token (required)
 *   GITHUB_ORG     - owner of the target repository (required)
 *
 * Exit Codes:
 *   0 - All checks passed
 *   1 - A check failed, the run was interrupted, or an unexpected error occurred
 */

import { EXIT_FAILURE, installInterruptHandler, main } from '../src/cli';

installInterruptHandler();

main()
  .then((exitCode) => process.exit(exitCode))
  .catch((error) => {
    console.error('Fatal error running label verification:', error);
    process.exit(EXIT_FAILURE);
  });
