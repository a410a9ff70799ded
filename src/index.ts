/**
 * Label Standardization Verifier - Main Entry Point
 * Exports the building blocks of the verification pipeline
 */

// Configuration
export * from './config/audit-config';
export * from './config/config-manager';
export * from './config/templates';

// Logging
export * from './logging/logger';

// GitHub integration
export * from './github/github-client';
export * from './github/headers';
export * from './github/types';

// Parsing and lookups
export * from './parsers/label-table-parser';
export * from './finders/entity-finder';
export * from './comments/comment-scanner';

// Verification pipeline
export * from './verification/checks';
export * from './verification/console-reporter';
export * from './verification/pipeline';
export * from './verification/steps';
export * from './verification/types';

// CLI
export * from './cli';
