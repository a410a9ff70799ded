/**
 * Configuration Management
 * Handles environment variables (optionally pre-populated from .env) and the
 * audit expectations. NO SECRETS HARDCODED
 */

import * as fs from 'fs';
import * as dotenv from 'dotenv';
import { z } from 'zod';
import { DEFAULT_API_URL, DEFAULT_REQUEST_TIMEOUT_MS } from '../github/github-client';
import { AuditConfigSchema, DEFAULT_AUDIT_CONFIG, deepFreeze, type AuditConfig } from './audit-config';

export const ENV_GITHUB_TOKEN = 'GITHUB_TOKEN';
export const ENV_GITHUB_ORG = 'GITHUB_ORG';

export interface RuntimeConfig {
  github: {
    token: string;
    org: string;
    apiUrl: string;
    requestTimeoutMs: number;
  };
  /** Path of a JSON file replacing the default audit expectations */
  auditConfigPath?: string;
}

export class ConfigError extends Error {
  public readonly code = 'CONFIG_ERROR';

  constructor(
    message: string,
    public readonly issues: string[] = []
  ) {
    super(message);
    this.name = 'ConfigError';
  }
}

// Blank values count as unset
const blankToUndefined = (value: unknown) =>
  typeof value === 'string' && value.trim() === '' ? undefined : value;

const requiredVar = (key: string) =>
  z.preprocess(
    blankToUndefined,
    z.string({ required_error: `Missing required environment variable: ${key}` })
  );

const EnvSchema = z.object({
  [ENV_GITHUB_TOKEN]: requiredVar(ENV_GITHUB_TOKEN),
  [ENV_GITHUB_ORG]: requiredVar(ENV_GITHUB_ORG),
  GITHUB_API_URL: z.preprocess(blankToUndefined, z.string().url().default(DEFAULT_API_URL)),
  GITHUB_REQUEST_TIMEOUT_MS: z.preprocess(
    blankToUndefined,
    z.coerce.number().int().positive().default(DEFAULT_REQUEST_TIMEOUT_MS)
  ),
  LABEL_AUDIT_CONFIG: z.preprocess(blankToUndefined, z.string().optional()),
});

function describeIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const field = issue.path.join('.');
    return issue.message.startsWith('Missing required') || !field
      ? issue.message
      : `${field}: ${issue.message}`;
  });
}

export class ConfigManager {
  constructor(private readonly env: NodeJS.ProcessEnv = process.env) {}

  /**
   * Pre-populate the environment from a .env file. Variables that are already
   * set win. Returns false when the file is absent.
   */
  loadDotEnv(path: string = '.env'): boolean {
    // Load into a scratch map so process.env is never touched
    const loaded: dotenv.DotenvPopulateInput = {};
    const result = dotenv.config({ path, processEnv: loaded });
    if (result.error) {
      return false;
    }

    for (const [key, value] of Object.entries(loaded)) {
      if (this.env[key] === undefined) {
        this.env[key] = value;
      }
    }
    return true;
  }

  /**
   * Get configuration from environment variables
   */
  getRuntimeConfig(): RuntimeConfig {
    const parsed = EnvSchema.safeParse(this.env);

    if (!parsed.success) {
      const issues = describeIssues(parsed.error);
      throw new ConfigError(issues.join('; '), issues);
    }

    const env = parsed.data;
    return {
      github: {
        token: env.GITHUB_TOKEN,
        org: env.GITHUB_ORG,
        apiUrl: env.GITHUB_API_URL,
        requestTimeoutMs: env.GITHUB_REQUEST_TIMEOUT_MS,
      },
      auditConfigPath: env.LABEL_AUDIT_CONFIG,
    };
  }

  /**
   * Audit expectations: the defaults, or the validated contents of `path`
   */
  loadAuditConfig(path?: string): AuditConfig {
    if (!path) {
      return DEFAULT_AUDIT_CONFIG;
    }

    let raw: unknown;
    try {
      raw = JSON.parse(fs.readFileSync(path, 'utf-8'));
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new ConfigError(`Failed to read audit config ${path}: ${reason}`);
    }

    const parsed = AuditConfigSchema.safeParse(raw);
    if (!parsed.success) {
      const issues = describeIssues(parsed.error);
      throw new ConfigError(`Invalid audit config ${path}: ${issues.join('; ')}`, issues);
    }

    return deepFreeze(parsed.data);
  }
}

export const configManager = new ConfigManager();
