/**
 * Tests for Config Manager
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { DEFAULT_AUDIT_CONFIG } from './audit-config';
import { ConfigError, ConfigManager } from './config-manager';

describe('ConfigManager', () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'label-verifier-'));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  function writeFile(name: string, content: string): string {
    const filePath = path.join(tmpDir, name);
    fs.writeFileSync(filePath, content, 'utf-8');
    return filePath;
  }

  describe('getRuntimeConfig', () => {
    it('should load configuration from environment variables', () => {
      const manager = new ConfigManager({
        GITHUB_TOKEN: 'test-token',
        GITHUB_ORG: 'test-org',
        GITHUB_API_URL: 'https://github.example.com/api/v3',
        GITHUB_REQUEST_TIMEOUT_MS: '5000',
        LABEL_AUDIT_CONFIG: './audit.json',
      });

      expect(manager.getRuntimeConfig()).toEqual({
        github: {
          token: 'test-token',
          org: 'test-org',
          apiUrl: 'https://github.example.com/api/v3',
          requestTimeoutMs: 5000,
        },
        auditConfigPath: './audit.json',
      });
    });

    it('should apply defaults for optional variables', () => {
      const manager = new ConfigManager({ GITHUB_TOKEN: 'test-token', GITHUB_ORG: 'test-org' });
      const config = manager.getRuntimeConfig();

      expect(config.github.apiUrl).toBe('https://api.github.com');
      expect(config.github.requestTimeoutMs).toBe(30000);
      expect(config.auditConfigPath).toBeUndefined();
    });

    it('should throw for a missing token', () => {
      const manager = new ConfigManager({ GITHUB_ORG: 'test-org' });

      expect(() => manager.getRuntimeConfig()).toThrow('Missing required environment variable: GITHUB_TOKEN');
    });

    it('should treat blank values as missing and report every missing variable', () => {
      const manager = new ConfigManager({ GITHUB_TOKEN: '   ', GITHUB_ORG: '' });

      try {
        manager.getRuntimeConfig();
        throw new Error('expected a ConfigError');
      } catch (error) {
        expect(error).toBeInstanceOf(ConfigError);
        if (error instanceof ConfigError) {
          expect(error.issues).toEqual([
            'Missing required environment variable: GITHUB_TOKEN',
            'Missing required environment variable: GITHUB_ORG',
          ]);
          expect(error.message).toBe(
            'Missing required environment variable: GITHUB_TOKEN; Missing required environment variable: GITHUB_ORG'
          );
        }
      }
    });

    it('should reject a non-numeric timeout', () => {
      const manager = new ConfigManager({
        GITHUB_TOKEN: 'test-token',
        GITHUB_ORG: 'test-org',
        GITHUB_REQUEST_TIMEOUT_MS: 'soon',
      });

      expect(() => manager.getRuntimeConfig()).toThrow(/^GITHUB_REQUEST_TIMEOUT_MS: /);
    });
  });

  describe('loadDotEnv', () => {
    it('should fill unset variables without overriding existing ones', () => {
      const envFile = writeFile('.env', 'GITHUB_TOKEN=from-file\nGITHUB_ORG=file-org\n');
      const env: NodeJS.ProcessEnv = { GITHUB_ORG: 'shell-org' };
      const manager = new ConfigManager(env);

      expect(manager.loadDotEnv(envFile)).toBe(true);
      expect(env.GITHUB_TOKEN).toBe('from-file');
      expect(env.GITHUB_ORG).toBe('shell-org');
    });

    it('should fill only the injected environment, not process.env', () => {
      const envFile = writeFile('.env', 'LABEL_VERIFIER_DOTENV_CHECK=loaded\n');
      const env: NodeJS.ProcessEnv = {};

      expect(new ConfigManager(env).loadDotEnv(envFile)).toBe(true);
      expect(env).toEqual({ LABEL_VERIFIER_DOTENV_CHECK: 'loaded' });
      expect(process.env.LABEL_VERIFIER_DOTENV_CHECK).toBeUndefined();
    });

    it('should return false when the file does not exist', () => {
      const env: NodeJS.ProcessEnv = {};
      const manager = new ConfigManager(env);

      expect(manager.loadDotEnv(path.join(tmpDir, 'missing.env'))).toBe(false);
      expect(env).toEqual({});
    });
  });

  describe('loadAuditConfig', () => {
    const manager = new ConfigManager({});

    it('should return the frozen defaults without a path', () => {
      const config = manager.loadAuditConfig();

      expect(config).toBe(DEFAULT_AUDIT_CONFIG);
      expect(Object.isFrozen(config.expectedLabels)).toBe(true);
      expect(Object.isFrozen(config.prRequirements)).toBe(true);
    });

    it('should load and freeze a valid override file', () => {
      const override = {
        ...DEFAULT_AUDIT_CONFIG,
        targetRepo: 'other-repo',
        expectedLabels: ['bug', 'feature'],
      };
      const { coreLabelCount: _omitted, ...withoutCore } = override;
      const filePath = writeFile('audit.json', JSON.stringify(withoutCore));

      const config = manager.loadAuditConfig(filePath);

      expect(config.targetRepo).toBe('other-repo');
      expect(config.expectedLabels).toEqual(['bug', 'feature']);
      expect(config.coreLabelCount).toBe(10);
      expect(Object.isFrozen(config.featureBranch)).toBe(true);
    });

    it('should reject a reference pattern without its placeholder', () => {
      const filePath = writeFile(
        'audit.json',
        JSON.stringify({
          ...DEFAULT_AUDIT_CONFIG,
          prRequirements: { ...DEFAULT_AUDIT_CONFIG.prRequirements, issueReferencePattern: 'Fixes #{pr_number}' },
        })
      );

      expect(() => manager.loadAuditConfig(filePath)).toThrow(
        'prRequirements.issueReferencePattern: must contain the {issue_number} placeholder'
      );
    });

    it('should reject unknown top-level keys', () => {
      const filePath = writeFile('audit.json', JSON.stringify({ ...DEFAULT_AUDIT_CONFIG, extra: true }));

      expect(() => manager.loadAuditConfig(filePath)).toThrow(ConfigError);
    });

    it('should report unreadable files as a ConfigError', () => {
      const filePath = writeFile('audit.json', '{ not json');

      expect(() => manager.loadAuditConfig(filePath)).toThrow(/^Failed to read audit config /);
    });
  });
});
