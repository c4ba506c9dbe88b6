/**
 * Unit tests for run parameter resolution and config loading
 */

import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import {
  buildReviewConfig,
  findConfigFile,
  getApiKey,
  loadUserConfig,
  resolveRunParameters,
  type Environment,
} from '../../src/cli/utils/config-loader.js';
import { DEFAULT_EXCLUDE_PATTERNS } from '../../src/constants.js';
import { ConfigurationError } from '../../src/utils/errors.js';

const baseEnv: Environment = {
  GITHUB_REPOSITORY: 'octo/demo',
  GITHUB_PR_NUMBER: '7',
  GITHUB_TOKEN: 'test-token',
};

function captureError(fn: () => unknown): ConfigurationError {
  try {
    fn();
  } catch (error) {
    if (error instanceof ConfigurationError) {
      return error;
    }
    throw error;
  }
  throw new Error('expected a ConfigurationError');
}

describe('resolveRunParameters', () => {
  it('should read the three parameters from the environment', () => {
    expect(resolveRunParameters({}, baseEnv)).toEqual({
      repository: 'octo/demo',
      prNumber: 7,
      token: 'test-token',
    });
  });

  it('should let flags win over the environment', () => {
    expect(resolveRunParameters({ repo: 'other/repo', pr: '12', token: 'flag-token' }, baseEnv)).toEqual({
      repository: 'other/repo',
      prNumber: 12,
      token: 'flag-token',
    });
  });

  it('should list the status of every required variable when one is missing', () => {
    const error = captureError(() => resolveRunParameters({}, { GITHUB_REPOSITORY: 'octo/demo' }));

    expect(error.message).toBe('Missing required environment variables:');
    expect(error.issues).toEqual([
      '  GITHUB_REPOSITORY: ✅',
      '  GITHUB_PR_NUMBER: ❌',
      '  GITHUB_TOKEN: ❌',
    ]);
  });

  it('should reject a PR number that is not a positive integer', () => {
    expect(() => resolveRunParameters({}, { ...baseEnv, GITHUB_PR_NUMBER: 'abc' })).toThrow('Invalid PR number: abc');
    expect(() => resolveRunParameters({}, { ...baseEnv, GITHUB_PR_NUMBER: '0' })).toThrow('Invalid PR number: 0');
  });

  it('should reject a repository without an owner', () => {
    expect(() => resolveRunParameters({}, { ...baseEnv, GITHUB_REPOSITORY: 'demo' })).toThrow(
      'Invalid repository: demo (expected owner/name)',
    );
  });
});

describe('getApiKey', () => {
  it('should prefer the environment over the config file', () => {
    expect(getApiKey('openai', { apiKeys: { openai: 'file-key' } }, { OPENAI_API_KEY: 'env-key' })).toBe('env-key');
    expect(getApiKey('openrouter', { apiKeys: { openrouter: 'file-key' } }, {})).toBe('file-key');
    expect(getApiKey('openai', {}, {})).toBeUndefined();
  });
});

describe('config files', () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'config-test-'));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  function writeConfig(dir: string, content: string) {
    fs.writeFileSync(path.join(dir, '.prreview.config.json'), content);
  }

  it('should find a config file in a parent directory', () => {
    writeConfig(tmpDir, '{}');
    const nested = path.join(tmpDir, 'a', 'b');
    fs.mkdirSync(nested, { recursive: true });

    expect(findConfigFile(nested)).toBe(path.join(tmpDir, '.prreview.config.json'));
  });

  it('should treat a missing config file as empty', () => {
    expect(loadUserConfig(tmpDir)).toEqual({});
  });

  it('should report unparseable JSON', () => {
    writeConfig(tmpDir, '{ not json');

    expect(() => loadUserConfig(tmpDir)).toThrow(`Could not read ${path.join(tmpDir, '.prreview.config.json')}`);
  });

  it('should report schema violations with their location', () => {
    writeConfig(tmpDir, JSON.stringify({ review: { annotationTool: 'pylint' } }));

    const error = captureError(() => loadUserConfig(tmpDir));

    expect(error.message).toBe(`Invalid configuration in ${path.join(tmpDir, '.prreview.config.json')}`);
    expect(error.issues).toEqual(['review.annotationTool: must be one of: flake8, black, mypy, bandit, isort']);
  });

  describe('buildReviewConfig', () => {
    it('should apply defaults without a config file', () => {
      const config = buildReviewConfig({ cwd: tmpDir }, baseEnv);

      expect(config).toEqual({
        repository: 'octo/demo',
        prNumber: 7,
        token: 'test-token',
        cwd: path.resolve(tmpDir),
        ai: {
          provider: 'openai',
          model: undefined,
          temperature: 0.3,
          maxTokens: 1500,
          apiKey: undefined,
        },
        review: {
          baseImage: 'python:3.12-slim',
          fileExtension: '.py',
          excludePatterns: DEFAULT_EXCLUDE_PATTERNS,
          parallel: false,
          artifactDir: path.resolve(tmpDir),
          annotationTool: 'flake8',
        },
        feedbackEnabled: true,
        verbose: false,
      });
    });

    it('should merge the config file with environment overrides', () => {
      writeConfig(
        tmpDir,
        JSON.stringify({
          apiKeys: { openrouter: 'test-secret' },
          ai: { provider: 'openrouter', model: 'file-model', temperature: 0 },
          review: { parallel: true, artifactDir: 'reports', excludePatterns: ['.git'] },
          output: { verbose: true },
        }),
      );

      const config = buildReviewConfig(
        { cwd: tmpDir },
        { ...baseEnv, AI_MODEL: 'env-model', REVIEW_BASE_IMAGE: 'python:3.11-slim' },
      );

      expect(config.ai).toEqual({
        provider: 'openrouter',
        model: 'env-model',
        temperature: 0,
        maxTokens: 1500,
        apiKey: 'test-secret',
      });
      expect(config.review.baseImage).toBe('python:3.11-slim');
      expect(config.review.parallel).toBe(true);
      expect(config.review.excludePatterns).toEqual(['.git']);
      expect(config.review.artifactDir).toBe(path.join(path.resolve(tmpDir), 'reports'));
      expect(config.verbose).toBe(true);
    });

    it('should let flags override the config file', () => {
      writeConfig(tmpDir, JSON.stringify({ review: { parallel: true }, feedback: { enabled: true } }));

      const config = buildReviewConfig({ cwd: tmpDir, parallel: false, feedback: false }, baseEnv);

      expect(config.review.parallel).toBe(false);
      expect(config.feedbackEnabled).toBe(false);
    });

    it('should disable feedback from the config file', () => {
      writeConfig(tmpDir, JSON.stringify({ feedback: { enabled: false } }));

      expect(buildReviewConfig({ cwd: tmpDir }, baseEnv).feedbackEnabled).toBe(false);
    });

    it('should reject an unknown provider from the environment', () => {
      expect(() => buildReviewConfig({ cwd: tmpDir }, { ...baseEnv, AI_PROVIDER: 'Claude' })).toThrow(
        'Unsupported AI provider: claude',
      );
    });
  });
});
