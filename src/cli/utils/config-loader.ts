import * as fs from 'fs';
import * as path from 'path';
import {
  CONFIG_FILE_NAME,
  DEFAULT_AI_PROVIDER,
  DEFAULT_ANNOTATION_TOOL,
  DEFAULT_BASE_IMAGE,
  DEFAULT_EXCLUDE_PATTERNS,
  DEFAULT_FILE_EXTENSION,
  DEFAULT_MAX_TOKENS,
  DEFAULT_TEMPERATURE,
} from '../../constants.js';
import { isSupportedProvider, type SupportedProvider } from '../../providers/index.js';
import { validateConfigOrThrow, type UserConfig } from '../../utils/config-validator.js';
import { ConfigurationError, getErrorMessage } from '../../utils/errors.js';

export type { UserConfig };

export type Environment = Record<string, string | undefined>;

/**
 * Values given on the command line; they win over the environment
 */
export interface RunFlags {
  repo?: string;
  pr?: string;
  token?: string;
  feedback?: boolean;
  parallel?: boolean;
  verbose?: boolean;
  cwd?: string;
}

export interface RunParameters {
  repository: string;
  prNumber: number;
  token: string;
}

export interface ReviewConfig extends RunParameters {
  cwd: string;
  ai: {
    provider: SupportedProvider;
    model?: string;
    temperature: number;
    maxTokens: number;
    apiKey?: string;
  };
  review: {
    baseImage: string;
    fileExtension: string;
    excludePatterns: string[];
    parallel: boolean;
    artifactDir: string;
    annotationTool: string;
  };
  feedbackEnabled: boolean;
  verbose: boolean;
}

const REPOSITORY_PATTERN = /^[^/\s]+\/[^/\s]+$/;

/**
 * Find config file in the given directory or its parents
 */
export function findConfigFile(startDir: string = process.cwd()): string | null {
  let dir = path.resolve(startDir);
  for (;;) {
    const candidate = path.join(dir, CONFIG_FILE_NAME);
    if (fs.existsSync(candidate)) {
      return candidate;
    }
    const parent = path.dirname(dir);
    if (parent === dir) {
      return null;
    }
    dir = parent;
  }
}

/**
 * Load and validate the user configuration; an absent file is an empty config
 * @throws ConfigurationError for unreadable or invalid files
 */
export function loadUserConfig(startDir?: string): UserConfig {
  const configPath = findConfigFile(startDir);
  if (!configPath) {
    return {};
  }

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(configPath, 'utf-8'));
  } catch (error) {
    throw new ConfigurationError(`Could not read ${configPath}: ${getErrorMessage(error)}`);
  }

  return validateConfigOrThrow(raw, configPath);
}

/**
 * Repository, PR number and token are required before anything else runs
 * @throws ConfigurationError listing each parameter's status
 */
export function resolveRunParameters(flags: RunFlags, env: Environment): RunParameters {
  const repository = flags.repo || env.GITHUB_REPOSITORY;
  const prValue = flags.pr || env.GITHUB_PR_NUMBER;
  const token = flags.token || env.GITHUB_TOKEN;

  if (!repository || !prValue || !token) {
    throw new ConfigurationError('Missing required environment variables:', [
      `  GITHUB_REPOSITORY: ${repository ? '✅' : '❌'}`,
      `  GITHUB_PR_NUMBER: ${prValue ? '✅' : '❌'}`,
      `  GITHUB_TOKEN: ${token ? '✅' : '❌'}`,
    ]);
  }

  if (!/^\d+$/.test(prValue.trim()) || parseInt(prValue, 10) < 1) {
    throw new ConfigurationError(`Invalid PR number: ${prValue}`);
  }

  if (!REPOSITORY_PATTERN.test(repository)) {
    throw new ConfigurationError(`Invalid repository: ${repository} (expected owner/name)`);
  }

  return { repository, prNumber: parseInt(prValue, 10), token };
}

/**
 * Get API key from environment or config
 */
export function getApiKey(provider: SupportedProvider, config: UserConfig, env: Environment): string | undefined {
  switch (provider) {
    case 'openai':
      return env.OPENAI_API_KEY || config.apiKeys?.openai;
    case 'openrouter':
      return env.OPENROUTER_API_KEY || config.apiKeys?.openrouter;
  }
}

/**
 * Merge flags, environment and config file into one run configuration
 */
export function buildReviewConfig(flags: RunFlags, env: Environment): ReviewConfig {
  const params = resolveRunParameters(flags, env);
  const cwd = path.resolve(flags.cwd || process.cwd());
  const config = loadUserConfig(cwd);

  const providerName = (env.AI_PROVIDER || config.ai?.provider || DEFAULT_AI_PROVIDER).toLowerCase();
  if (!isSupportedProvider(providerName)) {
    throw new ConfigurationError(`Unsupported AI provider: ${providerName}`);
  }

  return {
    ...params,
    cwd,
    ai: {
      provider: providerName,
      model: env.AI_MODEL || config.ai?.model,
      temperature: config.ai?.temperature ?? DEFAULT_TEMPERATURE,
      maxTokens: config.ai?.maxTokens ?? DEFAULT_MAX_TOKENS,
      apiKey: getApiKey(providerName, config, env),
    },
    review: {
      baseImage: env.REVIEW_BASE_IMAGE || config.review?.baseImage || DEFAULT_BASE_IMAGE,
      fileExtension: config.review?.fileExtension || DEFAULT_FILE_EXTENSION,
      excludePatterns: config.review?.excludePatterns || [...DEFAULT_EXCLUDE_PATTERNS],
      parallel: flags.parallel ?? config.review?.parallel ?? false,
      artifactDir: path.resolve(cwd, config.review?.artifactDir || '.'),
      annotationTool: config.review?.annotationTool || DEFAULT_ANNOTATION_TOOL,
    },
    feedbackEnabled: flags.feedback !== false && config.feedback?.enabled !== false,
    verbose: flags.verbose ?? config.output?.verbose ?? false,
  };
}
