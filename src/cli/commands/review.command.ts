import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import { ReviewOrchestrator } from '../../agents/review-orchestrator.js';
import { GitHubPullRequestHost, createGitHubClient } from '../../github/github.host.js';
import { LangChainCompletionClient } from '../../llm/completion-client.js';
import { SandboxedCommandRunner } from '../../sandbox/command-runner.js';
import { DockerSandboxRuntime } from '../../sandbox/docker.runtime.js';
import { ArtifactService } from '../../services/artifact.service.js';
import { FeedbackService } from '../../services/feedback.service.js';
import type { ReviewState } from '../../types/review.types.js';
import { ConfigurationError } from '../../utils/errors.js';
import { createConsoleLogger, type Logger } from '../../utils/logger.js';
import { getRandomArt } from '../banner.js';
import { buildReviewConfig, type Environment, type ReviewConfig, type RunFlags } from '../utils/config-loader.js';

const STATE_LABELS: Record<ReviewState, string> = {
  start: 'Fetching pull request files...',
  'environment-ready': 'Running analysis tools...',
  'battery-complete': 'Saving raw results...',
  'report-persisted': 'Composing summary...',
  'summary-composed': 'Preparing review...',
  'feedback-appended': 'Publishing review...',
  published: 'Posting inline annotations...',
  done: 'Review completed',
  errored: 'Review failed',
};

function createFeedbackService(
  config: ReviewConfig,
  host: GitHubPullRequestHost,
  logger: Logger,
): FeedbackService | undefined {
  if (!config.feedbackEnabled) {
    logger.debug('AI feedback disabled');
    return undefined;
  }
  if (!config.ai.apiKey) {
    logger.warn(`No API key for ${config.ai.provider}; skipping AI feedback`);
    return undefined;
  }
  const client = new LangChainCompletionClient(config.ai.provider, config.ai.apiKey);
  return new FeedbackService(host, client, logger, {
    model: config.ai.model,
    temperature: config.ai.temperature,
    maxTokens: config.ai.maxTokens,
  });
}

/**
 * Review command - analyze a pull request and publish the results
 *
 * @example
 * // Inside a GitHub Actions job
 * GITHUB_REPOSITORY=owner/repo GITHUB_PR_NUMBER=12 GITHUB_TOKEN=... pr-lint-review
 *
 * // Explicit parameters, tools run concurrently
 * pr-lint-review review --repo owner/repo --pr 12 --token $TOKEN --parallel
 *
 * @returns process exit code
 */
export async function runReview(flags: RunFlags, env: Environment = process.env): Promise<number> {
  console.log(chalk.magenta(getRandomArt()));

  let config: ReviewConfig;
  try {
    config = buildReviewConfig(flags, env);
  } catch (error) {
    if (error instanceof ConfigurationError) {
      console.error(chalk.red(`❌ ${error.message}`));
      error.issues.forEach((issue) => console.error(chalk.gray(issue)));
      return 1;
    }
    throw error;
  }

  const spinner = ora(STATE_LABELS.start);
  const logger = createConsoleLogger({ verbose: config.verbose, spinner });
  const host = new GitHubPullRequestHost(createGitHubClient(config.token));
  spinner.start();

  const orchestrator = new ReviewOrchestrator(
    {
      changeId: { repository: config.repository, number: config.prNumber },
      sourceDir: config.cwd,
      baseImage: config.review.baseImage,
      excludePatterns: config.review.excludePatterns,
      fileExtension: config.review.fileExtension,
      parallel: config.review.parallel,
      annotationTool: config.review.annotationTool,
    },
    {
      host,
      runner: new SandboxedCommandRunner(new DockerSandboxRuntime(), logger),
      artifacts: new ArtifactService(config.review.artifactDir),
      feedback: createFeedbackService(config, host, logger),
      logger,
      onStateChange: (state) => {
        if (state === 'done') {
          spinner.succeed(STATE_LABELS.done);
        } else if (state === 'errored') {
          spinner.fail(STATE_LABELS.errored);
        } else {
          spinner.text = STATE_LABELS[state];
        }
      },
    },
  );

  const result = await orchestrator.run();
  if (result.artifactPath) {
    console.log(chalk.gray(`Raw results: ${result.artifactPath}`));
  }
  return result.exitCode;
}

export function registerReviewCommand(program: Command) {
  program
    .command('review', { isDefault: true })
    .description('Run the static-analysis battery on a pull request and post the results')
    .option('-r, --repo <owner/name>', 'Repository (default: $GITHUB_REPOSITORY)')
    .option('-p, --pr <number>', 'Pull request number (default: $GITHUB_PR_NUMBER)')
    .option('-t, --token <token>', 'GitHub token (default: $GITHUB_TOKEN)')
    .option('--cwd <dir>', 'Checked-out repository to analyze (default: current directory)')
    .option('--no-feedback', 'Skip the AI feedback stage')
    .option('--parallel', 'Run the analysis tools concurrently')
    .option('-v, --verbose', 'Show debug output')
    .action(async (options: RunFlags) => {
      process.exitCode = await runReview(options);
    });
}
