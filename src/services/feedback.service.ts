/**
 * Feedback Service
 * Asks the language model to review the diff in light of the tool results.
 * Every failure comes back as a one-line string; nothing here throws.
 */

import type { CompletionClient } from '../llm/completion-client.js';
import type { PullRequestHost } from '../github/pull-request-host.js';
import type { BatteryResult, ChangeSet, ToolOutcome } from '../types/review.types.js';
import {
  CONNECTION_ERROR_CODES,
  CONTEXT_TRUNCATION_MARKER,
  DEFAULT_MAX_TOKENS,
  DEFAULT_TEMPERATURE,
  DIFF_TRUNCATION_MARKER,
  FEEDBACK_CONTEXT_LIMIT,
  FEEDBACK_DIFF_LIMIT,
  FEEDBACK_ERRORS,
  REPORT_TEXT,
  REVIEWER_SYSTEM_PROMPT,
} from '../constants.js';
import { getErrorMessage, getErrorStatus } from '../utils/errors.js';
import type { Logger } from '../utils/logger.js';
import { truncate } from '../utils/truncate.js';

export type ModelFailureCategory = 'connection' | 'rate-limit' | 'api' | 'unknown';

export interface FeedbackOptions {
  model?: string;
  temperature?: number;
  maxTokens?: number;
  diffLimit?: number;
  contextLimit?: number;
}

const CONNECTION_ERROR_NAMES = ['APIConnectionError', 'APIConnectionTimeoutError', 'TimeoutError', 'FetchError'];

function readProperty(value: unknown, key: string): unknown {
  if (typeof value === 'object' && value !== null && key in value) {
    return Reflect.get(value, key);
  }
  return undefined;
}

function errorNames(error: unknown): string[] {
  const names: string[] = [];
  const name = readProperty(error, 'name');
  if (typeof name === 'string') {
    names.push(name);
  }
  if (typeof error === 'object' && error !== null && error.constructor.name) {
    names.push(error.constructor.name);
  }
  return names;
}

/**
 * Sort a completion failure into the categories reported to the user
 */
export function classifyModelError(error: unknown): ModelFailureCategory {
  const names = errorNames(error);
  const status = getErrorStatus(error);

  if (
    status === 429 ||
    names.includes('RateLimitError') ||
    readProperty(error, 'lc_error_code') === 'MODEL_RATE_LIMIT'
  ) {
    return 'rate-limit';
  }

  const codes = [readProperty(error, 'code'), readProperty(readProperty(error, 'cause'), 'code')];
  if (
    names.some((name) => CONNECTION_ERROR_NAMES.includes(name)) ||
    codes.some((code) => typeof code === 'string' && CONNECTION_ERROR_CODES.includes(code))
  ) {
    return 'connection';
  }

  if (status !== undefined || names.includes('APIError')) {
    return 'api';
  }

  return 'unknown';
}

export function describeModelFailure(error: unknown): string {
  const message = getErrorMessage(error);
  switch (classifyModelError(error)) {
    case 'connection':
      return FEEDBACK_ERRORS.CONNECTION(message);
    case 'rate-limit':
      return FEEDBACK_ERRORS.RATE_LIMIT(message);
    case 'api':
      return FEEDBACK_ERRORS.API(message);
    case 'unknown':
      return FEEDBACK_ERRORS.UNKNOWN(message);
  }
}

function describeOutcome(tool: string, outcome: ToolOutcome, limit: number): string {
  switch (outcome.kind) {
    case 'no-issues':
      return REPORT_TEXT.NO_ISSUES(tool);
    case 'failed':
      return REPORT_TEXT.TOOL_FAILED(tool, outcome.reason);
    case 'issues':
      return truncate(outcome.output, limit, CONTEXT_TRUNCATION_MARKER);
  }
}

export class FeedbackService {
  constructor(
    private readonly host: PullRequestHost,
    private readonly client: CompletionClient,
    private readonly logger: Logger,
    private readonly options: FeedbackOptions = {},
  ) {}

  static prepareDiff(diff: string, limit: number = FEEDBACK_DIFF_LIMIT): string {
    return truncate(diff, limit, DIFF_TRUNCATION_MARKER);
  }

  /**
   * Tool outputs for the model, each capped independently
   */
  static buildToolContext(result: BatteryResult, limit: number = FEEDBACK_CONTEXT_LIMIT): string {
    if (result.kind === 'nothing-to-analyze') {
      return result.message;
    }
    return Array.from(result.outcomes, ([tool, outcome]) =>
      `### ${tool}\n${describeOutcome(tool, outcome, limit)}`,
    ).join('\n\n');
  }

  static buildUserPrompt(diff: string, toolContext: string): string {
    return [
      '## Pull request diff',
      '',
      '```diff',
      diff,
      '```',
      '',
      '## Static analysis results',
      '',
      toolContext,
      '',
      'Review the change using the diff and the tool results above.',
    ].join('\n');
  }

  async generate(changeSet: ChangeSet, result: BatteryResult): Promise<string> {
    let diff: string;
    try {
      diff = await this.host.getDiff(changeSet.id);
    } catch (error) {
      this.logger.warn(`Could not fetch diff: ${getErrorMessage(error)}`);
      return FEEDBACK_ERRORS.DIFF_UNAVAILABLE(getErrorMessage(error));
    }

    const userPrompt = FeedbackService.buildUserPrompt(
      FeedbackService.prepareDiff(diff, this.options.diffLimit),
      FeedbackService.buildToolContext(result, this.options.contextLimit),
    );

    try {
      const feedback = await this.client.complete({
        systemPrompt: REVIEWER_SYSTEM_PROMPT,
        userPrompt,
        model: this.options.model,
        temperature: this.options.temperature ?? DEFAULT_TEMPERATURE,
        maxTokens: this.options.maxTokens ?? DEFAULT_MAX_TOKENS,
      });
      this.logger.debug(`Received ${feedback.length} characters of feedback`);
      return feedback;
    } catch (error) {
      const failure = describeModelFailure(error);
      this.logger.warn(failure);
      return failure;
    }
  }
}
