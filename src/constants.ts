/**
 * Review Constants
 * All magic strings, numbers, and configuration defaults
 */

// Sandbox Configuration
export const DEFAULT_BASE_IMAGE = 'python:3.12-slim';
export const SANDBOX_WORKDIR = '/src';
export const DEFAULT_EXCLUDE_PATTERNS = [
  '.git',
  '__pycache__',
  '*.pyc',
  '.pytest_cache',
  'node_modules',
  '.venv',
  'venv',
];
export const ANALYSIS_PACKAGES = ['flake8', 'black', 'mypy', 'bandit', 'isort'];
export const DEFAULT_MAX_BUFFER = 50 * 1024 * 1024; // 50MB

// Analysis Configuration
export const DEFAULT_FILE_EXTENSION = '.py';
export const DEFAULT_ANNOTATION_TOOL = 'flake8';
export const REPORT_OUTPUT_LIMIT = 1000;
export const FEEDBACK_DIFF_LIMIT = 50000;
export const FEEDBACK_CONTEXT_LIMIT = 2000;

// Truncation Markers
export const REPORT_TRUNCATION_MARKER = '...';
export const DIFF_TRUNCATION_MARKER = '\n... (diff truncated)';
export const CONTEXT_TRUNCATION_MARKER = '\n... (output truncated)';

// GitHub leaves out `patch` for binary files and for oversized text diffs
export const PATCH_UNAVAILABLE_NOTE = '(diff not available)';

// AI Defaults
export const DEFAULT_AI_PROVIDER = 'openai';
export const DEFAULT_TEMPERATURE = 0.3;
export const DEFAULT_MAX_TOKENS = 1500;
export const OPENROUTER_BASE_URL = 'https://openrouter.ai/api/v1';

// Config File
export const CONFIG_FILE_NAME = '.prreview.config.json';

export const ARTIFACT_FILE_NAME = (prNumber: number) => `review-${prNumber}.json`;

export const LOG_PREFIX = '[pr-review]';

// Report Text
export const REPORT_TEXT = {
  TITLE: '## 🤖 Automated Code Review',
  GENERATED_ON: (timestamp: string) => `*Generated on ${timestamp}*`,
  RESULTS_HEADER: '### Analysis Results:',
  FEEDBACK_HEADER: '### 🧠 AI Feedback',
  FOOTER:
    '*This review was generated automatically. Please review the suggestions and apply fixes as needed.*',
  NO_FILES: (extension: string) => `No ${extension.replace(/^\./, '')} files to analyze`,
  NO_ISSUES: (tool: string) => `✅ ${tool}: No issues found`,
  TOOL_FAILED: (tool: string, reason: string) => `❌ ${tool}: Analysis failed - ${reason}`,
  ANNOTATION: (message: string) => `🔍 Linting issue: ${message}`,
  ERROR_COMMENT: (message: string) => `## 🚨 Review Error\n\n❌ Review failed: ${message}`,
};

// Feedback Failure Messages
export const FEEDBACK_ERRORS = {
  DIFF_UNAVAILABLE: (message: string) => `❌ Could not fetch diff: ${message}`,
  CONNECTION: (message: string) => `❌ Could not connect to the language model API: ${message}`,
  RATE_LIMIT: (message: string) => `❌ Language model rate limit exceeded: ${message}`,
  API: (message: string) => `❌ Language model API error: ${message}`,
  UNKNOWN: (message: string) => `❌ AI feedback generation failed: ${message}`,
};

export const REVIEWER_SYSTEM_PROMPT = `You are a senior Python engineer reviewing a pull request.
You receive the unified diff of the change and the output of static-analysis tools (flake8, black, mypy, bandit, isort) run on the changed files.
Explain the most important problems in plain language, point to the file and line where possible, group related tool findings, and suggest concrete fixes.
Call out security findings from bandit first. Do not repeat formatting noise line by line; summarize it.
Keep the review concise and use Markdown.`;

// Socket-level error codes treated as connectivity failures
export const CONNECTION_ERROR_CODES = [
  'ECONNREFUSED',
  'ECONNRESET',
  'ENOTFOUND',
  'ETIMEDOUT',
  'EAI_AGAIN',
];
