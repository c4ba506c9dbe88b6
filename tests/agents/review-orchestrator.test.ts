/**
 * End-to-end tests for ReviewOrchestrator against in-process fakes
 */

import { describe, it, expect, jest, beforeEach, afterEach } from '@jest/globals';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { ReviewOrchestrator, type ReviewSettings } from '../../src/agents/review-orchestrator.js';
import type { CompletionClient } from '../../src/llm/completion-client.js';
import { SandboxedCommandRunner } from '../../src/sandbox/command-runner.js';
import type { EnvironmentSpec, SandboxEnvironment } from '../../src/sandbox/sandbox.types.js';
import { ArtifactService } from '../../src/services/artifact.service.js';
import { FeedbackService } from '../../src/services/feedback.service.js';
import type { ChangeId, ReviewState } from '../../src/types/review.types.js';
import {
  FakePullRequestHost,
  FakeSandboxRuntime,
  createSilentLogger,
  execResult,
  type ExecHandler,
} from '../helpers/fakes.js';

const FOOTER = '---\n*This review was generated automatically. Please review the suggestions and apply fixes as needed.*';
const TOOLS = ['flake8', 'black', 'mypy', 'bandit', 'isort'];

class FlakyCommentHost extends FakePullRequestHost {
  attempts = 0;

  async postComment(id: ChangeId, body: string): Promise<void> {
    this.attempts++;
    if (this.attempts === 1) {
      throw new Error('Bad Gateway');
    }
    return super.postComment(id, body);
  }
}

class UnavailableRuntime extends FakeSandboxRuntime {
  async buildEnvironment(_spec: EnvironmentSpec): Promise<SandboxEnvironment> {
    throw new Error('Cannot connect to the Docker daemon');
  }
}

class ConnectionRefused extends Error {
  constructor() {
    super('Connection error.');
    this.name = 'APIConnectionError';
  }
}

function countOccurrences(text: string, fragment: string): number {
  return text.split(fragment).length - 1;
}

describe('ReviewOrchestrator', () => {
  let tmpDir: string;
  let host: FakePullRequestHost;
  let logger: ReturnType<typeof createSilentLogger>;
  let settings: ReviewSettings;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'orchestrator-test-'));
    host = new FakePullRequestHost();
    host.files = [{ path: 'a.py', status: 'modified' }];
    logger = createSilentLogger();
    settings = {
      changeId: { repository: 'octo/demo', number: 7 },
      sourceDir: tmpDir,
      baseImage: 'python:3.12-slim',
      excludePatterns: ['.git'],
      fileExtension: '.py',
      parallel: false,
      annotationTool: 'flake8',
    };
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  function createOrchestrator(
    runtime: FakeSandboxRuntime,
    options: { feedback?: FeedbackService; pullRequestHost?: FakePullRequestHost } = {},
  ) {
    const states: ReviewState[] = [];
    const orchestrator = new ReviewOrchestrator(settings, {
      host: options.pullRequestHost ?? host,
      runner: new SandboxedCommandRunner(runtime, logger),
      artifacts: new ArtifactService(path.join(tmpDir, 'artifacts')),
      logger,
      feedback: options.feedback,
      clock: () => new Date('2026-01-31T09:05:00Z'),
      onStateChange: (state) => states.push(state),
    });
    return { orchestrator, states };
  }

  function feedbackWith(complete: CompletionClient['complete']): FeedbackService {
    return new FeedbackService(host, { complete }, logger);
  }

  it('should post five success lines and no annotations when every tool is clean', async () => {
    const runtime = new FakeSandboxRuntime(() => execResult());
    const { orchestrator } = createOrchestrator(runtime);

    const result = await orchestrator.run();

    expect(result.status).toBe('done');
    expect(result.exitCode).toBe(0);
    expect(result.annotations).toEqual({ posted: 0, failed: 0 });
    expect(host.comments).toEqual([
      [
        '## 🤖 Automated Code Review',
        '',
        '*Generated on 2026-01-31 09:05:00 UTC*',
        '',
        '### Analysis Results:',
        '',
        ...TOOLS.flatMap((tool) => [`**${tool.toUpperCase()}**: ✅ ${tool}: No issues found`, '']),
        FOOTER,
      ].join('\n'),
    ]);
    expect(host.lineComments).toEqual([]);
  });

  it('should walk the states in order and tear the environment down', async () => {
    const runtime = new FakeSandboxRuntime(() => execResult());
    const { orchestrator, states } = createOrchestrator(runtime);

    const result = await orchestrator.run();

    const expected: ReviewState[] = [
      'start',
      'environment-ready',
      'battery-complete',
      'report-persisted',
      'summary-composed',
      'published',
      'done',
    ];
    expect(result.states).toEqual(expected);
    expect(states).toEqual(expected);
    expect(runtime.built).toEqual([
      { image: 'python:3.12-slim', sourceDir: tmpDir, excludePatterns: ['.git'], workdir: '/src' },
    ]);
    expect(runtime.disposed).toBe(1);
  });

  it('should persist the raw results before publishing', async () => {
    const runtime = new FakeSandboxRuntime((argv) =>
      argv[0] === 'bandit' ? execResult('>> Issue: [B101] assert_used\n', 1) : execResult(),
    );
    const { orchestrator } = createOrchestrator(runtime);

    const result = await orchestrator.run();

    expect(result.artifactPath).toBe(path.join(tmpDir, 'artifacts', 'review-7.json'));
    const artifact: unknown = JSON.parse(fs.readFileSync(path.join(tmpDir, 'artifacts', 'review-7.json'), 'utf-8'));
    expect(artifact).toEqual({
      flake8: '✅ flake8: No issues found',
      black: '✅ black: No issues found',
      mypy: '✅ mypy: No issues found',
      bandit: '>> Issue: [B101] assert_used\n',
      isort: '✅ isort: No issues found',
    });
  });

  it('should fence linter findings and annotate each one', async () => {
    const output = 'a.py:3:1: F401 os imported but unused\na.py:9:80: E501 line too long\n';
    const runtime = new FakeSandboxRuntime((argv) => (argv[0] === 'flake8' ? execResult(output, 1) : execResult()));
    const { orchestrator } = createOrchestrator(runtime);

    const result = await orchestrator.run();

    const [comment] = host.comments;
    expect(countOccurrences(comment, '```')).toBe(2);
    expect(comment).toContain(`**FLAKE8**:\n\`\`\`\n${output}\n\`\`\``);
    expect(countOccurrences(comment, 'No issues found')).toBe(4);
    expect(host.lineComments).toEqual([
      { commitSha: 'head-sha-1', path: 'a.py', line: 3, body: '🔍 Linting issue: F401 os imported but unused' },
      { commitSha: 'head-sha-1', path: 'a.py', line: 9, body: '🔍 Linting issue: E501 line too long' },
    ]);
    expect(result.annotations).toEqual({ posted: 2, failed: 0 });
  });

  it('should still finish when an annotation is rejected', async () => {
    const runtime = new FakeSandboxRuntime((argv) =>
      argv[0] === 'flake8' ? execResult('a.py:3:1: F401 unused\na.py:400:1: W391 blank line\n', 1) : execResult(),
    );
    host.lineCommentFailures.add('a.py:400');
    const { orchestrator } = createOrchestrator(runtime);

    const result = await orchestrator.run();

    expect(result.status).toBe('done');
    expect(result.annotations).toEqual({ posted: 1, failed: 1 });
  });

  it('should report a failed tool and still publish', async () => {
    const runtime = new FakeSandboxRuntime((argv) => {
      if (argv[0] === 'mypy' || argv[0] === 'sh') {
        throw new Error('exec stream closed');
      }
      return execResult();
    });
    const { orchestrator } = createOrchestrator(runtime);

    const result = await orchestrator.run();

    expect(result.status).toBe('done');
    expect(host.comments[0]).toContain(
      '**MYPY**: ❌ mypy: Analysis failed - exec stream closed; fallback failed: exec stream closed\n',
    );
  });

  it('should skip the sandbox for a change with no analyzable files', async () => {
    host.files = [{ path: 'README.md', status: 'modified' }];
    const runtime = new FakeSandboxRuntime();
    const complete = jest.fn<CompletionClient['complete']>();
    const { orchestrator } = createOrchestrator(runtime, { feedback: feedbackWith(complete) });

    const result = await orchestrator.run();

    expect(result.states).toEqual([
      'start',
      'battery-complete',
      'report-persisted',
      'summary-composed',
      'published',
      'done',
    ]);
    expect(host.comments[0]).toContain('### Analysis Results:\n\nℹ️ No py files to analyze\n');
    expect(runtime.built).toHaveLength(0);
    expect(complete).not.toHaveBeenCalled();
  });

  it('should append model feedback above the footer', async () => {
    const runtime = new FakeSandboxRuntime(() => execResult());
    const complete = jest.fn<CompletionClient['complete']>().mockResolvedValue('Nothing to fix.');
    const { orchestrator } = createOrchestrator(runtime, { feedback: feedbackWith(complete) });

    const result = await orchestrator.run();

    expect(result.states).toContain('feedback-appended');
    expect(host.comments[0].endsWith(`### 🧠 AI Feedback\n\nNothing to fix.\n\n${FOOTER}`)).toBe(true);
  });

  it('should publish a connectivity failure as the feedback section and finish', async () => {
    const runtime = new FakeSandboxRuntime(() => execResult());
    const complete = jest.fn<CompletionClient['complete']>().mockRejectedValue(new ConnectionRefused());
    const { orchestrator } = createOrchestrator(runtime, { feedback: feedbackWith(complete) });

    const result = await orchestrator.run();

    expect(result.status).toBe('done');
    expect(result.exitCode).toBe(0);
    expect(host.comments[0]).toContain(
      '### 🧠 AI Feedback\n\n❌ Could not connect to the language model API: Connection error.\n\n',
    );
  });

  it('should post an error comment and exit 1 when publishing fails', async () => {
    const flaky = new FlakyCommentHost();
    flaky.files = [{ path: 'a.py', status: 'added' }];
    const runtime = new FakeSandboxRuntime(() => execResult());
    const { orchestrator } = createOrchestrator(runtime, { pullRequestHost: flaky });

    const result = await orchestrator.run();

    expect(result.status).toBe('errored');
    expect(result.exitCode).toBe(1);
    expect(result.error).toBe('Could not post review comment: Bad Gateway');
    expect(result.states.slice(-2)).toEqual(['summary-composed', 'errored']);
    expect(flaky.comments).toEqual([
      '## 🚨 Review Error\n\n❌ Review failed: Could not post review comment: Bad Gateway',
    ]);
  });

  it('should swallow a failure to post the error comment', async () => {
    host.commentError = new Error('Resource not accessible by integration');
    const runtime = new FakeSandboxRuntime(() => execResult());
    const { orchestrator } = createOrchestrator(runtime);

    const result = await orchestrator.run();

    expect(result.status).toBe('errored');
    expect(result.exitCode).toBe(1);
    expect(logger.error).toHaveBeenCalledWith(
      'Could not post error comment to PR: Resource not accessible by integration',
    );
  });

  it('should end in errored when the sandbox cannot be prepared', async () => {
    const runtime = new UnavailableRuntime();
    const { orchestrator } = createOrchestrator(runtime);

    const result = await orchestrator.run();

    expect(result.states).toEqual(['start', 'errored']);
    expect(result.error).toBe('Failed to build environment: Cannot connect to the Docker daemon');
    expect(host.comments).toEqual([
      '## 🚨 Review Error\n\n❌ Review failed: Failed to build environment: Cannot connect to the Docker daemon',
    ]);
  });

  it('should end in errored when the changed files cannot be listed', async () => {
    host.changedFilesError = new Error('GitHub listFiles failed: Not Found');
    const { orchestrator } = createOrchestrator(new FakeSandboxRuntime());

    const result = await orchestrator.run();

    expect(result.status).toBe('errored');
    expect(result.error).toBe('GitHub listFiles failed: Not Found');
  });

  it('should run tools in parallel mode with the same report', async () => {
    settings.parallel = true;
    const handler: ExecHandler = (argv) => execResult(argv[0] === 'isort' ? 'ERROR: a.py Imports are incorrectly sorted' : '');
    const runtime = new FakeSandboxRuntime(handler);
    const { orchestrator } = createOrchestrator(runtime);

    const result = await orchestrator.run();

    expect(result.status).toBe('done');
    const comment = host.comments[0];
    expect(comment.indexOf('**FLAKE8**')).toBeLessThan(comment.indexOf('**ISORT**'));
    expect(comment).toContain('**ISORT**:\n```\nERROR: a.py Imports are incorrectly sorted\n```\n');
  });
});
