/**
 * Review Orchestrator
 * Runs one review end to end:
 * battery -> artifact -> summary -> feedback -> summary comment -> inline annotations.
 * Any uncaught failure ends in a best-effort error comment and exit code 1.
 */

import type { PullRequestHost } from '../github/pull-request-host.js';
import type { PrepareOptions, SandboxedCommandRunner } from '../sandbox/command-runner.js';
import type { SandboxEnvironment } from '../sandbox/sandbox.types.js';
import { AnnotationService } from '../services/annotation.service.js';
import type { ArtifactService } from '../services/artifact.service.js';
import type { FeedbackService } from '../services/feedback.service.js';
import { ReportFormatterService } from '../services/report-formatter.service.js';
import { ToolBatteryExecutor, selectAnalyzableFiles, type EnvironmentSource } from '../tools/tool-battery.js';
import { TOOL_REGISTRY } from '../tools/tool-registry.js';
import type {
  AnnotationResult,
  ChangeId,
  ChangeSet,
  ReviewRunResult,
  ReviewState,
  ToolSpec,
} from '../types/review.types.js';
import { REPORT_TEXT } from '../constants.js';
import { PublishError, getErrorMessage } from '../utils/errors.js';
import type { Logger } from '../utils/logger.js';

export interface ReviewSettings {
  changeId: ChangeId;
  /** Host directory holding the checked-out repository */
  sourceDir: string;
  baseImage: string;
  excludePatterns: string[];
  fileExtension: string;
  parallel: boolean;
  annotationTool: string;
}

export interface ReviewDependencies {
  host: PullRequestHost;
  runner: SandboxedCommandRunner;
  artifacts: ArtifactService;
  logger: Logger;
  /** Optional stage; skipped when absent */
  feedback?: FeedbackService;
  registry?: readonly ToolSpec[];
  clock?: () => Date;
  onStateChange?: (state: ReviewState) => void;
}

/**
 * Prepares the sandbox on first use and tears it down after the battery
 */
class EnvironmentSession implements EnvironmentSource {
  private environment?: SandboxEnvironment;

  constructor(
    private readonly runner: SandboxedCommandRunner,
    private readonly options: PrepareOptions,
    private readonly onReady: () => void,
  ) {}

  async acquire(): Promise<SandboxEnvironment> {
    if (!this.environment) {
      this.environment = await this.runner.prepare(this.options);
      this.onReady();
    }
    return this.environment;
  }

  async release(): Promise<void> {
    if (this.environment) {
      const environment = this.environment;
      this.environment = undefined;
      await this.runner.release(environment);
    }
  }
}

export class ReviewOrchestrator {
  private readonly battery: ToolBatteryExecutor;
  private readonly annotator: AnnotationService;
  private readonly clock: () => Date;

  constructor(
    private readonly settings: ReviewSettings,
    private readonly deps: ReviewDependencies,
  ) {
    this.battery = new ToolBatteryExecutor(deps.runner, deps.logger, deps.registry ?? TOOL_REGISTRY);
    this.annotator = new AnnotationService(deps.host, deps.logger);
    this.clock = deps.clock ?? (() => new Date());
  }

  async run(): Promise<ReviewRunResult> {
    const { host, logger } = this.deps;
    const { changeId } = this.settings;
    const states: ReviewState[] = [];
    const enter = (state: ReviewState) => {
      states.push(state);
      this.deps.onStateChange?.(state);
    };

    let annotations: AnnotationResult = { posted: 0, failed: 0 };
    let artifactPath: string | undefined;

    enter('start');
    logger.info(`Starting review for PR #${changeId.number} in ${changeId.repository}`);

    try {
      const changeSet = await this.loadChangeSet();
      logger.info(`${changeSet.files.length} changed ${this.settings.fileExtension} file(s) to analyze`);

      const session = new EnvironmentSession(
        this.deps.runner,
        {
          baseImage: this.settings.baseImage,
          sourceDir: this.settings.sourceDir,
          excludePatterns: this.settings.excludePatterns,
        },
        () => enter('environment-ready'),
      );

      const result = await this.battery
        .run(changeSet.files, session, {
          fileExtension: this.settings.fileExtension,
          parallel: this.settings.parallel,
        })
        .finally(() => session.release());
      enter('battery-complete');

      artifactPath = await this.deps.artifacts.write(changeId.number, result);
      logger.debug(`Raw results written to ${artifactPath}`);
      enter('report-persisted');

      let body = ReportFormatterService.formatReport(result, { generatedAt: this.clock() });
      enter('summary-composed');

      if (this.deps.feedback && result.kind === 'analyzed') {
        logger.info('Generating AI feedback');
        const feedback = await this.deps.feedback.generate(changeSet, result);
        body = ReportFormatterService.appendFeedback(body, feedback);
        enter('feedback-appended');
      }

      try {
        await host.postComment(changeId, body);
      } catch (error) {
        throw new PublishError(`Could not post review comment: ${getErrorMessage(error)}`);
      }
      enter('published');

      const findings = AnnotationService.findingsFor(result, this.settings.annotationTool);
      annotations = await this.annotator.annotate(changeSet, findings);
      if (findings.length > 0) {
        logger.info(`Posted ${annotations.posted}/${findings.length} inline annotation(s)`);
      }

      enter('done');
      logger.info('✅ Review completed successfully!');
      return { status: 'done', exitCode: 0, states, annotations, artifactPath };
    } catch (error) {
      const message = getErrorMessage(error);
      enter('errored');
      logger.error(`❌ Review failed: ${message}`);

      try {
        await host.postComment(changeId, REPORT_TEXT.ERROR_COMMENT(message));
      } catch (commentError) {
        logger.error(`Could not post error comment to PR: ${getErrorMessage(commentError)}`);
      }

      return { status: 'errored', exitCode: 1, states, annotations, artifactPath, error: message };
    }
  }

  private async loadChangeSet(): Promise<ChangeSet> {
    const { host } = this.deps;
    const { changeId, fileExtension } = this.settings;

    const files = await host.getChangedFiles(changeId);
    const headSha = await host.getHeadSha(changeId);

    return {
      id: changeId,
      headSha,
      files: selectAnalyzableFiles(files, fileExtension),
    };
  }
}
