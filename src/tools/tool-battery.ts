/**
 * Tool Battery Executor
 * Runs every registered tool once and classifies what it produced.
 * A single tool never aborts the batch: each one ends as exactly one ToolOutcome.
 */

import type { ExecResult, SandboxEnvironment } from '../sandbox/sandbox.types.js';
import type {
  BatteryResult,
  ChangedFile,
  ToolOutcome,
  ToolSpec,
} from '../types/review.types.js';
import { REPORT_TEXT } from '../constants.js';
import { getErrorMessage } from '../utils/errors.js';
import type { Logger } from '../utils/logger.js';
import { TOOL_REGISTRY } from './tool-registry.js';

export interface CommandRunner {
  exec(environment: SandboxEnvironment, argv: string[]): Promise<ExecResult>;
}

/**
 * Hands out the prepared environment; only asked for when there is work to do
 */
export interface EnvironmentSource {
  acquire(): Promise<SandboxEnvironment>;
}

export interface BatteryOptions {
  fileExtension: string;
  /** Run tools concurrently against the shared environment */
  parallel?: boolean;
}

/**
 * Keep files of the target type that were added or modified
 */
export function selectAnalyzableFiles(files: readonly ChangedFile[], extension: string): ChangedFile[] {
  return files.filter(
    (file) =>
      file.path.endsWith(extension) && (file.status === 'added' || file.status === 'modified'),
  );
}

function shellQuote(arg: string): string {
  return `'${arg.replace(/'/g, `'\\''`)}'`;
}

/**
 * Wraps argv so stderr and the exit status both land in stdout
 */
export function buildFallbackCommand(argv: string[]): string[] {
  return ['sh', '-c', `${argv.map(shellQuote).join(' ')} 2>&1; echo "exit code: $?"`];
}

/**
 * Any non-empty stdout counts as findings, whatever the exit status.
 * Returns undefined when the run failed without usable output.
 */
export function classifyExecResult(result: ExecResult): ToolOutcome | undefined {
  if (result.stdout.trim()) {
    return { kind: 'issues', output: result.stdout };
  }
  if (result.succeeded) {
    return { kind: 'no-issues' };
  }
  return undefined;
}

const FALLBACK_STATUS_LINE = /(?:^|\n)exit code: (\d+)\s*$/;

export interface FallbackOutput {
  output: string;
  /** Undefined when the status line is missing */
  exitCode?: number;
}

/**
 * Separate the tool's own output from the trailing status line the fallback appends
 */
export function parseFallbackOutput(stdout: string): FallbackOutput {
  const match = FALLBACK_STATUS_LINE.exec(stdout);
  if (!match) {
    return { output: stdout };
  }
  const end = match[0].startsWith('\n') ? match.index + 1 : match.index;
  return { output: stdout.slice(0, end), exitCode: Number(match[1]) };
}

export class ToolBatteryExecutor {
  constructor(
    private readonly runner: CommandRunner,
    private readonly logger: Logger,
    private readonly registry: readonly ToolSpec[] = TOOL_REGISTRY,
  ) {}

  async run(
    files: readonly ChangedFile[],
    source: EnvironmentSource,
    options: BatteryOptions,
  ): Promise<BatteryResult> {
    const paths = selectAnalyzableFiles(files, options.fileExtension).map((file) => file.path);

    if (paths.length === 0) {
      this.logger.info('No files to analyze, skipping tool battery');
      return { kind: 'nothing-to-analyze', message: REPORT_TEXT.NO_FILES(options.fileExtension) };
    }

    const environment = await source.acquire();
    this.logger.info(`Running ${this.registry.length} tools on ${paths.length} file(s)`);

    let results: ToolOutcome[];
    if (options.parallel) {
      results = await Promise.all(this.registry.map((tool) => this.runTool(environment, tool, paths)));
    } else {
      results = [];
      for (const tool of this.registry) {
        results.push(await this.runTool(environment, tool, paths));
      }
    }

    const outcomes = new Map<string, ToolOutcome>();
    this.registry.forEach((tool, index) => {
      outcomes.set(tool.name, results[index]);
    });

    return { kind: 'analyzed', outcomes };
  }

  /**
   * Never rejects
   */
  async runTool(
    environment: SandboxEnvironment,
    tool: ToolSpec,
    files: readonly string[],
  ): Promise<ToolOutcome> {
    const argv = tool.command(files);
    let primaryFailure: string;

    try {
      const result = await this.runner.exec(environment, argv);
      const outcome = classifyExecResult(result);
      if (outcome) {
        this.logger.debug(`${tool.name}: ${outcome.kind}`);
        return outcome;
      }
      primaryFailure = result.stderr.trim() || `exit code ${result.exitCode}`;
    } catch (error) {
      primaryFailure = getErrorMessage(error);
    }

    this.logger.warn(`${tool.name} produced no usable output (${primaryFailure}), retrying through shell`);

    try {
      const fallback = await this.runner.exec(environment, buildFallbackCommand(argv));
      const { output, exitCode } = parseFallbackOutput(fallback.stdout);
      if (output.trim()) {
        return { kind: 'issues', output };
      }
      if (exitCode === 0) {
        return { kind: 'no-issues' };
      }
      this.logger.error(`${tool.name} failed: ${primaryFailure}`);
      return { kind: 'failed', reason: primaryFailure };
    } catch (error) {
      const reason = `${primaryFailure}; fallback failed: ${getErrorMessage(error)}`;
      this.logger.error(`${tool.name} failed: ${reason}`);
      return { kind: 'failed', reason };
    }
  }
}
