/**
 * Annotation Service
 * Turns `path:line:column:code message` tool output into inline review comments
 */

import type { PullRequestHost } from '../github/pull-request-host.js';
import type {
  AnnotationResult,
  BatteryResult,
  ChangeSet,
  Finding,
} from '../types/review.types.js';
import { REPORT_TEXT } from '../constants.js';
import { getErrorMessage } from '../utils/errors.js';
import type { Logger } from '../utils/logger.js';

/**
 * Lines with fewer than four colon-separated segments, or a line number
 * that is not a positive integer, are skipped.
 */
export function parseFindings(output: string): Finding[] {
  const findings: Finding[] = [];

  for (const line of output.split('\n')) {
    const parts = line.split(':');
    if (parts.length < 4) {
      continue;
    }

    const lineText = parts[1].trim();
    if (!/^\d+$/.test(lineText)) {
      continue;
    }
    const lineNumber = parseInt(lineText, 10);
    if (lineNumber < 1) {
      continue;
    }

    findings.push({
      file: parts[0],
      line: lineNumber,
      message: parts.slice(3).join(':').trim(),
    });
  }

  return findings;
}

export class AnnotationService {
  constructor(
    private readonly host: PullRequestHost,
    private readonly logger: Logger,
  ) {}

  /**
   * Findings of the designated tool, or none when it has no issues output
   */
  static findingsFor(result: BatteryResult, tool: string): Finding[] {
    if (result.kind !== 'analyzed') {
      return [];
    }
    const outcome = result.outcomes.get(tool);
    if (!outcome || outcome.kind !== 'issues') {
      return [];
    }
    return parseFindings(outcome.output);
  }

  /**
   * Post one inline comment per finding. A failed post is logged and skipped.
   */
  async annotate(changeSet: ChangeSet, findings: Finding[]): Promise<AnnotationResult> {
    const result: AnnotationResult = { posted: 0, failed: 0 };

    for (const finding of findings) {
      try {
        await this.host.postLineComment(
          changeSet.id,
          changeSet.headSha,
          finding.file,
          finding.line,
          REPORT_TEXT.ANNOTATION(finding.message),
        );
        result.posted++;
      } catch (error) {
        result.failed++;
        this.logger.warn(
          `Could not create line comment on ${finding.file}:${finding.line}: ${getErrorMessage(error)}`,
        );
      }
    }

    return result;
  }
}
