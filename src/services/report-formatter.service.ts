/**
 * Report Formatter Service
 * Renders classified tool outcomes into the summary comment body
 * Single Responsibility: pure text construction, never throws
 */

import type { BatteryResult, ToolOutcome } from '../types/review.types.js';
import { REPORT_OUTPUT_LIMIT, REPORT_TEXT, REPORT_TRUNCATION_MARKER } from '../constants.js';
import { truncate } from '../utils/truncate.js';

export interface ReportOptions {
  generatedAt: Date;
  outputLimit?: number;
}

const FOOTER_BLOCK = `---\n${REPORT_TEXT.FOOTER}`;

/**
 * Code fence one backtick longer than the longest backtick run in the body, minimum three
 */
export function fenceFor(body: string): string {
  const longestRun = Math.max(0, ...(body.match(/`+/g) ?? []).map((run) => run.length));
  return '`'.repeat(Math.max(3, longestRun + 1));
}

export class ReportFormatterService {
  /**
   * `2026-01-31 09:05:00 UTC`
   */
  static formatTimestamp(date: Date): string {
    return `${date.toISOString().replace('T', ' ').substring(0, 19)} UTC`;
  }

  static formatToolSection(
    tool: string,
    outcome: ToolOutcome,
    outputLimit: number = REPORT_OUTPUT_LIMIT,
  ): string {
    const label = `**${tool.toUpperCase()}**`;

    switch (outcome.kind) {
      case 'no-issues':
        return `${label}: ${REPORT_TEXT.NO_ISSUES(tool)}\n`;
      case 'failed':
        return `${label}: ${REPORT_TEXT.TOOL_FAILED(tool, outcome.reason)}\n`;
      case 'issues': {
        const body = truncate(outcome.output, outputLimit, REPORT_TRUNCATION_MARKER);
        const fence = fenceFor(body);
        return [`${label}:`, fence, body, fence, ''].join('\n');
      }
    }
  }

  static formatReport(result: BatteryResult, options: ReportOptions): string {
    const lines: string[] = [];

    // Header: the timestamp is the only line that varies between identical inputs
    lines.push(REPORT_TEXT.TITLE);
    lines.push('');
    lines.push(REPORT_TEXT.GENERATED_ON(this.formatTimestamp(options.generatedAt)));
    lines.push('');
    lines.push(REPORT_TEXT.RESULTS_HEADER);
    lines.push('');

    if (result.kind === 'nothing-to-analyze') {
      lines.push(`ℹ️ ${result.message}`);
      lines.push('');
    } else {
      for (const [tool, outcome] of result.outcomes) {
        lines.push(this.formatToolSection(tool, outcome, options.outputLimit));
      }
    }

    lines.push(FOOTER_BLOCK);

    return lines.join('\n');
  }

  /**
   * Insert the feedback section (narrative or a one-line failure) above the footer
   */
  static appendFeedback(report: string, feedback: string): string {
    const section = `${REPORT_TEXT.FEEDBACK_HEADER}\n\n${feedback}\n\n`;
    if (report.endsWith(FOOTER_BLOCK)) {
      return report.slice(0, report.length - FOOTER_BLOCK.length) + section + FOOTER_BLOCK;
    }
    return `${report}\n\n${section}`;
  }
}
