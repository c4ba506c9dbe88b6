/**
 * Artifact Service
 * Persists the raw per-tool results of a run as `review-<pr>.json`
 */

import * as fs from 'fs';
import * as path from 'path';
import type { BatteryResult, RawResults } from '../types/review.types.js';
import { ARTIFACT_FILE_NAME, REPORT_TEXT } from '../constants.js';

export class ArtifactService {
  constructor(private readonly outputDir: string) {}

  /**
   * Tool name -> raw outcome text; the empty-change sentinel becomes `{ info }`
   */
  static toRawResults(result: BatteryResult): RawResults {
    if (result.kind === 'nothing-to-analyze') {
      return { info: result.message };
    }

    const raw: RawResults = {};
    for (const [tool, outcome] of result.outcomes) {
      switch (outcome.kind) {
        case 'no-issues':
          raw[tool] = REPORT_TEXT.NO_ISSUES(tool);
          break;
        case 'failed':
          raw[tool] = REPORT_TEXT.TOOL_FAILED(tool, outcome.reason);
          break;
        case 'issues':
          raw[tool] = outcome.output;
          break;
      }
    }
    return raw;
  }

  /**
   * @returns path of the written file
   */
  async write(prNumber: number, result: BatteryResult): Promise<string> {
    const filePath = path.join(this.outputDir, ARTIFACT_FILE_NAME(prNumber));
    await fs.promises.mkdir(this.outputDir, { recursive: true });
    await fs.promises.writeFile(filePath, JSON.stringify(ArtifactService.toRawResults(result), null, 2), 'utf-8');
    return filePath;
  }
}
