/**
 * Pull-request hosting contract used by the review pipeline
 */

import type { ChangeId, ChangedFile } from '../types/review.types.js';

export interface PullRequestHost {
  getChangedFiles(id: ChangeId): Promise<ChangedFile[]>;
  getHeadSha(id: ChangeId): Promise<string>;
  /** Unified diff of the whole change */
  getDiff(id: ChangeId): Promise<string>;
  postComment(id: ChangeId, body: string): Promise<void>;
  postLineComment(
    id: ChangeId,
    commitSha: string,
    path: string,
    line: number,
    body: string,
  ): Promise<void>;
}
