/**
 * GitHub Pull Request Host
 * Implements PullRequestHost on top of Probot's Octokit
 */

import { ProbotOctokit } from 'probot';
import { PATCH_UNAVAILABLE_NOTE } from '../constants.js';
import type { ChangeId, ChangedFile, ChangedFileStatus } from '../types/review.types.js';
import { GitHubAPIError, getErrorMessage, getErrorStatus } from '../utils/errors.js';
import type { PullRequestHost } from './pull-request-host.js';

export type GitHubClient = InstanceType<typeof ProbotOctokit>;

export function createGitHubClient(token: string): GitHubClient {
  return new ProbotOctokit({ auth: { token } });
}

export function splitRepository(repository: string): { owner: string; repo: string } {
  const [owner, repo] = repository.split('/');
  return { owner, repo };
}

export function toChangedFileStatus(status: string): ChangedFileStatus {
  return status === 'added' || status === 'modified' ? status : 'other';
}

interface PullRequestFile {
  filename: string;
  status: string;
  patch?: string;
}

/**
 * Assemble a unified diff from per-file patches
 */
export function buildDiffFromFiles(files: PullRequestFile[]): string {
  return files
    .map((file) => {
      const from = file.status === 'added' ? '/dev/null' : `a/${file.filename}`;
      const to = file.status === 'removed' ? '/dev/null' : `b/${file.filename}`;
      const header = `diff --git a/${file.filename} b/${file.filename}`;
      if (!file.patch) {
        return `${header}\n--- ${from}\n+++ ${to}\n${PATCH_UNAVAILABLE_NOTE}`;
      }
      return `${header}\n--- ${from}\n+++ ${to}\n${file.patch}`;
    })
    .join('\n');
}

export class GitHubPullRequestHost implements PullRequestHost {
  constructor(private readonly octokit: GitHubClient) {}

  async getChangedFiles(id: ChangeId): Promise<ChangedFile[]> {
    const files = await this.listFiles(id);
    return files.map((file) => ({ path: file.filename, status: toChangedFileStatus(file.status) }));
  }

  async getHeadSha(id: ChangeId): Promise<string> {
    return this.call('pulls.get', async () => {
      const { data } = await this.octokit.rest.pulls.get({
        ...splitRepository(id.repository),
        pull_number: id.number,
      });
      return data.head.sha;
    });
  }

  async getDiff(id: ChangeId): Promise<string> {
    return buildDiffFromFiles(await this.listFiles(id));
  }

  async postComment(id: ChangeId, body: string): Promise<void> {
    await this.call('issues.createComment', () =>
      this.octokit.rest.issues.createComment({
        ...splitRepository(id.repository),
        issue_number: id.number,
        body,
      }),
    );
  }

  async postLineComment(
    id: ChangeId,
    commitSha: string,
    path: string,
    line: number,
    body: string,
  ): Promise<void> {
    await this.call('pulls.createReviewComment', () =>
      this.octokit.rest.pulls.createReviewComment({
        ...splitRepository(id.repository),
        pull_number: id.number,
        commit_id: commitSha,
        path,
        line,
        side: 'RIGHT',
        body,
      }),
    );
  }

  private listFiles(id: ChangeId): Promise<PullRequestFile[]> {
    return this.call('pulls.listFiles', () =>
      this.octokit.paginate(this.octokit.rest.pulls.listFiles, {
        ...splitRepository(id.repository),
        pull_number: id.number,
        per_page: 100,
      }),
    );
  }

  private async call<T>(operation: string, request: () => Promise<T>): Promise<T> {
    try {
      return await request();
    } catch (error) {
      throw new GitHubAPIError(
        `GitHub ${operation} failed: ${getErrorMessage(error)}`,
        operation,
        getErrorStatus(error),
      );
    }
  }
}
