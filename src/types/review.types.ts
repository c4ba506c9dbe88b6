/**
 * Review Types
 * Core data model shared by the analysis pipeline
 */

/**
 * Identifies the pull request under review
 */
export interface ChangeId {
  /** Repository in `owner/name` form */
  repository: string;
  number: number;
}

export type ChangedFileStatus = 'added' | 'modified' | 'other';

export interface ChangedFile {
  path: string;
  status: ChangedFileStatus;
}

/**
 * The pull request snapshot a run works from. Read-only once built.
 */
export interface ChangeSet {
  readonly id: ChangeId;
  readonly headSha: string;
  /** Files of the target type with status added or modified */
  readonly files: readonly ChangedFile[];
}

/**
 * One static-analysis tool: a name and the argv it runs for a file list
 */
export interface ToolSpec {
  readonly name: string;
  readonly command: (files: readonly string[]) => string[];
}

export type ToolOutcome =
  | { kind: 'no-issues' }
  | { kind: 'issues'; output: string }
  | { kind: 'failed'; reason: string };

/**
 * Battery output. Outcome maps keep registry order.
 */
export type BatteryResult =
  | { kind: 'nothing-to-analyze'; message: string }
  | { kind: 'analyzed'; outcomes: ReadonlyMap<string, ToolOutcome> };

export interface Finding {
  file: string;
  /** 1-based */
  line: number;
  message: string;
}

/**
 * Tool name -> raw outcome text, as written to the review artifact
 */
export type RawResults = Record<string, string>;

export type ReviewState =
  | 'start'
  | 'environment-ready'
  | 'battery-complete'
  | 'report-persisted'
  | 'summary-composed'
  | 'feedback-appended'
  | 'published'
  | 'done'
  | 'errored';

export interface AnnotationResult {
  posted: number;
  failed: number;
}

export interface ReviewRunResult {
  status: 'done' | 'errored';
  exitCode: 0 | 1;
  states: ReviewState[];
  annotations: AnnotationResult;
  artifactPath?: string;
  error?: string;
}
