/**
 * Docker Sandbox Runtime
 * Runs analysis commands inside a long-lived container via the Docker CLI
 */

import { execFile } from 'child_process';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { DEFAULT_MAX_BUFFER } from '../constants.js';
import { SandboxError } from '../utils/errors.js';
import type { EnvironmentSpec, ExecResult, SandboxEnvironment, SandboxRuntime } from './sandbox.types.js';

export interface ProcessResult {
  stdout: string;
  stderr: string;
  exitCode: number;
}

/**
 * Runs a binary and resolves with its output for any exit status
 */
export type CommandExecutor = (file: string, args: string[]) => Promise<ProcessResult>;

export const execFileCommand: CommandExecutor = (file, args) =>
  new Promise((resolve, reject) => {
    execFile(
      file,
      args,
      { encoding: 'utf-8', maxBuffer: DEFAULT_MAX_BUFFER },
      (error, stdout, stderr) => {
        if (!error) {
          resolve({ stdout, stderr, exitCode: 0 });
          return;
        }
        const code: unknown = error.code;
        if (typeof code === 'number') {
          resolve({ stdout, stderr, exitCode: code });
          return;
        }
        reject(error);
      },
    );
  });

/**
 * True when any segment of `relativePath` matches a pattern.
 * Patterns are plain names (`.git`) or suffix globs (`*.pyc`).
 */
export function matchesExcludePattern(relativePath: string, patterns: string[]): boolean {
  if (!relativePath) {
    return false;
  }
  const segments = relativePath.split(/[\\/]/).filter(Boolean);
  return segments.some((segment) =>
    patterns.some((pattern) =>
      pattern.startsWith('*') ? segment.endsWith(pattern.slice(1)) : segment === pattern,
    ),
  );
}

/**
 * Copy `sourceDir` into a fresh temp directory, skipping excluded entries
 */
export async function createSnapshot(sourceDir: string, excludePatterns: string[]): Promise<string> {
  const snapshotDir = await fs.promises.mkdtemp(path.join(os.tmpdir(), 'pr-review-src-'));
  await fs.promises.cp(sourceDir, snapshotDir, {
    recursive: true,
    filter: (source) => !matchesExcludePattern(path.relative(sourceDir, source), excludePatterns),
  });
  return snapshotDir;
}

export class DockerSandboxRuntime implements SandboxRuntime {
  private snapshots = new Map<string, string>();

  constructor(
    private readonly run: CommandExecutor = execFileCommand,
    private readonly dockerBinary: string = 'docker',
  ) {}

  async buildEnvironment(spec: EnvironmentSpec): Promise<SandboxEnvironment> {
    const snapshotDir = await createSnapshot(spec.sourceDir, spec.excludePatterns);
    const args = [
      'run',
      '--detach',
      '--rm',
      '--volume',
      `${snapshotDir}:${spec.workdir}`,
      '--workdir',
      spec.workdir,
      spec.image,
      'sleep',
      'infinity',
    ];

    let result: ProcessResult;
    try {
      result = await this.run(this.dockerBinary, args);
    } catch (error) {
      await fs.promises.rm(snapshotDir, { recursive: true, force: true });
      throw error;
    }

    if (result.exitCode !== 0) {
      await fs.promises.rm(snapshotDir, { recursive: true, force: true });
      throw new SandboxError(
        `Failed to start container from ${spec.image}: ${result.stderr.trim() || `exit code ${result.exitCode}`}`,
        [this.dockerBinary, ...args],
      );
    }

    const id = result.stdout.trim();
    this.snapshots.set(id, snapshotDir);
    return { id, workdir: spec.workdir };
  }

  async exec(environment: SandboxEnvironment, argv: string[]): Promise<ExecResult> {
    const result = await this.run(this.dockerBinary, [
      'exec',
      '--workdir',
      environment.workdir,
      environment.id,
      ...argv,
    ]);
    return { ...result, succeeded: result.exitCode === 0 };
  }

  async dispose(environment: SandboxEnvironment): Promise<void> {
    try {
      await this.run(this.dockerBinary, ['rm', '--force', environment.id]);
    } finally {
      const snapshotDir = this.snapshots.get(environment.id);
      if (snapshotDir) {
        this.snapshots.delete(environment.id);
        await fs.promises.rm(snapshotDir, { recursive: true, force: true });
      }
    }
  }
}
