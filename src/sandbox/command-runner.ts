/**
 * Sandboxed Command Runner
 * Prepares one environment per run and executes tool commands against it
 */

import * as fs from 'fs';
import * as path from 'path';
import { ANALYSIS_PACKAGES, SANDBOX_WORKDIR } from '../constants.js';
import { SandboxError, getErrorMessage } from '../utils/errors.js';
import type { Logger } from '../utils/logger.js';
import type { ExecResult, SandboxEnvironment, SandboxRuntime } from './sandbox.types.js';

export interface PrepareOptions {
  baseImage: string;
  sourceDir: string;
  excludePatterns: string[];
}

/**
 * Tooling the environment needs before any analysis runs
 */
export const SETUP_STEPS: string[][] = [
  ['pip', 'install', '--quiet', 'uv'],
  ['uv', 'pip', 'install', '--system', ...ANALYSIS_PACKAGES],
];

/**
 * Project dependency install command, picked from what the working tree ships
 */
export function projectInstallStep(sourceDir: string): string[] | undefined {
  if (fs.existsSync(path.join(sourceDir, 'requirements.txt'))) {
    return ['uv', 'pip', 'install', '--system', '-r', 'requirements.txt'];
  }
  if (fs.existsSync(path.join(sourceDir, 'pyproject.toml'))) {
    return ['uv', 'pip', 'install', '--system', '-e', '.'];
  }
  return undefined;
}

export class SandboxedCommandRunner {
  constructor(
    private readonly runtime: SandboxRuntime,
    private readonly logger: Logger,
  ) {}

  /**
   * Build the environment and install the analysis tooling once.
   * @throws SandboxError when the environment or tooling cannot be set up
   */
  async prepare(options: PrepareOptions): Promise<SandboxEnvironment> {
    let environment: SandboxEnvironment;
    try {
      environment = await this.runtime.buildEnvironment({
        image: options.baseImage,
        sourceDir: options.sourceDir,
        excludePatterns: options.excludePatterns,
        workdir: SANDBOX_WORKDIR,
      });
    } catch (error) {
      if (error instanceof SandboxError) {
        throw error;
      }
      throw new SandboxError(`Failed to build environment: ${getErrorMessage(error)}`);
    }

    this.logger.debug(`Environment ${environment.id} started from ${options.baseImage}`);

    try {
      for (const step of SETUP_STEPS) {
        const result = await this.runSetupStep(environment, step);
        if (!result.succeeded) {
          throw new SandboxError(
            `Setup step failed (exit ${result.exitCode}): ${result.stderr.trim() || result.stdout.trim()}`,
            step,
          );
        }
      }
    } catch (error) {
      await this.release(environment);
      throw error;
    }

    const installStep = projectInstallStep(options.sourceDir);
    if (installStep) {
      try {
        const result = await this.runtime.exec(environment, installStep);
        if (!result.succeeded) {
          this.logger.warn(`Dependency installation issue: ${result.stderr.trim() || `exit code ${result.exitCode}`}`);
        }
      } catch (error) {
        this.logger.warn(`Dependency installation issue: ${getErrorMessage(error)}`);
      }
    }

    return environment;
  }

  exec(environment: SandboxEnvironment, argv: string[]): Promise<ExecResult> {
    return this.runtime.exec(environment, argv);
  }

  /**
   * Tear the environment down; failures are logged only
   */
  async release(environment: SandboxEnvironment): Promise<void> {
    try {
      await this.runtime.dispose(environment);
    } catch (error) {
      this.logger.warn(`Could not dispose environment ${environment.id}: ${getErrorMessage(error)}`);
    }
  }

  private async runSetupStep(environment: SandboxEnvironment, step: string[]): Promise<ExecResult> {
    try {
      return await this.runtime.exec(environment, step);
    } catch (error) {
      throw new SandboxError(`Setup step could not run: ${getErrorMessage(error)}`, step);
    }
  }
}
