/**
 * Sandbox runtime contract
 */

export interface EnvironmentSpec {
  image: string;
  /** Host directory whose filtered snapshot is mounted into the sandbox */
  sourceDir: string;
  excludePatterns: string[];
  workdir: string;
}

export interface SandboxEnvironment {
  id: string;
  workdir: string;
}

export interface ExecResult {
  stdout: string;
  stderr: string;
  exitCode: number;
  succeeded: boolean;
}

/**
 * Builds isolated environments and runs commands in them.
 * `exec` resolves for any exit status and rejects only when the command could not be run.
 */
export interface SandboxRuntime {
  buildEnvironment(spec: EnvironmentSpec): Promise<SandboxEnvironment>;
  exec(environment: SandboxEnvironment, argv: string[]): Promise<ExecResult>;
  dispose(environment: SandboxEnvironment): Promise<void>;
}
