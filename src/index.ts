/**
 * Library entry point
 */

export { ReviewOrchestrator, type ReviewDependencies, type ReviewSettings } from './agents/review-orchestrator.js';
export { GitHubPullRequestHost, createGitHubClient } from './github/github.host.js';
export type { PullRequestHost } from './github/pull-request-host.js';
export { LangChainCompletionClient, type CompletionClient, type CompletionRequest } from './llm/completion-client.js';
export { ProviderFactory, type SupportedProvider } from './providers/index.js';
export { SandboxedCommandRunner } from './sandbox/command-runner.js';
export { DockerSandboxRuntime } from './sandbox/docker.runtime.js';
export type { SandboxRuntime, SandboxEnvironment, ExecResult } from './sandbox/sandbox.types.js';
export { AnnotationService, parseFindings } from './services/annotation.service.js';
export { ArtifactService } from './services/artifact.service.js';
export { FeedbackService, classifyModelError } from './services/feedback.service.js';
export { ReportFormatterService } from './services/report-formatter.service.js';
export { ToolBatteryExecutor } from './tools/tool-battery.js';
export { TOOL_REGISTRY } from './tools/tool-registry.js';
export * from './types/review.types.js';
export * from './utils/errors.js';
