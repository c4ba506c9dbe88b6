/**
 * Static-analysis tool registry
 * Order here is the order of every report and artifact
 */

import type { ToolSpec } from '../types/review.types.js';

export const TOOL_REGISTRY: readonly ToolSpec[] = Object.freeze([
  { name: 'flake8', command: (files) => ['flake8', ...files] },
  { name: 'black', command: (files) => ['black', '--check', '--diff', ...files] },
  { name: 'mypy', command: (files) => ['mypy', ...files] },
  { name: 'bandit', command: (files) => ['bandit', '-r', ...files] },
  { name: 'isort', command: (files) => ['isort', '--check-only', '--diff', ...files] },
]);

export function getToolNames(registry: readonly ToolSpec[] = TOOL_REGISTRY): string[] {
  return registry.map((tool) => tool.name);
}
