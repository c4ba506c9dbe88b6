/**
 * Configuration validation using Zod
 */

import { z } from 'zod';
import { SUPPORTED_PROVIDERS } from '../providers/provider.factory.js';
import { getToolNames } from '../tools/tool-registry.js';
import { ConfigurationError } from './errors.js';

/**
 * Zod schema for `.prreview.config.json`
 */
export const UserConfigSchema = z.object({
  apiKeys: z
    .object({
      openai: z.string().optional(),
      openrouter: z.string().optional(),
    })
    .optional(),
  ai: z
    .object({
      provider: z.enum(SUPPORTED_PROVIDERS).optional(),
      model: z.string().min(1).optional(),
      temperature: z.number().min(0).max(2).optional(),
      maxTokens: z.number().int().positive().optional(),
    })
    .optional(),
  review: z
    .object({
      baseImage: z.string().min(1).optional(),
      fileExtension: z
        .string()
        .regex(/^\.[A-Za-z0-9]+$/, 'must look like ".py"')
        .optional(),
      excludePatterns: z.array(z.string().min(1)).optional(),
      parallel: z.boolean().optional(),
      artifactDir: z.string().min(1).optional(),
      annotationTool: z
        .string()
        .refine((name) => getToolNames().includes(name), {
          message: `must be one of: ${getToolNames().join(', ')}`,
        })
        .optional(),
    })
    .optional(),
  feedback: z
    .object({
      enabled: z.boolean().optional(),
    })
    .optional(),
  output: z
    .object({
      verbose: z.boolean().optional(),
    })
    .optional(),
});

export type UserConfig = z.infer<typeof UserConfigSchema>;

/**
 * Validate configuration object
 */
export function validateConfig(config: unknown): {
  success: boolean;
  errors: string[];
  sanitizedConfig?: UserConfig;
} {
  const result = UserConfigSchema.safeParse(config);
  if (result.success) {
    return { success: true, errors: [], sanitizedConfig: result.data };
  }
  return {
    success: false,
    errors: result.error.issues.map((issue) => {
      const location = issue.path.map(String).join('.');
      return location ? `${location}: ${issue.message}` : issue.message;
    }),
  };
}

/**
 * Validate and throw if invalid
 */
export function validateConfigOrThrow(config: unknown, configPath?: string): UserConfig {
  const { success, errors, sanitizedConfig } = validateConfig(config);
  if (!success || !sanitizedConfig) {
    throw new ConfigurationError(
      `Invalid configuration${configPath ? ` in ${configPath}` : ''}`,
      errors,
    );
  }
  return sanitizedConfig;
}
