/**
 * Launcher configuration - parse, don't validate.
 *
 * - Zod validates the environment at the boundary and returns typed data
 * - A value that fails validation is reported and replaced by its default;
 *   launcher settings never stop a launch
 *
 * PROCESS_TYPE is deliberately absent: the branch decision is parsed on its
 * own by `launch/process-type.ts` so nothing here can influence it.
 */

import { z } from 'zod';
import type { ConfigIssue, ValidatedAppConfig } from '../errors/app-error.js';
import { LOG_LEVELS, LOG_LEVEL_ENV } from '../core/logging/types.js';
import type { LogLevel } from '../core/logging/types.js';

export interface AppConfig {
  readonly logging: { readonly level: LogLevel };
}

export type ValidatedConfig = ValidatedAppConfig<AppConfig>;

export interface LoadConfigOptions {
  readonly env: Readonly<Record<string, string | undefined>>;
}

export interface LoadedConfig {
  readonly config: ValidatedConfig;
  /** Settings that were rejected and replaced by their defaults. */
  readonly ignored: readonly ConfigIssue[];
}

const DEFAULT_CONFIG: AppConfig = {
  logging: { level: 'silent' },
};

// =============================================================================
// Schema (single source of truth for validation + types)
// =============================================================================

const EnvSchema = z.object({
  [LOG_LEVEL_ENV]: z
    .string()
    .optional()
    .transform((v) => v?.trim().toLowerCase())
    .pipe(
      z
        .enum(LOG_LEVELS, { errorMap: () => ({ message: `${LOG_LEVEL_ENV} must be one of: ${LOG_LEVELS.join(', ')}` }) })
        .default('silent')
    ),
});

type ParsedEnv = z.infer<typeof EnvSchema>;

// =============================================================================
// Public API
// =============================================================================

export function loadConfig(options: LoadConfigOptions): LoadedConfig {
  const parsed = EnvSchema.safeParse(options.env);

  if (!parsed.success) {
    return { config: createValidatedConfig(DEFAULT_CONFIG), ignored: toConfigIssues(parsed.error) };
  }

  return { config: createValidatedConfig(buildConfig(parsed.data)), ignored: [] };
}

/**
 * Tests and local construction only: creates a validated config without env parsing.
 * (Still branded as validated to prevent accidentally passing raw objects.)
 */
export function createValidatedConfig(value: AppConfig): ValidatedConfig {
  return value as ValidatedConfig;
}

// =============================================================================
// Internal
// =============================================================================

function buildConfig(env: ParsedEnv): AppConfig {
  return {
    logging: { level: env[LOG_LEVEL_ENV] },
  };
}

function toConfigIssues(error: z.ZodError): readonly ConfigIssue[] {
  return error.errors.map((issue) => ({
    path: issue.path.length ? issue.path.join('.') : '(root)',
    message: issue.message,
  }));
}
