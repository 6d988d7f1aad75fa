import { z } from 'zod';
import { Result, ok, err } from 'neverthrow';
import { Err } from '../errors/factories.js';
import type { ProcessTypeMissingError } from '../errors/app-error.js';

export const PROCESS_TYPE_ENV = 'PROCESS_TYPE';

/**
 * Matching is exact: no trimming, no case folding.
 */
export const ProcessTypeSchema = z.enum(['web', 'worker']);

export type ProcessType = z.infer<typeof ProcessTypeSchema>;

export const PROCESS_TYPES: readonly ProcessType[] = ProcessTypeSchema.options;

export type LaunchEnv = Readonly<Record<string, string | undefined>>;

/**
 * Reads PROCESS_TYPE and nothing else.
 * Unset, empty and unrecognized values all produce the same error.
 */
export function parseProcessType(env: LaunchEnv): Result<ProcessType, ProcessTypeMissingError> {
  const raw = env[PROCESS_TYPE_ENV];
  const parsed = ProcessTypeSchema.safeParse(raw);
  return parsed.success ? ok(parsed.data) : err(Err.processTypeMissing(raw));
}
