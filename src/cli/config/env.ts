/**
 * Environment Variable Schema and Validation
 *
 * This module defines the Zod schema for every environment variable the
 * solver reads, validates them once at startup and exports the typed result.
 */

import { z } from 'zod';
import { DEFAULT_START_HOLE } from '../../shared/engine/boardState';
import { isValidTrianglePosition } from '../../shared/engine/geometry';
import type { TrianglePosition } from '../../shared/types/board';
import { isJestRuntime } from '../../shared/utils/envFlags';

export const NodeEnvSchema = z.enum(['development', 'production', 'test']);
export type NodeEnv = z.infer<typeof NodeEnvSchema>;

export const LogLevelSchema = z.enum(['error', 'warn', 'info', 'debug']);
export type LogLevel = z.infer<typeof LogLevelSchema>;

export const LogFormatSchema = z.enum(['json', 'pretty']);
export type LogFormat = z.infer<typeof LogFormatSchema>;

/**
 * Starting hole as `row,position`, both 1-based (`1,1` is the apex).
 */
export const StartHoleSchema = z
  .string()
  .trim()
  .regex(/^\d+\s*,\s*\d+$/, 'Expected row,position (for example 3,2)')
  .transform((value, ctx): TrianglePosition => {
    const [row, position] = value.split(',').map((part) => Number.parseInt(part.trim(), 10));
    const hole = { row, position };
    if (!isValidTrianglePosition(hole)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: 'Position is outside the 5-row triangle',
      });
      return z.NEVER;
    }
    return hole;
  });

/** `PEG_START_HOLE` value for the engine's default starting hole. */
export const DEFAULT_START_HOLE_ENV = `${DEFAULT_START_HOLE.row},${DEFAULT_START_HOLE.position}`;

export const EnvSchema = z.object({
  /** Application environment mode */
  NODE_ENV: NodeEnvSchema.default('development'),

  /** Minimum log level; defaults depend on NODE_ENV */
  LOG_LEVEL: LogLevelSchema.optional(),

  /** Log output format */
  LOG_FORMAT: LogFormatSchema.default('pretty'),

  /** Empty hole of the starting board */
  PEG_START_HOLE: StartHoleSchema.default(DEFAULT_START_HOLE_ENV),

  /** Pause after each frame in visual mode, in milliseconds */
  PEG_FRAME_DELAY_MS: z.coerce.number().int().min(0).max(60000).default(1000),
});

export type RawEnv = z.infer<typeof EnvSchema>;

export interface EnvValidationError {
  path: string;
  message: string;
}

export type EnvValidationResult =
  | { success: true; data: RawEnv }
  | { success: false; errors: EnvValidationError[] };

export function parseEnv(env: Record<string, string | undefined>): EnvValidationResult {
  const result = EnvSchema.safeParse(env);

  if (!result.success) {
    return {
      success: false,
      errors: result.error.issues.map((issue) => ({
        path: issue.path.join('.'),
        message: issue.message,
      })),
    };
  }

  return {
    success: true,
    data: result.data,
  };
}

/**
 * Jest always defines JEST_WORKER_ID; treat that as the test environment
 * even when a local .env sets NODE_ENV to something else.
 */
export function getEffectiveNodeEnv(rawEnv: RawEnv): NodeEnv {
  return isJestRuntime() ? 'test' : rawEnv.NODE_ENV;
}
