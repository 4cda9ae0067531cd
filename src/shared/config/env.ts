/**
 * Environment Variable Schema and Validation
 *
 * This module defines the Zod schema for every environment variable the
 * engine reads, validates them, and exposes typed results. Nothing here
 * touches process state; see `index.ts` for the loaded config object.
 */

import { z } from 'zod';
import { isJestRuntime } from '../utils/envFlags';
import { PLAYER_COLORS } from '../types/game';
import { PlayerOrderSchema } from '../validation/schemas';

/**
 * Node environment schema.
 */
export const NodeEnvSchema = z.enum(['development', 'production', 'test']);
export type NodeEnv = z.infer<typeof NodeEnvSchema>;

/**
 * Log level schema.
 */
export const LogLevelSchema = z.enum(['error', 'warn', 'info', 'debug']);
export type LogLevel = z.infer<typeof LogLevelSchema>;

/**
 * Log format schema.
 */
export const LogFormatSchema = z.enum(['json', 'pretty']);
export type LogFormat = z.infer<typeof LogFormatSchema>;

/** `true`/`1` or `false`/`0`; unset or blank takes the default. */
const booleanFlag = (defaultValue: boolean) =>
  z
    .enum(['true', 'false', '1', '0', ''])
    .optional()
    .transform((val) => (val === undefined || val === '' ? defaultValue : val === 'true' || val === '1'));

/**
 * Complete environment variable schema with validation rules and defaults.
 */
export const EnvSchema = z.object({
  // ===================================================================
  // ENVIRONMENT
  // ===================================================================

  /** Application environment mode */
  NODE_ENV: NodeEnvSchema.default('development'),

  // ===================================================================
  // LOGGING
  // ===================================================================

  /** Minimum level emitted by the logger */
  LOG_LEVEL: LogLevelSchema.optional(),

  /** Console output format */
  LOG_FORMAT: LogFormatSchema.optional(),

  // ===================================================================
  // GAME RULES
  // ===================================================================

  /** Seating order as comma-separated colours, e.g. "blue,yellow,red,green" */
  BLOKUS_PLAYER_ORDER: z
    .string()
    .optional()
    .transform((val) =>
      val && val.trim() !== '' ? val.split(',').map((c) => c.trim().toLowerCase()) : [...PLAYER_COLORS]
    )
    .pipe(PlayerOrderSchema),

  /** Keep the selected piece after a rejected placement */
  BLOKUS_KEEP_SELECTION_ON_FAILURE: booleanFlag(true),

  /** Dump the padded board at debug level on each placement attempt */
  BLOKUS_DEBUG_BOARD: booleanFlag(false),
});

/**
 * Inferred type for raw environment variables.
 */
export type RawEnv = z.infer<typeof EnvSchema>;

/**
 * Result of environment validation.
 */
export interface EnvValidationResult {
  success: boolean;
  data?: RawEnv;
  errors?: Array<{ path: string; message: string }>;
}

/**
 * Parse and validate environment variables.
 *
 * @param env - Environment object to parse (defaults to process.env)
 */
export function parseEnv(
  env: Record<string, string | undefined> = process.env
): EnvValidationResult {
  const result = EnvSchema.safeParse(env);

  if (!result.success) {
    const errors =
      result.error.issues.length > 0
        ? result.error.issues.map((issue) => ({
            path: issue.path.join('.'),
            message: issue.message,
          }))
        : [{ path: '', message: result.error.message }];

    return {
      success: false,
      errors,
    };
  }

  return {
    success: true,
    data: result.data,
  };
}

/**
 * Determine effective node environment.
 *
 * When running under Jest, always treats the environment as 'test'
 * regardless of NODE_ENV.
 */
export function getEffectiveNodeEnv(rawEnv: RawEnv): NodeEnv {
  return isJestRuntime() ? 'test' : rawEnv.NODE_ENV;
}
