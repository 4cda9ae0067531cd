/**
 * Configuration Module - Canonical Entry Point
 *
 * Usage:
 *   import { config } from '../config';
 *
 * Architecture:
 * - `env.ts` - Raw environment variable schema definitions
 * - `index.ts` (this file) - Config assembly and the loaded `config` object
 */

import dotenv from 'dotenv';
import { InvalidConfigurationError } from '../errors';
import type { PlayerColor } from '../types/game';
import { isJestRuntime, isTestEnvironment } from '../utils/envFlags';
import { getEffectiveNodeEnv, LogFormat, LogLevel, NodeEnv, parseEnv } from './env';

export interface AppConfig {
  nodeEnv: NodeEnv;
  isTest: boolean;
  logging: {
    level: LogLevel;
    format: LogFormat;
    /** True when LOG_LEVEL was set explicitly rather than defaulted. */
    levelExplicit: boolean;
  };
  game: {
    /** Seating order used when a host does not supply its own roster. */
    playerOrder: readonly PlayerColor[];
    keepSelectionOnFailure: boolean;
    debugBoard: boolean;
  };
}

/**
 * Assemble a typed config from an environment map.
 * Throws {@link InvalidConfigurationError} when validation fails.
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env
): Readonly<AppConfig> {
  const envResult = parseEnv(env);
  if (!envResult.success || !envResult.data) {
    throw new InvalidConfigurationError(envResult.errors ?? []);
  }
  const raw = envResult.data;

  const nodeEnv = getEffectiveNodeEnv(raw);
  const isProduction = nodeEnv === 'production';

  const assembled: AppConfig = {
    nodeEnv,
    isTest: nodeEnv === 'test',
    logging: {
      level: raw.LOG_LEVEL ?? (isProduction ? 'info' : 'debug'),
      format: raw.LOG_FORMAT ?? (isProduction ? 'json' : 'pretty'),
      levelExplicit: raw.LOG_LEVEL !== undefined,
    },
    game: {
      playerOrder: Object.freeze([...raw.BLOKUS_PLAYER_ORDER]),
      keepSelectionOnFailure: raw.BLOKUS_KEEP_SELECTION_ON_FAILURE,
      debugBoard: raw.BLOKUS_DEBUG_BOARD,
    },
  };

  return Object.freeze(assembled);
}

// Load .env into process.env before we read anything from it.
// Skip in test mode so a developer's .env cannot leak into test runs.
if (!isTestEnvironment() && !isJestRuntime()) {
  dotenv.config();
}

export const config: Readonly<AppConfig> = loadConfig();

export {
  EnvSchema,
  NodeEnvSchema,
  LogLevelSchema,
  LogFormatSchema,
  parseEnv,
  getEffectiveNodeEnv,
} from './env';

export type { RawEnv, EnvValidationResult, NodeEnv, LogLevel, LogFormat } from './env';
