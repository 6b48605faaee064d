// Centralized configuration for the solver CLI.
// Parses and validates process.env once at startup and exposes a typed,
// frozen config object.

import dotenv from 'dotenv';
import type { TrianglePosition } from '../shared/types/board';
import { ERROR_EXIT_CODE, CliErrorCode, ConfigurationError } from './errors';
import { getEffectiveNodeEnv, parseEnv, type LogFormat, type LogLevel, type NodeEnv } from './config/env';

// Load .env into process.env before we read anything from it.
dotenv.config();

export interface AppConfig {
  nodeEnv: NodeEnv;
  isProduction: boolean;
  isTest: boolean;
  isDevelopment: boolean;
  logging: {
    level: LogLevel;
    format: LogFormat;
  };
  search: {
    startHole: TrianglePosition;
  };
  display: {
    frameDelayMs: number;
  };
}

/**
 * Build the config from a raw environment. Throws ConfigurationError listing
 * every invalid variable.
 */
export function loadConfig(rawEnv: Record<string, string | undefined>): AppConfig {
  const envResult = parseEnv(rawEnv);
  if (!envResult.success) {
    throw new ConfigurationError(envResult.errors);
  }
  const env = envResult.data;

  const nodeEnv = getEffectiveNodeEnv(env);
  const isTest = nodeEnv === 'test';

  // Keep stderr quiet unless asked; tests only surface errors.
  const level: LogLevel = env.LOG_LEVEL ?? (isTest ? 'error' : 'warn');

  return Object.freeze({
    nodeEnv,
    isProduction: nodeEnv === 'production',
    isTest,
    isDevelopment: nodeEnv === 'development',
    logging: {
      level,
      format: env.LOG_FORMAT,
    },
    search: {
      startHole: env.PEG_START_HOLE,
    },
    display: {
      frameDelayMs: env.PEG_FRAME_DELAY_MS,
    },
  });
}

function loadConfigOrExit(): AppConfig {
  try {
    return loadConfig(process.env);
  } catch (error) {
    if (error instanceof ConfigurationError) {
      console.error('❌ Invalid environment configuration:');
      for (const issue of error.issues) {
        console.error(`  - ${issue.path || 'root'}: ${issue.message}`);
      }
      process.exit(ERROR_EXIT_CODE[CliErrorCode.CONFIGURATION_ERROR]);
    }
    throw error;
  }
}

export const config: AppConfig = loadConfigOrExit();
