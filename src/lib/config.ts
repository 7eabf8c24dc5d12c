import dotenv from 'dotenv';
import {
  DEFAULT_CHUNK_COUNT,
  DEFAULT_OUTPUT_PREFIX,
  IGNORE_FILENAME,
  OUTPUT_DIR_NAME,
} from '../utils/constants.js';

// Load environment variables from .env file (if it exists)
dotenv.config();

/**
 * Default configuration values
 */
export const DEFAULT_CONFIG = {
  chunks: DEFAULT_CHUNK_COUNT,
  outputPrefix: DEFAULT_OUTPUT_PREFIX,
  outputDir: OUTPUT_DIR_NAME,
  ignoreFile: IGNORE_FILENAME,
  includeSize: false,
  debug: false,
} as const;

type Env = Record<string, string | undefined>;

function readEnv(env: Env, key: string): string | undefined {
  const value = env[key];
  return value === undefined || value === '' ? undefined : value;
}

export function getEnvString(env: Env, key: string, defaultValue: string): string {
  return readEnv(env, key) ?? defaultValue;
}

/**
 * Numeric variable; unparseable values fall back to the default
 */
export function getEnvNumber(env: Env, key: string, defaultValue: number): number {
  const value = readEnv(env, key);
  if (value === undefined) {
    return defaultValue;
  }
  const parsed = Number(value);
  return isNaN(parsed) ? defaultValue : parsed;
}

export function getEnvBoolean(env: Env, key: string, defaultValue: boolean): boolean {
  const value = readEnv(env, key);
  return value === undefined ? defaultValue : value.toLowerCase() === 'true';
}

export interface ChunkyEnvConfig {
  chunks: number;
  outputPrefix: string;
  outputDir: string;
  ignoreFile: string;
  includeSize: boolean;
  debug: boolean;
}

/**
 * Resolve configuration from an environment, falling back to defaults
 */
export function loadConfig(env: Env = process.env): ChunkyEnvConfig {
  return {
    chunks: getEnvNumber(env, 'CHUNKY_CHUNKS', DEFAULT_CONFIG.chunks),
    outputPrefix: getEnvString(env, 'CHUNKY_OUTPUT_PREFIX', DEFAULT_CONFIG.outputPrefix),
    outputDir: getEnvString(env, 'CHUNKY_OUTPUT_DIR', DEFAULT_CONFIG.outputDir),
    ignoreFile: getEnvString(env, 'CHUNKY_IGNORE_FILE', DEFAULT_CONFIG.ignoreFile),
    includeSize: getEnvBoolean(env, 'CHUNKY_INCLUDE_SIZE', DEFAULT_CONFIG.includeSize),
    debug: getEnvBoolean(env, 'CHUNKY_DEBUG', DEFAULT_CONFIG.debug),
  };
}

/**
 * Application configuration loaded from environment variables
 */
export const config = loadConfig();
