import dotenv from 'dotenv';
import { logger } from '../observability/logger.js';
import type { LogThreshold } from '../observability/logger.js';

export const TREE_LIMITS = {
  DEFAULT_HEIGHT: 32,
  MAX_TREE_HEIGHT: 256,
} as const;

export interface TreeConfig {
  defaultHeight: number;
  /** 0 means the store may grow without bound. */
  maxStoreNodes: number;
  logLevel: LogThreshold;
  verifyInvariants: boolean;
}

type Env = Record<string, string | undefined>;

const LOG_LEVELS: readonly LogThreshold[] = ['info', 'warn', 'error', 'silent'];

let dotenvLoaded = false;
let cachedConfig: TreeConfig | null = null;

function parseNonNegativeInt(
  name: string,
  value: string | undefined,
  fallback: number,
  max = Number.MAX_SAFE_INTEGER
): number {
  if (value === undefined || value.trim() === '') return fallback;

  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0 || parsed > max) {
    logger.warn('config', `Invalid ${name}, using default`, { value, fallback });
    return fallback;
  }
  return parsed;
}

function parseLogLevel(value: string | undefined): LogThreshold {
  if (!value) return 'info';

  const normalized = value.trim().toLowerCase();
  const match = LOG_LEVELS.find(level => level === normalized);
  if (!match) {
    logger.warn('config', 'Invalid SMT_LOG_LEVEL, using default', { value, fallback: 'info' });
    return 'info';
  }
  return match;
}

/**
 * Read tree configuration from the environment. A `.env` file in the working
 * directory is loaded the first time the process environment is used.
 */
export function loadTreeConfig(env?: Env): TreeConfig {
  if (!env && !dotenvLoaded) {
    dotenv.config();
    dotenvLoaded = true;
  }
  const source: Env = env ?? process.env;

  return {
    defaultHeight: parseNonNegativeInt(
      'SMT_DEFAULT_HEIGHT',
      source.SMT_DEFAULT_HEIGHT,
      TREE_LIMITS.DEFAULT_HEIGHT,
      TREE_LIMITS.MAX_TREE_HEIGHT
    ),
    maxStoreNodes: parseNonNegativeInt('SMT_MAX_STORE_NODES', source.SMT_MAX_STORE_NODES, 0),
    logLevel: parseLogLevel(source.SMT_LOG_LEVEL),
    verifyInvariants: source.SMT_VERIFY_INVARIANTS === 'true',
  };
}

export function getTreeConfig(): TreeConfig {
  if (!cachedConfig) {
    cachedConfig = loadTreeConfig();
    logger.setLevel(cachedConfig.logLevel);
  }
  return cachedConfig;
}

export function resetTreeConfig(): void {
  cachedConfig = null;
  logger.setLevel('info');
}
