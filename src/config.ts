/**
 * Runtime configuration, read once from the environment
 */

import type { LogLevel } from './utils/logger.js';

export interface Config {
  // Minimum level written by the logger
  LOG_LEVEL: LogLevel;

  // Account the in-memory ledger holds pool funds under
  POOL_ACCOUNT: string;
}

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];

export function parseLogLevel(value: string | undefined): LogLevel {
  const normalized = value?.trim().toLowerCase();
  return LOG_LEVELS.find((level) => level === normalized) ?? 'info';
}

export const config: Config = {
  LOG_LEVEL: parseLogLevel(process.env.AMM_LOG_LEVEL),
  POOL_ACCOUNT: process.env.AMM_POOL_ACCOUNT ?? 'pool',
};
