/**
 * Environment configuration
 */

import { PUMPPORTAL_URI } from './constants/feed.js';
import type { TopicId } from './types/feed.js';
import { parseCommaList } from './utils/token-list.js';

export interface MonitorConfig {
  feedEndpoint: string;
  reconnectDelayMs: number;
  maxReconnectDelayMs: number;
  backoffMultiplier: number;
  maxReconnectAttempts: number;
  handshakeTimeoutMs: number;
  sendTimeoutMs: number;
  /** 0 disables keep-alive pings */
  pingIntervalMs: number;
  discoverNewTokens: boolean;
  seedTokens: TopicId[];
  /** Token file to watch; undefined disables the watcher */
  tokenFile?: string;
  tokenFilePollMs: number;
  statsIntervalMs: number;
}

/**
 * Read an integer setting. Missing or unparsable values use the default;
 * a negative value is a configuration error.
 */
function readInt(env: NodeJS.ProcessEnv, key: string, defaultValue: number): number {
  const raw = env[key];
  if (!raw) return defaultValue;
  const parsed = parseInt(raw, 10);
  if (Number.isNaN(parsed)) return defaultValue;
  if (parsed < 0) {
    throw new Error(`${key} must not be negative (got ${raw})`);
  }
  return parsed;
}

function readFloat(env: NodeJS.ProcessEnv, key: string, defaultValue: number): number {
  const raw = env[key];
  if (!raw) return defaultValue;
  const parsed = parseFloat(raw);
  if (Number.isNaN(parsed)) return defaultValue;
  if (parsed < 0) {
    throw new Error(`${key} must not be negative (got ${raw})`);
  }
  return parsed;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): MonitorConfig {
  const tokenFile = env.TOKEN_FILE?.trim();

  return {
    feedEndpoint: env.FEED_ENDPOINT || PUMPPORTAL_URI,
    reconnectDelayMs: readInt(env, 'RECONNECT_DELAY_MS', 1000),
    maxReconnectDelayMs: readInt(env, 'MAX_RECONNECT_DELAY_MS', 30000),
    backoffMultiplier: readFloat(env, 'BACKOFF_MULTIPLIER', 2),
    maxReconnectAttempts: readInt(env, 'MAX_RECONNECT_ATTEMPTS', 10),
    handshakeTimeoutMs: readInt(env, 'HANDSHAKE_TIMEOUT_MS', 15000),
    sendTimeoutMs: readInt(env, 'SEND_TIMEOUT_MS', 5000),
    pingIntervalMs: readInt(env, 'PING_INTERVAL_MS', 20000),
    discoverNewTokens: env.DISCOVER_NEW_TOKENS !== 'false', // Enabled by default
    seedTokens: parseCommaList(env.SEED_TOKENS),
    tokenFile: tokenFile ? tokenFile : undefined,
    tokenFilePollMs: readInt(env, 'TOKEN_FILE_POLL_SECONDS', 5) * 1000,
    statsIntervalMs: readInt(env, 'STATS_INTERVAL_SECONDS', 30) * 1000,
  };
}
