/**
 * CM Transport Configuration
 * Central configuration for server selection, connection and correlation
 */

import { Socks5ProxyConfig } from '../proxy/proxy-config.js';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];

export interface MarkerHeader {
  name: string;
  value: string;
}

export interface CmClientConfig {
  // Server selection
  directoryUrl: string;
  cmListTtlSeconds: number;

  // Connection
  cmPath: string; // path requested on every CM, e.g. '/cmsocket/'
  defaultTargetPort: number; // used when a CM endpoint carries no port
  handshakeTimeoutMs: number;
  markerHeader: MarkerHeader;
  proxy: string | null; // socks5://, socks5h:// or bare host[:port]

  // Correlation
  responseTimeoutMs: number;

  logLevel: LogLevel;
}

export const defaultConfig: CmClientConfig = {
  directoryUrl: 'https://api.steampowered.com/ISteamDirectory/GetCMListForConnect/v1/?cellid=0',
  cmListTtlSeconds: 300,

  cmPath: '/cmsocket/',
  defaultTargetPort: 443,
  handshakeTimeoutMs: 10000,
  markerHeader: { name: 'batch-test', value: 'true' },
  proxy: null,

  responseTimeoutMs: 5000,

  logLevel: 'info',
};

// Current active configuration (mutable for runtime changes)
let currentConfig: CmClientConfig = { ...defaultConfig };

export function getConfig(): CmClientConfig {
  return currentConfig;
}

export function updateConfig(partial: Partial<CmClientConfig>): void {
  currentConfig = { ...currentConfig, ...partial };
}

export function resetConfig(): void {
  currentConfig = { ...defaultConfig };
}

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

function parsePositiveInt(name: string, value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new Error(`${name} must be a positive integer, got "${value}"`);
  }
  return parsed;
}

/**
 * Read overrides from environment variables
 *
 * Recognised variables: CM_DIRECTORY_URL, CM_PROXY, CM_RESPONSE_TIMEOUT_MS,
 * CM_HANDSHAKE_TIMEOUT_MS, CM_LOG_LEVEL. Unset or empty variables are ignored.
 *
 * @param env - Environment to read from (defaults to process.env)
 * @returns Only the keys that were present
 */
export function loadConfigFromEnv(
  env: NodeJS.ProcessEnv = process.env
): Partial<CmClientConfig> {
  const overrides: Partial<CmClientConfig> = {};

  if (env.CM_DIRECTORY_URL) {
    overrides.directoryUrl = env.CM_DIRECTORY_URL;
  }
  if (env.CM_PROXY) {
    // Fail early on a malformed proxy rather than at first connect
    Socks5ProxyConfig.parse(env.CM_PROXY);
    overrides.proxy = env.CM_PROXY;
  }
  if (env.CM_RESPONSE_TIMEOUT_MS) {
    overrides.responseTimeoutMs = parsePositiveInt('CM_RESPONSE_TIMEOUT_MS', env.CM_RESPONSE_TIMEOUT_MS);
  }
  if (env.CM_HANDSHAKE_TIMEOUT_MS) {
    overrides.handshakeTimeoutMs = parsePositiveInt('CM_HANDSHAKE_TIMEOUT_MS', env.CM_HANDSHAKE_TIMEOUT_MS);
  }
  if (env.CM_LOG_LEVEL) {
    const level = env.CM_LOG_LEVEL.toLowerCase();
    if (!isLogLevel(level)) {
      throw new Error(`CM_LOG_LEVEL must be one of ${LOG_LEVELS.join(', ')}, got "${env.CM_LOG_LEVEL}"`);
    }
    overrides.logLevel = level;
  }

  return overrides;
}

/**
 * Parse the configured proxy string, if any
 */
export function getProxyConfig(): Socks5ProxyConfig | null {
  const { proxy } = getConfig();
  return proxy ? Socks5ProxyConfig.parse(proxy) : null;
}
