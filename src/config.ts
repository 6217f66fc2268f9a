/**
 * Runtime configuration read from the Vite environment
 */

import { ConfigError } from './services/errors';

export interface AppConfig {
  apiBaseUrl: string;
  timeoutMs: number;
}

export type EnvSource = Record<string, string | boolean | undefined>;

export const DEFAULT_TIMEOUT_MS = 30_000;

const readString = (env: EnvSource, key: string): string | undefined => {
  const value = env[key];
  return typeof value === 'string' && value.trim().length > 0 ? value.trim() : undefined;
};

/**
 * Build the app config, failing on a missing or malformed value.
 * Trailing slashes are dropped from the base URL so endpoints can be appended.
 */
export function loadConfig(env: EnvSource = import.meta.env): AppConfig {
  const rawUrl = readString(env, 'VITE_RECOMMENDATION_API_URL');
  if (!rawUrl) {
    throw new ConfigError('VITE_RECOMMENDATION_API_URL', 'VITE_RECOMMENDATION_API_URL is not set');
  }

  let parsed: URL;
  try {
    parsed = new URL(rawUrl);
  } catch {
    throw new ConfigError('VITE_RECOMMENDATION_API_URL', `Invalid API URL: ${rawUrl}`);
  }
  if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
    throw new ConfigError('VITE_RECOMMENDATION_API_URL', `Unsupported API URL protocol: ${parsed.protocol}`);
  }

  const rawTimeout = readString(env, 'VITE_RECOMMENDATION_TIMEOUT_MS');
  let timeoutMs = DEFAULT_TIMEOUT_MS;
  if (rawTimeout !== undefined) {
    timeoutMs = Number(rawTimeout);
    if (!Number.isInteger(timeoutMs) || timeoutMs <= 0) {
      throw new ConfigError('VITE_RECOMMENDATION_TIMEOUT_MS', `Invalid timeout: ${rawTimeout}`);
    }
  }

  return {
    apiBaseUrl: rawUrl.replace(/\/+$/, ''),
    timeoutMs,
  };
}
