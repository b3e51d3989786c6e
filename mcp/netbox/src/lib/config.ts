/**
 * Server configuration
 *
 * Built once at startup from environment variables and handed to the
 * components that need it. Nothing reads process.env after this point.
 */

import { existsSync } from 'node:fs';
import { resolve } from 'node:path';
import { ConfigurationError } from './errors.js';
import { log } from './logger.js';

export type AuthScheme = 'Token' | 'Bearer';

export interface NetBoxConfig {
  /** NetBox base URL without trailing slash, e.g. https://netbox.example.com */
  readonly url: string;
  readonly token: string;
  readonly authScheme: AuthScheme;
  readonly verifySsl: boolean;
  /** Per-request timeout */
  readonly timeoutMs: number;
}

export interface HttpTransportConfig {
  readonly host: string;
  readonly port: number;
}

export interface ServerConfig {
  readonly netbox: NetBoxConfig;
  /** null means stdio transport */
  readonly http: HttpTransportConfig | null;
}

export const DEFAULT_TIMEOUT_MS = 30_000;

type Env = Record<string, string | undefined>;

function required(env: Env, name: string, example: string, purpose: string): string {
  const value = env[name]?.trim();
  if (!value) {
    throw new ConfigurationError(
      name,
      `${name} not configured. Set ${purpose} in the environment or a .env file (example: ${example})`,
      example
    );
  }
  return value;
}

function parseBoolean(value: string | undefined, fallback: boolean): boolean {
  if (value === undefined || value.trim() === '') return fallback;
  return ['true', '1', 'yes'].includes(value.trim().toLowerCase());
}

function parsePositiveInt(env: Env, name: string, fallback: number, example: string): number {
  const raw = env[name]?.trim();
  if (!raw) return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    throw new ConfigurationError(name, `${name} must be a positive integer, got "${raw}" (example: ${example})`, example);
  }
  return value;
}

function parseUrl(raw: string): string {
  let parsed: URL;
  try {
    parsed = new URL(raw);
  } catch {
    throw new ConfigurationError(
      'NETBOX_URL',
      `NETBOX_URL is not a valid URL: "${raw}" (example: https://netbox.example.com)`,
      'https://netbox.example.com'
    );
  }
  if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
    throw new ConfigurationError(
      'NETBOX_URL',
      `NETBOX_URL must use http or https, got "${parsed.protocol}"`,
      'https://netbox.example.com'
    );
  }
  return raw.replace(/\/+$/, '');
}

function parseAuthScheme(raw: string | undefined): AuthScheme {
  if (!raw || raw.trim() === '') return 'Token';
  const normalized = raw.trim().toLowerCase();
  if (normalized === 'token') return 'Token';
  if (normalized === 'bearer') return 'Bearer';
  throw new ConfigurationError('NETBOX_AUTH_SCHEME', `NETBOX_AUTH_SCHEME must be "Token" or "Bearer", got "${raw}"`, 'Bearer');
}

/**
 * Load `.env` from the working directory when present. Variables already
 * set in the environment are left alone.
 */
export function loadDotEnv(path = resolve(process.cwd(), '.env')): boolean {
  if (!existsSync(path)) {
    log.debug('No .env file found, using process environment', { path });
    return false;
  }
  process.loadEnvFile(path);
  log.info('Loaded environment from .env', { path });
  return true;
}

export function loadConfig(env: Env = process.env): ServerConfig {
  const url = parseUrl(required(env, 'NETBOX_URL', 'NETBOX_URL=https://netbox.example.com', 'your NetBox URL'));
  const token = required(env, 'NETBOX_TOKEN', 'NETBOX_TOKEN=your_token_here', 'your NetBox API token');

  const netbox: NetBoxConfig = Object.freeze({
    url,
    token,
    authScheme: parseAuthScheme(env.NETBOX_AUTH_SCHEME),
    verifySsl: parseBoolean(env.NETBOX_VERIFY_SSL, true),
    timeoutMs: parsePositiveInt(env, 'NETBOX_TIMEOUT_MS', DEFAULT_TIMEOUT_MS, 'NETBOX_TIMEOUT_MS=30000'),
  });

  const httpPort = env.HTTP_PORT?.trim()
    ? parsePositiveInt(env, 'HTTP_PORT', 0, 'HTTP_PORT=8001')
    : null;

  const http: HttpTransportConfig | null = httpPort
    ? Object.freeze({ host: env.HTTP_HOST?.trim() || 'localhost', port: httpPort })
    : null;

  return Object.freeze({ netbox, http });
}
