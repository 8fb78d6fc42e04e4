import { config as loadEnv } from 'dotenv';
import { existsSync, readFileSync } from 'node:fs';
import path from 'node:path';

loadEnv();

function requiredEnv(name: string): string {
  const value = process.env[name];
  if (!value) {
    throw new Error(`Missing required environment variable: ${name}`);
  }
  return value;
}

type TrustProxyValue = false | true | number | string;

function parseTrustProxyEnv(value: string | undefined): TrustProxyValue {
  if (value === undefined) {
    return false;
  }

  const normalized = value.trim();
  if (normalized.length === 0) {
    return false;
  }

  const lower = normalized.toLowerCase();
  if (lower === 'false' || lower === '0') {
    return false;
  }

  if (lower === 'true') {
    return true;
  }

  const asNumber = Number(normalized);
  if (!Number.isNaN(asNumber)) {
    return asNumber;
  }

  return normalized;
}

function parseIntEnv(name: string, defaultValue: number): number {
  const raw = process.env[name];
  if (raw === undefined) {
    return defaultValue;
  }

  const parsed = Number.parseInt(raw, 10);
  if (Number.isNaN(parsed)) {
    return defaultValue;
  }

  return parsed;
}

function parseBooleanEnv(name: string, defaultValue: boolean): boolean {
  const raw = process.env[name];
  if (raw === undefined) {
    return defaultValue;
  }

  const normalized = raw.trim().toLowerCase();
  if (['true', '1', 'yes', 'on'].includes(normalized)) {
    return true;
  }

  if (['false', '0', 'no', 'off'].includes(normalized)) {
    return false;
  }

  return defaultValue;
}

export const SERVER_PORT = parseIntEnv('PORT', 3000);
export const SERVER_HOST = process.env.HOST ?? '0.0.0.0';
export const TRUST_PROXY: TrustProxyValue = parseTrustProxyEnv(process.env.TRUST_PROXY);

export const DATABASE_URL = requiredEnv('DATABASE_URL');
export const DB_POOL_MIN = Math.max(0, parseIntEnv('DB_POOL_MIN', 0));
export const DB_POOL_MAX = Math.max(1, DB_POOL_MIN, parseIntEnv('DB_POOL_MAX', 10));
export const DB_CONNECT_TIMEOUT_MS = Math.max(0, parseIntEnv('DB_CONNECT_TIMEOUT_MS', 5 * 1000));
export const DB_IDLE_TIMEOUT_MS = Math.max(0, parseIntEnv('DB_IDLE_TIMEOUT_MS', 30 * 1000));

export const POKEAPI_GRAPHQL_URL = process.env.POKEAPI_GRAPHQL_URL ?? 'https://beta.pokeapi.co/graphql/v1beta';
export const POKEAPI_TIMEOUT_MS = Math.max(1000, parseIntEnv('POKEAPI_TIMEOUT_MS', 10 * 1000));
export const POKEAPI_PROBE_ON_STARTUP = parseBooleanEnv('POKEAPI_PROBE_ON_STARTUP', false);

function readPackageVersion(): string {
  const override = process.env.BACKEND_VERSION?.trim();
  if (override) {
    return override;
  }

  // dist/ sits one level below package.json, backend/src two.
  const candidates = [path.resolve(__dirname, '..', 'package.json'), path.resolve(__dirname, '..', '..', 'package.json')];
  const packageJsonPath = candidates.find((candidate) => existsSync(candidate));
  if (!packageJsonPath) {
    return 'dev';
  }

  try {
    const raw = readFileSync(packageJsonPath, 'utf8');
    const parsed: unknown = JSON.parse(raw);
    if (parsed !== null && typeof parsed === 'object' && 'version' in parsed) {
      const { version } = parsed;
      if (typeof version === 'string' && version.trim().length > 0) {
        return version.trim();
      }
    }
  } catch (error) {
    console.warn('Unable to read backend package version for user-agent metadata', error);
  }

  return 'dev';
}

function resolveRevision(): string {
  const revision =
    process.env.BUILD_SHA ??
    process.env.GIT_REVISION ??
    process.env.COMMIT_SHA ??
    process.env.SOURCE_VERSION ??
    '';
  return revision.trim();
}

export function buildUserAgent(version: string, revision: string): string {
  const normalizedVersion = version || 'dev';
  const normalizedRevision = revision || 'unknown';
  return `Dexcache/${normalizedVersion} (rev:${normalizedRevision})`;
}

export const BACKEND_VERSION = readPackageVersion();
export const BUILD_REVISION = resolveRevision();
export const OUTBOUND_USER_AGENT = buildUserAgent(BACKEND_VERSION, BUILD_REVISION);
