/**
 * Configuration loader for Reconcilarr
 * Loads from an optional YAML config file with environment variable expansion,
 * then falls back to the PLEX_* / JELLYFIN_* environment variables.
 */

import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';

import { parse } from 'yaml';

import { ConfigurationError, errorMessage } from './errors.js';
import type { ReconcilarrConfig, ServerName } from './types.js';

export const DEFAULT_THRESHOLD = 85;
export const DEFAULT_TIMEOUT_MS = 30_000;

type Env = Record<string, string | undefined>;

/**
 * Expand environment variables in a string
 * Supports ${VAR} syntax
 */
function expandEnv(value: unknown, env: Env): unknown {
  if (typeof value !== 'string') return value;
  return value.replace(/\$\{([^}]+)\}/g, (_, name: string) => env[name] ?? '');
}

/**
 * Recursively expand environment variables in an object
 */
function deepExpand(obj: unknown, env: Env): unknown {
  if (Array.isArray(obj)) return obj.map((v) => deepExpand(v, env));
  if (obj && typeof obj === 'object') {
    const out: Record<string, unknown> = {};
    for (const [k, v] of Object.entries(obj)) {
      out[k] = deepExpand(v, env);
    }
    return out;
  }
  return expandEnv(obj, env);
}

/**
 * Find config file from multiple candidate locations
 */
export function findConfigFile(explicit?: string, env: Env = process.env): string | null {
  if (explicit) {
    if (!fs.existsSync(explicit)) {
      throw new ConfigurationError(`Config file not found: ${explicit}`);
    }
    return explicit;
  }

  const candidates = [
    env.RECONCILARR_CONFIG,
    path.join(process.cwd(), 'reconcilarr.yaml'),
    path.join(process.cwd(), 'config/reconcilarr.yaml'),
    path.join(os.homedir(), '.reconcilarr', 'config.yaml'),
  ].filter((c): c is string => Boolean(c));

  return candidates.find((c) => fs.existsSync(c)) ?? null;
}

// ── Field readers ──────────────────────────────────────────────────

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function section(raw: Record<string, unknown>, key: string): Record<string, unknown> {
  const value = raw[key];
  if (value == null) return {};
  if (!isRecord(value)) throw new ConfigurationError(`${key} must be a mapping`);
  return value;
}

function str(value: unknown, fallback = ''): string {
  if (value == null || value === '') return fallback;
  if (typeof value === 'string') return value.trim();
  if (typeof value === 'number') return String(value);
  throw new ConfigurationError(`Expected a string, got ${typeof value}`);
}

function strList(value: unknown, key: string): string[] {
  if (value == null) return [];
  if (!Array.isArray(value)) throw new ConfigurationError(`${key} must be a list`);
  return value.map((v) => str(v)).filter(Boolean);
}

function num(value: unknown, fallback: number, key: string): number {
  if (value == null || value === '') return fallback;
  const n = typeof value === 'number' ? value : Number(value);
  if (!Number.isFinite(n)) throw new ConfigurationError(`${key} must be a number`);
  return n;
}

/**
 * Threshold must be a finite number within [0, 100]; out-of-range values
 * are rejected, never clamped.
 */
export function validateThreshold(value: number): number {
  if (!Number.isFinite(value) || value < 0 || value > 100) {
    throw new ConfigurationError(`Match threshold must be between 0 and 100, got ${value}`);
  }
  return value;
}

export function parseThreshold(raw: string | undefined, fallback: number): number {
  if (raw == null) return validateThreshold(fallback);
  const trimmed = raw.trim();
  const n = Number(trimmed);
  if (trimmed === '' || !Number.isFinite(n)) {
    throw new ConfigurationError(`Match threshold must be a number, got "${raw}"`);
  }
  return validateThreshold(n);
}

/**
 * Build a config from already-parsed YAML plus the environment
 */
export function buildConfig(rawInput: unknown, env: Env = process.env): ReconcilarrConfig {
  const raw = deepExpand(rawInput ?? {}, env);
  if (!isRecord(raw)) throw new ConfigurationError('Config file must contain a mapping');
  const plex = section(raw, 'plex');
  const jellyfin = section(raw, 'jellyfin');
  const matching = section(raw, 'matching');
  const http = section(raw, 'http');

  const userId = str(jellyfin.userId);

  return {
    plex: {
      url: str(plex.url, env.PLEX_URL ?? '').replace(/\/$/, ''),
      token: str(plex.token, env.PLEX_TOKEN ?? ''),
      movieSections: strList(plex.movieSections, 'plex.movieSections'),
      showSections: strList(plex.showSections, 'plex.showSections'),
    },
    jellyfin: {
      url: str(jellyfin.url, env.JELLYFIN_URL ?? '').replace(/\/$/, ''),
      apiKey: str(jellyfin.apiKey, env.JELLYFIN_APIKEY ?? env.JELLYFIN_API_KEY ?? ''),
      user: str(jellyfin.user, env.JELLYFIN_USER ?? ''),
      ...(userId ? { userId } : {}),
    },
    matching: {
      threshold: validateThreshold(num(matching.threshold, DEFAULT_THRESHOLD, 'matching.threshold')),
    },
    http: {
      timeoutMs: num(http.timeoutMs, DEFAULT_TIMEOUT_MS, 'http.timeoutMs'),
    },
  };
}

/**
 * Load and validate configuration
 */
export function loadConfig(opts: { configPath?: string; env?: Env } = {}): ReconcilarrConfig {
  const env = opts.env ?? process.env;
  const configPath = findConfigFile(opts.configPath, env);
  if (!configPath) return buildConfig({}, env);

  const content = fs.readFileSync(configPath, 'utf-8');
  let parsed: unknown;
  try {
    parsed = parse(content);
  } catch (err) {
    throw new ConfigurationError(`Invalid YAML in ${configPath}: ${errorMessage(err)}`);
  }
  return buildConfig(parsed, env);
}

/**
 * Credentials are only checked for the servers a command actually talks to
 */
export function requireServer(config: ReconcilarrConfig, server: ServerName): void {
  const missing: string[] = [];
  if (server === 'plex') {
    if (!config.plex.url) missing.push('plex.url (PLEX_URL)');
    if (!config.plex.token) missing.push('plex.token (PLEX_TOKEN)');
  } else {
    if (!config.jellyfin.url) missing.push('jellyfin.url (JELLYFIN_URL)');
    if (!config.jellyfin.apiKey) missing.push('jellyfin.apiKey (JELLYFIN_APIKEY)');
    if (!config.jellyfin.userId && !config.jellyfin.user) missing.push('jellyfin.user (JELLYFIN_USER)');
  }
  if (missing.length > 0) {
    throw new ConfigurationError(`${server} is not configured. Missing: ${missing.join(', ')}`);
  }
}
