/**
 * Configuration Loader
 *
 * Loads and validates configuration from files and environment variables.
 */

import { readFileSync, existsSync } from 'fs';
import { resolve } from 'path';
import type { ZodError } from 'zod';
import type { HubSyncConfig } from './schema.js';
import { HubSyncConfigSchema } from './schema.js';

// -----------------------------------------------------------------------------
// Types
// -----------------------------------------------------------------------------

export type DeepPartial<T> = {
  [K in keyof T]?: T[K] extends Record<string, unknown> ? DeepPartial<T[K]> : T[K];
};

export type ConfigOverrides = DeepPartial<HubSyncConfig>;

export interface LoadConfigOptions {
  /** Path to config file */
  configPath?: string;
  /** Override values (highest priority) */
  overrides?: ConfigOverrides;
  /** Whether to apply environment variable overrides */
  applyEnv?: boolean;
  /** Environment to read; defaults to process.env */
  env?: NodeJS.ProcessEnv;
}

export interface ConfigValidationResult {
  valid: boolean;
  config?: HubSyncConfig;
  errors?: string[];
}

// -----------------------------------------------------------------------------
// Default Paths
// -----------------------------------------------------------------------------

export const DEFAULT_CONFIG_PATHS = [
  'hub-sync.config.json',
  'config/hub-sync.json',
  'config.json',
];

export const DEFAULT_CONFIG_ENV_VAR = 'HUBSYNC_CONFIG_PATH';

const ENV_PREFIX = 'HUBSYNC_';

// -----------------------------------------------------------------------------
// Loader
// -----------------------------------------------------------------------------

/**
 * Load configuration. Precedence, lowest first: schema defaults, the config
 * file, HUBSYNC_* variables, `overrides`.
 */
export function loadConfig(options: LoadConfigOptions = {}): HubSyncConfig {
  const { configPath, overrides = {}, applyEnv = true, env = process.env } = options;

  const filePath = findConfigFile(configPath, env);
  const fileConfig = filePath ? loadConfigFile(filePath) : {};
  const envConfig = applyEnv ? loadEnvConfig(env) : {};

  const result = HubSyncConfigSchema.safeParse(deepMerge(fileConfig, envConfig, overrides));
  if (!result.success) {
    throw new ConfigValidationError(formatIssues(result.error));
  }

  return result.data;
}

export function validateConfig(config: unknown): ConfigValidationResult {
  const result = HubSyncConfigSchema.safeParse(config);

  return result.success
    ? { valid: true, config: result.data }
    : { valid: false, errors: formatIssues(result.error) };
}

function formatIssues(error: ZodError): string[] {
  return error.errors.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
}

// -----------------------------------------------------------------------------
// File Loading
// -----------------------------------------------------------------------------

/**
 * An explicit path is the only candidate when given; otherwise the
 * HUBSYNC_CONFIG_PATH variable, then the default locations.
 */
function findConfigFile(explicitPath: string | undefined, env: NodeJS.ProcessEnv): string | null {
  const candidates = explicitPath ? [explicitPath] : [env[DEFAULT_CONFIG_ENV_VAR], ...DEFAULT_CONFIG_PATHS];

  for (const candidate of candidates) {
    if (!candidate) {
      continue;
    }
    const resolved = resolve(candidate);
    if (existsSync(resolved)) {
      return resolved;
    }
  }

  return null;
}

function loadConfigFile(path: string): Record<string, unknown> {
  let parsed: unknown;

  try {
    parsed = JSON.parse(readFileSync(path, 'utf-8'));
  } catch (error) {
    if (error instanceof SyntaxError) {
      throw new ConfigParseError(path, error.message);
    }
    throw error;
  }

  if (!isRecord(parsed)) {
    throw new ConfigParseError(path, 'expected a JSON object');
  }

  return parsed;
}

// -----------------------------------------------------------------------------
// Environment Loading
// -----------------------------------------------------------------------------

/** Default tree; variable segments are matched against its keys ignoring case */
const CONFIG_KEYS: Record<string, unknown> = HubSyncConfigSchema.parse({});

/**
 * Load configuration from environment variables.
 *
 * Format: HUBSYNC_<SECTION>_<KEY>=value, each underscore one level deeper.
 * Examples:
 *   HUBSYNC_HUB_HOST=192.168.1.100
 *   HUBSYNC_LOGGING_LEVEL=debug
 *   HUBSYNC_SYNC_PUSH_MAXRETRIES=8
 */
export function loadEnvConfig(env: NodeJS.ProcessEnv = process.env): Record<string, unknown> {
  const config: Record<string, unknown> = {};

  for (const [name, raw] of Object.entries(env)) {
    if (!name.startsWith(ENV_PREFIX) || name === DEFAULT_CONFIG_ENV_VAR || !raw) {
      continue;
    }

    const segments = name.slice(ENV_PREFIX.length).toLowerCase().split('_');
    assignPath(config, toConfigKeys(segments), parseEnvValue(raw));
  }

  return config;
}

function parseEnvValue(raw: string): unknown {
  const lower = raw.toLowerCase();
  if (lower === 'true' || lower === 'false') {
    return lower === 'true';
  }

  const num = Number(raw);
  return raw.trim() !== '' && !Number.isNaN(num) ? num : raw;
}

/**
 * Spell each segment the way the config tree does (`maxretries` becomes
 * `maxRetries`). Segments the tree does not know pass through unchanged and
 * are left for the schema to strip.
 */
function toConfigKeys(segments: string[]): string[] {
  const keys: string[] = [];
  let node: unknown = CONFIG_KEYS;

  for (const segment of segments) {
    const key = isRecord(node) ? Object.keys(node).find((k) => k.toLowerCase() === segment) : undefined;
    node = key !== undefined && isRecord(node) ? node[key] : undefined;
    keys.push(key ?? segment);
  }

  return keys;
}

function assignPath(target: Record<string, unknown>, keys: string[], value: unknown): void {
  const last = keys.at(-1);
  if (last === undefined) {
    return;
  }

  let node = target;
  for (const key of keys.slice(0, -1)) {
    const child = node[key];
    if (isRecord(child)) {
      node = child;
    } else {
      const branch: Record<string, unknown> = {};
      node[key] = branch;
      node = branch;
    }
  }

  node[last] = value;
}

// -----------------------------------------------------------------------------
// Deep Merge
// -----------------------------------------------------------------------------

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/**
 * Deep merge objects (later objects override earlier).
 */
function deepMerge(...objects: Record<string, unknown>[]): Record<string, unknown> {
  const result: Record<string, unknown> = {};

  for (const obj of objects) {
    for (const key of Object.keys(obj)) {
      const value = obj[key];
      const existing = result[key];

      if (isRecord(value) && isRecord(existing)) {
        result[key] = deepMerge(existing, value);
      } else if (value !== undefined) {
        result[key] = value;
      }
    }
  }

  return result;
}

// -----------------------------------------------------------------------------
// Errors
// -----------------------------------------------------------------------------

export class ConfigValidationError extends Error {
  constructor(public readonly errors: string[]) {
    super(`Configuration validation failed:\n  ${errors.join('\n  ')}`);
    this.name = 'ConfigValidationError';
  }
}

export class ConfigParseError extends Error {
  constructor(
    public readonly path: string,
    public readonly parseError: string
  ) {
    super(`Failed to parse config file '${path}': ${parseError}`);
    this.name = 'ConfigParseError';
  }
}
