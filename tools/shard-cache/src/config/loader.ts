import * as fs from 'node:fs';
import * as path from 'node:path';
import { z } from 'zod';
import { parse as parseYaml } from 'yaml';
import { cacheConfigSchema, type CacheConfig } from './schema.js';

export const CONFIG_FILE_NAME = '.shard-cache.yaml';

/** Environment variables recognized by loadCacheConfig, by config key. */
export const ENV_VARS = {
  cacheDir: 'SHARD_CACHE_DIR',
  cacheSize: 'SHARD_CACHE_SIZE',
  verbose: 'SHARD_CACHE_VERBOSE',
  cleanupIntervalSeconds: 'SHARD_CACHE_CLEANUP_INTERVAL',
  timeoutSeconds: 'SHARD_CACHE_TIMEOUT',
} as const;

/**
 * CLI options as received from commander (all strings/booleans).
 */
export interface CliOptions {
  cacheDir?: string;
  cacheSize?: string;
  interval?: string;
  timeout?: string;
  maxAttempts?: string;
  config?: string;
  verbose?: boolean;
}

/**
 * Injectable dependencies for loadCacheConfig.
 * Defaults to real implementations; tests can override.
 */
export interface ConfigDeps {
  env: Record<string, string | undefined>;
  cwd: () => string;
  existsSync: (filePath: string) => boolean;
  readFile: (filePath: string) => string;
}

const defaultDeps: ConfigDeps = {
  env: process.env,
  cwd: () => process.cwd(),
  existsSync: (filePath) => fs.existsSync(filePath),
  readFile: (filePath) => fs.readFileSync(filePath, 'utf-8'),
};

const fileLayerSchema = z.record(z.string(), z.unknown());

function definedOnly(values: Record<string, unknown>): Record<string, unknown> {
  return Object.fromEntries(Object.entries(values).filter(([, value]) => value !== undefined));
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join(', ');
}

function readFileLayer(configPath: string, explicit: boolean, deps: ConfigDeps): Record<string, unknown> {
  if (!deps.existsSync(configPath)) {
    if (explicit) {
      throw new Error(`Config file not found: ${configPath}`);
    }
    return {};
  }

  const parsed: unknown = parseYaml(deps.readFile(configPath)) ?? {};
  const result = fileLayerSchema.safeParse(parsed);
  if (!result.success) {
    throw new Error(`Invalid config at ${configPath}: expected a mapping of settings`);
  }
  return result.data;
}

function readEnvLayer(env: ConfigDeps['env']): Record<string, unknown> {
  return definedOnly({
    cacheDir: env[ENV_VARS.cacheDir],
    cacheSize: env[ENV_VARS.cacheSize],
    verbose: env[ENV_VARS.verbose],
    cleanupIntervalSeconds: env[ENV_VARS.cleanupIntervalSeconds],
    timeoutSeconds: env[ENV_VARS.timeoutSeconds],
  });
}

function readCliLayer(cliOptions: CliOptions): Record<string, unknown> {
  return definedOnly({
    cacheDir: cliOptions.cacheDir,
    cacheSize: cliOptions.cacheSize,
    // commander leaves boolean flags false when absent; only an explicit --verbose overrides
    verbose: cliOptions.verbose === true ? true : undefined,
    cleanupIntervalSeconds: cliOptions.interval,
    timeoutSeconds: cliOptions.timeout,
    maxAttempts: cliOptions.maxAttempts,
  });
}

/**
 * Load cache configuration from CLI flags, environment variables and an
 * optional YAML file.
 *
 * Priority: CLI flags > env vars > config file > defaults.
 * The cache directory is resolved to an absolute path.
 */
export function loadCacheConfig(cliOptions: CliOptions = {}, deps: Partial<ConfigDeps> = {}): CacheConfig {
  const resolved: ConfigDeps = { ...defaultDeps, ...deps };
  const cwd = resolved.cwd();

  const configPath = cliOptions.config !== undefined
    ? path.resolve(cwd, cliOptions.config)
    : path.join(cwd, CONFIG_FILE_NAME);

  const merged = {
    ...readFileLayer(configPath, cliOptions.config !== undefined, resolved),
    ...readEnvLayer(resolved.env),
    ...readCliLayer(cliOptions),
  };

  const result = cacheConfigSchema.safeParse(merged);
  if (!result.success) {
    throw new Error(`Invalid cache config: ${formatIssues(result.error)}`);
  }

  return { ...result.data, cacheDir: path.resolve(cwd, result.data.cacheDir) };
}
