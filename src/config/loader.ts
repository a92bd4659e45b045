/**
 * Project configuration: `.reqgraph.yaml`, found by walking up from the
 * start directory, then environment overrides.
 */

import { existsSync, readFileSync } from 'fs';
import { dirname, join } from 'path';
import { parse } from 'yaml';
import { ConfigError } from '../core/errors.js';
import { debug } from '../shared/debug.js';
import { hashModeSchema, reqgraphConfigSchema, type ReqgraphConfig } from './schema.js';

export const CONFIG_FILE = '.reqgraph.yaml';

/**
 * Path of the nearest config file at or above `startDir`, or null.
 */
export function findConfigFile(startDir: string = process.cwd()): string | null {
  let dir = startDir;
  for (;;) {
    const candidate = join(dir, CONFIG_FILE);
    if (existsSync(candidate)) {
      return candidate;
    }
    const parent = dirname(dir);
    if (parent === dir) return null;
    dir = parent;
  }
}

export function defaultConfig(): ReqgraphConfig {
  return reqgraphConfigSchema.parse({});
}

/**
 * Load and validate the config. A missing file yields the defaults; a
 * file that cannot be parsed or validated raises `ConfigError`.
 */
export function loadConfig(
  startDir: string = process.cwd(),
  env: NodeJS.ProcessEnv = process.env
): ReqgraphConfig {
  const filePath = findConfigFile(startDir);
  const config = filePath ? readConfigFile(filePath) : defaultConfig();
  return applyEnvOverrides(config, env);
}

export function readConfigFile(filePath: string): ReqgraphConfig {
  let content: string;
  try {
    content = readFileSync(filePath, 'utf-8');
  } catch (err: unknown) {
    if (isErrnoException(err) && err.code === 'ENOENT') {
      debug('config', 'Config file vanished, using defaults', { filePath });
      return defaultConfig();
    }
    throw err;
  }

  let raw: unknown;
  try {
    raw = parse(content);
  } catch (err: unknown) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ConfigError(`Invalid YAML in ${filePath}: ${reason}`, filePath);
  }

  const result = reqgraphConfigSchema.safeParse(raw ?? {});
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid config in ${filePath}: ${issues}`, filePath);
  }
  debug('config', 'Loaded config', { filePath });
  return result.data;
}

export function applyEnvOverrides(config: ReqgraphConfig, env: NodeJS.ProcessEnv): ReqgraphConfig {
  const next: ReqgraphConfig = {
    ...config,
    hash: { ...config.hash },
    coverage: { ...config.coverage, excludeStatus: [...config.coverage.excludeStatus] },
  };

  const mode = env.REQGRAPH_HASH_MODE;
  if (mode !== undefined && mode !== '') {
    const parsed = hashModeSchema.safeParse(mode);
    if (!parsed.success) {
      throw new ConfigError(`Invalid REQGRAPH_HASH_MODE: ${mode}`, 'REQGRAPH_HASH_MODE');
    }
    next.hash.mode = parsed.data;
  }

  const strict = env.REQGRAPH_STRICT?.toLowerCase();
  if (strict === '1' || strict === 'true') next.coverage.strictMode = true;
  if (strict === '0' || strict === 'false') next.coverage.strictMode = false;

  return next;
}

function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return typeof err === 'object' && err !== null && 'code' in err;
}
