/**
 * Configuration loading
 *
 * Precedence, lowest first: defaults, `docdrift.yml` (searched from the
 * current directory upwards), `DOCDRIFT_*` environment variables. The CLI
 * applies its own flags on top of the result.
 */

import { existsSync, readFileSync } from 'fs';
import { dirname, resolve } from 'path';
import yaml from 'js-yaml';
import { z } from 'zod';
import { VERBOSITY_LEVELS } from './logger.js';
import { IDENTIFIER_PATTERN } from './variables/store.js';
import { formatZodIssues } from './dsl/schemas.js';
import { ConfigError } from './errors.js';

export const CONFIG_FILE_NAMES = ['docdrift.yml', 'docdrift.yaml'] as const;

const VariableValue = z.union([z.string(), z.number(), z.boolean()]).transform(String);

export const DocdriftConfigSchema = z
  .object({
    verbosity: z.enum(VERBOSITY_LEVELS).default('normal'),
    /** Parent directory for temporary workspaces */
    workspaceRoot: z.string().min(1).optional(),
    allowUnsafePaths: z.boolean().default(false),
    keepWorkspace: z.boolean().default(false),
    createParentDirs: z.boolean().default(false),
    /** Variables available to the tutorial before the first capture */
    vars: z.record(z.string().regex(IDENTIFIER_PATTERN, 'invalid variable name'), VariableValue).default({}),
  })
  .strict();

export type DocdriftConfig = z.infer<typeof DocdriftConfigSchema> & {
  /** Config file the values came from, if any */
  configPath?: string;
};

export interface LoadConfigOptions {
  /** Directory to start the config file search from (default: process.cwd()) */
  cwd?: string;
  /** Environment to read overrides from (default: process.env) */
  env?: NodeJS.ProcessEnv;
  /** Explicit config file; must exist */
  configPath?: string;
}

const BOOLEAN_ENV_VARS = {
  DOCDRIFT_ALLOW_UNSAFE_PATHS: 'allowUnsafePaths',
  DOCDRIFT_KEEP_WORKSPACE: 'keepWorkspace',
  DOCDRIFT_CREATE_PARENT_DIRS: 'createParentDirs',
} as const;

/**
 * Look for a config file in `startDir` and its parents
 */
export function findConfigFile(startDir: string): string | undefined {
  let dir = resolve(startDir);
  for (;;) {
    for (const name of CONFIG_FILE_NAMES) {
      const candidate = resolve(dir, name);
      if (existsSync(candidate)) {
        return candidate;
      }
    }
    const parent = dirname(dir);
    if (parent === dir) {
      return undefined;
    }
    dir = parent;
  }
}

/**
 * Load and validate the configuration
 * @throws ConfigError on unreadable YAML or invalid values
 */
export function loadConfig(options: LoadConfigOptions = {}): DocdriftConfig {
  const cwd = options.cwd ?? process.cwd();
  const env = options.env ?? process.env;

  let configPath: string | undefined;
  if (options.configPath) {
    configPath = resolve(cwd, options.configPath);
    if (!existsSync(configPath)) {
      throw new ConfigError(`Config file not found: ${configPath}`);
    }
  } else {
    configPath = findConfigFile(cwd);
  }

  const fromFile = configPath ? readConfigFile(configPath) : {};
  const merged = { ...fromFile, ...readEnvOverrides(env) };

  const parsed = DocdriftConfigSchema.safeParse(merged);
  if (!parsed.success) {
    const where = configPath ? ` (${configPath})` : '';
    throw new ConfigError(`Invalid configuration${where}: ${formatZodIssues(parsed.error)}`);
  }

  return { ...parsed.data, configPath };
}

function readConfigFile(configPath: string): Record<string, unknown> {
  let data: unknown;
  try {
    data = yaml.load(readFileSync(configPath, 'utf-8'));
  } catch (error) {
    throw new ConfigError(
      `Failed to read config file ${configPath}: ${error instanceof Error ? error.message : String(error)}`
    );
  }

  if (data === undefined || data === null) {
    return {};
  }
  if (!isRecord(data)) {
    throw new ConfigError(`Config file ${configPath} must contain a mapping`);
  }
  return data;
}

function readEnvOverrides(env: NodeJS.ProcessEnv): Record<string, unknown> {
  const overrides: Record<string, unknown> = {};

  if (env.DOCDRIFT_VERBOSITY) {
    overrides.verbosity = env.DOCDRIFT_VERBOSITY.toLowerCase();
  }
  if (env.DOCDRIFT_WORKSPACE_ROOT) {
    overrides.workspaceRoot = env.DOCDRIFT_WORKSPACE_ROOT;
  }
  for (const [name, key] of Object.entries(BOOLEAN_ENV_VARS)) {
    const value = env[name];
    if (value !== undefined && value !== '') {
      overrides[key] = parseBooleanEnv(name, value);
    }
  }

  return overrides;
}

/**
 * Accepts true/false, 1/0, yes/no and on/off in any case
 */
export function parseBooleanEnv(name: string, value: string): boolean {
  const normalized = value.trim().toLowerCase();
  if (['true', '1', 'yes', 'on'].includes(normalized)) {
    return true;
  }
  if (['false', '0', 'no', 'off'].includes(normalized)) {
    return false;
  }
  throw new ConfigError(`${name} must be a boolean (true/false), got "${value}"`);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
