/**
 * Configuration
 *
 * Settings are merged from several places, later ones overriding earlier ones:
 * 1. the built-in defaults,
 * 2. the user file (`$XDG_CONFIG_HOME/tock/config.yaml`),
 * 3. the file named by `TOCK_CONFIG_FILE`, which may be set in the shell or in a
 *    `.tock.env` file in the working directory or one of its parents,
 * 4. a file passed explicitly (`--config`).
 */
import { parse as parseDotenv } from 'dotenv';
import { existsSync, readFileSync } from 'fs';
import { homedir } from 'os';
import { dirname, join, resolve } from 'path';
import { Document, parseDocument } from 'yaml';
import { z } from 'zod';
import { LOG_LEVELS, LogLevel, getLogger } from './logger';
import {
  REPORT_FORMATS,
  REPORT_GRANULARITIES,
  ReportFormat,
  ReportGranularity,
} from './report';
import { writeFileAtomic } from './store';
import { ConfigError, StoreWriteError } from './types';

export type StoreBackend = 'yaml' | 'sqlite';

export interface TockConfig {
  store: {
    backend: StoreBackend;
    path: string;
  };
  defaults: {
    /** Task label used when a command names none */
    task: string;
  };
  report: {
    format: ReportFormat;
    granularity: ReportGranularity;
  };
  log: {
    level: LogLevel;
  };
}

export const CONFIG_ENV_KEY = 'TOCK_CONFIG_FILE';
export const DOTENV_FILE = '.tock.env';

type Env = Record<string, string | undefined>;

const configFileSchema = z
  .object({
    store: z
      .object({
        backend: z.enum(['yaml', 'sqlite']).optional(),
        path: z.string().min(1).optional(),
      })
      .strict()
      .nullish(),
    defaults: z
      .object({
        task: z.string().nullish(),
      })
      .strict()
      .nullish(),
    report: z
      .object({
        format: z.enum(REPORT_FORMATS).optional(),
        granularity: z.enum(REPORT_GRANULARITIES).optional(),
      })
      .strict()
      .nullish(),
    log: z
      .object({
        level: z.enum(LOG_LEVELS).optional(),
      })
      .strict()
      .nullish(),
  })
  .strict();

/**
 * Content of a single configuration file; every key is optional
 */
export type ConfigFile = z.infer<typeof configFileSchema>;

export interface LoadConfigOptions {
  /** Explicit file, read last; it must exist */
  file?: string;
  env?: Env;
  cwd?: string;
  /** Look for a `.tock.env` file (default true) */
  dotenv?: boolean;
}

export interface LoadedConfig {
  config: TockConfig;
  /** Files that contributed, in the order they were applied */
  files: string[];
}

export function expandHome(path: string, env: Env = process.env): string {
  const home = env.HOME ?? homedir();
  if (path === '~') return home;
  if (path.startsWith('~/')) return join(home, path.slice(2));
  return path;
}

export function userConfigPath(env: Env = process.env): string {
  const base = env.XDG_CONFIG_HOME || join(env.HOME ?? homedir(), '.config');
  return join(base, 'tock', 'config.yaml');
}

export function defaultStorePath(backend: StoreBackend = 'yaml', env: Env = process.env): string {
  const base = env.XDG_DATA_HOME || join(env.HOME ?? homedir(), '.local', 'share');
  return join(base, 'tock', backend === 'sqlite' ? 'records.db' : 'records.yaml');
}

export function defaultConfig(env: Env = process.env): TockConfig {
  return {
    store: { backend: 'yaml', path: defaultStorePath('yaml', env) },
    defaults: { task: '' },
    report: { format: 'csv', granularity: 'task' },
    log: { level: 'warn' },
  };
}

function describeIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) =>
    issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
  );
}

function parseConfigText(text: string): { data?: ConfigFile; issues: string[] } {
  const doc = parseDocument(text);
  if (doc.errors.length > 0) {
    return { issues: doc.errors.map((error) => error.message) };
  }

  const parsed = configFileSchema.safeParse(doc.toJS() ?? {});
  if (!parsed.success) {
    return { issues: describeIssues(parsed.error) };
  }
  return { data: parsed.data, issues: [] };
}

/**
 * Read and validate one configuration file
 */
export function readConfigFile(path: string): ConfigFile {
  let text: string;
  try {
    text = readFileSync(path, 'utf-8');
  } catch (error) {
    throw new ConfigError(
      `Cannot read configuration file ${path}: ${error instanceof Error ? error.message : error}`
    );
  }

  const { data, issues } = parseConfigText(text);
  if (!data) {
    throw new ConfigError(`Invalid configuration file ${path}: ${issues.join('; ')}`);
  }
  return data;
}

/**
 * Validate a configuration file without changing anything.
 * Returns the problems found; an empty list means the file is valid.
 */
export function checkConfigFile(path: string): string[] {
  if (!existsSync(path)) {
    return [`${path} does not exist`];
  }

  let text: string;
  try {
    text = readFileSync(path, 'utf-8');
  } catch (error) {
    return [`${path} cannot be read: ${error instanceof Error ? error.message : error}`];
  }

  return parseConfigText(text).issues;
}

/**
 * Walk up from `cwd` looking for a dotenv file
 */
export function findDotenv(cwd: string, name: string = DOTENV_FILE): string | undefined {
  let dir = resolve(cwd);
  for (;;) {
    const candidate = join(dir, name);
    if (existsSync(candidate)) return candidate;
    const parent = dirname(dir);
    if (parent === dir) return undefined;
    dir = parent;
  }
}

/**
 * Fill `env` from the nearest `.tock.env` file. Values already in the
 * environment win. Returns the file used, if any.
 */
export function applyDotenv(env: Env, cwd: string): string | undefined {
  const dotenvPath = findDotenv(cwd);
  if (!dotenvPath) return undefined;

  const values = parseDotenv(readFileSync(dotenvPath));
  for (const [key, value] of Object.entries(values)) {
    env[key] ??= value;
  }
  getLogger('config').debug({ path: dotenvPath }, 'loaded dotenv file');
  return dotenvPath;
}

/**
 * Path of the file named by `TOCK_CONFIG_FILE`, resolved against `cwd`
 */
export function envConfigPath(env: Env, cwd: string): string | undefined {
  const file = env[CONFIG_ENV_KEY];
  return file ? resolve(cwd, expandHome(file, env)) : undefined;
}

/**
 * Load the merged configuration
 */
export function loadConfig(options: LoadConfigOptions = {}): LoadedConfig {
  const logger = getLogger('config');
  const env = options.env ?? process.env;
  const cwd = options.cwd ?? process.cwd();

  if (options.dotenv !== false) {
    applyDotenv(env, cwd);
  }

  const optional = [userConfigPath(env)];
  const envFile = envConfigPath(env, cwd);
  if (envFile) {
    optional.push(envFile);
  }

  const layers: ConfigFile[] = [];
  const files: string[] = [];

  for (const path of new Set(optional)) {
    if (!existsSync(path)) {
      if (path !== optional[0]) {
        logger.warn({ path }, `configuration file named by ${CONFIG_ENV_KEY} does not exist`);
      }
      continue;
    }
    layers.push(readConfigFile(path));
    files.push(path);
  }

  if (options.file) {
    const path = resolve(cwd, expandHome(options.file, env));
    if (!existsSync(path)) {
      throw new ConfigError(`Configuration file ${path} does not exist`);
    }
    layers.push(readConfigFile(path));
    files.push(path);
  }

  const config = mergeConfig(defaultConfig(env), layers, env, cwd);
  logger.debug({ files }, 'configuration loaded');
  return { config, files };
}

/**
 * Apply file layers over a base configuration. A layer that switches the
 * store backend without naming a path gets that backend's default path.
 */
export function mergeConfig(
  base: TockConfig,
  layers: ConfigFile[],
  env: Env = process.env,
  cwd: string = process.cwd()
): TockConfig {
  let backend = base.store.backend;
  let path: string | undefined;
  const config: TockConfig = {
    store: { ...base.store },
    defaults: { ...base.defaults },
    report: { ...base.report },
    log: { ...base.log },
  };

  for (const layer of layers) {
    backend = layer.store?.backend ?? backend;
    path = layer.store?.path ?? path;
    if (layer.defaults?.task !== undefined && layer.defaults.task !== null) {
      config.defaults.task = layer.defaults.task;
    }
    config.report.format = layer.report?.format ?? config.report.format;
    config.report.granularity = layer.report?.granularity ?? config.report.granularity;
    config.log.level = layer.log?.level ?? config.log.level;
  }

  config.store.backend = backend;
  if (path) {
    config.store.path = resolve(cwd, expandHome(path, env));
  } else if (backend !== base.store.backend) {
    config.store.path = defaultStorePath(backend, env);
  }

  return config;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Look up a value by dotted key (`store.path`) or by segments
 * (`['store', 'path']`). A missing key is an error unless a default is given.
 */
export function getConfigValue(
  config: TockConfig,
  key: string | readonly string[],
  options: { default?: unknown } = {}
): unknown {
  const segments = typeof key === 'string' ? key.split('.') : key.flatMap((k) => k.split('.'));
  if (segments.length === 0 || segments.some((segment) => segment === '')) {
    throw new ConfigError(`Invalid configuration key "${segments.join('.')}"`);
  }

  let node: unknown = config;
  for (const segment of segments) {
    if (!isRecord(node) || !Object.hasOwn(node, segment)) {
      if ('default' in options) {
        return options.default;
      }
      throw new ConfigError(`Unknown configuration key "${segments.join('.')}"`);
    }
    node = node[segment];
  }
  return node;
}

/**
 * Write a configuration to disk as YAML. Refuses to replace an existing
 * file unless `force` is set.
 */
export function writeConfigFile(
  path: string,
  config: TockConfig,
  options: { force?: boolean } = {}
): void {
  if (existsSync(path) && !options.force) {
    throw new ConfigError(`Configuration file ${path} already exists; use --force to replace it`);
  }

  const doc = new Document(config);
  doc.commentBefore =
    ' tock configuration\n' +
    ' store.backend: yaml | sqlite\n' +
    ' report.format: csv | html | json, report.granularity: task | record';

  try {
    writeFileAtomic(path, doc.toString());
  } catch (error) {
    if (error instanceof StoreWriteError) {
      throw new ConfigError(`Cannot write configuration file: ${error.message}`);
    }
    throw error;
  }
  getLogger('config').info({ path }, 'configuration written');
}
