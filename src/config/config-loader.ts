import { existsSync } from 'node:fs';
import { readFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import * as yaml from 'js-yaml';
import { ConfigError } from '../errors/custom-errors.js';
import { deepMerge, isPlainObject, type PlainObject } from '../utils/deep-merge.js';
import { resolveEnvRecursive } from '../utils/env-resolver.js';
import { DEFAULT_CONFIG_PATH, getDefaults } from './config-defaults.js';
import { type Config, type FileConfig, FileConfigSchema, formatZodError, validateConfigSafe } from './config-schema.js';

/**
 * Values given on the command line; they win over the file
 */
export type ConfigOverrides = {
  outputDir?: string;
  maxConcurrent?: number;
};

export type LoadConfigOptions = {
  /** Explicit path; when set the file must exist */
  configPath?: string;
  overrides?: ConfigOverrides;
  env?: NodeJS.ProcessEnv;
};

/**
 * Read and validate a YAML config file
 *
 * @throws ConfigError if the YAML is malformed or does not match the schema
 */
export async function readConfigFile(absolutePath: string, env: NodeJS.ProcessEnv = process.env): Promise<FileConfig> {
  const content = await readFile(absolutePath, 'utf8');

  let raw: unknown;
  try {
    raw = yaml.load(content);
  } catch (error) {
    throw new ConfigError(`Failed to parse YAML: ${error instanceof Error ? error.message : String(error)}`);
  }

  // An empty file loads as undefined
  if (raw === undefined || raw === null) {
    return {};
  }
  if (!isPlainObject(raw)) {
    throw new ConfigError(`Configuration root must be a mapping: "${absolutePath}"`);
  }

  const result = FileConfigSchema.safeParse(resolveEnvRecursive(raw, env));
  if (!result.success) {
    throw new ConfigError(`Invalid configuration in "${absolutePath}": ${formatZodError(result.error)}`);
  }
  return result.data;
}

/**
 * Load configuration: defaults, then the YAML file, then CLI overrides
 *
 * Without an explicit path the default file is optional.
 *
 * @throws ConfigError if an explicit file is missing or anything is invalid
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<Config> {
  const { configPath, overrides = {}, env = process.env } = options;
  const absolutePath = resolve(configPath ?? DEFAULT_CONFIG_PATH);

  let fileConfig: FileConfig = {};
  if (existsSync(absolutePath)) {
    fileConfig = await readConfigFile(absolutePath, env);
  } else if (configPath !== undefined) {
    throw new ConfigError(`Configuration file not found: "${absolutePath}"`);
  }

  const cliConfig: PlainObject = {
    download: { outputDir: overrides.outputDir, maxConcurrent: overrides.maxConcurrent },
  };

  const merged = deepMerge(getDefaults(), fileConfig, cliConfig);
  const result = validateConfigSafe(merged);
  if (!result.success) {
    throw new ConfigError(result.error);
  }
  return result.config;
}
