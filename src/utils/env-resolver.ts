import { ConfigError } from '../errors/custom-errors.js';

const PLACEHOLDER = /\$\{([A-Za-z_][A-Za-z0-9_]*)(?::-([^}]*))?\}/g;

/**
 * Resolve environment variables in strings
 * Supports ${VAR_NAME} and ${VAR_NAME:-fallback}
 *
 * @throws ConfigError when a variable without fallback is unset
 */
export function resolveEnv(value: string, env: NodeJS.ProcessEnv = process.env): string {
  return value.replace(PLACEHOLDER, (_match, varName: string, fallback: string | undefined) => {
    const envValue = env[varName];
    if (envValue !== undefined && envValue !== '') {
      return envValue;
    }
    if (fallback !== undefined) {
      return fallback;
    }
    throw new ConfigError(`Environment variable "${varName}" is not set`);
  });
}

/**
 * Recursively resolve environment variables in a parsed YAML value
 */
export function resolveEnvRecursive(value: unknown, env: NodeJS.ProcessEnv = process.env): unknown {
  if (typeof value === 'string') {
    return resolveEnv(value, env);
  }

  if (Array.isArray(value)) {
    return value.map((item) => resolveEnvRecursive(item, env));
  }

  if (value !== null && typeof value === 'object') {
    return Object.fromEntries(Object.entries(value).map(([key, item]) => [key, resolveEnvRecursive(item, env)]));
  }

  return value;
}
