import { describe, expect, it } from 'vitest';
import { ConfigError } from '../errors/custom-errors.js';
import { resolveEnv, resolveEnvRecursive } from './env-resolver.js';

describe('Env Resolver', () => {
  describe('resolveEnv', () => {
    it('should resolve existing environment variable', () => {
      expect(resolveEnv('user is ${HH_USERNAME}', { HH_USERNAME: 'listener' })).toBe('user is listener');
    });

    it('should return string as is if no variables', () => {
      expect(resolveEnv('No variables here', {})).toBe('No variables here');
    });

    it('should throw ConfigError for missing environment variable', () => {
      expect(() => resolveEnv('${MISSING_VAR}', {})).toThrow(ConfigError);
      expect(() => resolveEnv('${MISSING_VAR}', {})).toThrow('Environment variable "MISSING_VAR" is not set');
    });

    it('should use the fallback when the variable is unset or empty', () => {
      expect(resolveEnv('${OUT_DIR:-episodes}', {})).toBe('episodes');
      expect(resolveEnv('${OUT_DIR:-episodes}', { OUT_DIR: '' })).toBe('episodes');
      expect(resolveEnv('${OUT_DIR:-episodes}', { OUT_DIR: '/data' })).toBe('/data');
    });

    it('should allow an empty fallback', () => {
      expect(resolveEnv('[${OPTIONAL:-}]', {})).toBe('[]');
    });

    it('should resolve multiple variables', () => {
      expect(resolveEnv('${VAR1} and ${VAR2}', { VAR1: 'one', VAR2: 'two' })).toBe('one and two');
    });
  });

  describe('resolveEnvRecursive', () => {
    it('should resolve variables in nested objects and arrays', () => {
      const env = { HH_USERNAME: 'listener', HH_PASSWORD: 'test-secret' };
      const resolved = resolveEnvRecursive(
        {
          credentials: { username: '${HH_USERNAME}', password: '${HH_PASSWORD}' },
          tags: ['static', '${HH_USERNAME}'],
          download: { maxConcurrent: 3 },
        },
        env,
      );

      expect(resolved).toEqual({
        credentials: { username: 'listener', password: 'test-secret' },
        tags: ['static', 'listener'],
        download: { maxConcurrent: 3 },
      });
    });

    it('should leave non-string scalars untouched', () => {
      expect(resolveEnvRecursive(null, {})).toBeNull();
      expect(resolveEnvRecursive(true, {})).toBe(true);
    });
  });
});
