import { input, password } from '@inquirer/prompts';
import type { Credentials } from '../config/config-schema.js';
import { ConfigError } from '../errors/custom-errors.js';

export const USERNAME_ENV = 'HH_USERNAME';
export const PASSWORD_ENV = 'HH_PASSWORD';

/**
 * Asks the user for whatever is still missing
 */
export type CredentialPrompter = {
  username(): Promise<string>;
  password(): Promise<string>;
};

export type ResolveCredentialsOptions = {
  configured?: Partial<Credentials>;
  env?: NodeJS.ProcessEnv;
  /** Prompt only when stdin is a terminal */
  interactive?: boolean;
  prompter?: CredentialPrompter;
};

function isExitPromptError(error: unknown): boolean {
  return error instanceof Error && error.name === 'ExitPromptError';
}

export const inquirerPrompter: CredentialPrompter = {
  username: () =>
    input({
      message: 'Username or email:',
      validate: (value) => value.trim().length > 0 || 'Username is required',
    }),
  password: () =>
    password({
      message: 'Password:',
      mask: '*',
      validate: (value) => value.length > 0 || 'Password is required',
    }),
};

/**
 * Credentials from config, then the environment, then an interactive prompt
 *
 * @throws ConfigError when something is still missing and we cannot prompt
 */
export async function resolveCredentials(options: ResolveCredentialsOptions = {}): Promise<Credentials> {
  const {
    configured = {},
    env = process.env,
    interactive = process.stdin.isTTY === true,
    prompter = inquirerPrompter,
  } = options;

  let username = configured.username || env[USERNAME_ENV] || '';
  let pass = configured.password || env[PASSWORD_ENV] || '';

  if ((!username || !pass) && !interactive) {
    const missing = [!username && USERNAME_ENV, !pass && PASSWORD_ENV].filter(Boolean).join(', ');
    throw new ConfigError(`Missing credentials: set ${missing} or add them under "credentials" in the config file`);
  }

  try {
    if (!username) username = (await prompter.username()).trim();
    if (!pass) pass = await prompter.password();
  } catch (error) {
    if (isExitPromptError(error)) {
      throw new ConfigError('Credential prompt cancelled');
    }
    throw error;
  }

  return { username, password: pass };
}
