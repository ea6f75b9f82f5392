/**
 * Environment Configuration Module
 *
 * Builds the immutable Config for one invocation. Sources, in order:
 * 1. LOCALHELP_* environment variables
 * 2. The platform secret store, for the API key only. Only macOS has one;
 *    elsewhere the store never finds a key.
 *
 * The Config is created once at process entry and passed explicitly through
 * the pipeline; nothing reads process.env after this point.
 */

import { createSecretStore, getCurrentUser, type SecretStore } from './apiKeyManager.js';
import { runCommand, type CommandRunner } from './cliTools.js';
import { errorMessage } from './errors.js';
import { silentLogger, type Logger } from './logger.js';
import { getKeychainServiceName, parseProvider, type Provider } from './providerConfig.js';

export const ENV_KEYS = {
  PROVIDER: 'LOCALHELP_LLM_PROVIDER',
  API_KEY: 'LOCALHELP_API_KEY',
  API_URL: 'LOCALHELP_API_URL',
  MODEL: 'LOCALHELP_MODEL',
  DEV: 'LOCALHELP_DEV',
} as const;

/**
 * Runtime configuration
 */
export interface Config {
  readonly provider: Provider;
  readonly apiKey?: string;
  /** Endpoint for the local provider. */
  readonly apiUrl?: string;
  readonly modelName?: string;
  readonly debugMode: boolean;
}

export interface LoadConfigOptions {
  env?: NodeJS.ProcessEnv;
  platform?: NodeJS.Platform;
  secretStore?: SecretStore;
  run?: CommandRunner;
  logger?: Logger;
}

/**
 * Reads a variable, treating an empty value the same as an unset one
 */
function readVar(env: NodeJS.ProcessEnv, key: string): string | undefined {
  const value = env[key];
  return value ? value : undefined;
}

export function isDebugEnabled(env: NodeJS.ProcessEnv = process.env): boolean {
  const value = env[ENV_KEYS.DEV];
  return value === 'true' || value === '1';
}

/**
 * Looks up the provider's API key in the secret store.
 * Any store failure means "no key"; it never propagates.
 */
async function getApiKeyFromSecretStore(
  provider: Provider,
  store: SecretStore,
  env: NodeJS.ProcessEnv,
  run: CommandRunner,
  logger: Logger
): Promise<string | undefined> {
  const service = getKeychainServiceName(provider);
  try {
    const account = await getCurrentUser(env, run);
    if (!account) {
      logger.debug('config', 'Could not determine current user for keychain lookup');
      return undefined;
    }
    logger.debug('config', `Looking up ${service} for ${account} in keychain`);
    return await store.get(service, account);
  } catch (error) {
    logger.debug('config', `Keychain lookup failed: ${errorMessage(error)}`);
    return undefined;
  }
}

/**
 * Loads the configuration for this invocation
 * @returns A frozen Config
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<Config> {
  const env = options.env ?? process.env;
  const platform = options.platform ?? process.platform;
  const logger = options.logger ?? silentLogger;
  const run = options.run ?? runCommand;

  const provider = parseProvider(readVar(env, ENV_KEYS.PROVIDER));

  let apiKey = readVar(env, ENV_KEYS.API_KEY);
  if (apiKey === undefined) {
    const store = options.secretStore ?? createSecretStore(platform);
    apiKey = await getApiKeyFromSecretStore(provider, store, env, run, logger);
  }

  const config: Config = {
    provider,
    apiKey,
    apiUrl: readVar(env, ENV_KEYS.API_URL),
    modelName: readVar(env, ENV_KEYS.MODEL),
    debugMode: isDebugEnabled(env),
  };

  logger.debug('config', `Provider: ${provider}, API key: ${apiKey ? 'set' : 'unset'}`);
  return Object.freeze(config);
}
