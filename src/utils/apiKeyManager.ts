/**
 * API Key Manager Module
 *
 * Read-only access to API keys stored in a platform secret store.
 * On macOS the login keychain is queried through the `security` tool;
 * every other platform gets a store that never finds anything.
 */

import { runCommand, type CommandResult, type CommandRunner } from './cliTools.js';
import { LocalHelpError, LocalHelpErrorCode, isLocalHelpError } from './errors.js';

/**
 * Capability to look up a stored credential.
 * Rejects with KEY_NOT_FOUND, ACCESS_DENIED, INVALID_PARAMETERS or UNKNOWN_ERROR.
 */
export interface SecretStore {
  get(service: string, account: string): Promise<string>;
}

// `security` exit statuses (see SecBase.h, truncated to 8 bits)
const SECURITY_ITEM_NOT_FOUND = 44;
const SECURITY_ACCESS_DENIED_STATUSES = new Set([36, 51, 128]);

/**
 * macOS keychain lookup via `security find-generic-password`
 */
export class KeychainSecretStore implements SecretStore {
  constructor(private readonly run: CommandRunner = runCommand) {}

  async get(service: string, account: string): Promise<string> {
    if (!service || !account) {
      throw new LocalHelpError(
        LocalHelpErrorCode.INVALID_PARAMETERS,
        'Keychain lookup needs both a service and an account'
      );
    }

    let result: CommandResult;
    try {
      result = await this.run('security', ['find-generic-password', '-s', service, '-a', account, '-w'], {
        maxOutputBytes: 64 * 1024
      });
    } catch (error) {
      throw new LocalHelpError(
        LocalHelpErrorCode.UNKNOWN_ERROR,
        `Keychain lookup failed: ${error instanceof Error ? error.message : String(error)}`,
        { service }
      );
    }

    if (result.exitCode === SECURITY_ITEM_NOT_FOUND) {
      throw new LocalHelpError(LocalHelpErrorCode.KEY_NOT_FOUND, `No keychain item for ${service}`, { service });
    }
    if (result.exitCode !== null && SECURITY_ACCESS_DENIED_STATUSES.has(result.exitCode)) {
      throw new LocalHelpError(LocalHelpErrorCode.ACCESS_DENIED, `Keychain access denied for ${service}`, { service });
    }
    if (result.exitCode !== 0) {
      throw new LocalHelpError(
        LocalHelpErrorCode.UNKNOWN_ERROR,
        `security exited with ${result.exitCode ?? result.signal}`,
        { service, stderr: result.stderr.trim() }
      );
    }

    const secret = result.stdout.replace(/\r?\n$/, '');
    if (!secret) {
      throw new LocalHelpError(LocalHelpErrorCode.KEY_NOT_FOUND, `Keychain item for ${service} is empty`, { service });
    }
    return secret;
  }
}

/**
 * Secret store for platforms without keychain support
 */
export class UnsupportedSecretStore implements SecretStore {
  constructor(private readonly platform: string = process.platform) {}

  async get(service: string): Promise<string> {
    throw new LocalHelpError(
      LocalHelpErrorCode.KEY_NOT_FOUND,
      `No secret store available on ${this.platform}`,
      { service }
    );
  }
}

/**
 * Picks the secret store for the running platform
 */
export function createSecretStore(platform: NodeJS.Platform = process.platform): SecretStore {
  return platform === 'darwin' ? new KeychainSecretStore() : new UnsupportedSecretStore(platform);
}

/**
 * Gets the current user's account name for keychain lookups.
 * Uses $USER, falling back to `whoami`.
 * @returns The user name, or null when it cannot be determined
 */
export async function getCurrentUser(
  env: NodeJS.ProcessEnv = process.env,
  run: CommandRunner = runCommand
): Promise<string | null> {
  const fromEnv = env.USER;
  if (fromEnv) return fromEnv;

  try {
    const result = await run('whoami', [], { maxOutputBytes: 256 });
    if (result.exitCode !== 0) return null;
    const user = result.stdout.trim();
    return user || null;
  } catch (error) {
    if (isLocalHelpError(error, LocalHelpErrorCode.SPAWN_FAILED)) return null;
    throw error;
  }
}
