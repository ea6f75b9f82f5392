import { describe, expect, it, vi } from 'vitest';
import {
  KeychainSecretStore,
  UnsupportedSecretStore,
  createSecretStore,
  getCurrentUser,
  type SecretStore,
} from '../src/utils/apiKeyManager.js';
import { isDebugEnabled, loadConfig } from '../src/utils/env.js';
import { LocalHelpError, LocalHelpErrorCode } from '../src/utils/errors.js';
import { getKeychainServiceName, parseProvider } from '../src/utils/providerConfig.js';
import { fakeRunner, result } from './helpers.js';

function storeReturning(get: SecretStore['get']) {
  return { get: vi.fn(get) };
}

describe('parseProvider', () => {
  it('accepts exact provider names', () => {
    expect(parseProvider('simulation')).toBe('simulation');
    expect(parseProvider('local')).toBe('local');
  });

  it('falls back to openrouter', () => {
    expect(parseProvider(undefined)).toBe('openrouter');
    expect(parseProvider('OpenAI')).toBe('openrouter');
    expect(parseProvider('gemini')).toBe('openrouter');
  });
});

describe('getKeychainServiceName', () => {
  it('names a keychain service per remote provider', () => {
    expect(getKeychainServiceName('openrouter')).toBe('localhelp-openrouter');
    expect(getKeychainServiceName('openai')).toBe('localhelp-openai');
    expect(getKeychainServiceName('anthropic')).toBe('localhelp-anthropic');
    expect(getKeychainServiceName('local')).toBe('localhelp-unknown');
    expect(getKeychainServiceName('simulation')).toBe('localhelp-unknown');
  });
});

describe('isDebugEnabled', () => {
  it('accepts true and 1 only', () => {
    expect(isDebugEnabled({ LOCALHELP_DEV: 'true' })).toBe(true);
    expect(isDebugEnabled({ LOCALHELP_DEV: '1' })).toBe(true);
    expect(isDebugEnabled({ LOCALHELP_DEV: 'yes' })).toBe(false);
    expect(isDebugEnabled({})).toBe(false);
  });
});

describe('loadConfig', () => {
  it('uses defaults for an empty environment', async () => {
    const config = await loadConfig({ env: {}, platform: 'linux' });

    expect(config).toEqual({
      provider: 'openrouter',
      apiKey: undefined,
      apiUrl: undefined,
      modelName: undefined,
      debugMode: false,
    });
    expect(Object.isFrozen(config)).toBe(true);
  });

  it('reads every LOCALHELP_ variable', async () => {
    const config = await loadConfig({
      platform: 'linux',
      env: {
        LOCALHELP_LLM_PROVIDER: 'local',
        LOCALHELP_API_KEY: 'test-key',
        LOCALHELP_API_URL: 'http://localhost:11434',
        LOCALHELP_MODEL: 'llama3.1:8b',
        LOCALHELP_DEV: '1',
      },
    });

    expect(config).toEqual({
      provider: 'local',
      apiKey: 'test-key',
      apiUrl: 'http://localhost:11434',
      modelName: 'llama3.1:8b',
      debugMode: true,
    });
  });

  it('treats empty variables as unset', async () => {
    const config = await loadConfig({ platform: 'linux', env: { LOCALHELP_API_KEY: '', LOCALHELP_MODEL: '' } });

    expect(config.apiKey).toBeUndefined();
    expect(config.modelName).toBeUndefined();
  });

  it('reads the key from the keychain on macOS', async () => {
    const store = storeReturning(async () => 'test-secret');

    const config = await loadConfig({ env: { USER: 'alice' }, platform: 'darwin', secretStore: store });

    expect(config.apiKey).toBe('test-secret');
    expect(store.get).toHaveBeenCalledWith('localhelp-openrouter', 'alice');
  });

  it('asks whoami for the account when USER is unset', async () => {
    const store = storeReturning(async () => 'test-secret');
    const { run, calls } = fakeRunner(() => result(0, 'bob\n'));

    await loadConfig({ env: { LOCALHELP_LLM_PROVIDER: 'anthropic' }, platform: 'darwin', secretStore: store, run });

    expect(calls).toEqual([['whoami']]);
    expect(store.get).toHaveBeenCalledWith('localhelp-anthropic', 'bob');
  });

  it('prefers the environment over the keychain', async () => {
    const store = storeReturning(async () => 'test-secret');

    const config = await loadConfig({ env: { LOCALHELP_API_KEY: 'test-key' }, platform: 'darwin', secretStore: store });

    expect(config.apiKey).toBe('test-key');
    expect(store.get).not.toHaveBeenCalled();
  });

  it('finds no stored key on platforms without a keychain', async () => {
    const { run, calls } = fakeRunner(() => result(0, 'test-secret\n'));

    const config = await loadConfig({ env: { USER: 'alice' }, platform: 'linux', run });

    expect(config.apiKey).toBeUndefined();
    expect(calls).toEqual([]);
  });

  it('asks whichever store it is given once the environment has no key', async () => {
    const store = storeReturning(async () => 'test-secret');

    const config = await loadConfig({ env: { USER: 'alice' }, platform: 'linux', secretStore: store });

    expect(config.apiKey).toBe('test-secret');
    expect(store.get).toHaveBeenCalledWith('localhelp-openrouter', 'alice');
  });

  it('absorbs keychain failures', async () => {
    for (const code of [LocalHelpErrorCode.KEY_NOT_FOUND, LocalHelpErrorCode.ACCESS_DENIED]) {
      const store = storeReturning(async () => {
        throw new LocalHelpError(code, 'nope');
      });

      const config = await loadConfig({ env: { USER: 'alice' }, platform: 'darwin', secretStore: store });
      expect(config.apiKey).toBeUndefined();
    }
  });
});

describe('KeychainSecretStore', () => {
  it('runs security and strips the trailing newline', async () => {
    const { run, calls } = fakeRunner(() => result(0, 'test-secret\n'));

    await expect(new KeychainSecretStore(run).get('localhelp-openai', 'alice')).resolves.toBe('test-secret');
    expect(calls).toEqual([['security', 'find-generic-password', '-s', 'localhelp-openai', '-a', 'alice', '-w']]);
  });

  it.each([
    [44, LocalHelpErrorCode.KEY_NOT_FOUND],
    [36, LocalHelpErrorCode.ACCESS_DENIED],
    [51, LocalHelpErrorCode.ACCESS_DENIED],
    [128, LocalHelpErrorCode.ACCESS_DENIED],
    [1, LocalHelpErrorCode.UNKNOWN_ERROR],
  ])('maps exit status %i to %s', async (status, code) => {
    const { run } = fakeRunner(() => result(status));

    await expect(new KeychainSecretStore(run).get('svc', 'alice')).rejects.toMatchObject({ code });
  });

  it('reports an empty item as missing', async () => {
    const { run } = fakeRunner(() => result(0, '\n'));

    await expect(new KeychainSecretStore(run).get('svc', 'alice')).rejects.toMatchObject({
      code: LocalHelpErrorCode.KEY_NOT_FOUND,
    });
  });

  it('rejects an empty service or account before running anything', async () => {
    const { run, calls } = fakeRunner(() => result(0, 'x'));
    const store = new KeychainSecretStore(run);

    await expect(store.get('', 'alice')).rejects.toMatchObject({ code: LocalHelpErrorCode.INVALID_PARAMETERS });
    await expect(store.get('svc', '')).rejects.toMatchObject({ code: LocalHelpErrorCode.INVALID_PARAMETERS });
    expect(calls).toEqual([]);
  });

  it('reports a security tool that cannot be started', async () => {
    const { run } = fakeRunner(() => new LocalHelpError(LocalHelpErrorCode.SPAWN_FAILED, 'spawn security ENOENT'));

    await expect(new KeychainSecretStore(run).get('svc', 'alice')).rejects.toMatchObject({
      code: LocalHelpErrorCode.UNKNOWN_ERROR,
    });
  });
});

describe('createSecretStore', () => {
  it('uses the keychain only on macOS', async () => {
    expect(createSecretStore('darwin')).toBeInstanceOf(KeychainSecretStore);
    expect(createSecretStore('linux')).toBeInstanceOf(UnsupportedSecretStore);
    await expect(createSecretStore('win32').get('svc', 'alice')).rejects.toMatchObject({
      code: LocalHelpErrorCode.KEY_NOT_FOUND,
    });
  });
});

describe('getCurrentUser', () => {
  it('prefers USER', async () => {
    const { run, calls } = fakeRunner(() => result(0, 'bob\n'));

    await expect(getCurrentUser({ USER: 'alice' }, run)).resolves.toBe('alice');
    expect(calls).toEqual([]);
  });

  it('falls back to whoami', async () => {
    const { run } = fakeRunner(() => result(0, '  bob \n'));
    await expect(getCurrentUser({}, run)).resolves.toBe('bob');
  });

  it('returns null when whoami fails or cannot start', async () => {
    await expect(getCurrentUser({}, fakeRunner(() => result(1)).run)).resolves.toBeNull();
    await expect(getCurrentUser({}, fakeRunner(() => result(0, '\n')).run)).resolves.toBeNull();
    await expect(
      getCurrentUser({}, fakeRunner(() => new LocalHelpError(LocalHelpErrorCode.SPAWN_FAILED, 'spawn whoami ENOENT')).run),
    ).resolves.toBeNull();
  });
});
