/**
 * Provider Configuration Module
 *
 * The closed set of LLM backends and the per-provider constants around them.
 */

// Provider definitions
export const PROVIDERS = {
  OPENROUTER: 'openrouter',
  OPENAI: 'openai',
  ANTHROPIC: 'anthropic',
  LOCAL: 'local',
  SIMULATION: 'simulation'
} as const;

/**
 * Provider type
 */
export type Provider = typeof PROVIDERS[keyof typeof PROVIDERS];

export const DEFAULT_PROVIDER: Provider = PROVIDERS.OPENROUTER;

const ALL_PROVIDERS: readonly Provider[] = Object.values(PROVIDERS);

// Only providers that take an API key have a keychain entry
const KEYCHAIN_SERVICES: Partial<Record<string, string>> = {
  [PROVIDERS.OPENROUTER]: 'localhelp-openrouter',
  [PROVIDERS.OPENAI]: 'localhelp-openai',
  [PROVIDERS.ANTHROPIC]: 'localhelp-anthropic'
};

export function isProvider(value: string): value is Provider {
  return (ALL_PROVIDERS as readonly string[]).includes(value);
}

/**
 * Resolves a provider name. Matching is exact and case-sensitive; anything
 * unknown (or missing) falls back to the default provider.
 * @param {string | undefined} value - Raw provider name, usually from the environment
 * @returns {Provider}
 */
export function parseProvider(value: string | undefined): Provider {
  if (value !== undefined && isProvider(value)) {
    return value;
  }
  return DEFAULT_PROVIDER;
}

/**
 * Keychain service name under which a provider's API key is stored
 * @param {string} provider - The provider name
 * @returns {string} - e.g. "localhelp-openrouter", or "localhelp-unknown"
 */
export function getKeychainServiceName(provider: string): string {
  return KEYCHAIN_SERVICES[provider] ?? 'localhelp-unknown';
}

export const DEFAULT_OPENROUTER_MODEL = 'anthropic/claude-3.7-sonnet';

/**
 * Gets a user-friendly display name for a provider
 */
export function getProviderDisplayName(provider: Provider): string {
  switch (provider) {
    case PROVIDERS.OPENROUTER:
      return 'OpenRouter';
    case PROVIDERS.OPENAI:
      return 'OpenAI';
    case PROVIDERS.ANTHROPIC:
      return 'Anthropic';
    case PROVIDERS.LOCAL:
      return 'Local LLM';
    case PROVIDERS.SIMULATION:
      return 'Simulation';
  }
}
