/**
 * Provider Registry
 *
 * Maps provider keys to ModelProviders. Built-ins are registered at wiring
 * time; unknown keys are loaded once through the ProviderSourceLoader and
 * registered on success.
 */

import { ProviderNotFoundError } from '../errors';
import { createModuleLogger } from '../utils';
import { ModelProvider } from './interfaces';
import { ProviderSourceLoader } from './remote-provider.loader';

const logger = createModuleLogger('provider-registry');

const PROVIDER_KEY_PATTERN = /^[a-z0-9][a-z0-9._-]*$/;

/**
 * Registry keys are case-insensitive
 */
export function normalizeProviderKey(key: string): string {
  return key.trim().toLowerCase();
}

/**
 * Registry for all model providers, built-in and remote.
 */
export class ProviderRegistry {
  private providers: Map<string, ModelProvider> = new Map();
  private pendingLoads: Map<string, Promise<ModelProvider>> = new Map();

  constructor(private readonly sourceLoader: ProviderSourceLoader | null = null) {}

  /**
   * Register a provider; an existing entry under the same key is replaced
   */
  register(provider: ModelProvider, key: string = provider.key): void {
    const normalized = normalizeProviderKey(key);
    if (this.providers.has(normalized)) {
      logger.warn('Replacing registered provider', { provider: normalized });
    }
    this.providers.set(normalized, provider);
  }

  /**
   * Remove a provider; returns whether one was registered
   */
  unregister(key: string): boolean {
    return this.providers.delete(normalizeProviderKey(key));
  }

  /**
   * Get a registered provider, or undefined; never loads
   */
  getProvider(key: string): ModelProvider | undefined {
    return this.providers.get(normalizeProviderKey(key));
  }

  has(key: string): boolean {
    return this.providers.has(normalizeProviderKey(key));
  }

  getRegisteredKeys(): string[] {
    return Array.from(this.providers.keys()).sort();
  }

  /**
   * Get a provider by key, loading it remotely when not registered
   */
  async resolve(key: string): Promise<ModelProvider> {
    const provider = this.getProvider(key);
    if (provider) {
      return provider;
    }
    return this.loadRemote(key);
  }

  /**
   * Load a provider through the source loader and register it.
   * Concurrent loads of one key share a single fetch.
   */
  loadRemote(key: string): Promise<ModelProvider> {
    const normalized = normalizeProviderKey(key);

    const pending = this.pendingLoads.get(normalized);
    if (pending) {
      return pending;
    }

    const load = this.fetchProvider(normalized).finally(() => {
      this.pendingLoads.delete(normalized);
    });
    this.pendingLoads.set(normalized, load);
    return load;
  }

  private async fetchProvider(key: string): Promise<ModelProvider> {
    if (!PROVIDER_KEY_PATTERN.test(key)) {
      throw new ProviderNotFoundError(key, 'invalid provider key');
    }
    if (!this.sourceLoader) {
      throw new ProviderNotFoundError(key, 'not registered and remote loading is disabled');
    }

    const provider = await this.sourceLoader.load(key);
    if (!provider) {
      throw new ProviderNotFoundError(key, 'not registered and no remote module is available');
    }

    this.register(provider, key);
    return provider;
  }
}
