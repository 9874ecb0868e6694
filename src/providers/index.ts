/**
 * Provider Module - Barrel Export
 *
 * Exports interfaces, built-in providers, the registry, the remote loader
 * and the registry factory function.
 */

// Interfaces and types
export {
  BUILT_IN_PROVIDER_KEYS,
  BuiltInProviderKey,
  Message,
  ChatRequest,
  ChatResult,
  TokenUsage,
  FinishReason,
  ProviderErrorType,
  ProviderError,
  ChatClient,
  ModelProvider,
} from './interfaces';

// Base class
export { BaseProvider, BaseProviderOptions } from './base.provider';

// Provider implementations
export { OpenAIProvider } from './openai.provider';
export { BedrockProvider } from './bedrock.provider';
export { AnthropicProvider } from './anthropic.provider';
export { GoogleAIProvider } from './google.provider';

// Registry and remote loading
export { ProviderRegistry, normalizeProviderKey } from './provider.registry';
export {
  ProviderSourceLoader,
  ModuleEvaluator,
  TempFileModuleEvaluator,
  TempFileModuleEvaluatorOptions,
  DEFAULT_PROVIDER_MODULE_DIR,
  S3ProviderSourceLoader,
  S3ProviderSourceLoaderOptions,
  PROVIDER_MODULE_EXTENSION,
} from './remote-provider.loader';
export { toModelProvider, toChatClient } from './provider.validation';

import { SecretResolver } from '../remote';
import { AnthropicProvider } from './anthropic.provider';
import { BedrockProvider } from './bedrock.provider';
import { GoogleAIProvider } from './google.provider';
import { OpenAIProvider } from './openai.provider';
import { ProviderRegistry } from './provider.registry';
import { ProviderSourceLoader } from './remote-provider.loader';

/**
 * Collaborators for creating a provider registry
 */
export interface ProviderRegistryOptions {
  sourceLoader?: ProviderSourceLoader | null;
  secrets?: SecretResolver | null;
  env?: Record<string, string | undefined>;
}

/**
 * Factory function to create a ProviderRegistry with the built-in providers.
 *
 * @param options Remote loader and API key sources shared by the built-ins
 * @returns A ProviderRegistry with openai, bedrock, anthropic and google registered
 */
export function createProviderRegistry(
  options: ProviderRegistryOptions = {},
): ProviderRegistry {
  const registry = new ProviderRegistry(options.sourceLoader ?? null);
  const providerOptions = { secrets: options.secrets ?? null, env: options.env };

  registry.register(new OpenAIProvider(providerOptions));
  registry.register(new BedrockProvider(providerOptions));
  registry.register(new AnthropicProvider(providerOptions));
  registry.register(new GoogleAIProvider(providerOptions));

  return registry;
}
