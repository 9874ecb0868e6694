/**
 * Provider Interfaces - Barrel Export
 */

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
} from './provider.interfaces';

export { ChatClient, ModelProvider } from './model-provider.interface';
