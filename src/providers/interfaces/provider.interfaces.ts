/**
 * Provider Interfaces and Types
 *
 * Unified chat types shared by every provider, built-in or remote.
 */

/**
 * Keys of the providers registered at wiring time
 */
export const BUILT_IN_PROVIDER_KEYS = ['openai', 'bedrock', 'anthropic', 'google'] as const;

export type BuiltInProviderKey = typeof BUILT_IN_PROVIDER_KEYS[number];

/**
 * Unified message format across all providers
 */
export interface Message {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

/**
 * Unified chat request handed to a ChatClient
 */
export interface ChatRequest {
  model: string;
  messages: Message[];
  maxTokens: number;
  temperature?: number;
  topP?: number;
  stopSequences?: string[];
  /** Aborted when the caller gives up on the request */
  signal?: AbortSignal;
}

/**
 * Token usage information
 */
export interface TokenUsage {
  inputTokens: number;
  outputTokens: number;
}

export type FinishReason =
  | 'end_turn'
  | 'max_tokens'
  | 'stop_sequence'
  | 'tool_use'
  | 'content_filter'
  | 'error';

/**
 * Unified chat result returned by a ChatClient
 */
export interface ChatResult {
  content: string;
  model: string;
  usage: TokenUsage;
  finishReason: FinishReason;
}

/**
 * Unified error types across providers
 */
export type ProviderErrorType =
  | 'authentication_error'     // Invalid API key or credentials
  | 'rate_limit_error'         // Rate limited
  | 'invalid_request_error'    // Bad request
  | 'model_not_found_error'    // Model doesn't exist
  | 'context_length_error'     // Input too long
  | 'content_filter_error'     // Safety/content filter triggered
  | 'server_error'             // Provider server error
  | 'timeout_error'            // Request timed out
  | 'network_error'            // Network connectivity issue
  | 'invalid_response_error'   // Client returned an unexpected shape
  | 'unknown_error';           // Unclassified error

/**
 * Normalized error raised while invoking a model
 */
export class ProviderError extends Error {
  constructor(
    message: string,
    public readonly type: ProviderErrorType,
    public readonly provider: string,
    public readonly statusCode?: number,
    public readonly retryable: boolean = false,
  ) {
    super(message);
    this.name = 'ProviderError';
    // Restore prototype chain for instanceof checks when targeting ES5
    Object.setPrototypeOf(this, ProviderError.prototype);
  }
}
