/**
 * Model Provider Interface
 *
 * The capability every provider, built-in or remote, must satisfy:
 * produce an underlying chat client from a model config.
 */

import { ModelConfig } from '../../model-config';
import { ChatRequest, ChatResult } from './provider.interfaces';

/**
 * Underlying chat/completion client of one model
 */
export interface ChatClient {
  /**
   * Send a chat request and wait for the full result
   */
  complete(request: ChatRequest): Promise<ChatResult>;
}

/**
 * A named strategy that builds chat clients
 */
export interface ModelProvider {
  readonly key: string;
  readonly name?: string;

  /**
   * Build the client for a model. Called lazily, on first invoke.
   */
  createClient(config: ModelConfig): Promise<ChatClient> | ChatClient;
}
