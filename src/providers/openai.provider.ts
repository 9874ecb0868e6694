/**
 * OpenAI Provider Implementation
 *
 * Uses the openai npm package for chat completions. Any OpenAI-compatible
 * endpoint works through the descriptor's `base_url`.
 */

import OpenAI from 'openai';
import { ModelConfig } from '../model-config';
import { BaseProvider, toFinishReason } from './base.provider';
import {
  ChatRequest,
  ChatResult,
  FinishReason,
  ProviderError,
} from './interfaces';

const DEFAULT_API_KEY_ENV_VAR = 'OPENAI_API_KEY';

const FINISH_REASONS: Record<string, FinishReason> = {
  stop: 'end_turn',
  length: 'max_tokens',
  tool_calls: 'tool_use',
  function_call: 'tool_use',
  content_filter: 'content_filter',
};

/**
 * OpenAI-compatible chat provider
 */
export class OpenAIProvider extends BaseProvider<OpenAI> {
  readonly key = 'openai';
  readonly name = 'OpenAI';

  /**
   * Create an OpenAI client with the model's API key and endpoint
   */
  protected async createSdkClient(config: ModelConfig): Promise<OpenAI> {
    const apiKey = await this.resolveApiKey(config, DEFAULT_API_KEY_ENV_VAR);
    return new OpenAI({
      apiKey,
      ...(config.baseUrl ? { baseURL: config.baseUrl } : {}),
    });
  }

  /**
   * Execute a completion request using the OpenAI Chat API
   */
  protected async executeComplete(client: OpenAI, request: ChatRequest): Promise<ChatResult> {
    // system/user/assistant roles are compatible
    const messages: OpenAI.ChatCompletionMessageParam[] = request.messages.map(m => ({
      role: m.role,
      content: m.content,
    }));

    const response = await client.chat.completions.create({
      model: request.model,
      messages,
      max_tokens: request.maxTokens,
      ...(request.temperature !== undefined ? { temperature: request.temperature } : {}),
      ...(request.topP !== undefined ? { top_p: request.topP } : {}),
      ...(request.stopSequences ? { stop: request.stopSequences } : {}),
    }, { signal: request.signal });

    const choice = response.choices[0];

    return {
      content: choice?.message?.content ?? '',
      model: response.model,
      usage: {
        inputTokens: response.usage?.prompt_tokens ?? 0,
        outputTokens: response.usage?.completion_tokens ?? 0,
      },
      finishReason: toFinishReason(choice?.finish_reason, FINISH_REASONS),
    };
  }

  /**
   * Map OpenAI SDK errors to ProviderError
   */
  mapError(error: unknown): ProviderError {
    return this.mapHttpError(error, 'Unknown OpenAI error');
  }
}
