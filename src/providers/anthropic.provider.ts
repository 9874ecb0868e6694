/**
 * Anthropic Provider Implementation
 *
 * Uses @anthropic-ai/sdk for Claude model completions.
 */

import Anthropic from '@anthropic-ai/sdk';
import { ModelConfig } from '../model-config';
import { BaseProvider, toFinishReason } from './base.provider';
import {
  ChatRequest,
  ChatResult,
  FinishReason,
  ProviderError,
} from './interfaces';

const DEFAULT_API_KEY_ENV_VAR = 'ANTHROPIC_API_KEY';

const STOP_REASONS: Record<string, FinishReason> = {
  end_turn: 'end_turn',
  max_tokens: 'max_tokens',
  stop_sequence: 'stop_sequence',
  tool_use: 'tool_use',
};

/**
 * Anthropic Claude provider implementation
 */
export class AnthropicProvider extends BaseProvider<Anthropic> {
  readonly key = 'anthropic';
  readonly name = 'Anthropic';

  /**
   * Create an Anthropic client with the model's API key
   */
  protected async createSdkClient(config: ModelConfig): Promise<Anthropic> {
    const apiKey = await this.resolveApiKey(config, DEFAULT_API_KEY_ENV_VAR);
    return new Anthropic({
      apiKey,
      ...(config.baseUrl ? { baseURL: config.baseUrl } : {}),
    });
  }

  /**
   * Execute a completion request using the Anthropic Messages API
   */
  protected async executeComplete(client: Anthropic, request: ChatRequest): Promise<ChatResult> {
    // Anthropic takes the system prompt apart from the conversation
    const systemPrompt = request.messages
      .filter(m => m.role === 'system')
      .map(m => m.content)
      .join('\n\n');
    const conversation = request.messages.filter(m => m.role !== 'system');

    const params: Anthropic.MessageCreateParamsNonStreaming = {
      model: request.model,
      max_tokens: request.maxTokens,
      messages: conversation.map((m): Anthropic.MessageParam => ({
        role: m.role === 'assistant' ? 'assistant' : 'user',
        content: m.content,
      })),
      ...(systemPrompt ? { system: systemPrompt } : {}),
      ...(request.temperature !== undefined ? { temperature: request.temperature } : {}),
      ...(request.topP !== undefined ? { top_p: request.topP } : {}),
      ...(request.stopSequences ? { stop_sequences: request.stopSequences } : {}),
    };

    const response = await client.messages.create(params, { signal: request.signal });

    const content = response.content
      .filter((block): block is Anthropic.TextBlock => block.type === 'text')
      .map(block => block.text)
      .join('');

    return {
      content,
      model: response.model,
      usage: {
        inputTokens: response.usage.input_tokens,
        outputTokens: response.usage.output_tokens,
      },
      finishReason: toFinishReason(response.stop_reason, STOP_REASONS),
    };
  }

  /**
   * Map Anthropic SDK errors to ProviderError
   */
  mapError(error: unknown): ProviderError {
    // 529 (overloaded) falls under server_error
    return this.mapHttpError(error, 'Unknown Anthropic error');
  }
}
