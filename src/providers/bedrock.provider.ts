/**
 * Bedrock Provider Implementation
 *
 * Uses the Bedrock Runtime Converse API, which gives one request shape for
 * every model family hosted on Bedrock. Credentials come from the ambient
 * AWS credential chain.
 */

import {
  BedrockRuntimeClient,
  BedrockRuntimeServiceException,
  ConverseCommand,
  Message as BedrockMessage,
} from '@aws-sdk/client-bedrock-runtime';
import { ModelConfig } from '../model-config';
import { BaseProvider, toFinishReason } from './base.provider';
import {
  ChatRequest,
  ChatResult,
  FinishReason,
  ProviderError,
} from './interfaces';

const STOP_REASONS: Record<string, FinishReason> = {
  end_turn: 'end_turn',
  max_tokens: 'max_tokens',
  stop_sequence: 'stop_sequence',
  tool_use: 'tool_use',
  content_filtered: 'content_filter',
  guardrail_intervened: 'content_filter',
};

/**
 * AWS Bedrock hosted model provider
 */
export class BedrockProvider extends BaseProvider<BedrockRuntimeClient> {
  readonly key = 'bedrock';
  readonly name = 'AWS Bedrock';

  /**
   * Create a Bedrock Runtime client in the model's region
   */
  protected async createSdkClient(config: ModelConfig): Promise<BedrockRuntimeClient> {
    const region = config.regionName ?? this.env.AWS_REGION;
    return new BedrockRuntimeClient(region ? { region } : {});
  }

  /**
   * Execute a completion request using the Converse API
   */
  protected async executeComplete(client: BedrockRuntimeClient, request: ChatRequest): Promise<ChatResult> {
    const system = request.messages
      .filter(m => m.role === 'system')
      .map(m => ({ text: m.content }));

    const messages: BedrockMessage[] = request.messages
      .filter(m => m.role !== 'system')
      .map((m): BedrockMessage => ({
        role: m.role === 'assistant' ? 'assistant' : 'user',
        content: [{ text: m.content }],
      }));

    const response = await client.send(new ConverseCommand({
      modelId: request.model,
      messages,
      ...(system.length > 0 ? { system } : {}),
      inferenceConfig: {
        maxTokens: request.maxTokens,
        ...(request.temperature !== undefined ? { temperature: request.temperature } : {}),
        ...(request.topP !== undefined ? { topP: request.topP } : {}),
        ...(request.stopSequences ? { stopSequences: request.stopSequences } : {}),
      },
    }), { abortSignal: request.signal });

    const content = (response.output?.message?.content ?? [])
      .map(block => block.text ?? '')
      .join('');

    return {
      content,
      model: request.model,
      usage: {
        inputTokens: response.usage?.inputTokens ?? 0,
        outputTokens: response.usage?.outputTokens ?? 0,
      },
      finishReason: toFinishReason(response.stopReason, STOP_REASONS),
    };
  }

  /**
   * Map Bedrock service exceptions to ProviderError
   */
  mapError(error: unknown): ProviderError {
    if (error instanceof ProviderError) {
      return error;
    }

    if (!(error instanceof BedrockRuntimeServiceException)) {
      return this.mapHttpError(error, 'Unknown Bedrock error');
    }

    const status = error.$metadata.httpStatusCode;
    const message = error.message || error.name;

    switch (error.name) {
      case 'AccessDeniedException':
      case 'UnrecognizedClientException':
        return new ProviderError(message, 'authentication_error', this.key, status);
      case 'ThrottlingException':
      case 'ServiceQuotaExceededException':
        return new ProviderError(message, 'rate_limit_error', this.key, status, true);
      case 'ValidationException':
        if (message.toLowerCase().includes('too long')) {
          return new ProviderError(message, 'context_length_error', this.key, status);
        }
        return new ProviderError(message, 'invalid_request_error', this.key, status);
      case 'ResourceNotFoundException':
      case 'ModelNotReadyException':
        return new ProviderError(message, 'model_not_found_error', this.key, status);
      case 'ModelTimeoutException':
        return new ProviderError(message, 'timeout_error', this.key, status, true);
      case 'InternalServerException':
      case 'ServiceUnavailableException':
      case 'ModelErrorException':
        return new ProviderError(message, 'server_error', this.key, status, true);
      default:
        return new ProviderError(message, 'unknown_error', this.key, status);
    }
  }
}
