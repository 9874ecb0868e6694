/**
 * Google AI Provider Implementation
 *
 * Uses @google/generative-ai for Gemini model completions.
 */

import { GoogleGenerativeAI, Content } from '@google/generative-ai';
import { ModelConfig } from '../model-config';
import { BaseProvider, readStatus, toFinishReason } from './base.provider';
import {
  ChatRequest,
  ChatResult,
  FinishReason,
  ProviderError,
} from './interfaces';

const DEFAULT_API_KEY_ENV_VAR = 'GOOGLE_AI_API_KEY';

const FINISH_REASONS: Record<string, FinishReason> = {
  STOP: 'end_turn',
  MAX_TOKENS: 'max_tokens',
  SAFETY: 'content_filter',
  RECITATION: 'content_filter',
};

/**
 * Google Gemini provider implementation
 */
export class GoogleAIProvider extends BaseProvider<GoogleGenerativeAI> {
  readonly key = 'google';
  readonly name = 'Google AI';

  /**
   * Create a Google Generative AI client
   */
  protected async createSdkClient(config: ModelConfig): Promise<GoogleGenerativeAI> {
    const apiKey = await this.resolveApiKey(config, DEFAULT_API_KEY_ENV_VAR);
    return new GoogleGenerativeAI(apiKey);
  }

  /**
   * Execute a completion request using the Google Generative AI API
   */
  protected async executeComplete(client: GoogleGenerativeAI, request: ChatRequest): Promise<ChatResult> {
    const systemInstruction = request.messages
      .filter(m => m.role === 'system')
      .map(m => m.content)
      .join('\n\n');

    const model = client.getGenerativeModel({
      model: request.model,
      ...(systemInstruction ? { systemInstruction } : {}),
    });

    const contents: Content[] = request.messages
      .filter(m => m.role !== 'system')
      .map(m => ({
        role: m.role === 'assistant' ? 'model' : 'user',
        parts: [{ text: m.content }],
      }));

    const result = await model.generateContent({
      contents,
      generationConfig: {
        maxOutputTokens: request.maxTokens,
        ...(request.temperature !== undefined ? { temperature: request.temperature } : {}),
        ...(request.topP !== undefined ? { topP: request.topP } : {}),
        ...(request.stopSequences ? { stopSequences: request.stopSequences } : {}),
      },
    }, { signal: request.signal });

    const response = result.response;
    const candidate = response.candidates?.[0];
    const finishReason: string | undefined = candidate?.finishReason;

    if (finishReason === 'SAFETY') {
      throw new ProviderError('Content blocked by safety filter', 'content_filter_error', this.key);
    }

    const content = (candidate?.content?.parts ?? [])
      .map(part => part.text ?? '')
      .join('');

    return {
      content,
      model: request.model,
      usage: {
        inputTokens: response.usageMetadata?.promptTokenCount ?? 0,
        outputTokens: response.usageMetadata?.candidatesTokenCount ?? 0,
      },
      finishReason: toFinishReason(finishReason, FINISH_REASONS),
    };
  }

  /**
   * Map Google AI errors to ProviderError
   */
  mapError(error: unknown): ProviderError {
    if (error instanceof ProviderError) {
      return error;
    }

    const message = error instanceof Error && error.message ? error.message : 'Unknown Google AI error';
    if (readStatus(error) === undefined && message.includes('API key')) {
      return new ProviderError(message, 'authentication_error', this.key);
    }
    if (message.toLowerCase().includes('safety')) {
      return new ProviderError(message, 'content_filter_error', this.key, readStatus(error));
    }
    return this.mapHttpError(error, 'Unknown Google AI error');
  }
}
