/**
 * LlmModel
 *
 * One named, configured model. Construction does no I/O; the underlying
 * chat client is created on first use and shared by later calls.
 */

import { ProviderInitError } from '../errors';
import { ModelConfig } from '../model-config';
import {
  ChatClient,
  ChatRequest,
  ChatResult,
  Message,
  ModelProvider,
  ProviderError,
  TokenUsage,
} from '../providers/interfaces';
import { createModuleLogger, describeError } from '../utils';

const logger = createModuleLogger('llm-model');

/**
 * Default invoke timeout: 2 minutes
 */
export const DEFAULT_INVOKE_TIMEOUT_MS = 120_000;

export interface LlmModelOptions {
  timeoutMs?: number;
}

/**
 * Per-call overrides of the descriptor defaults
 */
export interface InvokeOptions {
  system?: string;
  maxTokens?: number;
  temperature?: number;
  topP?: number;
  stopSequences?: string[];
}

/**
 * Cost information for a request
 */
export interface CostInfo {
  amount: number;
  currency: 'USD';
}

export interface InvokeResponse extends ChatResult {
  cost: CostInfo;
  latency: number;
  provider: string;
}

export class LlmModel {
  private readonly timeoutMs: number;
  private client: ChatClient | null = null;
  private pendingClient: Promise<ChatClient> | null = null;

  constructor(
    readonly name: string,
    readonly config: ModelConfig,
    readonly provider: ModelProvider,
    options: LlmModelOptions = {},
  ) {
    this.timeoutMs = options.timeoutMs ?? DEFAULT_INVOKE_TIMEOUT_MS;
  }

  /**
   * Whether the underlying client has been created
   */
  isInitialized(): boolean {
    return this.client !== null;
  }

  /**
   * Get the underlying chat client, creating it on first call.
   * A failed creation is not remembered; the next call tries again.
   */
  getClient(): Promise<ChatClient> {
    if (this.client) {
      return Promise.resolve(this.client);
    }
    if (this.pendingClient) {
      return this.pendingClient;
    }

    const pending = this.createClient().finally(() => {
      this.pendingClient = null;
    });
    this.pendingClient = pending;
    return pending;
  }

  /**
   * Send a prompt or a conversation and wait for the full response
   */
  async invoke(input: string | Message[], options: InvokeOptions = {}): Promise<InvokeResponse> {
    const request = this.buildRequest(input, options);
    const client = await this.getClient();

    try {
      return await this.withTimeout(async signal => {
        const start = Date.now();
        const result = await client.complete({ ...request, signal });
        const latency = Date.now() - start;
        return {
          ...result,
          cost: this.calculateCost(result.usage),
          latency,
          provider: this.config.provider,
        };
      });
    } catch (error) {
      if (error instanceof ProviderError) {
        throw error;
      }
      throw new ProviderError(
        describeError(error) || 'Unknown invocation error',
        'unknown_error',
        this.config.provider,
      );
    }
  }

  /**
   * Cost in USD of a number of input or output tokens
   */
  calculateTokenCost(tokenCount: number, kind: 'input' | 'output'): number {
    const perMillion = kind === 'input'
      ? this.config.inputTokenCostUsdPerMillion
      : this.config.outputTokenCostUsdPerMillion;
    return (tokenCount * perMillion) / 1_000_000;
  }

  /**
   * Calculate cost based on token usage and the descriptor's prices
   */
  calculateCost(usage: TokenUsage): CostInfo {
    return {
      amount: this.calculateTokenCost(usage.inputTokens, 'input')
        + this.calculateTokenCost(usage.outputTokens, 'output'),
      currency: 'USD',
    };
  }

  toString(): string {
    return `LlmModel(${this.name}: ${this.config.provider}/${this.config.modelId})`;
  }

  private async createClient(): Promise<ChatClient> {
    try {
      const client = await this.provider.createClient(this.config);
      this.client = client;
      logger.info('Initialized model client', { model: this.name, provider: this.config.provider });
      return client;
    } catch (error) {
      logger.error('Failed to initialize model client', {
        model: this.name,
        provider: this.config.provider,
        error: describeError(error),
      });
      throw new ProviderInitError(this.config.provider, this.name, error);
    }
  }

  private buildRequest(input: string | Message[], options: InvokeOptions): ChatRequest {
    const messages: Message[] = typeof input === 'string'
      ? [{ role: 'user', content: input }]
      : [...input];

    if (options.system) {
      messages.unshift({ role: 'system', content: options.system });
    }

    if (!messages.some(m => m.role !== 'system')) {
      throw new ProviderError(
        'Invocation must contain at least one user or assistant message',
        'invalid_request_error',
        this.config.provider,
      );
    }

    const maxTokens = options.maxTokens ?? this.config.maxTokens;
    if (!Number.isInteger(maxTokens) || maxTokens <= 0) {
      throw new ProviderError(
        'Invocation must specify a positive maxTokens value',
        'invalid_request_error',
        this.config.provider,
      );
    }

    return {
      model: this.config.modelId,
      messages,
      maxTokens,
      temperature: options.temperature ?? this.config.temperature,
      ...(options.topP !== undefined ? { topP: options.topP } : {}),
      ...(options.stopSequences ? { stopSequences: options.stopSequences } : {}),
    };
  }

  private async withTimeout<T>(fn: (signal: AbortSignal) => Promise<T>): Promise<T> {
    const controller = new AbortController();
    let timer: ReturnType<typeof setTimeout> | undefined;

    const timeoutPromise = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        controller.abort();
        reject(new ProviderError(
          `Request timed out after ${this.timeoutMs}ms`,
          'timeout_error',
          this.config.provider,
          undefined,
          true,
        ));
      }, this.timeoutMs);
    });

    try {
      return await Promise.race([fn(controller.signal), timeoutPromise]);
    } finally {
      if (timer !== undefined) {
        clearTimeout(timer);
      }
    }
  }
}
