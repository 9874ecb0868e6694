/**
 * BaseProvider Tests
 *
 * Tests for client creation, error mapping around every call,
 * and API key resolution.
 */

import { BaseProvider, BaseProviderOptions, readStatus, toFinishReason } from '../base.provider';
import { ChatRequest, ChatResult, ProviderError } from '../interfaces';
import { ModelConfig } from '../../model-config';
import { StaticSecretResolver, httpError, makeModelConfig } from '../../__tests__/fakes';

interface FakeSdk {
  apiKey: string;
}

/**
 * Concrete test implementation of BaseProvider for testing abstract methods
 */
class TestProvider extends BaseProvider<FakeSdk> {
  readonly key = 'test';
  readonly name = 'Test Provider';

  public executeCompleteFn: jest.Mock;

  constructor(options: BaseProviderOptions = {}) {
    super(options);
    this.executeCompleteFn = jest.fn();
  }

  protected async createSdkClient(config: ModelConfig): Promise<FakeSdk> {
    return { apiKey: await this.resolveApiKey(config, 'TEST_API_KEY') };
  }

  protected async executeComplete(client: FakeSdk, request: ChatRequest): Promise<ChatResult> {
    return this.executeCompleteFn(client, request);
  }

  mapError(error: unknown): ProviderError {
    return this.mapHttpError(error, 'Unknown test error');
  }

  // Expose protected helpers for testing
  public testResolveApiKey(config: ModelConfig): Promise<string> {
    return this.resolveApiKey(config, 'TEST_API_KEY');
  }
}

const request: ChatRequest = {
  model: 'test-model-id',
  messages: [{ role: 'user', content: 'Hello' }],
  maxTokens: 100,
};

const result: ChatResult = {
  content: 'Hi',
  model: 'test-model-id',
  usage: { inputTokens: 3, outputTokens: 1 },
  finishReason: 'end_turn',
};

describe('BaseProvider', () => {
  describe('createClient()', () => {
    it('should build the SDK client and delegate complete()', async () => {
      const provider = new TestProvider({ env: { TEST_API_KEY: 'test-key' } });
      provider.executeCompleteFn.mockResolvedValue(result);

      const client = await provider.createClient(makeModelConfig());
      const response = await client.complete(request);

      expect(response).toEqual(result);
      expect(provider.executeCompleteFn).toHaveBeenCalledWith({ apiKey: 'test-key' }, request);
    });

    it('should reject when the SDK client cannot be built', async () => {
      const provider = new TestProvider({ env: {} });

      await expect(provider.createClient(makeModelConfig())).rejects.toThrow(
        "API key for Test Model not found. Set 'TEST_API_KEY' or configure 'api_key_secret_name'.",
      );
    });

    it('should pass call errors through mapError', async () => {
      const provider = new TestProvider({ env: { TEST_API_KEY: 'test-key' } });
      provider.executeCompleteFn.mockRejectedValue(httpError(429, 'Too many requests'));

      const client = await provider.createClient(makeModelConfig());

      await expect(client.complete(request)).rejects.toMatchObject({
        name: 'ProviderError',
        type: 'rate_limit_error',
        retryable: true,
        statusCode: 429,
        provider: 'test',
      });
    });
  });

  describe('mapHttpError()', () => {
    const provider = new TestProvider();

    it.each([
      [401, 'Invalid key', 'authentication_error', false],
      [403, 'Forbidden', 'authentication_error', false],
      [429, 'Slow down', 'rate_limit_error', true],
      [400, "This model's maximum context length is 8192 tokens", 'context_length_error', false],
      [400, 'Bad parameter', 'invalid_request_error', false],
      [404, 'No such model', 'model_not_found_error', false],
      [500, 'Internal error', 'server_error', true],
      [503, 'Unavailable', 'server_error', true],
    ])('should map status %d to the unified type', (status, message, type, retryable) => {
      const mapped = provider.mapError(httpError(status, message));

      expect(mapped.type).toBe(type);
      expect(mapped.retryable).toBe(retryable);
      expect(mapped.statusCode).toBe(status);
      expect(mapped.message).toBe(message);
    });

    it('should map connection failures to network_error', () => {
      const mapped = provider.mapError(new Error('connect ECONNREFUSED 127.0.0.1:443'));

      expect(mapped.type).toBe('network_error');
      expect(mapped.retryable).toBe(true);
    });

    it('should use the fallback message for non-Error values', () => {
      const mapped = provider.mapError('boom');

      expect(mapped.type).toBe('unknown_error');
      expect(mapped.message).toBe('Unknown test error');
    });

    it('should return ProviderError instances unchanged', () => {
      const original = new ProviderError('Already mapped', 'timeout_error', 'test');

      expect(provider.mapError(original)).toBe(original);
    });
  });

  describe('resolveApiKey()', () => {
    it('should prefer the configured secret', async () => {
      const provider = new TestProvider({
        secrets: new StaticSecretResolver({ 'test/api-key': 'secret-value' }),
        env: { TEST_API_KEY: 'env-value' },
      });

      const apiKey = await provider.testResolveApiKey(makeModelConfig({ apiKeySecretName: 'test/api-key' }));

      expect(apiKey).toBe('secret-value');
    });

    it('should fall back to the environment when the secret cannot be read', async () => {
      const provider = new TestProvider({
        secrets: new StaticSecretResolver({}),
        env: { TEST_API_KEY: 'env-value' },
      });

      const apiKey = await provider.testResolveApiKey(makeModelConfig({ apiKeySecretName: 'missing' }));

      expect(apiKey).toBe('env-value');
    });

    it('should fall back to the environment when no secret store is configured', async () => {
      const provider = new TestProvider({ env: { TEST_API_KEY: 'env-value' } });

      const apiKey = await provider.testResolveApiKey(makeModelConfig({ apiKeySecretName: 'test/api-key' }));

      expect(apiKey).toBe('env-value');
    });

    it('should read the env var named by the config', async () => {
      const provider = new TestProvider({ env: { TEST_API_KEY: 'default', CUSTOM_KEY: 'custom' } });

      const apiKey = await provider.testResolveApiKey(makeModelConfig({ apiKeyEnvVar: 'CUSTOM_KEY' }));

      expect(apiKey).toBe('custom');
    });

    it('should name the missing env var', async () => {
      const provider = new TestProvider({ env: {} });

      await expect(
        provider.testResolveApiKey(makeModelConfig({ name: 'GPT-4o', apiKeyEnvVar: 'CUSTOM_KEY' })),
      ).rejects.toThrow("API key for GPT-4o not found. Set 'CUSTOM_KEY' or configure 'api_key_secret_name'.");
    });
  });
});

describe('readStatus()', () => {
  it('should read a numeric status field', () => {
    expect(readStatus(httpError(418, 'teapot'))).toBe(418);
  });

  it('should ignore values without a numeric status', () => {
    expect(readStatus(new Error('plain'))).toBeUndefined();
    expect(readStatus({ status: '500' })).toBeUndefined();
    expect(readStatus(null)).toBeUndefined();
  });
});

describe('toFinishReason()', () => {
  const mapping = { stop: 'end_turn', length: 'max_tokens' } as const;

  it('should map known reasons', () => {
    expect(toFinishReason('length', mapping)).toBe('max_tokens');
  });

  it('should default to end_turn', () => {
    expect(toFinishReason('other', mapping)).toBe('end_turn');
    expect(toFinishReason(null, mapping)).toBe('end_turn');
    expect(toFinishReason(undefined, mapping)).toBe('end_turn');
  });
});
