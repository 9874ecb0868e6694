/**
 * BaseProvider Abstract Class
 *
 * Shared implementation for the built-in providers: API key resolution,
 * SDK client creation and error normalization around every call.
 */

import { ModelConfig } from '../model-config';
import { SecretResolver } from '../remote';
import { createModuleLogger, describeError } from '../utils';
import {
  ChatClient,
  ChatRequest,
  ChatResult,
  FinishReason,
  ModelProvider,
  ProviderError,
} from './interfaces';

const logger = createModuleLogger('providers');

/**
 * Collaborators a built-in provider may need while creating clients
 */
export interface BaseProviderOptions {
  secrets?: SecretResolver | null;
  env?: Record<string, string | undefined>;
}

/**
 * Abstract base class for the built-in provider implementations.
 *
 * Subclasses must implement the following abstract methods:
 * - createSdkClient: Build the vendor SDK client for a model config
 * - executeComplete: Provider-specific completion call
 * - mapError: Map provider-specific errors to ProviderError
 */
export abstract class BaseProvider<TSdkClient> implements ModelProvider {
  abstract readonly key: string;
  abstract readonly name: string;

  protected readonly secrets: SecretResolver | null;
  protected readonly env: Record<string, string | undefined>;

  constructor(options: BaseProviderOptions = {}) {
    this.secrets = options.secrets ?? null;
    this.env = options.env ?? process.env;
  }

  /**
   * Build the chat client of a model; every call goes through mapError
   */
  async createClient(config: ModelConfig): Promise<ChatClient> {
    const sdkClient = await this.createSdkClient(config);

    return {
      complete: async (request: ChatRequest): Promise<ChatResult> => {
        try {
          return await this.executeComplete(sdkClient, request);
        } catch (error) {
          throw this.mapError(error);
        }
      },
    };
  }

  /**
   * Resolve an API key: Secrets Manager first when the config names a
   * secret, then the configured (or default) environment variable.
   */
  protected async resolveApiKey(config: ModelConfig, defaultEnvVar: string): Promise<string> {
    if (config.apiKeySecretName) {
      if (this.secrets) {
        try {
          const secret = await this.secrets.getSecret(config.apiKeySecretName);
          logger.info('Fetched API key from Secrets Manager', { provider: this.key, model: config.name });
          return secret;
        } catch (error) {
          logger.warn('Could not fetch API key from Secrets Manager, falling back to env var', {
            provider: this.key,
            secret: config.apiKeySecretName,
            error: describeError(error),
          });
        }
      } else {
        logger.warn('No secret store configured, falling back to env var', { provider: this.key });
      }
    }

    const envVar = config.apiKeyEnvVar ?? defaultEnvVar;
    const apiKey = this.env[envVar];
    if (!apiKey) {
      throw new Error(
        `API key for ${config.name} not found. Set '${envVar}' or configure 'api_key_secret_name'.`,
      );
    }
    return apiKey;
  }

  /**
   * Map an HTTP-status-bearing SDK error to ProviderError.
   * Shared by the providers whose SDKs expose a `status` field.
   */
  protected mapHttpError(error: unknown, fallbackMessage: string): ProviderError {
    if (error instanceof ProviderError) {
      return error;
    }

    const status = readStatus(error);
    const message = error instanceof Error && error.message ? error.message : fallbackMessage;
    const lowered = message.toLowerCase();

    if (status === 401 || status === 403) {
      return new ProviderError(message, 'authentication_error', this.key, status);
    }

    if (status === 429) {
      return new ProviderError(message, 'rate_limit_error', this.key, status, true);
    }

    if (status === 400) {
      if (lowered.includes('context length') || lowered.includes('maximum context') || lowered.includes('too long')) {
        return new ProviderError(message, 'context_length_error', this.key, status);
      }
      return new ProviderError(message, 'invalid_request_error', this.key, status);
    }

    if (status === 404) {
      return new ProviderError(message, 'model_not_found_error', this.key, status);
    }

    if (status !== undefined && status >= 500) {
      return new ProviderError(message, 'server_error', this.key, status, true);
    }

    if (lowered.includes('econnrefused') || lowered.includes('enotfound') || lowered.includes('fetch failed')) {
      return new ProviderError(message, 'network_error', this.key, undefined, true);
    }

    return new ProviderError(message, 'unknown_error', this.key, status);
  }

  // Abstract methods that subclasses must implement

  /**
   * Build the vendor SDK client; failures surface as init errors
   */
  protected abstract createSdkClient(config: ModelConfig): Promise<TSdkClient>;

  /**
   * Provider-specific completion call
   */
  protected abstract executeComplete(client: TSdkClient, request: ChatRequest): Promise<ChatResult>;

  /**
   * Map provider-specific errors to ProviderError
   */
  abstract mapError(error: unknown): ProviderError;
}

/**
 * HTTP status carried by an SDK error, if any
 */
export function readStatus(error: unknown): number | undefined {
  if (typeof error === 'object' && error !== null && 'status' in error && typeof error.status === 'number') {
    return error.status;
  }
  return undefined;
}

/**
 * Map a vendor stop reason to the unified finish reason
 */
export function toFinishReason(
  reason: string | null | undefined,
  mapping: Record<string, FinishReason>,
): FinishReason {
  if (reason && mapping[reason]) {
    return mapping[reason];
  }
  return 'end_turn';
}
