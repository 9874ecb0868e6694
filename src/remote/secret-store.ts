/**
 * Secret Store
 *
 * API key lookup in AWS Secrets Manager for providers that need one.
 */

import { SecretsManagerClient, GetSecretValueCommand } from '@aws-sdk/client-secrets-manager';
import { RemoteFetchError } from '../errors';
import { withFetchTimeout } from './with-timeout';

/**
 * Source of secret strings
 */
export interface SecretResolver {
  getSecret(secretId: string): Promise<string>;
}

export interface SecretsManagerResolverOptions {
  client?: SecretsManagerClient;
  region?: string;
  timeoutMs: number;
}

/**
 * SecretResolver backed by Secrets Manager
 */
export class SecretsManagerResolver implements SecretResolver {
  private readonly client: SecretsManagerClient;
  private readonly timeoutMs: number;

  constructor(options: SecretsManagerResolverOptions) {
    this.client = options.client ?? new SecretsManagerClient(options.region ? { region: options.region } : {});
    this.timeoutMs = options.timeoutMs;
  }

  async getSecret(secretId: string): Promise<string> {
    const uri = `secretsmanager:${secretId}`;

    let secret: string | undefined;
    try {
      const response = await withFetchTimeout(uri, this.timeoutMs, signal =>
        this.client.send(new GetSecretValueCommand({ SecretId: secretId }), { abortSignal: signal }),
      );
      secret = response.SecretString;
    } catch (error) {
      if (error instanceof RemoteFetchError) {
        throw error;
      }
      throw RemoteFetchError.from(uri, error);
    }

    if (!secret) {
      throw new RemoteFetchError(uri, `Secret '${secretId}' has no string value`);
    }
    return secret;
  }
}
