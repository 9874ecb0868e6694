/**
 * Parameter Store
 *
 * Resolves named configuration parameters from AWS SSM Parameter Store.
 */

import { SSMClient, GetParameterCommand, ParameterNotFound } from '@aws-sdk/client-ssm';
import { RemoteFetchError } from '../errors';
import { withFetchTimeout } from './with-timeout';

/**
 * Source of named configuration parameters
 */
export interface ParameterResolver {
  /**
   * Value of the parameter, or null when it does not exist
   */
  getParameter(name: string): Promise<string | null>;
}

export interface SsmParameterResolverOptions {
  client?: SSMClient;
  region?: string;
  timeoutMs: number;
}

/**
 * ParameterResolver backed by SSM (values are decrypted)
 */
export class SsmParameterResolver implements ParameterResolver {
  private readonly client: SSMClient;
  private readonly timeoutMs: number;

  constructor(options: SsmParameterResolverOptions) {
    this.client = options.client ?? new SSMClient(options.region ? { region: options.region } : {});
    this.timeoutMs = options.timeoutMs;
  }

  async getParameter(name: string): Promise<string | null> {
    const uri = `ssm:${name}`;

    try {
      const response = await withFetchTimeout(uri, this.timeoutMs, signal =>
        this.client.send(new GetParameterCommand({ Name: name, WithDecryption: true }), { abortSignal: signal }),
      );
      return response.Parameter?.Value ?? null;
    } catch (error) {
      if (error instanceof ParameterNotFound) {
        return null;
      }
      if (error instanceof RemoteFetchError) {
        throw error;
      }
      throw RemoteFetchError.from(uri, error);
    }
  }
}
