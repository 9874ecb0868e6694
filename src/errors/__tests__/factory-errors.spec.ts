/**
 * Factory Errors Tests
 */

import {
  LlmFactoryError,
  ConfigNotFoundError,
  ConfigParseError,
  ProviderNotFoundError,
  ProviderInitError,
  RemoteFetchError,
  RemoteFetchTimeoutError,
} from '../factory-errors';

describe('factory errors', () => {
  it('should tag each error with the stage that failed', () => {
    expect(new ConfigNotFoundError('gpt_4o', []).stage).toBe('config');
    expect(new ConfigParseError('gpt_4o', 'local', ['name: Required']).stage).toBe('config');
    expect(new ProviderNotFoundError('acme_llm', 'missing').stage).toBe('provider_resolution');
    expect(new ProviderInitError('openai', 'gpt_4o', new Error('no key')).stage).toBe('initialization');
    expect(new RemoteFetchError('s3://bucket/key', 'boom').stage).toBe('remote_fetch');
  });

  it('should keep instanceof checks working across the hierarchy', () => {
    const error = new RemoteFetchTimeoutError('s3://bucket/key', 500);

    expect(error).toBeInstanceOf(RemoteFetchTimeoutError);
    expect(error).toBeInstanceOf(RemoteFetchError);
    expect(error).toBeInstanceOf(LlmFactoryError);
    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe('RemoteFetchTimeoutError');
    expect(error.message).toBe('Fetching s3://bucket/key timed out after 500ms');
  });

  it('should list searched sources when a config is missing', () => {
    const error = new ConfigNotFoundError('nonexistent_model', ['s3://bucket/models', '/opt/models']);

    expect(error.message).toBe(
      "Config for 'nonexistent_model' not found in s3://bucket/models, /opt/models",
    );
    expect(error.searchedSources).toEqual(['s3://bucket/models', '/opt/models']);
  });

  it('should keep the underlying cause of an init failure', () => {
    const cause = new Error('API key missing');
    const error = new ProviderInitError('openai', 'gpt_4o', cause);

    expect(error.cause).toBe(cause);
    expect(error.message).toBe("Failed to initialize 'openai' client for 'gpt_4o': API key missing");
  });

  it('should wrap unknown causes into a RemoteFetchError', () => {
    const error = RemoteFetchError.from('ssm:/LLM_CONFIG/X', new Error('AccessDenied'));

    expect(error.uri).toBe('ssm:/LLM_CONFIG/X');
    expect(error.message).toBe('Failed to fetch ssm:/LLM_CONFIG/X: AccessDenied');
  });
});
