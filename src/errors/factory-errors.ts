/**
 * Factory Errors
 *
 * Typed failures raised while building a model. Each error names the stage
 * that failed so callers can decide whether to retry, fall back or abort.
 */

/**
 * Stage of a model build that produced an error
 */
export type FactoryStage =
  | 'config'                   // Descriptor lookup, parsing or settings
  | 'provider_resolution'      // Registry lookup or remote provider load
  | 'initialization'           // Underlying client construction
  | 'remote_fetch';            // S3 / SSM / Secrets Manager access

/**
 * Base class of every factory error
 */
export abstract class LlmFactoryError extends Error {
  abstract readonly stage: FactoryStage;

  constructor(message: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = new.target.name;
    // Restore prototype chain for instanceof checks when targeting ES5
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * No descriptor for the requested model exists in any source
 */
export class ConfigNotFoundError extends LlmFactoryError {
  readonly stage = 'config';

  constructor(
    public readonly modelName: string,
    public readonly searchedSources: string[],
    reason?: string,
  ) {
    super(
      reason
        ? `Config for '${modelName}' not found: ${reason}`
        : `Config for '${modelName}' not found in ${searchedSources.length > 0 ? searchedSources.join(', ') : 'any source'}`,
    );
  }
}

/**
 * A descriptor exists but is malformed or misses required fields
 */
export class ConfigParseError extends LlmFactoryError {
  readonly stage = 'config';

  constructor(
    public readonly modelName: string,
    public readonly source: string,
    public readonly issues: string[],
    cause?: unknown,
  ) {
    super(`Invalid config for '${modelName}' in ${source}: ${issues.join('; ')}`, cause);
  }
}

/**
 * Environment settings failed validation
 */
export class FactorySettingsError extends LlmFactoryError {
  readonly stage = 'config';

  constructor(public readonly issues: string[]) {
    super(`Invalid factory settings: ${issues.join('; ')}`);
  }
}

/**
 * Provider key is absent from the registry and from the remote source
 */
export class ProviderNotFoundError extends LlmFactoryError {
  readonly stage = 'provider_resolution';

  constructor(
    public readonly providerKey: string,
    reason: string,
  ) {
    super(`Provider '${providerKey}' not found: ${reason}`);
  }
}

/**
 * A remote provider module was fetched but could not be admitted
 */
export class ProviderLoadError extends LlmFactoryError {
  readonly stage = 'provider_resolution';

  constructor(
    public readonly providerKey: string,
    public readonly source: string,
    reason: string,
    cause?: unknown,
  ) {
    super(`Provider '${providerKey}' from ${source} rejected: ${reason}`, cause);
  }
}

/**
 * The underlying client of a model could not be constructed
 */
export class ProviderInitError extends LlmFactoryError {
  readonly stage = 'initialization';

  constructor(
    public readonly providerKey: string,
    public readonly modelName: string,
    cause: unknown,
  ) {
    super(
      `Failed to initialize '${providerKey}' client for '${modelName}': ${cause instanceof Error ? cause.message : String(cause)}`,
      cause,
    );
  }
}

/**
 * Network or access failure while reaching a remote store
 */
export class RemoteFetchError extends LlmFactoryError {
  readonly stage = 'remote_fetch';

  constructor(
    public readonly uri: string,
    message: string,
    cause?: unknown,
  ) {
    super(message, cause);
  }

  static from(uri: string, cause: unknown): RemoteFetchError {
    const detail = cause instanceof Error ? cause.message : String(cause);
    return new RemoteFetchError(uri, `Failed to fetch ${uri}: ${detail}`, cause);
  }
}

/**
 * A remote fetch did not complete within its time budget
 */
export class RemoteFetchTimeoutError extends RemoteFetchError {
  constructor(
    uri: string,
    public readonly timeoutMs: number,
  ) {
    super(uri, `Fetching ${uri} timed out after ${timeoutMs}ms`);
  }
}
