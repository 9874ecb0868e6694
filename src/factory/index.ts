/**
 * Factory Module - Barrel Export and wiring
 */

export { CacheEntry, ModelCache, InMemoryModelCache } from './model-cache';
export { ModelFactory, ModelFactoryOptions, GetModelOptions } from './model-factory';

import { FactorySettings, loadFactorySettings } from '../config';
import { ModelConfigLoader } from '../model-config';
import { LlmModel } from '../models';
import { createProviderRegistry } from '../providers';
import { ProviderRegistry } from '../providers/provider.registry';
import { ModuleEvaluator, S3ProviderSourceLoader } from '../providers/remote-provider.loader';
import {
  ObjectStore,
  ParameterResolver,
  RemotePathResolver,
  S3ObjectStore,
  SecretResolver,
  SecretsManagerResolver,
  SsmParameterResolver,
} from '../remote';
import { ModelCache } from './model-cache';
import { ModelFactory } from './model-factory';

/**
 * Overrides for createModelFactory; anything left out is built from settings.
 * Passing null for a store disables it.
 */
export interface CreateModelFactoryOptions {
  settings?: FactorySettings;
  env?: Record<string, string | undefined>;
  objectStore?: ObjectStore | null;
  parameters?: ParameterResolver | null;
  secrets?: SecretResolver | null;
  evaluator?: ModuleEvaluator;
  registry?: ProviderRegistry;
  cache?: ModelCache;
}

/**
 * Wire settings, AWS-backed stores, the provider registry and the config
 * loader into a ModelFactory
 */
export function createModelFactory(options: CreateModelFactoryOptions = {}): ModelFactory {
  const env = options.env ?? process.env;
  const settings = options.settings ?? loadFactorySettings(env);
  const region = settings.awsRegion;
  const timeoutMs = settings.remoteFetchTimeoutMs;

  const objectStore = options.objectStore !== undefined
    ? options.objectStore
    : new S3ObjectStore({ region, timeoutMs });
  const parameters = options.parameters !== undefined
    ? options.parameters
    : new SsmParameterResolver({ region, timeoutMs });
  const secrets = options.secrets !== undefined
    ? options.secrets
    : new SecretsManagerResolver({ region, timeoutMs });

  const remotePaths = new RemotePathResolver(settings, parameters);
  const sourceLoader = objectStore
    ? new S3ProviderSourceLoader({ objectStore, remotePaths, evaluator: options.evaluator })
    : null;

  const registry = options.registry ?? createProviderRegistry({ sourceLoader, secrets, env });
  const configLoader = new ModelConfigLoader({
    objectStore,
    remotePaths,
    defaultConfigDir: settings.configDir,
  });

  return new ModelFactory({
    configLoader,
    registry,
    cache: options.cache,
    modelOptions: { timeoutMs: settings.providerTimeoutMs },
  });
}

let defaultFactory: ModelFactory | null = null;

/**
 * Process-wide factory used by getLlm, created on first use
 */
export function getDefaultModelFactory(): ModelFactory {
  if (!defaultFactory) {
    defaultFactory = createModelFactory();
  }
  return defaultFactory;
}

/**
 * Replace the process-wide factory; null resets it
 */
export function setDefaultModelFactory(factory: ModelFactory | null): void {
  defaultFactory = factory;
}

/**
 * Get a ready-to-use model by name
 *
 * @param modelName - Descriptor file stem, e.g. `gpt_4o`
 * @param configDir - Local or s3:// directory holding descriptors
 * @param forceReload - Rebuild even when a cached instance exists
 */
export function getLlm(
  modelName: string,
  configDir?: string,
  forceReload: boolean = false,
): Promise<LlmModel> {
  return getDefaultModelFactory().getModel(modelName, { configDir, forceReload });
}
