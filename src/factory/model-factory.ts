/**
 * ModelFactory
 *
 * Builds LlmModel instances by name and caches them.
 *
 * getModel algorithm (in order):
 * 1. Not forced and cached: return the cached instance, no I/O
 * 2. Not forced and a build of the name is in flight: share that build
 * 3. Otherwise wait for any in-flight build of the name to settle, then:
 *    a. Load the model config
 *    b. Resolve the provider (registry, then remote)
 *    c. Construct the model and store it, replacing any cached entry
 *
 * Failures propagate unchanged and leave the cache as it was.
 */

import { ModelConfigLoader } from '../model-config';
import { LlmModel, LlmModelOptions } from '../models';
import { ProviderRegistry } from '../providers/provider.registry';
import { createModuleLogger, describeError } from '../utils';
import { CacheEntry, InMemoryModelCache, ModelCache } from './model-cache';

const logger = createModuleLogger('model-factory');

export interface GetModelOptions {
  configDir?: string;
  forceReload?: boolean;
}

export interface ModelFactoryOptions {
  configLoader: ModelConfigLoader;
  registry: ProviderRegistry;
  cache?: ModelCache;
  modelOptions?: LlmModelOptions;
  clock?: () => Date;
}

export class ModelFactory {
  readonly configLoader: ModelConfigLoader;
  readonly registry: ProviderRegistry;
  private readonly cache: ModelCache;
  private readonly modelOptions: LlmModelOptions;
  private readonly clock: () => Date;
  private readonly pendingBuilds: Map<string, Promise<LlmModel>> = new Map();

  constructor(options: ModelFactoryOptions) {
    this.configLoader = options.configLoader;
    this.registry = options.registry;
    this.cache = options.cache ?? new InMemoryModelCache();
    this.modelOptions = options.modelOptions ?? {};
    this.clock = options.clock ?? (() => new Date());
  }

  /**
   * Get a model by name, building it on a cache miss or when forced
   *
   * @throws ConfigNotFoundError, ConfigParseError, ProviderNotFoundError,
   *   ProviderLoadError, RemoteFetchError
   */
  async getModel(modelName: string, options: GetModelOptions = {}): Promise<LlmModel> {
    if (!options.forceReload) {
      const cached = this.cache.get(modelName);
      if (cached) {
        return cached.instance;
      }

      const pending = this.pendingBuilds.get(modelName);
      if (pending) {
        return pending;
      }
    }

    return this.startBuild(modelName, options.configDir);
  }

  /**
   * Cached entry of a model, without building
   */
  getCachedModel(modelName: string): CacheEntry | undefined {
    return this.cache.get(modelName);
  }

  evict(modelName: string): boolean {
    return this.cache.delete(modelName);
  }

  clearCache(): void {
    this.cache.clear();
  }

  getCachedModelNames(): string[] {
    return this.cache.keys().sort();
  }

  /**
   * Names of the models whose descriptors can be found
   */
  listAvailableModels(configDir?: string): Promise<string[]> {
    return this.configLoader.listModels(configDir);
  }

  private startBuild(modelName: string, configDir: string | undefined): Promise<LlmModel> {
    const previous = this.pendingBuilds.get(modelName);
    // An earlier build's outcome is reported to its own callers
    const settled = previous
      ? previous.then(() => undefined, () => undefined)
      : Promise.resolve();

    const build: Promise<LlmModel> = settled
      .then(() => this.build(modelName, configDir))
      .finally(() => {
        if (this.pendingBuilds.get(modelName) === build) {
          this.pendingBuilds.delete(modelName);
        }
      });

    this.pendingBuilds.set(modelName, build);
    return build;
  }

  private async build(modelName: string, configDir: string | undefined): Promise<LlmModel> {
    try {
      const config = await this.configLoader.load(modelName, configDir);
      const provider = await this.registry.resolve(config.provider);
      const instance = new LlmModel(modelName, config, provider, this.modelOptions);

      this.cache.set({ modelName, instance, loadedAt: this.clock() });
      logger.info('Model built', { model: modelName, provider: config.provider, modelId: config.modelId });
      return instance;
    } catch (error) {
      logger.error('Failed to build model', { model: modelName, error: describeError(error) });
      throw error;
    }
  }
}
