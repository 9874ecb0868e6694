/**
 * Remote Provider Loader
 *
 * Fetches `<key>.js` from the remote provider modules directory, evaluates
 * it and validates its exports. Remote modules run with the privileges of
 * the host process, so the provider directory must be a controlled location.
 */

import { mkdir, mkdtemp, rm, writeFile } from 'fs/promises';
import * as path from 'path';
import { ProviderLoadError } from '../errors';
import { ObjectStore, RemotePathResolver, joinRemotePath } from '../remote';
import { createModuleLogger, describeError } from '../utils';
import { ModelProvider } from './interfaces';
import { toModelProvider } from './provider.validation';

const logger = createModuleLogger('provider-loader');

export const PROVIDER_MODULE_EXTENSION = '.js';

/**
 * Source of providers that are not registered in-process
 */
export interface ProviderSourceLoader {
  /**
   * Load the provider for a key, or null when no module exists for it
   */
  load(providerKey: string): Promise<ModelProvider | null>;
}

/**
 * Turns module source text into its exports
 */
export interface ModuleEvaluator {
  evaluate(source: string, fileName: string): Promise<unknown>;
}

/**
 * Directory inside the package that holds evaluated provider modules.
 * Modules placed here resolve their own `require` calls against the
 * package's node_modules, so they can use the SDKs the host depends on.
 */
export const DEFAULT_PROVIDER_MODULE_DIR = path.resolve(__dirname, '..', '..', '.provider-modules');

export interface TempFileModuleEvaluatorOptions {
  /** Parent of the per-module temporary directories */
  baseDir?: string;
}

/**
 * Writes the source to a private temporary directory and requires it
 * as a CommonJS module.
 */
export class TempFileModuleEvaluator implements ModuleEvaluator {
  readonly baseDir: string;

  constructor(options: TempFileModuleEvaluatorOptions = {}) {
    this.baseDir = options.baseDir ?? DEFAULT_PROVIDER_MODULE_DIR;
  }

  async evaluate(source: string, fileName: string): Promise<unknown> {
    await mkdir(this.baseDir, { recursive: true });
    const directory = await mkdtemp(path.join(this.baseDir, 'llm-provider-'));
    const modulePath = path.join(directory, path.basename(fileName));

    try {
      await writeFile(modulePath, source, 'utf8');
      const exported: unknown = require(modulePath);
      return exported;
    } finally {
      delete require.cache[modulePath];
      await rm(directory, { recursive: true, force: true });
    }
  }
}

export interface S3ProviderSourceLoaderOptions {
  objectStore: ObjectStore;
  remotePaths: RemotePathResolver;
  evaluator?: ModuleEvaluator;
}

/**
 * Loads provider modules from the S3 directory resolved for 'providers'
 */
export class S3ProviderSourceLoader implements ProviderSourceLoader {
  private readonly objectStore: ObjectStore;
  private readonly remotePaths: RemotePathResolver;
  private readonly evaluator: ModuleEvaluator;

  constructor(options: S3ProviderSourceLoaderOptions) {
    this.objectStore = options.objectStore;
    this.remotePaths = options.remotePaths;
    this.evaluator = options.evaluator ?? new TempFileModuleEvaluator();
  }

  async load(providerKey: string): Promise<ModelProvider | null> {
    const directory = await this.remotePaths.resolve('providers');
    if (!directory) {
      logger.info('No remote provider directory configured', { provider: providerKey });
      return null;
    }

    const fileName = `${providerKey}${PROVIDER_MODULE_EXTENSION}`;
    const uri = joinRemotePath(directory, fileName);
    const source = await this.objectStore.readText(uri);
    if (source === null) {
      logger.info('Provider module not found', { provider: providerKey, uri });
      return null;
    }

    let exported: unknown;
    try {
      exported = await this.evaluator.evaluate(source, fileName);
    } catch (error) {
      throw new ProviderLoadError(
        providerKey,
        uri,
        `module failed to evaluate: ${describeError(error)}`,
        error,
      );
    }

    const provider = toModelProvider(providerKey, uri, exported);
    logger.info('Loaded remote provider', { provider: providerKey, uri });
    return provider;
  }
}
