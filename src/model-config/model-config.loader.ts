/**
 * Model Config Loader
 *
 * Finds the `<model_name>.yaml` descriptor of a model and validates it.
 * Sources are checked in order: the configured remote models directory,
 * then the requested directory (a local path or an s3:// URI). The first
 * source that holds the descriptor wins, so remote descriptors override
 * local ones.
 */

import { readFile, readdir } from 'fs/promises';
import path from 'path';
import { ConfigNotFoundError, RemoteFetchError } from '../errors';
import { ObjectStore, RemotePathResolver, isRemoteUri, joinRemotePath } from '../remote';
import { createModuleLogger } from '../utils';
import { ModelConfig } from './model-config.types';
import { parseModelDescriptor } from './model-config.schema';
import { getDefaultConfigDir } from './default-configs';

const logger = createModuleLogger('model-config-loader');

export const DESCRIPTOR_EXTENSION = '.yaml';

const MODEL_NAME_PATTERN = /^[A-Za-z0-9][A-Za-z0-9._-]*$/;

export interface ModelConfigLoaderOptions {
  /** Store used for s3:// sources; remote sources are skipped without one */
  objectStore?: ObjectStore | null;
  /** Resolves the remote models directory */
  remotePaths?: RemotePathResolver | null;
  /** Directory used when `load` is called without one */
  defaultConfigDir?: string;
}

// fs errors may come from another realm, so match on shape rather than class
function isMissingFile(error: unknown): boolean {
  return typeof error === 'object'
    && error !== null
    && 'code' in error
    && (error.code === 'ENOENT' || error.code === 'ENOTDIR');
}

export class ModelConfigLoader {
  private readonly objectStore: ObjectStore | null;
  private readonly remotePaths: RemotePathResolver | null;
  readonly defaultConfigDir: string;

  constructor(options: ModelConfigLoaderOptions = {}) {
    this.objectStore = options.objectStore ?? null;
    this.remotePaths = options.remotePaths ?? null;
    this.defaultConfigDir = options.defaultConfigDir ?? getDefaultConfigDir();
  }

  /**
   * Load the config of a model
   *
   * @param modelName - Descriptor file stem, e.g. `gpt_4o`
   * @param configDir - Local directory or s3:// directory to search
   * @throws ConfigNotFoundError, ConfigParseError, RemoteFetchError (also when
   *   an s3:// source is given without an object store)
   */
  async load(modelName: string, configDir: string = this.defaultConfigDir): Promise<ModelConfig> {
    if (!MODEL_NAME_PATTERN.test(modelName)) {
      throw new ConfigNotFoundError(modelName, [], 'model name must be a non-empty file stem');
    }

    const sources = await this.getSources(configDir);
    const fileName = `${modelName}${DESCRIPTOR_EXTENSION}`;

    for (const source of sources) {
      const location = isRemoteUri(source) ? joinRemotePath(source, fileName) : path.join(source, fileName);
      const text = await this.readSource(location);
      if (text === null) {
        continue;
      }

      const config = parseModelDescriptor(modelName, text, location);
      logger.info('Loaded model config', { modelName, source: location, provider: config.provider });
      return config;
    }

    throw new ConfigNotFoundError(modelName, sources);
  }

  /**
   * Names of every descriptor available across the sources
   */
  async listModels(configDir: string = this.defaultConfigDir): Promise<string[]> {
    const sources = await this.getSources(configDir);
    const names = new Set<string>();

    for (const source of sources) {
      const found = isRemoteUri(source)
        ? await this.requireObjectStore(source).listNames(source, DESCRIPTOR_EXTENSION)
        : await this.listLocal(source);
      found.forEach(name => names.add(name));
    }

    return Array.from(names).sort();
  }

  private async getSources(configDir: string): Promise<string[]> {
    const sources: string[] = [];

    const remoteDir = this.remotePaths && this.objectStore
      ? await this.remotePaths.resolve('models')
      : null;
    if (remoteDir) {
      sources.push(remoteDir);
    }

    if (!sources.includes(configDir)) {
      sources.push(configDir);
    }
    return sources;
  }

  private async readSource(location: string): Promise<string | null> {
    if (isRemoteUri(location)) {
      return this.requireObjectStore(location).readText(location);
    }

    try {
      return await readFile(location, 'utf8');
    } catch (error) {
      if (isMissingFile(error)) {
        return null;
      }
      throw error;
    }
  }

  private async listLocal(directory: string): Promise<string[]> {
    try {
      const entries = await readdir(directory);
      return entries
        .filter(entry => entry.endsWith(DESCRIPTOR_EXTENSION))
        .map(entry => entry.slice(0, -DESCRIPTOR_EXTENSION.length));
    } catch (error) {
      if (isMissingFile(error)) {
        return [];
      }
      throw error;
    }
  }

  private requireObjectStore(location: string): ObjectStore {
    if (!this.objectStore) {
      throw new RemoteFetchError(location, `Cannot read ${location}: no object store configured for s3:// sources`);
    }
    return this.objectStore;
  }
}
